import { describe, it } from "mocha";
import { expect } from "chai";

import { LockBusyError } from "../src/core/errors.js";
import { AccessCache } from "../src/engine/accessCache.js";
import { Blackboard } from "../src/engine/blackboard.js";
import { SetBlackboardAction } from "../src/nodes/actions.js";
import { createTickRuntime } from "../src/nodes/runtime.js";
import { ManualClock } from "./helpers/scriptedNode.js";

describe("blackboard", () => {
  it("round-trips values by reference", () => {
    const blackboard = new Blackboard();
    const target = { x: 3, y: 4 };

    blackboard.set("target", target);

    expect(blackboard.get("target")).to.equal(target);
    expect(blackboard.has("target")).to.equal(true);
    expect(blackboard.get("missing", "fallback")).to.equal("fallback");
    expect(blackboard.get("missing")).to.equal(undefined);
  });

  it("removes, lists and clears keys", () => {
    const blackboard = new Blackboard();
    blackboard.set("a", 1);
    blackboard.set("b", 2);

    expect(blackboard.keys()).to.deep.equal(["a", "b"]);
    expect(blackboard.entries()).to.deep.equal([
      ["a", 1],
      ["b", 2],
    ]);
    expect(blackboard.remove("a")).to.equal(true);
    expect(blackboard.remove("a")).to.equal(false);
    expect(blackboard.get("a", null)).to.equal(null);

    blackboard.clear();
    expect(blackboard.size).to.equal(0);
    expect(blackboard.cacheSize).to.equal(0);
  });

  it("keeps the cache within its capacity while the store keeps everything", () => {
    const blackboard = new Blackboard({ cacheCapacity: 2, now: () => 0 });
    blackboard.set("a", 1);
    blackboard.set("b", 2);
    blackboard.set("c", 3);

    expect(blackboard.size).to.equal(3);
    expect(blackboard.cacheSize).to.equal(2);
    expect(blackboard.get("a")).to.equal(1);
    expect(blackboard.cacheSize).to.equal(2);
    expect(blackboard.getStats()).to.include({ cacheEvictions: 2, misses: 1, hits: 0 });
  });

  it("treats cached values older than the validity window as misses", () => {
    const clock = new ManualClock();
    const blackboard = new Blackboard({ cacheTtlMs: 100, now: clock.now });
    blackboard.set("x", "value");

    expect(blackboard.get("x")).to.equal("value");
    clock.advance(101);
    expect(blackboard.get("x")).to.equal("value");

    expect(blackboard.getStats()).to.include({ hits: 1, misses: 1, hitRate: 0.5 });
  });

  it("reports and resets statistics", () => {
    const blackboard = new Blackboard();
    blackboard.set("a", 1);
    blackboard.get("a");
    blackboard.get("nope");
    blackboard.remove("a");

    expect(blackboard.getStats()).to.include({
      keyCount: 0,
      reads: 2,
      writes: 1,
      removes: 1,
      hits: 1,
      misses: 1,
    });
    blackboard.resetStats();
    expect(blackboard.getStats()).to.include({ reads: 0, writes: 0, hits: 0, hitRate: 0 });
  });

  describe("locked access", () => {
    it("round-trips through the async API", async () => {
      const blackboard = new Blackboard();
      await blackboard.setAsync("k", 42);
      await blackboard.write({ a: 1, b: 2 });

      expect(await blackboard.getAsync("k")).to.equal(42);
      expect(await blackboard.hasAsync("a")).to.equal(true);
      expect(await blackboard.removeAsync("b")).to.equal(true);
      await blackboard.clearAsync();
      expect(await blackboard.getAsync("k", "gone")).to.equal("gone");
      expect(blackboard.getStats().lockAcquisitions).to.equal(7);
    });

    it("keeps readers out while a transaction is in progress", async () => {
      const blackboard = new Blackboard();
      const order: string[] = [];

      const transaction = blackboard.transaction(async (tx) => {
        tx.set("a", 1);
        await Promise.resolve();
        tx.set("b", 2);
        order.push("transaction");
      });
      const read = blackboard.read((view) => {
        order.push("read");
        return [view.get("a"), view.get("b"), view.size];
      });

      await transaction;
      expect(await read).to.deep.equal([1, 2, 2]);
      expect(order).to.deep.equal(["transaction", "read"]);
      expect(blackboard.getStats().lockContentions).to.equal(1);
    });

    it("holds a node write back until a suspended transaction finished", async () => {
      const blackboard = new Blackboard();
      let open: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        open = resolve;
      });

      const transaction = blackboard.transaction(async (tx) => {
        tx.set("a", "tx");
        await gate;
        tx.set("b", "tx");
        return [tx.get("a"), tx.get("b")];
      });
      const leaf = new SetBlackboardAction("mark", { key: "a", value: "leaf" });
      const ticking = leaf.tick(createTickRuntime({ blackboard }));
      open();

      expect(await transaction).to.deep.equal(["tx", "tx"]);
      expect(await ticking).to.equal("success");
      expect(blackboard.get("a")).to.equal("leaf");
      expect(blackboard.getStats().lockContentions).to.equal(1);
    });

    it("refuses unlocked writes while the lock is held", async () => {
      const blackboard = new Blackboard();
      let caught: unknown = null;

      await blackboard.transaction(() => {
        try {
          blackboard.set("late", 1);
        } catch (error) {
          caught = error;
        }
      });

      expect(caught).to.be.instanceOf(LockBusyError);
      if (caught instanceof LockBusyError) {
        expect(caught.message).to.equal("cannot set while the blackboard lock is held");
        expect(caught.details).to.deep.equal({ key: "late" });
      }
      expect(blackboard.has("late")).to.equal(false);
      blackboard.set("late", 2);
      expect(blackboard.get("late")).to.equal(2);
    });

    it("keeps writes made before a failing transaction and releases the lock", async () => {
      const blackboard = new Blackboard();
      let caught: unknown = null;
      try {
        await blackboard.transaction((tx) => {
          tx.set("partial", true);
          throw new Error("abort");
        });
      } catch (error) {
        caught = error;
      }

      expect(caught).to.be.instanceOf(Error);
      expect(await blackboard.getAsync("partial")).to.equal(true);
    });
  });
});

describe("access cache", () => {
  it("evicts the entry with the fewest accesses", () => {
    const cache = new AccessCache({ capacity: 2, now: () => 0 });
    cache.store("a", 1);
    cache.store("b", 2);
    cache.lookup("a");

    cache.store("c", 3);

    expect(cache.lookup("b")).to.deep.equal({ hit: false });
    expect(cache.lookup("a")).to.deep.equal({ hit: true, value: 1 });
    expect(cache.evictionCount).to.equal(1);
  });

  it("breaks ties on the oldest access", () => {
    const clock = new ManualClock();
    const cache = new AccessCache({ capacity: 2, now: clock.now });
    cache.store("old", 1);
    clock.advance(5);
    cache.store("new", 2);

    cache.store("third", 3);

    expect(cache.lookup("old").hit).to.equal(false);
    expect(cache.lookup("new").hit).to.equal(true);
  });
});
