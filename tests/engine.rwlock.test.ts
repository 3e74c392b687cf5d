import { describe, it } from "mocha";
import { expect } from "chai";

import { ReadWriteLock } from "../src/engine/rwLock.js";
import { ManualClock } from "./helpers/scriptedNode.js";

/** Lets every queued microtask run. */
async function settle(): Promise<void> {
  for (let i = 0; i < 5; i += 1) {
    await Promise.resolve();
  }
}

describe("read/write lock", () => {
  it("lets readers share the lock", async () => {
    const lock = new ReadWriteLock();
    const first = await lock.acquireRead();
    const second = await lock.acquireRead();

    expect(lock.getStats()).to.include({ activeReaders: 2, writerActive: false, contended: 0 });
    first();
    second();
    expect(lock.getStats().activeReaders).to.equal(0);
  });

  it("makes a writer wait for active readers", async () => {
    const lock = new ReadWriteLock();
    const reader = await lock.acquireRead();
    let granted = false;
    const writer = lock.acquireWrite().then((release) => {
      granted = true;
      return release;
    });

    await settle();
    expect(granted).to.equal(false);

    reader();
    const release = await writer;
    expect(lock.getStats()).to.include({ writerActive: true, contended: 1 });
    release();
  });

  it("serves a queued writer before readers that arrived after it", async () => {
    const lock = new ReadWriteLock();
    const order: string[] = [];
    const reader = await lock.acquireRead();

    const writer = lock.acquireWrite().then((release) => {
      order.push("writer");
      release();
    });
    const lateReader = lock.acquireRead().then((release) => {
      order.push("late-reader");
      release();
    });

    await settle();
    expect(order).to.deep.equal([]);
    expect(lock.getStats().queued).to.equal(2);

    reader();
    await Promise.all([writer, lateReader]);
    expect(order).to.deep.equal(["writer", "late-reader"]);
  });

  it("releases on throw and ignores a second release", async () => {
    const lock = new ReadWriteLock();
    let caught: unknown = null;
    try {
      await lock.withWrite(() => {
        throw new Error("inside");
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.instanceOf(Error);
    expect(lock.getStats().writerActive).to.equal(false);

    const release = await lock.acquireRead();
    release();
    release();
    expect(lock.getStats().activeReaders).to.equal(0);
  });

  it("accounts waiting time on the injected clock", async () => {
    const clock = new ManualClock();
    const lock = new ReadWriteLock({ now: clock.now });
    const writer = await lock.acquireWrite();
    const pending = lock.acquireRead();

    clock.advance(30);
    writer();
    (await pending)();

    expect(lock.getStats()).to.include({ totalWaitMs: 30, averageWaitMs: 15, readAcquisitions: 1, writeAcquisitions: 1 });
    lock.resetStats();
    expect(lock.getStats()).to.include({ totalWaitMs: 0, readAcquisitions: 0, contended: 0 });
  });
});
