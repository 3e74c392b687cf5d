import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { ConfigurationError } from "../src/core/errors.js";
import { BehaviorTree } from "../src/engine/behaviorTree.js";
import { BehaviorForest, FOREST_EVENTS } from "../src/forest/forest.js";
import { ForestNode } from "../src/forest/forestNode.js";
import type { ForestMiddleware } from "../src/forest/middleware.js";
import { CallbackAction } from "../src/nodes/actions.js";
import { AlwaysFalseCondition, AlwaysTrueCondition } from "../src/nodes/conditions.js";
import { WaitForEventAction } from "../src/nodes/events.js";
import { sleep } from "../src/runtime/timers.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

function treeWith(name: string, outcome: boolean, logger: RecordingLogger, tickRate = 10): BehaviorTree {
  const root = outcome ? new AlwaysTrueCondition("ok") : new AlwaysFalseCondition("ko");
  return new BehaviorTree({ name, root, logger, tickRate });
}

describe("behaviour forest", () => {
  let clock: sinon.SinonFakeTimers | null = null;

  afterEach(() => {
    clock?.restore();
    clock = null;
  });

  it("ticks every node once per cycle", async () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    forest.addNode(new ForestNode({ name: "alpha", tree: treeWith("a", true, logger), logger }));
    forest.addNode(new ForestNode({ name: "beta", tree: treeWith("b", false, logger), logger }));

    const results = await forest.tick();

    expect([...results.entries()]).to.deep.equal([
      ["alpha", "success"],
      ["beta", "failure"],
    ]);
    expect(forest.getNode("alpha")?.status).to.equal("success");
    expect(forest.communication?.getStats().cycles).to.equal(1);
  });

  it("hands the node identity, capabilities and middleware to its tree", async () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    const seen: Array<{ source: string; capabilities: string[]; bridged: boolean }> = [];
    const root = new CallbackAction("probe", (runtime) => {
      seen.push({
        source: runtime.source,
        capabilities: [...runtime.capabilities].sort(),
        bridged: runtime.communication === forest.communication,
      });
      return "success";
    });
    const tree = new BehaviorTree({ name: "probe-tree", root, logger });
    const node = new ForestNode({ name: "scout", tree, capabilities: ["vision"], logger });
    forest.addNode(node);

    await forest.tick();
    node.addCapability("radio");
    await forest.tick();

    expect(seen).to.deep.equal([
      { source: "scout", capabilities: ["vision"], bridged: true },
      { source: "scout", capabilities: ["radio", "vision"], bridged: true },
    ]);
    expect(tree.events).to.equal(forest.events);
  });

  it("reports a node without a root as failed", async () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    forest.addNode(new ForestNode({ name: "empty", tree: new BehaviorTree({ name: "e", logger }), logger }));

    const results = await forest.tick();

    expect(results.get("empty")).to.equal("failure");
    expect(logger.find("forest_node_tick_failed")).to.have.length(1);
  });

  it("refuses duplicate node names", () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    forest.addNode(new ForestNode({ name: "alpha", tree: treeWith("a", true, logger), logger }));

    expect(() =>
      forest.addNode(new ForestNode({ name: "alpha", tree: treeWith("b", true, logger), logger })),
    ).to.throw(ConfigurationError, 'forest "camp" already has a node named "alpha"');
  });

  it("looks nodes up by kind and capability", () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    forest.addNode(new ForestNode({ name: "boss", kind: "master", tree: treeWith("a", true, logger), logger }));
    forest.addNode(
      new ForestNode({ name: "w1", tree: treeWith("b", true, logger), capabilities: ["worker", "gpu"], logger }),
    );
    forest.addNode(new ForestNode({ name: "w2", tree: treeWith("c", true, logger), logger }));

    expect(forest.getNodesByKind("worker").map((node) => node.name)).to.deep.equal(["w1", "w2"]);
    expect(forest.getNodesByCapability("gpu").map((node) => node.name)).to.deep.equal(["w1"]);
    expect(forest.getNodesByCapability("master").map((node) => node.name)).to.deep.equal(["boss"]);
  });

  it("detaches removed nodes", async () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    const tree = treeWith("a", true, logger);
    forest.addNode(new ForestNode({ name: "alpha", tree, logger }));

    expect(await forest.removeNode("alpha")).to.equal(true);
    expect(await forest.removeNode("alpha")).to.equal(false);
    expect(forest.size).to.equal(0);
    expect(tree.events).to.not.equal(forest.events);
    expect(forest.events.getHistory().map((event) => event.name)).to.deep.equal([
      FOREST_EVENTS.nodeAdded,
      FOREST_EVENTS.nodeRemoved,
    ]);
  });

  it("cancels the in-flight tick of a removed node", async () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    const root = new WaitForEventAction("listen", { event: "never", timeoutMs: null });
    forest.addNode(new ForestNode({ name: "alpha", tree: new BehaviorTree({ name: "a", root, logger }), logger }));

    const cycle = forest.tick();
    await sleep(0);
    expect(await forest.removeNode("alpha")).to.equal(true);

    expect((await cycle).get("alpha")).to.equal("failure");
    expect(root.status).to.equal("failure");
  });

  it("keeps ticking when a middleware hook throws", async () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger, communication: false });
    const broken: ForestMiddleware = {
      name: "broken",
      preTick: () => {
        throw new Error("hook failed");
      },
    };
    forest.addMiddleware(broken);
    forest.addNode(new ForestNode({ name: "alpha", tree: treeWith("a", true, logger), logger }));

    const results = await forest.tick();

    expect(results.get("alpha")).to.equal("success");
    const [failure] = logger.find("middleware_hook_failed");
    expect(failure.payload).to.deep.equal({
      forest: "camp",
      middleware: "broken",
      hook: "preTick",
      error: { name: "Error", message: "hook failed" },
    });
    expect(forest.communication).to.equal(null);
  });

  it("runs the trees on their own cadence and monitors them while started", async () => {
    clock = sinon.useFakeTimers();
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger, monitorIntervalMs: 50 });
    forest.addNode(new ForestNode({ name: "alpha", tree: treeWith("a", true, logger), logger }));

    forest.start();
    expect(forest.running).to.equal(true);
    await clock.tickAsync(120);
    await forest.stop();

    const cycles = forest.events.getHistory(FOREST_EVENTS.cycle);
    expect(cycles).to.have.length(3);
    expect(cycles[2].data).to.deep.equal({ alpha: "success" });
    expect(forest.getNode("alpha")?.getStats().tickCount).to.equal(2);
    expect(forest.running).to.equal(false);
    expect(forest.getNode("alpha")?.tree.running).to.equal(false);
    expect(forest.events.getHistory(FOREST_EVENTS.stopped)).to.have.length(1);
  });

  it("stays started when restarted while a stop is pending and ticks nothing once stopped", async () => {
    clock = sinon.useFakeTimers();
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger, monitorIntervalMs: 50 });
    const tree = treeWith("a", true, logger);
    forest.addNode(new ForestNode({ name: "alpha", tree, logger }));

    forest.start();
    const stopping = forest.stop();
    forest.start();
    await stopping;
    await clock.tickAsync(250);

    expect(forest.running).to.equal(true);
    expect(tree.running).to.equal(true);
    expect(tree.tickManager.tickCount).to.equal(4);

    await forest.stop();
    const ticks = tree.tickManager.tickCount;
    const cycles = forest.events.getHistory(FOREST_EVENTS.cycle).length;
    await clock.tickAsync(500);

    expect(tree.tickManager.tickCount).to.equal(ticks);
    expect(forest.events.getHistory(FOREST_EVENTS.cycle)).to.have.length(cycles);
    expect(tree.running).to.equal(false);
  });

  it("resets nodes and clears the forest blackboard", async () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    forest.addNode(new ForestNode({ name: "alpha", tree: treeWith("a", true, logger), logger }));
    forest.blackboard.set("shared", 1);
    await forest.tick();

    forest.reset();

    expect(forest.getNode("alpha")?.status).to.equal("failure");
    expect(forest.blackboard.has("shared")).to.equal(false);
    expect(forest.events.getHistory(FOREST_EVENTS.reset)).to.have.length(1);
  });

  it("summarises its state", async () => {
    const logger = new RecordingLogger();
    const forest = new BehaviorForest({ name: "camp", logger });
    forest.addNode(new ForestNode({ name: "boss", kind: "master", tree: treeWith("a", true, logger), logger }));
    forest.addNode(new ForestNode({ name: "w1", tree: treeWith("b", false, logger), logger }));
    await forest.tick();

    const stats = forest.getStats();

    expect(stats.nodeCount).to.equal(2);
    expect(stats.nodesByKind).to.deep.equal({ master: 1, worker: 1 });
    expect(stats.statusCounts).to.deep.equal({ success: 1, failure: 1, running: 0 });
    expect(stats.middleware).to.deep.equal(["communication"]);
    expect(stats.nodes[1]).to.deep.equal({
      name: "w1",
      kind: "worker",
      status: "failure",
      capabilities: ["worker"],
      dependencies: [],
      tickCount: 1,
      running: false,
    });
  });
});
