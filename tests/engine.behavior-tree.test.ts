import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { ConfigurationError, StructuralError } from "../src/core/errors.js";
import { BehaviorTree } from "../src/engine/behaviorTree.js";
import { validateTree } from "../src/engine/validation.js";
import { LogAction, SetBlackboardAction } from "../src/nodes/actions.js";
import { SelectorNode, SequenceNode } from "../src/nodes/composite.js";
import { AlwaysFalseCondition, AlwaysTrueCondition } from "../src/nodes/conditions.js";
import { InverterNode, RepeaterNode } from "../src/nodes/decorator.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("behaviour tree", () => {
  let clock: sinon.SinonFakeTimers | null = null;

  afterEach(() => {
    clock?.restore();
    clock = null;
  });

  it("falls back to the second branch when the first one fails", async () => {
    const log = new LogAction("log", { message: "never reached" });
    const root = new SelectorNode("root", [
      new SequenceNode("first", [new AlwaysFalseCondition("no"), log]),
      new SequenceNode("second", [
        new AlwaysTrueCondition("yes"),
        new SetBlackboardAction("mark", { key: "done", value: true }),
      ]),
    ]);
    const tree = new BehaviorTree({ name: "fallback", root });

    expect(await tree.tick()).to.equal("success");
    expect(tree.blackboard.get("done")).to.equal(true);
    expect(log.tickCount).to.equal(0);
  });

  it("drives a repeater to completion across ticks", async () => {
    const tree = new BehaviorTree({
      name: "repeat",
      root: new RepeaterNode("thrice", { child: new AlwaysTrueCondition("ok"), repeatCount: 3 }),
    });

    expect([await tree.tick(), await tree.tick(), await tree.tick()]).to.deep.equal(["running", "running", "success"]);
    expect(tree.tickManager.tickCount).to.equal(3);
  });

  it("emits lifecycle events on its dispatcher", async () => {
    const tree = new BehaviorTree({ name: "events", root: new AlwaysTrueCondition("ok") });

    await tree.tick();

    expect(tree.events.getHistory().map((event) => event.name)).to.deep.equal([
      "tree_root_changed",
      "tree_tick_start",
      "tree_status_changed",
      "tree_tick_end",
    ]);
    expect(tree.events.getEventInfo("tree_tick_end")?.data).to.deep.equal({ status: "success", tick: 1 });
  });

  it("rejects structurally invalid roots and logs warnings", () => {
    const logger = new RecordingLogger();
    const tree = new BehaviorTree({ name: "checked", logger });

    expect(() => tree.loadFromRoot(new SequenceNode("root", [new InverterNode("bare")]))).to.throw(StructuralError);
    expect(tree.root).to.equal(null);

    tree.loadFromRoot(new SequenceNode("root", [new SequenceNode("empty")]));
    expect(logger.find("tree_validation_warning")).to.deep.equal([
      {
        level: "warn",
        message: "tree_validation_warning",
        payload: { tree: "checked", path: "root/empty", message: "Sequence has no children" },
      },
    ]);
  });

  it("validates structure without a tree", () => {
    const report = validateTree(
      new SequenceNode("root", [new AlwaysTrueCondition("dup"), new AlwaysFalseCondition("dup"), new InverterNode("x")]),
    );

    expect(report.valid).to.equal(false);
    expect(report.errors).to.deep.equal([{ path: "root/x", message: "Inverter needs exactly one child, found 0" }]);
    expect(report.warnings).to.deep.equal([{ path: "root/dup", message: 'name "dup" is also used at root/dup' }]);
  });

  it("refuses to tick without a root", async () => {
    const tree = new BehaviorTree({ name: "empty" });
    let caught: unknown = null;
    try {
      await tree.tick();
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(ConfigurationError);
  });

  it("starts and stops its tick loop", async () => {
    clock = sinon.useFakeTimers();
    const tree = new BehaviorTree({ name: "loop", root: new AlwaysTrueCondition("ok"), tickRate: 20 });

    tree.start();
    await clock.tickAsync(120);
    expect(tree.running).to.equal(true);
    await tree.stop();

    expect(tree.running).to.equal(false);
    expect(tree.tickManager.tickCount).to.equal(3);
    expect(tree.events.getEventInfo("tree_started")?.data).to.deep.equal({ tick_rate: 20 });
    expect(tree.events.getEventInfo("tree_stopped")?.data).to.deep.equal({ tick_count: 3 });
  });

  it("resets nodes, blackboard and statistics", async () => {
    const tree = new BehaviorTree({
      name: "reset",
      root: new SequenceNode("root", [new SetBlackboardAction("mark", { key: "k", value: 1 })]),
    });
    await tree.tick();

    tree.reset();

    expect(tree.blackboard.has("k")).to.equal(false);
    expect(tree.tickManager.tickCount).to.equal(0);
    expect(tree.findNode("mark")?.status).to.equal("failure");
  });

  it("summarises its nodes", async () => {
    const tree = new BehaviorTree({
      name: "stats",
      description: "two leaves",
      root: new SequenceNode("root", [new AlwaysTrueCondition("a"), new InverterNode("not", new AlwaysTrueCondition("b"))]),
    });
    await tree.tick();

    const stats = tree.getStats();
    expect(stats).to.deep.include({
      name: "stats",
      description: "two leaves",
      hasRoot: true,
      nodeCount: 4,
      maxDepth: 2,
      nodesByKind: { Sequence: 1, AlwaysTrue: 2, Inverter: 1 },
      statusCounts: { success: 2, failure: 2, running: 0 },
    });
    expect(tree.getNodeStats("b")).to.include({ path: "root/not/b", depth: 2, tickCount: 1 });
    expect(tree.getAllNodes().map((node) => node.name)).to.deep.equal(["root", "a", "not", "b"]);
  });
});
