import { afterEach, describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";

import { StructuralError } from "../src/core/errors.js";
import { Blackboard } from "../src/engine/blackboard.js";
import { EventDispatcher } from "../src/engine/eventDispatcher.js";
import { CallbackAction, LogAction, SetBlackboardAction, WaitAction } from "../src/nodes/actions.js";
import {
  AlwaysFalseCondition,
  AlwaysTrueCondition,
  CallbackCondition,
  CheckBlackboardCondition,
  CompareCondition,
  IsFalseCondition,
  IsTrueCondition,
  compareValues,
} from "../src/nodes/conditions.js";
import { EmitEventAction, WaitForEventAction } from "../src/nodes/events.js";
import { createTickRuntime } from "../src/nodes/runtime.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";
import { ManualClock } from "./helpers/scriptedNode.js";

describe("leaf nodes", () => {
  describe("actions", () => {
    it("delegates to the callback", async () => {
      const blackboard = new Blackboard();
      const action = new CallbackAction("cb", (rt) => {
        rt.blackboard.set("seen", rt.source);
        return "running";
      });

      expect(await action.tick(createTickRuntime({ blackboard, source: "tree-a" }))).to.equal("running");
      expect(blackboard.get("seen")).to.equal("tree-a");
      expect(action.kind).to.equal("Action");
    });

    it("waits on the runtime clock, then re-arms", async () => {
      const clock = new ManualClock(1_000);
      const rt = createTickRuntime({ now: clock.now });
      const wait = new WaitAction("pause", { durationMs: 100 });

      expect(await wait.tick(rt)).to.equal("running");
      clock.advance(60);
      expect(wait.elapsed(clock.now())).to.equal(60);
      expect(await wait.tick(rt)).to.equal("running");
      clock.advance(40);
      expect(await wait.tick(rt)).to.equal("success");
      expect(wait.elapsed(clock.now())).to.equal(0);
    });

    it("reads a bound duration from the blackboard", async () => {
      const clock = new ManualClock();
      const blackboard = new Blackboard();
      blackboard.set("pause_ms", 10);
      const rt = createTickRuntime({ blackboard, now: clock.now });
      const wait = new WaitAction("pause", { durationMs: 1_000, bindings: { duration: "pause_ms" } });

      expect(await wait.tick(rt)).to.equal("running");
      clock.advance(10);
      expect(await wait.tick(rt)).to.equal("success");
    });

    it("logs through the runtime logger with the bound level", async () => {
      const logger = new RecordingLogger();
      const blackboard = new Blackboard();
      blackboard.set("lvl", "warn");
      const log = new LogAction("say", { message: "hello", bindings: { level: "lvl" } });

      expect(await log.tick(createTickRuntime({ logger, blackboard, source: "tree-a" }))).to.equal("success");
      expect(logger.find("tree_log")).to.deep.equal([
        { level: "warn", message: "tree_log", payload: { node: "say", source: "tree-a", message: "hello" } },
      ]);
    });

    it("sets blackboard values and fails on an empty key", async () => {
      const blackboard = new Blackboard();
      const rt = createTickRuntime({ blackboard });

      expect(await new SetBlackboardAction("set", { key: "done", value: true }).tick(rt)).to.equal("success");
      expect(blackboard.get("done")).to.equal(true);
      expect(await new SetBlackboardAction("bad", { key: "", value: 1 }).tick(rt)).to.equal("failure");
    });
  });

  describe("parameter bindings", () => {
    it("rejects undeclared parameters", () => {
      expect(() => new SetBlackboardAction("set", { key: "k", value: 1, bindings: { colour: "c" } })).to.throw(
        StructuralError,
        /no bindable parameter "colour"/,
      );
    });

    it("falls back to the literal while the bound key is absent", async () => {
      const blackboard = new Blackboard();
      const rt = createTickRuntime({ blackboard });
      const set = new SetBlackboardAction("set", { key: "out", value: "literal", bindings: { value: "src" } });

      await set.tick(rt);
      expect(blackboard.get("out")).to.equal("literal");

      blackboard.set("src", "bound");
      await set.tick(rt);
      expect(blackboard.get("out")).to.equal("bound");
      expect(set.bindings).to.deep.equal({ value: "src" });
    });

    it("can be rebound and unbound per instance", () => {
      const set = new SetBlackboardAction("set", { key: "out", value: 1 });
      set.bind("key", "target_key");
      expect(set.bindings).to.deep.equal({ key: "target_key" });
      expect(set.unbind("key")).to.equal(true);
      expect(set.bindableParams).to.deep.equal(["key", "value"]);
    });
  });

  describe("conditions", () => {
    it("maps predicates to statuses", async () => {
      const rt = createTickRuntime();
      expect(await new CallbackCondition("yes", () => true).tick(rt)).to.equal("success");
      expect(await new CallbackCondition("no", async () => false).tick(rt)).to.equal("failure");
      expect(await new AlwaysTrueCondition("t").tick(rt)).to.equal("success");
      expect(await new AlwaysFalseCondition("f").tick(rt)).to.equal("failure");
    });

    it("checks blackboard presence and deep equality", async () => {
      const blackboard = new Blackboard();
      blackboard.set("pos", { x: 1, y: 2 });
      const rt = createTickRuntime({ blackboard });

      expect(await new CheckBlackboardCondition("eq", { key: "pos", expectedValue: { x: 1, y: 2 } }).tick(rt)).to.equal(
        "success",
      );
      expect(await new CheckBlackboardCondition("ne", { key: "pos", expectedValue: { x: 1 } }).tick(rt)).to.equal(
        "failure",
      );
      expect(await new CheckBlackboardCondition("has", { key: "pos", checkExists: true }).tick(rt)).to.equal("success");
      expect(await new CheckBlackboardCondition("none", { key: "nope", checkExists: true }).tick(rt)).to.equal(
        "failure",
      );
    });

    it("tests truthiness, treating missing keys as false", async () => {
      const blackboard = new Blackboard();
      blackboard.set("on", 1);
      blackboard.set("off", "");
      const rt = createTickRuntime({ blackboard });

      expect(await new IsTrueCondition("a", { key: "on" }).tick(rt)).to.equal("success");
      expect(await new IsTrueCondition("b", { key: "off" }).tick(rt)).to.equal("failure");
      expect(await new IsTrueCondition("c", { key: "missing" }).tick(rt)).to.equal("failure");
      expect(await new IsFalseCondition("d", { key: "off" }).tick(rt)).to.equal("success");
      expect(await new IsFalseCondition("e", { key: "missing" }).tick(rt)).to.equal("success");
    });

    it("compares values", async () => {
      const blackboard = new Blackboard();
      blackboard.set("hp", 30);
      const rt = createTickRuntime({ blackboard });

      expect(await new CompareCondition("low", { key: "hp", operator: "<", value: 50 }).tick(rt)).to.equal("success");
      expect(await new CompareCondition("high", { key: "hp", operator: ">=", value: 50 }).tick(rt)).to.equal(
        "failure",
      );
      expect(compareValues("b", ">", "a")).to.equal(true);
      expect(compareValues([1], "==", [1])).to.equal(true);
      expect(compareValues(1, "!=", "1")).to.equal(true);
      expect(compareValues(1, "<", "2")).to.equal(false);
      expect(compareValues(Number.NaN, "<=", 1)).to.equal(false);
    });
  });

  describe("event leaves", () => {
    let clock: sinon.SinonFakeTimers | null = null;

    afterEach(() => {
      clock?.restore();
      clock = null;
    });

    it("consumes an event emitted before the wait", async () => {
      const events = new EventDispatcher();
      const rt = createTickRuntime({ events, source: "tree-a" });

      expect(await new EmitEventAction("emit", { event: "door_open", data: { id: 4 } }).tick(rt)).to.equal("success");
      expect(events.getEventInfo("door_open")).to.deep.include({ source: "tree-a", data: { id: 4 }, triggerCount: 1 });
      expect(await new WaitForEventAction("wait", { event: "door_open" }).tick(rt)).to.equal("success");
    });

    it("fails when the event does not arrive in time", async () => {
      clock = sinon.useFakeTimers();
      const rt = createTickRuntime();
      const pending = new WaitForEventAction("wait", { event: "never", timeoutMs: 50 }).tick(rt);

      await clock.tickAsync(50);

      expect(await pending).to.equal("failure");
    });

    it("succeeds when the event fires during the wait", async () => {
      clock = sinon.useFakeTimers();
      const events = new EventDispatcher();
      const rt = createTickRuntime({ events });
      const pending = new WaitForEventAction("wait", { event: "ping", timeoutMs: 100 }).tick(rt);

      await clock.tickAsync(10);
      events.emit("ping");

      expect(await pending).to.equal("success");
    });

    it("fails when the tick is cancelled", async () => {
      const controller = new AbortController();
      const rt = createTickRuntime({ signal: controller.signal });
      const pending = new WaitForEventAction("wait", { event: "never", timeoutMs: null }).tick(rt);

      controller.abort();

      expect(await pending).to.equal("failure");
    });
  });
});
