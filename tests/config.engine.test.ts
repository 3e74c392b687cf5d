import { describe, it } from "mocha";
import { expect } from "chai";

import { ENGINE_DEFAULTS, createLoggerFromConfig, loadEngineConfig } from "../src/config/engineConfig.js";
import { createForestFromConfig, createTreeFromConfig } from "../src/config/engineFactory.js";
import { readBool, readEnum, readInt, readNumber, readOptionalString } from "../src/config/env.js";
import { StructuredLogger } from "../src/logger.js";
import { AlwaysTrueCondition } from "../src/nodes/conditions.js";
import { RecordingLogger } from "./helpers/recordingLogger.js";

describe("engine configuration", () => {
  describe("environment readers", () => {
    it("parses boolean literals and falls back on anything else", () => {
      const env = { A: " Yes ", B: "off", C: "maybe" };

      expect(readBool("A", false, env)).to.equal(true);
      expect(readBool("B", true, env)).to.equal(false);
      expect(readBool("C", true, env)).to.equal(true);
      expect(readBool("MISSING", false, env)).to.equal(false);
    });

    it("accepts integers within bounds only", () => {
      const env = { OK: "42", LOW: "0", FLOAT: "1.5", JUNK: "12abc" };

      expect(readInt("OK", 7, { min: 1 }, env)).to.equal(42);
      expect(readInt("LOW", 7, { min: 1 }, env)).to.equal(7);
      expect(readInt("FLOAT", 7, undefined, env)).to.equal(7);
      expect(readInt("JUNK", 7, undefined, env)).to.equal(7);
    });

    it("accepts finite numbers and trims strings", () => {
      const env = { RATE: "2.5", HUGE: "Infinity", NAME: "  engine.log  ", BLANK: "   " };

      expect(readNumber("RATE", 1, undefined, env)).to.equal(2.5);
      expect(readNumber("HUGE", 1, undefined, env)).to.equal(1);
      expect(readOptionalString("NAME", env)).to.equal("engine.log");
      expect(readOptionalString("BLANK", env)).to.equal(undefined);
    });

    it("matches enums case-insensitively", () => {
      const env = { LEVEL: "WARN", BAD: "loud" };
      const levels = ["debug", "info", "warn", "error"] as const;

      expect(readEnum("LEVEL", levels, "info", env)).to.equal("warn");
      expect(readEnum("BAD", levels, "info", env)).to.equal("info");
    });
  });

  it("uses the defaults when nothing is set", () => {
    expect(loadEngineConfig({})).to.deep.equal({
      tickRate: ENGINE_DEFAULTS.tickRate,
      blackboard: { cacheCapacity: 1_000, cacheTtlMs: 300_000 },
      forest: { monitorIntervalMs: 100 },
      communication: { historyLimit: 1_000, stateHistoryLimit: 100 },
      logging: { level: "info", file: null },
    });
  });

  it("reads overrides and ignores invalid values", () => {
    const config = loadEngineConfig({
      CANOPY_TICK_RATE: "30",
      CANOPY_CACHE_CAPACITY: "-4",
      CANOPY_CACHE_TTL_MS: "5000",
      CANOPY_MONITOR_INTERVAL_MS: "soon",
      CANOPY_HISTORY_LIMIT: "50",
      CANOPY_LOG_LEVEL: "Debug",
      CANOPY_LOG_FILE: "/tmp/canopy/engine.log",
    });

    expect(config.tickRate).to.equal(30);
    expect(config.blackboard).to.deep.equal({ cacheCapacity: 1_000, cacheTtlMs: 5_000 });
    expect(config.forest.monitorIntervalMs).to.equal(100);
    expect(config.communication.historyLimit).to.equal(50);
    expect(config.logging).to.deep.equal({ level: "debug", file: "/tmp/canopy/engine.log" });
  });

  it("builds a logger honouring the configured level", () => {
    const config = loadEngineConfig({ CANOPY_LOG_LEVEL: "error" });

    expect(createLoggerFromConfig(config)).to.be.instanceOf(StructuredLogger);
  });

  it("builds trees that tick and cache as configured", async () => {
    const config = loadEngineConfig({ CANOPY_TICK_RATE: "25", CANOPY_CACHE_CAPACITY: "2" });
    const tree = createTreeFromConfig(config, {
      name: "configured",
      root: new AlwaysTrueCondition("ok"),
      logger: new RecordingLogger(),
    });

    tree.blackboard.set("a", 1);
    tree.blackboard.set("b", 2);
    tree.blackboard.set("c", 3);

    expect(tree.tickManager.tickRate).to.equal(25);
    expect(tree.blackboard.cacheSize).to.equal(2);
    expect(await tree.tick()).to.equal("success");
  });

  it("builds forests with the configured monitor interval and history bounds", async () => {
    const config = loadEngineConfig({ CANOPY_MONITOR_INTERVAL_MS: "40", CANOPY_STATE_HISTORY_LIMIT: "1" });
    const forest = createForestFromConfig(config, { name: "configured", logger: new RecordingLogger() });
    const communication = forest.communication;

    expect(forest.monitorIntervalMs).to.equal(40);
    expect(communication).to.not.equal(null);
    await communication?.updateState("n", 1, "x");
    await communication?.updateState("n", 2, "x");
    expect(communication?.getStateHistory("n").map((change) => change.next)).to.deep.equal([2]);
    await communication?.setShared("k", "v", "x");
    expect(forest.blackboard.get("k")).to.equal("v");
  });
});
