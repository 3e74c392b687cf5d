import { describe, it } from "mocha";
import { expect } from "chai";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { StructuredLogger, type LogEntry } from "../src/logger.js";

function capture(options: ConstructorParameters<typeof StructuredLogger>[0] = {}): {
  logger: StructuredLogger;
  lines: string[];
} {
  const lines: string[] = [];
  const logger = new StructuredLogger({ redactionEnabled: false, ...options, write: (line) => lines.push(line) });
  return { logger, lines };
}

describe("StructuredLogger", () => {
  it("writes one JSON line per entry", () => {
    const { logger, lines } = capture();

    logger.info("tree_started", { tree: "patrol", tick_rate: 20 });
    logger.debug("no_payload");

    expect(lines).to.have.length(2);
    expect(lines[0].endsWith("\n")).to.equal(true);
    const first: unknown = JSON.parse(lines[0]);
    expect(first).to.deep.include({ level: "info", message: "tree_started", payload: { tree: "patrol", tick_rate: 20 } });
    expect(JSON.parse(lines[1])).to.not.have.property("payload");
  });

  it("discards entries below the minimum level", () => {
    const { logger, lines } = capture({ minLevel: "warn" });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown");

    expect(lines.map((line) => JSON.parse(line).level)).to.deep.equal(["warn", "error"]);
  });

  it("redacts sensitive payload keys at any depth", () => {
    const { logger, lines } = capture({ redactionEnabled: true });

    logger.info("service_registered", {
      service: "weather",
      config: { api_key: "test-secret", retries: 2 },
      headers: [{ Authorization: "test-secret" }],
    });

    expect(JSON.parse(lines[0]).payload).to.deep.equal({
      service: "weather",
      config: { api_key: "[REDACTED]", retries: 2 },
      headers: [{ Authorization: "[REDACTED]" }],
    });
  });

  it("notifies the entry listener", () => {
    const seen: LogEntry[] = [];
    const { logger } = capture({ onEntry: (entry) => seen.push(entry) });

    logger.warn("forest_node_without_root", { node: "idle" });

    expect(seen).to.have.length(1);
    expect(seen[0].message).to.equal("forest_node_without_root");
    expect(seen[0].payload).to.deep.equal({ node: "idle" });
  });

  it("mirrors entries to the log file in order", async () => {
    const directory = await mkdtemp(path.join(tmpdir(), "canopy-logger-"));
    const logFile = path.join(directory, "nested", "engine.log");

    try {
      const { logger } = capture({ logFile });
      for (let index = 0; index < 5; index += 1) {
        logger.info("entry", { index });
      }
      await logger.flush();

      const content = await readFile(logFile, "utf8");
      const indices = content
        .trim()
        .split("\n")
        .map((line) => JSON.parse(line).payload.index);
      expect(indices).to.deep.equal([0, 1, 2, 3, 4]);
    } finally {
      await rm(directory, { recursive: true, force: true });
    }
  });
});
