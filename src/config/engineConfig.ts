import { z } from "zod";

import { LOG_LEVELS, StructuredLogger, type LogLevel } from "../logger.js";
import { type EnvSource, readEnum, readInt, readNumber, readOptionalString } from "./env.js";

/** Default engine settings, also used by components constructed without options. */
export const ENGINE_DEFAULTS = {
  tickRate: 60,
  cacheCapacity: 1_000,
  cacheTtlMs: 300_000,
  monitorIntervalMs: 100,
  historyLimit: 1_000,
  stateHistoryLimit: 100,
  logLevel: "info" satisfies LogLevel,
} as const;

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const EngineConfigSchema = z
  .object({
    tickRate: z.number().positive().max(10_000),
    blackboard: z
      .object({
        cacheCapacity: z.number().int().positive(),
        cacheTtlMs: z.number().int().positive(),
      })
      .strict(),
    forest: z.object({ monitorIntervalMs: z.number().int().positive() }).strict(),
    communication: z
      .object({
        historyLimit: z.number().int().positive(),
        stateHistoryLimit: z.number().int().positive(),
      })
      .strict(),
    logging: z.object({ level: logLevelSchema, file: z.string().min(1).nullable() }).strict(),
  })
  .strict();

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

/**
 * Resolves the engine configuration from `CANOPY_*` environment variables.
 * Invalid or out-of-range values fall back to {@link ENGINE_DEFAULTS}.
 */
export function loadEngineConfig(env: EnvSource = process.env): EngineConfig {
  return EngineConfigSchema.parse({
    tickRate: readNumber("CANOPY_TICK_RATE", ENGINE_DEFAULTS.tickRate, { min: 0.001, max: 10_000 }, env),
    blackboard: {
      cacheCapacity: readInt("CANOPY_CACHE_CAPACITY", ENGINE_DEFAULTS.cacheCapacity, { min: 1 }, env),
      cacheTtlMs: readInt("CANOPY_CACHE_TTL_MS", ENGINE_DEFAULTS.cacheTtlMs, { min: 1 }, env),
    },
    forest: {
      monitorIntervalMs: readInt("CANOPY_MONITOR_INTERVAL_MS", ENGINE_DEFAULTS.monitorIntervalMs, { min: 1 }, env),
    },
    communication: {
      historyLimit: readInt("CANOPY_HISTORY_LIMIT", ENGINE_DEFAULTS.historyLimit, { min: 1 }, env),
      stateHistoryLimit: readInt("CANOPY_STATE_HISTORY_LIMIT", ENGINE_DEFAULTS.stateHistoryLimit, { min: 1 }, env),
    },
    logging: {
      level: readEnum("CANOPY_LOG_LEVEL", LOG_LEVELS, ENGINE_DEFAULTS.logLevel, env),
      file: readOptionalString("CANOPY_LOG_FILE", env) ?? null,
    },
  });
}

/** Builds the structured logger described by the configuration. */
export function createLoggerFromConfig(config: EngineConfig): StructuredLogger {
  return new StructuredLogger({ minLevel: config.logging.level, logFile: config.logging.file });
}
