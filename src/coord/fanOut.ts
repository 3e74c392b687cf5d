import { describeError } from "../core/errors.js";
import type { StructuredLogger } from "../logger.js";

/** Outcome of a {@link fanOut} round. */
export interface FanOutReport {
  delivered: number;
  failed: number;
}

/**
 * Invokes every callback concurrently and waits until all of them settled.
 * A callback that throws or rejects is logged under `failureMessage` and does
 * not affect the others.
 */
export async function fanOut<A extends unknown[]>(
  callbacks: ReadonlyArray<(...args: A) => unknown>,
  args: A,
  logger: StructuredLogger,
  failureMessage: string,
  context: Record<string, unknown> = {},
): Promise<FanOutReport> {
  const results = await Promise.allSettled(callbacks.map(async (callback) => callback(...args)));
  let failed = 0;
  for (const result of results) {
    if (result.status === "rejected") {
      failed += 1;
      logger.error(failureMessage, { ...context, error: describeError(result.reason) });
    }
  }
  return { delivered: results.length - failed, failed };
}
