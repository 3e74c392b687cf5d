/** Result of a single tick. */
export type Status = "success" | "failure" | "running";

/** Aggregation policies understood by the parallel composite. */
export type ParallelPolicy = "succeed_on_all" | "succeed_on_one" | "fail_on_all" | "fail_on_one";

export const STATUSES: readonly Status[] = ["success", "failure", "running"];

export const PARALLEL_POLICIES: readonly ParallelPolicy[] = [
  "succeed_on_all",
  "succeed_on_one",
  "fail_on_all",
  "fail_on_one",
];

/** Per-status tally of the children ticked by a parallel node. */
export interface StatusCounts {
  success: number;
  failure: number;
  running: number;
}

export function isTerminal(status: Status): boolean {
  return status !== "running";
}

/** Swaps success and failure; running passes through. */
export function invertStatus(status: Status): Status {
  if (status === "success") {
    return "failure";
  }
  if (status === "failure") {
    return "success";
  }
  return status;
}

export function countStatuses(statuses: readonly Status[]): StatusCounts {
  const counts: StatusCounts = { success: 0, failure: 0, running: 0 };
  for (const status of statuses) {
    counts[status] += 1;
  }
  return counts;
}

/**
 * Resolves the aggregate status of a parallel node. An empty child set
 * succeeds under every policy.
 */
export function resolveParallel(policy: ParallelPolicy, counts: StatusCounts): Status {
  const total = counts.success + counts.failure + counts.running;
  if (total === 0) {
    return "success";
  }
  switch (policy) {
    case "succeed_on_all":
      if (counts.failure > 0) {
        return "failure";
      }
      return counts.running > 0 ? "running" : "success";
    case "succeed_on_one":
      if (counts.success > 0) {
        return "success";
      }
      return counts.running > 0 ? "running" : "failure";
    case "fail_on_all":
      if (counts.failure === total) {
        return "failure";
      }
      return counts.running > 0 ? "running" : "success";
    case "fail_on_one":
      if (counts.failure > 0) {
        return "failure";
      }
      return counts.running > 0 ? "running" : "success";
  }
}
