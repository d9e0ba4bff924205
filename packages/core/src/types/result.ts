import type { CountmeError } from "../errors.js";

export type SkipReason = "no-eligible-repos" | "window-not-elapsed";

/** Outcome of a single invocation */
export type RunResult =
  | { status: "skipped"; reason: SkipReason }
  | { status: "counted"; successes: number; total: number; persisted: boolean }
  | { status: "failed"; error: CountmeError };
