import type { RunResult } from "@countme/core";

/** Where human-readable status lines go. */
export interface StatusWriter {
  info(line: string): void;
  error(line: string): void;
}

export const consoleStatus: StatusWriter = {
  info: (line) => console.log(line),
  error: (line) => console.error(line),
};

/** One-line summary of a finished run. */
export function describeResult(result: RunResult): string {
  switch (result.status) {
    case "skipped":
      return result.reason === "no-eligible-repos"
        ? "No enabled repositories with countme=1"
        : "Skipping: Not in a new counting window";
    case "counted":
      return `Successful requests: ${result.successes}/${result.total}`;
    case "failed":
      return result.error.message;
  }
}

/** 0 for counted and skipped runs, 1 for failed ones. */
export function exitCodeFor(result: RunResult): 0 | 1 {
  return result.status === "failed" ? 1 : 0;
}
