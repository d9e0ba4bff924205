export type { DispatchTally, ReporterDeps } from "./reporter.js";
export { Reporter } from "./reporter.js";
export type { SendCountme } from "./sender.js";
export { DEFAULT_REQUEST_TIMEOUT_MS, createSender, sendCountme } from "./sender.js";
export type { StatusWriter } from "./status.js";
export { consoleStatus, describeResult, exitCodeFor } from "./status.js";
