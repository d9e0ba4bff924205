export type {
  RepoEntry,
  RepoVars,
  ReportRequest,
  Cookie,
  WindowBucket,
  RunResult,
  SkipReason,
  CountmeConfig,
} from "./types/index.js";
export { countmeEnvSchema } from "./types/index.js";

export type { CountmeErrorCode } from "./errors.js";
export {
  CountmeError,
  ConfigError,
  PersistenceError,
  UnsupportedPlatformError,
  OsReleaseError,
  NetworkError,
  AllRequestsFailedError,
  toErrorMessage,
} from "./errors.js";

export { loadConfig } from "./config.js";
