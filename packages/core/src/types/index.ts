export type { RepoEntry, RepoVars, ReportRequest } from "./repo.js";
export type { Cookie, WindowBucket } from "./cookie.js";
export type { RunResult, SkipReason } from "./result.js";
export type { CountmeConfig } from "./config.js";
export { countmeEnvSchema } from "./config.js";
