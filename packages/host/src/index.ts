export type { PlatformCheck } from "./platform.js";
export { DEFAULT_MARKER_PATH, markerPlatformCheck } from "./platform.js";
export type { OsRelease } from "./os-release.js";
export {
  DEFAULT_OS_RELEASE_PATHS,
  DEFAULT_VARIANT_ID,
  parseOsRelease,
  parseOsReleaseFields,
  readOsRelease,
  resolveVariant,
} from "./os-release.js";
export { buildUserAgent, toBaseArch } from "./user-agent.js";
