import { ConfigError } from "./errors.js";
import { countmeEnvSchema, type CountmeConfig } from "./types/config.js";

/**
 * Read the tool's settings from environment variables.
 * Every variable is optional; invalid values raise ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CountmeConfig {
  const parsed = countmeEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    markerPath: vars.COUNTME_MARKER_PATH,
    repoDirs: vars.COUNTME_REPO_DIRS,
    cookiePath: vars.COUNTME_COOKIE_PATH,
    osReleasePaths: vars.COUNTME_OS_RELEASE_PATHS,
    userAgentProduct: vars.COUNTME_USER_AGENT_PRODUCT,
    requestTimeoutMs: vars.COUNTME_REQUEST_TIMEOUT_MS,
  };
}
