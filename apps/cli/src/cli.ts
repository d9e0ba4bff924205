import { FileCookieStore } from "@countme/cookie";
import { ConfigError, loadConfig, type CountmeConfig, type RunResult } from "@countme/core";
import { markerPlatformCheck, readOsRelease, toBaseArch } from "@countme/host";
import { createLogger } from "@countme/logger";
import { DirectoryRepoCatalog } from "@countme/repos";
import {
  Reporter,
  consoleStatus,
  createSender,
  describeResult,
  exitCodeFor,
  type ReporterDeps,
} from "@countme/reporter";

const log = createLogger("cli");

/** Wire the real host collaborators from configuration. */
export function createReporterDeps(config: CountmeConfig): ReporterDeps {
  return {
    platform: markerPlatformCheck(config.markerPath),
    catalog: new DirectoryRepoCatalog(config.repoDirs),
    cookies: new FileCookieStore(config.cookiePath),
    release: () => readOsRelease(config.osReleasePaths),
    send: createSender(config.requestTimeoutMs),
    markerPath: config.markerPath,
    basearch: toBaseArch(process.arch),
    product: config.userAgentProduct,
    status: consoleStatus,
  };
}

export interface CliRun {
  result: RunResult;
  exitCode: 0 | 1;
}

/**
 * Run one counting pass and print its one-line outcome.
 * Configuration errors surface as a failed run.
 */
export async function runCli(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<ReporterDeps> = {},
): Promise<CliRun> {
  let result: RunResult;
  try {
    const config = loadConfig(env);
    log.debug("Configuration", config);
    result = await new Reporter({ ...createReporterDeps(config), ...overrides }).run();
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    result = { status: "failed", error: err };
  }

  const status = overrides.status ?? consoleStatus;
  const line = describeResult(result);
  if (result.status === "failed") {
    status.error(line);
  } else {
    status.info(line);
  }
  return { result, exitCode: exitCodeFor(result) };
}
