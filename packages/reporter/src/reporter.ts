import {
  AllRequestsFailedError,
  ConfigError,
  CountmeError,
  OsReleaseError,
  PersistenceError,
  UnsupportedPlatformError,
  toErrorMessage,
  type Cookie,
  type RepoEntry,
  type ReportRequest,
  type RunResult,
} from "@countme/core";
import { existingWindow, nowSeconds, windowCounter, type CookieStore } from "@countme/cookie";
import { buildUserAgent, type OsRelease, type PlatformCheck } from "@countme/host";
import { createLogger } from "@countme/logger";
import { buildCountmeUrl, selectCountable, type RepoCatalog } from "@countme/repos";
import type { SendCountme } from "./sender.js";
import { consoleStatus, type StatusWriter } from "./status.js";

const log = createLogger("reporter");

export interface ReporterDeps {
  /** Whether this host is a supported deployment */
  platform: PlatformCheck;
  catalog: RepoCatalog;
  cookies: CookieStore;
  /** Reads the host release metadata */
  release: () => Promise<OsRelease>;
  send: SendCountme;
  /** Marker path named in the unsupported-platform error */
  markerPath: string;
  /** basearch substituted into templates and the User-Agent */
  basearch: string;
  /** Product token leading the User-Agent */
  product: string;
  /** Epoch seconds; defaults to the wall clock */
  now?: () => number;
  status?: StatusWriter;
}

export interface DispatchTally {
  successes: number;
  total: number;
}

/**
 * One counting pass: decide whether a new window opened, report every
 * countable repository once and record the run if the server saw it.
 *
 * Never throws for the failure modes it knows about; they come back as
 * `{ status: "failed" }`. Anything else propagates.
 */
export class Reporter {
  private readonly now: () => number;
  private readonly status: StatusWriter;

  constructor(private readonly deps: ReporterDeps) {
    this.now = deps.now ?? nowSeconds;
    this.status = deps.status ?? consoleStatus;
  }

  async run(): Promise<RunResult> {
    if (!(await this.deps.platform())) {
      return this.fail(new UnsupportedPlatformError(this.deps.markerPath));
    }

    let repos: RepoEntry[];
    try {
      repos = selectCountable(await this.deps.catalog.load());
    } catch (err) {
      if (err instanceof ConfigError) return this.fail(err);
      throw err;
    }
    if (repos.length === 0) {
      return { status: "skipped", reason: "no-eligible-repos" };
    }

    const now = this.now();
    const cookie = await this.loadCookie();
    if (existingWindow(cookie, now)) {
      return { status: "skipped", reason: "window-not-elapsed" };
    }

    let release: OsRelease;
    try {
      release = await this.deps.release();
    } catch (err) {
      if (err instanceof OsReleaseError) return this.fail(err);
      throw err;
    }

    const userAgent = buildUserAgent(this.deps.product, release, this.deps.basearch);
    this.status.info(`Using User Agent: ${userAgent}`);

    const bucket = windowCounter(cookie, now);
    const vars = { releasever: release.versionId, basearch: this.deps.basearch };
    const requests: ReportRequest[] = repos.map((repo) => ({
      repoId: repo.id,
      url: buildCountmeUrl(repo.metalink ?? "", vars, bucket),
    }));
    log.debug(`Reporting bucket ${bucket} for ${requests.length} repositories`);

    const tally = await this.dispatchAll(requests, userAgent);
    if (tally.successes === 0) {
      return this.fail(new AllRequestsFailedError(tally.total));
    }

    let persisted = true;
    try {
      await this.deps.cookies.persist(now);
    } catch (err) {
      // Already counted server-side, so a lost cookie only risks a recount
      if (!(err instanceof PersistenceError)) throw err;
      this.status.error(`Failed to persist cookie: ${err.message}`);
      persisted = false;
    }

    return { status: "counted", successes: tally.successes, total: tally.total, persisted };
  }

  /** A corrupt cookie is reported and then treated as absent. */
  private async loadCookie(): Promise<Cookie | null> {
    try {
      return await this.deps.cookies.load();
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      log.warn(`Ignoring unreadable cookie: ${err.message}`);
      this.status.error(`Ignoring unreadable cookie: ${err.message}`);
      return null;
    }
  }

  /** Sequential fold over the requests; one failure never stops the rest. */
  private async dispatchAll(requests: ReportRequest[], userAgent: string): Promise<DispatchTally> {
    let tally: DispatchTally = { successes: 0, total: 0 };
    for (const request of requests) {
      this.status.info(`Sending request to: ${request.url}`);
      let ok = true;
      try {
        await this.deps.send(request.url, userAgent);
      } catch (err) {
        ok = false;
        log.debug(`Request for ${request.repoId} failed`, err);
        this.status.error(`Request '${request.url}' failed: ${toErrorMessage(err)}`);
      }
      tally = { successes: tally.successes + (ok ? 1 : 0), total: tally.total + 1 };
    }
    return tally;
  }

  private fail(error: CountmeError): RunResult {
    log.debug(`Run failed: ${error.code}`);
    return { status: "failed", error };
  }
}
