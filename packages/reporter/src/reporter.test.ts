import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  ConfigError,
  NetworkError,
  OsReleaseError,
  PersistenceError,
  type Cookie,
  type RepoEntry,
} from "@countme/core";
import { MemoryCookieStore, type CookieStore } from "@countme/cookie";
import type { OsRelease } from "@countme/host";
import { Reporter, type ReporterDeps } from "./reporter.js";
import type { StatusWriter } from "./status.js";

const DAY = 24 * 60 * 60;
const NOW = 1_760_000_000;
const RELEASE: OsRelease = { name: "Fedora Linux", versionId: "39", variantId: "coreos" };
const UA = "countme (Fedora Linux 39; coreos; Linux.x86_64)";

function repo(id: string, overrides: Partial<RepoEntry> = {}): RepoEntry {
  return {
    id,
    enabled: true,
    metalink: `https://mirrors.example.test/metalink?repo=${id}-$releasever&arch=$basearch`,
    countme: true,
    sourceFile: `/etc/yum.repos.d/${id}.repo`,
    ...overrides,
  };
}

function countUrl(id: string, bucket: number): string {
  return `https://mirrors.example.test/metalink?repo=${id}-39&arch=x86_64&countme=${bucket}`;
}

describe("Reporter", () => {
  let repos: RepoEntry[];
  let cookies: MemoryCookieStore;
  let send: ReturnType<typeof vi.fn>;
  let lines: { info: string[]; error: string[] };
  let status: StatusWriter;

  function makeReporter(overrides: Partial<ReporterDeps> = {}): Reporter {
    return new Reporter({
      platform: async () => true,
      catalog: { load: async () => repos },
      cookies,
      release: async () => RELEASE,
      send,
      markerPath: "/run/ostree-booted",
      basearch: "x86_64",
      product: "countme",
      now: () => NOW,
      status,
      ...overrides,
    });
  }

  beforeEach(() => {
    repos = [repo("fedora"), repo("updates")];
    cookies = new MemoryCookieStore();
    send = vi.fn().mockResolvedValue(undefined);
    lines = { info: [], error: [] };
    status = {
      info: (line) => lines.info.push(line),
      error: (line) => lines.error.push(line),
    };
  });

  describe("preconditions", () => {
    it("fails on an unsupported platform without touching anything else", async () => {
      const load = vi.fn().mockResolvedValue(repos);

      const result = await makeReporter({
        platform: async () => false,
        catalog: { load },
      }).run();

      expect(result.status).toBe("failed");
      if (result.status !== "failed") return;
      expect(result.error.code).toBe("unsupported-platform");
      expect(result.error.message).toBe(
        "Not running on an ostree based system (missing /run/ostree-booted)",
      );
      expect(load).not.toHaveBeenCalled();
      expect(send).not.toHaveBeenCalled();
    });

    it("fails when the repository catalog cannot be read", async () => {
      const error = new ConfigError("Cannot read repository file /etc/yum.repos.d/x.repo");

      const result = await makeReporter({
        catalog: { load: () => Promise.reject(error) },
      }).run();

      expect(result).toEqual({ status: "failed", error });
    });

    it("propagates unexpected catalog errors", async () => {
      await expect(
        makeReporter({ catalog: { load: () => Promise.reject(new RangeError("bug")) } }).run(),
      ).rejects.toThrow("bug");
    });

    it("skips when no repository is eligible", async () => {
      repos = [repo("a", { countme: false }), repo("b", { enabled: false }), repo("c", { metalink: undefined })];

      const result = await makeReporter().run();

      expect(result).toEqual({ status: "skipped", reason: "no-eligible-repos" });
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe("counting window", () => {
    it("skips while the last count is less than a window old", async () => {
      cookies = new MemoryCookieStore({ lastCounted: NOW - 6 * DAY });
      const release = vi.fn().mockResolvedValue(RELEASE);

      const result = await makeReporter({ release }).run();

      expect(result).toEqual({ status: "skipped", reason: "window-not-elapsed" });
      expect(release).not.toHaveBeenCalled();
      expect(send).not.toHaveBeenCalled();
      expect(cookies.peek()).toEqual({ lastCounted: NOW - 6 * DAY });
    });

    it("reports the first bucket on a first run", async () => {
      await makeReporter().run();

      expect(send).toHaveBeenCalledWith(countUrl("fedora", 1), UA);
    });

    it("reports the same bucket for every repository of a run", async () => {
      cookies = new MemoryCookieStore({ lastCounted: NOW - 40 * DAY });

      await makeReporter().run();

      expect(send.mock.calls).toEqual([
        [countUrl("fedora", 3), UA],
        [countUrl("updates", 3), UA],
      ]);
    });

    it("treats an unreadable cookie as absent", async () => {
      const broken: CookieStore = {
        load: () => Promise.reject(new PersistenceError("Cookie /var/lib/countme/countme.json is not valid JSON")),
        persist: vi.fn().mockResolvedValue(undefined),
      };

      const result = await makeReporter({ cookies: broken }).run();

      expect(result).toEqual({ status: "counted", successes: 2, total: 2, persisted: true });
      expect(send).toHaveBeenCalledWith(countUrl("fedora", 1), UA);
      expect(broken.persist).toHaveBeenCalledWith(NOW);
      expect(lines.error).toContain(
        "Ignoring unreadable cookie: Cookie /var/lib/countme/countme.json is not valid JSON",
      );
    });
  });

  describe("dispatch", () => {
    it("sends one request per eligible repository in catalog order", async () => {
      repos = [
        repo("fedora"),
        repo("rpmfusion", { countme: false }),
        repo("updates"),
        repo("testing", { enabled: false }),
        repo("cisco", { metalink: "" }),
        repo("extras"),
      ];

      const result = await makeReporter().run();

      expect(send.mock.calls.map(([url]) => url)).toEqual([
        countUrl("fedora", 1),
        countUrl("updates", 1),
        countUrl("extras", 1),
      ]);
      expect(result).toEqual({ status: "counted", successes: 3, total: 3, persisted: true });
    });

    it("builds exactly one request for the opted-in repository", async () => {
      repos = [
        repo("fedora", { metalink: "https://mirrors.example.test/m?r=$releasever" }),
        repo("rpmfusion", { countme: false, metalink: "https://mirrors.example.test/r?r=$releasever" }),
      ];

      await makeReporter().run();

      expect(send).toHaveBeenCalledTimes(1);
      expect(send).toHaveBeenCalledWith("https://mirrors.example.test/m?r=39&countme=1", UA);
    });

    it("prints the user agent and each request", async () => {
      repos = [repo("fedora")];

      await makeReporter().run();

      expect(lines.info).toEqual([
        `Using User Agent: ${UA}`,
        `Sending request to: ${countUrl("fedora", 1)}`,
      ]);
    });

    it("falls back to the default variant", async () => {
      repos = [repo("fedora")];

      await makeReporter({ release: async () => ({ name: "Fedora Linux", versionId: "40" }) }).run();

      expect(send).toHaveBeenCalledWith(
        "https://mirrors.example.test/metalink?repo=fedora-40&arch=x86_64&countme=1",
        "countme (Fedora Linux 40; unknown; Linux.x86_64)",
      );
    });

    it("fails when release metadata is unavailable", async () => {
      const error = new OsReleaseError("os-release does not define VERSION_ID");

      const result = await makeReporter({ release: () => Promise.reject(error) }).run();

      expect(result).toEqual({ status: "failed", error });
      expect(send).not.toHaveBeenCalled();
    });
  });

  describe("outcome", () => {
    it("keeps going after a failed request and records partial success", async () => {
      repos = [repo("fedora"), repo("updates"), repo("extras")];
      send.mockRejectedValueOnce(new NetworkError(countUrl("fedora", 1), "HTTP 503 Service Unavailable"));

      const result = await makeReporter().run();

      expect(send).toHaveBeenCalledTimes(3);
      expect(result).toEqual({ status: "counted", successes: 2, total: 3, persisted: true });
      expect(cookies.peek()).toEqual({ lastCounted: NOW });
      expect(lines.error).toEqual([
        `Request '${countUrl("fedora", 1)}' failed: HTTP 503 Service Unavailable`,
      ]);
    });

    it("fails without persisting when every request fails", async () => {
      const initial: Cookie = { lastCounted: NOW - 10 * DAY };
      cookies = new MemoryCookieStore(initial);
      send.mockRejectedValue(new NetworkError("x", "fetch failed"));

      const result = await makeReporter().run();

      expect(result.status).toBe("failed");
      if (result.status !== "failed") return;
      expect(result.error.code).toBe("all-requests-failed");
      expect(result.error.message).toBe("No request successful (0/2)");
      expect(cookies.peek()).toEqual(initial);
    });

    it("still counts the run when the cookie cannot be written", async () => {
      const failing: CookieStore = {
        load: async () => null,
        persist: () => Promise.reject(new PersistenceError("Could not write cookie /ro/countme.json: EROFS")),
      };

      const result = await makeReporter({ cookies: failing }).run();

      expect(result).toEqual({ status: "counted", successes: 2, total: 2, persisted: false });
      expect(lines.error).toEqual([
        "Failed to persist cookie: Could not write cookie /ro/countme.json: EROFS",
      ]);
    });

    it("opens the next window only after a full window", async () => {
      await makeReporter().run();
      expect(send).toHaveBeenCalledTimes(2);

      await makeReporter({ now: () => NOW + 1 }).run();
      expect(send).toHaveBeenCalledTimes(2);

      await makeReporter({ now: () => NOW + 7 * DAY + 1 }).run();
      expect(send).toHaveBeenCalledTimes(4);
      expect(send).toHaveBeenLastCalledWith(countUrl("updates", 2), UA);
    });
  });
});
