import { mkdir, readFile, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { z } from "zod";
import { PersistenceError, toErrorMessage, type Cookie } from "@countme/core";
import { createLogger } from "@countme/logger";

const log = createLogger("cookie:store");

export const COOKIE_VERSION = 1;

const cookieFileSchema = z.object({
  version: z.literal(COOKIE_VERSION),
  lastCounted: z.number().int().nonnegative(),
});

/**
 * Persisted counting-window state.
 *
 * Implementations read once per run and write at most once, after a run
 * reached the server. A single writer per host is assumed.
 */
export interface CookieStore {
  /** Returns null when no cookie has been written yet. */
  load(): Promise<Cookie | null>;

  /** Record `now` (epoch seconds) as the last counted time. */
  persist(now: number): Promise<void>;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * JSON cookie file, replaced atomically through a temporary sibling and a
 * rename.
 */
export class FileCookieStore implements CookieStore {
  constructor(readonly path: string) {}

  async load(): Promise<Cookie | null> {
    let text: string;
    try {
      text = await readFile(this.path, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") {
        log.debug(`No cookie at ${this.path}`);
        return null;
      }
      throw new PersistenceError(`Could not read cookie ${this.path}: ${toErrorMessage(err)}`, {
        cause: err,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      throw new PersistenceError(`Cookie ${this.path} is not valid JSON`, { cause: err });
    }

    const parsed = cookieFileSchema.safeParse(json);
    if (!parsed.success) {
      throw new PersistenceError(
        `Cookie ${this.path} has unexpected content: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
          .join("; ")}`,
      );
    }

    log.debug(`Loaded cookie ${this.path}: lastCounted=${parsed.data.lastCounted}`);
    return { lastCounted: parsed.data.lastCounted };
  }

  async persist(now: number): Promise<void> {
    const content = JSON.stringify({ version: COOKIE_VERSION, lastCounted: now }) + "\n";
    const tmpPath = join(dirname(this.path), `.${basename(this.path)}.${process.pid}.tmp`);

    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(tmpPath, content, { mode: 0o644 });
      await rename(tmpPath, this.path);
    } catch (err) {
      await unlink(tmpPath).catch(() => {});
      throw new PersistenceError(`Could not write cookie ${this.path}: ${toErrorMessage(err)}`, {
        cause: err,
      });
    }

    log.debug(`Persisted cookie ${this.path}: lastCounted=${now}`);
  }
}

/** In-memory cookie store for tests and embedding. */
export class MemoryCookieStore implements CookieStore {
  private cookie: Cookie | null;

  constructor(initial: Cookie | null = null) {
    this.cookie = initial;
  }

  async load(): Promise<Cookie | null> {
    return this.cookie ? { ...this.cookie } : null;
  }

  async persist(now: number): Promise<void> {
    this.cookie = { lastCounted: now };
  }

  /** Current state, without going through load(). */
  peek(): Cookie | null {
    return this.cookie;
  }
}
