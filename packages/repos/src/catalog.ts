import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConfigError, toErrorMessage, type RepoEntry } from "@countme/core";
import { createLogger } from "@countme/logger";
import { IniSyntaxError, parseIni, type IniSection } from "./ini.js";

const log = createLogger("repos:catalog");

export const DEFAULT_REPO_DIRS: readonly string[] = ["/etc/yum.repos.d"];

const TRUE_VALUES = new Set(["1", "yes", "true", "on"]);
const FALSE_VALUES = new Set(["0", "no", "false", "off"]);

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function parseBool(value: string | undefined, fallback: boolean, where: string): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  throw new ConfigError(`${where}: invalid boolean value "${value}"`);
}

function toRepoEntry(section: IniSection, sourceFile: string): RepoEntry {
  const where = `${sourceFile} [${section.name}]`;
  const metalink = section.values.get("metalink");
  return {
    id: section.name,
    enabled: parseBool(section.values.get("enabled"), true, `${where} enabled`),
    metalink: metalink && metalink.trim() !== "" ? metalink.trim() : undefined,
    countme: parseBool(section.values.get("countme"), false, `${where} countme`),
    sourceFile,
  };
}

/** List the `.repo` files of a directory, sorted. Missing directory → []. */
async function listRepoFiles(dir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      log.debug(`Repository directory ${dir} does not exist`);
      return [];
    }
    throw new ConfigError(`Cannot list repository directory ${dir}: ${toErrorMessage(err)}`, {
      cause: err,
    });
  }
  return names
    .filter((name) => name.endsWith(".repo"))
    .sort()
    .map((name) => join(dir, name));
}

/** Read and parse one `.repo` file into its sections. */
export async function readRepoFile(file: string): Promise<RepoEntry[]> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    throw new ConfigError(`Cannot read repository file ${file}: ${toErrorMessage(err)}`, {
      cause: err,
    });
  }

  let sections: IniSection[];
  try {
    sections = parseIni(text);
  } catch (err) {
    if (err instanceof IniSyntaxError) {
      throw new ConfigError(`Malformed repository file ${file}, ${err.message}`, { cause: err });
    }
    throw err;
  }
  return sections.map((section) => toRepoEntry(section, file));
}

/**
 * Load every repository defined under the given directories, in directory
 * order, then file name order, then section order.
 *
 * Duplicate ids keep their first definition.
 *
 * @throws ConfigError when a present file or directory cannot be read or parsed.
 */
export async function loadRepos(dirs: readonly string[] = DEFAULT_REPO_DIRS): Promise<RepoEntry[]> {
  const repos: RepoEntry[] = [];
  const seen = new Map<string, string>();

  for (const dir of dirs) {
    for (const file of await listRepoFiles(dir)) {
      for (const entry of await readRepoFile(file)) {
        const firstFile = seen.get(entry.id);
        if (firstFile !== undefined) {
          log.warn(`Repository "${entry.id}" in ${file} already defined in ${firstFile}; ignoring`);
          continue;
        }
        seen.set(entry.id, file);
        repos.push(entry);
      }
    }
  }

  log.debug(`Loaded ${repos.length} repositories from ${dirs.join(", ")}`);
  return repos;
}

/** Eligible for counting: enabled, opted in and carrying a metalink. */
export function isCountable(repo: RepoEntry): boolean {
  return repo.enabled && repo.countme && repo.metalink !== undefined && repo.metalink.trim() !== "";
}

/** Keep the countable repositories, preserving catalog order. */
export function selectCountable(repos: readonly RepoEntry[]): RepoEntry[] {
  return repos.filter(isCountable);
}

/** The loader contract the Reporter consumes. */
export interface RepoCatalog {
  load(): Promise<RepoEntry[]>;
}

export class DirectoryRepoCatalog implements RepoCatalog {
  constructor(private readonly dirs: readonly string[] = DEFAULT_REPO_DIRS) {}

  load(): Promise<RepoEntry[]> {
    return loadRepos(this.dirs);
  }
}
