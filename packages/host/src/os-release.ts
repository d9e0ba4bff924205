import { readFile } from "node:fs/promises";
import { OsReleaseError, toErrorMessage } from "@countme/core";
import { createLogger } from "@countme/logger";

const log = createLogger("host:os-release");

export const DEFAULT_OS_RELEASE_PATHS: readonly string[] = ["/etc/os-release", "/usr/lib/os-release"];

/** Variant reported when os-release carries no VARIANT_ID. */
export const DEFAULT_VARIANT_ID = "unknown";

export interface OsRelease {
  /** NAME, e.g. "Fedora Linux" */
  name: string;
  /** VERSION_ID, substituted for $releasever */
  versionId: string;
  /** VARIANT_ID, e.g. "coreos" */
  variantId?: string;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    return value.slice(1, -1).replace(/\\([\\$"`])/g, "$1");
  }
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) {
    return value.slice(1, -1);
  }
  return value;
}

/** Parse the shell-style assignments of an os-release file. */
export function parseOsReleaseFields(text: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("#")) continue;
    const match = /^([A-Z0-9_]+)=(.*)$/.exec(trimmed);
    if (!match?.[1]) continue;
    fields.set(match[1], unquote((match[2] ?? "").trim()));
  }
  return fields;
}

export function parseOsRelease(text: string): OsRelease {
  const fields = parseOsReleaseFields(text);
  const versionId = fields.get("VERSION_ID");
  if (!versionId) {
    throw new OsReleaseError("os-release does not define VERSION_ID");
  }
  const variantId = fields.get("VARIANT_ID");
  return {
    name: fields.get("NAME") || "Linux",
    versionId,
    variantId: variantId ? variantId : undefined,
  };
}

/** Read the first os-release file that exists. */
export async function readOsRelease(
  paths: readonly string[] = DEFAULT_OS_RELEASE_PATHS,
): Promise<OsRelease> {
  for (const path of paths) {
    let text: string;
    try {
      text = await readFile(path, "utf-8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") continue;
      throw new OsReleaseError(`Could not read ${path}: ${toErrorMessage(err)}`, { cause: err });
    }
    log.debug(`Read release metadata from ${path}`);
    return parseOsRelease(text);
  }
  throw new OsReleaseError(`No os-release file found (tried ${paths.join(", ")})`);
}

export function resolveVariant(release: OsRelease): string {
  return release.variantId ?? DEFAULT_VARIANT_ID;
}
