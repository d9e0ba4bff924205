import { resolveVariant, type OsRelease } from "./os-release.js";

const BASEARCH: Readonly<Record<string, string>> = {
  x64: "x86_64",
  arm64: "aarch64",
  ia32: "i686",
  ppc64: "ppc64le",
  arm: "armv7hl",
};

/** Map a Node.js `process.arch` to the package manager's basearch. */
export function toBaseArch(nodeArch: string): string {
  return BASEARCH[nodeArch] ?? nodeArch;
}

/**
 * Build the User-Agent sent with every counting request:
 * `<product> (<NAME> <VERSION_ID>; <VARIANT_ID>; Linux.<basearch>)`.
 */
export function buildUserAgent(product: string, release: OsRelease, basearch: string): string {
  return `${product} (${release.name} ${release.versionId}; ${resolveVariant(release)}; Linux.${basearch})`;
}
