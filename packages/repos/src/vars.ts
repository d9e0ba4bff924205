import type { RepoVars } from "@countme/core";

const VAR_RE = /\$(?:\{(\w+)\}|(\w+))/g;

/**
 * Substitute `$releasever`, `$basearch` and `$arch` (bare or braced) in a
 * repository template. Unknown variables are left as written.
 */
export function expandRepoVars(template: string, vars: RepoVars): string {
  const table: Record<string, string> = {
    releasever: vars.releasever,
    basearch: vars.basearch,
    arch: vars.basearch,
  };
  return template.replace(VAR_RE, (match: string, braced?: string, bare?: string) => {
    const name = braced ?? bare ?? "";
    return Object.prototype.hasOwnProperty.call(table, name) ? (table[name] ?? match) : match;
  });
}

/**
 * Build the counting URL for one repository: the expanded metalink with the
 * window bucket appended as `countme=`.
 */
export function buildCountmeUrl(template: string, vars: RepoVars, bucket: number): string {
  const base = expandRepoVars(template.trim(), vars);
  const separator = base.includes("?") ? "&" : "?";
  return `${base}${separator}countme=${bucket}`;
}
