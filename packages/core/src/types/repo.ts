/** One `[section]` of a `.repo` file, reduced to the fields counting needs. */
export interface RepoEntry {
  /** Section name, unique within the catalog */
  id: string;
  /** `enabled=`; true when the key is absent */
  enabled: boolean;
  /** `metalink=` template, still carrying `$releasever` and friends */
  metalink?: string;
  /** `countme=`; false unless explicitly set */
  countme: boolean;
  /** File the entry was read from */
  sourceFile: string;
}

/** Values substituted into metalink templates. */
export interface RepoVars {
  releasever: string;
  basearch: string;
}

/** A counting request, assembled only to dispatch it. */
export interface ReportRequest {
  repoId: string;
  url: string;
}
