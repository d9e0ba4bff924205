/** Discriminant carried by every error this tool raises. */
export type CountmeErrorCode =
  | "config"
  | "persistence"
  | "unsupported-platform"
  | "os-release"
  | "network"
  | "all-requests-failed";

export abstract class CountmeError extends Error {
  abstract readonly code: CountmeErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Repository configuration exists but cannot be read or parsed. Fatal. */
export class ConfigError extends CountmeError {
  readonly code = "config" as const;
}

/** The window cookie could not be read back or written out. */
export class PersistenceError extends CountmeError {
  readonly code = "persistence" as const;
}

export class UnsupportedPlatformError extends CountmeError {
  readonly code = "unsupported-platform" as const;

  constructor(readonly markerPath: string) {
    super(`Not running on an ostree based system (missing ${markerPath})`);
  }
}

export class OsReleaseError extends CountmeError {
  readonly code = "os-release" as const;
}

/** A single counting request failed. Scoped to one repository. */
export class NetworkError extends CountmeError {
  readonly code = "network" as const;

  constructor(
    readonly url: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class AllRequestsFailedError extends CountmeError {
  readonly code = "all-requests-failed" as const;

  constructor(readonly total: number) {
    super(`No request successful (0/${total})`);
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
