import { access } from "node:fs/promises";
import { createLogger } from "@countme/logger";

const log = createLogger("host:platform");

export const DEFAULT_MARKER_PATH = "/run/ostree-booted";

/** Capability check deciding whether this host should report at all. */
export type PlatformCheck = () => Promise<boolean>;

/** Supported iff the marker path exists. */
export function markerPlatformCheck(markerPath: string = DEFAULT_MARKER_PATH): PlatformCheck {
  return async () => {
    try {
      await access(markerPath);
      return true;
    } catch {
      log.debug(`Platform marker ${markerPath} not present`);
      return false;
    }
  };
}
