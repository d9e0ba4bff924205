import { z } from "zod";

const pathList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(":")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    );

export const countmeEnvSchema = z.object({
  COUNTME_MARKER_PATH: z.string().min(1).default("/run/ostree-booted"),
  COUNTME_REPO_DIRS: pathList("/etc/yum.repos.d"),
  COUNTME_COOKIE_PATH: z.string().min(1).default("/var/lib/countme/countme.json"),
  COUNTME_OS_RELEASE_PATHS: pathList("/etc/os-release:/usr/lib/os-release").pipe(
    z.array(z.string()).min(1),
  ),
  COUNTME_USER_AGENT_PRODUCT: z.string().min(1).default("countme"),
  COUNTME_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export interface CountmeConfig {
  markerPath: string;
  repoDirs: string[];
  cookiePath: string;
  osReleasePaths: string[];
  userAgentProduct: string;
  requestTimeoutMs: number;
}
