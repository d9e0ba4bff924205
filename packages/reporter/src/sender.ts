import { NetworkError, toErrorMessage } from "@countme/core";
import { createLogger } from "@countme/logger";

const log = createLogger("reporter:sender");

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/** Dispatches one counting request. Rejects with NetworkError on failure. */
export type SendCountme = (url: string, userAgent: string) => Promise<void>;

/**
 * Send a GET to `url` and discard the body.
 * Redirects are followed; a non-2xx final status is a failure.
 */
export async function sendCountme(
  url: string,
  userAgent: string,
  options?: { timeoutMs?: number },
): Promise<void> {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetch(url, {
      method: "GET",
      headers: { "User-Agent": userAgent },
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    throw new NetworkError(url, toErrorMessage(err), { cause: err });
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new NetworkError(url, `HTTP ${response.status} ${response.statusText}`);
  }

  // The server counts the GET itself; the metalink content is not needed
  try {
    await response.arrayBuffer();
  } catch (err) {
    throw new NetworkError(url, `Failed to read response: ${toErrorMessage(err)}`, { cause: err });
  }
  log.debug(`Counted via ${url} (HTTP ${response.status})`);
}

/** Bind a timeout into a SendCountme for the Reporter. */
export function createSender(timeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS): SendCountme {
  return (url, userAgent) => sendCountme(url, userAgent, { timeoutMs });
}
