/** Persisted counting-window state. */
export interface Cookie {
  /** Epoch seconds of the last run that reached the server */
  lastCounted: number;
}

/** Reporting bucket sent as `countme=`. */
export type WindowBucket = 1 | 2 | 3 | 4;
