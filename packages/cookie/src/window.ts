import type { Cookie, WindowBucket } from "@countme/core";

const DAY_SECONDS = 24 * 60 * 60;

/** Length of one counting window: one week. */
export const WINDOW_SECONDS = 7 * DAY_SECONDS;

/**
 * Bucket boundaries on the time elapsed since the last count.
 * The server only ever sees the bucket.
 */
export const BUCKET_TABLE: ReadonlyArray<{ below: number; bucket: WindowBucket }> = [
  { below: WINDOW_SECONDS, bucket: 1 },
  { below: 30 * DAY_SECONDS, bucket: 2 },
  { below: 180 * DAY_SECONDS, bucket: 3 },
];

export const MAX_BUCKET: WindowBucket = 4;

/** Current time in whole epoch seconds. */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Whether `now` still falls inside the window opened by the last count,
 * in which case the run should not report again. Absent cookie: false.
 */
export function existingWindow(cookie: Cookie | null, now: number): boolean {
  if (cookie === null) return false;
  return now - cookie.lastCounted < WINDOW_SECONDS;
}

/** Bucket to report for `now`. Absent cookie reports the first bucket. */
export function windowCounter(cookie: Cookie | null, now: number): WindowBucket {
  if (cookie === null) return 1;
  const elapsed = Math.max(0, now - cookie.lastCounted);
  for (const { below, bucket } of BUCKET_TABLE) {
    if (elapsed < below) return bucket;
  }
  return MAX_BUCKET;
}
