export {
  BUCKET_TABLE,
  MAX_BUCKET,
  WINDOW_SECONDS,
  existingWindow,
  nowSeconds,
  windowCounter,
} from "./window.js";
export type { CookieStore } from "./store.js";
export { COOKIE_VERSION, FileCookieStore, MemoryCookieStore } from "./store.js";
