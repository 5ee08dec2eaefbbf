import type { FetchLike } from "../ports/http.js";

/**
 * Node's built-in fetch. Redirects are followed; cookies set on the
 * request are re-sent only to the same origin.
 */
export const globalFetch: FetchLike = (url, init) => globalThis.fetch(url, init);
