/**
 * The slice of `fetch` the transfer engine uses.
 * Tests pass a fake that answers with in-memory `Response` objects.
 */
export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;
