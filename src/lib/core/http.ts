/**
 * The subset of `fetch` the clients use; injected so tests can answer
 * requests in-process.
 */
export type FetchFn = (
  input: string | URL,
  init?: RequestInit,
) => Promise<Response>;

/**
 * Read a response body as text without letting a broken stream mask the
 * original failure.
 */
export async function safeText(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch {
    return "";
  }
}
