import { fetch, type Response } from 'undici';
import { AuthError, TransportError, errorMessage, isAuthStatus } from '../stt/errors';

export interface GetPageOptions {
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 15_000;

/** Plain GET returning the body text; non-2xx responses are errors. */
export async function getPage(url: string, opts: GetPageOptions = {}): Promise<string> {
  const host = new URL(url).host;
  let response: Response;
  let body: string;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers: { Accept: 'application/json, text/plain;q=0.9, */*;q=0.1' },
      signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
    // the timeout signal also covers the body read
    body = await response.text();
  } catch (error) {
    throw new TransportError(`GET ${host} failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    const preview = body.length > 300 ? `${body.slice(0, 300)}...` : body;
    const message = `GET ${host} returned ${response.status}: ${preview}`;
    throw isAuthStatus(response.status) ? new AuthError(message) : new TransportError(message);
  }

  return body;
}
