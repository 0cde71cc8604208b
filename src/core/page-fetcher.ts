/**
 * Page Fetcher
 *
 * Issues the single GET of a poll cycle. The request presents itself as a
 * desktop Firefox so that the booking site serves the same markup a person
 * would see. Retrying is left to the poll loop.
 */

import { logger } from '../utils/logger.js';
import { getTimeout } from '../utils/timeouts.js';

const log = logger.fetcher;

/**
 * Desktop browser identity sent with every request
 */
export const BROWSER_PROFILE = {
  userAgent: 'Mozilla/5.0 (X11; Linux x86_64; rv:109.0) Gecko/20100101 Firefox/117.0',
  acceptLanguage: 'en-US,en;q=0.9',
} as const;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchPageOptions {
  /** Request timeout in ms (default: TIMEOUTS.NETWORK_FETCH) */
  timeout?: number;
  /** Extra headers, merged over the browser profile */
  headers?: Record<string, string>;
  /** fetch implementation (default: global fetch) */
  fetchImpl?: FetchLike;
}

/**
 * HTTP non-success status or network-level failure while fetching a page
 */
export class TransportError extends Error {
  public readonly url: string;
  public readonly status?: number;
  public readonly statusText?: string;
  public readonly timedOut: boolean;

  constructor(
    message: string,
    details: { url: string; status?: number; statusText?: string; timedOut?: boolean; cause?: unknown }
  ) {
    super(message, { cause: details.cause });
    this.name = 'TransportError';
    this.url = details.url;
    this.status = details.status;
    this.statusText = details.statusText;
    this.timedOut = details.timedOut ?? false;
  }
}

export function buildBrowserHeaders(extra: Record<string, string> = {}): Record<string, string> {
  return {
    'User-Agent': BROWSER_PROFILE.userAgent,
    'Accept-Language': BROWSER_PROFILE.acceptLanguage,
    ...extra,
  };
}

/**
 * Fetch a page and return its decoded body.
 *
 * @throws TransportError on a non-2xx status, a network failure or a timeout
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const timeoutMs = getTimeout('NETWORK_FETCH', options.timeout);
  const fetchImpl: FetchLike = options.fetchImpl ?? fetch;
  const startTime = Date.now();

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method: 'GET',
        headers: buildBrowserHeaders(options.headers),
        redirect: 'follow',
        signal: controller.signal,
      });
    } catch (error) {
      const timedOut = controller.signal.aborted;
      const reason = timedOut
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new TransportError(`Request to ${url} failed: ${reason}`, { url, timedOut, cause: error });
    }

    if (!response.ok) {
      throw new TransportError(`HTTP ${response.status}: ${response.statusText} for ${url}`, {
        url,
        status: response.status,
        statusText: response.statusText,
      });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      const timedOut = controller.signal.aborted;
      const reason = timedOut
        ? `timed out after ${timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : String(error);
      throw new TransportError(`Reading response from ${url} failed: ${reason}`, {
        url,
        status: response.status,
        timedOut,
        cause: error,
      });
    }

    log.debug('Page fetched', {
      url,
      status: response.status,
      bytes: body.length,
      durationMs: Date.now() - startTime,
    });
    return body;
  } finally {
    clearTimeout(timeoutId);
  }
}
