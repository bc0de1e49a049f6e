/**
 * HTTP helpers shared by the providers
 *
 * No retries here: a failed request surfaces as SOURCE_UNAVAILABLE and the
 * scheduler decides when to try again.
 */

import { MonitorError, toError } from '../../errors';

export const FETCH_TIMEOUT_MS = 28000;

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/117.0.0.0 Safari/537.36';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchedBody<T> {
  res: Response;
  body: T;
}

/**
 * Fetch a URL and read its body under one timeout.
 *
 * @param url Request URL
 * @param ticker Symbol named in error messages
 * @param read Consumes the body of a 2xx response
 * @param fetchImpl fetch implementation (stubbed in tests)
 * @param timeoutMs Budget for the headers and the whole body
 * @returns The response and its decoded body
 * @throws MonitorError SOURCE_UNAVAILABLE on a network error, a non-2xx
 *   status, a body that fails mid-read, or a timeout
 */
async function fetchBody<T>(
  url: string,
  ticker: string,
  read: (res: Response) => Promise<T>,
  fetchImpl: FetchLike,
  timeoutMs: number
): Promise<FetchedBody<T>> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), timeoutMs);
  try {
    let res: Response;
    try {
      res = await fetchImpl(url, {
        signal: controller.signal,
        headers: { 'User-Agent': BROWSER_USER_AGENT },
      });
    } catch (err) {
      throw new MonitorError(
        `Request failed for ${ticker}: ${toError(err).message} URL: ${url}`,
        'SOURCE_UNAVAILABLE',
        ticker,
        toError(err)
      );
    }

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new MonitorError(
        `HTTP ${res.status} ${res.statusText} for ${ticker}. ${summarizeResponse(res, text)} URL: ${url}`,
        'SOURCE_UNAVAILABLE',
        ticker
      );
    }

    try {
      return { res, body: await read(res) };
    } catch (err) {
      throw new MonitorError(
        `Reading the response failed for ${ticker}: ${toError(err).message} URL: ${url}`,
        'SOURCE_UNAVAILABLE',
        ticker,
        toError(err)
      );
    }
  } finally {
    clearTimeout(timeout);
  }
}

export function fetchText(
  url: string,
  ticker: string,
  fetchImpl: FetchLike = fetch,
  timeoutMs: number = FETCH_TIMEOUT_MS
): Promise<FetchedBody<string>> {
  return fetchBody(url, ticker, (res) => res.text(), fetchImpl, timeoutMs);
}

export function fetchBytes(
  url: string,
  ticker: string,
  fetchImpl: FetchLike = fetch,
  timeoutMs: number = FETCH_TIMEOUT_MS
): Promise<FetchedBody<Buffer>> {
  return fetchBody(url, ticker, async (res) => Buffer.from(await res.arrayBuffer()), fetchImpl, timeoutMs);
}

/**
 * Build a diagnostic summary of a response for log lines.
 */
export function summarizeResponse(res: Response, text: string): string {
  const contentType = res.headers.get('content-type') ?? '(none)';
  const snippet = text.slice(0, 200).replace(/\r?\n/g, ' ').trim();
  return `status=${res.status} content-type=${contentType} body_preview="${snippet}"`;
}

export function isHtmlResponse(text: string): boolean {
  const head = text.trim().slice(0, 500).toLowerCase();
  return head.startsWith('<!doctype') || head.startsWith('<html') || head.includes('<title>');
}
