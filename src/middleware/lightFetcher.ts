/**
 * lightFetcher.ts — HTTP client for everything that does not need a browser.
 *
 * Three shapes of request go through got-scraping here:
 *
 *   • `lightFetch`  — fetch a web page as text (court page, robots.txt), with
 *                     browser-grade generated headers so a WAF in front of a
 *                     government site treats us like a normal visitor;
 *   • `fetchBuffer` — download binary content (a screenshot the capture API
 *                     rendered for us);
 *   • `apiRequest`  — JSON / multipart calls to a REST API (the Cloud API
 *                     channel).  Header generation is switched off: an API
 *                     wants exactly the headers we set.
 *
 * None of them throw on HTTP error statuses.  Callers get the status code and
 * body back and decide what a 4xx means for them; only transport failures
 * (DNS, timeout, reset) reject.
 */

import { gotScraping } from 'got-scraping';
import { Logger } from '../core/logger';

const logger = new Logger('LightFetcher');

const DEFAULT_TIMEOUT_MS = 30_000;

export interface LightFetchResult {
  body: string;
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
}

/**
 * Fetch a URL as text using got-scraping's Chrome-like headers.
 */
export async function lightFetch(
  url: string,
  options?: {
    headers?: Record<string, string>;
    timeout?: number;
  },
): Promise<LightFetchResult> {
  logger.info(`Light-fetching ${url}…`);

  const response = await gotScraping({
    url,
    method: 'GET',
    headers: options?.headers ?? {},
    responseType: 'text',
    throwHttpErrors: false,
    timeout: { request: options?.timeout ?? DEFAULT_TIMEOUT_MS },
    headerGeneratorOptions: {
      browsers: [{ name: 'chrome', minVersion: 120 }],
      devices: ['desktop'],
      operatingSystems: ['windows', 'linux'],
    },
  });

  logger.info(`Light-fetch complete — HTTP ${response.statusCode} for ${url}`);

  return {
    body: response.body,
    statusCode: response.statusCode,
    headers: response.headers,
  };
}

export interface BinaryFetchResult {
  body: Buffer;
  statusCode: number;
  contentType: string | undefined;
}

/** Download binary content (no header generation). */
export async function fetchBuffer(
  url: string,
  options?: { timeout?: number },
): Promise<BinaryFetchResult> {
  const response = await gotScraping({
    url,
    method: 'GET',
    responseType: 'buffer',
    throwHttpErrors: false,
    useHeaderGenerator: false,
    timeout: { request: options?.timeout ?? DEFAULT_TIMEOUT_MS },
  });

  return {
    body: response.body,
    statusCode: response.statusCode,
    contentType: response.headers['content-type'],
  };
}

// ─── REST API calls ─────────────────────────────────────────

export type ApiRequest =
  | {
      method: 'GET';
      url: string;
      headers?: Record<string, string>;
      searchParams?: Record<string, string>;
    }
  | {
      method: 'POST';
      url: string;
      headers?: Record<string, string>;
      json: unknown;
    }
  | {
      method: 'POST';
      url: string;
      headers?: Record<string, string>;
      form: FormData;
    };

export interface ApiResponse {
  statusCode: number;
  /** Raw response text; JSON decoding is the caller's concern. */
  body: string;
}

/** The transport signature channels depend on, so tests can substitute it. */
export type ApiTransport = (request: ApiRequest) => Promise<ApiResponse>;

export const apiRequest: ApiTransport = async (request) => {
  const common = {
    url: request.url,
    headers: request.headers ?? {},
    responseType: 'text' as const,
    throwHttpErrors: false,
    useHeaderGenerator: false,
    timeout: { request: DEFAULT_TIMEOUT_MS },
  };

  const response =
    request.method === 'GET'
      ? await gotScraping({ ...common, method: 'GET', searchParams: request.searchParams })
      : 'json' in request
        ? await gotScraping({ ...common, method: 'POST', json: request.json })
        : await gotScraping({ ...common, method: 'POST', body: request.form });

  return { statusCode: response.statusCode, body: response.body };
};
