/**
 * HTML Fetcher Service
 * Fetches one HTML page per call with a timeout and typed errors
 */

import fetch, { FetchError, Response } from 'node-fetch';
import { FetchOptions, ScraperError, ErrorCode } from '../types/index.js';
import { type Logger } from '../utils/logger.js';

export const DEFAULT_TIMEOUT_MS = 30000;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; calendario-academico/1.0)';

/**
 * Signature shared by the real fetcher and test doubles
 */
export type PageFetcher = (url: string, options: FetchOptions, log: Logger) => Promise<string>;

/**
 * Map a non-2xx response onto a ScraperError
 */
function validateResponse(response: Response, url: string): void {
  if (response.ok) {
    return;
  }

  const statusCode = response.status;
  const statusText = response.statusText;

  if (statusCode === 404) {
    throw new ScraperError(
      `Page not found: ${url}`,
      ErrorCode.HTTP_NOT_FOUND,
      { url, statusCode },
      false
    );
  }

  if (statusCode >= 400 && statusCode < 500) {
    throw new ScraperError(
      `Client error: ${statusCode} ${statusText}`,
      ErrorCode.HTTP_CLIENT_ERROR,
      { url, statusCode, statusText },
      false
    );
  }

  if (statusCode >= 500) {
    throw new ScraperError(
      `Server error: ${statusCode} ${statusText}`,
      ErrorCode.HTTP_SERVER_ERROR,
      { url, statusCode, statusText },
      true
    );
  }

  throw new ScraperError(
    `Unexpected response: ${statusCode} ${statusText}`,
    ErrorCode.NETWORK_ERROR,
    { url, statusCode, statusText },
    true
  );
}

function toScraperError(error: unknown, url: string, timeout: number): ScraperError {
  if (error instanceof ScraperError) {
    return error;
  }

  if (error instanceof FetchError) {
    if (error.type === 'request-timeout') {
      return new ScraperError(
        `Request timeout after ${timeout}ms`,
        ErrorCode.TIMEOUT,
        { url, timeout },
        true
      );
    }

    if (error.code === 'ENOTFOUND') {
      return new ScraperError(
        `DNS lookup failed for ${url}`,
        ErrorCode.DNS_FAILURE,
        { url },
        false
      );
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ScraperError(
    `Network error: ${message}`,
    ErrorCode.NETWORK_ERROR,
    { url, originalError: message },
    true
  );
}

/**
 * Fetch a page body as text. Non-2xx responses and network failures throw.
 * There is no retry.
 */
export async function fetchHTML(
  url: string,
  options: FetchOptions,
  log: Logger
): Promise<string> {
  try {
    new URL(url);
  } catch {
    throw new ScraperError(
      `Invalid URL: ${url}`,
      ErrorCode.CONFIGURATION_ERROR,
      { url },
      false
    );
  }

  const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = {
    'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'pt-BR,pt;q=0.9',
    ...options.headers,
  };

  log.debug({ url, timeout }, 'Fetching HTML');

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers,
      timeout,
      redirect: 'follow',
    });

    validateResponse(response, url);

    const html = await response.text();

    if (html.trim().length === 0) {
      throw new ScraperError(
        'Empty response received',
        ErrorCode.INVALID_HTML,
        { url },
        true
      );
    }

    return html;
  } catch (error) {
    throw toScraperError(error, url, timeout);
  }
}
