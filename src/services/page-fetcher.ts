/**
 * Page Fetcher Service
 * Single-attempt GET of an event detail page. Failures come back as a Result, never thrown.
 */

import fetch, { Response } from 'node-fetch';
import { EnricherError, ErrorCode, FetchOptions, Result } from '../types/index';
import { Logger } from '../utils/logger';

export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

/**
 * Request headers for a page fetch. The bypass header is left out when its value is empty.
 */
export function buildRequestHeaders(options: FetchOptions): Record<string, string> {
  const headers: Record<string, string> = {
    'User-Agent': DESKTOP_USER_AGENT,
    Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
    'Accept-Language': 'en-US,en;q=0.9',
  };

  if (options.botBypass?.value) {
    headers[options.botBypass.name] = options.botBypass.value;
  }

  return headers;
}

/**
 * Map a non-2xx response to an error
 */
function statusError(response: Response, url: string): EnricherError {
  const statusCode = response.status;
  const statusText = response.statusText;

  if (statusCode === 404) {
    return new EnricherError(`Page not found: ${url}`, ErrorCode.HTTP_NOT_FOUND, { url, statusCode }, false);
  }

  if (statusCode >= 400 && statusCode < 500) {
    return new EnricherError(
      `Client error: ${statusCode} ${statusText}`,
      ErrorCode.HTTP_CLIENT_ERROR,
      { url, statusCode, statusText },
      false
    );
  }

  if (statusCode >= 500) {
    return new EnricherError(
      `Server error: ${statusCode} ${statusText}`,
      ErrorCode.HTTP_SERVER_ERROR,
      { url, statusCode, statusText },
      true
    );
  }

  return new EnricherError(
    `Unexpected response: ${statusCode} ${statusText}`,
    ErrorCode.NETWORK_ERROR,
    { url, statusCode, statusText },
    true
  );
}

function transportError(error: unknown, url: string, timeoutMs: number): EnricherError {
  if (error instanceof EnricherError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : '';
  const code = error instanceof Error && 'code' in error ? error.code : undefined;

  if (name === 'AbortError') {
    return new EnricherError(`Request timeout after ${timeoutMs}ms`, ErrorCode.TIMEOUT, { url, timeoutMs }, true);
  }

  if (code === 'ENOTFOUND') {
    return new EnricherError(`DNS lookup failed for ${url}`, ErrorCode.DNS_FAILURE, { url }, false);
  }

  return new EnricherError(`Network error: ${message}`, ErrorCode.NETWORK_ERROR, { url, originalError: message }, true);
}

/**
 * Fetch a page's HTML with one attempt
 */
export async function fetchPage(url: string, options: FetchOptions, log?: Logger): Promise<Result<string>> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  log?.debug({ url }, 'Fetching page');

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: buildRequestHeaders(options),
      signal: controller.signal,
      redirect: 'follow',
    });

    if (!response.ok) {
      const error = statusError(response, url);
      log?.debug({ url, statusCode: response.status }, 'Bad response status');
      return { success: false, error };
    }

    const html = await response.text();
    log?.debug({ url, length: html.length }, 'Fetched page');
    return { success: true, data: html };
  } catch (error) {
    const wrapped = transportError(error, url, options.timeoutMs);
    log?.debug({ url, code: wrapped.code, err: wrapped }, 'Request failed');
    return { success: false, error: wrapped };
  } finally {
    clearTimeout(timeoutId);
  }
}
