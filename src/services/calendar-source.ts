/**
 * Calendar Source Service
 * Loads raw iCalendar text from an http(s) URL, a file:// URL or a local path
 */
import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import fetch from 'node-fetch';
import { EnricherError, ErrorCode } from '../types/index';
import { DEFAULT_TIMEOUT_MS } from '../utils/config';
import { Logger } from '../utils/logger';

export type CalendarLocationKind = 'http' | 'file';

/**
 * Classify a location and resolve file:// URLs to paths
 */
export function resolveCalendarLocation(location: string): { kind: CalendarLocationKind; target: string } {
  if (/^https?:\/\//i.test(location)) {
    return { kind: 'http', target: location };
  }
  if (/^file:\/\//i.test(location)) {
    return { kind: 'file', target: fileURLToPath(location) };
  }
  return { kind: 'file', target: location };
}

async function fetchCalendar(url: string, timeoutMs: number): Promise<string> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetch(url, { method: 'GET', signal: controller.signal, redirect: 'follow' });
    if (!response.ok) {
      throw new EnricherError(
        `Calendar request failed: ${response.status} ${response.statusText}`,
        ErrorCode.CALENDAR_FETCH_ERROR,
        { url, statusCode: response.status },
        response.status >= 500
      );
    }
    return await response.text();
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Read the calendar document. Any failure is fatal to the run.
 */
export async function loadCalendarText(
  location: string,
  options: { timeoutMs?: number; log?: Logger } = {}
): Promise<string> {
  const { log } = options;

  let resolved: { kind: CalendarLocationKind; target: string };
  try {
    resolved = resolveCalendarLocation(location);
  } catch (error) {
    throw new EnricherError(
      `Invalid calendar location: ${location}`,
      ErrorCode.CALENDAR_FETCH_ERROR,
      { location, originalError: error instanceof Error ? error.message : String(error) },
      false
    );
  }

  log?.info({ location, kind: resolved.kind }, 'Loading calendar');

  try {
    const text =
      resolved.kind === 'http'
        ? await fetchCalendar(resolved.target, options.timeoutMs ?? DEFAULT_TIMEOUT_MS)
        : await readFile(resolved.target, 'utf-8');
    log?.debug({ location, length: text.length }, 'Calendar loaded');
    return text;
  } catch (error) {
    if (error instanceof EnricherError) {
      throw error;
    }
    throw new EnricherError(
      `Failed to load calendar from ${location}`,
      ErrorCode.CALENDAR_FETCH_ERROR,
      { location, originalError: error instanceof Error ? error.message : String(error) },
      false
    );
  }
}
