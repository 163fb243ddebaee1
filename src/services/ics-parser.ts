/**
 * ICS Parser Service
 * Reads VEVENT components out of an iCalendar document (RFC 5545)
 */
import { isValid } from 'date-fns';
import { fromZonedTime } from 'date-fns-tz';
import { CalendarInstant, RawCalendarEntry } from '../types/index';

/**
 * One content line split into name, parameters and raw value
 */
export interface PropertyLine {
  name: string;
  params: Record<string, string>;
  value: string;
}

const DATE_VALUE_PATTERN = /^(\d{4})(\d{2})(\d{2})(?:T(\d{2})(\d{2})(\d{2})(Z)?)?$/;

/**
 * Normalize line endings and join folded continuation lines
 */
export function unfoldLines(text: string): string[] {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .replace(/\n[ \t]/g, '')
    .split('\n');
}

/**
 * Split `NAME;PARAM=VALUE:content` into its parts. Returns null for lines without a name.
 */
export function parsePropertyLine(line: string): PropertyLine | null {
  let inQuotes = false;
  let colon = -1;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      inQuotes = !inQuotes;
    } else if (ch === ':' && !inQuotes) {
      colon = i;
      break;
    }
  }

  if (colon <= 0) return null;

  const [name, ...paramParts] = line.slice(0, colon).split(';');
  if (!name) return null;

  const params: Record<string, string> = {};
  for (const part of paramParts) {
    const eq = part.indexOf('=');
    if (eq <= 0) continue;
    params[part.slice(0, eq).toUpperCase()] = part.slice(eq + 1).replace(/^"(.*)"$/, '$1');
  }

  return { name: name.toUpperCase(), params, value: line.slice(colon + 1) };
}

/**
 * Undo TEXT escaping (\\n, \\, \\; \\\\)
 */
export function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_, ch: string) => (ch === 'n' || ch === 'N' ? '\n' : ch));
}

/**
 * Resolve a DATE or DATE-TIME value to an instant.
 * Floating and date-only values, and unknown TZIDs, are read as UTC.
 */
export function parseIcsDate(value: string, params: Record<string, string> = {}): CalendarInstant | undefined {
  const match = DATE_VALUE_PATTERN.exec(value.trim());
  if (!match) return undefined;

  const [, year, month, day, hour = '00', minute = '00', second = '00', utc] = match;
  const local = `${year}-${month}-${day}T${hour}:${minute}:${second}`;
  const asUtc: CalendarInstant = { date: new Date(`${local}Z`), timeZone: 'UTC' };

  if (utc || !match[4] || !params.TZID) {
    return isValid(asUtc.date) ? asUtc : undefined;
  }

  try {
    const zoned = fromZonedTime(local, params.TZID);
    if (isValid(zoned)) {
      return { date: zoned, timeZone: params.TZID };
    }
  } catch {
    // unknown zone name; fall through to UTC
  }

  return isValid(asUtc.date) ? asUtc : undefined;
}

function splitCategories(value: string): string[] {
  return value
    .split(/(?<!\\),/)
    .map((part) => unescapeText(part).trim())
    .filter((part) => part.length > 0);
}

function applyProperty(entry: RawCalendarEntry, prop: PropertyLine): void {
  switch (prop.name) {
    case 'UID':
      entry.uid = unescapeText(prop.value);
      break;
    case 'DTSTART':
      entry.begin = parseIcsDate(prop.value, prop.params);
      break;
    case 'DTEND':
      entry.end = parseIcsDate(prop.value, prop.params);
      break;
    case 'SUMMARY':
      entry.name = unescapeText(prop.value);
      break;
    case 'DESCRIPTION':
      entry.description = unescapeText(prop.value);
      break;
    case 'URL':
      entry.url = prop.value.trim();
      break;
    case 'LOCATION':
      entry.location = unescapeText(prop.value);
      break;
    case 'CATEGORIES': {
      const existing = Array.isArray(entry.categories) ? entry.categories : [];
      entry.categories = [...existing, ...splitCategories(prop.value)];
      break;
    }
    default:
      entry.properties[prop.name.toLowerCase()] = unescapeText(prop.value);
  }
}

/**
 * Parse every VEVENT in the document.
 * Components nested inside an event (VALARM) are skipped; malformed lines are ignored.
 */
export function parseCalendar(text: string): RawCalendarEntry[] {
  const entries: RawCalendarEntry[] = [];
  const stack: string[] = [];
  let current: RawCalendarEntry | null = null;
  let eventDepth = 0;

  for (const rawLine of unfoldLines(text)) {
    const line = rawLine.trim();
    if (!line) continue;

    const prop = parsePropertyLine(line);
    if (!prop) continue;

    if (prop.name === 'BEGIN') {
      const component = prop.value.trim().toUpperCase();
      stack.push(component);
      if (component === 'VEVENT' && !current) {
        current = { properties: {} };
        eventDepth = stack.length;
      }
      continue;
    }

    if (prop.name === 'END') {
      stack.pop();
      if (current && stack.length < eventDepth) {
        entries.push(current);
        current = null;
      }
      continue;
    }

    if (current && stack.length === eventDepth) {
      applyProperty(current, prop);
    }
  }

  return entries;
}
