/**
 * Calendar Record Mapper Service
 * Converts parsed calendar entries into flat output records driven by TransformConfig
 */
import { formatInTimeZone } from 'date-fns-tz';
import {
  CalendarFieldValue,
  CalendarInstant,
  LocationInfo,
  OutputRecord,
  OutputValue,
  RawCalendarEntry,
  TransformConfig,
} from '../types/index';
import { DEFAULT_TRANSFORM_CONFIG } from '../utils/config';
import { collapseWhitespace, escapeCommas, escapeUnescaped } from '../utils/text';
import { Logger } from '../utils/logger';

/**
 * Read a field by its logical attribute name
 */
export function readAttribute(entry: RawCalendarEntry, attr: string): CalendarFieldValue | undefined {
  switch (attr) {
    case 'uid':
      return entry.uid;
    case 'begin':
      return entry.begin;
    case 'end':
      return entry.end;
    case 'name':
      return entry.name;
    case 'description':
      return entry.description;
    case 'url':
      return entry.url;
    case 'location':
      return entry.location;
    case 'categories':
      return entry.categories;
    default:
      return entry.properties[attr];
  }
}

function isInstant(value: CalendarFieldValue): value is CalendarInstant {
  return typeof value === 'object' && !Array.isArray(value);
}

/**
 * Render an instant in the target zone, then its own zone, then as ISO
 */
export function formatInstant(instant: CalendarInstant, config: TransformConfig): string {
  for (const zone of [config.targetTimezone, instant.timeZone]) {
    try {
      return formatInTimeZone(instant.date, zone, config.timeFormat);
    } catch {
      continue;
    }
  }
  return instant.date.toISOString();
}

/**
 * Normalize a DESCRIPTION value
 */
export function normalizeDescription(value: string, config: TransformConfig): string {
  let result = config.escapeDescription ? escapeUnescaped(value, ',;') : value;

  if (config.collapseDescriptionWhitespace) {
    const newline = config.newlineMode === 'literal' ? '\\n' : ' ';
    result = collapseWhitespace(result.replace(/(?:\r\n|\r|\n)+/g, newline));
  }

  return result;
}

function formatCategories(value: string[] | string, config: TransformConfig): string {
  if (!Array.isArray(value)) {
    return value;
  }
  if (config.joinCategories) {
    return [...value].sort().join(config.categoryDelimiter);
  }
  return value[0] ?? '';
}

function transformAttribute(attr: string, value: CalendarFieldValue, config: TransformConfig): string {
  if (isInstant(value)) {
    return formatInstant(value, config);
  }

  switch (attr) {
    case 'description':
      return normalizeDescription(String(value), config);
    case 'name':
      return escapeCommas(String(value));
    case 'categories':
      return formatCategories(value, config);
    default:
      return Array.isArray(value) ? value.join(config.categoryDelimiter) : value;
  }
}

/**
 * Split "<detail> - <name>" on the first hyphen
 *
 * @example
 * parseLocation('101 - Sherrerd') // { name: 'Sherrerd', id: '', detail: '101' }
 */
export function parseLocation(raw: string | undefined): LocationInfo {
  if (!raw || !raw.trim()) {
    return { name: '', id: '', detail: '' };
  }

  const hyphen = raw.indexOf('-');
  if (hyphen === -1) {
    return { name: '', id: '', detail: raw.trim() };
  }

  return {
    name: raw.slice(hyphen + 1).trim(),
    id: '',
    detail: raw.slice(0, hyphen).trim(),
  };
}

/**
 * Map one calendar entry into an output record
 */
export function mapEntry(
  entry: RawCalendarEntry,
  config: TransformConfig = DEFAULT_TRANSFORM_CONFIG,
  log?: Logger
): OutputRecord {
  const mapped: Record<string, OutputValue> = {};

  for (const [attr, field] of Object.entries(config.fieldMappings)) {
    if (config.maskedFields.has(attr)) {
      log?.trace({ attr }, 'Skipping masked attribute');
      continue;
    }

    const value = readAttribute(entry, attr);
    mapped[field] = value === undefined ? '' : transformAttribute(attr, value, config);
  }

  const record: OutputRecord = { ...mapped, location: parseLocation(entry.location) };

  for (const [field, value] of Object.entries(config.placeholders)) {
    if (!(field in record)) {
      record[field] = value;
    }
  }

  for (const [field, source] of Object.entries(config.copies)) {
    const value = record[source];
    if (value !== undefined) {
      record[field] = value;
    }
  }

  return record;
}

/**
 * Map every entry and order by start instant. Entries without a start sort first.
 */
export function mapCalendar(
  entries: readonly RawCalendarEntry[],
  config: TransformConfig = DEFAULT_TRANSFORM_CONFIG,
  log?: Logger
): OutputRecord[] {
  const startOf = (entry: RawCalendarEntry): number =>
    entry.begin ? entry.begin.date.getTime() : Number.NEGATIVE_INFINITY;

  const ordered = [...entries].sort((a, b) => {
    const left = startOf(a);
    const right = startOf(b);
    if (left === right) return 0;
    return left < right ? -1 : 1;
  });

  const records = ordered.map((entry) => mapEntry(entry, config, log));
  log?.info({ events: records.length }, 'Mapped calendar entries');
  return records;
}
