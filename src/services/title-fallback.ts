/**
 * Title Fallback Service
 * Fills missing titles from the speaker field, optionally behind a templated prefix
 */
import { OutputRecord } from '../types/index';
import { createServiceLogger, getRootLogger, Logger } from '../utils/logger';
import { collapseWhitespace, isBlank, isMissingValue } from '../utils/text';

export const MAX_PREFIX_LENGTH = 80;

export interface TitleFallbackOptions {
  overwrite?: boolean;
  /** e.g. "A {series} Talk by" */
  prefixTemplate?: string;
  log?: Logger;
}

const FIELD_REFERENCE = /\{([^{}]*)\}/g;

function isWellFormed(template: string): boolean {
  let depth = 0;
  for (const ch of template) {
    if (ch === '{') {
      depth++;
      if (depth > 1) return false;
    } else if (ch === '}') {
      depth--;
      if (depth < 0) return false;
    }
  }
  if (depth !== 0) return false;

  for (const match of template.matchAll(FIELD_REFERENCE)) {
    if (!match[1].trim()) return false;
  }
  return true;
}

/**
 * Substitute `{field}` references from the record. Unknown or non-text fields render empty;
 * a malformed template is returned as written.
 */
export function renderPrefixTemplate(template: string, record: OutputRecord): string {
  if (!isWellFormed(template)) {
    return collapseWhitespace(template);
  }

  const rendered = template.replace(FIELD_REFERENCE, (_, name: string) => {
    const value = record[name.trim()];
    return typeof value === 'string' ? value : '';
  });

  return collapseWhitespace(rendered);
}

/**
 * Title built from the speaker, with the rendered prefix when it fits
 */
export function buildFallbackTitle(speaker: string, record: OutputRecord, prefixTemplate = ''): string {
  const prefix = prefixTemplate ? renderPrefixTemplate(prefixTemplate, record) : '';
  if (!prefix || prefix.length > MAX_PREFIX_LENGTH) {
    return speaker;
  }
  return `${prefix} ${speaker}`;
}

/**
 * Set the title of every record that lacks one. Returns the number filled.
 */
export function fillTitleFallback(records: OutputRecord[], options: TitleFallbackOptions = {}): number {
  const log = options.log ?? createServiceLogger(getRootLogger(), 'title-fallback');
  const overwrite = options.overwrite ?? false;
  let filled = 0;

  for (const [index, record] of records.entries()) {
    const speaker = record.speaker;
    if (typeof speaker !== 'string' || isBlank(speaker)) {
      continue;
    }

    if (!overwrite && !isMissingValue(record.title)) {
      continue;
    }

    record.title = buildFallbackTitle(speaker.trim(), record, options.prefixTemplate);
    filled++;
    log.debug({ index, title: record.title }, 'Filled title from speaker');
  }

  log.info({ filled, overwrite }, 'Title fallback complete');
  return filled;
}
