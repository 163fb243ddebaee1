/**
 * Enrichment Orchestrator Service
 * Fills record fields from each event's detail page: subtitle, body content and raw
 * details, plus Abstract/Bio extracts taken from the stored raw details.
 */
import * as cheerio from 'cheerio';
import {
  BotBypassHeader,
  ContentFormat,
  ExtractionStats,
  FetchOptions,
  OutputRecord,
  RawExtractStats,
  Result,
} from '../types/index';
import { DEFAULT_TIMEOUT_MS } from '../utils/config';
import { createServiceLogger, elapsed, getRootLogger, Logger } from '../utils/logger';
import { collapseWhitespace, isBlank } from '../utils/text';
import { serializeFragment } from './content-serializer';
import { extractMarkedSection } from './marker-extractor';
import { fetchPage } from './page-fetcher';
import { locateSection, SectionKind } from './section-locator';

export const TITLE_FIELD = 'title';
export const CONTENT_FIELD = 'content';
export const RAW_DETAILS_FIELD = 'rawEventDetails';
export const RAW_ABSTRACT_FIELD = 'rawExtractAbstract';
export const RAW_BIO_FIELD = 'rawExtractBio';

export type PageFetcher = (url: string, options: FetchOptions, log?: Logger) => Promise<Result<string>>;

export type SectionExtractor = (rawHtml: string, marker: string) => string;

export interface PageEnrichmentOptions {
  enabled: boolean;
  overwrite?: boolean;
  timeoutMs?: number;
  botBypass?: BotBypassHeader;
  /** Defaults to the node-fetch backed fetcher */
  fetchPage?: PageFetcher;
  log?: Logger;
}

export interface ContentEnrichmentOptions extends PageEnrichmentOptions {
  format?: ContentFormat;
}

export interface RawExtractOptions {
  enabled: boolean;
  overwrite?: boolean;
  extractSection?: SectionExtractor;
  log?: Logger;
}

/**
 * How one field is derived from a fetched page
 */
interface PageFieldPlan {
  field: string;
  kind: SectionKind;
  extract: (html: string) => string;
}

export function createExtractionStats(): ExtractionStats {
  return { attempted: 0, updated: 0, skippedMissingUrl: 0, errors: 0 };
}

export function createRawExtractStats(): RawExtractStats {
  return { attempted: 0, updatedAbstract: 0, updatedBio: 0, skippedMissingDetails: 0, errors: 0 };
}

/**
 * Locate a section in page HTML and serialize it, or "" when absent
 */
export function extractSection(html: string, kind: SectionKind, format: ContentFormat): string {
  const $ = cheerio.load(html);
  const fragment = locateSection($, kind);
  return fragment ? serializeFragment($, fragment, format) : '';
}

function resolveLog(log: Logger | undefined): Logger {
  return log ?? createServiceLogger(getRootLogger(), 'enrichment');
}

function shouldWrite(existing: unknown, overwrite: boolean): boolean {
  return overwrite || isBlank(existing);
}

/**
 * Shared fetch → locate → serialize loop. One fetch per distinct URL per call.
 */
async function enrichFromPages(
  records: OutputRecord[],
  plan: PageFieldPlan,
  options: PageEnrichmentOptions
): Promise<ExtractionStats> {
  const stats = createExtractionStats();
  if (!options.enabled) {
    return stats;
  }

  const log = resolveLog(options.log).child({ field: plan.field });
  const fetcher = options.fetchPage ?? fetchPage;
  const fetchOptions: FetchOptions = {
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    botBypass: options.botBypass,
  };
  const overwrite = options.overwrite ?? false;
  const cache = new Map<string, string>();
  const startTime = Date.now();

  for (const [index, record] of records.entries()) {
    const urlRef = record.urlRef;
    const url = typeof urlRef === 'string' ? urlRef.trim() : '';
    if (!url) {
      stats.skippedMissingUrl++;
      log.debug({ index }, 'Skipping record without URL');
      continue;
    }

    stats.attempted++;

    let value = cache.get(url);
    if (value !== undefined) {
      log.debug({ url, length: value.length }, 'Cache hit');
    } else {
      try {
        const page = await fetcher(url, fetchOptions, log);
        if (!page.success) {
          stats.errors++;
          cache.set(url, '');
          log.debug({ url, code: page.error.code }, 'Fetch failed');
          continue;
        }
        value = plan.extract(page.data);
      } catch (error) {
        stats.errors++;
        cache.set(url, '');
        log.debug({ url, err: error }, 'Extraction failed');
        continue;
      }
      cache.set(url, value);
      log.debug({ url, kind: plan.kind, length: value.length }, 'Fetched');
    }

    if (!value) {
      log.debug({ url, kind: plan.kind }, 'Nothing extracted');
      continue;
    }

    const existing = record[plan.field];
    if (shouldWrite(existing, overwrite)) {
      record[plan.field] = value;
      stats.updated++;
      log.debug({ url, overwrote: !isBlank(existing) }, 'Updated');
    } else {
      log.debug({ url }, 'Keeping existing value');
    }
  }

  log.info({ ...stats, overwrite, durationMs: elapsed(startTime) }, 'Page enrichment complete');
  return stats;
}

/**
 * Fill `title` from the page subtitle
 */
export function enrichTitles(records: OutputRecord[], options: PageEnrichmentOptions): Promise<ExtractionStats> {
  return enrichFromPages(
    records,
    {
      field: TITLE_FIELD,
      kind: 'subtitle',
      extract: (html) => collapseWhitespace(extractSection(html, 'subtitle', 'text')),
    },
    options
  );
}

/**
 * Fill `content` from the page body in the configured format
 */
export function enrichContent(records: OutputRecord[], options: ContentEnrichmentOptions): Promise<ExtractionStats> {
  const format = options.format ?? 'text';
  return enrichFromPages(
    records,
    {
      field: CONTENT_FIELD,
      kind: 'content-body',
      extract: (html) => extractSection(html, 'content-body', format),
    },
    options
  );
}

/**
 * Fill `rawEventDetails` with the inner HTML of the details container
 */
export function enrichRawDetails(records: OutputRecord[], options: PageEnrichmentOptions): Promise<ExtractionStats> {
  return enrichFromPages(
    records,
    {
      field: RAW_DETAILS_FIELD,
      kind: 'raw-details',
      extract: (html) => extractSection(html, 'raw-details', 'html'),
    },
    options
  );
}

/**
 * Derive `rawExtractAbstract` and `rawExtractBio` from `rawEventDetails`. No network.
 */
export function enrichRawExtracts(records: OutputRecord[], options: RawExtractOptions): RawExtractStats {
  const stats = createRawExtractStats();
  if (!options.enabled) {
    return stats;
  }

  const log = resolveLog(options.log).child({ field: 'rawExtracts' });
  const extract = options.extractSection ?? extractMarkedSection;
  const overwrite = options.overwrite ?? false;
  const targets = [
    { marker: 'Abstract', field: RAW_ABSTRACT_FIELD, counter: 'updatedAbstract' },
    { marker: 'Bio', field: RAW_BIO_FIELD, counter: 'updatedBio' },
  ] as const;

  for (const [index, record] of records.entries()) {
    const details = record[RAW_DETAILS_FIELD];
    if (typeof details !== 'string' || isBlank(details)) {
      stats.skippedMissingDetails++;
      log.debug({ index }, 'Skipping record without raw details');
      continue;
    }

    stats.attempted++;

    for (const { marker, field, counter } of targets) {
      let value: string;
      try {
        value = extract(details, marker);
      } catch (error) {
        stats.errors++;
        log.debug({ index, marker, err: error }, 'Marker extraction failed');
        continue;
      }

      if (!value.trim()) continue;

      if (shouldWrite(record[field], overwrite)) {
        record[field] = value;
        stats[counter]++;
        log.debug({ index, marker, length: value.length }, 'Updated');
      }
    }
  }

  log.info({ ...stats, overwrite }, 'Raw extract enrichment complete');
  return stats;
}
