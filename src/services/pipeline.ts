/**
 * Pipeline Service
 * Runs the stages in order: load → parse → map → enrich → title fallback → limit
 */
import {
  EnrichmentConfig,
  ExtractionStats,
  OutputRecord,
  RawExtractStats,
  TransformConfig,
} from '../types/index';
import { DEFAULT_TRANSFORM_CONFIG } from '../utils/config';
import { createServiceLogger, elapsed, getRootLogger, Logger } from '../utils/logger';
import { loadCalendarText } from './calendar-source';
import {
  enrichContent,
  enrichRawDetails,
  enrichRawExtracts,
  enrichTitles,
  PageFetcher,
} from './enrichment-orchestrator';
import { parseCalendar } from './ics-parser';
import { mapCalendar } from './record-mapper';
import { fillTitleFallback } from './title-fallback';

export interface PipelineOptions {
  /** http(s) URL, file:// URL or local path */
  icsUrl: string;
  transform?: TransformConfig;
  enrichment: EnrichmentConfig;
  /** Keep only the first N records */
  limit?: number;
  fetchPage?: PageFetcher;
  log?: Logger;
}

export interface PipelineResult {
  records: OutputRecord[];
  stats: {
    titles: ExtractionStats;
    titleFallbackFilled: number;
    content: ExtractionStats;
    rawDetails: ExtractionStats;
    rawExtracts: RawExtractStats;
  };
  durationMs: number;
}

/**
 * Run the whole pipeline. Only calendar loading and parsing can fail it.
 */
export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const startTime = Date.now();
  const root = options.log ?? getRootLogger();
  const config = options.transform ?? DEFAULT_TRANSFORM_CONFIG;
  const { enrichment } = options;

  const calendarLog = createServiceLogger(root, 'calendar');
  const text = await loadCalendarText(options.icsUrl, { timeoutMs: enrichment.fetch.timeoutMs, log: calendarLog });
  const entries = parseCalendar(text);
  calendarLog.info({ entries: entries.length }, 'Parsed calendar');

  let records = mapCalendar(entries, config, createServiceLogger(root, 'mapper'));

  const enrichLog = createServiceLogger(root, 'enrichment');
  const page = {
    timeoutMs: enrichment.fetch.timeoutMs,
    botBypass: enrichment.fetch.botBypass,
    fetchPage: options.fetchPage,
    log: enrichLog,
  };

  const titles = await enrichTitles(records, { ...page, ...enrichment.titles });

  const titleFallbackFilled = enrichment.titleFallback.enabled
    ? fillTitleFallback(records, {
        overwrite: enrichment.titleFallback.overwrite,
        prefixTemplate: enrichment.titleFallback.prefixTemplate,
        log: createServiceLogger(root, 'title-fallback'),
      })
    : 0;

  const content = await enrichContent(records, {
    ...page,
    ...enrichment.content,
  });
  const rawDetails = await enrichRawDetails(records, { ...page, ...enrichment.rawDetails });
  const rawExtracts = enrichRawExtracts(records, { ...enrichment.rawExtracts, log: enrichLog });

  if (options.limit !== undefined && options.limit >= 0) {
    records = records.slice(0, options.limit);
  }

  const durationMs = elapsed(startTime);
  root.info({ events: records.length, durationMs }, 'Pipeline complete');

  return {
    records,
    stats: { titles, titleFallbackFilled, content, rawDetails, rawExtracts },
    durationMs,
  };
}
