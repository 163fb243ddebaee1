/**
 * Main entry point for the ICS event enricher
 * Exports all public APIs and utilities
 */

// Calendar input and mapping
export { loadCalendarText, resolveCalendarLocation } from './services/calendar-source';
export { parseCalendar, parseIcsDate, parsePropertyLine, unfoldLines, unescapeText } from './services/ics-parser';
export { mapCalendar, mapEntry, parseLocation, formatInstant, normalizeDescription } from './services/record-mapper';

// Page enrichment
export { fetchPage, buildRequestHeaders } from './services/page-fetcher';
export { locateSection } from './services/section-locator';
export { serializeFragment } from './services/content-serializer';
export { extractMarkedSection, extractAbstract, extractBio } from './services/marker-extractor';
export {
  enrichTitles,
  enrichContent,
  enrichRawDetails,
  enrichRawExtracts,
  extractSection,
} from './services/enrichment-orchestrator';
export { fillTitleFallback, renderPrefixTemplate } from './services/title-fallback';
export { runPipeline } from './services/pipeline';

// Configuration and utilities
export {
  DEFAULT_TRANSFORM_CONFIG,
  buildTransformConfig,
  loadTransformConfig,
  createEnrichmentConfigFromEnv,
  validateEnrichmentConfig,
  parseContentFormat,
} from './utils/config';
export { createServiceLogger, getRootLogger } from './utils/logger';

// Type definitions
export type {
  CalendarInstant,
  RawCalendarEntry,
  OutputRecord,
  LocationInfo,
  TransformConfig,
  EnrichmentConfig,
  ContentFormat,
  FetchOptions,
  ExtractionStats,
  RawExtractStats,
  Result,
} from './types/index';
export type { SectionKind, SectionProbe } from './services/section-locator';
export type {
  PageFetcher,
  PageEnrichmentOptions,
  ContentEnrichmentOptions,
  RawExtractOptions,
} from './services/enrichment-orchestrator';
export type { PipelineOptions, PipelineResult } from './services/pipeline';

export { EnricherError, ErrorCode } from './types/index';

export const VERSION = '1.0.0';
