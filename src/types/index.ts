/**
 * Core type definitions for the ICS event enricher
 */

// =============================================================================
// Calendar Input Types
// =============================================================================

/**
 * A point in time together with the zone it was declared in
 */
export interface CalendarInstant {
  date: Date;

  /** IANA zone from TZID, or 'UTC' for Z-suffixed, floating and date-only values */
  timeZone: string;
}

/**
 * One VEVENT as read from the feed. Read-only to the mapper.
 */
export interface RawCalendarEntry {
  uid?: string;
  begin?: CalendarInstant;
  end?: CalendarInstant;
  /** SUMMARY */
  name?: string;
  description?: string;
  url?: string;
  location?: string;
  categories?: string[] | string;

  /** Every other property, keyed by lower-cased property name */
  properties: Record<string, string>;
}

export type CalendarFieldValue = string | string[] | CalendarInstant;

// =============================================================================
// Output Types
// =============================================================================

export interface LocationInfo {
  name: string;
  id: string;
  detail: string;
}

export type OutputValue = string | LocationInfo;

/**
 * Flat event record handed to the writer. Keys beyond `location` come from
 * the field mapping, placeholders, copies and enrichment.
 */
export interface OutputRecord {
  location: LocationInfo;
  [field: string]: OutputValue;
}

// =============================================================================
// Configuration Types
// =============================================================================

export type NewlineMode = 'space' | 'literal';

export interface TransformConfig {
  targetTimezone: string;
  /** date-fns format tokens */
  timeFormat: string;
  /** logical attribute name -> output field */
  fieldMappings: Readonly<Record<string, string>>;
  maskedFields: ReadonlySet<string>;
  placeholders: Readonly<Record<string, string>>;
  /** new field -> existing field */
  copies: Readonly<Record<string, string>>;
  joinCategories: boolean;
  categoryDelimiter: string;
  escapeDescription: boolean;
  collapseDescriptionWhitespace: boolean;
  newlineMode: NewlineMode;
}

export type ContentFormat = 'text' | 'markdown' | 'html';

export interface BotBypassHeader {
  name: string;
  /** Header is omitted when empty */
  value: string;
}

export interface FetchOptions {
  timeoutMs: number;
  botBypass?: BotBypassHeader;
}

export interface FieldEnrichmentToggle {
  enabled: boolean;
  overwrite: boolean;
}

export interface EnrichmentConfig {
  titles: FieldEnrichmentToggle;
  content: FieldEnrichmentToggle & { format: ContentFormat };
  rawDetails: FieldEnrichmentToggle;
  rawExtracts: FieldEnrichmentToggle;
  titleFallback: {
    enabled: boolean;
    overwrite: boolean;
    prefixTemplate: string;
  };
  fetch: FetchOptions;
}

// =============================================================================
// Result Types
// =============================================================================

export interface ExtractionStats {
  attempted: number;
  updated: number;
  skippedMissingUrl: number;
  errors: number;
}

export interface RawExtractStats {
  attempted: number;
  updatedAbstract: number;
  updatedBio: number;
  skippedMissingDetails: number;
  errors: number;
}

export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: EnricherError };

// =============================================================================
// Error Handling
// =============================================================================

export class EnricherError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'EnricherError';
  }
}

export enum ErrorCode {
  // Network errors
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  DNS_FAILURE = 'DNS_FAILURE',

  // HTTP errors
  HTTP_NOT_FOUND = 'HTTP_NOT_FOUND',
  HTTP_CLIENT_ERROR = 'HTTP_CLIENT_ERROR',
  HTTP_SERVER_ERROR = 'HTTP_SERVER_ERROR',

  // Parsing errors
  PARSE_ERROR = 'PARSE_ERROR',
  INVALID_HTML = 'INVALID_HTML',

  // Calendar input
  CALENDAR_FETCH_ERROR = 'CALENDAR_FETCH_ERROR',

  // System errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
