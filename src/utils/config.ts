import { existsSync, readFileSync } from 'fs';
import { z } from 'zod';
import {
  ContentFormat,
  EnrichmentConfig,
  EnricherError,
  ErrorCode,
  TransformConfig,
} from '../types/index';
import { isTruthyFlag } from './text';

export const DEFAULT_CONFIG_FILE = 'transform_config.json';
export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_BOT_BYPASS_HEADER = 'x-wdsoit-bot-bypass';

/**
 * Built-in transform configuration
 */
export const DEFAULT_TRANSFORM_CONFIG: TransformConfig = Object.freeze<TransformConfig>({
  targetTimezone: process.env.TARGET_TZ || 'America/New_York',
  timeFormat: "yyyy-MM-dd'T'HH:mm:ss",
  fieldMappings: Object.freeze({
    uid: 'guid',
    begin: 'startTime',
    end: 'endTime',
    url: 'urlRef',
    categories: 'series',
    description: 'content',
    // SUMMARY carries the speaker; `title` stays a placeholder until enrichment
    name: 'speaker',
  }),
  maskedFields: new Set(['dtstamp', 'sequence', 'transp', 'class']),
  placeholders: Object.freeze({
    title: '',
    cancelled: '',
    bannerImage: '',
    itemType: 'advertisement',
  }),
  copies: Object.freeze({}),
  joinCategories: true,
  categoryDelimiter: ',',
  escapeDescription: false,
  collapseDescriptionWhitespace: true,
  newlineMode: 'space',
});

/**
 * On-disk shape of transform_config.json. Every key is optional.
 */
const TransformConfigFileSchema = z
  .object({
    target_timezone: z.string().min(1),
    time_format: z.string().min(1),
    field_mappings: z.record(z.string()),
    masked_fields: z.array(z.string()),
    placeholders: z.record(z.string()),
    copies: z.record(z.string()),
    join_categories: z.boolean(),
    category_delimiter: z.string(),
    escape_description: z.boolean(),
    collapse_whitespace: z.boolean(),
    newline_mode: z.enum(['space', 'literal']),
  })
  .partial()
  .strict();

export type TransformConfigFile = z.infer<typeof TransformConfigFileSchema>;

/**
 * Merge a parsed config document over the defaults
 */
export function buildTransformConfig(file: TransformConfigFile = {}): TransformConfig {
  const base = DEFAULT_TRANSFORM_CONFIG;
  return Object.freeze({
    targetTimezone: file.target_timezone ?? base.targetTimezone,
    timeFormat: file.time_format ?? base.timeFormat,
    fieldMappings: Object.freeze({ ...(file.field_mappings ?? base.fieldMappings) }),
    maskedFields: new Set(file.masked_fields ?? base.maskedFields),
    placeholders: Object.freeze({ ...(file.placeholders ?? base.placeholders) }),
    copies: Object.freeze({ ...(file.copies ?? base.copies) }),
    joinCategories: file.join_categories ?? base.joinCategories,
    categoryDelimiter: file.category_delimiter ?? base.categoryDelimiter,
    escapeDescription: file.escape_description ?? base.escapeDescription,
    collapseDescriptionWhitespace: file.collapse_whitespace ?? base.collapseDescriptionWhitespace,
    newlineMode: file.newline_mode ?? base.newlineMode,
  });
}

/**
 * Load transform configuration from a JSON file.
 * With no path, falls back to ./transform_config.json when present, then defaults.
 */
export function loadTransformConfig(path?: string): TransformConfig {
  const resolved = path ?? (existsSync(DEFAULT_CONFIG_FILE) ? DEFAULT_CONFIG_FILE : undefined);
  if (!resolved) {
    return DEFAULT_TRANSFORM_CONFIG;
  }

  let raw: string;
  try {
    raw = readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new EnricherError(
      `Cannot read config file: ${resolved}`,
      ErrorCode.CONFIGURATION_ERROR,
      { path: resolved, originalError: error instanceof Error ? error.message : String(error) },
      false
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new EnricherError(
      `Config file is not valid JSON: ${resolved}`,
      ErrorCode.CONFIGURATION_ERROR,
      { path: resolved, originalError: error instanceof Error ? error.message : String(error) },
      false
    );
  }

  const parsed = TransformConfigFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new EnricherError(
      `Invalid config file: ${resolved}`,
      ErrorCode.CONFIGURATION_ERROR,
      { path: resolved, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
      false
    );
  }

  return buildTransformConfig(parsed.data);
}

/**
 * Normalize a content format selector; anything unknown means plain text
 */
export function parseContentFormat(value: string | undefined): ContentFormat {
  const normalized = value?.trim().toLowerCase();
  if (normalized === 'markdown' || normalized === 'html') {
    return normalized;
  }
  return 'text';
}

function parseTimeout(value: string | undefined): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) ? parsed : DEFAULT_TIMEOUT_MS;
}

/**
 * Create enrichment config from environment variables
 */
export function createEnrichmentConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env
): EnrichmentConfig {
  return {
    titles: {
      enabled: isTruthyFlag(env.ENRICH_TITLES),
      overwrite: isTruthyFlag(env.ENRICH_OVERWRITE),
    },
    content: {
      enabled: isTruthyFlag(env.ENRICH_CONTENT),
      overwrite: isTruthyFlag(env.ENRICH_CONTENT_OVERWRITE),
      format: parseContentFormat(env.ENRICH_CONTENT_FORMAT),
    },
    rawDetails: {
      enabled: isTruthyFlag(env.ENRICH_RAW_DETAILS),
      overwrite: isTruthyFlag(env.ENRICH_RAW_DETAILS_OVERWRITE),
    },
    rawExtracts: {
      enabled: env.ENRICH_RAW_EXTRACTS === undefined || isTruthyFlag(env.ENRICH_RAW_EXTRACTS),
      overwrite: isTruthyFlag(env.ENRICH_RAW_EXTRACTS_OVERWRITE),
    },
    titleFallback: {
      enabled: env.TITLE_FALLBACK === undefined || isTruthyFlag(env.TITLE_FALLBACK),
      overwrite: false,
      prefixTemplate: env.TITLE_FALLBACK_PREFIX ?? '',
    },
    fetch: {
      timeoutMs: parseTimeout(env.ENRICH_TIMEOUT_MS),
      botBypass: {
        name: env.BOT_BYPASS_HEADER_NAME || DEFAULT_BOT_BYPASS_HEADER,
        value: env.BOT_BYPASS_HEADER_VALUE ?? '1',
      },
    },
  };
}

/**
 * Validate enrichment configuration
 */
export function validateEnrichmentConfig(config: EnrichmentConfig): string[] {
  const errors: string[] = [];

  if (config.fetch.timeoutMs <= 0) {
    errors.push('Fetch timeout must be a positive number of milliseconds');
  }

  if (config.fetch.botBypass && config.fetch.botBypass.value && !config.fetch.botBypass.name.trim()) {
    errors.push('Bot bypass header name is required when a value is set');
  }

  return errors;
}
