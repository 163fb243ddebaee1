#!/usr/bin/env node
/**
 * Command line entry point
 * Flags that are set win over the environment.
 */
import { writeFileSync } from 'fs';
import { Command, InvalidArgumentError, Option } from 'commander';
import { EnricherError, EnrichmentConfig, ErrorCode } from './types/index';
import {
  createEnrichmentConfigFromEnv,
  loadTransformConfig,
  parseContentFormat,
  validateEnrichmentConfig,
} from './utils/config';
import { createServiceLogger, getRootLogger } from './utils/logger';
import { runPipeline } from './services/pipeline';
import { PageFetcher } from './services/enrichment-orchestrator';

export const DEFAULT_OUTPUT_FILE = 'events.json';

export interface CliOptions {
  icsUrl?: string;
  output: string;
  config?: string;
  printOnly?: boolean;
  limit?: number;
  enrichTitles?: boolean;
  enrichOverwrite?: boolean;
  enrichContent?: boolean;
  enrichContentOverwrite?: boolean;
  contentFormat?: string;
  enrichRawDetails?: boolean;
  enrichRawDetailsOverwrite?: boolean;
  /** false only when --no-enrich-raw-extracts is given */
  enrichRawExtracts?: boolean;
  enrichRawExtractsOverwrite?: boolean;
  /** false only when --no-title-fallback is given */
  titleFallback?: boolean;
  titlePrefix?: string;
  timeout?: number;
}

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function buildProgram(env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name('ics-enrich')
    .description('Convert an iCalendar feed into enriched event JSON')
    .option('--ics-url <url>', 'calendar URL, file:// URL or local path (env ICS_URL)', env.ICS_URL)
    .option('--output <file>', 'output JSON file (env OUTPUT_FILE)', env.OUTPUT_FILE || DEFAULT_OUTPUT_FILE)
    .option('--config <file>', 'transform config JSON (default: ./transform_config.json if present)')
    .option('--print-only', 'print JSON to stdout instead of writing the output file')
    .option('--limit <n>', 'keep only the first N events', parseNonNegativeInt)
    .option('--enrich-titles', "fill 'title' from each event page subtitle")
    .option('--enrich-overwrite', 'overwrite existing titles when enriching')
    .option('--enrich-content', "fill 'content' from each event page body")
    .option('--enrich-content-overwrite', 'overwrite existing content when enriching')
    .addOption(
      new Option('--content-format <format>', 'content serialization').choices(['text', 'markdown', 'html'])
    )
    .option('--enrich-raw-details', "fill 'rawEventDetails' with the details container HTML")
    .option('--enrich-raw-details-overwrite', 'overwrite existing raw details when enriching')
    .option('--no-enrich-raw-extracts', 'skip Abstract/Bio extraction from raw details')
    .option('--enrich-raw-extracts-overwrite', 'overwrite existing Abstract/Bio extracts')
    .option('--no-title-fallback', 'do not fill missing titles from the speaker')
    .option('--title-prefix <template>', 'prefix for fallback titles, e.g. "A {series} Talk by"')
    .option('--timeout <ms>', 'per-request timeout in milliseconds', parseNonNegativeInt);
}

/**
 * Layer set CLI flags over the environment-derived config
 */
export function applyCliOverrides(config: EnrichmentConfig, opts: CliOptions): EnrichmentConfig {
  return {
    titles: {
      enabled: opts.enrichTitles || config.titles.enabled,
      overwrite: opts.enrichOverwrite || config.titles.overwrite,
    },
    content: {
      enabled: opts.enrichContent || config.content.enabled,
      overwrite: opts.enrichContentOverwrite || config.content.overwrite,
      format: opts.contentFormat ? parseContentFormat(opts.contentFormat) : config.content.format,
    },
    rawDetails: {
      enabled: opts.enrichRawDetails || config.rawDetails.enabled,
      overwrite: opts.enrichRawDetailsOverwrite || config.rawDetails.overwrite,
    },
    rawExtracts: {
      enabled: opts.enrichRawExtracts === false ? false : config.rawExtracts.enabled,
      overwrite: opts.enrichRawExtractsOverwrite || config.rawExtracts.overwrite,
    },
    titleFallback: {
      ...config.titleFallback,
      enabled: opts.titleFallback === false ? false : config.titleFallback.enabled,
      prefixTemplate: opts.titlePrefix ?? config.titleFallback.prefixTemplate,
    },
    fetch: {
      ...config.fetch,
      timeoutMs: opts.timeout ?? config.fetch.timeoutMs,
    },
  };
}

export interface MainDependencies {
  env?: NodeJS.ProcessEnv;
  fetchPage?: PageFetcher;
  stdout?: (text: string) => void;
}

/**
 * Run the CLI. Resolves to the process exit code.
 */
export async function main(argv: string[] = process.argv, deps: MainDependencies = {}): Promise<number> {
  const env = deps.env ?? process.env;
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const log = createServiceLogger(getRootLogger(), 'cli');

  const program = buildProgram(env);
  program.parse(argv);
  const opts = program.opts<CliOptions>();

  try {
    if (!opts.icsUrl) {
      throw new EnricherError(
        'No calendar location given; pass --ics-url or set ICS_URL',
        ErrorCode.CONFIGURATION_ERROR,
        {},
        false
      );
    }

    const enrichment = applyCliOverrides(createEnrichmentConfigFromEnv(env), opts);
    const problems = validateEnrichmentConfig(enrichment);
    if (problems.length > 0) {
      throw new EnricherError('Invalid enrichment configuration', ErrorCode.CONFIGURATION_ERROR, { problems }, false);
    }

    const result = await runPipeline({
      icsUrl: opts.icsUrl,
      transform: loadTransformConfig(opts.config),
      enrichment,
      limit: opts.limit,
      fetchPage: deps.fetchPage,
    });

    const json = JSON.stringify(result.records, null, 2);
    if (opts.printOnly) {
      stdout(`${json}\n`);
    } else {
      writeFileSync(opts.output, json, 'utf-8');
      log.info({ output: opts.output, events: result.records.length }, 'Wrote events');
    }
    return 0;
  } catch (error) {
    log.fatal({ err: error }, 'Run failed');
    return 1;
  }
}

if (require.main === module) {
  void main().then((code) => {
    process.exitCode = code;
  });
}
