#!/usr/bin/env node
/**
 * Batch entry point: scrape the configured years and write every output.
 *
 * Usage: calendario-academico [output-path ...]
 * Without arguments the JSON and ICS paths from the environment are written.
 */

import { scrapeCalendar } from './services/calendar-scraper.js';
import { exportEvents, inferOutputKind } from './services/exporter.js';
import { fetchHTML, type PageFetcher } from './services/html-fetcher.js';
import {
  AppConfig,
  ErrorCode,
  OutputKind,
  OutputTarget,
  PageFailure,
  ScrapeResult,
  ScraperError,
} from './types/index.js';
import { createConfigFromEnv } from './utils/config.js';
import { yearRange } from './utils/dates.js';
import {
  createRunLogger,
  createServiceLogger,
  elapsed,
  generateRunId,
  type Logger,
} from './utils/logger.js';

export interface RunOptions {
  argv?: string[];
  env?: NodeJS.ProcessEnv;
  now?: Date;
  fetchPage?: PageFetcher;
  log?: Logger;
}

function asScraperError(error: unknown): ScraperError {
  if (error instanceof ScraperError) {
    return error;
  }
  return new ScraperError(
    error instanceof Error ? error.message : String(error),
    ErrorCode.INTERNAL_ERROR
  );
}

/**
 * One line per failed month, e.g. `2025-03 HTTP_SERVER_ERROR: Server error: 500 Internal Server Error`
 */
export function formatFailureSummary(failures: readonly PageFailure[]): string[] {
  return failures.map(
    ({ year, month, error }) =>
      `${year}-${String(month).padStart(2, '0')} ${error.code}: ${error.message}`
  );
}

function resolveOutputs(argv: string[], config: AppConfig): { path: string; kind: OutputKind }[] {
  const targets: OutputTarget[] = argv.length > 0 ? argv.map((path) => ({ path })) : config.outputs;
  return targets.map((target) => ({
    path: target.path,
    kind: target.kind ?? inferOutputKind(target.path),
  }));
}

/**
 * Run the whole pipeline. Resolves to the process exit code.
 */
export async function run(options: RunOptions = {}): Promise<number> {
  const startTime = Date.now();
  const runLog = options.log ?? createRunLogger({ runId: generateRunId() });
  const log = createServiceLogger(runLog, 'cli');

  let config: AppConfig;
  let outputs: { path: string; kind: OutputKind }[];
  try {
    config = createConfigFromEnv(options.env ?? process.env, options.now ?? new Date());
    outputs = resolveOutputs(options.argv ?? [], config);
  } catch (error) {
    log.error({ err: asScraperError(error) }, 'Cannot start');
    return 1;
  }

  const years = yearRange(config.years.first, config.years.last);
  log.info(
    { years, variant: config.ics.variant, outputs: outputs.map((output) => output.path) },
    'Run started'
  );

  let result: ScrapeResult;
  try {
    result = await scrapeCalendar(
      years,
      config.scrape,
      createServiceLogger(runLog, 'scraper'),
      options.fetchPage ?? fetchHTML
    );
  } catch (error) {
    log.error({ err: asScraperError(error) }, 'Scrape aborted');
    return 1;
  }

  if (result.failures.length > 0 && result.failures.length === result.pages.length) {
    log.error(
      { failures: formatFailureSummary(result.failures) },
      'Every page failed, nothing exported'
    );
    return 1;
  }

  const exportLog = createServiceLogger(runLog, 'exporter');
  const icsOptions = { ...config.ics, now: options.now ?? new Date() };
  for (const output of outputs) {
    try {
      await exportEvents(result.events, output.path, { kind: output.kind, ics: icsOptions }, exportLog);
    } catch (error) {
      log.error({ err: asScraperError(error), path: output.path }, 'Export failed');
      return 1;
    }
  }

  if (result.failures.length > 0) {
    log.warn(
      {
        failedPages: result.failures.length,
        totalPages: result.pages.length,
        failures: formatFailureSummary(result.failures),
      },
      'Exported with missing months'
    );
    return 1;
  }

  log.info(
    { eventCount: result.events.length, durationMs: elapsed(startTime) },
    'Run complete'
  );
  return 0;
}

if (require.main === module) {
  run().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    }
  );
}
