/**
 * Main entry point for the academic calendar scraper
 * Exports all public APIs and utilities
 */

// Core services
export { fetchHTML } from './services/html-fetcher.js';
export type { PageFetcher } from './services/html-fetcher.js';
export { CLASSIFICATION_RULES, classifyTitle } from './services/event-classifier.js';
export type { ClassificationRule } from './services/event-classifier.js';
export {
  buildMonthUrl,
  parseEventsFromHTML,
  scrapeMonth,
  scrapeCalendar
} from './services/calendar-scraper.js';
export { generateSummary, generateSubject } from './services/summary.js';
export { serializeEventsJson, parseEventsJson, readEventsJson } from './services/json-exporter.js';
export { generateICS } from './services/ics-generator.js';
export { exportEvents, inferOutputKind, renderEvents } from './services/exporter.js';
export type { ExportOptions } from './services/exporter.js';
export { run } from './cli.js';

// Configuration
export { createConfigFromEnv, validateConfig } from './utils/config.js';

// Type definitions
export type {
  AcademicEvent,
  EventFlags,
  FlagName,
  CalendarVariant,
  FetchOptions,
  ScrapeOptions,
  ICSOptions,
  OutputTarget,
  AppConfig,
  PageResult,
  PageFailure,
  ScrapeResult,
  Result
} from './types/index.js';

export { ScraperError, ErrorCode, OutputKind } from './types/index.js';

export const VERSION = '1.0.0';
