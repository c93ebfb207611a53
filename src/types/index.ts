/**
 * Core type definitions for the academic calendar scraper
 */

// =============================================================================
// Core Event Types
// =============================================================================

/**
 * Classification flags derived from an event title
 */
export interface EventFlags {
  grad: boolean;
  pos: boolean;
  matricula: boolean;
  trancamento: boolean;
  feriado: boolean;
  importante: boolean;
}

export type FlagName = keyof EventFlags;

/**
 * One academic-calendar entry. Dates are calendar dates in `YYYY-MM-DD` form.
 */
export interface AcademicEvent {
  readonly title: string;
  readonly start: string;
  readonly end: string;
  readonly flags: Readonly<EventFlags>;
}

/**
 * Which generation of the published calendar to reproduce.
 * `legacy` uses the older summary wording and omits calendar metadata and alarms.
 */
export type CalendarVariant = 'current' | 'legacy';

export enum OutputKind {
  JSON = 'json',
  ICS = 'ics',
}

// =============================================================================
// Configuration Types
// =============================================================================

export interface FetchOptions {
  timeout?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

export interface ScrapeOptions {
  baseUrl: string;
  fetch?: FetchOptions;
  /** Rethrow the first page failure instead of collecting it */
  failFast?: boolean;
}

export interface ICSOptions {
  variant: CalendarVariant;
  prodId: string;
  calendarName: string;
  color: string;
  url?: string;
  sourceUrl?: string;
  timezone: string;
  /** Refresh interval hint in seconds */
  refreshInterval: number;
  /** Generation time, used for DTSTAMP and the last-modified marker */
  now?: Date;
}

export interface OutputTarget {
  path: string;
  kind?: OutputKind;
}

export interface AppConfig {
  scrape: ScrapeOptions;
  years: {
    first: number;
    last: number;
  };
  ics: ICSOptions;
  outputs: OutputTarget[];
}

// =============================================================================
// Result Types
// =============================================================================

export type Result<T> =
  | { success: true; data: T }
  | { success: false; error: ScraperError };

export interface PageRef {
  year: number;
  month: number;
  url: string;
}

export type PageResult = PageRef & Result<AcademicEvent[]>;

export interface PageFailure extends PageRef {
  error: ScraperError;
}

export interface ScrapeResult {
  events: AcademicEvent[];
  pages: PageResult[];
  failures: PageFailure[];
}

// =============================================================================
// Error Handling
// =============================================================================

export class ScraperError extends Error {
  constructor(
    message: string,
    public code: ErrorCode,
    public details?: Record<string, unknown>,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'ScraperError';
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
  INVALID_HTML = 'INVALID_HTML',
  PARSE_ERROR = 'PARSE_ERROR',

  // Output errors
  UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
  WRITE_ERROR = 'WRITE_ERROR',

  // System errors
  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}
