/**
 * Calendar Scraper Service
 * Walks the monthly calendar pages and extracts event records
 */

import * as cheerio from 'cheerio';
import {
  AcademicEvent,
  ErrorCode,
  PageFailure,
  PageResult,
  ScrapeOptions,
  ScrapeResult,
  ScraperError,
} from '../types/index.js';
import { parseCalendarDate } from '../utils/dates.js';
import { elapsed, type Logger } from '../utils/logger.js';
import { classifyTitle } from './event-classifier.js';
import { fetchHTML, type PageFetcher } from './html-fetcher.js';

export const EVENT_SELECTOR = 'a[data-info-title]';
export const MONTHS = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12] as const;

/**
 * `<baseUrl>?ano=<year>&mes=<month>`, keeping any query the base already has
 */
export function buildMonthUrl(baseUrl: string, year: number, month: number): string {
  const url = new URL(baseUrl);
  url.searchParams.set('ano', String(year));
  url.searchParams.set('mes', String(month));
  return url.toString();
}

function readDate(attribute: string, value: string | undefined, title: string): string {
  const date = parseCalendarDate(value);
  if (!date) {
    throw new ScraperError(
      value === undefined
        ? `Missing ${attribute} on event "${title.trim()}"`
        : `Unparseable ${attribute} "${value}" on event "${title.trim()}"`,
      ErrorCode.PARSE_ERROR,
      { attribute, value, title },
      false
    );
  }
  return date;
}

/**
 * Extract every event anchor of a calendar page, in document order
 */
export function parseEventsFromHTML(html: string): AcademicEvent[] {
  const $ = cheerio.load(html);
  const events: AcademicEvent[] = [];

  $(EVENT_SELECTOR).each((_, element) => {
    const anchor = $(element);
    if (!anchor.attr('data-info-title')) {
      return;
    }

    const title = anchor.text();
    events.push({
      title,
      start: readDate('data-info-init-date', anchor.attr('data-info-init-date'), title),
      end: readDate('data-info-end-date', anchor.attr('data-info-end-date'), title),
      flags: classifyTitle(title),
    });
  });

  return events;
}

/**
 * Fetch and parse a single month. Never throws; failures come back as results.
 */
export async function scrapeMonth(
  year: number,
  month: number,
  options: ScrapeOptions,
  log: Logger,
  fetchPage: PageFetcher = fetchHTML
): Promise<PageResult> {
  const url = buildMonthUrl(options.baseUrl, year, month);

  try {
    const html = await fetchPage(url, options.fetch ?? {}, log);
    const events = parseEventsFromHTML(html);
    log.debug({ year, month, eventCount: events.length }, 'Month scraped');
    return { year, month, url, success: true, data: events };
  } catch (error) {
    const scraperError =
      error instanceof ScraperError
        ? error
        : new ScraperError(
            `Failed to scrape ${url}: ${error instanceof Error ? error.message : String(error)}`,
            ErrorCode.INTERNAL_ERROR,
            { url },
            false
          );
    log.warn({ err: scraperError, year, month }, 'Month failed');
    return { year, month, url, success: false, error: scraperError };
  }
}

/**
 * Scrape every month of every year, sequentially and in order.
 *
 * With `failFast` the first failed page is rethrown. Otherwise failures are
 * collected and the remaining months are still visited.
 */
export async function scrapeCalendar(
  years: Iterable<number>,
  options: ScrapeOptions,
  log: Logger,
  fetchPage: PageFetcher = fetchHTML
): Promise<ScrapeResult> {
  const startTime = Date.now();
  const events: AcademicEvent[] = [];
  const pages: PageResult[] = [];
  const failures: PageFailure[] = [];

  for (const year of years) {
    for (const month of MONTHS) {
      const page = await scrapeMonth(year, month, options, log, fetchPage);
      pages.push(page);

      if (page.success) {
        events.push(...page.data);
        continue;
      }

      if (options.failFast) {
        throw page.error;
      }
      failures.push({ year, month, url: page.url, error: page.error });
    }
  }

  log.info(
    {
      pageCount: pages.length,
      eventCount: events.length,
      failedPages: failures.length,
      durationMs: elapsed(startTime),
    },
    'Scrape complete'
  );

  return { events, pages, failures };
}
