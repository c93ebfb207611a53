/**
 * Tests for the monthly calendar scraper
 */

import {
  buildMonthUrl,
  parseEventsFromHTML,
  scrapeCalendar,
  scrapeMonth
} from '../../src/services/calendar-scraper.js';
import { ErrorCode, ScraperError, ScrapeOptions } from '../../src/types/index.js';
import { fakeFetcher, loadFixture, testLogger } from '../helpers.js';

const options: ScrapeOptions = {
  baseUrl: 'https://example.com/calendario',
  fetch: { timeout: 5000, userAgent: 'test-agent' },
};

function page(...anchors: string[]): string {
  return `<html><body><ul>${anchors.map((anchor) => `<li>${anchor}</li>`).join('')}</ul></body></html>`;
}

function anchor(title: string, start: string, end: string = start): string {
  return `<a data-info-title="${title}" data-info-init-date="${start}" data-info-end-date="${end}">${title}</a>`;
}

describe('Calendar Scraper', () => {
  const log = testLogger();

  describe('buildMonthUrl', () => {
    it('should append year and month as query parameters', () => {
      expect(buildMonthUrl('https://example.com/calendario', 2025, 3))
        .toBe('https://example.com/calendario?ano=2025&mes=3');
    });

    it('should keep an existing query', () => {
      expect(buildMonthUrl('https://example.com/calendario?lang=pt', 2026, 11))
        .toBe('https://example.com/calendario?lang=pt&ano=2026&mes=11');
    });
  });

  describe('parseEventsFromHTML', () => {
    it('should extract titled anchors in document order', () => {
      const events = parseEventsFromHTML(loadFixture('calendar-2025-03.html'));

      expect(events).toEqual([
        {
          title: 'Início do período de Matrícula para Graduação',
          start: '2025-03-10',
          end: '2025-03-14',
          flags: {
            grad: true,
            pos: false,
            matricula: true,
            trancamento: false,
            feriado: false,
            importante: true,
          },
        },
        {
          title: 'Feriado de Carnaval',
          start: '2025-03-04',
          end: '2025-03-04',
          flags: {
            grad: false,
            pos: false,
            matricula: false,
            trancamento: false,
            feriado: true,
            importante: false,
          },
        },
        {
          title: 'Data-limite para Trancamento de matrícula na Pós-Graduação',
          start: '2025-03-17',
          end: '2025-03-21',
          flags: {
            grad: true,
            pos: true,
            matricula: true,
            trancamento: true,
            feriado: false,
            importante: true,
          },
        },
      ]);
    });

    it('should return no events for a page without anchors', () => {
      expect(parseEventsFromHTML(loadFixture('calendar-empty.html'))).toEqual([]);
    });

    it('should keep the raw element text as title', () => {
      const html = page('<a data-info-title="x" data-info-init-date="2025-05-02" data-info-end-date="2025-05-02"> Semana <b>do</b> Conhecimento </a>');

      expect(parseEventsFromHTML(html)[0].title).toBe(' Semana do Conhecimento ');
    });

    it('should fail on an unparseable date', () => {
      const html = page(anchor('Colação de grau', 'em breve'));

      expect(() => parseEventsFromHTML(html)).toThrow(ScraperError);
      expect(() => parseEventsFromHTML(html))
        .toThrow('Unparseable data-info-init-date "em breve" on event "Colação de grau"');
    });

    it('should fail on a missing date attribute', () => {
      const html = page('<a data-info-title="Provas" data-info-init-date="2025-06-02">Provas</a>');

      expect(() => parseEventsFromHTML(html))
        .toThrow('Missing data-info-end-date on event "Provas"');
    });
  });

  describe('scrapeMonth', () => {
    it('should return the page events on success', async () => {
      const fetchPage = fakeFetcher({ '2025-3': loadFixture('calendar-2025-03.html') });

      const result = await scrapeMonth(2025, 3, options, log, fetchPage);

      expect(result.success).toBe(true);
      expect(result.url).toBe('https://example.com/calendario?ano=2025&mes=3');
      expect(result.success && result.data).toHaveLength(3);
      expect(fetchPage).toHaveBeenCalledWith(
        'https://example.com/calendario?ano=2025&mes=3',
        { timeout: 5000, userAgent: 'test-agent' },
        log
      );
    });

    it('should report fetch failures as results', async () => {
      const failure = new ScraperError('Server error: 503 Service Unavailable', ErrorCode.HTTP_SERVER_ERROR, {}, true);
      const fetchPage = fakeFetcher({ '2025-4': failure });

      const result = await scrapeMonth(2025, 4, options, log, fetchPage);

      expect(result).toMatchObject({ year: 2025, month: 4, success: false });
      expect(!result.success && result.error).toBe(failure);
    });

    it('should report parse failures as results', async () => {
      const fetchPage = fakeFetcher({ '2025-5': page(anchor('Provas', '31/02/2025x')) });

      const result = await scrapeMonth(2025, 5, options, log, fetchPage);

      expect(!result.success && result.error.code).toBe(ErrorCode.PARSE_ERROR);
    });

    it('should wrap unexpected errors', async () => {
      const fetchPage = fakeFetcher({ '2025-6': new TypeError('boom') });

      const result = await scrapeMonth(2025, 6, options, log, fetchPage);

      expect(!result.success && result.error.code).toBe(ErrorCode.INTERNAL_ERROR);
      expect(!result.success && result.error.message)
        .toBe('Failed to scrape https://example.com/calendario?ano=2025&mes=6: boom');
    });
  });

  describe('scrapeCalendar', () => {
    it('should fetch twelve months per year, in order', async () => {
      const fetchPage = fakeFetcher({});

      const result = await scrapeCalendar([2025, 2026], options, log, fetchPage);

      expect(fetchPage).toHaveBeenCalledTimes(24);
      expect(fetchPage.mock.calls[0][0]).toBe('https://example.com/calendario?ano=2025&mes=1');
      expect(fetchPage.mock.calls[11][0]).toBe('https://example.com/calendario?ano=2025&mes=12');
      expect(fetchPage.mock.calls[12][0]).toBe('https://example.com/calendario?ano=2026&mes=1');
      expect(result.pages).toHaveLength(24);
      expect(result.events).toEqual([]);
      expect(result.failures).toEqual([]);
    });

    it('should order events by year, then month, then document position', async () => {
      const fetchPage = fakeFetcher({
        '2025-2': page(anchor('Fevereiro A', '2025-02-03'), anchor('Fevereiro B', '2025-02-20')),
        '2025-11': page(anchor('Novembro', '2025-11-15')),
        '2026-1': page(anchor('Janeiro', '2026-01-05')),
      });

      const result = await scrapeCalendar([2025, 2026], options, log, fetchPage);

      expect(result.events.map((event) => event.title))
        .toEqual(['Fevereiro A', 'Fevereiro B', 'Novembro', 'Janeiro']);
    });

    it('should keep repeated events from different months', async () => {
      const multiMonth = anchor('Recesso escolar', '2025-07-20', '2025-08-03');
      const fetchPage = fakeFetcher({ '2025-7': page(multiMonth), '2025-8': page(multiMonth) });

      const result = await scrapeCalendar([2025], options, log, fetchPage);

      expect(result.events).toHaveLength(2);
      expect(result.events[0]).toEqual(result.events[1]);
    });

    it('should collect failures and keep going', async () => {
      const fetchPage = fakeFetcher({
        '2025-3': loadFixture('calendar-2025-03.html'),
        '2025-6': new ScraperError('Page not found', ErrorCode.HTTP_NOT_FOUND),
      });

      const result = await scrapeCalendar([2025], options, log, fetchPage);

      expect(fetchPage).toHaveBeenCalledTimes(12);
      expect(result.events).toHaveLength(3);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]).toMatchObject({
        year: 2025,
        month: 6,
        url: 'https://example.com/calendario?ano=2025&mes=6',
        error: { code: ErrorCode.HTTP_NOT_FOUND },
      });
    });

    it('should stop at the first failure with failFast', async () => {
      const fetchPage = fakeFetcher({
        '2025-2': new ScraperError('Request timeout after 5000ms', ErrorCode.TIMEOUT, {}, true),
      });

      await expect(scrapeCalendar([2025], { ...options, failFast: true }, log, fetchPage))
        .rejects.toMatchObject({ code: ErrorCode.TIMEOUT });
      expect(fetchPage).toHaveBeenCalledTimes(2);
    });
  });
});
