import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import type { PageFetcher } from '../src/services/html-fetcher.js';
import type { AcademicEvent, ICSOptions } from '../src/types/index.js';
import {
  createRunLogger,
  createServiceLogger,
  type Logger,
  type ServiceName,
} from '../src/utils/logger.js';

export function loadFixture(name: string): string {
  return readFileSync(join(__dirname, 'fixtures', name), 'utf8');
}

export function testLogger(service: ServiceName = 'scraper'): Logger {
  return createServiceLogger(createRunLogger({ runId: 'test-run' }), service);
}

/**
 * Page fetcher that serves `pages[year-month]` and an empty calendar otherwise
 */
export function fakeFetcher(
  pages: Record<string, string | Error>
): jest.Mock<Promise<string>, Parameters<PageFetcher>> {
  const empty = loadFixture('calendar-empty.html');
  return jest.fn<Promise<string>, Parameters<PageFetcher>>(async (url) => {
    const params = new URL(url).searchParams;
    const page = pages[`${params.get('ano')}-${params.get('mes')}`];
    if (page instanceof Error) {
      throw page;
    }
    return page ?? empty;
  });
}

export const registrationEvent: AcademicEvent = {
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
};

export const holidayEvent: AcademicEvent = {
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
};

export const icsOptions: ICSOptions = {
  variant: 'current',
  prodId: '//calendario-academico//Calendário Acadêmico UFMG//PT',
  calendarName: 'Calendário Acadêmico UFMG',
  color: '#C8102E',
  url: 'https://example.com/calendario',
  sourceUrl: 'https://example.com/calendario.ics',
  timezone: 'America/Sao_Paulo',
  refreshInterval: 30 * 24 * 60 * 60,
  now: new Date('2026-10-19T12:00:00Z'),
};
