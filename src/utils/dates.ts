import { format, isValid, parse, parseISO } from 'date-fns';
import { enUS, ptBR } from 'date-fns/locale';
import { fromZonedTime } from 'date-fns-tz';

const ISO_DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})(?=$|[T ])/;

/** `Mon, 10 Mar 2025 00:00:00 -0300`; the weekday and time are optional */
const RFC_2822_DATE = /^(?:[A-Za-z]{3},\s*)?(\d{1,2} [A-Za-z]{3} \d{4})(?=$|\s)/;

/**
 * Formats accepted after ISO-8601 and RFC-2822, tried in order
 */
const LOCALIZED_FORMATS = [
  'yyyy-M-d',
  'dd/MM/yyyy HH:mm:ss',
  'dd/MM/yyyy HH:mm',
  'dd/MM/yyyy',
  "d 'de' MMMM 'de' yyyy",
  'd MMM yyyy',
];

/**
 * Parse a date or date-time string into a calendar date (`YYYY-MM-DD`).
 *
 * ISO-8601 and RFC-2822 values keep the date as written, in their own offset, so
 * `2025-03-10T23:00:00-03:00` is the 10th wherever this runs.
 * Returns null when nothing matches.
 */
export function parseCalendarDate(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  if (!trimmed) {
    return null;
  }

  const isoMatch = ISO_DATE_PREFIX.exec(trimmed);
  if (isoMatch && isValid(parseISO(trimmed))) {
    return `${isoMatch[1]}-${isoMatch[2]}-${isoMatch[3]}`;
  }

  const reference = new Date(2000, 0, 1);

  const rfcMatch = RFC_2822_DATE.exec(trimmed);
  if (rfcMatch) {
    const parsed = parse(rfcMatch[1], 'd MMM yyyy', reference, { locale: enUS });
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }

  for (const pattern of LOCALIZED_FORMATS) {
    const parsed = parse(trimmed, pattern, reference, { locale: ptBR });
    if (isValid(parsed)) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }

  return null;
}

/**
 * `YYYY-MM-DD` as a Date at UTC midnight
 */
export function toUtcDate(calendarDate: string): Date {
  const [year, month, day] = calendarDate.split('-').map((part) => Number.parseInt(part, 10));
  return new Date(Date.UTC(year, month - 1, day));
}

/**
 * Zero-padded `dd/MM`, e.g. `05/03`
 */
export function formatDayMonth(calendarDate: string): string {
  const [, month, day] = calendarDate.split('-');
  return `${day}/${month}`;
}

/**
 * The instant of a wall-clock time on a calendar date in the given zone
 */
export function atLocalTime(calendarDate: string, time: string, timezone: string): Date {
  return fromZonedTime(`${calendarDate}T${time}`, timezone);
}

/**
 * Inclusive ascending list of years
 */
export function yearRange(first: number, last: number): number[] {
  const years: number[] = [];
  for (let year = first; year <= last; year++) {
    years.push(year);
  }
  return years;
}
