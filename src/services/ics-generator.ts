/**
 * ICS File Generation Service
 * Generates the subscribable iCalendar document from scraped events
 */
import ical, {
  ICalAlarmType,
  ICalCalendar,
  ICalCalendarMethod,
  ICalEvent,
  ICalEventClass,
} from 'ical-generator';
import { formatInTimeZone } from 'date-fns-tz';
import { AcademicEvent, ICSOptions } from '../types/index.js';
import { atLocalTime, toUtcDate } from '../utils/dates.js';
import { type Logger } from '../utils/logger.js';
import { generateSubject, generateSummary } from './summary.js';

/** Seconds before the start for the two reminders of important events */
export const EARLY_ALARM_OFFSET = 6 * 24 * 60 * 60;
export const EVE_ALARM_OFFSET = 16 * 60 * 60 + 30 * 60;
export const MORNING_ALARM_TIME = '07:30:00';

/**
 * Generate the ICS document for a list of events
 */
export function generateICS(
  events: readonly AcademicEvent[],
  options: ICSOptions,
  log: Logger
): string {
  const now = options.now ?? new Date();

  log.info(
    { eventCount: events.length, variant: options.variant, calendarName: options.calendarName },
    'Starting ICS generation'
  );

  const calendar = createCalendar(options, now);
  events.forEach((event, index) => {
    addEventToCalendar(calendar, event, index, options);
  });

  const icsContent = calendar.toString();

  log.info({ eventCount: events.length, icsLength: icsContent.length }, 'ICS generation complete');

  return icsContent;
}

/**
 * Create calendar instance with the subscription metadata
 */
function createCalendar(options: ICSOptions, now: Date): ICalCalendar {
  if (options.variant === 'legacy') {
    return ical({ prodId: options.prodId, method: ICalCalendarMethod.PUBLISH });
  }

  const calendar = ical({
    prodId: options.prodId,
    method: ICalCalendarMethod.PUBLISH,
    name: options.calendarName,
    url: options.url,
    source: options.sourceUrl,
    ttl: options.refreshInterval,
  });

  calendar.x([
    { key: 'X-APPLE-CALENDAR-COLOR', value: options.color },
    { key: 'X-LAST-MODIFIED', value: formatInTimeZone(now, 'UTC', "yyyyMMdd'T'HHmmss'Z'") },
  ]);

  return calendar;
}

function addEventToCalendar(
  calendar: ICalCalendar,
  event: AcademicEvent,
  index: number,
  options: ICSOptions
): ICalEvent {
  const start = toUtcDate(event.start);

  const calEvent = calendar.createEvent({
    id: generateUID(event, index),
    start,
    end: toUtcDate(event.end),
    allDay: true,
    // must not depend on the generation time
    stamp: start,
    summary: generateSummary(event.flags, options.variant),
    description: event.title,
    class: ICalEventClass.PUBLIC,
  });

  if (options.variant === 'current') {
    addAlarms(calEvent, event, options);
  }

  return calEvent;
}

/**
 * Two early reminders for important events, then the morning-of reminder every event gets
 */
function addAlarms(calEvent: ICalEvent, event: AcademicEvent, options: ICSOptions): void {
  const description = generateSubject(event, options.variant);

  if (event.flags.importante) {
    calEvent.createAlarm({
      type: ICalAlarmType.display,
      trigger: EARLY_ALARM_OFFSET,
      description,
    });
    calEvent.createAlarm({
      type: ICalAlarmType.display,
      trigger: EVE_ALARM_OFFSET,
      description,
    });
  }

  calEvent.createAlarm({
    type: ICalAlarmType.display,
    trigger: atLocalTime(event.start, MORNING_ALARM_TIME, options.timezone),
    description,
  });
}

/**
 * Stable identifier: the same input always yields the same UID. The position
 * keeps repeated entries distinct.
 */
export function generateUID(event: AcademicEvent, index: number): string {
  const date = event.start.replace(/-/g, '');
  return `${date}-${simpleHash(event.title)}-${index}@calendario-academico`;
}

/**
 * Simple hash function for generating UIDs
 */
function simpleHash(str: string): string {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash;
  }
  return Math.abs(hash).toString(36);
}
