import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { AcademicEvent, ErrorCode, ScraperError } from '../types/index.js';

const calendarDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

const EventSchema = z.object({
  title: z.string(),
  start: calendarDate,
  end: calendarDate,
  flags: z.object({
    grad: z.boolean(),
    pos: z.boolean(),
    matricula: z.boolean(),
    trancamento: z.boolean(),
    feriado: z.boolean(),
    importante: z.boolean(),
  }),
});

const EventsDocumentSchema = z.array(EventSchema);

/**
 * Compact JSON with fields in record order: title, start, end, flags
 */
export function serializeEventsJson(events: readonly AcademicEvent[]): string {
  return JSON.stringify(
    events.map((event) => ({
      title: event.title,
      start: event.start,
      end: event.end,
      flags: {
        grad: event.flags.grad,
        pos: event.flags.pos,
        matricula: event.flags.matricula,
        trancamento: event.flags.trancamento,
        feriado: event.flags.feriado,
        importante: event.flags.importante,
      },
    }))
  );
}

export function parseEventsJson(text: string): AcademicEvent[] {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ScraperError(
      `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      ErrorCode.PARSE_ERROR
    );
  }

  const parsed = EventsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ScraperError(
      'Events document does not match the expected shape',
      ErrorCode.PARSE_ERROR,
      { issues: parsed.error.issues }
    );
  }

  return parsed.data;
}

export async function readEventsJson(path: string): Promise<AcademicEvent[]> {
  return parseEventsJson(await readFile(path, 'utf8'));
}
