/**
 * Exporter Service
 * Renders the event collection in an output kind and writes it atomically
 */

import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, extname } from 'node:path';
import { AcademicEvent, ErrorCode, ICSOptions, OutputKind, ScraperError } from '../types/index.js';
import { elapsed, type Logger } from '../utils/logger.js';
import { generateICS } from './ics-generator.js';
import { serializeEventsJson } from './json-exporter.js';

const EXTENSION_KINDS: Record<string, OutputKind> = {
  json: OutputKind.JSON,
  ics: OutputKind.ICS,
  ical: OutputKind.ICS,
};

export interface ExportOptions {
  kind?: OutputKind;
  ics: ICSOptions;
}

/**
 * Output kind for a path, from its extension
 */
export function inferOutputKind(path: string): OutputKind {
  const extension = extname(path).replace(/^\./, '').toLowerCase();
  const kind = EXTENSION_KINDS[extension];

  if (!kind) {
    throw new ScraperError(
      `Unsupported format: ${extension || '(no extension)'}`,
      ErrorCode.UNSUPPORTED_FORMAT,
      { path, extension },
      false
    );
  }

  return kind;
}

/**
 * Serialize events without touching the filesystem
 */
export function renderEvents(
  events: readonly AcademicEvent[],
  kind: OutputKind,
  options: ExportOptions,
  log: Logger
): string {
  switch (kind) {
    case OutputKind.JSON:
      return serializeEventsJson(events);
    case OutputKind.ICS:
      return generateICS(events, options.ics, log);
  }
}

/**
 * Write `content` next to `path` first, then rename over it,
 * so a failed export never leaves a half-written artifact.
 */
async function writeAtomically(path: string, content: string): Promise<void> {
  const tempPath = `${path}.${process.pid}.tmp`;

  try {
    await mkdir(dirname(path), { recursive: true });
  } catch (error) {
    throw writeError(path, error);
  }

  try {
    await writeFile(tempPath, content, 'utf8');
    await rename(tempPath, path);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw writeError(path, error);
  }
}

function writeError(path: string, error: unknown): ScraperError {
  return new ScraperError(
    `Failed to write ${path}: ${error instanceof Error ? error.message : String(error)}`,
    ErrorCode.WRITE_ERROR,
    { path },
    false
  );
}

/**
 * Export events to `path`. The kind comes from the options or, failing that,
 * from the file extension; an unsupported extension fails before any write.
 */
export async function exportEvents(
  events: readonly AcademicEvent[],
  path: string,
  options: ExportOptions,
  log: Logger
): Promise<void> {
  const startTime = Date.now();
  const kind = options.kind ?? inferOutputKind(path);

  const content = renderEvents(events, kind, options, log);
  await writeAtomically(path, content);

  log.info(
    { path, kind, eventCount: events.length, bytes: Buffer.byteLength(content), durationMs: elapsed(startTime) },
    'Export written'
  );
}
