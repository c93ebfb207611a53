import { basename } from 'node:path';
import { z } from 'zod';
import { AppConfig, ErrorCode, OutputTarget, ScraperError } from '../types/index.js';

export const DEFAULT_BASE_URL = 'https://ufmg.br/a-universidade/calendario-academico';
export const DEFAULT_JSON_OUTPUT = 'website/data/calendario.json';
export const DEFAULT_ICS_OUTPUT = 'website/public/Calendario+Academico+UFMG.ics';
export const DEFAULT_CALENDAR_URL = 'https://ariel-codes.github.io/calendario-ufmg';
export const LEGACY_FIRST_YEAR = 2020;

/** One month, as a refresh hint for subscribed clients */
export const REFRESH_INTERVAL_SECONDS = 30 * 24 * 60 * 60;

const yearSchema = z.coerce.number().int().min(1900).max(2200);

const envSchema = z.object({
  CALENDAR_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  CALENDAR_VARIANT: z.enum(['current', 'legacy']).default('current'),
  CALENDAR_FIRST_YEAR: yearSchema.optional(),
  CALENDAR_LAST_YEAR: yearSchema.optional(),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  SOURCE_USER_AGENT: z.string().min(1).optional(),
  FAIL_FAST: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),
  JSON_OUTPUT_PATH: z.string().min(1).default(DEFAULT_JSON_OUTPUT),
  ICS_OUTPUT_PATH: z.string().min(1).default(DEFAULT_ICS_OUTPUT),
  CALENDAR_NAME: z.string().min(1).default('Calendário Acadêmico UFMG'),
  CALENDAR_COLOR: z
    .string()
    .regex(/^#[0-9A-Fa-f]{6}$/, 'Color must be a #RRGGBB hex value')
    .default('#C8102E'),
  CALENDAR_URL: z.string().url().default(DEFAULT_CALENDAR_URL),
  CALENDAR_SOURCE_URL: z.string().url().optional(),
  CALENDAR_TIMEZONE: z.string().min(1).default('America/Sao_Paulo'),
});

export type EnvConfig = z.infer<typeof envSchema>;

function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Build the application configuration from environment variables.
 * Empty strings count as unset.
 */
export function createConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  now: Date = new Date()
): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ScraperError(
      `Invalid configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`,
      ErrorCode.CONFIGURATION_ERROR,
      { issues: parsed.error.issues }
    );
  }

  const values = parsed.data;
  const currentYear = now.getFullYear();
  const defaultFirstYear = values.CALENDAR_VARIANT === 'legacy' ? LEGACY_FIRST_YEAR : currentYear;

  const outputs: OutputTarget[] = [
    { path: values.JSON_OUTPUT_PATH },
    { path: values.ICS_OUTPUT_PATH },
  ];

  const config: AppConfig = {
    scrape: {
      baseUrl: values.CALENDAR_BASE_URL,
      failFast: values.FAIL_FAST,
      fetch: {
        timeout: values.FETCH_TIMEOUT_MS,
        userAgent: values.SOURCE_USER_AGENT,
      },
    },
    years: {
      first: values.CALENDAR_FIRST_YEAR ?? defaultFirstYear,
      last: values.CALENDAR_LAST_YEAR ?? currentYear + 1,
    },
    ics: {
      variant: values.CALENDAR_VARIANT,
      prodId: '//calendario-academico//Calendário Acadêmico UFMG//PT',
      calendarName: values.CALENDAR_NAME,
      color: values.CALENDAR_COLOR,
      url: values.CALENDAR_URL,
      sourceUrl:
        values.CALENDAR_SOURCE_URL ??
        `${values.CALENDAR_URL.replace(/\/+$/, '')}/${basename(DEFAULT_ICS_OUTPUT)}`,
      timezone: values.CALENDAR_TIMEZONE,
      refreshInterval: REFRESH_INTERVAL_SECONDS,
    },
    outputs,
  };

  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ScraperError(
      `Invalid configuration: ${errors.join('; ')}`,
      ErrorCode.CONFIGURATION_ERROR,
      { errors }
    );
  }

  return config;
}

/**
 * Cross-field checks the schema cannot express
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (config.years.first > config.years.last) {
    errors.push(`First year ${config.years.first} is after last year ${config.years.last}`);
  }

  if (!isValidTimezone(config.ics.timezone)) {
    errors.push(`Unknown timezone: ${config.ics.timezone}`);
  }

  if (config.outputs.length === 0) {
    errors.push('At least one output path is required');
  }

  return errors;
}
