/**
 * Calendar-visible text derived from event flags
 */

import { AcademicEvent, CalendarVariant, EventFlags } from '../types/index.js';
import { formatDayMonth } from '../utils/dates.js';

function audienceLabel(flags: EventFlags): string | null {
  if (flags.grad && flags.pos) {
    return 'Graduação e Pós-Graduação';
  }
  if (flags.grad) {
    return 'Graduação';
  }
  if (flags.pos) {
    return 'Pós-Graduação';
  }
  return null;
}

// matrícula > trancamento > feriado
function kindLabel(flags: EventFlags, fallback: string): string {
  if (flags.matricula) {
    return 'Matrícula';
  }
  if (flags.trancamento) {
    return 'Trancamento';
  }
  if (flags.feriado) {
    return 'Recesso/Feriado';
  }
  return fallback;
}

/**
 * Short category label used as the calendar entry title.
 *
 * current: `UFMG: Graduação - Matrícula!`, or `UFMG:  Outros` (two spaces) without an audience
 * legacy:  `Graduação: Matrícula!`, or `Todos: Evento` without an audience
 */
export function generateSummary(flags: EventFlags, variant: CalendarVariant = 'current'): string {
  const mark = flags.importante ? '!' : '';
  const audience = audienceLabel(flags);

  if (variant === 'legacy') {
    return `${audience ?? 'Todos'}: ${kindLabel(flags, 'Evento')}${mark}`;
  }

  const kind = kindLabel(flags, 'Outros');
  return `UFMG: ${audience ? `${audience} -` : ''} ${kind}${mark}`;
}

/**
 * Alarm description, e.g. `Alerta 05/03 na UFMG: Graduação - Matrícula!`
 */
export function generateSubject(
  event: Pick<AcademicEvent, 'start' | 'flags'>,
  variant: CalendarVariant = 'current'
): string {
  return `Alerta ${formatDayMonth(event.start)} na ${generateSummary(event.flags, variant)}`;
}
