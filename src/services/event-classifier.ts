/**
 * Event Classifier
 * Derives the category flags of an event from its title
 */

import { EventFlags, FlagName } from '../types/index.js';

export interface ClassificationRule {
  flag: FlagName;
  pattern: RegExp;
}

// Unicode-aware word boundaries: `\b` only knows ASCII, so "ç" or "í" would break words.
const WORD_CHAR = '[\\p{L}\\p{N}_]';
const START = `(?<!${WORD_CHAR})`;
const END = `(?!${WORD_CHAR})`;

function rule(flag: FlagName, source: string): ClassificationRule {
  return { flag, pattern: new RegExp(source, 'iu') };
}

/**
 * Vocabulary-to-flag table, evaluated in order against each title.
 *
 * The alternations anchor only their outer ends, so `feriado` also matches
 * "feriados" and `importante` catches "matrículas" while `matricula` does not.
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  rule('grad', `${START}graduação${END}`),
  rule('pos', `${START}pós-graduação${END}`),
  rule('matricula', `${START}matrícula${END}`),
  rule('trancamento', `${START}trancamento${END}`),
  rule('feriado', `${START}feriado|recesso${END}`),
  rule('importante', `${START}matrícula|trancamento|data-limite${END}`),
];

export function emptyFlags(): EventFlags {
  return {
    grad: false,
    pos: false,
    matricula: false,
    trancamento: false,
    feriado: false,
    importante: false,
  };
}

/**
 * Classify a title against a rule table
 */
export function classifyTitle(
  title: string,
  rules: readonly ClassificationRule[] = CLASSIFICATION_RULES
): EventFlags {
  const normalized = title.normalize('NFC');
  const flags = emptyFlags();

  for (const { flag, pattern } of rules) {
    if (pattern.test(normalized)) {
      flags[flag] = true;
    }
  }

  return flags;
}
