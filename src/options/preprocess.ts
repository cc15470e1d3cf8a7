/**
 * src/options/preprocess.ts
 * Literal corrections applied to the raw option string before it is split.
 *
 * The backend has emitted a few non-standard spellings over time. Each one is
 * listed here rather than handled inside the tokenizer, so new cases are a
 * one-line addition.
 */

import { logger } from '../utils/logger.js';

export interface OptionStringCorrection {
  from: string;
  to: string;
  note: string;
}

export const OPTION_STRING_CORRECTIONS: readonly OptionStringCorrection[] = [
  { from: 'PBT', to: 'BT', note: 'battery category sent with a 3-letter prefix' },
];

/** Apply every correction, in order, to the whole string. */
export function applyCorrections(
  raw: string,
  corrections: readonly OptionStringCorrection[] = OPTION_STRING_CORRECTIONS,
): string {
  return corrections.reduce((acc, c) => {
    if (!acc.includes(c.from)) return acc;
    logger.debug('Correcting option string', { from: c.from, to: c.to, note: c.note });
    return acc.replaceAll(c.from, c.to);
  }, raw);
}
