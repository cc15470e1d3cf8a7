/**
 * src/options/optionIndex.ts
 * Raw option string → OptionIndex.
 *
 * Total over every input. Absent strings give an empty index and malformed
 * tokens are dropped; on a prefix collision the last token wins. The maps
 * stay inside the closure, callers only get lookups and copies.
 */

import type { OptionIndex, RawOptionString } from '../types/options.js';
import { logger } from '../utils/logger.js';
import { applyCorrections } from './preprocess.js';

/** Tokens starting with this are whole-token flags, not prefix + variant. */
export const LEGACY_FLAG_PREFIX = 'X0';

const PREFIX_LENGTH = 2;

export function isLegacyFlagKey(key: string): boolean {
  return key.startsWith(LEGACY_FLAG_PREFIX);
}

export function emptyOptionIndex(): OptionIndex {
  return buildOptionIndex(null);
}

export function buildOptionIndex(raw: RawOptionString): OptionIndex {
  const prefixed = new Map<string, string>();
  const legacyFlags = new Set<string>();
  const tokens: string[] = [];

  if (raw != null) {
    const corrected = applyCorrections(raw);
    for (const part of corrected.split(',')) {
      const token = part.trim();
      if (token.length < PREFIX_LENGTH) {
        logger.debug('Skipping malformed option token', { token: part });
        continue;
      }
      const prefix = token.substring(0, PREFIX_LENGTH);
      if (isLegacyFlagKey(prefix)) {
        legacyFlags.add(token);
      } else {
        prefixed.set(prefix, token);
      }
      tokens.push(token);
    }
  }

  return Object.freeze({
    tokenFor: (prefix: string) => prefixed.get(prefix),
    hasLegacyFlag: (token: string) => legacyFlags.has(token),
    entries: () => [...prefixed.entries()],
    legacyFlags: () => [...legacyFlags],
    tokens: Object.freeze(tokens),
  });
}

/** The token stored under a prefix or legacy flag key, if any. */
export function lookupToken(index: OptionIndex, key: string): string | undefined {
  if (isLegacyFlagKey(key)) {
    return index.hasLegacyFlag(key) ? key : undefined;
  }
  return index.tokenFor(key);
}
