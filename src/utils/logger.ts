/**
 * Leveled console logger. Lines look like
 *   2024-05-01T10:00:00.000Z [WARN] message {"key":"value"}
 * and always go to stderr, so stdout carries only CLI output.
 */

import { loadConfig, type LogLevel } from '../config.js';

type LogMeta = Record<string, unknown>;

const RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

let maxRank = RANK[loadConfig().logLevel];

export function setLogLevel(level: LogLevel) {
  maxRank = RANK[level];
}

/** Plain-object form of a thrown value, fit for JSON. */
export function serializeError(error: unknown) {
  if (!(error instanceof Error)) {
    return typeof error === 'object' && error !== null ? error : { message: String(error) };
  }
  const { name, message, stack } = error;
  return { name, message, stack };
}

/** Message of an Error, or the value itself as a string. */
export function extractErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function metaSuffix(meta: LogMeta | undefined): string {
  if (meta === undefined) return '';
  const entries = Object.entries(meta)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]): [string, unknown] => [key, value instanceof Error ? serializeError(value) : value]);
  return entries.length ? ` ${JSON.stringify(Object.fromEntries(entries))}` : '';
}

function write(level: LogLevel, message: string, meta?: LogMeta) {
  if (RANK[level] > maxRank) return;
  const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}${metaSuffix(meta)}`;
  if (level === 'warn') console.warn(line);
  else console.error(line);
}

const at = (level: LogLevel) => (message: string, meta?: LogMeta) => write(level, message, meta);

export const logger = {
  debug: at('debug'),
  info: at('info'),
  warn: at('warn'),
  error: at('error'),
};
