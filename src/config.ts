// ---------- Configuration & Environment ----------

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type OutputFormat = 'text' | 'json';

export interface AppConfig {
  logLevel: LogLevel;
  outputFormat: OutputFormat;
}

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];
const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'json'];

function pick<T extends string>(raw: string | undefined, allowed: readonly T[], fallback: T): T {
  const value = (raw || '').trim().toLowerCase();
  return allowed.find((a) => a === value) ?? fallback;
}

/**
 * LOG_LEVEL            error|warn|info|debug (default info)
 * OPTION_CODES_OUTPUT  text|json             (default text)
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    logLevel: pick(env.LOG_LEVEL, LOG_LEVELS, 'info'),
    outputFormat: pick(env.OPTION_CODES_OUTPUT, OUTPUT_FORMATS, 'text'),
  };
}
