const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RuntimeConfig {
  logLevel: LogLevel;
  /** Nested call frames allowed before a call fails with CallDepthExceeded */
  maxCallDepth: number;
}

const DEFAULT_MAX_CALL_DEPTH = 1024;

let cachedConfig: RuntimeConfig | null = null;

/**
 * Clear the cached config so the next call to loadConfig() re-reads the
 * process environment.
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw === '') return 'info';
  const level = LOG_LEVELS.find(l => l === raw.toLowerCase());
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got '${raw}'`);
  }
  return level;
}

function parseCallDepth(raw: string | undefined): number {
  if (raw === undefined || raw === '') return DEFAULT_MAX_CALL_DEPTH;
  const depth = Number(raw);
  if (!Number.isInteger(depth) || depth <= 0) {
    throw new Error(`PROXY_MAX_CALL_DEPTH must be a positive integer, got '${raw}'`);
  }
  return depth;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  if (cachedConfig) return cachedConfig;
  cachedConfig = {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    maxCallDepth: parseCallDepth(env.PROXY_MAX_CALL_DEPTH),
  };
  return cachedConfig;
}
