import pino from 'pino';

const LEVELS = new Set<string>([...Object.keys(pino.levels.values), 'silent']);

/**
 * Get the log level from environment variables
 * Priority: LOG_LEVEL > NODE_ENV=test (silent) > default (info)
 */
function getLogLevel(): string {
  const configured = process.env.LOG_LEVEL;
  if (configured && LEVELS.has(configured)) {
    return configured;
  }

  // In test and CI environments, default to silent to reduce noise
  if (process.env.NODE_ENV === 'test' || process.env.CI === 'true') {
    return 'silent';
  }

  return 'info';
}

/**
 * Create a named logger with environment-aware log level
 * @param name - Logger name (used for filtering and debugging)
 * @param bindings - Fields attached to every line (slot id, component)
 */
export function createLogger(name: string, bindings: Record<string, unknown> = {}): pino.Logger {
  return pino({
    name,
    level: getLogLevel(),
    base: { pid: process.pid, ...bindings },
  });
}

export type Logger = pino.Logger;
