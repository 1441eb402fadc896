// ============================================================================
// Engine Logger
// ============================================================================
// Leveled diagnostics written to stderr as `[component] message` lines.
// stdout stays free for report output and `--json`.

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogContext = Record<string, string | number | boolean | null | undefined>;

export interface EngineLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export function formatContext(context?: LogContext): string {
  if (!context) return '';
  const parts = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${String(value)}`);
  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

/**
 * Logger writing to `write` (stderr by default) for messages at or above
 * `level`.
 */
export function createStderrLogger(
  component: string,
  level: LogLevel = 'info',
  write: (line: string) => void = (line) => {
    process.stderr.write(line);
  },
): EngineLogger {
  const threshold = LEVEL_RANK[level];
  const emit = (at: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[at] > threshold) return;
    const prefix = at === 'info' ? '' : `${at}: `;
    write(`[${component}] ${prefix}${message}${formatContext(context)}\n`);
  };

  return {
    debug: (message, context) => emit('debug', message, context),
    info: (message, context) => emit('info', message, context),
    warn: (message, context) => emit('warn', message, context),
    error: (message, context) => emit('error', message, context),
  };
}

const noop = (): void => undefined;

export const silentLogger: EngineLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
