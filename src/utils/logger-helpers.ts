/**
 * Logger helpers
 *
 * The interactive session owns stdout for prompts and summaries, so every
 * pino logger created here writes to stderr.
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';
type LogContext = Record<string, unknown>;
type ContextBuilder = () => LogContext;

export const DEFAULT_LOG_LEVEL: LevelWithSilent = 'warn';

/**
 * Create the application logger.
 *
 * @param level - Minimum level; `AB_VOLCANO_LOG_LEVEL` wins when set
 */
export function createLogger(level: LevelWithSilent = DEFAULT_LOG_LEVEL): Logger {
  const envLevel = process.env.AB_VOLCANO_LOG_LEVEL;
  return pino(
    {
      name: 'ab-volcano',
      level: envLevel && envLevel.length > 0 ? envLevel : level,
    },
    pino.destination(2)
  );
}

/**
 * Lazy log helper that only evaluates context when log level is enabled
 *
 * @param logger - Pino logger instance (can be undefined)
 * @param contextBuilder - Function that builds the context object (only called if logging)
 *
 * @example
 * lazyLog(logger, 'debug', () => ({ entropies: [...scores] }), 'Ranked dimensions');
 */
export function lazyLog(
  logger: Logger | undefined,
  level: LogLevel,
  contextBuilder: ContextBuilder,
  message: string
): void {
  if (!logger || !logger.isLevelEnabled(level)) {
    return;
  }

  logger[level](contextBuilder(), message);
}
