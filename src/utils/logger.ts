import log from 'loglevel';

/** Anything with leveled log methods: the default loglevel logger, `console`, or a caller's own. */
export interface Logger {
  debug: (...message: unknown[]) => void;
  info: (...message: unknown[]) => void;
  warn: (...message: unknown[]) => void;
  error: (...message: unknown[]) => void;
}

/** Name of the loglevel logger used when the caller supplies none. */
export const LOGGER_NAME = 'matrix-http-api';

/**
 * Returns the library's named loglevel logger, quiet below `warn` unless the
 * application has set a level for it.
 */
export function getDefaultLogger(): Logger {
  const logger = log.getLogger(LOGGER_NAME);
  logger.setDefaultLevel('warn');
  return logger;
}
