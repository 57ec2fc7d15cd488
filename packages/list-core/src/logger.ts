// packages/list-core/src/logger.ts
import {
  destination,
  levels,
  pino,
  stdSerializers,
  stdTimeFunctions,
  type LevelWithSilent,
  type Logger,
  type LoggerOptions,
} from 'pino';

const isTest = process.env.NODE_ENV === 'test';
const DEFAULT_LEVEL: LevelWithSilent = isTest ? 'silent' : 'info';

export const isLogLevel = (value: string): value is LevelWithSilent =>
  value === 'silent' || Object.hasOwn(levels.values, value);

// pino throws on an unknown level; the CLI reports a bad LOG_LEVEL once config is validated
const envLevel = process.env.LOG_LEVEL;
const LOG_LEVEL = envLevel && isLogLevel(envLevel) ? envLevel : DEFAULT_LEVEL;

const baseConfig: LoggerOptions = {
  level: LOG_LEVEL,
  timestamp: stdTimeFunctions.isoTime,
  base: {
    pid: process.pid,
    service: 'sorted-word-list',
  },
  serializers: {
    err: stdSerializers.err,
  },
};

// logs go to stderr; stdout belongs to the front end
export const logger = pino(baseConfig, destination({ dest: 2, sync: true }));

// children copy the level when created, so they are tracked for setLogLevel
const children = new Set<Logger>();

// Child loggers per component
export const createLogger = (
  component: string,
  context?: Record<string, unknown>,
): Logger => {
  const child = logger.child({ component, ...context });
  children.add(child);
  return child;
};

/** Sets the level of the base logger and every component logger. */
export const setLogLevel = (level: LevelWithSilent): void => {
  logger.level = level;
  for (const child of children) child.level = level;
};

export const samplerLogger = createLogger('word-sampler');
export const sessionLogger = createLogger('session');

// Structured error logging
export const logError = (
  log: Logger,
  error: unknown,
  context?: Record<string, unknown>,
): void => {
  if (error instanceof Error) {
    log.error({ err: error, ...context }, error.message);
  } else {
    log.error({ error: String(error), ...context }, 'Unknown error occurred');
  }
};

export type { Logger };
