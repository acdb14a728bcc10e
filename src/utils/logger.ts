// Structured logging
import winston from 'winston';

/**
 * Severity ladder, most severe first. `critical` is reserved for storage
 * consistency faults that must never go unnoticed.
 */
const LEVELS = {
  critical: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
} as const;

export type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVELS, value);
}

const envLevel = process.env.LOG_LEVEL;

const rootLogger = winston.createLogger({
  levels: LEVELS,
  level: isLogLevel(envLevel) ? envLevel : 'info',
  silent: process.env.LOG_SILENT === 'true',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
      const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${String(timestamp)} [${String(module ?? 'app')}] ${level}: ${String(message)}${extra}`;
    })
  ),
  transports: [new winston.transports.Console()],
});

export interface ModuleLogger {
  critical(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Create a logger whose lines are tagged with the given module name.
 *
 * @example
 * const logger = createModuleLogger('vectorstore');
 * logger.info('Collection ready', { table: 'knowledge_entries' });
 */
export function createModuleLogger(module: string): ModuleLogger {
  const child = rootLogger.child({ module });
  const write = (level: LogLevel) => (message: string, meta: Record<string, unknown> = {}) => {
    child.log(level, message, meta);
  };

  return {
    critical: write('critical'),
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
  };
}

/**
 * Change the level of every module logger at runtime.
 */
export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
