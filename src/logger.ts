import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type LogContext = Record<string, unknown>;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_LABEL: Record<LogLevel, string> = {
  debug: chalk.gray('debug'),
  info: chalk.cyan('info '),
  warn: chalk.yellow('warn '),
  error: chalk.red('error'),
};

let minLevel: LogLevel = 'info';
let stream: NodeJS.WritableStream = process.stderr;

export function configureLogger(options: { level?: LogLevel; stream?: NodeJS.WritableStream }): void {
  if (options.level) minLevel = options.level;
  if (options.stream) stream = options.stream;
}

function formatContext(context?: LogContext): string {
  if (!context) return '';
  const pairs = Object.entries(context)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  return pairs.length > 0 ? ' ' + chalk.dim(pairs.join(' ')) : '';
}

function write(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
  stream.write(`${LEVEL_LABEL[level]} ${message}${formatContext(context)}\n`);
}

export const logger = {
  debug(message: string, context?: LogContext): void {
    write('debug', message, context);
  },

  info(message: string, context?: LogContext): void {
    write('info', message, context);
  },

  warn(message: string, context?: LogContext): void {
    write('warn', message, context);
  },

  error(message: string, context?: LogContext): void {
    write('error', message, context);
  },

  withContext(defaultContext: LogContext) {
    return {
      debug: (message: string, context?: LogContext) =>
        logger.debug(message, { ...defaultContext, ...context }),
      info: (message: string, context?: LogContext) =>
        logger.info(message, { ...defaultContext, ...context }),
      warn: (message: string, context?: LogContext) =>
        logger.warn(message, { ...defaultContext, ...context }),
      error: (message: string, context?: LogContext) =>
        logger.error(message, { ...defaultContext, ...context }),
    };
  },
};
