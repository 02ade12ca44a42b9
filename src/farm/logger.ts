import chalk from 'chalk';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug', 'trace'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = Record<LogLevel, (message: string) => void>;

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export const LOG_LEVEL_ENV = 'REPOFARM_LOG';

const PAINT: Record<LogLevel, (text: string) => string> = {
  error: (text) => chalk.red.bold(text),
  warn: (text) => chalk.yellow(text),
  info: (text) => chalk.cyan(text),
  debug: (text) => chalk.gray(text),
  trace: (text) => chalk.dim(text),
};

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const parseLogLevel = (value: string | undefined): LogLevel => {
  const normalized = value?.trim().toLowerCase();
  if (normalized && isLogLevel(normalized)) {
    return normalized;
  }
  return DEFAULT_LOG_LEVEL;
};

export const createLogger = (options: {
  level: LogLevel;
  color?: boolean;
  write?: (line: string) => void;
}): Logger => {
  const threshold = LOG_LEVELS.indexOf(options.level);
  const write = options.write ?? ((line: string) => console.error(line));
  const color = options.color ?? true;

  const at = (level: LogLevel) => (message: string) => {
    if (LOG_LEVELS.indexOf(level) > threshold) {
      return;
    }
    const tag = level.toUpperCase().padEnd(5);
    write(`${color ? PAINT[level](tag) : tag} ${message}`);
  };

  return {
    error: at('error'),
    warn: at('warn'),
    info: at('info'),
    debug: at('debug'),
    trace: at('trace'),
  };
};

export const silentLogger: Logger = createLogger({ level: 'error', write: () => undefined });
