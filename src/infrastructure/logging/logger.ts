import chalk from 'chalk';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug' | 'success';

/** Levels a threshold can be set to; `success` shares the `info` threshold. */
export type LogThreshold = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Readonly<Record<string, unknown>>;

export interface Logger {
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  debug(message: string, data?: LogData): void;
  success(message: string, data?: LogData): void;
}

export interface LoggerOptions {
  /** Lowest level written. Default: `'info'`. */
  readonly level?: LogThreshold;
  /** Output sink. Default: `console.log`. */
  readonly write?: (line: string) => void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  success: 20,
  warn: 30,
  error: 40,
};

function formatTimestamp(date: Date): string {
  return chalk.gray(
    date.toLocaleString('en-US', {
      year: 'numeric',
      month: '2-digit',
      day: '2-digit',
      hour: '2-digit',
      minute: '2-digit',
      second: '2-digit',
      hour12: false,
    }),
  );
}

function getLevelColor(level: LogLevel): string {
  switch (level) {
    case 'info':
      return chalk.cyan('[INFO]');
    case 'warn':
      return chalk.yellow('[WARN]');
    case 'error':
      return chalk.red('[ERROR]');
    case 'debug':
      return chalk.gray('[DEBUG]');
    case 'success':
      return chalk.green('[✓]');
  }
}

function formatData(data: LogData): string {
  const replacer = (_key: string, value: unknown): unknown => (typeof value === 'bigint' ? value.toString() : value);
  return '\n  ' + JSON.stringify(data, replacer, 2).split('\n').join('\n  ');
}

/** Console logger with colored level tags and optional structured data rendered as JSON. */
export function createLogger(options?: LoggerOptions): Logger {
  const threshold = SEVERITY[options?.level ?? 'info'];
  const write = options?.write ?? ((line: string) => console.log(line));

  const log = (level: LogLevel, message: string, data?: LogData): void => {
    if (SEVERITY[level] < threshold) return;

    const msg = level === 'error' ? chalk.red(message) : message;
    let output = `${formatTimestamp(new Date())} ${getLevelColor(level)} ${msg}`;

    if (data && Object.keys(data).length > 0) {
      output += formatData(data);
    }

    write(output);
  };

  return {
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    debug: (message, data) => log('debug', message, data),
    success: (message, data) => log('success', message, data),
  };
}
