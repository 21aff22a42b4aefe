/**
 * Console logger with a scope tag and level filtering.
 * Created once at startup and handed to the services that need it.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  child(scope: string): Logger;
}

const LEVEL_ICONS: Record<LogLevel, string> = {
  debug: '🔍',
  info: '📡',
  warn: '⚠️',
  error: '❌'
};

export class ConsoleLogger implements Logger {
  constructor(
    private readonly scope: string,
    private readonly level: LogLevel = 'info'
  ) {}

  debug(message: string, data?: unknown): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: unknown): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: unknown): void {
    this.write('error', message, data);
  }

  child(scope: string): Logger {
    return new ConsoleLogger(`${this.scope}:${scope}`, this.level);
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private write(level: LogLevel, message: string, data?: unknown): void {
    if (!this.isEnabled(level)) return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const dataStr = data === undefined ? '' : ` | ${formatData(data)}`;
    const line = `${LEVEL_ICONS[level]} [${timestamp}][${this.scope.toUpperCase()}] ${message}${dataStr}`;

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return data.stack ?? `${data.name}: ${data.message}`;
  }
  if (typeof data === 'string') {
    return data;
  }
  return JSON.stringify(data);
}

export const createLogger = (scope: string, level: LogLevel = 'info'): Logger => {
  return new ConsoleLogger(scope, level);
};
