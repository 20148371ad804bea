export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  category: string;
  message: string;
  data?: unknown;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MAX_ENTRIES = 1000;

export class DeliveryLogger {
  private entries: LogEntry[] = [];
  private minLevel: LogLevel = 'info';
  private silent = false;

  setLevel(level: LogLevel) {
    this.minLevel = level;
  }

  /** Keep recording entries but stop writing to the console */
  setSilent(silent: boolean) {
    this.silent = silent;
  }

  log(level: LogLevel, category: string, message: string, data?: unknown) {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.minLevel]) return;

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      category,
      message,
      data,
    };
    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) this.entries.shift();

    if (this.silent) return;

    const prefix = `[${level.toUpperCase()}] [${category}]`;
    if (data !== undefined) {
      console[level](prefix, message, data);
    } else {
      console[level](prefix, message);
    }
  }

  debug(category: string, message: string, data?: unknown) {
    this.log('debug', category, message, data);
  }

  info(category: string, message: string, data?: unknown) {
    this.log('info', category, message, data);
  }

  warn(category: string, message: string, data?: unknown) {
    this.log('warn', category, message, data);
  }

  error(category: string, message: string, data?: unknown) {
    this.log('error', category, message, data);
  }

  getEntries(category?: string): LogEntry[] {
    if (!category) return [...this.entries];
    return this.entries.filter((e) => e.category === category);
  }

  clear() {
    this.entries = [];
  }
}

export const logger = new DeliveryLogger();
