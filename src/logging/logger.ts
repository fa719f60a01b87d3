import { appendFile, mkdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { homedir } from 'node:os';
import { format } from 'date-fns';
import type { LogLevel, LogEntry, LogContext, TaxalertEvent } from './events.js';

export interface LoggerOptions {
  /** Base directory for log files. */
  logDir: string;
  /** Minimum log level to output. */
  level: LogLevel;
  /** Whether to also print to console. */
  console: boolean;
  /** Whether to append JSON lines to a file under logDir. */
  file: boolean;
  /** Source identifier for this logger instance. */
  source: string;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  private readonly opts: LoggerOptions;
  private readonly logFile: string;
  private initPromise: Promise<unknown> | null = null;

  constructor(opts: Partial<LoggerOptions> & { source: string }) {
    this.opts = {
      logDir: opts.logDir ?? join(homedir(), '.taxalert', 'logs'),
      level: opts.level ?? 'info',
      console: opts.console ?? true,
      file: opts.file ?? true,
      source: opts.source,
    };
    this.logFile = join(
      this.opts.logDir,
      `${this.opts.source}-${format(new Date(), 'yyyy-MM-dd')}.log`,
    );
  }

  /** Path of the JSON-lines file this logger appends to. */
  get filePath(): string {
    return this.logFile;
  }

  private async ensureDir(): Promise<void> {
    if (!this.initPromise) {
      this.initPromise = mkdir(dirname(this.logFile), { recursive: true });
    }
    await this.initPromise;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.opts.level];
  }

  formatConsole(entry: LogEntry): string {
    const ts = entry.timestamp.slice(11, 23); // HH:mm:ss.SSS
    const levelTag = entry.level.toUpperCase().padEnd(5);
    const ctx = [entry.broker ?? null, entry.strategy ?? null].filter(Boolean).join(' ');
    const ctxStr = ctx ? ` [${ctx}]` : '';
    return `${ts} ${levelTag} [${entry.source}]${ctxStr} ${entry.message}`;
  }

  private async writeEntry(entry: LogEntry): Promise<void> {
    if (!this.shouldLog(entry.level)) return;

    if (this.opts.console) {
      const formatted = this.formatConsole(entry);
      if (entry.level === 'error') {
        console.error(formatted);
      } else if (entry.level === 'warn') {
        console.warn(formatted);
      } else {
        console.log(formatted);
      }
    }

    if (!this.opts.file) return;

    try {
      await this.ensureDir();
      await appendFile(this.logFile, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (err) {
      process.stderr.write(`Logger: could not write ${this.logFile}: ${String(err)}\n`);
    }
  }

  private buildEntry(level: LogLevel, message: string, context?: LogContext): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      source: this.opts.source,
      message,
      ...context,
    };
  }

  debug(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('debug', message, context));
  }

  info(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('warn', message, context));
  }

  error(message: string, context?: LogContext): void {
    void this.writeEntry(this.buildEntry('error', message, context));
  }

  /**
   * Log a structured event.
   */
  event(event: TaxalertEvent, level: LogLevel = 'info'): void {
    const { type, ...data } = event;
    void this.writeEntry(
      this.buildEntry(level, type, {
        broker: 'broker' in event ? event.broker : undefined,
        data: { type, ...data },
      }),
    );
  }

  /**
   * Create a child logger scoped to one broker, sharing this logger's settings.
   */
  child(broker: string): Logger {
    return new Logger({
      logDir: this.opts.logDir,
      level: this.opts.level,
      console: this.opts.console,
      file: this.opts.file,
      source: `broker-${broker.toLowerCase()}`,
    });
  }
}
