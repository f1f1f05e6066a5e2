import fs from 'node:fs/promises';
import path from 'node:path';
import { LogLevel } from '../types';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    private readonly minLevel: LogLevel
  ) {}

  public static async create(logDir: string, minLevel: LogLevel = 'info'): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `hushtype-${datePrefix}.log`);

    return new StructuredLogger(filePath, minLevel);
  }

  public getLogPath(): string {
    return this.filePath;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  /** Resolves once every queued line has reached the log file. */
  public async flush(): Promise<void> {
    await this.writeQueue;
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      message,
      ...context
    };

    const line = `${JSON.stringify(entry)}\n`;

    this.writeQueue = this.writeQueue
      .then(async () => {
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[HushType] Failed to write log file: ${detail}`);
      });

    if (level === 'error') {
      console.error(`[HushType] ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`[HushType] ${message}`, context);
      return;
    }

    console.log(`[HushType] ${message}`, context);
  }
}
