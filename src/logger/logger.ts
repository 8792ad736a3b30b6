import { homedir } from 'node:os';
import { join } from 'node:path';
import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { ensureDir } from 'fs-extra/esm';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export const DEFAULT_LOG_DIR = join(homedir(), '.folio', 'logs');

export class Logger {
  private static instance?: Logger;
  private readonly logDir: string;
  private logFile?: FileHandle;
  private pending: Promise<void> = Promise.resolve();

  private constructor(logDir: string) {
    this.logDir = logDir;
  }

  static async getInstance(logDir = DEFAULT_LOG_DIR): Promise<Logger> {
    if (!Logger.instance) {
      const logger = new Logger(logDir);
      await logger.initialize();
      Logger.instance = logger;
    }
    return Logger.instance;
  }

  get path(): string {
    return join(this.logDir, 'folio.log');
  }

  private async initialize(): Promise<void> {
    await ensureDir(this.logDir);
    this.logFile = await open(this.path, 'a');
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    const file = this.logFile;
    if (!file) {
      return;
    }

    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    const logLine = `${new Date().toISOString()} | ${level}: ${message}${suffix}\n`;

    // Chained so lines land in the order they were logged
    this.pending = this.pending
      .then(async () => {
        await file.write(logLine);
      })
      .catch(console.error);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('DEBUG', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('INFO', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('WARN', message, meta);
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    const errorInfo = error instanceof Error ? { error: error.message, stack: error.stack } : { error: String(error) };
    this.write('ERROR', message, { ...errorInfo, ...meta });
  }

  flush(): Promise<void> {
    return this.pending;
  }

  async close(): Promise<void> {
    await this.flush();
    await this.logFile?.close();
    this.logFile = undefined;
    if (Logger.instance === this) {
      Logger.instance = undefined;
    }
  }
}
