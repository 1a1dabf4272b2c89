import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

interface LogMetadata {
  url?: string;
  offset?: number;
  [key: string]: unknown;
}

interface LoggerOptions {
  level?: LogLevel;
  filePath?: string | null;
}

class Logger {
  private static level: LogLevel = 'info';
  private static filePath: string | null = null;

  static configure({ level, filePath }: LoggerOptions) {
    if (level) this.level = level;
    if (filePath !== undefined) this.filePath = filePath;
  }

  private static enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  static formatMessage(
    level: LogLevel,
    message: string,
    metadata?: LogMetadata
  ): string {
    const timestamp = new Date().toISOString();
    const metadataStr = metadata
      ? ` | metadata: ${JSON.stringify(metadata)}`
      : '';
    return `[${timestamp}] ${level.toUpperCase()}: ${message}${metadataStr}`;
  }

  private static emit(level: LogLevel, message: string, metadata?: LogMetadata) {
    if (!this.enabled(level)) return;
    const line = this.formatMessage(level, message, metadata);
    console[level](line);
    if (this.filePath) this.appendToFile(this.filePath, line);
  }

  /** A failing log file is reported once and then dropped. */
  private static appendToFile(filePath: string, line: string) {
    try {
      appendFileSync(filePath, `${line}\n`);
    } catch (error) {
      this.filePath = null;
      const reason = error instanceof Error ? error.message : String(error);
      console.error(this.formatMessage('error', `Failed to write log file ${filePath}`, { error: reason }));
    }
  }

  static debug(message: string, metadata?: LogMetadata) {
    this.emit('debug', message, metadata);
  }

  static info(message: string, metadata?: LogMetadata) {
    this.emit('info', message, metadata);
  }

  static warn(message: string, metadata?: LogMetadata) {
    this.emit('warn', message, metadata);
  }

  static error(message: string, error?: unknown, metadata?: LogMetadata) {
    const errorDetails =
      error instanceof Error
        ? {
            name: error.name,
            message: error.message,
            stack: error.stack,
            ...metadata,
          }
        : error === undefined
          ? metadata
          : { error: String(error), ...metadata };

    this.emit('error', message, errorDetails);
  }
}

export default Logger;
