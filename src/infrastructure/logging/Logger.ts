import { writeFileSync, appendFileSync, existsSync, mkdirSync, statSync, renameSync, unlinkSync, readdirSync } from 'fs';
import { basename, dirname, join } from 'path';

import { CLIENT_NAME } from '../../constants.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Anything that can take log lines: the Logger itself or one of its children
 */
export interface LoggerLike {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export interface LoggerOptions {
  /** Mirror entries to stderr (default: true) */
  readonly console?: boolean;
  readonly maxLogSizeBytes?: number;
  readonly maxRotatedLogs?: number;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Logger for the maintenance desk client
 * Writes to stderr and an optional log file. The terminal UI turns the
 * stderr side off while it owns the screen.
 */
export class Logger implements LoggerLike {
  private logFilePath: string | null = null;
  private readonly logLevel: LogLevel;
  private consoleEnabled: boolean;
  /** Notices held back while stderr is off */
  private deferredNotices: string[] = [];
  private readonly maxLogSizeBytes: number;
  private readonly maxRotatedLogs: number;

  constructor(logLevel: LogLevel = 'info', logFilePath?: string, options: LoggerOptions = {}) {
    this.logLevel = logLevel;
    this.consoleEnabled = options.console ?? true;
    this.maxLogSizeBytes = options.maxLogSizeBytes ?? 10 * 1024 * 1024; // 10MB
    this.maxRotatedLogs = options.maxRotatedLogs ?? 5;

    if (logFilePath) {
      this.initializeLogFile(logFilePath);
    }
  }

  /**
   * Path of the active log file, null when file logging is off
   */
  get filePath(): string | null {
    return this.logFilePath;
  }

  /**
   * Enable or disable the stderr side of the logger
   */
  setConsoleOutput(enabled: boolean): void {
    this.consoleEnabled = enabled;
    if (enabled) {
      for (const notice of this.deferredNotices) {
        process.stderr.write(notice);
      }
      this.deferredNotices = [];
    }
  }

  /**
   * Initialize log file with rotation
   */
  private initializeLogFile(logFilePath: string): void {
    try {
      const logDir = dirname(logFilePath);
      if (!existsSync(logDir)) {
        mkdirSync(logDir, { recursive: true });
      }

      this.logFilePath = logFilePath;

      this.rotateLogIfNeeded(logFilePath);
      this.cleanupOldRotatedLogs(logFilePath);

      const header = `\n${'='.repeat(80)}\n${CLIENT_NAME} log - ${new Date().toISOString()}\n${'='.repeat(80)}\n`;
      writeFileSync(logFilePath, header, { flag: 'a' });
    } catch (error) {
      this.disableFileLogging(error);
    }
  }

  /**
   * Rotate log file if it exceeds max size
   */
  private rotateLogIfNeeded(logFilePath: string): void {
    if (!existsSync(logFilePath)) {
      return;
    }

    const stats = statSync(logFilePath);
    if (stats.size > this.maxLogSizeBytes) {
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      renameSync(logFilePath, `${logFilePath}.${timestamp}`);
    }
  }

  /**
   * Clean up old rotated log files
   * Keeps only the most recent N rotated logs
   */
  private cleanupOldRotatedLogs(logFilePath: string): void {
    const logDir = dirname(logFilePath);
    const logFileName = basename(logFilePath);

    const rotatedLogs = readdirSync(logDir)
      .filter(f => f.startsWith(logFileName + '.'))
      .map(f => ({
        path: join(logDir, f),
        mtime: statSync(join(logDir, f)).mtime.getTime()
      }))
      .sort((a, b) => b.mtime - a.mtime); // newest first

    for (const log of rotatedLogs.slice(this.maxRotatedLogs)) {
      unlinkSync(log.path);
    }
  }

  /**
   * Stop writing to the log file and say why, once, on stderr
   * While stderr is off the notice waits until it is turned back on.
   */
  private disableFileLogging(error: unknown): void {
    const path = this.logFilePath;
    this.logFilePath = null;
    const reason = error instanceof Error ? error.message : String(error);
    const notice = `[${CLIENT_NAME}] File logging disabled${path ? ` (${path})` : ''}: ${reason}\n`;
    if (this.consoleEnabled) {
      process.stderr.write(notice);
    } else {
      this.deferredNotices.push(notice);
    }
  }

  debug(message: string, meta?: unknown): void {
    if (!this.shouldLog('debug')) return;
    this.log('DEBUG', message, meta);
  }

  info(message: string, meta?: unknown): void {
    if (!this.shouldLog('info')) return;
    this.log('INFO', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    if (!this.shouldLog('warn')) return;
    this.log('WARN', message, meta);
  }

  error(message: string, meta?: unknown): void {
    if (!this.shouldLog('error')) return;
    this.log('ERROR', message, meta);
  }

  /**
   * Core logging function
   */
  private log(level: string, message: string, meta?: unknown): void {
    const formattedMessage = this.formatMessage(new Date().toISOString(), level, message, meta);

    if (this.consoleEnabled) {
      process.stderr.write(formattedMessage + '\n');
    }

    if (this.logFilePath) {
      try {
        appendFileSync(this.logFilePath, formattedMessage + '\n');
      } catch (error) {
        this.disableFileLogging(error);
      }
    }
  }

  /**
   * Format log message
   */
  private formatMessage(timestamp: string, level: string, message: string, meta?: unknown): string {
    let formatted = `[${timestamp}] [${level.padEnd(5)}] ${message}`;

    if (meta !== undefined) {
      if (typeof meta === 'object' && meta !== null) {
        formatted += '\n' + JSON.stringify(meta, null, 2);
      } else {
        formatted += ` ${String(meta)}`;
      }
    }

    return formatted;
  }

  /**
   * Check if should log based on level
   */
  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  /**
   * Create a child logger with prefix
   */
  child(prefix: string): ChildLogger {
    return new ChildLogger(this, prefix);
  }
}

/**
 * Child logger with prefix
 */
export class ChildLogger implements LoggerLike {
  constructor(
    private readonly parent: LoggerLike,
    private readonly prefix: string
  ) {}

  debug(message: string, meta?: unknown): void {
    this.parent.debug(`[${this.prefix}] ${message}`, meta);
  }

  info(message: string, meta?: unknown): void {
    this.parent.info(`[${this.prefix}] ${message}`, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.parent.warn(`[${this.prefix}] ${message}`, meta);
  }

  error(message: string, meta?: unknown): void {
    this.parent.error(`[${this.prefix}] ${message}`, meta);
  }
}
