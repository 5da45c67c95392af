/**
 * Thermostat Logger
 * Levelled, categorised logging for BLE sessions. Console always, file when a log directory is set.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getPlatformConfig, LogLevel } from './PlatformConfig';

export type LogCategory =
  | 'SESSION'
  | 'TRANSFER'
  | 'CODEC'
  | 'COORDINATOR'
  | 'DEVICE'
  | 'TRANSPORT'
  | 'DISCOVERY'
  | 'STORE'
  | 'CONNECTION';

type LineLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LoggerOptions {
  level?: LogLevel;
  logDir?: string | null;
}

export class ThermostatLogger {
  private level: LogLevel;
  private logFilePath = '';
  private logStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    const config = getPlatformConfig();
    this.level = options.level ?? config.logLevel;
    const logDir = options.logDir !== undefined ? options.logDir : config.logDir;
    if (logDir) {
      this.openFile(logDir);
    }
  }

  private openFile(logDir: string): void {
    try {
      fs.mkdirSync(logDir, { recursive: true });
      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(logDir, `thermostat-${timestamp}.log`);
      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });
      this.logStream.on('error', (error) => {
        console.warn('[ThermostatLogger] File logging disabled -', error.message);
        this.logStream = null;
      });
    } catch (error) {
      console.warn('[ThermostatLogger] File logging disabled -', error instanceof Error ? error.message : String(error));
      this.logFilePath = '';
      this.logStream = null;
    }
  }

  /**
   * Reconfigure level and/or destination at runtime.
   */
  configure(options: LoggerOptions): void {
    if (options.level !== undefined) {
      this.level = options.level;
    }
    if (options.logDir !== undefined) {
      this.close();
      if (options.logDir) {
        this.openFile(options.logDir);
      }
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  isEnabled(level: LineLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  formatMessage(level: LineLevel, category: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    let logLine = `[${timestamp}] [${level.toUpperCase()}] [${category}] ${message}`;

    if (data !== undefined) {
      try {
        logLine += ` | ${JSON.stringify(data)}`;
      } catch {
        logLine += ' | [Unserializable data]';
      }
    }

    return logLine;
  }

  log(level: LineLevel, message: string, data?: unknown, category: string = 'DEVICE'): void {
    if (!this.isEnabled(level)) return;

    const formattedMessage = this.formatMessage(level, category, message, data);

    if (level === 'error') {
      console.error(formattedMessage);
    } else if (level === 'warn') {
      console.warn(formattedMessage);
    } else {
      console.log(formattedMessage);
    }

    if (this.logStream) {
      this.logStream.write(formattedMessage + '\n');
    }
  }

  debug(message: string, data?: unknown, category: LogCategory = 'DEVICE'): void {
    this.log('debug', message, data, category);
  }

  info(message: string, data?: unknown, category: LogCategory = 'DEVICE'): void {
    this.log('info', message, data, category);
  }

  warn(message: string, data?: unknown, category: LogCategory = 'DEVICE'): void {
    this.log('warn', message, data, category);
  }

  error(message: string, data?: unknown, category: LogCategory = 'DEVICE'): void {
    this.log('error', message, data, category);
  }

  // Connection-specific logging
  logConnection(address: string, phase: string, details?: unknown): void {
    this.info(`${phase} - ${address}`, details, 'CONNECTION');
  }

  logConnectionError(address: string, phase: string, error: unknown): void {
    this.error(`${phase} FAILED - ${address}`, {
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    }, 'CONNECTION');
  }

  logFrame(direction: 'read' | 'write', uuid: string, bytes: Uint8Array): void {
    if (!this.isEnabled('debug')) return;
    this.debug(`${direction === 'read' ? '<-' : '->'} ${uuid}`, { hex: Buffer.from(bytes).toString('hex') }, 'TRANSFER');
  }

  close(): void {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
    this.logFilePath = '';
  }

  getLogPath(): string {
    return this.logFilePath;
  }
}

// Singleton instance
export const thermostatLogger = new ThermostatLogger();
