import { format } from 'date-fns';
import type { LogEntry, LogSink } from '../types';
import { LogLevel, getLogLevel } from '../types';
import { colorize } from '../utils/color';

export interface ConsoleSinkOptions {
  /** Colour output with chalk (default: true) */
  colors?: boolean;
  /** Prefix lines with a `MM-dd-yyyy HH:mm:ss` timestamp (default: false) */
  timestamps?: boolean;
  /** Prefix lines with `[TYPE]` (default: false) */
  typeLabels?: boolean;
  muted?: boolean;
  /** Least important level still written (default: LogLevel.INFO) */
  minLevel?: LogLevel;
}

/**
 * ConsoleSink writes logs to the console with optional colors, timestamps, and type labels
 */
export class ConsoleSink implements LogSink {
  private readonly colors: boolean;
  private readonly timestamps: boolean;
  private readonly typeLabels: boolean;
  private closed = false;
  private muted: boolean;
  private minLevel: LogLevel;

  constructor(options: ConsoleSinkOptions = {}) {
    this.colors = options.colors ?? true;
    this.timestamps = options.timestamps ?? false;
    this.typeLabels = options.typeLabels ?? false;
    this.muted = options.muted ?? false;
    this.minLevel = options.minLevel ?? LogLevel.INFO;
  }

  public write(entry: LogEntry): void {
    if (this.closed || this.muted) {
      return;
    }

    // Raw type - no formatting and always shown
    if (entry.type === 'raw') {
      // eslint-disable-next-line no-console
      console.log(entry.message);
      return;
    }

    if (getLogLevel(entry.type) > this.minLevel) {
      return;
    }

    const line = this.format(entry);
    const output = this.colors ? colorize(entry.type, line) : line;

    switch (entry.type) {
      case 'error':
        // eslint-disable-next-line no-console
        console.error(output);
        break;
      case 'warn':
        // eslint-disable-next-line no-console
        console.warn(output);
        break;
      case 'info':
        // eslint-disable-next-line no-console
        console.info(output);
        break;
      case 'success':
      case 'notice':
      case 'debug':
        // eslint-disable-next-line no-console
        console.log(output);
        break;
    }
  }

  /**
   * Build the uncoloured line: `[timestamp] [TYPE] [service] [entity] message`
   */
  public format(entry: LogEntry): string {
    let line = '';

    if (this.timestamps) {
      line += `[${format(entry.timestamp, 'MM-dd-yyyy HH:mm:ss')}] `;
    }

    if (this.typeLabels) {
      line += `[${entry.type.toUpperCase()}] `;
    }

    if (entry.serviceName) {
      line += `[${entry.serviceName}] `;
    }

    if (entry.entityName) {
      line += `[${entry.entityName}] `;
    }

    return line + entry.message;
  }

  public setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  public getMinLevel(): LogLevel {
    return this.minLevel;
  }

  public mute(): void {
    this.muted = true;
  }

  public unmute(): void {
    this.muted = false;
  }

  public isMuted(): boolean {
    return this.muted;
  }

  public close(): void {
    this.closed = true;
  }
}
