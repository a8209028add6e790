import type { ArrayLogTransformer, LogEntry, LogSink } from '../types';

/**
 * ArraySink stores logs in memory for testing and debugging
 */
export class ArraySink implements LogSink {
  public logs: LogEntry[] = [];
  private readonly transformer?: ArrayLogTransformer;
  private closed = false;

  constructor(options?: { transformer?: ArrayLogTransformer }) {
    this.transformer = options?.transformer;
  }

  public write(entry: LogEntry): void {
    if (this.closed) {
      return;
    }

    const transformed = this.transformer ? this.transformer(entry) : false;
    this.logs.push(transformed === false ? entry : transformed);
  }

  public clear(): void {
    this.logs = [];
  }

  /**
   * One `type: message` line per stored log, for compact assertions
   */
  public getSnapshotFriendlyLogs(): string[] {
    return this.logs.map((log) => `${log.type}: ${log.message}`);
  }

  public close(): void {
    this.closed = true;
  }
}
