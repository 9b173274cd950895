import { EventEmitter } from 'node:events';

export interface LogEntry {
  line: string;
  timestamp: string;
}

export interface LogSnapshot {
  log: string;
  size: number;
  limit: number;
  truncated: boolean;
  updatedAt: string | null;
}

type LogListener = (entry: LogEntry) => void;

/**
 * Rolling in-memory copy of recent log lines, attached to diagnostics reports
 * when a session ends in an error the user has to see.
 */
export class LogBuffer extends EventEmitter {
  private buffer = '';
  private truncated = false;
  private updatedAt: string | null = null;

  constructor(private readonly limit = 200_000) {
    super();
  }

  public append(rawLine: string): void {
    if (!rawLine) return;
    const normalized = rawLine.replace(/\r\n/g, '\n');
    const needsSeparator = this.buffer && !this.buffer.endsWith('\n');
    let combined = needsSeparator ? `${this.buffer}\n${normalized}` : `${this.buffer}${normalized}`;
    if (combined.length > this.limit) {
      combined = combined.slice(combined.length - this.limit);
      this.truncated = true;
    }
    this.buffer = combined;
    this.updatedAt = new Date().toISOString();
    this.emit('entry', { line: normalized, timestamp: this.updatedAt } satisfies LogEntry);
  }

  public snapshot(): LogSnapshot {
    return {
      log: this.buffer,
      size: Buffer.byteLength(this.buffer, 'utf8'),
      limit: this.limit,
      truncated: this.truncated,
      updatedAt: this.updatedAt,
    };
  }

  /** Last `count` lines, oldest first. */
  public tail(count: number): string[] {
    if (count <= 0 || !this.buffer) return [];
    const lines = this.buffer.split('\n').filter((line) => line.length > 0);
    return lines.slice(-count);
  }

  public clear(): void {
    this.buffer = '';
    this.truncated = false;
    this.updatedAt = null;
  }

  public subscribe(listener: LogListener): () => void {
    this.on('entry', listener);
    return () => this.off('entry', listener);
  }
}

export const logBuffer = new LogBuffer();
