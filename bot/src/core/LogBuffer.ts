/**
 * LogBuffer - Bounded in-memory history of log lines
 *
 * Backs the admin live log viewer (GET /api/logs and the WebSocket stream).
 * Entries carry a monotonically increasing sequence number so clients can
 * poll with `after=<seq>` without missing or repeating lines.
 */

export type LogLevelName = "DEBUG" | "INFO" | "WARN" | "ERROR";

export interface LogEntry {
  seq: number;
  timestamp: string;
  level: LogLevelName;
  packageName: string;
  message: string;
}

export type LogListener = (entry: LogEntry) => void;

export class LogBuffer {
  private entries: LogEntry[] = [];
  private nextSeq = 1;
  private listeners = new Set<LogListener>();

  constructor(private readonly capacity: number = 1000) {}

  push(level: LogLevelName, packageName: string, message: string): LogEntry {
    const entry: LogEntry = {
      seq: this.nextSeq++,
      timestamp: new Date().toISOString(),
      level,
      packageName,
      message,
    };

    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (error) {
        // Listeners must not feed back into the logger, so report on stderr only
        console.error("LogBuffer listener failed:", error);
      }
    }

    return entry;
  }

  /**
   * Entries with seq > after, oldest first, at most `limit`
   */
  since(after: number = 0, limit: number = 200): LogEntry[] {
    const result: LogEntry[] = [];
    for (const entry of this.entries) {
      if (entry.seq <= after) continue;
      result.push(entry);
      if (result.length >= limit) break;
    }
    return result;
  }

  latestSeq(): number {
    return this.nextSeq - 1;
  }

  size(): number {
    return this.entries.length;
  }

  subscribe(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.entries = [];
  }
}

/** Process-wide buffer every Logger writes into */
export const logBuffer = new LogBuffer();
