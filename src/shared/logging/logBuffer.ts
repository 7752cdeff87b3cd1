export interface LogSnapshot {
  lines: string[];
  limit: number;
  dropped: number;
  updatedAt: string | null;
}

const DEFAULT_LINE_LIMIT = 2000;

/**
 * Keeps the most recent log lines in memory for `GET /api/logs`.
 */
class LogBuffer {
  private lines: string[] = [];
  private dropped = 0;
  private updatedAt: string | null = null;

  constructor(private readonly limit = DEFAULT_LINE_LIMIT) {}

  public append(rawLine: string): void {
    if (!rawLine) return;
    const line = rawLine.replace(/\r\n/g, '\n');
    this.lines.push(line);
    if (this.lines.length > this.limit) {
      const overflow = this.lines.length - this.limit;
      this.lines = this.lines.slice(overflow);
      this.dropped += overflow;
    }
    this.updatedAt = new Date().toISOString();
  }

  public snapshot(tail?: number): LogSnapshot {
    const count = typeof tail === 'number' && tail > 0 ? Math.floor(tail) : this.lines.length;
    return {
      lines: this.lines.slice(-count),
      limit: this.limit,
      dropped: this.dropped,
      updatedAt: this.updatedAt,
    };
  }
}

export const logBuffer = new LogBuffer();
