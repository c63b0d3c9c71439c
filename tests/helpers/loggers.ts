import type { Logger } from '../../src/utils/logger.js';

type Level = 'info' | 'warn' | 'error';

/** Keeps every line; levels named in `failing` reject instead of writing. */
export class RecordingLogger implements Logger {
  readonly lines: string[] = [];

  constructor(
    private readonly failing: readonly Level[] = [],
    private readonly failure = 'ENOSPC: no space left on device',
  ) {}

  info(message: string): Promise<void> {
    return this.record('info', message);
  }

  warn(message: string): Promise<void> {
    return this.record('warn', message);
  }

  error(message: string): Promise<void> {
    return this.record('error', message);
  }

  private async record(level: Level, message: string): Promise<void> {
    if (this.failing.includes(level)) {
      throw new Error(this.failure);
    }
    this.lines.push(`[${level.toUpperCase()}] ${message}`);
  }
}
