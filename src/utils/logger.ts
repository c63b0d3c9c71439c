import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

function nowIso(): string {
  return new Date().toISOString();
}

export interface Logger {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

export class RunLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly runLabel = 'Scraper run',
  ) {}

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', 'utf8');
    await this.write(`=== ${this.runLabel} started ${nowIso()} ===`);
  }

  async info(message: string): Promise<void> {
    await this.write(`[INFO] ${message}`);
  }

  async warn(message: string): Promise<void> {
    await this.write(`[WARN] ${message}`);
  }

  async error(message: string): Promise<void> {
    await this.write(`[ERROR] ${message}`);
  }

  async close(): Promise<void> {
    await this.write(`=== ${this.runLabel} finished ${nowIso()} ===`);
  }

  private async write(message: string): Promise<void> {
    await appendFile(this.filePath, `${nowIso()} ${message}\n`, 'utf8');
  }
}

// stderr, so that CLI output on stdout stays machine-readable.
export class ConsoleLogger implements Logger {
  constructor(private readonly scope = 'scraper') {}

  async info(message: string): Promise<void> {
    this.write('INFO', message);
  }

  async warn(message: string): Promise<void> {
    this.write('WARN', message);
  }

  async error(message: string): Promise<void> {
    this.write('ERROR', message);
  }

  private write(level: string, message: string): void {
    process.stderr.write(`${nowIso()} [${level}] ${this.scope}: ${message}\n`);
  }
}

export const silentLogger: Logger = {
  info: async () => undefined,
  warn: async () => undefined,
  error: async () => undefined,
};

/** Awaits a log write; a failed write goes to stderr instead of the caller. */
export async function logSafely(write: Promise<void>): Promise<void> {
  await write.catch((error: unknown) => {
    process.stderr.write(`Logging failed: ${String(error)}\n`);
  });
}
