import { existsSync, mkdirSync, readFileSync } from 'fs';
import { appendFile } from 'fs/promises';
import path from 'path';
import { APP_NAME, APP_VERSION } from '../version.js';

export interface DeepLogEntry {
  timestamp: string;
  type: string;
  data: Record<string, unknown>;
}

export interface DeepLogExport {
  generatedAt: string;
  app: {
    name: string;
    version: string;
  };
  entries: DeepLogEntry[];
}

/**
 * Append-only JSONL event log. Writes are chained so entries land in the
 * order they were logged.
 */
export class DeepLogger {
  readonly logFile: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(logsPath: string, fileName = 'deep-log.jsonl') {
    if (!existsSync(logsPath)) {
      mkdirSync(logsPath, { recursive: true });
    }
    this.logFile = path.join(logsPath, fileName);
  }

  logEvent(type: string, data: Record<string, unknown>): Promise<void> {
    const entry: DeepLogEntry = {
      timestamp: new Date().toISOString(),
      type,
      data,
    };

    const line = `${JSON.stringify(entry)}\n`;
    const write = this.pending.then(() => appendFile(this.logFile, line, 'utf8'));
    this.pending = write.catch(() => undefined);
    return write;
  }

  /** Resolves once every entry logged so far is on disk. */
  flush(): Promise<void> {
    return this.pending;
  }

  readRecent(limit = 200): DeepLogEntry[] {
    const lines = this.readLines();
    if (lines.length === 0) {
      return [];
    }

    return lines
      .slice(-limit)
      .map((line) => this.parseLine(line))
      .filter((entry): entry is DeepLogEntry => entry !== null);
  }

  exportBundle(limit = 2000): DeepLogExport {
    return {
      generatedAt: new Date().toISOString(),
      app: {
        name: APP_NAME,
        version: APP_VERSION,
      },
      entries: this.readRecent(limit),
    };
  }

  private readLines(): string[] {
    if (!existsSync(this.logFile)) {
      return [];
    }

    const content = readFileSync(this.logFile, 'utf8');
    return content.split('\n').filter((line) => line.trim().length > 0);
  }

  private parseLine(line: string): DeepLogEntry | null {
    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      parsed = null;
    }
    if (isDeepLogEntry(parsed)) {
      return parsed;
    }
    console.warn(`[DeepLogger] Skipping malformed line in ${this.logFile}`);
    return null;
  }
}

function isDeepLogEntry(value: unknown): value is DeepLogEntry {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const entry: Record<string, unknown> = { ...value };
  return typeof entry.timestamp === 'string' &&
    typeof entry.type === 'string' &&
    typeof entry.data === 'object' && entry.data !== null;
}
