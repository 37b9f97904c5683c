import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { log } from '../utils/logger';

export interface ActivityEntry {
  type: string;
  timestamp: string;
  data: Record<string, unknown>;
}

export interface ActivitySummary {
  total: number;
  byType: Record<string, number>;
  last?: ActivityEntry;
}

const isEntry = (value: unknown): value is ActivityEntry =>
  typeof value === 'object' &&
  value !== null &&
  'type' in value &&
  typeof value.type === 'string' &&
  'timestamp' in value &&
  typeof value.timestamp === 'string';

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** Append-only JSON array of everything the service did. Writes are serialized. */
export class ActivityLog {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly filePath: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async read(): Promise<ActivityEntry[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter(isEntry) : [];
  }

  record(type: string, data: Record<string, unknown>): Promise<ActivityEntry> {
    const entry: ActivityEntry = { type, timestamp: this.now().toISOString(), data };
    const write = this.queue.then(async () => {
      const entries = await this.read();
      entries.push(entry);
      await mkdir(path.dirname(this.filePath), { recursive: true });
      await writeFile(this.filePath, JSON.stringify(entries, null, 2), 'utf8');
      log('DEBUG', `activity recorded: ${type}`);
      return entry;
    });
    // a failed write must not block later ones
    this.queue = write.catch(() => undefined);
    return write;
  }

  async summarize(): Promise<ActivitySummary> {
    const entries = await this.read();
    const byType: Record<string, number> = {};
    for (const entry of entries) byType[entry.type] = (byType[entry.type] ?? 0) + 1;
    return { total: entries.length, byType, last: entries.at(-1) };
  }
}
