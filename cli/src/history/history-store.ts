import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { HistoryFileSchema, formatIssues, type HistoryEntry } from '@shelfwise/shared';
import { isNotFoundError } from '../utils/fs-errors.js';

/**
 * Record of what has already been recommended, so it is never suggested twice.
 */
export interface HistoryStore {
  entries(): Promise<HistoryEntry[]>;
  pastIds(): Promise<Set<string>>;
  append(ids: readonly string[], date: string): Promise<void>;
  clear(): Promise<void>;
}

/**
 * Calendar date in local time as YYYY-MM-DD.
 */
export function toIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export class JsonHistoryStore implements HistoryStore {
  constructor(private readonly filePath: string) {}

  async entries(): Promise<HistoryEntry[]> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) return [];
      throw error;
    }

    const parsed = HistoryFileSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Recommendation history ${this.filePath} is corrupt: ${formatIssues(parsed.error)}`);
    }
    return parsed.data.entries;
  }

  async pastIds(): Promise<Set<string>> {
    return new Set((await this.entries()).map(entry => entry.itemId));
  }

  async append(ids: readonly string[], date: string): Promise<void> {
    if (ids.length === 0) return;
    const entries = await this.entries();
    for (const itemId of ids) {
      entries.push({ recommendedOn: date, itemId });
    }
    await this.write(entries);
  }

  async clear(): Promise<void> {
    await this.write([]);
  }

  private async write(entries: HistoryEntry[]): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify({ entries }, null, 2));
  }
}
