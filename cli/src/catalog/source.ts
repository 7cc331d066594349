import { readFile } from 'fs/promises';
import { z } from 'zod';
import {
  err,
  formatIssues,
  ok,
  type Item,
  type ItemFetchFailure,
  type Result,
} from '@shelfwise/shared';

export type ItemFetchOutcome = Result<Item, ItemFetchFailure>;

/**
 * Upstream catalog the snapshot is synced from.
 */
export interface CatalogSource {
  listIds(): Promise<string[]>;
  fetchItem(id: string): Promise<ItemFetchOutcome>;
}

const IdSchema = z.union([z.string().min(1), z.number()]).transform(String);

// Authors and tags come either as a list or as an already joined string
const TextListSchema = z.union([z.array(z.string()), z.string()]).nullish();

const ExportRecordSchema = z.object({
  id: IdSchema,
  title: z.string().nullish(),
  authors: TextListSchema,
  tags: TextListSchema,
});

// Records are checked one at a time in fetchItem so a bad one cannot sink the whole file
const ExportFileSchema = z.object({
  items: z.array(z.unknown()),
});

function readId(record: unknown): string | null {
  if (typeof record !== 'object' || record === null || !('id' in record)) return null;
  const id = IdSchema.safeParse(record.id);
  return id.success ? id.data : null;
}

/**
 * Key listed for a record whose id cannot be read, so it still surfaces as a sync failure.
 */
export function unreadableRecordKey(position: number): string {
  return `<record ${position}>`;
}

function joinText(value: string[] | string | null | undefined): string {
  if (Array.isArray(value)) return value.join(', ');
  return value ?? '';
}

/**
 * Map one raw export record onto an Item. A missing title becomes `Book <id>`.
 */
export function toItem(record: unknown): Result<Item, ItemFetchFailure> {
  const parsed = ExportRecordSchema.safeParse(record);
  if (!parsed.success) {
    return err({
      id: readId(record) ?? '',
      reason: 'invalid',
      message: formatIssues(parsed.error),
    });
  }

  const { id, title, authors, tags } = parsed.data;
  return ok({
    id,
    title: title ?? `Book ${id}`,
    author: joinText(authors),
    topic: joinText(tags),
  });
}

/**
 * Catalog source backed by a library export file:
 * `{ "items": [{ "id": 1, "title": "...", "authors": [...], "tags": [...] }] }`.
 * The file is read once per instance.
 */
export class ExportFileSource implements CatalogSource {
  private records: Map<string, unknown> | null = null;

  constructor(private readonly filePath: string) {}

  private async load(): Promise<Map<string, unknown>> {
    if (this.records) return this.records;

    const raw: unknown = JSON.parse(await readFile(this.filePath, 'utf-8'));
    const parsed = ExportFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Library export ${this.filePath} is malformed: ${formatIssues(parsed.error)}`);
    }

    const records = new Map<string, unknown>();
    parsed.data.items.forEach((record, position) => {
      const id = readId(record) ?? unreadableRecordKey(position);
      if (!records.has(id)) {
        records.set(id, record);
      }
    });
    this.records = records;
    return records;
  }

  async listIds(): Promise<string[]> {
    return [...(await this.load()).keys()];
  }

  async fetchItem(id: string): Promise<ItemFetchOutcome> {
    const records = await this.load();
    if (!records.has(id)) {
      return err({ id, reason: 'not-found', message: `No item with id ${id} in ${this.filePath}` });
    }
    const outcome = toItem(records.get(id));
    return outcome.ok ? outcome : err({ ...outcome.error, id });
  }
}
