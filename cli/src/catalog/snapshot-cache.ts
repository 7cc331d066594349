import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { CatalogSnapshotSchema, formatIssues, type CatalogSnapshot } from '@shelfwise/shared';
import { isNotFoundError } from '../utils/fs-errors.js';

/**
 * Local copy of the catalog, replaced wholesale whenever the upstream ID set changes.
 */
export interface SnapshotCache {
  load(): Promise<CatalogSnapshot | null>;
  save(snapshot: CatalogSnapshot): Promise<void>;
}

export class JsonSnapshotCache implements SnapshotCache {
  constructor(private readonly filePath: string) {}

  async load(): Promise<CatalogSnapshot | null> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) return null;
      throw error;
    }

    const parsed = CatalogSnapshotSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(
        `Catalog snapshot ${this.filePath} is corrupt (${formatIssues(parsed.error)}); run "sync --force" to rebuild it`
      );
    }
    return parsed.data;
  }

  async save(snapshot: CatalogSnapshot): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, JSON.stringify(snapshot, null, 2));
  }
}
