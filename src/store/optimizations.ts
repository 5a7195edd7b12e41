import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import { OptimizationError, messageOf } from '../errors';
import type { OptimizationRecord, OptimizationSummary } from '../types';

/** Append-only history: records are inserted, read and deleted, never updated. */
export interface HistoryStore {
  save(record: OptimizationRecord): Promise<string>;
  list(limit: number, offset: number): Promise<OptimizationSummary[]>;
  get(id: string): Promise<OptimizationRecord>;
  delete(id: string): Promise<void>;
}

const PREVIEW_LENGTH = 200;

const recordSchema = z.object({
  id: z.string().min(1),
  created_at: z.string().min(1),
  job_url: z.string().nullable().default(null),
  job_posting_content: z.string(),
  resume_source_text: z.string(),
  optimized_resume: z.string(),
  suggestions: z.array(z.string()),
  match_score: z.number().min(0).max(1),
  truncation: z
    .object({ job_posting: z.boolean(), resume: z.boolean() })
    .default({ job_posting: false, resume: false }),
});

const storeFileSchema = z.array(recordSchema);

const copyRecord = (record: OptimizationRecord): OptimizationRecord => ({
  ...record,
  suggestions: [...record.suggestions],
  truncation: { ...record.truncation },
});

export const summarize = (record: OptimizationRecord): OptimizationSummary => ({
  id: record.id,
  created_at: record.created_at,
  job_url: record.job_url,
  job_posting_preview: record.job_posting_content.replace(/\s+/g, ' ').trim().slice(0, PREVIEW_LENGTH),
  match_score: record.match_score,
  suggestion_count: record.suggestions.length,
});

const notFound = (id: string): OptimizationError =>
  new OptimizationError('NotFound', `Optimization ${id} not found.`);

export class JsonFileHistoryStore implements HistoryStore {
  private readonly dataDir: string;

  private readonly storePath: string;

  private recordsById = new Map<string, OptimizationRecord>();

  private loadPromise: Promise<void> | null = null;

  private writeQueue: Promise<void> = Promise.resolve();

  constructor(dataDir = '.data') {
    this.dataDir = path.resolve(dataDir);
    this.storePath = path.join(this.dataDir, 'optimizations.json');
  }

  private async loadStoreFromDisk(): Promise<void> {
    let raw: string;

    try {
      raw = await fs.readFile(this.storePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return;
      }
      throw new OptimizationError('PersistenceError', `Failed to read history store: ${messageOf(error)}`, {
        cause: error,
      });
    }

    if (!raw.trim()) {
      return;
    }

    let entries: OptimizationRecord[];

    try {
      entries = storeFileSchema.parse(JSON.parse(raw));
    } catch (error) {
      throw new OptimizationError('PersistenceError', `History store ${this.storePath} is corrupt.`, {
        cause: error,
      });
    }

    entries.forEach((entry) => {
      this.recordsById.set(entry.id, entry);
    });
    console.info(`[STORE] Loaded ${entries.length} optimization(s) from ${this.storePath}`);
  }

  private ready(): Promise<void> {
    if (!this.loadPromise) {
      this.loadPromise = this.loadStoreFromDisk().catch((error: unknown) => {
        // Allow the next call to try again.
        this.loadPromise = null;
        throw error;
      });
    }

    return this.loadPromise;
  }

  private async writeSnapshot(snapshot: OptimizationRecord[]): Promise<void> {
    await fs.mkdir(this.dataDir, { recursive: true });
    const tempPath = `${this.storePath}.${process.pid}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2));
    await fs.rename(tempPath, this.storePath);
  }

  /**
   * Applies a change to a copy of the records, writes that copy and only then makes it current.
   * Changes run one at a time, so each one starts from the last successfully written state.
   */
  private commit(change: (draft: Map<string, OptimizationRecord>) => void): Promise<void> {
    const write = this.writeQueue.then(async () => {
      const draft = new Map(this.recordsById);
      change(draft);

      try {
        await this.writeSnapshot(Array.from(draft.values()));
      } catch (error) {
        throw new OptimizationError('PersistenceError', `Failed to persist history store: ${messageOf(error)}`, {
          cause: error,
        });
      }

      this.recordsById = draft;
    });

    // The failure reaches the caller below; later changes still run.
    this.writeQueue = write.catch(() => undefined);

    return write;
  }

  async save(record: OptimizationRecord): Promise<string> {
    await this.ready();

    const stored = copyRecord(record);

    await this.commit((draft) => {
      if (draft.has(record.id)) {
        throw new OptimizationError('PersistenceError', `Optimization ${record.id} already exists.`);
      }

      draft.set(record.id, stored);
    });

    return record.id;
  }

  async list(limit: number, offset: number): Promise<OptimizationSummary[]> {
    await this.ready();

    // Reversed insertion order breaks created_at ties in favour of the newer record.
    const newestFirst = Array.from(this.recordsById.values())
      .reverse()
      .sort((a, b) => Date.parse(b.created_at) - Date.parse(a.created_at));

    return newestFirst.slice(Math.max(0, offset), Math.max(0, offset) + Math.max(0, limit)).map(summarize);
  }

  async get(id: string): Promise<OptimizationRecord> {
    await this.ready();

    const record = this.recordsById.get(id);

    if (!record) {
      throw notFound(id);
    }

    return copyRecord(record);
  }

  async delete(id: string): Promise<void> {
    await this.ready();

    await this.commit((draft) => {
      if (!draft.delete(id)) {
        throw notFound(id);
      }
    });
  }
}
