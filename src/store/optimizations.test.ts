import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';

import type { OptimizationRecord } from '../types';
import { JsonFileHistoryStore, summarize } from './optimizations';

const buildRecord = (id: string, createdAt: string, overrides: Partial<OptimizationRecord> = {}): OptimizationRecord => ({
  id,
  created_at: createdAt,
  job_url: null,
  job_posting_content: `Posting for ${id}`,
  resume_source_text: 'Original resume',
  optimized_resume: `Optimized resume ${id}`,
  suggestions: ['First', 'Second'],
  match_score: 0.5,
  truncation: { job_posting: false, resume: false },
  ...overrides,
});

describe('JsonFileHistoryStore', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'history-store-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  it('returns an equal record after save, regardless of other saves and deletes', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    const record = buildRecord('a', '2024-05-01T10:00:00.000Z');

    await expect(store.save(record)).resolves.toBe('a');
    await store.save(buildRecord('b', '2024-05-01T11:00:00.000Z'));
    await store.save(buildRecord('c', '2024-05-01T12:00:00.000Z'));
    await store.delete('b');

    await expect(store.get('a')).resolves.toEqual(record);
  });

  it('hands out copies so callers cannot mutate stored records', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    await store.save(buildRecord('a', '2024-05-01T10:00:00.000Z'));

    const first = await store.get('a');
    first.suggestions.push('Injected');

    await expect(store.get('a')).resolves.toMatchObject({ suggestions: ['First', 'Second'] });
  });

  it('reports NotFound on get and on a repeated delete', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    await store.save(buildRecord('a', '2024-05-01T10:00:00.000Z'));

    await expect(store.delete('a')).resolves.toBeUndefined();
    await expect(store.get('a')).rejects.toMatchObject({ kind: 'NotFound' });
    await expect(store.delete('a')).rejects.toMatchObject({ kind: 'NotFound' });
  });

  it('rejects a second save with the same id', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    await store.save(buildRecord('a', '2024-05-01T10:00:00.000Z'));

    await expect(store.save(buildRecord('a', '2024-05-02T10:00:00.000Z'))).rejects.toMatchObject({
      kind: 'PersistenceError',
    });
  });

  it('lists summaries most recent first with limit and offset', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    await store.save(buildRecord('old', '2024-05-01T10:00:00.000Z'));
    await store.save(buildRecord('newest', '2024-05-03T10:00:00.000Z'));
    await store.save(buildRecord('middle', '2024-05-02T10:00:00.000Z'));

    expect((await store.list(10, 0)).map((summary) => summary.id)).toEqual(['newest', 'middle', 'old']);
    expect((await store.list(1, 1)).map((summary) => summary.id)).toEqual(['middle']);
    await expect(store.list(10, 5)).resolves.toEqual([]);
  });

  it('lists the later insert first when timestamps tie', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    await store.save(buildRecord('first', '2024-05-01T10:00:00.000Z'));
    await store.save(buildRecord('second', '2024-05-01T10:00:00.000Z'));

    expect((await store.list(10, 0)).map((summary) => summary.id)).toEqual(['second', 'first']);
  });

  it('survives a restart by reading the store file', async () => {
    const record = buildRecord('a', '2024-05-01T10:00:00.000Z', { job_url: 'https://jobs.example.com/1' });
    await new JsonFileHistoryStore(dataDir).save(record);

    await expect(new JsonFileHistoryStore(dataDir).get('a')).resolves.toEqual(record);
  });

  it('keeps concurrent saves without losing any of them', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    const ids = ['a', 'b', 'c', 'd', 'e'];

    await Promise.all(ids.map((id, index) => store.save(buildRecord(id, `2024-05-0${index + 1}T10:00:00.000Z`))));

    const reloaded = new JsonFileHistoryStore(dataDir);
    expect((await reloaded.list(10, 0)).map((summary) => summary.id)).toEqual(['e', 'd', 'c', 'b', 'a']);
  });

  it('fails with PersistenceError when the data directory cannot be created', async () => {
    const blocker = path.join(dataDir, 'not-a-directory');
    await fs.writeFile(blocker, 'occupied');
    const store = new JsonFileHistoryStore(path.join(blocker, 'nested'));

    await expect(store.save(buildRecord('a', '2024-05-01T10:00:00.000Z'))).rejects.toMatchObject({
      kind: 'PersistenceError',
    });
  });

  it('rolls back a save whose write fails', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    await expect(store.list(10, 0)).resolves.toEqual([]);

    // A directory in place of the store file makes the final rename fail.
    await fs.mkdir(path.join(dataDir, 'optimizations.json', 'occupied'), { recursive: true });

    await expect(store.save(buildRecord('a', '2024-05-01T10:00:00.000Z'))).rejects.toMatchObject({
      kind: 'PersistenceError',
    });
    await expect(store.get('a')).rejects.toMatchObject({ kind: 'NotFound' });
  });

  it('never writes a failed save through a save queued behind it', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    await store.list(10, 0);
    vi.spyOn(fs, 'writeFile').mockRejectedValueOnce(new Error('disk full'));

    const [first, second] = await Promise.allSettled([
      store.save(buildRecord('a', '2024-05-01T10:00:00.000Z')),
      store.save(buildRecord('b', '2024-05-02T10:00:00.000Z')),
    ]);

    expect(first).toMatchObject({ status: 'rejected', reason: { kind: 'PersistenceError' } });
    expect(second).toEqual({ status: 'fulfilled', value: 'b' });
    expect((await store.list(10, 0)).map((summary) => summary.id)).toEqual(['b']);
    expect((await new JsonFileHistoryStore(dataDir).list(10, 0)).map((summary) => summary.id)).toEqual(['b']);
  });

  it('keeps a record and its tie order when its delete fails to persist', async () => {
    const store = new JsonFileHistoryStore(dataDir);
    await store.save(buildRecord('a', '2024-05-01T10:00:00.000Z'));
    await store.save(buildRecord('b', '2024-05-01T10:00:00.000Z'));
    vi.spyOn(fs, 'writeFile').mockRejectedValueOnce(new Error('disk full'));

    await expect(store.delete('a')).rejects.toMatchObject({ kind: 'PersistenceError' });

    expect((await store.list(10, 0)).map((summary) => summary.id)).toEqual(['b', 'a']);
    expect((await new JsonFileHistoryStore(dataDir).list(10, 0)).map((summary) => summary.id)).toEqual(['b', 'a']);
  });

  it('fails with PersistenceError when the store file is corrupt', async () => {
    await fs.writeFile(path.join(dataDir, 'optimizations.json'), '{ not json');
    const store = new JsonFileHistoryStore(dataDir);

    await expect(store.list(10, 0)).rejects.toMatchObject({ kind: 'PersistenceError' });
  });
});

describe('summarize', () => {
  it('collapses whitespace in the posting preview and counts suggestions', () => {
    const record = buildRecord('a', '2024-05-01T10:00:00.000Z', {
      job_posting_content: 'Backend   Engineer\n\nRemote',
      match_score: 0.45,
    });

    expect(summarize(record)).toEqual({
      id: 'a',
      created_at: '2024-05-01T10:00:00.000Z',
      job_url: null,
      job_posting_preview: 'Backend Engineer Remote',
      match_score: 0.45,
      suggestion_count: 2,
    });
  });
});
