import { readFileSync } from 'node:fs';
import { expect, test } from '@playwright/test';
import { RelationsCheckpoint } from '../src/cache';
import { FetchError, StructuralParseError } from '../src/errors';
import { createRecord, createStub, ResultSet } from '../src/models';
import { type ProgressEvent, ResumableWorkerPool } from '../src/pool';
import { extractRoster } from '../src/scrapers/roster';
import type { FamilyRelation, LegislatorStub } from '../src/types';
import {
  biographyPage,
  createTempDir,
  FakeExtractor,
  FakeFetcher,
  MemoryCheckpoint,
  rosterPage,
  rosterRow,
  silentProgress,
} from './helpers';

function makeStubs(count: number): LegislatorStub[] {
  return Array.from({ length: count }, (_, id) =>
    createStub({
      id,
      name: `MP ${id}`,
      url: `https://en.wikipedia.org/wiki/MP_${id}`,
      rawParty: id % 2 === 0 ? 'Labour Party (UK)' : 'Conservative Party (UK)',
    })
  );
}

function pagesFor(stubs: readonly LegislatorStub[]): Map<string, string> {
  return new Map(stubs.map((stub) => [stub.url, biographyPage(`Biography of ${stub.name}.`)]));
}

const father: FamilyRelation = { name: 'Senior MP', role: 'MP', relation: 'father', party: 'Labour' };

const sortedIds = (records: ReadonlyArray<{ id: number }>) =>
  records.map((r) => r.id).sort((a, b) => a - b);

test.describe('ResumableWorkerPool', () => {
  test('should process only ids missing from the checkpoint', async () => {
    const html = rosterPage([
      rosterRow({ name: 'Alice Example', path: '/wiki/Alice_Example', party: 'Labour Party (UK)' }),
      rosterRow({ name: 'Bob Sample', path: '/wiki/Bob_Sample', party: 'Conservative Party (UK)' }),
      rosterRow({ name: 'Carol Test', path: '/wiki/Carol_Test', party: 'Green Party' }),
    ]);
    const stubs = extractRoster(html);
    expect(stubs.map((s) => s.id)).toEqual([0, 1, 2]);

    const [, bob] = stubs;
    if (!bob) throw new Error('roster fixture lost a row');
    const results = new ResultSet([createRecord(bob, [])]);

    const fetcher = new FakeFetcher(pagesFor(stubs));
    const extractor = new FakeExtractor();
    const checkpoint = new MemoryCheckpoint();
    const pool = new ResumableWorkerPool(
      { fetcher, extractor, checkpoint },
      { concurrency: 2, onProgress: silentProgress }
    );

    const result = await pool.run(stubs, results);

    expect([...fetcher.calls].sort()).toEqual([
      'https://en.wikipedia.org/wiki/Alice_Example',
      'https://en.wikipedia.org/wiki/Carol_Test',
    ]);
    expect(sortedIds(result.records)).toEqual([0, 1, 2]);
    expect(result.processed).toBe(2);
    expect(result.skipped).toBe(1);
    expect(result.failures).toEqual([]);
    expect(checkpoint.lastSavedIds()).toEqual([0, 1, 2]);
  });

  test('should pass the biography text to the extractor and keep its relations', async () => {
    const stubs = makeStubs(1);
    const extractor = new FakeExtractor(() => [father]);
    const pool = new ResumableWorkerPool(
      { fetcher: new FakeFetcher(pagesFor(stubs)), extractor, checkpoint: new MemoryCheckpoint() },
      { onProgress: silentProgress }
    );

    const { records } = await pool.run(stubs, new ResultSet());

    expect(extractor.texts).toEqual(['Biography of MP 0.']);
    expect(records).toEqual([
      {
        id: 0,
        name: 'MP 0',
        url: 'https://en.wikipedia.org/wiki/MP_0',
        rawParty: 'Labour Party (UK)',
        party: 'Labour',
        relations: [father],
        relationsCount: 1,
        ancestorCount: 1,
      },
    ]);
  });

  test('should never refetch ids saved by an earlier run', async () => {
    const { dir, cleanup } = createTempDir();
    try {
      const stubs = makeStubs(4);
      const fetcher = new FakeFetcher(pagesFor(stubs));
      const extractor = new FakeExtractor();
      const checkpoint = new RelationsCheckpoint(dir);
      const pool = new ResumableWorkerPool(
        { fetcher, extractor, checkpoint },
        { concurrency: 3, onProgress: silentProgress }
      );

      const first = await pool.run(stubs, new ResultSet(checkpoint.load()));
      const second = await pool.run(stubs, new ResultSet(checkpoint.load()));

      expect(fetcher.calls).toHaveLength(4);
      expect(extractor.texts).toHaveLength(4);
      expect(first.processed).toBe(4);
      expect(second.processed).toBe(0);
      expect(second.skipped).toBe(4);
      expect(second.records).toHaveLength(first.records.length);
    } finally {
      cleanup();
    }
  });

  test('should keep one record per id under concurrency', async () => {
    const stubs = makeStubs(10);
    const pool = new ResumableWorkerPool(
      {
        fetcher: new FakeFetcher(pagesFor(stubs), 1),
        extractor: new FakeExtractor(),
        checkpoint: new MemoryCheckpoint(),
      },
      { concurrency: 5, onProgress: silentProgress }
    );

    const { records } = await pool.run(stubs, new ResultSet());

    expect(records).toHaveLength(10);
    expect(new Set(records.map((r) => r.id)).size).toBe(10);
  });

  test('should not exceed the configured concurrency', async () => {
    const stubs = makeStubs(6);
    const fetcher = new FakeFetcher(pagesFor(stubs), 5);
    const pool = new ResumableWorkerPool(
      { fetcher, extractor: new FakeExtractor(), checkpoint: new MemoryCheckpoint() },
      { concurrency: 2, onProgress: silentProgress }
    );

    await pool.run(stubs, new ResultSet());

    expect(fetcher.maxInFlight).toBe(2);
    expect(fetcher.calls).toHaveLength(6);
  });

  test('should flush completed records when an item fails and carry on', async () => {
    const { dir, cleanup } = createTempDir();
    try {
      const stubs = makeStubs(3);
      const fetcher = new FakeFetcher(pagesFor(stubs));
      fetcher.failNext('https://en.wikipedia.org/wiki/MP_1');
      const checkpoint = new RelationsCheckpoint(dir);
      const saves: number[][] = [];
      const pool = new ResumableWorkerPool(
        {
          fetcher,
          extractor: new FakeExtractor(),
          checkpoint: {
            save: (records) => {
              saves.push(records.map((r) => r.id));
              checkpoint.save(records);
            },
          },
        },
        { concurrency: 1, maxRetries: 0, onProgress: silentProgress }
      );

      const result = await pool.run(stubs, new ResultSet());

      // First save happens right after the failure, with everything appended before it
      expect(saves).toEqual([[0], [0, 2]]);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0]?.stub.id).toBe(1);
      expect(result.failures[0]?.error).toBeInstanceOf(FetchError);

      const onDisk: Array<{ id: number }> = JSON.parse(
        readFileSync(checkpoint.filePath, 'utf-8')
      );
      expect(onDisk.map((r) => r.id)).toEqual([0, 2]);
    } finally {
      cleanup();
    }
  });

  test('should retry a failed item up to maxRetries times', async () => {
    const stubs = makeStubs(1);
    const fetcher = new FakeFetcher(pagesFor(stubs));
    fetcher.failNext('https://en.wikipedia.org/wiki/MP_0', 2);
    const pool = new ResumableWorkerPool(
      { fetcher, extractor: new FakeExtractor(), checkpoint: new MemoryCheckpoint() },
      { maxRetries: 2, retryDelay: 0, onProgress: silentProgress }
    );

    const result = await pool.run(stubs, new ResultSet());

    expect(fetcher.calls).toHaveLength(3);
    expect(result.processed).toBe(1);
    expect(result.failures).toEqual([]);
  });

  test('should give up after maxRetries', async () => {
    const stubs = makeStubs(1);
    const fetcher = new FakeFetcher(pagesFor(stubs));
    fetcher.failNext('https://en.wikipedia.org/wiki/MP_0', 5);
    const pool = new ResumableWorkerPool(
      { fetcher, extractor: new FakeExtractor(), checkpoint: new MemoryCheckpoint() },
      { maxRetries: 1, retryDelay: 0, onProgress: silentProgress }
    );

    const result = await pool.run(stubs, new ResultSet());

    expect(fetcher.calls).toHaveLength(2);
    expect(result.failures.map((f) => f.stub.id)).toEqual([0]);
  });

  test('should not retry a page without a content region', async () => {
    const stubs = makeStubs(1);
    const fetcher = new FakeFetcher(new Map([[stubs[0]?.url ?? '', '<html><body></body></html>']]));
    const pool = new ResumableWorkerPool(
      { fetcher, extractor: new FakeExtractor(), checkpoint: new MemoryCheckpoint() },
      { maxRetries: 3, retryDelay: 0, onProgress: silentProgress }
    );

    const result = await pool.run(stubs, new ResultSet());

    expect(fetcher.calls).toHaveLength(1);
    expect(result.failures[0]?.error).toBeInstanceOf(StructuralParseError);
  });

  test('should treat extractor errors as item failures', async () => {
    const stubs = makeStubs(2);
    const extractor = new FakeExtractor((text) => {
      if (text.includes('MP 0')) throw new Error('model unavailable');
      return [];
    });
    const checkpoint = new MemoryCheckpoint();
    const pool = new ResumableWorkerPool(
      { fetcher: new FakeFetcher(pagesFor(stubs)), extractor, checkpoint },
      { concurrency: 1, maxRetries: 0, onProgress: silentProgress }
    );

    const result = await pool.run(stubs, new ResultSet());

    expect(result.failures.map((f) => f.error.message)).toEqual(['model unavailable']);
    expect(sortedIds(result.records)).toEqual([1]);
    expect(checkpoint.lastSavedIds()).toEqual([1]);
  });

  test('should not write an empty checkpoint', async () => {
    const stubs = makeStubs(2);
    const checkpoint = new MemoryCheckpoint();
    const pool = new ResumableWorkerPool(
      { fetcher: new FakeFetcher(new Map()), extractor: new FakeExtractor(), checkpoint },
      { maxRetries: 0, onProgress: silentProgress }
    );

    const result = await pool.run(stubs, new ResultSet());

    expect(result.failures).toHaveLength(2);
    expect(checkpoint.saves).toEqual([]);
  });

  test('should still flush when a worker crashes', async () => {
    const stubs = makeStubs(3);
    const checkpoint = new MemoryCheckpoint();
    const pool = new ResumableWorkerPool(
      { fetcher: new FakeFetcher(pagesFor(stubs)), extractor: new FakeExtractor(), checkpoint },
      {
        concurrency: 1,
        onProgress: ({ completed }) => {
          if (completed === 2) throw new Error('progress sink failed');
        },
      }
    );

    await expect(pool.run(stubs, new ResultSet())).rejects.toThrow('progress sink failed');
    expect(checkpoint.lastSavedIds()).toEqual([0, 1]);
  });

  test('should report progress for every item', async () => {
    const stubs = makeStubs(3);
    const events: ProgressEvent[] = [];
    const fetcher = new FakeFetcher(pagesFor(stubs));
    fetcher.failNext('https://en.wikipedia.org/wiki/MP_2');
    const pool = new ResumableWorkerPool(
      { fetcher, extractor: new FakeExtractor(), checkpoint: new MemoryCheckpoint() },
      { concurrency: 1, maxRetries: 0, onProgress: (event) => events.push(event) }
    );

    const [first] = stubs;
    if (!first) throw new Error('missing stub');
    await pool.run(stubs, new ResultSet([createRecord(first, [])]));

    expect(events.map((e) => [e.completed, e.total, e.stub.id, e.outcome])).toEqual([
      [1, 3, 0, 'skipped'],
      [2, 3, 1, 'processed'],
      [3, 3, 2, 'failed'],
    ]);
  });

  test('should handle an empty work list', async () => {
    const checkpoint = new MemoryCheckpoint();
    const pool = new ResumableWorkerPool(
      { fetcher: new FakeFetcher(new Map()), extractor: new FakeExtractor(), checkpoint },
      { onProgress: silentProgress }
    );

    const result = await pool.run([], new ResultSet());

    expect(result).toEqual({ records: [], processed: 0, skipped: 0, failures: [] });
    expect(checkpoint.saves).toEqual([]);
  });
});
