import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ModelViewEngine, buildView, enrichModels, matchesSearch } from './model-view-engine.js';
import { MemoryUsageBackend, UsageStore } from './usage-store.js';
import { InventorySnapshot } from './inventory-adapter.js';
import { InventoryUnavailable, Result, fail, ok } from '../types/errors.js';
import { DEFAULT_VIEW_QUERY, FilterSelector, ViewQuery } from '../types/enriched-model.js';
import { createMockInventoryAdapter, type MockInventoryAdapter } from '../../tests/mocks/index.js';
import { FIXED_NOW, createInventory, createModelRecord, daysAgo, gb } from '../../tests/fixtures/model-records.js';

type ListResult = Result<InventorySnapshot, InventoryUnavailable>;

function createDeferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function names(models: ReadonlyArray<{ name: string }>): string[] {
  return models.map((model) => model.name);
}

describe('enrichModels', () => {
  it('should merge every derived annotation and store overlay', async () => {
    const store = new UsageStore(new MemoryUsageBackend());
    await store.setStarred('llava:13b', true);

    const [llava] = enrichModels([createModelRecord({ name: 'llava:13b', modifiedAt: daysAgo(40) })], store, FIXED_NOW);

    expect(llava).toMatchObject({
      name: 'llava:13b',
      capabilities: ['text', 'vision'],
      ageCategory: 'old',
      ageDays: 40,
      baseName: 'llava:13b',
      isLiberated: false,
      isDuplicate: false,
      isSpecialVariant: false,
      isStarred: true,
      isQueuedForDeletion: false,
    });
    expect(llava.usageInfo).toBeUndefined();
  });

  it('should preserve inventory order', () => {
    const store = new UsageStore(new MemoryUsageBackend());
    expect(names(enrichModels(createInventory(), store, FIXED_NOW))).toEqual(names(createInventory()));
  });
});

describe('buildView', () => {
  let store: UsageStore;

  function view(query: Partial<ViewQuery>): string[] {
    return names(buildView(enrichModels(createInventory(), store, FIXED_NOW), { ...DEFAULT_VIEW_QUERY, ...query }));
  }

  beforeEach(async () => {
    store = new UsageStore(new MemoryUsageBackend());
    await store.load();
  });

  describe('search', () => {
    it('should match names case-insensitively', () => {
      expect(view({ search: 'LLAMA' })).toEqual(['llama3:8b', 'llama3:8b-instruct-q4_K_M']);
    });

    it('should match capability tags', () => {
      expect(view({ search: 'vision' })).toEqual(['llava:13b']);
    });

    it('should treat only an empty query as match-all', () => {
      expect(view({ search: '' })).toHaveLength(5);
      expect(view({ search: '   ' })).toEqual([]);
    });

    it('should keep surrounding spaces as part of the query', () => {
      expect(view({ search: '-mistral' })).toEqual(['dolphin-mistral:7b-uncensored']);
      expect(view({ search: ' mistral' })).toEqual([]);
    });

    it('should match a capability the name does not mention', () => {
      const [model] = enrichModels([createModelRecord({ name: 'gpt-oss:20b' })], store, FIXED_NOW);

      expect(matchesSearch(model, 'code')).toBe(false);
      expect(matchesSearch({ ...model, capabilities: ['text', 'code'] }, 'CODE')).toBe(true);
    });

    it('should match the text tag on every model', () => {
      const [model] = enrichModels([createModelRecord()], store, FIXED_NOW);
      expect(matchesSearch(model, 'tex')).toBe(true);
    });
  });

  describe('filters', () => {
    const cases: Array<[FilterSelector, string[]]> = [
      ['all', ['Zephyr:7b', 'dolphin-mistral:7b-uncensored', 'llama3:8b', 'llama3:8b-instruct-q4_K_M', 'llava:13b']],
      ['recent', ['dolphin-mistral:7b-uncensored', 'llama3:8b']],
      ['moderate', ['Zephyr:7b', 'llama3:8b-instruct-q4_K_M']],
      ['old', ['llava:13b']],
      ['liberated', ['dolphin-mistral:7b-uncensored']],
      ['duplicates', ['llama3:8b', 'llama3:8b-instruct-q4_K_M']],
      ['variants', ['llama3:8b-instruct-q4_K_M']],
      ['starred', []],
      ['queued', []],
      ['large', []],
      ['small', ['Zephyr:7b', 'dolphin-mistral:7b-uncensored', 'llama3:8b', 'llama3:8b-instruct-q4_K_M']],
      ['frequent', []],
      ['recently-used', []],
    ];

    it.each(cases)('should apply the %s filter', (filter, expected) => {
      expect(view({ filter })).toEqual(expected);
    });

    it('should filter by store flags', async () => {
      await store.setStarred('llava:13b', true);
      await store.setQueued('Zephyr:7b', true);

      expect(view({ filter: 'starred' })).toEqual(['llava:13b']);
      expect(view({ filter: 'queued' })).toEqual(['Zephyr:7b']);
    });

    it('should split used from unused models', async () => {
      await store.recordUsage('Zephyr:7b', { at: daysAgo(1) });

      expect(view({ filter: 'used' })).toEqual(['Zephyr:7b']);
      expect(view({ filter: 'unused' })).toEqual([
        'dolphin-mistral:7b-uncensored',
        'llama3:8b',
        'llama3:8b-instruct-q4_K_M',
        'llava:13b',
      ]);
    });

    it('should bound size filters strictly', () => {
      const models = enrichModels(
        [
          createModelRecord({ name: 'huge:70b', sizeBytes: gb(39) }),
          createModelRecord({ name: 'ten:latest', sizeBytes: gb(10) }),
          createModelRecord({ name: 'five:latest', sizeBytes: gb(5) }),
          createModelRecord({ name: 'tiny:1b', sizeBytes: gb(1.3) }),
        ],
        store,
        FIXED_NOW
      );

      expect(names(buildView(models, { ...DEFAULT_VIEW_QUERY, filter: 'large' }))).toEqual(['huge:70b']);
      expect(names(buildView(models, { ...DEFAULT_VIEW_QUERY, filter: 'small' }))).toEqual(['tiny:1b']);
    });

    it('should pick out models used more than ten times', async () => {
      for (let i = 0; i < 11; i++) {
        await store.recordUsage('Zephyr:7b', { at: daysAgo(30) });
      }
      for (let i = 0; i < 10; i++) {
        await store.recordUsage('llava:13b', { at: daysAgo(30) });
      }

      expect(view({ filter: 'frequent' })).toEqual(['Zephyr:7b']);
    });

    it('should pick out models used within the last seven days', async () => {
      await store.recordUsage('Zephyr:7b', { at: daysAgo(1) });
      await store.recordUsage('dolphin-mistral:7b-uncensored', { at: daysAgo(7) });
      await store.recordUsage('llava:13b', { at: daysAgo(8) });

      expect(view({ filter: 'recently-used' })).toEqual(['Zephyr:7b', 'dolphin-mistral:7b-uncensored']);
    });

    it('should apply search and filter together', () => {
      expect(view({ search: 'llama', filter: 'variants' })).toEqual(['llama3:8b-instruct-q4_K_M']);
    });
  });

  describe('sorting', () => {
    it('should sort names by code unit so uppercase comes first', () => {
      expect(view({ sort: 'name' })).toEqual([
        'Zephyr:7b',
        'dolphin-mistral:7b-uncensored',
        'llama3:8b',
        'llama3:8b-instruct-q4_K_M',
        'llava:13b',
      ]);
    });

    it('should sort by size descending keeping input order for ties', () => {
      expect(view({ sort: 'size' })).toEqual([
        'llava:13b',
        'llama3:8b-instruct-q4_K_M',
        'llama3:8b',
        'dolphin-mistral:7b-uncensored',
        'Zephyr:7b',
      ]);
    });

    it('should order sizes numerically rather than by their printed form', () => {
      const models = enrichModels(
        [
          createModelRecord({ name: 'one:latest', size: '1 GB', sizeBytes: gb(1) }),
          createModelRecord({ name: 'ten:latest', size: '10 GB', sizeBytes: gb(10) }),
          createModelRecord({ name: 'half:latest', size: '500 MB', sizeBytes: 500 * 1024 * 1024 }),
        ],
        store,
        FIXED_NOW
      );

      expect(names(buildView(models, { ...DEFAULT_VIEW_QUERY, sort: 'size' }))).toEqual([
        'ten:latest',
        'one:latest',
        'half:latest',
      ]);
    });

    it('should keep input order for identical names', () => {
      const models = enrichModels(
        [
          createModelRecord({ name: 'same:latest', id: 'first' }),
          createModelRecord({ name: 'other:latest', id: 'middle' }),
          createModelRecord({ name: 'same:latest', id: 'second' }),
        ],
        store,
        FIXED_NOW
      );

      expect(buildView(models, DEFAULT_VIEW_QUERY).map((model) => model.id)).toEqual(['middle', 'first', 'second']);
    });

    it('should sort by modified time, newest first', () => {
      expect(view({ sort: 'modified' })).toEqual([
        'llama3:8b',
        'dolphin-mistral:7b-uncensored',
        'Zephyr:7b',
        'llama3:8b-instruct-q4_K_M',
        'llava:13b',
      ]);
    });
  });
});

describe('ModelViewEngine', () => {
  let adapter: MockInventoryAdapter;
  let backend: MemoryUsageBackend;
  let store: UsageStore;
  let engine: ModelViewEngine;

  beforeEach(async () => {
    adapter = createMockInventoryAdapter(createInventory());
    backend = new MemoryUsageBackend();
    store = new UsageStore(backend);
    await store.load();
    engine = new ModelViewEngine(adapter, store, { now: () => FIXED_NOW });
  });

  describe('refresh()', () => {
    it('should load the inventory', async () => {
      expect(await engine.refresh()).toEqual({ ok: true, value: { applied: true, modelCount: 5, skipped: [] } });
      expect(engine.getState()).toMatchObject({ modelCount: 5, stale: false, refreshing: false, lastRefreshAt: FIXED_NOW });
    });

    it('should keep the last inventory and mark the view stale on failure', async () => {
      await engine.refresh();
      const error = { kind: 'inventory-unavailable', message: 'runner not running' } as const;
      adapter.listModels.mockResolvedValueOnce(fail(error));

      expect(await engine.refresh()).toEqual({ ok: false, error });
      expect(engine.getRecords()).toHaveLength(5);
      expect(engine.getState()).toMatchObject({ stale: true, lastError: error });
    });

    it('should clear the stale flag after a successful refresh', async () => {
      adapter.listModels.mockResolvedValueOnce(fail({ kind: 'inventory-unavailable', message: 'down' }));
      await engine.refresh();

      await engine.refresh();

      expect(engine.getState().stale).toBe(false);
      expect(engine.getState().lastError).toBeUndefined();
    });

    it('should turn adapter exceptions into inventory-unavailable', async () => {
      adapter.listModels.mockRejectedValueOnce(new Error('spawn failed'));

      expect(await engine.refresh()).toEqual({
        ok: false,
        error: { kind: 'inventory-unavailable', message: 'spawn failed' },
      });
    });

    it('should discard a refresh that completes after a newer one', async () => {
      const older = createDeferred<ListResult>();
      const newer = createDeferred<ListResult>();
      adapter.listModels.mockReturnValueOnce(older.promise).mockReturnValueOnce(newer.promise);

      const first = engine.refresh();
      const second = engine.refresh();
      expect(engine.getState().refreshing).toBe(true);

      newer.resolve(ok({ records: [createModelRecord({ name: 'newer:latest' })], skipped: [], fetchedAt: FIXED_NOW }));
      expect(await second).toEqual({ ok: true, value: { applied: true, modelCount: 1, skipped: [] } });

      older.resolve(ok({ records: createInventory(), skipped: [], fetchedAt: FIXED_NOW }));
      expect(await first).toEqual({ ok: true, value: { applied: false, modelCount: 1, skipped: [] } });

      expect(names(engine.getRecords())).toEqual(['newer:latest']);
      expect(engine.getState().refreshing).toBe(false);
    });

    it('should discard a refresh that was in flight when a model was deleted', async () => {
      await engine.refresh();
      const pending = createDeferred<ListResult>();
      adapter.listModels.mockReturnValueOnce(pending.promise);

      const inFlight = engine.refresh();
      engine.removeFromInventory('llava:13b');
      pending.resolve(ok({ records: createInventory(), skipped: [], fetchedAt: FIXED_NOW }));

      expect(await inFlight).toEqual({ ok: true, value: { applied: false, modelCount: 4, skipped: [] } });
      expect(engine.findModel('llava:13b')).toBeUndefined();

      await engine.refresh();
      expect(engine.getState().modelCount).toBe(5);
    });

    it('should keep store records of models missing from the new snapshot', async () => {
      await store.setStarred('gone:latest', true);

      await engine.refresh();

      expect(engine.findModel('gone:latest')).toBeUndefined();
      expect(store.has('gone:latest')).toBe(true);
      expect(store.isStarred('gone:latest')).toBe(true);
    });

    it('should only report a complete inventory when no row was skipped', async () => {
      expect(engine.hasCompleteInventory()).toBe(false);

      const unreadable = { kind: 'parse-error', line: 'favorite:70b ??', message: 'unreadable size' } as const;
      adapter.listModels.mockResolvedValueOnce(ok({ records: createInventory(), skipped: [unreadable], fetchedAt: FIXED_NOW }));
      await engine.refresh();

      expect(engine.hasCompleteInventory()).toBe(false);
      expect(engine.getSkipped()).toEqual([unreadable]);
      expect(engine.getState().skippedRows).toBe(1);

      await engine.refresh();
      expect(engine.hasCompleteInventory()).toBe(true);
      expect(engine.getState().skippedRows).toBe(0);
    });

    it('should not mark the view stale when a superseded refresh fails', async () => {
      const older = createDeferred<ListResult>();
      adapter.listModels.mockReturnValueOnce(older.promise);

      const first = engine.refresh();
      await engine.refresh();
      older.resolve(fail({ kind: 'inventory-unavailable', message: 'late failure' }));
      await first;

      expect(engine.getState().stale).toBe(false);
    });
  });

  describe('view state', () => {
    beforeEach(async () => {
      await engine.refresh();
    });

    it('should apply the stored query with per-call overrides', () => {
      engine.setQuery({ filter: 'duplicates' });

      expect(names(engine.getModels())).toEqual(['llama3:8b', 'llama3:8b-instruct-q4_K_M']);
      expect(names(engine.getModels({ filter: 'old' }))).toEqual(['llava:13b']);
      expect(engine.getQuery()).toEqual({ search: '', filter: 'duplicates', sort: 'name' });
    });

    it('should toggle stars through the store', async () => {
      expect(await engine.toggleStar('llava:13b')).toEqual({ ok: true, value: true });
      expect(engine.findModel('llava:13b')?.isStarred).toBe(true);
      expect(backend.writes).toBe(1);

      expect(await engine.toggleStar('llava:13b')).toEqual({ ok: true, value: false });
    });

    it('should list a model family', () => {
      expect(engine.getFamily('llama3:8b-instruct-q4_K_M')).toEqual(['llama3:8b', 'llama3:8b-instruct-q4_K_M']);
      expect(engine.getFamily('missing')).toEqual([]);
    });

    it('should drop deleted models from the snapshot', () => {
      engine.removeFromInventory('llava:13b');

      expect(engine.getState().modelCount).toBe(4);
      expect(engine.findModel('llava:13b')).toBeUndefined();
    });

    it('should notify subscribers until they unsubscribe', async () => {
      const listener = vi.fn();
      const unsubscribe = engine.subscribe(listener);

      engine.setQuery({ sort: 'size' });
      await engine.toggleStar('llava:13b');
      expect(listener).toHaveBeenCalledTimes(2);

      unsubscribe();
      engine.setQuery({ sort: 'name' });
      expect(listener).toHaveBeenCalledTimes(2);
    });

    it('should delegate detail lookups to the adapter', async () => {
      expect(await engine.getModelInfo('llava:13b')).toEqual({
        ok: true,
        value: { name: 'llava:13b', capabilities: [], raw: '' },
      });
      expect(adapter.getModelInfo).toHaveBeenCalledWith('llava:13b');
    });
  });
});
