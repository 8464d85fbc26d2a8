import { ModelDetails, ModelRecord } from '../types/model-record.js';
import {
  DEFAULT_VIEW_QUERY,
  EnrichedModel,
  FilterSelector,
  SortKey,
  UsageInfo,
  ViewQuery,
} from '../types/enriched-model.js';
import { InventoryUnavailable, ParseError, Result, errorMessage, fail, ok } from '../types/errors.js';
import { InventoryAdapter, InventorySnapshot } from './inventory-adapter.js';
import { classifyCapabilities } from './capability-classifier.js';
import { DEFAULT_RECENCY_THRESHOLDS, RecencyThresholds, ageInDays, categorizeAgeDays } from './recency-categorizer.js';
import { DEFAULT_VARIANT_VOCABULARY, VariantVocabulary, detectVariants, groupFamilies } from './variant-detector.js';
import { StoreResult, UsageStore } from './usage-store.js';
import { Logger, silentLogger } from './logger.js';
import {
  FREQUENT_USE_COUNT,
  LARGE_MODEL_BYTES,
  RECENT_USE_DAYS,
  SMALL_MODEL_BYTES,
} from '../types/viewer-config.js';

/**
 * Read-only view of the store flags the enrichment step overlays
 */
export interface UsageLookup {
  isStarred(name: string): boolean;
  isQueued(name: string): boolean;
  usageInfo(name: string): UsageInfo | undefined;
}

export interface EnrichOptions {
  vocabulary?: VariantVocabulary;
  thresholds?: RecencyThresholds;
}

/**
 * Merge classifier, categorizer, detector and store outputs over an inventory.
 * Input order is preserved.
 */
export function enrichModels(
  records: readonly ModelRecord[],
  usage: UsageLookup,
  now: Date,
  options: EnrichOptions = {}
): EnrichedModel[] {
  const vocabulary = options.vocabulary || DEFAULT_VARIANT_VOCABULARY;
  const thresholds = options.thresholds || DEFAULT_RECENCY_THRESHOLDS;
  const variants = detectVariants(records, vocabulary);

  return records.map((record) => {
    const flags = variants.get(record.name);
    const ageDays = ageInDays(record.modifiedAt, now);
    const usageInfo = usage.usageInfo(record.name);

    return {
      ...record,
      capabilities: classifyCapabilities(record.name),
      ageCategory: categorizeAgeDays(ageDays, thresholds),
      ageDays,
      baseName: flags?.baseName ?? record.name.toLowerCase(),
      isLiberated: flags?.isLiberated ?? false,
      isDuplicate: flags?.isDuplicate ?? false,
      isSpecialVariant: flags?.isSpecialVariant ?? false,
      isStarred: usage.isStarred(record.name),
      isQueuedForDeletion: usage.isQueued(record.name),
      usageInfo,
      lastUsedDays: usageInfo?.lastUsed ? ageInDays(usageInfo.lastUsed, now) : undefined,
    };
  });
}

/**
 * Case-insensitive substring match on the name or any capability tag. Empty query matches all.
 */
export function matchesSearch(model: EnrichedModel, search: string): boolean {
  const query = search.toLowerCase();
  if (query === '') return true;

  return (
    model.name.toLowerCase().includes(query) ||
    model.capabilities.some((tag) => tag.includes(query))
  );
}

export function matchesFilter(model: EnrichedModel, filter: FilterSelector): boolean {
  switch (filter) {
    case 'all':
      return true;
    case 'recent':
    case 'moderate':
    case 'old':
      return model.ageCategory === filter;
    case 'starred':
      return model.isStarred;
    case 'liberated':
      return model.isLiberated;
    case 'queued':
      return model.isQueuedForDeletion;
    case 'duplicates':
      return model.isDuplicate;
    case 'variants':
      return model.isSpecialVariant;
    case 'used':
      return (model.usageInfo?.count ?? 0) > 0;
    case 'unused':
      return (model.usageInfo?.count ?? 0) === 0;
    case 'large':
      return model.sizeBytes > LARGE_MODEL_BYTES;
    case 'small':
      return model.sizeBytes < SMALL_MODEL_BYTES;
    case 'frequent':
      return (model.usageInfo?.count ?? 0) > FREQUENT_USE_COUNT;
    case 'recently-used':
      return model.lastUsedDays !== undefined && model.lastUsedDays <= RECENT_USE_DAYS;
  }
}

/**
 * Name ascending (case-sensitive code-unit order), size and modified descending
 */
export function compareModels(a: EnrichedModel, b: EnrichedModel, key: SortKey): number {
  switch (key) {
    case 'name':
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    case 'size':
      return b.sizeBytes - a.sizeBytes;
    case 'modified':
      return b.modifiedAt.getTime() - a.modifiedAt.getTime();
  }
}

/**
 * Search, then filter, then sort. Array.prototype.sort is stable, so equal keys keep input order.
 */
export function buildView(models: readonly EnrichedModel[], query: ViewQuery): EnrichedModel[] {
  return models
    .filter((model) => matchesSearch(model, query.search))
    .filter((model) => matchesFilter(model, query.filter))
    .sort((a, b) => compareModels(a, b, query.sort));
}

export interface RefreshSummary {
  applied: boolean;       // false when a newer refresh already landed
  modelCount: number;
  skipped: ParseError[];
}

export interface ViewState {
  query: ViewQuery;
  modelCount: number;
  lastRefreshAt?: Date;
  lastError?: InventoryUnavailable;
  stale: boolean;         // last refresh failed; showing the last good inventory
  skippedRows: number;    // unparsable listing rows in the applied snapshot
  refreshing: boolean;
}

export interface ModelViewEngineOptions extends EnrichOptions {
  logger?: Logger;
  now?: () => Date;
}

/**
 * Holds the latest inventory snapshot and the transient view state, and
 * derives the displayed model list from them on demand.
 */
export class ModelViewEngine {
  private records: ModelRecord[] = [];
  private skipped: ParseError[] = [];
  private query: ViewQuery = { ...DEFAULT_VIEW_QUERY };
  private lastRefreshAt?: Date;
  private lastError?: InventoryUnavailable;
  private stale = false;
  private refreshGeneration = 0;
  private appliedGeneration = 0;
  private inFlight = 0;
  private listeners = new Set<() => void>();
  private adapter: InventoryAdapter;
  private store: UsageStore;
  private logger: Logger;
  private now: () => Date;
  private enrichOptions: EnrichOptions;

  constructor(adapter: InventoryAdapter, store: UsageStore, options: ModelViewEngineOptions = {}) {
    this.adapter = adapter;
    this.store = store;
    this.logger = options.logger || silentLogger;
    this.now = options.now || (() => new Date());
    this.enrichOptions = { vocabulary: options.vocabulary, thresholds: options.thresholds };
  }

  /**
   * Re-query the runner. Results of a refresh that finishes after a newer
   * one has been applied are discarded. On failure the previous inventory
   * is kept and the view is marked stale.
   */
  async refresh(): Promise<Result<RefreshSummary, InventoryUnavailable>> {
    const generation = ++this.refreshGeneration;
    this.inFlight++;

    let result: Result<InventorySnapshot, InventoryUnavailable>;
    try {
      result = await this.adapter.listModels();
    } catch (error) {
      result = fail({ kind: 'inventory-unavailable', message: errorMessage(error) });
    } finally {
      this.inFlight--;
    }

    if (generation < this.appliedGeneration) {
      this.logger.debug('Discarding superseded inventory refresh', { generation });
      return ok({ applied: false, modelCount: this.records.length, skipped: result.ok ? result.value.skipped : [] });
    }

    if (!result.ok) {
      this.stale = true;
      this.lastError = result.error;
      this.logger.warn(`Inventory refresh failed: ${result.error.message}`);
      this.notify();
      return fail(result.error);
    }

    this.records = result.value.records;
    this.skipped = result.value.skipped;
    this.appliedGeneration = generation;
    this.lastRefreshAt = result.value.fetchedAt;
    this.lastError = undefined;
    this.stale = false;
    this.notify();

    return ok({ applied: true, modelCount: this.records.length, skipped: result.value.skipped });
  }

  getRecords(): readonly ModelRecord[] {
    return this.records;
  }

  /**
   * Every installed model, enriched, in inventory order
   */
  getAllModels(): EnrichedModel[] {
    return enrichModels(this.records, this.store, this.now(), this.enrichOptions);
  }

  /**
   * The displayed list for the current view state, with optional overrides
   */
  getModels(overrides: Partial<ViewQuery> = {}): EnrichedModel[] {
    return buildView(this.getAllModels(), { ...this.query, ...overrides });
  }

  findModel(name: string): EnrichedModel | undefined {
    return this.getAllModels().find((model) => model.name === name);
  }

  /**
   * Installed models sharing the given model's base name (including itself)
   */
  getFamily(name: string): string[] {
    const model = this.findModel(name);
    if (!model) return [];
    const families = groupFamilies(
      this.records.map((record) => record.name),
      this.enrichOptions.vocabulary
    );
    return families.get(model.baseName) ?? [name];
  }

  getQuery(): ViewQuery {
    return { ...this.query };
  }

  setQuery(changes: Partial<ViewQuery>): void {
    this.query = { ...this.query, ...changes };
    this.notify();
  }

  /**
   * Flip the starred flag. On a persistence failure the in-memory flag has still changed.
   */
  async toggleStar(name: string): Promise<StoreResult<boolean>> {
    const result = await this.store.toggleStarred(name);
    this.notify();
    return result.ok ? ok(result.value.starred) : result;
  }

  getModelInfo(name: string): Promise<Result<ModelDetails, InventoryUnavailable>> {
    return this.adapter.getModelInfo(name);
  }

  /**
   * True when the applied snapshot lists every installed model: loaded, not
   * stale, and no row was skipped. Store records may only be pruned then.
   */
  hasCompleteInventory(): boolean {
    return this.lastRefreshAt !== undefined && !this.stale && this.skipped.length === 0;
  }

  /**
   * Rows of the applied snapshot the parser could not read
   */
  getSkipped(): readonly ParseError[] {
    return this.skipped;
  }

  /**
   * Drop a model from the live snapshot after it was deleted. Refreshes
   * already in flight may still list it, so their results are discarded.
   */
  removeFromInventory(name: string): void {
    this.appliedGeneration = ++this.refreshGeneration;
    const before = this.records.length;
    this.records = this.records.filter((record) => record.name !== name);
    if (this.records.length !== before) {
      this.notify();
    }
  }

  getState(): ViewState {
    return {
      query: this.getQuery(),
      modelCount: this.records.length,
      lastRefreshAt: this.lastRefreshAt,
      lastError: this.lastError,
      stale: this.stale,
      skippedRows: this.skipped.length,
      refreshing: this.inFlight > 0,
    };
  }

  /**
   * Register a listener for snapshot, flag or query changes. Returns an unsubscribe function.
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
