import { EnrichedModel, ViewQuery } from '../types/enriched-model.js';
import { ModelDetails } from '../types/model-record.js';
import { UsageEvent, UsageRecord } from '../types/usage-record.js';
import { InventoryUnavailable, ParseError, PersistenceError, Result, fail } from '../types/errors.js';
import { ViewerConfig } from '../types/viewer-config.js';
import { getDefaultModelsDir, getUsagePath } from '../utils/file-utils.js';
import { InventoryAdapter, RunnerInventoryAdapter } from './inventory-adapter.js';
import { ModelViewEngine, RefreshSummary } from './model-view-engine.js';
import { ConfirmDeletion, DeletionProgress, DeletionQueueCoordinator, DeletionReport } from './deletion-queue.js';
import { FileUsageBackend, StoreResult, UsageStore } from './usage-store.js';
import { DeviceProbe, StorageInfo, collectStorageInfo, probeDevice } from './storage-probe.js';
import { DEFAULT_VARIANT_VOCABULARY, extendVocabulary } from './variant-detector.js';
import { Logger, silentLogger } from './logger.js';

export interface ModelViewerDeps {
  adapter: InventoryAdapter;
  store: UsageStore;
  config: ViewerConfig;
  logger?: Logger;
  now?: () => Date;
  probe?: DeviceProbe;
}

/**
 * Surface consumed by the CLI and TUI. Owns no rendering, only wiring.
 */
export class ModelViewer {
  readonly engine: ModelViewEngine;
  readonly queue: DeletionQueueCoordinator;
  private store: UsageStore;
  private config: ViewerConfig;
  private probe: DeviceProbe;
  private now: () => Date;

  constructor(deps: ModelViewerDeps) {
    const logger = deps.logger || silentLogger;
    this.store = deps.store;
    this.config = deps.config;
    this.probe = deps.probe || probeDevice;
    this.now = deps.now || (() => new Date());

    this.engine = new ModelViewEngine(deps.adapter, deps.store, {
      logger,
      now: this.now,
      thresholds: { recentDays: deps.config.recentDays, oldDays: deps.config.oldDays },
      vocabulary: extendVocabulary(
        DEFAULT_VARIANT_VOCABULARY,
        deps.config.extraLiberationKeywords,
        deps.config.extraVariantTags
      ),
    });
    this.queue = new DeletionQueueCoordinator(this.engine, deps.store, deps.adapter, logger);
  }

  refresh(): Promise<Result<RefreshSummary, InventoryUnavailable>> {
    return this.engine.refresh();
  }

  getModels(query: Partial<ViewQuery> = {}): EnrichedModel[] {
    return this.engine.getModels(query);
  }

  toggleStar(name: string): Promise<StoreResult<boolean>> {
    return this.engine.toggleStar(name);
  }

  toggleQueued(name: string): Promise<StoreResult<boolean>> {
    return this.queue.toggleQueued(name);
  }

  executeDeletions(
    confirm: ConfirmDeletion,
    onProgress?: (progress: DeletionProgress) => void
  ): Promise<DeletionReport> {
    return this.queue.executeDeletions(confirm, onProgress);
  }

  getModelInfo(name: string): Promise<Result<ModelDetails, InventoryUnavailable>> {
    return this.engine.getModelInfo(name);
  }

  recordUsage(name: string, event: UsageEvent = { at: this.now() }): Promise<StoreResult<UsageRecord>> {
    return this.store.recordUsage(name, event);
  }

  /**
   * Explicit cleanup of usage records for models no longer installed.
   * Refuses unless the inventory is loaded, current and fully parsed.
   */
  async cleanup(): Promise<Result<string[], PersistenceError | InventoryUnavailable | ParseError>> {
    const { stale, lastError, lastRefreshAt } = this.engine.getState();
    if (stale || !lastRefreshAt) {
      return fail(lastError || { kind: 'inventory-unavailable', message: 'inventory has not been loaded' });
    }

    const [unreadable] = this.engine.getSkipped();
    if (unreadable) {
      return fail(unreadable);
    }

    return this.store.prune(this.engine.getRecords().map((record) => record.name));
  }

  getStorageInfo(): Promise<StorageInfo> {
    return collectStorageInfo(
      this.engine.getRecords(),
      this.config.modelsDirectory || getDefaultModelsDir(),
      this.probe
    );
  }
}

/**
 * Build a viewer backed by the runner CLI and the usage file, and load the store
 */
export async function createModelViewer(
  config: ViewerConfig,
  logger: Logger = silentLogger,
  usagePath: string = getUsagePath()
): Promise<{ viewer: ModelViewer; loaded: StoreResult<number> }> {
  const adapter = new RunnerInventoryAdapter({
    binary: config.runnerBinary,
    timeoutMs: config.commandTimeoutMs,
    logger,
  });
  const store = new UsageStore(new FileUsageBackend(usagePath), logger);
  const loaded = await store.load();

  return { viewer: new ModelViewer({ adapter, store, config, logger }), loaded };
}
