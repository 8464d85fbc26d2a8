import { EnrichedModel } from '../types/enriched-model.js';
import { DeleteFailed, PersistenceError, Result, errorMessage, fail, ok } from '../types/errors.js';
import { InventoryAdapter } from './inventory-adapter.js';
import { ModelViewEngine } from './model-view-engine.js';
import { StoreResult, UsageStore } from './usage-store.js';
import { Logger, silentLogger } from './logger.js';

export type DeletionState = 'idle' | 'queued' | 'deleting' | 'deleted';

export interface DeletionFailure {
  name: string;
  reason: string;
}

export interface DeletionReport {
  outcome: 'empty' | 'cancelled' | 'busy' | 'completed';
  succeeded: string[];
  failed: DeletionFailure[];
  freedBytes: number;
  warnings: PersistenceError[];
}

export interface DeletionProgress {
  name: string;
  index: number;  // 1-based position in the batch
  total: number;
  status: 'deleting' | 'deleted' | 'failed';
  reason?: string;
}

/**
 * Receives the full queued list; resolve true to go ahead
 */
export type ConfirmDeletion = (models: EnrichedModel[]) => boolean | Promise<boolean>;

function report(outcome: DeletionReport['outcome']): DeletionReport {
  return { outcome, succeeded: [], failed: [], freedBytes: 0, warnings: [] };
}

/**
 * Queue-then-confirm-then-execute batch deletion.
 *
 * Per model: idle → queued → deleting → deleted, or queued → idle when
 * toggled off before execution. Deletes run one at a time; a failure keeps
 * the model queued and does not stop the rest of the batch.
 */
export class DeletionQueueCoordinator {
  private deleting = new Set<string>();
  private deleted = new Set<string>();
  private running = false;
  private engine: ModelViewEngine;
  private store: UsageStore;
  private adapter: InventoryAdapter;
  private logger: Logger;

  constructor(engine: ModelViewEngine, store: UsageStore, adapter: InventoryAdapter, logger: Logger = silentLogger) {
    this.engine = engine;
    this.store = store;
    this.adapter = adapter;
    this.logger = logger;
  }

  stateOf(name: string): DeletionState {
    if (this.deleting.has(name)) return 'deleting';
    if (this.store.isQueued(name)) return 'queued';
    if (this.deleted.has(name)) return 'deleted';
    return 'idle';
  }

  /**
   * Set the queued flag; a no-op when it already has that value
   */
  async setQueued(name: string, queued: boolean): Promise<StoreResult<boolean>> {
    if (this.store.isQueued(name) === queued) {
      return ok(queued);
    }

    this.deleted.delete(name);
    const result = await this.store.setQueued(name, queued);
    return result.ok ? ok(result.value.queuedForDeletion) : result;
  }

  toggleQueued(name: string): Promise<StoreResult<boolean>> {
    return this.setQueued(name, !this.store.isQueued(name));
  }

  /**
   * Installed models currently queued, in inventory order
   */
  listQueued(): EnrichedModel[] {
    return this.engine.getAllModels().filter((model) => model.isQueuedForDeletion);
  }

  async clearQueue(): Promise<StoreResult<number>> {
    const names = this.store.queuedNames();
    for (const name of names) {
      const result = await this.store.setQueued(name, false);
      if (!result.ok) return result;
    }
    return ok(names.length);
  }

  estimateReclaimBytes(): number {
    return this.listQueued().reduce((total, model) => total + model.sizeBytes, 0);
  }

  /**
   * Confirm and delete every queued model.
   *
   * - empty queue: outcome 'empty', nothing is asked
   * - confirmation refused: outcome 'cancelled', queue untouched
   * - otherwise 'completed' with per-model succeeded / failed lists
   */
  async executeDeletions(
    confirm: ConfirmDeletion,
    onProgress?: (progress: DeletionProgress) => void
  ): Promise<DeletionReport> {
    if (this.running) {
      return report('busy');
    }

    const queued = this.listQueued();
    if (queued.length === 0) {
      this.logger.info('Nothing to delete');
      return report('empty');
    }

    // Held through confirmation so a second batch cannot start meanwhile
    this.running = true;
    try {
      let confirmed: boolean;
      try {
        confirmed = await confirm(queued);
      } catch (error) {
        this.logger.warn('Deletion confirmation failed', { error: errorMessage(error) });
        confirmed = false;
      }
      if (!confirmed) {
        return report('cancelled');
      }

      return await this.deleteAll(queued, onProgress);
    } finally {
      this.running = false;
    }
  }

  private async deleteAll(
    queued: EnrichedModel[],
    onProgress?: (progress: DeletionProgress) => void
  ): Promise<DeletionReport> {
    const result = report('completed');
    for (let i = 0; i < queued.length; i++) {
      const model = queued[i];
      const progress = { name: model.name, index: i + 1, total: queued.length };

      this.deleting.add(model.name);
      onProgress?.({ ...progress, status: 'deleting' });

      const outcome = await this.deleteOne(model.name);
      this.deleting.delete(model.name);

      if (!outcome.ok) {
        this.logger.error(`Failed to delete ${model.name}`, { reason: outcome.error.reason });
        result.failed.push({ name: model.name, reason: outcome.error.reason });
        onProgress?.({ ...progress, status: 'failed', reason: outcome.error.reason });
        continue;
      }

      this.logger.info(`Deleted ${model.name}`);
      result.succeeded.push(model.name);
      result.freedBytes += model.sizeBytes;
      this.deleted.add(model.name);
      this.engine.removeFromInventory(model.name);

      const removed = await this.store.remove(model.name);
      if (!removed.ok) result.warnings.push(removed.error);

      onProgress?.({ ...progress, status: 'deleted' });
    }

    // Records of models removed outside the viewer go too, only against a complete listing
    if (result.succeeded.length > 0 && this.engine.hasCompleteInventory()) {
      const pruned = await this.store.prune(this.engine.getRecords().map((record) => record.name));
      if (!pruned.ok) result.warnings.push(pruned.error);
    }

    return result;
  }

  private async deleteOne(name: string): Promise<Result<void, DeleteFailed>> {
    try {
      return await this.adapter.deleteModel(name);
    } catch (error) {
      return fail({ kind: 'delete-failed', name, reason: errorMessage(error) });
    }
  }
}
