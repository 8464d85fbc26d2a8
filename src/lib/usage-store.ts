import * as path from 'path';
import {
  UsageDocumentSchema,
  UsageEvent,
  UsageRecord,
  UsageRecordSchema,
  emptyUsageRecord,
} from '../types/usage-record.js';
import { UsageInfo } from '../types/enriched-model.js';
import { PersistenceError, Result, errorMessage, fail, ok } from '../types/errors.js';
import { ensureDir, readFileIfExists, writeFileAtomic } from '../utils/file-utils.js';
import { Logger, silentLogger } from './logger.js';

/**
 * Where the usage document lives. read() returns null when nothing is stored yet.
 */
export interface UsageBackend {
  read(): Promise<string | null>;
  write(content: string): Promise<void>;
}

/**
 * JSON file backend; writes go to a temp file that is renamed over the target
 */
export class FileUsageBackend implements UsageBackend {
  constructor(private readonly filePath: string) {}

  read(): Promise<string | null> {
    return readFileIfExists(this.filePath);
  }

  async write(content: string): Promise<void> {
    await ensureDir(path.dirname(this.filePath));
    await writeFileAtomic(this.filePath, content);
  }
}

export class MemoryUsageBackend implements UsageBackend {
  content: string | null;
  writes = 0;

  constructor(initial: string | null = null) {
    this.content = initial;
  }

  async read(): Promise<string | null> {
    return this.content;
  }

  async write(content: string): Promise<void> {
    this.content = content;
    this.writes++;
  }
}

export type StoreResult<T> = Result<T, PersistenceError>;

/**
 * Per-model starred / queued flags and usage counters, keyed by model name.
 *
 * Every mutation rewrites the whole document. Flushes are serialized and each
 * writes the state current at the time it runs, so the last writer wins. A
 * failed write is retried once; after that the mutation reports a
 * persistence-error and the in-memory state stays authoritative.
 */
export class UsageStore {
  private records = new Map<string, UsageRecord>();
  private flushChain: Promise<unknown> = Promise.resolve();
  private backend: UsageBackend;
  private logger: Logger;

  constructor(backend: UsageBackend, logger: Logger = silentLogger) {
    this.backend = backend;
    this.logger = logger;
  }

  /**
   * Load the persisted document. A missing document is an empty store.
   * An unreadable document also leaves the store empty, reported as a failure.
   */
  async load(): Promise<StoreResult<number>> {
    this.records.clear();

    let content: string | null;
    try {
      content = await this.backend.read();
    } catch (error) {
      this.logger.warn('Could not read usage data, starting empty', { error: errorMessage(error) });
      return fail({ kind: 'persistence-error', message: errorMessage(error) });
    }

    if (content === null || content.trim() === '') {
      return ok(0);
    }

    let json: unknown;
    try {
      json = JSON.parse(content);
    } catch (error) {
      this.logger.warn('Usage data is not valid JSON, starting empty', { error: errorMessage(error) });
      return fail({ kind: 'persistence-error', message: `invalid JSON: ${errorMessage(error)}` });
    }

    const document = UsageDocumentSchema.safeParse(json);
    if (!document.success) {
      this.logger.warn('Usage data is not an object keyed by model name, starting empty');
      return fail({ kind: 'persistence-error', message: 'usage document must be a JSON object' });
    }

    for (const [name, value] of Object.entries(document.data)) {
      const record = UsageRecordSchema.safeParse(value);
      if (record.success) {
        this.records.set(name, record.data);
      } else {
        this.logger.warn(`Ignoring invalid usage record for ${name}`, {
          issues: record.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
    }

    return ok(this.records.size);
  }

  /**
   * Record for a model; a fresh default when absent. Never fails.
   */
  get(name: string): UsageRecord {
    const record = this.records.get(name);
    return record ? cloneRecord(record) : emptyUsageRecord();
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  names(): string[] {
    return [...this.records.keys()];
  }

  isStarred(name: string): boolean {
    return this.records.get(name)?.starred ?? false;
  }

  isQueued(name: string): boolean {
    return this.records.get(name)?.queuedForDeletion ?? false;
  }

  queuedNames(): string[] {
    return [...this.records.entries()].filter(([, record]) => record.queuedForDeletion).map(([name]) => name);
  }

  usageInfo(name: string): UsageInfo | undefined {
    const record = this.records.get(name);
    return record ? toUsageInfo(record) : undefined;
  }

  setStarred(name: string, starred: boolean): Promise<StoreResult<UsageRecord>> {
    return this.update(name, (record) => ({ ...record, starred }));
  }

  toggleStarred(name: string): Promise<StoreResult<UsageRecord>> {
    return this.setStarred(name, !this.isStarred(name));
  }

  setQueued(name: string, queued: boolean): Promise<StoreResult<UsageRecord>> {
    return this.update(name, (record) => ({ ...record, queuedForDeletion: queued }));
  }

  recordUsage(name: string, event: UsageEvent): Promise<StoreResult<UsageRecord>> {
    return this.update(name, (record) => ({ ...record, usage: applyUsageEvent(record.usage, event) }));
  }

  /**
   * Purge a model's record (after the model itself is deleted)
   */
  async remove(name: string): Promise<StoreResult<boolean>> {
    if (!this.records.delete(name)) {
      return ok(false);
    }
    const flushed = await this.flush();
    return flushed.ok ? ok(true) : flushed;
  }

  /**
   * Drop records for models that are no longer installed
   */
  async prune(installedNames: Iterable<string>): Promise<StoreResult<string[]>> {
    const installed = new Set(installedNames);
    const removed = this.names().filter((name) => !installed.has(name));
    if (removed.length === 0) {
      return ok([]);
    }

    for (const name of removed) {
      this.records.delete(name);
    }
    this.logger.info(`Pruned ${removed.length} stale usage record(s)`, { models: removed });

    const flushed = await this.flush();
    return flushed.ok ? ok(removed) : flushed;
  }

  /**
   * Write the whole document, serialized behind any flush already running
   */
  flush(): Promise<StoreResult<void>> {
    const run = this.flushChain.then(() => this.writeDocument());
    this.flushChain = run;
    return run;
  }

  private async update(
    name: string,
    change: (record: UsageRecord) => UsageRecord
  ): Promise<StoreResult<UsageRecord>> {
    const updated = change(this.get(name));
    this.records.set(name, updated);

    const flushed = await this.flush();
    return flushed.ok ? ok(cloneRecord(updated)) : flushed;
  }

  private async writeDocument(): Promise<StoreResult<void>> {
    let content: string;
    try {
      content = JSON.stringify(Object.fromEntries(this.records), null, 2) + '\n';
    } catch (error) {
      return fail({ kind: 'persistence-error', message: errorMessage(error) });
    }

    try {
      await this.backend.write(content);
      return ok(undefined);
    } catch (firstError) {
      this.logger.warn('Saving usage data failed, retrying', { error: errorMessage(firstError) });
    }

    try {
      await this.backend.write(content);
      return ok(undefined);
    } catch (error) {
      this.logger.warn('Could not save usage data; changes are kept for this session only', {
        error: errorMessage(error),
      });
      return fail({ kind: 'persistence-error', message: errorMessage(error) });
    }
  }
}

function cloneRecord(record: UsageRecord): UsageRecord {
  return { ...record, usage: { ...record.usage } };
}

function applyUsageEvent(usage: UsageRecord['usage'], event: UsageEvent): UsageRecord['usage'] {
  const at = event.at.getTime();
  const next = { ...usage, count: usage.count + 1 };

  if (!usage.firstUsed || at < Date.parse(usage.firstUsed)) {
    next.firstUsed = event.at.toISOString();
  }
  if (!usage.lastUsed || at > Date.parse(usage.lastUsed)) {
    next.lastUsed = event.at.toISOString();
  }

  if (event.tokens !== undefined && Number.isInteger(event.tokens) && event.tokens >= 0) {
    next.totalTokens = (usage.totalTokens ?? 0) + event.tokens;
  }

  if (event.responseTimeMs !== undefined && Number.isFinite(event.responseTimeMs) && event.responseTimeMs >= 0) {
    const samples = usage.responseSamples ?? 0;
    next.avgResponseTimeMs = ((usage.avgResponseTimeMs ?? 0) * samples + event.responseTimeMs) / (samples + 1);
    next.responseSamples = samples + 1;
  }

  return next;
}

/**
 * Usage view for enriched models; undefined when the model was never used
 */
export function toUsageInfo(record: UsageRecord): UsageInfo | undefined {
  const { usage } = record;
  if (usage.count === 0) return undefined;

  return {
    count: usage.count,
    lastUsed: usage.lastUsed ? new Date(usage.lastUsed) : undefined,
    firstUsed: usage.firstUsed ? new Date(usage.firstUsed) : undefined,
    totalTokens: usage.totalTokens,
    avgResponseTimeMs: usage.avgResponseTimeMs,
  };
}
