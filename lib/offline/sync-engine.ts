// PatrolSync - Sync Orchestrator
// Moves records of one kind from pending to synced, one batch in flight at a time

import { getErrorMessage, isPatrolSyncError, RecordStoreError } from '@/lib/errors/sync-errors';
import type { OperationKind, RecordKind, SyncRecord, UploadProgress, UploadStatus } from '@/types';

import type { ConnectivityOracle } from './connectivity';
import { getDiagnosticsService, type DiagnosticsService } from './diagnostics-service';
import type { RecordStore } from './record-store';
import type { SyncEventBus, SyncRunStatus } from './sync-events';

// ============================================================================
// CONFIGURATION
// ============================================================================

/**
 * Location samples per batch call
 */
export const LOCATION_BATCH_SIZE = 50;

/**
 * Records fetched per cycle for kinds submitted one item at a time
 */
export const MAX_BATCH_SIZE = 20;

/**
 * Batches drained by a single run before yielding to the next cycle
 */
export const MAX_BATCHES_PER_RUN = 10;

/**
 * Base delay for exponential backoff (5 seconds)
 */
export const BASE_RETRY_DELAY = 5000;

/**
 * Maximum backoff delay (30 minutes)
 */
export const MAX_RETRY_DELAY = 30 * 60 * 1000;

/**
 * Calculates the delay before the next scheduled attempt with exponential backoff
 * Formula: min(BASE_RETRY_DELAY * 2^retryCount, MAX_RETRY_DELAY) ± 10% jitter
 *
 * @param retryCount - Consecutive failed runs so far
 * @param random - Source of randomness in [0, 1)
 * @returns Delay in milliseconds
 */
export function calculateRetryDelay(retryCount: number, random: () => number = Math.random): number {
  const baseDelay = Math.min(BASE_RETRY_DELAY * Math.pow(2, retryCount), MAX_RETRY_DELAY);

  // ±10% jitter so that clients do not retry in lockstep
  const jitter = baseDelay * 0.1 * (random() * 2 - 1);

  return Math.round(baseDelay + jitter);
}

// ============================================================================
// TRANSPORT STRATEGIES
// ============================================================================

/**
 * Structured response of a batch endpoint
 */
export interface BatchOutcome {
  acceptedIds: string[];
  rejectedIds: string[];
  /** Server ids keyed by local id */
  remoteIds?: Record<string, string>;
}

export type ItemOutcome =
  | { status: 'accepted'; remoteId?: string | null }
  | { status: 'rejected'; message?: string };

interface StrategyBase<K extends RecordKind> {
  kind: K;
  /** Connectivity policy consulted before each run */
  operation: OperationKind;
  /** Records fetched per batch */
  batchSize: number;
}

/**
 * All fetched records travel in one transport call
 */
export interface BatchSyncStrategy<K extends RecordKind> extends StrategyBase<K> {
  mode: 'batch';
  submitBatch(records: SyncRecord<K>[]): Promise<BatchOutcome>;
}

/**
 * Each record travels in its own transport call
 */
export interface ItemSyncStrategy<K extends RecordKind> extends StrategyBase<K> {
  mode: 'item';
  submit(record: SyncRecord<K>, onProgress: (progress: number) => void): Promise<ItemOutcome>;
  /**
   * Persists upload progress. When present the orchestrator emits progress
   * events and records 100/completed before marking the record synced.
   */
  recordProgress?(record: SyncRecord<K>, progress: UploadProgress): Promise<void>;
}

export type SyncStrategy<K extends RecordKind> = BatchSyncStrategy<K> | ItemSyncStrategy<K>;

// ============================================================================
// RESULTS
// ============================================================================

export interface SyncRunError {
  code: string;
  message: string;
  localIds: string[];
}

export interface SyncRunResult {
  kind: RecordKind;
  /** true only when every fetched record reached the server, or there was nothing to do */
  success: boolean;
  status: SyncRunStatus;
  synced: number;
  failed: number;
  /** Pending records left after the run */
  pending: number;
  errors: SyncRunError[];
}

export interface SyncRunOptions {
  /** Checked between batches; a transport call in progress is never interrupted */
  signal?: AbortSignal;
}

export interface SyncOrchestratorOptions<K extends RecordKind> {
  store: RecordStore;
  connectivity: ConnectivityOracle;
  strategy: SyncStrategy<K>;
  events?: SyncEventBus;
  diagnostics?: DiagnosticsService;
  maxBatchesPerRun?: number;
}

function createResult(kind: RecordKind, status: SyncRunStatus): SyncRunResult {
  return { kind, success: false, status, synced: 0, failed: 0, pending: 0, errors: [] };
}

function clampProgress(progress: number, max: number = 100): number {
  if (!Number.isFinite(progress)) return 0;
  return Math.min(max, Math.max(0, Math.round(progress)));
}

// ============================================================================
// SYNC ORCHESTRATOR CLASS
// ============================================================================

export class SyncOrchestrator<K extends RecordKind> {
  private isRunning = false;
  private currentRun: Promise<SyncRunResult> | null = null;

  private readonly store: RecordStore;
  private readonly connectivity: ConnectivityOracle;
  private readonly strategy: SyncStrategy<K>;
  private readonly events: SyncEventBus | undefined;
  private readonly diagnostics: DiagnosticsService;
  private readonly maxBatchesPerRun: number;

  constructor(options: SyncOrchestratorOptions<K>) {
    this.store = options.store;
    this.connectivity = options.connectivity;
    this.strategy = options.strategy;
    this.events = options.events;
    this.diagnostics = options.diagnostics ?? getDiagnosticsService();
    this.maxBatchesPerRun = options.maxBatchesPerRun ?? MAX_BATCHES_PER_RUN;
  }

  get kind(): K {
    return this.strategy.kind;
  }

  isSyncing(): boolean {
    return this.isRunning;
  }

  /**
   * Resolves with the result of the run in progress, or null when idle
   */
  whenIdle(): Promise<SyncRunResult | null> {
    return this.currentRun ?? Promise.resolve(null);
  }

  /**
   * Runs one sync cycle for this kind. A call made while a cycle is running
   * returns at once with status 'already_running'.
   */
  async sync(options: SyncRunOptions = {}): Promise<SyncRunResult> {
    if (this.isRunning) {
      console.log(`[SyncOrchestrator:${this.kind}] Sync already running, skipping`);
      return createResult(this.kind, 'already_running');
    }

    this.isRunning = true;
    const run = this.execute(options.signal);
    this.currentRun = run;

    try {
      return await run;
    } finally {
      this.isRunning = false;
      this.currentRun = null;
    }
  }

  private async execute(signal: AbortSignal | undefined): Promise<SyncRunResult> {
    const startedAt = Date.now();

    if (!this.connectivity.shouldAttempt(this.strategy.operation)) {
      console.log(`[SyncOrchestrator:${this.kind}] Deferred by connectivity policy`);
      const deferred = createResult(this.kind, 'deferred');
      this.finish(deferred, startedAt);
      return deferred;
    }

    const result = createResult(this.kind, 'completed');

    try {
      // Only this run can own in-flight records of this kind
      const recovered = await this.store.revertInFlight(this.kind);
      if (recovered > 0) {
        console.warn(`[SyncOrchestrator:${this.kind}] Reverted ${recovered} stale in-flight records`);
      }

      const before = await this.store.countByState(this.kind);
      this.events?.emit({ type: 'sync_started', kind: this.kind, pending: before.pending });

      let batches = 0;
      while (batches < this.maxBatchesPerRun) {
        if (signal?.aborted) {
          result.status = 'aborted';
          break;
        }

        const records = await this.store.getPending(this.kind, this.strategy.batchSize);
        if (records.length === 0) break;

        const batchSucceeded =
          this.strategy.mode === 'batch'
            ? await this.processBatch(this.strategy, records, result)
            : await this.processItems(this.strategy, records, result, signal);
        batches++;

        if (!batchSucceeded || records.length < this.strategy.batchSize) break;
      }

      if (result.status !== 'aborted') {
        result.status = result.failed === 0 ? 'completed' : result.synced > 0 ? 'partial' : 'failed';
      }
      result.pending = (await this.store.countByState(this.kind)).pending;
    } catch (error) {
      result.status = 'fatal';
      const code = isPatrolSyncError(error) ? error.code : 'SYNC_ERROR';
      result.errors.push({ code, message: getErrorMessage(error), localIds: [] });
      console.error(`[SyncOrchestrator:${this.kind}] Cycle aborted by local error:`, error);
    }

    result.success = result.status === 'completed';
    this.finish(result, startedAt);
    return result;
  }

  private finish(result: SyncRunResult, startedAt: number): void {
    this.diagnostics.recordSyncRun(result, Date.now() - startedAt);
    this.events?.emit({
      type: 'sync_completed',
      kind: this.kind,
      status: result.status,
      synced: result.synced,
      failed: result.failed,
    });
    console.log(
      `[SyncOrchestrator:${this.kind}] ${result.status}: ${result.synced} synced, ${result.failed} failed, ${result.pending} pending`
    );
  }

  // ==========================================================================
  // BATCH MODE
  // ==========================================================================

  /**
   * @returns true when every record of the batch was accepted
   */
  private async processBatch(
    strategy: BatchSyncStrategy<K>,
    records: SyncRecord<K>[],
    result: SyncRunResult
  ): Promise<boolean> {
    const localIds = records.map((record) => record.localId);
    await this.store.updateSyncStates(localIds, 'in_flight');

    let outcome: BatchOutcome;
    try {
      outcome = await strategy.submitBatch(records);
    } catch (error) {
      if (error instanceof RecordStoreError) throw error;
      await this.store.updateSyncStates(localIds, 'pending');
      this.recordTransportFailure(result, error, localIds);
      return false;
    }

    const batchIds = new Set(localIds);
    const rejected = new Set(outcome.rejectedIds);
    const accepted = new Set(outcome.acceptedIds.filter((id) => batchIds.has(id) && !rejected.has(id)));
    const notAccepted = localIds.filter((id) => !accepted.has(id));

    await this.store.markSynced(
      [...accepted].map((localId) => ({ localId, remoteId: outcome.remoteIds?.[localId] ?? localId }))
    );
    await this.store.updateSyncStates(notAccepted, 'pending');

    result.synced += accepted.size;
    result.failed += notAccepted.length;

    if (notAccepted.length > 0) {
      result.errors.push({
        code: 'REJECTED',
        message: `${notAccepted.length} of ${localIds.length} records were not accepted`,
        localIds: notAccepted,
      });
    }

    return notAccepted.length === 0;
  }

  // ==========================================================================
  // ITEM MODE
  // ==========================================================================

  /**
   * Submits records one by one. A failed item never stops the others.
   *
   * @returns true when every record was accepted
   */
  private async processItems(
    strategy: ItemSyncStrategy<K>,
    records: SyncRecord<K>[],
    result: SyncRunResult,
    signal: AbortSignal | undefined
  ): Promise<boolean> {
    let allAccepted = true;

    for (const record of records) {
      if (signal?.aborted) {
        result.status = 'aborted';
        return false;
      }

      const accepted = await this.processItem(strategy, record, result);
      if (!accepted) allAccepted = false;
    }

    return allAccepted;
  }

  private async processItem(
    strategy: ItemSyncStrategy<K>,
    record: SyncRecord<K>,
    result: SyncRunResult
  ): Promise<boolean> {
    const claimed = await this.store.updateSyncState(record.localId, 'in_flight');
    if (!claimed) return true;

    await this.trackProgress(strategy, record, 0, 'uploading');

    let outcome: ItemOutcome;
    try {
      outcome = await strategy.submit(record, (progress) => {
        // 100 is reserved for the confirmed acceptance
        this.emitProgress(strategy, { localId: record.localId, progress: clampProgress(progress, 99), status: 'uploading' });
      });
    } catch (error) {
      if (error instanceof RecordStoreError) throw error;
      await this.store.updateSyncState(record.localId, 'pending');
      await this.trackProgress(strategy, record, 0, 'error', getErrorMessage(error));
      this.recordTransportFailure(result, error, [record.localId]);
      return false;
    }

    if (outcome.status === 'rejected') {
      const message = outcome.message ?? 'Rejected by server';
      await this.store.updateSyncState(record.localId, 'pending');
      await this.trackProgress(strategy, record, 0, 'error', message);
      result.failed++;
      result.errors.push({ code: 'REJECTED', message, localIds: [record.localId] });
      return false;
    }

    await this.trackProgress(strategy, record, 100, 'completed');
    await this.store.updateSyncState(record.localId, 'synced', outcome.remoteId ?? record.localId);
    result.synced++;
    return true;
  }

  private emitProgress(strategy: ItemSyncStrategy<K>, progress: UploadProgress): void {
    if (!strategy.recordProgress) return;
    this.events?.emit({ type: 'upload_progress', kind: this.kind, progress });
  }

  private async trackProgress(
    strategy: ItemSyncStrategy<K>,
    record: SyncRecord<K>,
    progress: number,
    status: UploadStatus,
    errorMessage?: string
  ): Promise<void> {
    if (!strategy.recordProgress) return;

    const update: UploadProgress = { localId: record.localId, progress: clampProgress(progress), status };
    if (errorMessage !== undefined) update.errorMessage = errorMessage;

    await strategy.recordProgress(record, update);
    this.emitProgress(strategy, update);
  }

  private recordTransportFailure(result: SyncRunResult, error: unknown, localIds: string[]): void {
    const code = isPatrolSyncError(error) ? error.code : 'TRANSPORT_ERROR';
    const message = getErrorMessage(error);

    result.failed += localIds.length;
    result.errors.push({ code, message, localIds });
    console.warn(`[SyncOrchestrator:${this.kind}] Transport failed for ${localIds.length} records: ${message}`);
  }
}
