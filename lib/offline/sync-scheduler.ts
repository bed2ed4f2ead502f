// PatrolSync - Sync Scheduler
// Periodic and on-demand triggers for the per-kind orchestrators

import { getErrorMessage } from '@/lib/errors/sync-errors';
import { RECORD_KINDS, type RecordKind } from '@/types';

import { calculateRetryDelay, type SyncRunResult } from './sync-engine';
import type { SyncOrchestratorMap } from './sync-strategies';

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Default interval between scheduled cycles (15 minutes)
 */
export const SYNC_INTERVAL_MS = 15 * 60 * 1000;

// ============================================================================
// TYPES
// ============================================================================

export interface AggregateSyncResult {
  /** true only if every kind succeeded */
  success: boolean;
  results: SyncRunResult[];
  synced: number;
  failed: number;
}

export interface ConnectivityRestoreSource {
  onConnectivityRestored(listener: () => void): () => void;
}

export interface SyncSchedulerOptions {
  orchestrators: SyncOrchestratorMap;
  intervalMs?: number;
  /** Triggers a full sync whenever the network comes back */
  connectivity?: ConnectivityRestoreSource;
  /** Skip scheduled runs of a failing kind with exponential backoff (default: true) */
  backoff?: boolean;
  random?: () => number;
  now?: () => number;
}

// ============================================================================
// SYNC SCHEDULER CLASS
// ============================================================================

export class SyncScheduler {
  private timer: ReturnType<typeof setInterval> | null = null;
  private abortController = new AbortController();
  private unsubscribeRestore: (() => void) | null = null;
  private consecutiveFailures = new Map<RecordKind, number>();
  private nextAttemptAt = new Map<RecordKind, number>();

  private readonly orchestrators: SyncOrchestratorMap;
  private readonly intervalMs: number;
  private readonly connectivity: ConnectivityRestoreSource | undefined;
  private readonly backoff: boolean;
  private readonly random: () => number;
  private readonly now: () => number;

  constructor(options: SyncSchedulerOptions) {
    this.orchestrators = options.orchestrators;
    this.intervalMs = options.intervalMs ?? SYNC_INTERVAL_MS;
    this.connectivity = options.connectivity;
    this.backoff = options.backoff ?? true;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  start(): void {
    if (this.timer) return;

    console.log(`[SyncScheduler] Starting, interval ${this.intervalMs}ms`);
    this.timer = setInterval(() => {
      void this.runScheduled();
    }, this.intervalMs);

    if (this.connectivity) {
      this.unsubscribeRestore = this.connectivity.onConnectivityRestored(() => {
        void this.syncAll();
      });
    }
  }

  /**
   * Stops the timer and asks running cycles to stop after their current batch
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.unsubscribeRestore?.();
    this.unsubscribeRestore = null;

    this.abortController.abort();
    this.abortController = new AbortController();
    console.log('[SyncScheduler] Stopped');
  }

  isStarted(): boolean {
    return this.timer !== null;
  }

  // ==========================================================================
  // TRIGGERS
  // ==========================================================================

  /**
   * Runs one kind now, ignoring backoff. Joins a run already in progress.
   */
  syncNow(kind: RecordKind): Promise<SyncRunResult> {
    return this.runKind(kind, true);
  }

  /**
   * Runs every kind concurrently and waits for all of them
   */
  async syncAll(): Promise<AggregateSyncResult> {
    const results = await Promise.all(RECORD_KINDS.map((kind) => this.runKind(kind, true)));
    return aggregate(results);
  }

  /**
   * Fire-and-forget run after a local record was created
   */
  requestSync(kind: RecordKind): void {
    void this.runKind(kind, false);
  }

  /**
   * Scheduled cycle: every kind outside its backoff window
   */
  async runScheduled(): Promise<AggregateSyncResult> {
    const now = this.now();
    const due = RECORD_KINDS.filter((kind) => !this.backoff || (this.nextAttemptAt.get(kind) ?? 0) <= now);
    const results = await Promise.all(due.map((kind) => this.runKind(kind, false)));
    return aggregate(results);
  }

  /**
   * Time before the next scheduled attempt of a kind, 0 when not backing off
   */
  getBackoffRemaining(kind: RecordKind): number {
    return Math.max(0, (this.nextAttemptAt.get(kind) ?? 0) - this.now());
  }

  // ==========================================================================
  // PRIVATE
  // ==========================================================================

  private async runKind(kind: RecordKind, joinRunning: boolean): Promise<SyncRunResult> {
    const orchestrator = this.orchestrators[kind];

    try {
      if (joinRunning && orchestrator.isSyncing()) {
        const running = await orchestrator.whenIdle();
        if (running) return running;
      }

      const result = await orchestrator.sync({ signal: this.abortController.signal });
      this.updateBackoff(kind, result);
      return result;
    } catch (error) {
      console.error(`[SyncScheduler] ${kind} sync crashed:`, error);
      return {
        kind,
        success: false,
        status: 'fatal',
        synced: 0,
        failed: 0,
        pending: 0,
        errors: [{ code: 'SYNC_ERROR', message: getErrorMessage(error), localIds: [] }],
      };
    }
  }

  private updateBackoff(kind: RecordKind, result: SyncRunResult): void {
    switch (result.status) {
      case 'completed':
        this.consecutiveFailures.delete(kind);
        this.nextAttemptAt.delete(kind);
        break;

      case 'failed':
      case 'partial':
      case 'fatal': {
        const failures = (this.consecutiveFailures.get(kind) ?? 0) + 1;
        this.consecutiveFailures.set(kind, failures);
        this.nextAttemptAt.set(kind, this.now() + calculateRetryDelay(failures - 1, this.random));
        break;
      }

      // Deferral, abort and overlap say nothing about the server
      default:
        break;
    }
  }
}

function aggregate(results: SyncRunResult[]): AggregateSyncResult {
  return {
    success: results.every((result) => result.success),
    results,
    synced: results.reduce((sum, result) => sum + result.synced, 0),
    failed: results.reduce((sum, result) => sum + result.failed, 0),
  };
}
