// PatrolSync - Diagnostics Service
// Keeps recent error logs and the outcome of the last sync run per record kind

import { v4 as uuidv4 } from 'uuid';

import { RECORD_KINDS, type RecordKind, type SyncState } from '@/types';

import type { RecordStore } from './record-store';
import type { SyncRunResult } from './sync-engine';

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Maximum number of error logs to keep
 */
export const MAX_ERROR_LOGS = 100;

export type ErrorLogType = 'sync' | 'storage' | 'network' | 'validation' | 'general';

// ============================================================================
// TYPES
// ============================================================================

export interface ErrorLog {
  id: string;
  timestamp: string;
  type: ErrorLogType;
  code: string;
  message: string;
  context: Record<string, unknown>;
  stack?: string;
}

export interface LastSyncInfo {
  syncRunId: string;
  timestamp: string;
  result: SyncRunResult;
  durationMs: number;
}

export interface KindDiagnostics {
  counts: Record<SyncState, number>;
  lastSync: LastSyncInfo | null;
}

export interface DiagnosticsData {
  kinds: Record<RecordKind, KindDiagnostics>;
  totalPending: number;
  recentErrors: ErrorLog[];
  collectedAt: string;
}

// ============================================================================
// DIAGNOSTICS SERVICE CLASS
// ============================================================================

export class DiagnosticsService {
  /** Most recent first */
  private logs: ErrorLog[] = [];
  private lastSync = new Map<RecordKind, LastSyncInfo>();

  /**
   * Logs an error with context
   */
  logError(error: Omit<ErrorLog, 'id' | 'timestamp'>): ErrorLog {
    const log: ErrorLog = {
      id: uuidv4(),
      timestamp: new Date().toISOString(),
      ...error,
    };

    this.logs.unshift(log);
    if (this.logs.length > MAX_ERROR_LOGS) {
      this.logs = this.logs.slice(0, MAX_ERROR_LOGS);
    }

    console.error(`[DiagnosticsService] ${error.type} error:`, error.message, error.context);
    return log;
  }

  /**
   * Records the outcome of one orchestrator run and logs its item errors
   */
  recordSyncRun(result: SyncRunResult, durationMs: number): void {
    const syncRunId = uuidv4();

    this.lastSync.set(result.kind, {
      syncRunId,
      timestamp: new Date().toISOString(),
      result,
      durationMs,
    });

    for (const error of result.errors) {
      this.logError({
        type: 'sync',
        code: error.code,
        message: error.message,
        context: {
          kind: result.kind,
          local_ids: error.localIds,
          sync_run_id: syncRunId,
        },
      });
    }
  }

  getLastSync(kind: RecordKind): LastSyncInfo | null {
    return this.lastSync.get(kind) ?? null;
  }

  getRecentErrors(count: number = 10): ErrorLog[] {
    return this.logs.slice(0, count);
  }

  /**
   * Snapshot of queue sizes, last runs and recent errors
   */
  async getData(store: RecordStore): Promise<DiagnosticsData> {
    const describe = async (kind: RecordKind): Promise<KindDiagnostics> => ({
      counts: await store.countByState(kind),
      lastSync: this.getLastSync(kind),
    });

    const [timeRecord, verification, location, report, photo] = await Promise.all(
      RECORD_KINDS.map(describe)
    );
    const kinds: Record<RecordKind, KindDiagnostics> = {
      time_record: timeRecord,
      checkpoint_verification: verification,
      location_sample: location,
      report,
      photo,
    };
    const totalPending = Object.values(kinds).reduce((sum, info) => sum + info.counts.pending, 0);

    return {
      kinds,
      totalPending,
      recentErrors: this.getRecentErrors(10),
      collectedAt: new Date().toISOString(),
    };
  }

  clear(): void {
    this.logs = [];
    this.lastSync.clear();
  }
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

let diagnosticsServiceInstance: DiagnosticsService | null = null;

export function getDiagnosticsService(): DiagnosticsService {
  if (!diagnosticsServiceInstance) {
    diagnosticsServiceInstance = new DiagnosticsService();
  }
  return diagnosticsServiceInstance;
}

// ============================================================================
// CONVENIENCE FUNCTIONS
// ============================================================================

export function logSyncError(code: string, message: string, context: Record<string, unknown> = {}): void {
  getDiagnosticsService().logError({ type: 'sync', code, message, context });
}

export function logStorageError(code: string, message: string, context: Record<string, unknown> = {}): void {
  getDiagnosticsService().logError({ type: 'storage', code, message, context });
}

export function logNetworkError(code: string, message: string, context: Record<string, unknown> = {}): void {
  getDiagnosticsService().logError({ type: 'network', code, message, context });
}

export function logValidationError(code: string, message: string, context: Record<string, unknown> = {}): void {
  getDiagnosticsService().logError({ type: 'validation', code, message, context });
}
