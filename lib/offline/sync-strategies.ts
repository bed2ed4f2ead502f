// PatrolSync - Sync Strategies
// Binds each record kind to its endpoint, batch size and connectivity policy

import type { PatrolTransport } from '@/lib/api/patrol-api';
import type { RecordKind } from '@/types';

import type { ConnectivityOracle } from './connectivity';
import type { DiagnosticsService } from './diagnostics-service';
import type { RecordStore } from './record-store';
import type { SyncEventBus } from './sync-events';
import {
  LOCATION_BATCH_SIZE,
  MAX_BATCH_SIZE,
  SyncOrchestrator,
  type BatchSyncStrategy,
  type ItemSyncStrategy,
} from './sync-engine';

// ============================================================================
// TYPES
// ============================================================================

export interface SyncStrategyMap {
  time_record: ItemSyncStrategy<'time_record'>;
  checkpoint_verification: ItemSyncStrategy<'checkpoint_verification'>;
  location_sample: BatchSyncStrategy<'location_sample'>;
  report: ItemSyncStrategy<'report'>;
  photo: ItemSyncStrategy<'photo'>;
}

export type SyncOrchestratorMap = { [K in RecordKind]: SyncOrchestrator<K> };

export interface SyncStrategyOptions {
  locationBatchSize?: number;
  itemBatchSize?: number;
}

export interface CreateOrchestratorsOptions extends SyncStrategyOptions {
  store: RecordStore;
  connectivity: ConnectivityOracle;
  transport: PatrolTransport;
  events?: SyncEventBus;
  diagnostics?: DiagnosticsService;
  maxBatchesPerRun?: number;
}

// ============================================================================
// FACTORIES
// ============================================================================

/**
 * Builds the strategy of every record kind.
 * Location samples travel in batches; everything else one item per call.
 */
export function createSyncStrategies(
  transport: PatrolTransport,
  store: RecordStore,
  options: SyncStrategyOptions = {}
): SyncStrategyMap {
  const itemBatchSize = options.itemBatchSize ?? MAX_BATCH_SIZE;

  return {
    time_record: {
      mode: 'item',
      kind: 'time_record',
      operation: 'clock_event',
      batchSize: itemBatchSize,
      submit: (record) => transport.submitTimeRecord(record),
    },
    checkpoint_verification: {
      mode: 'item',
      kind: 'checkpoint_verification',
      operation: 'checkpoint_sync',
      batchSize: itemBatchSize,
      submit: (record) => transport.submitCheckpointVerification(record),
    },
    location_sample: {
      mode: 'batch',
      kind: 'location_sample',
      operation: 'location_sync',
      batchSize: options.locationBatchSize ?? LOCATION_BATCH_SIZE,
      submitBatch: (records) => transport.submitLocationBatch(records),
    },
    report: {
      mode: 'item',
      kind: 'report',
      operation: 'report_sync',
      batchSize: itemBatchSize,
      submit: (record) => transport.submitReport(record),
    },
    photo: {
      mode: 'item',
      kind: 'photo',
      operation: 'photo_upload',
      batchSize: itemBatchSize,
      submit: (record, onProgress) => transport.uploadPhoto(record, onProgress),
      recordProgress: async (record, progress) => {
        await store.updatePhotoUpload(record.localId, progress);
      },
    },
  };
}

/**
 * One orchestrator per record kind, sharing store, oracle and event bus
 */
export function createSyncOrchestrators(options: CreateOrchestratorsOptions): SyncOrchestratorMap {
  const strategies = createSyncStrategies(options.transport, options.store, options);
  const shared = {
    store: options.store,
    connectivity: options.connectivity,
    events: options.events,
    diagnostics: options.diagnostics,
    maxBatchesPerRun: options.maxBatchesPerRun,
  };

  return {
    time_record: new SyncOrchestrator({ ...shared, strategy: strategies.time_record }),
    checkpoint_verification: new SyncOrchestrator({ ...shared, strategy: strategies.checkpoint_verification }),
    location_sample: new SyncOrchestrator({ ...shared, strategy: strategies.location_sample }),
    report: new SyncOrchestrator({ ...shared, strategy: strategies.report }),
    photo: new SyncOrchestrator({ ...shared, strategy: strategies.photo }),
  };
}
