// PatrolSync - Record Store Contract
// The only mutable shared resource of the sync core. Implementations own their concurrency control.

import type {
  Checkpoint,
  PatrolLocation,
  PhotoRecord,
  RecordKind,
  SyncRecord,
  SyncState,
  UploadProgress,
} from '@/types';

// ============================================================================
// TYPES
// ============================================================================

export type RecordPredicate<K extends RecordKind> = (record: SyncRecord<K>) => boolean;

export interface QueryOptions {
  /** Maximum number of records returned */
  limit?: number;
  /** Creation-time order, oldest first by default */
  direction?: 'oldest_first' | 'newest_first';
}

export interface AcceptedRecord {
  localId: string;
  remoteId: string;
}

export type UnsyncedState = Exclude<SyncState, 'synced'>;

/**
 * Durable store of syncable records.
 *
 * Writes are durable before the returned promise resolves and a query never
 * observes a partially written record. Storage failures reject with
 * RecordStoreError.
 */
export interface RecordStore {
  save<K extends RecordKind>(record: SyncRecord<K>): Promise<void>;

  get<K extends RecordKind>(kind: K, localId: string): Promise<SyncRecord<K> | undefined>;

  query<K extends RecordKind>(
    kind: K,
    predicate?: RecordPredicate<K>,
    options?: QueryOptions
  ): Promise<SyncRecord<K>[]>;

  /**
   * Pending records of a kind, oldest first
   */
  getPending<K extends RecordKind>(kind: K, limit: number): Promise<SyncRecord<K>[]>;

  /**
   * Moves one record to a new state. Synced is terminal: once synced the
   * record is left untouched and false is returned.
   */
  updateSyncState(localId: string, state: 'synced', remoteId: string): Promise<boolean>;
  updateSyncState(localId: string, state: UnsyncedState): Promise<boolean>;

  /**
   * Moves several unsynced records to one state in a single transaction
   *
   * @returns Number of records changed
   */
  updateSyncStates(localIds: readonly string[], state: UnsyncedState): Promise<number>;

  /**
   * Marks accepted records synced in a single transaction
   */
  markSynced(accepted: readonly AcceptedRecord[]): Promise<number>;

  /**
   * Stores the latest upload progress on a photo record
   */
  updatePhotoUpload(localId: string, upload: UploadProgress): Promise<PhotoRecord | undefined>;

  /**
   * Deletes a record that never reached the server. In-flight and synced
   * records are kept.
   *
   * @returns true when a record was deleted
   */
  deletePending(kind: RecordKind, localId: string): Promise<boolean>;

  /**
   * Deletes a record whatever its state
   */
  remove(kind: RecordKind, localId: string): Promise<boolean>;

  /**
   * Puts every in-flight record of a kind back to pending
   */
  revertInFlight(kind: RecordKind): Promise<number>;

  countByState(kind: RecordKind): Promise<Record<SyncState, number>>;

  /**
   * Deletes synced records created before the cutoff
   */
  purgeSyncedBefore(kind: RecordKind, cutoff: Date): Promise<number>;
}

/**
 * Locally cached reference data
 */
export interface CatalogStore {
  savePatrolLocations(locations: readonly PatrolLocation[]): Promise<void>;
  getPatrolLocations(): Promise<PatrolLocation[]>;
  saveCheckpoints(locationId: number, checkpoints: readonly Checkpoint[]): Promise<void>;
  getCheckpoints(locationId: number): Promise<Checkpoint[]>;
}

export function emptyStateCounts(): Record<SyncState, number> {
  return { pending: 0, in_flight: 0, synced: 0, failed: 0 };
}
