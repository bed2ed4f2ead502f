// PatrolSync - IndexedDB Record Store
// Durable storage of syncable records and cached catalog data, built on idb

import { openDB, type DBSchema, type IDBPDatabase } from 'idb';

import { RecordStoreError } from '@/lib/errors/sync-errors';
import type {
  Checkpoint,
  PatrolLocation,
  PhotoRecord,
  RecordKind,
  RemoteRef,
  SyncRecord,
  SyncState,
  UploadProgress,
} from '@/types';

import { syncedRef, UNSYNCED } from './offline-entity';
import {
  emptyStateCounts,
  type AcceptedRecord,
  type CatalogStore,
  type QueryOptions,
  type RecordPredicate,
  type RecordStore,
  type UnsyncedState,
} from './record-store';

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Current database version
 * v1: records + meta
 * v2: patrol_locations + checkpoints catalog cache
 */
export const DB_VERSION = 2;

export const DB_NAME = 'patrol-sync';

export const SCHEMA_VERSION_KEY = 'schema_version';

/** Upper bound for ISO timestamps inside compound key ranges */
const MAX_TIMESTAMP = '\uffff';

// ============================================================================
// SCHEMA
// ============================================================================

interface MetaEntry {
  key: string;
  value: number | string;
}

interface PatrolSyncDB extends DBSchema {
  records: {
    key: string;
    value: SyncRecord;
    indexes: {
      'by-kind-created': [RecordKind, string];
      'by-kind-state-created': [RecordKind, SyncState, string];
    };
  };
  meta: {
    key: string;
    value: MetaEntry;
  };
  patrol_locations: {
    key: number;
    value: PatrolLocation;
  };
  checkpoints: {
    key: number;
    value: Checkpoint;
    indexes: {
      'by-location': number;
    };
  };
}

export interface IndexedDbRecordStoreOptions {
  dbName?: string;
}

// ============================================================================
// HELPERS
// ============================================================================

function isKind<K extends RecordKind>(record: SyncRecord, kind: K): record is SyncRecord<K> {
  return record.kind === kind;
}

function withSyncState(record: SyncRecord, syncState: SyncState, remote: RemoteRef): SyncRecord {
  return { ...record, syncState, remote };
}

function stateRange(kind: RecordKind, state: SyncState, upper: string = MAX_TIMESTAMP, upperOpen = false): IDBKeyRange {
  return IDBKeyRange.bound([kind, state, ''], [kind, state, upper], false, upperOpen);
}

// ============================================================================
// INDEXED DB RECORD STORE
// ============================================================================

/**
 * RecordStore and CatalogStore over one IndexedDB database. Every mutation
 * runs inside a single readwrite transaction, so a reader never sees half of it.
 */
export class IndexedDbRecordStore implements RecordStore, CatalogStore {
  private readonly dbName: string;
  private dbPromise: Promise<IDBPDatabase<PatrolSyncDB>> | null = null;

  constructor(options: IndexedDbRecordStoreOptions = {}) {
    this.dbName = options.dbName ?? DB_NAME;
  }

  // ==========================================================================
  // CONNECTION
  // ==========================================================================

  private open(): Promise<IDBPDatabase<PatrolSyncDB>> {
    if (!this.dbPromise) {
      const dbName = this.dbName;
      console.log(`[IndexedDB] Opening database ${dbName} version ${DB_VERSION}`);

      this.dbPromise = openDB<PatrolSyncDB>(dbName, DB_VERSION, {
        upgrade(db, oldVersion, newVersion, transaction) {
          console.log(`[IndexedDB] Upgrade callback triggered: v${oldVersion} → v${newVersion}`);

          if (oldVersion < 1) {
            const records = db.createObjectStore('records', { keyPath: 'localId' });
            records.createIndex('by-kind-created', ['kind', 'createdAt']);
            records.createIndex('by-kind-state-created', ['kind', 'syncState', 'createdAt']);
            db.createObjectStore('meta', { keyPath: 'key' });
          }

          if (oldVersion < 2) {
            db.createObjectStore('patrol_locations', { keyPath: 'id' });
            const checkpoints = db.createObjectStore('checkpoints', { keyPath: 'id' });
            checkpoints.createIndex('by-location', 'locationId');
          }

          // Future migrations go here:
          // if (oldVersion < 3) { ... }

          void transaction
            .objectStore('meta')
            .put({ key: SCHEMA_VERSION_KEY, value: newVersion ?? DB_VERSION });
        },
        blocked() {
          console.warn('[IndexedDB] Database upgrade blocked by another connection');
        },
        terminated: () => {
          console.error('[IndexedDB] Database connection terminated unexpectedly');
          this.dbPromise = null;
        },
      });
    }
    return this.dbPromise;
  }

  /**
   * Runs one store operation, surfacing any failure as RecordStoreError
   */
  private async run<T>(operation: string, fn: (db: IDBPDatabase<PatrolSyncDB>) => Promise<T>): Promise<T> {
    let db: IDBPDatabase<PatrolSyncDB>;
    try {
      db = await this.open();
    } catch (error) {
      // A failed open must not poison later attempts
      this.dbPromise = null;
      console.error(`[IndexedDB] Opening ${this.dbName} failed:`, error);
      throw new RecordStoreError('open', error);
    }

    try {
      return await fn(db);
    } catch (error) {
      if (error instanceof RecordStoreError) throw error;
      console.error(`[IndexedDB] ${operation} failed:`, error);
      throw new RecordStoreError(operation, error);
    }
  }

  async close(): Promise<void> {
    if (!this.dbPromise) return;
    const db = await this.dbPromise;
    db.close();
    this.dbPromise = null;
  }

  async getSchemaVersion(): Promise<number | null> {
    return this.run('getSchemaVersion', async (db) => {
      const entry = await db.get('meta', SCHEMA_VERSION_KEY);
      return typeof entry?.value === 'number' ? entry.value : null;
    });
  }

  // ==========================================================================
  // RECORDS
  // ==========================================================================

  async save<K extends RecordKind>(record: SyncRecord<K>): Promise<void> {
    await this.run('save', async (db) => {
      await db.put('records', record);
    });
  }

  async get<K extends RecordKind>(kind: K, localId: string): Promise<SyncRecord<K> | undefined> {
    return this.run('get', async (db) => {
      const record = await db.get('records', localId);
      return record && isKind(record, kind) ? record : undefined;
    });
  }

  async query<K extends RecordKind>(
    kind: K,
    predicate?: RecordPredicate<K>,
    options: QueryOptions = {}
  ): Promise<SyncRecord<K>[]> {
    return this.run('query', async (db) => {
      const range = IDBKeyRange.bound([kind, ''], [kind, MAX_TIMESTAMP]);
      const direction = options.direction === 'newest_first' ? 'prev' : 'next';
      const results: SyncRecord<K>[] = [];

      let cursor = await db.transaction('records').store.index('by-kind-created').openCursor(range, direction);
      while (cursor) {
        const record = cursor.value;
        if (isKind(record, kind) && (!predicate || predicate(record))) {
          results.push(record);
          if (options.limit !== undefined && results.length >= options.limit) break;
        }
        cursor = await cursor.continue();
      }
      return results;
    });
  }

  async getPending<K extends RecordKind>(kind: K, limit: number): Promise<SyncRecord<K>[]> {
    return this.run('getPending', async (db) => {
      const records = await db.getAllFromIndex('records', 'by-kind-state-created', stateRange(kind, 'pending'), limit);
      return records.filter((record): record is SyncRecord<K> => isKind(record, kind));
    });
  }

  updateSyncState(localId: string, state: 'synced', remoteId: string): Promise<boolean>;
  updateSyncState(localId: string, state: UnsyncedState): Promise<boolean>;
  async updateSyncState(localId: string, state: SyncState, remoteId?: string): Promise<boolean> {
    return this.run('updateSyncState', async (db) => {
      const tx = db.transaction('records', 'readwrite');
      const record = await tx.store.get(localId);
      if (!record || record.syncState === 'synced') {
        await tx.done;
        return false;
      }

      const remote = state === 'synced' ? syncedRef(remoteId, localId) : UNSYNCED;
      await tx.store.put(withSyncState(record, state, remote));
      await tx.done;
      return true;
    });
  }

  async updateSyncStates(localIds: readonly string[], state: UnsyncedState): Promise<number> {
    if (localIds.length === 0) return 0;

    return this.run('updateSyncStates', async (db) => {
      const tx = db.transaction('records', 'readwrite');
      let changed = 0;

      for (const localId of localIds) {
        const record = await tx.store.get(localId);
        if (!record || record.syncState === 'synced' || record.syncState === state) continue;
        await tx.store.put(withSyncState(record, state, UNSYNCED));
        changed++;
      }

      await tx.done;
      return changed;
    });
  }

  async markSynced(accepted: readonly AcceptedRecord[]): Promise<number> {
    if (accepted.length === 0) return 0;

    return this.run('markSynced', async (db) => {
      const tx = db.transaction('records', 'readwrite');
      const now = new Date();
      let changed = 0;

      for (const { localId, remoteId } of accepted) {
        const record = await tx.store.get(localId);
        if (!record || record.syncState === 'synced') continue;
        await tx.store.put(withSyncState(record, 'synced', syncedRef(remoteId, localId, now)));
        changed++;
      }

      await tx.done;
      return changed;
    });
  }

  async updatePhotoUpload(localId: string, upload: UploadProgress): Promise<PhotoRecord | undefined> {
    return this.run('updatePhotoUpload', async (db) => {
      const tx = db.transaction('records', 'readwrite');
      const record = await tx.store.get(localId);
      if (!record || !isKind(record, 'photo')) {
        await tx.done;
        return undefined;
      }

      const updated: PhotoRecord = { ...record, payload: { ...record.payload, upload } };
      await tx.store.put(updated);
      await tx.done;
      return updated;
    });
  }

  async deletePending(kind: RecordKind, localId: string): Promise<boolean> {
    return this.run('deletePending', async (db) => {
      const tx = db.transaction('records', 'readwrite');
      const record = await tx.store.get(localId);
      if (!record || record.kind !== kind || record.syncState === 'synced' || record.syncState === 'in_flight') {
        await tx.done;
        return false;
      }
      await tx.store.delete(localId);
      await tx.done;
      return true;
    });
  }

  async remove(kind: RecordKind, localId: string): Promise<boolean> {
    return this.run('remove', async (db) => {
      const tx = db.transaction('records', 'readwrite');
      const record = await tx.store.get(localId);
      if (!record || record.kind !== kind) {
        await tx.done;
        return false;
      }
      await tx.store.delete(localId);
      await tx.done;
      return true;
    });
  }

  async revertInFlight(kind: RecordKind): Promise<number> {
    return this.run('revertInFlight', async (db) => {
      const tx = db.transaction('records', 'readwrite');
      let cursor = await tx.store.index('by-kind-state-created').openCursor(stateRange(kind, 'in_flight'));
      let reverted = 0;

      while (cursor) {
        await cursor.update(withSyncState(cursor.value, 'pending', UNSYNCED));
        reverted++;
        cursor = await cursor.continue();
      }

      await tx.done;
      return reverted;
    });
  }

  async countByState(kind: RecordKind): Promise<Record<SyncState, number>> {
    return this.run('countByState', async (db) => {
      const counts = emptyStateCounts();
      const states: SyncState[] = ['pending', 'in_flight', 'synced', 'failed'];

      for (const state of states) {
        counts[state] = await db.countFromIndex('records', 'by-kind-state-created', stateRange(kind, state));
      }
      return counts;
    });
  }

  async purgeSyncedBefore(kind: RecordKind, cutoff: Date): Promise<number> {
    return this.run('purgeSyncedBefore', async (db) => {
      const tx = db.transaction('records', 'readwrite');
      const range = stateRange(kind, 'synced', cutoff.toISOString(), true);
      let cursor = await tx.store.index('by-kind-state-created').openCursor(range);
      let purged = 0;

      while (cursor) {
        await cursor.delete();
        purged++;
        cursor = await cursor.continue();
      }

      await tx.done;
      return purged;
    });
  }

  // ==========================================================================
  // CATALOG
  // ==========================================================================

  async savePatrolLocations(locations: readonly PatrolLocation[]): Promise<void> {
    await this.run('savePatrolLocations', async (db) => {
      const tx = db.transaction('patrol_locations', 'readwrite');
      await tx.store.clear();
      for (const location of locations) {
        await tx.store.put(location);
      }
      await tx.done;
    });
  }

  async getPatrolLocations(): Promise<PatrolLocation[]> {
    return this.run('getPatrolLocations', (db) => db.getAll('patrol_locations'));
  }

  async saveCheckpoints(locationId: number, checkpoints: readonly Checkpoint[]): Promise<void> {
    await this.run('saveCheckpoints', async (db) => {
      const tx = db.transaction('checkpoints', 'readwrite');
      let cursor = await tx.store.index('by-location').openCursor(locationId);
      while (cursor) {
        await cursor.delete();
        cursor = await cursor.continue();
      }
      for (const checkpoint of checkpoints) {
        await tx.store.put({ ...checkpoint, locationId });
      }
      await tx.done;
    });
  }

  async getCheckpoints(locationId: number): Promise<Checkpoint[]> {
    return this.run('getCheckpoints', async (db) => {
      const checkpoints = await db.getAllFromIndex('checkpoints', 'by-location', locationId);
      return checkpoints.sort((a, b) => a.id - b.id);
    });
  }
}
