// PatrolSync - Offline Entity Helpers
// Builds sync envelopes with time-ordered uuid v7 local ids and reads their remote identity

import { v7 as uuidv7 } from 'uuid';

import type { PayloadByKind, RecordKind, RemoteRef, SyncEnvelope, SyncRecord } from '@/types';

// ============================================================================
// LOCAL IDS
// ============================================================================

/**
 * Generates the immutable local id of a new record. Ids sort in generation
 * order, also within one millisecond, so the store breaks `createdAt` ties
 * by creation order.
 */
export function generateLocalId(): string {
  return uuidv7();
}

// ============================================================================
// RECORD CREATION
// ============================================================================

export const UNSYNCED: RemoteRef = { status: 'unsynced' };

/**
 * Wraps a validated payload in a pending sync envelope
 *
 * @param kind - Record kind
 * @param payload - Kind-specific payload
 * @param now - Creation time
 */
export function createPendingRecord<K extends RecordKind>(
  kind: K,
  payload: PayloadByKind[K],
  now: Date = new Date()
): SyncEnvelope & { kind: K; payload: PayloadByKind[K] } {
  return {
    localId: generateLocalId(),
    remote: UNSYNCED,
    syncState: 'pending',
    createdAt: now.toISOString(),
    kind,
    payload,
  };
}

// ============================================================================
// REMOTE IDENTITY
// ============================================================================

/**
 * Server id of a record, or null while it has not been accepted
 */
export function getRemoteId(record: SyncRecord): string | null {
  return record.remote.status === 'synced' ? record.remote.remoteId : null;
}

/**
 * Remote ref for a confirmed acceptance. An empty server id falls back to
 * the accepted client id.
 */
export function syncedRef(remoteId: string | null | undefined, localId: string, at: Date = new Date()): RemoteRef {
  const id = remoteId && remoteId.trim().length > 0 ? remoteId : localId;
  return { status: 'synced', remoteId: id, syncedAt: at.toISOString() };
}
