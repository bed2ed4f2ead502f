// PatrolSync - Sync Events
// Observer interface between the sync core and whatever renders its state

import type { RecordKind, UploadProgress } from '@/types';

// ============================================================================
// TYPES
// ============================================================================

export type SyncRunStatus =
  | 'completed'
  | 'partial'
  | 'failed'
  | 'deferred'
  | 'already_running'
  | 'aborted'
  | 'fatal';

export interface ProximityTransition {
  checkpointId: number;
  distanceMeters: number;
  inRange: boolean;
}

export type PatrolPhase = 'no_active_patrol' | 'patrol_active' | 'patrol_complete';

export type SyncEvent =
  | { type: 'sync_started'; kind: RecordKind; pending: number }
  | {
      type: 'sync_completed';
      kind: RecordKind;
      status: SyncRunStatus;
      synced: number;
      failed: number;
    }
  | { type: 'upload_progress'; kind: RecordKind; progress: UploadProgress }
  | ({ type: 'proximity_changed' } & ProximityTransition)
  | {
      type: 'patrol_changed';
      phase: PatrolPhase;
      locationId: number | null;
      verifiedCheckpoints: number;
      totalCheckpoints: number;
    };

export type SyncEventType = SyncEvent['type'];

export type SyncEventListener = (event: SyncEvent) => void;

// ============================================================================
// EVENT BUS
// ============================================================================

/**
 * Fan-out of core notifications. A throwing listener is logged and skipped
 * so that it never breaks a sync cycle.
 */
export class SyncEventBus {
  private listeners = new Set<SyncEventListener>();

  /**
   * Subscribe to every event
   *
   * @returns Unsubscribe function
   */
  subscribe(listener: SyncEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Subscribe to a single event type
   */
  on<T extends SyncEventType>(
    type: T,
    listener: (event: Extract<SyncEvent, { type: T }>) => void
  ): () => void {
    return this.subscribe((event) => {
      if (isEventOfType(event, type)) {
        listener(event);
      }
    });
  }

  emit(event: SyncEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error(`[SyncEventBus] Listener failed on ${event.type}:`, error);
      }
    }
  }
}

function isEventOfType<T extends SyncEventType>(
  event: SyncEvent,
  type: T
): event is Extract<SyncEvent, { type: T }> {
  return event.type === type;
}
