// PatrolSync - Patrol Service
// Patrol state machine: NoActivePatrol → PatrolActive → PatrolComplete, gated by geofence proximity

import { startOfDay } from 'date-fns';

import { createSyncError, SyncErrorCodes } from '@/lib/errors/sync-errors';
import { createPendingRecord } from '@/lib/offline/offline-entity';
import type { RecordStore } from '@/lib/offline/record-store';
import type { PatrolPhase, ProximityTransition, SyncEventBus } from '@/lib/offline/sync-events';
import { positiveIdSchema } from '@/lib/validations/common';
import type { Checkpoint, CheckpointVerification, Coordinates } from '@/types';

import type { GeofenceEngine } from './geofence-service';
import { clonePatrolStatus, createPatrolStatus, isPatrolComplete, type PatrolStatus } from './patrol-status';

// ============================================================================
// TYPES
// ============================================================================

export interface CheckpointSource {
  getCheckpoints(locationId: number): Promise<Checkpoint[]>;
}

export type VerifyRejection = 'invalid_checkpoint_id' | 'no_active_patrol' | 'unknown_checkpoint' | 'out_of_range';

export type VerifyCheckpointResult =
  | {
      verified: true;
      alreadyVerified: boolean;
      status: PatrolStatus;
      /** The queued verification, null when the checkpoint was already verified */
      record: CheckpointVerification | null;
    }
  | { verified: false; reason: VerifyRejection; message: string };

export interface CheckpointState {
  checkpoint: Checkpoint;
  verified: boolean;
  inRange: boolean;
  distanceMeters: number | null;
}

export interface PatrolServiceOptions {
  store: RecordStore;
  checkpoints: CheckpointSource;
  geofence: GeofenceEngine;
  getUserId: () => string;
  events?: SyncEventBus;
  /** Called after a verification was queued, typically to nudge its orchestrator */
  onVerificationQueued?: (record: CheckpointVerification) => void;
  now?: () => Date;
}

const REJECTION_MESSAGES: Record<VerifyRejection, string> = {
  invalid_checkpoint_id: 'Checkpoint id must be a positive integer.',
  no_active_patrol: 'No active patrol.',
  unknown_checkpoint: 'Checkpoint is not part of the active patrol.',
  out_of_range: 'You must be within 50 feet of the checkpoint to verify.',
};

function reject(reason: VerifyRejection): VerifyCheckpointResult {
  return { verified: false, reason, message: REJECTION_MESSAGES[reason] };
}

// ============================================================================
// PATROL SERVICE CLASS
// ============================================================================

export class PatrolService {
  private phase: PatrolPhase = 'no_active_patrol';
  private status: PatrolStatus | null = null;
  private checkpoints = new Map<number, Checkpoint>();
  private verified = new Set<number>();
  private isStarting = false;

  private readonly store: RecordStore;
  private readonly source: CheckpointSource;
  private readonly geofence: GeofenceEngine;
  private readonly getUserId: () => string;
  private readonly events: SyncEventBus | undefined;
  private readonly onVerificationQueued: ((record: CheckpointVerification) => void) | undefined;
  private readonly now: () => Date;

  constructor(options: PatrolServiceOptions) {
    this.store = options.store;
    this.source = options.checkpoints;
    this.geofence = options.geofence;
    this.getUserId = options.getUserId;
    this.events = options.events;
    this.onVerificationQueued = options.onVerificationQueued;
    this.now = options.now ?? (() => new Date());
  }

  getPhase(): PatrolPhase {
    return this.phase;
  }

  /**
   * Status of the current patrol, complete or not; null when none is running
   */
  getStatus(): PatrolStatus | null {
    return this.status ? clonePatrolStatus(this.status) : null;
  }

  isCheckpointVerified(checkpointId: number): boolean {
    return this.verified.has(checkpointId);
  }

  getCheckpointStates(): CheckpointState[] {
    return [...this.checkpoints.values()].map((checkpoint) => ({
      checkpoint,
      verified: this.verified.has(checkpoint.id),
      inRange: this.geofence.isInRange(checkpoint.id),
      distanceMeters: this.geofence.getDistance(checkpoint.id),
    }));
  }

  // ==========================================================================
  // TRANSITIONS
  // ==========================================================================

  /**
   * NoActivePatrol → PatrolActive
   *
   * @throws PatrolSyncError when a patrol is running, the id is invalid or the location has no checkpoints
   */
  async startPatrol(locationId: number): Promise<PatrolStatus> {
    if (!positiveIdSchema.safeParse(locationId).success) {
      throw createSyncError(SyncErrorCodes.INVALID_LOCATION_ID, undefined, { locationId });
    }
    if (this.phase !== 'no_active_patrol' || this.isStarting) {
      throw createSyncError(SyncErrorCodes.PATROL_ALREADY_ACTIVE);
    }

    this.isStarting = true;
    try {
      const checkpoints = await this.source.getCheckpoints(locationId);
      if (checkpoints.length === 0) {
        throw createSyncError(SyncErrorCodes.NO_CHECKPOINTS, undefined, { locationId });
      }

      this.checkpoints = new Map(checkpoints.map((checkpoint) => [checkpoint.id, checkpoint]));
      this.verified = new Set();
      this.status = createPatrolStatus(locationId, this.checkpoints.size, this.now());
      this.geofence.setCheckpoints(checkpoints);
      this.phase = 'patrol_active';

      console.log(`[PatrolService] Patrol started at location ${locationId} with ${checkpoints.length} checkpoints`);
      this.emitChanged();
      return clonePatrolStatus(this.status);
    } finally {
      this.isStarting = false;
    }
  }

  /**
   * Verifies a checkpoint of the current patrol. Checks run in order: id, active
   * patrol, membership, then proximity; a rejection has no side effect.
   * Re-verifying a checkpoint succeeds without a new record, also once the
   * patrol is complete.
   */
  async verifyCheckpoint(checkpointId: number): Promise<VerifyCheckpointResult> {
    if (!positiveIdSchema.safeParse(checkpointId).success) {
      return reject('invalid_checkpoint_id');
    }

    const status = this.status;
    if (this.phase === 'no_active_patrol' || !status) {
      return reject('no_active_patrol');
    }

    const checkpoint = this.checkpoints.get(checkpointId);
    if (!checkpoint) {
      return reject('unknown_checkpoint');
    }

    if (this.verified.has(checkpointId)) {
      return { verified: true, alreadyVerified: true, status: clonePatrolStatus(status), record: null };
    }

    if (!this.geofence.isInRange(checkpointId)) {
      return reject('out_of_range');
    }

    // Claimed before the write so a concurrent call sees it as already verified
    this.verified.add(checkpointId);

    const position: Coordinates = this.geofence.getLastLocation() ?? checkpoint;
    const record = createPendingRecord(
      'checkpoint_verification',
      {
        checkpointId,
        locationId: status.locationId,
        userId: this.getUserId(),
        timestamp: this.now().toISOString(),
        latitude: position.latitude,
        longitude: position.longitude,
      },
      this.now()
    );

    try {
      await this.store.save(record);
    } catch (error) {
      this.verified.delete(checkpointId);
      throw error;
    }

    status.verifiedCheckpoints = this.verified.size;
    if (isPatrolComplete(status)) {
      this.phase = 'patrol_complete';
      console.log(`[PatrolService] All ${status.totalCheckpoints} checkpoints verified`);
    }

    this.emitChanged();
    this.onVerificationQueued?.(record);

    return { verified: true, alreadyVerified: false, status: clonePatrolStatus(status), record };
  }

  /**
   * PatrolActive | PatrolComplete → NoActivePatrol
   *
   * @returns Final status, or null when no patrol was running
   */
  endPatrol(): PatrolStatus | null {
    if (this.phase === 'no_active_patrol' || !this.status) {
      return null;
    }

    const finalStatus: PatrolStatus = { ...this.status, endTime: this.now().toISOString() };

    this.geofence.clear();
    this.checkpoints = new Map();
    this.verified = new Set();
    this.status = null;
    this.phase = 'no_active_patrol';

    console.log(`[PatrolService] Patrol ended: ${finalStatus.verifiedCheckpoints}/${finalStatus.totalCheckpoints}`);
    this.emitChanged();
    return finalStatus;
  }

  /**
   * Feeds a location sample to the geofence. Outside a patrol the geofence
   * holds no checkpoints, so the sample only becomes the position a new
   * patrol starts from.
   */
  handleLocation(location: Coordinates): ProximityTransition[] {
    return this.geofence.update(location);
  }

  /**
   * Status for a location: the running patrol when it matches, otherwise
   * today's verifications for that location read from the store
   */
  async getPatrolStatus(locationId: number): Promise<PatrolStatus> {
    if (this.status && this.status.locationId === locationId) {
      return clonePatrolStatus(this.status);
    }

    const checkpoints = await this.source.getCheckpoints(locationId);
    const since = startOfDay(this.now());
    const todays = await this.store.query(
      'checkpoint_verification',
      (record) => record.payload.locationId === locationId && record.createdAt >= since.toISOString()
    );

    const known = new Set(checkpoints.map((checkpoint) => checkpoint.id));
    const verifiedIds = new Set(todays.map((record) => record.payload.checkpointId).filter((id) => known.has(id)));

    return {
      ...createPatrolStatus(locationId, checkpoints.length, since),
      verifiedCheckpoints: verifiedIds.size,
    };
  }

  private emitChanged(): void {
    this.events?.emit({
      type: 'patrol_changed',
      phase: this.phase,
      locationId: this.status?.locationId ?? null,
      verifiedCheckpoints: this.status?.verifiedCheckpoints ?? 0,
      totalCheckpoints: this.status?.totalCheckpoints ?? 0,
    });
  }
}
