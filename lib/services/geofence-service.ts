// PatrolSync - Geofence Service
// Checkpoint proximity from the location stream using Turf.js great-circle distance

import * as turf from '@turf/turf';

import type { ProximityTransition, SyncEventBus } from '@/lib/offline/sync-events';
import type { Checkpoint, Coordinates } from '@/types';

// ============================================================================
// CONSTANTS
// ============================================================================

export const METERS_PER_FOOT = 0.3048;

/**
 * Checkpoint geofence radius: 50 feet
 */
export const CHECKPOINT_PROXIMITY_METERS = 50 * METERS_PER_FOOT;

// ============================================================================
// DISTANCE
// ============================================================================

/**
 * Haversine distance between two coordinates
 *
 * @returns Distance in meters
 */
export function distanceInMeters(from: Coordinates, to: Coordinates): number {
  return turf.distance(
    turf.point([from.longitude, from.latitude]),
    turf.point([to.longitude, to.latitude]),
    { units: 'meters' }
  );
}

export function metersToFeet(meters: number): number {
  return meters / METERS_PER_FOOT;
}

// ============================================================================
// GEOFENCE ENGINE
// ============================================================================

export type ProximityListener = (transition: ProximityTransition) => void;

export interface GeofenceEngineOptions {
  radiusMeters?: number;
  events?: SyncEventBus;
}

/**
 * Pure function of (checkpoint set, current location): holds membership only
 * to detect changes, never any sync state.
 */
export class GeofenceEngine {
  private checkpoints: Checkpoint[] = [];
  private inRange = new Map<number, boolean>();
  private distances = new Map<number, number>();
  private lastLocation: Coordinates | null = null;
  private listeners = new Set<ProximityListener>();

  private readonly radiusMeters: number;
  private readonly events: SyncEventBus | undefined;

  constructor(options: GeofenceEngineOptions = {}) {
    this.radiusMeters = options.radiusMeters ?? CHECKPOINT_PROXIMITY_METERS;
    this.events = options.events;
  }

  get radius(): number {
    return this.radiusMeters;
  }

  /**
   * Starts monitoring a checkpoint set. Every checkpoint starts out of range,
   * then the last known position, if any, is evaluated against the new set.
   *
   * @returns Transitions caused by the last known position
   */
  setCheckpoints(checkpoints: readonly Checkpoint[]): ProximityTransition[] {
    this.checkpoints = [...checkpoints];
    this.inRange = new Map(checkpoints.map((checkpoint) => [checkpoint.id, false]));
    this.distances.clear();

    return this.lastLocation ? this.update(this.lastLocation) : [];
  }

  /**
   * Drops the checkpoint set. The last known position is kept.
   */
  clear(): void {
    this.checkpoints = [];
    this.inRange.clear();
    this.distances.clear();
  }

  /**
   * Recomputes proximity for a new location sample
   *
   * @param location - Current position
   * @returns Transitions for checkpoints whose membership changed
   */
  update(location: Coordinates): ProximityTransition[] {
    this.lastLocation = { latitude: location.latitude, longitude: location.longitude };
    const transitions: ProximityTransition[] = [];

    for (const checkpoint of this.checkpoints) {
      const distanceMeters = distanceInMeters(location, checkpoint);
      const nowInRange = distanceMeters <= this.radiusMeters;
      this.distances.set(checkpoint.id, distanceMeters);

      if (this.inRange.get(checkpoint.id) !== nowInRange) {
        this.inRange.set(checkpoint.id, nowInRange);
        transitions.push({ checkpointId: checkpoint.id, distanceMeters, inRange: nowInRange });
      }
    }

    for (const transition of transitions) {
      this.notify(transition);
    }
    return transitions;
  }

  isInRange(checkpointId: number): boolean {
    return this.inRange.get(checkpointId) ?? false;
  }

  getInRangeCheckpointIds(): number[] {
    return this.checkpoints.filter((checkpoint) => this.isInRange(checkpoint.id)).map((checkpoint) => checkpoint.id);
  }

  getDistance(checkpointId: number): number | null {
    return this.distances.get(checkpointId) ?? null;
  }

  getLastLocation(): Coordinates | null {
    return this.lastLocation ? { ...this.lastLocation } : null;
  }

  subscribe(listener: ProximityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(transition: ProximityTransition): void {
    this.events?.emit({ type: 'proximity_changed', ...transition });
    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (error) {
        console.error('[GeofenceEngine] Proximity listener failed:', error);
      }
    }
  }
}
