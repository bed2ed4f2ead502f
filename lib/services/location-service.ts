// PatrolSync - Location Service
// Producer side of location tracking: persists samples and forwards them to listeners

import { createSyncError, SyncErrorCodes } from '@/lib/errors/sync-errors';
import { logValidationError } from '@/lib/offline/diagnostics-service';
import { createPendingRecord } from '@/lib/offline/offline-entity';
import type { RecordStore } from '@/lib/offline/record-store';
import { validateWith } from '@/lib/validations/common';
import { locationSampleInputSchema, type LocationSampleInput } from '@/lib/validations/patrol';
import type { LocationSample } from '@/types';

export type LocationSampleListener = (sample: LocationSample) => void;

export interface LocationServiceOptions {
  store: RecordStore;
  now?: () => Date;
}

/**
 * Samples reach the location orchestrator only through the store, on the
 * scheduled cycle. Listeners (such as the patrol geofence) get the saved
 * sample for live proximity.
 */
export class LocationService {
  private listeners = new Set<LocationSampleListener>();

  private readonly store: RecordStore;
  private readonly now: () => Date;

  constructor(options: LocationServiceOptions) {
    this.store = options.store;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws PatrolSyncError VALIDATION_ERROR on out-of-range coordinates or negative accuracy
   */
  async recordSample(input: LocationSampleInput): Promise<LocationSample> {
    const validation = validateWith(locationSampleInputSchema, input);
    if (!validation.isValid) {
      const message = validation.errors.map((error) => `${error.field}: ${error.message}`).join('; ');
      logValidationError(SyncErrorCodes.VALIDATION_ERROR, message, { source: 'location' });
      throw createSyncError(SyncErrorCodes.VALIDATION_ERROR, message, { errors: validation.errors });
    }

    const now = this.now();
    const record = createPendingRecord(
      'location_sample',
      {
        userId: input.userId,
        latitude: input.latitude,
        longitude: input.longitude,
        accuracy: input.accuracy,
        timestamp: input.timestamp ?? now.toISOString(),
      },
      now
    );

    await this.store.save(record);

    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (error) {
        console.error('[LocationService] Sample listener failed:', error);
      }
    }

    return record;
  }

  onSample(listener: LocationSampleListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async getPendingCount(): Promise<number> {
    return (await this.store.countByState('location_sample')).pending;
  }
}
