// PatrolSync - Data Retention
// Periodic cleanup of synced records; pending and in-flight data is never dropped

import { subDays } from 'date-fns';

import type { RecordKind } from '@/types';

import type { RecordStore } from './record-store';

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Days a synced record is kept, per kind
 */
export const RETENTION_DAYS: ReadonlyArray<readonly [RecordKind, number]> = [
  ['photo', 30],
  ['report', 90],
  ['time_record', 90],
];

/**
 * Maximum number of location samples kept locally
 */
export const MAX_LOCATION_SAMPLES = 10000;

export interface RetentionResult {
  purged: Record<RecordKind, number>;
  total: number;
}

// ============================================================================
// RETENTION
// ============================================================================

/**
 * Deletes synced records past their retention window, then trims the oldest
 * synced location samples above MAX_LOCATION_SAMPLES
 *
 * @param store - Record store to clean
 * @param now - Reference time for the cutoffs
 * @param maxLocationSamples - Location sample cap
 */
export async function applyRetention(
  store: RecordStore,
  now: Date = new Date(),
  maxLocationSamples: number = MAX_LOCATION_SAMPLES
): Promise<RetentionResult> {
  const purged: Record<RecordKind, number> = {
    time_record: 0,
    checkpoint_verification: 0,
    location_sample: 0,
    report: 0,
    photo: 0,
  };

  for (const [kind, days] of RETENTION_DAYS) {
    purged[kind] = await store.purgeSyncedBefore(kind, subDays(now, days));
  }

  const counts = await store.countByState('location_sample');
  const total = counts.pending + counts.in_flight + counts.synced + counts.failed;
  const excess = total - maxLocationSamples;

  if (excess > 0) {
    const oldest = await store.query('location_sample', (record) => record.syncState === 'synced', {
      direction: 'oldest_first',
      limit: excess,
    });
    for (const record of oldest) {
      if (await store.remove('location_sample', record.localId)) {
        purged.location_sample++;
      }
    }
  }

  const purgedTotal = Object.values(purged).reduce((sum, count) => sum + count, 0);
  if (purgedTotal > 0) {
    console.log(`[Retention] Purged ${purgedTotal} synced records`);
  }
  return { purged, total: purgedTotal };
}
