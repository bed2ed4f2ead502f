// PatrolSync - Data Retention Tests

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { IndexedDbRecordStore } from '../indexed-db';
import { applyRetention } from '../retention';
import { createClock, createTestStore, makeLocationSample, makePhoto, makeReport, makeTimeRecord } from './test-utils';

const NOW = new Date('2026-06-30T12:00:00.000Z');

describe('applyRetention', () => {
  let store: IndexedDbRecordStore;

  beforeEach(() => {
    store = createTestStore();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await store.close();
  });

  it('purges synced photos after 30 days and reports or time records after 90', async () => {
    const oldPhoto = makePhoto(new Date('2026-05-30T11:00:00.000Z'));
    const recentPhoto = makePhoto(new Date('2026-06-15T00:00:00.000Z'));
    const oldReport = makeReport(new Date('2026-03-01T00:00:00.000Z'));
    const keptReport = makeReport(new Date('2026-05-01T00:00:00.000Z'));
    const oldClock = makeTimeRecord(new Date('2026-03-01T00:00:00.000Z'));
    for (const record of [oldPhoto, recentPhoto, oldReport, keptReport, oldClock]) {
      await store.save(record);
      await store.updateSyncState(record.localId, 'synced', `srv-${record.localId}`);
    }

    const result = await applyRetention(store, NOW);

    expect(result.purged).toEqual({
      time_record: 1,
      checkpoint_verification: 0,
      location_sample: 0,
      report: 1,
      photo: 1,
    });
    expect(result.total).toBe(3);
    expect(await store.get('photo', recentPhoto.localId)).toBeDefined();
    expect(await store.get('report', keptReport.localId)).toBeDefined();
  });

  it('never purges records that have not reached the server', async () => {
    const pendingPhoto = makePhoto(new Date('2026-01-01T00:00:00.000Z'));
    await store.save(pendingPhoto);

    const result = await applyRetention(store, NOW);

    expect(result.total).toBe(0);
    expect(await store.get('photo', pendingPhoto.localId)).toBeDefined();
  });

  it('trims the oldest synced location samples above the cap', async () => {
    const now = createClock();
    const samples = [makeLocationSample(now()), makeLocationSample(now()), makeLocationSample(now())];
    const pending = makeLocationSample(now());
    for (const sample of samples) {
      await store.save(sample);
      await store.updateSyncState(sample.localId, 'synced', sample.localId);
    }
    await store.save(pending);

    const result = await applyRetention(store, NOW, 2);

    expect(result.purged.location_sample).toBe(2);
    expect(await store.get('location_sample', samples[0].localId)).toBeUndefined();
    expect(await store.get('location_sample', samples[1].localId)).toBeUndefined();
    expect(await store.get('location_sample', samples[2].localId)).toBeDefined();
    expect(await store.get('location_sample', pending.localId)).toBeDefined();
  });
});
