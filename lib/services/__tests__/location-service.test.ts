// PatrolSync - Location Service Tests

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SyncErrorCodes } from '@/lib/errors/sync-errors';
import type { IndexedDbRecordStore } from '@/lib/offline/indexed-db';
import { createClock, createTestStore, TEST_USER } from '@/lib/offline/__tests__/test-utils';

import { LocationService } from '../location-service';

const SAMPLE = { userId: TEST_USER, latitude: 40.7128, longitude: -74.006, accuracy: 8 };

describe('LocationService', () => {
  let store: IndexedDbRecordStore;
  let service: LocationService;

  beforeEach(() => {
    store = createTestStore();
    service = new LocationService({ store, now: createClock() });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await store.close();
  });

  it('persists a pending sample stamped with the current time', async () => {
    const record = await service.recordSample(SAMPLE);

    expect(record.payload).toEqual({ ...SAMPLE, timestamp: '2026-03-02T08:00:00.000Z' });
    expect(await service.getPendingCount()).toBe(1);
  });

  it('keeps the device timestamp when one is given', async () => {
    const record = await service.recordSample({ ...SAMPLE, timestamp: '2026-03-02T07:59:30.000Z' });

    expect(record.payload.timestamp).toBe('2026-03-02T07:59:30.000Z');
    expect(record.createdAt).toBe('2026-03-02T08:00:00.000Z');
  });

  it('rejects a negative accuracy', async () => {
    await expect(service.recordSample({ ...SAMPLE, accuracy: -1 })).rejects.toMatchObject({
      code: SyncErrorCodes.VALIDATION_ERROR,
      message: 'accuracy: Accuracy cannot be negative',
    });
    expect(await service.getPendingCount()).toBe(0);
  });

  it('hands saved samples to listeners until they unsubscribe', async () => {
    const listener = vi.fn();
    const unsubscribe = service.onSample(listener);

    const first = await service.recordSample(SAMPLE);
    unsubscribe();
    await service.recordSample(SAMPLE);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(first);
  });

  it('keeps the sample when a listener throws', async () => {
    service.onSample(() => {
      throw new Error('listener broke');
    });

    await expect(service.recordSample(SAMPLE)).resolves.toBeDefined();
    expect(await service.getPendingCount()).toBe(1);
  });
});
