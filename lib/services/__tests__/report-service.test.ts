// PatrolSync - Report Service Tests

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { SyncErrorCodes } from '@/lib/errors/sync-errors';
import type { IndexedDbRecordStore } from '@/lib/offline/indexed-db';
import { createClock, createTestStore, TEST_USER } from '@/lib/offline/__tests__/test-utils';

import { ReportService } from '../report-service';

const POST = { latitude: 40.7128, longitude: -74.006 };

describe('ReportService', () => {
  let store: IndexedDbRecordStore;
  let onQueued: ReturnType<typeof vi.fn>;
  let service: ReportService;

  beforeEach(() => {
    store = createTestStore();
    onQueued = vi.fn();
    service = new ReportService({ store, onQueued, now: createClock() });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await store.close();
  });

  it('stores the trimmed text as a pending report', async () => {
    const record = await service.createReport(TEST_USER, '  Broken window on level 2  ', POST);

    expect(record.payload).toEqual({
      userId: TEST_USER,
      text: 'Broken window on level 2',
      timestamp: '2026-03-02T08:00:00.000Z',
      latitude: 40.7128,
      longitude: -74.006,
    });
    expect(await store.get('report', record.localId)).toEqual(record);
    expect(onQueued).toHaveBeenCalledWith('report');
  });

  it('rejects empty and whitespace-only text', async () => {
    await expect(service.createReport(TEST_USER, '', POST)).rejects.toMatchObject({
      code: SyncErrorCodes.REPORT_EMPTY,
      message: 'Report text cannot be empty.',
    });
    await expect(service.createReport(TEST_USER, '   \n\t ', POST)).rejects.toMatchObject({
      code: SyncErrorCodes.REPORT_EMPTY,
    });
    expect((await store.countByState('report')).pending).toBe(0);
  });

  it('accepts 500 characters and rejects 501', async () => {
    await expect(service.createReport(TEST_USER, 'a'.repeat(500), POST)).resolves.toMatchObject({
      payload: { text: 'a'.repeat(500) },
    });
    await expect(service.createReport(TEST_USER, 'a'.repeat(501), POST)).rejects.toMatchObject({
      code: SyncErrorCodes.REPORT_TOO_LONG,
      message: 'Report text exceeds maximum length.',
    });
  });

  it('measures the length after trimming', async () => {
    await expect(service.createReport(TEST_USER, `  ${'a'.repeat(500)}  `, POST)).resolves.toBeDefined();
  });

  it('honours a configured maximum', async () => {
    const short = new ReportService({ store, maxLength: 10 });

    await expect(short.createReport(TEST_USER, 'a'.repeat(11), POST)).rejects.toMatchObject({
      code: SyncErrorCodes.REPORT_TOO_LONG,
    });
  });

  it('rejects a missing user id', async () => {
    await expect(service.createReport('  ', 'Gate open', POST)).rejects.toMatchObject({
      code: SyncErrorCodes.VALIDATION_ERROR,
      message: 'User id is required',
    });
  });

  it('lists reports of a user, newest first', async () => {
    await service.createReport(TEST_USER, 'first', POST);
    await service.createReport('guard-2', 'other', POST);
    await service.createReport(TEST_USER, 'second', POST);

    const reports = await service.getReports(TEST_USER);
    expect(reports.map((report) => report.payload.text)).toEqual(['second', 'first']);
  });
});
