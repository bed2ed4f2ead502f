// PatrolSync - Sync Orchestrator Tests
// Batch and item cycles against a fake-indexeddb store and a fake transport

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { RecordStoreError, TransportError } from '@/lib/errors/sync-errors';
import type { RecordKind } from '@/types';

import { DiagnosticsService } from '../diagnostics-service';
import type { IndexedDbRecordStore } from '../indexed-db';
import { SyncOrchestrator, type SyncStrategy } from '../sync-engine';
import { SyncEventBus, type SyncEvent } from '../sync-events';
import { createSyncStrategies } from '../sync-strategies';
import {
  createClock,
  createFakeTransport,
  createTestStore,
  deferred,
  makeLocationSample,
  makePhoto,
  makeReport,
  StaticConnectivity,
} from './test-utils';

describe('SyncOrchestrator', () => {
  let store: IndexedDbRecordStore;
  let connectivity: StaticConnectivity;
  let events: SyncEventBus;
  let diagnostics: DiagnosticsService;
  let transport: ReturnType<typeof createFakeTransport>;
  let received: SyncEvent[];
  let now: () => Date;

  function createOrchestrator<K extends RecordKind>(strategy: SyncStrategy<K>, maxBatchesPerRun?: number) {
    return new SyncOrchestrator({ store, connectivity, strategy, events, diagnostics, maxBatchesPerRun });
  }

  function strategies(options: { locationBatchSize?: number; itemBatchSize?: number } = {}) {
    return createSyncStrategies(transport, store, options);
  }

  beforeEach(() => {
    store = createTestStore();
    connectivity = new StaticConnectivity();
    events = new SyncEventBus();
    diagnostics = new DiagnosticsService();
    transport = createFakeTransport();
    received = [];
    events.subscribe((event) => received.push(event));
    now = createClock();
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await store.close();
  });

  // ==========================================================================
  // BATCH MODE
  // ==========================================================================

  describe('batch mode', () => {
    it('marks accepted records synced and leaves rejected ones pending', async () => {
      const a = makeLocationSample(now());
      const b = makeLocationSample(now());
      const c = makeLocationSample(now());
      for (const record of [a, b, c]) await store.save(record);

      transport.submitLocationBatch.mockResolvedValue({
        acceptedIds: [a.localId, b.localId],
        rejectedIds: [c.localId],
        remoteIds: { [a.localId]: 'srv-a' },
      });

      const result = await createOrchestrator(strategies().location_sample).sync();

      expect(result).toEqual({
        kind: 'location_sample',
        success: false,
        status: 'partial',
        synced: 2,
        failed: 1,
        pending: 1,
        errors: [{ code: 'REJECTED', message: '1 of 3 records were not accepted', localIds: [c.localId] }],
      });
      expect((await store.get('location_sample', a.localId))?.remote).toMatchObject({ remoteId: 'srv-a' });
      expect((await store.get('location_sample', b.localId))?.remote).toMatchObject({ remoteId: b.localId });
      expect((await store.get('location_sample', c.localId))?.syncState).toBe('pending');
    });

    it('ignores accepted ids that were not part of the batch', async () => {
      const a = makeLocationSample(now());
      await store.save(a);
      transport.submitLocationBatch.mockResolvedValue({ acceptedIds: [a.localId, 'stranger'], rejectedIds: [] });

      const result = await createOrchestrator(strategies().location_sample).sync();

      expect(result.synced).toBe(1);
      expect(result.status).toBe('completed');
    });

    it('treats an id both accepted and rejected as not accepted', async () => {
      const a = makeLocationSample(now());
      await store.save(a);
      transport.submitLocationBatch.mockResolvedValue({ acceptedIds: [a.localId], rejectedIds: [a.localId] });

      const result = await createOrchestrator(strategies().location_sample).sync();

      expect(result.status).toBe('failed');
      expect((await store.get('location_sample', a.localId))?.syncState).toBe('pending');
    });

    it('reverts the whole batch to pending on a transport error', async () => {
      const a = makeLocationSample(now());
      const b = makeLocationSample(now());
      await store.save(a);
      await store.save(b);
      transport.submitLocationBatch.mockRejectedValue(new TransportError('POST /location/batch returned HTTP 503', 503));

      const result = await createOrchestrator(strategies().location_sample).sync();

      expect(result.status).toBe('failed');
      expect(result.failed).toBe(2);
      expect(result.pending).toBe(2);
      expect(result.errors).toEqual([
        { code: 'TRANSPORT_ERROR', message: 'POST /location/batch returned HTTP 503', localIds: [a.localId, b.localId] },
      ]);
      expect(await store.countByState('location_sample')).toEqual({ pending: 2, in_flight: 0, synced: 0, failed: 0 });
    });

    it('drains several batches in one run', async () => {
      for (let i = 0; i < 5; i++) await store.save(makeLocationSample(now()));

      const result = await createOrchestrator(strategies({ locationBatchSize: 2 }).location_sample).sync();

      expect(transport.submitLocationBatch).toHaveBeenCalledTimes(3);
      expect(transport.submitLocationBatch.mock.calls.map(([batch]) => batch.length)).toEqual([2, 2, 1]);
      expect(result.synced).toBe(5);
      expect(result.pending).toBe(0);
    });

    it('stops at the batch limit and leaves the rest for the next run', async () => {
      for (let i = 0; i < 5; i++) await store.save(makeLocationSample(now()));

      const result = await createOrchestrator(strategies({ locationBatchSize: 2 }).location_sample, 2).sync();

      expect(transport.submitLocationBatch).toHaveBeenCalledTimes(2);
      expect(result.status).toBe('completed');
      expect(result.synced).toBe(4);
      expect(result.pending).toBe(1);
    });

    it('stops after the first failing batch', async () => {
      for (let i = 0; i < 4; i++) await store.save(makeLocationSample(now()));
      transport.submitLocationBatch.mockRejectedValue(new TransportError('offline'));

      const result = await createOrchestrator(strategies({ locationBatchSize: 2 }).location_sample).sync();

      expect(transport.submitLocationBatch).toHaveBeenCalledTimes(1);
      expect(result.failed).toBe(2);
      expect(result.pending).toBe(4);
    });
  });

  // ==========================================================================
  // ITEM MODE
  // ==========================================================================

  describe('item mode', () => {
    it('submits each record on its own; one failure does not stop the others', async () => {
      const first = makeReport(now(), 'first');
      const second = makeReport(now(), 'second');
      const third = makeReport(now(), 'third');
      for (const record of [first, second, third]) await store.save(record);

      transport.submitReport.mockImplementation(async (record) => {
        if (record.localId === second.localId) return { status: 'rejected', message: 'Duplicate report' };
        return { status: 'accepted', remoteId: `srv-${record.payload.text}` };
      });

      const result = await createOrchestrator(strategies().report).sync();

      expect(result.status).toBe('partial');
      expect(result.synced).toBe(2);
      expect(result.failed).toBe(1);
      expect(result.errors).toEqual([{ code: 'REJECTED', message: 'Duplicate report', localIds: [second.localId] }]);
      expect((await store.get('report', first.localId))?.remote).toMatchObject({ remoteId: 'srv-first' });
      expect((await store.get('report', second.localId))?.syncState).toBe('pending');
      expect((await store.get('report', third.localId))?.remote).toMatchObject({ remoteId: 'srv-third' });
    });

    it('reverts a record to pending when its call throws', async () => {
      const first = makeReport(now());
      const second = makeReport(now());
      await store.save(first);
      await store.save(second);

      transport.submitReport.mockRejectedValueOnce(new TransportError('POST /reports failed: timeout'));

      const result = await createOrchestrator(strategies().report).sync();

      expect(result.synced).toBe(1);
      expect(result.errors[0]).toEqual({
        code: 'TRANSPORT_ERROR',
        message: 'POST /reports failed: timeout',
        localIds: [first.localId],
      });
      expect((await store.get('report', first.localId))?.syncState).toBe('pending');
    });

    it('uses the local id when the server returns no id', async () => {
      const report = makeReport(now());
      await store.save(report);

      await createOrchestrator(strategies().report).sync();

      expect((await store.get('report', report.localId))?.remote).toMatchObject({
        status: 'synced',
        remoteId: report.localId,
      });
    });

    it('reports photo progress and records 100 before marking the photo synced', async () => {
      const photo = makePhoto(now());
      await store.save(photo);
      const progressSpy = vi.spyOn(store, 'updatePhotoUpload');
      const stateSpy = vi.spyOn(store, 'updateSyncState');

      transport.uploadPhoto.mockImplementation(async (_record, onProgress) => {
        onProgress(10);
        onProgress(150);
        return { status: 'accepted', remoteId: 'ph-1' };
      });

      const result = await createOrchestrator(strategies().photo).sync();

      const progress = received.flatMap((event) =>
        event.type === 'upload_progress' ? [[event.progress.progress, event.progress.status]] : []
      );
      expect(progress).toEqual([
        [0, 'uploading'],
        [10, 'uploading'],
        [99, 'uploading'],
        [100, 'completed'],
      ]);

      const completedCall = progressSpy.mock.calls.findIndex(([, upload]) => upload.status === 'completed');
      const syncedCall = stateSpy.mock.calls.findIndex(([, state]) => state === 'synced');
      expect(progressSpy.mock.invocationCallOrder[completedCall]).toBeLessThan(
        stateSpy.mock.invocationCallOrder[syncedCall]
      );

      const stored = await store.get('photo', photo.localId);
      expect(stored?.payload.upload).toEqual({ localId: photo.localId, progress: 100, status: 'completed' });
      expect(stored?.remote).toMatchObject({ remoteId: 'ph-1' });
      expect(result.status).toBe('completed');
    });

    it('records an upload error on the photo when the server rejects it', async () => {
      const photo = makePhoto(now());
      await store.save(photo);
      transport.uploadPhoto.mockResolvedValue({ status: 'rejected', message: 'File too large' });

      await createOrchestrator(strategies().photo).sync();

      const stored = await store.get('photo', photo.localId);
      expect(stored?.syncState).toBe('pending');
      expect(stored?.payload.upload).toEqual({
        localId: photo.localId,
        progress: 0,
        status: 'error',
        errorMessage: 'File too large',
      });
    });
  });

  // ==========================================================================
  // RUN CONTROL
  // ==========================================================================

  describe('run control', () => {
    it('defers without touching records when connectivity says no', async () => {
      const sample = makeLocationSample(now());
      await store.save(sample);
      connectivity.blocked.add('location_sync');

      const result = await createOrchestrator(strategies().location_sample).sync();

      expect(result.status).toBe('deferred');
      expect(result.success).toBe(false);
      expect(transport.submitLocationBatch).not.toHaveBeenCalled();
      expect((await store.get('location_sample', sample.localId))?.syncState).toBe('pending');
    });

    it('succeeds with nothing to do', async () => {
      const result = await createOrchestrator(strategies().report).sync();

      expect(result).toMatchObject({ status: 'completed', success: true, synced: 0, failed: 0, pending: 0 });
      expect(transport.submitReport).not.toHaveBeenCalled();
    });

    it('returns already_running for an overlapping call', async () => {
      await store.save(makeReport(now()));
      const gate = deferred<{ status: 'accepted' }>();
      transport.submitReport.mockReturnValue(gate.promise);

      const orchestrator = createOrchestrator(strategies().report);
      const first = orchestrator.sync();
      await vi.waitFor(() => expect(transport.submitReport).toHaveBeenCalledTimes(1));

      expect(orchestrator.isSyncing()).toBe(true);
      const overlapping = await orchestrator.sync();
      expect(overlapping.status).toBe('already_running');
      expect(overlapping.success).toBe(false);

      gate.resolve({ status: 'accepted' });
      expect((await first).status).toBe('completed');
      expect(await orchestrator.whenIdle()).toBeNull();
      expect(transport.submitReport).toHaveBeenCalledTimes(1);
    });

    it('recovers records left in flight by an interrupted run', async () => {
      const report = makeReport(now());
      await store.save(report);
      await store.updateSyncState(report.localId, 'in_flight');

      const result = await createOrchestrator(strategies().report).sync();

      expect(result.synced).toBe(1);
      expect((await store.get('report', report.localId))?.syncState).toBe('synced');
    });

    it('stops before the first batch when already aborted', async () => {
      await store.save(makeLocationSample(now()));
      const controller = new AbortController();
      controller.abort();

      const result = await createOrchestrator(strategies().location_sample).sync({ signal: controller.signal });

      expect(result.status).toBe('aborted');
      expect(result.pending).toBe(1);
      expect(transport.submitLocationBatch).not.toHaveBeenCalled();
    });

    it('stops between items once aborted and keeps the rest pending', async () => {
      for (let i = 0; i < 3; i++) await store.save(makeReport(now()));
      const controller = new AbortController();
      transport.submitReport.mockImplementation(async () => {
        controller.abort();
        return { status: 'accepted' };
      });

      const result = await createOrchestrator(strategies().report).sync({ signal: controller.signal });

      expect(result.status).toBe('aborted');
      expect(result.synced).toBe(1);
      expect(result.pending).toBe(2);
    });

    it('ends the run as fatal on a store failure', async () => {
      await store.save(makeReport(now()));
      vi.spyOn(store, 'getPending').mockRejectedValue(new RecordStoreError('getPending', new Error('disk full')));

      const result = await createOrchestrator(strategies().report).sync();

      expect(result.status).toBe('fatal');
      expect(result.success).toBe(false);
      expect(result.errors).toEqual([
        { code: 'STORAGE_ERROR', message: 'Record store getPending failed: disk full', localIds: [] },
      ]);
    });

    it('emits start and completion events and records the run', async () => {
      await store.save(makeReport(now()));

      const result = await createOrchestrator(strategies().report).sync();

      expect(received.filter((event) => event.type !== 'upload_progress')).toEqual([
        { type: 'sync_started', kind: 'report', pending: 1 },
        { type: 'sync_completed', kind: 'report', status: 'completed', synced: 1, failed: 0 },
      ]);
      expect(diagnostics.getLastSync('report')?.result).toEqual(result);
    });
  });
});
