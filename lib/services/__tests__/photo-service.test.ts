// PatrolSync - Photo Service Tests

import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import { SyncErrorCodes, TransportError } from '@/lib/errors/sync-errors';
import type { IndexedDbRecordStore } from '@/lib/offline/indexed-db';
import {
  createClock,
  createFakeTransport,
  createTestStore,
  StaticConnectivity,
  TEST_USER,
} from '@/lib/offline/__tests__/test-utils';

import { PhotoService, type PhotoFileStorage } from '../photo-service';

const CAPTURE = { userId: TEST_USER, fileRef: 'photos/door.jpg', latitude: 40.7128, longitude: -74.006 };

describe('PhotoService', () => {
  let store: IndexedDbRecordStore;
  let transport: ReturnType<typeof createFakeTransport>;
  let connectivity: StaticConnectivity;
  let removeFile: Mock<PhotoFileStorage['remove']>;
  let onQueued: ReturnType<typeof vi.fn>;
  let service: PhotoService;

  beforeEach(() => {
    store = createTestStore();
    transport = createFakeTransport();
    connectivity = new StaticConnectivity();
    removeFile = vi.fn<PhotoFileStorage['remove']>(async () => undefined);
    onQueued = vi.fn();
    service = new PhotoService({
      store,
      transport,
      connectivity,
      files: { remove: removeFile },
      onQueued,
      now: createClock(),
    });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await store.close();
  });

  describe('capturePhoto', () => {
    it('queues the photo with a pending upload', async () => {
      const record = await service.capturePhoto(CAPTURE);

      expect(record.payload).toEqual({
        ...CAPTURE,
        timestamp: '2026-03-02T08:00:00.000Z',
        upload: { localId: record.localId, progress: 0, status: 'pending' },
      });
      expect(await service.getUploadProgress(record.localId)).toEqual({
        localId: record.localId,
        progress: 0,
        status: 'pending',
      });
      expect(onQueued).toHaveBeenCalledWith('photo');
    });

    it('requires a file reference', async () => {
      await expect(service.capturePhoto({ ...CAPTURE, fileRef: ' ' })).rejects.toMatchObject({
        code: SyncErrorCodes.VALIDATION_ERROR,
        message: 'fileRef: File reference is required',
      });
    });

    it('returns null progress for an unknown photo', async () => {
      expect(await service.getUploadProgress('missing')).toBeNull();
    });
  });

  describe('deletePhoto', () => {
    it('deletes a never-synced photo locally, even offline', async () => {
      const record = await service.capturePhoto(CAPTURE);
      connectivity.online = false;

      expect(await service.deletePhoto(record.localId)).toBe(true);

      expect(await store.get('photo', record.localId)).toBeUndefined();
      expect(removeFile).toHaveBeenCalledWith('photos/door.jpg');
      expect(transport.deletePhoto).not.toHaveBeenCalled();
    });

    it('refuses while the photo is uploading', async () => {
      const record = await service.capturePhoto(CAPTURE);
      await store.updateSyncState(record.localId, 'in_flight');

      await expect(service.deletePhoto(record.localId)).rejects.toMatchObject({
        code: SyncErrorCodes.PHOTO_UPLOADING,
      });
      expect(removeFile).not.toHaveBeenCalled();
      expect(await store.get('photo', record.localId)).toBeDefined();
    });

    it('needs the network for a synced photo', async () => {
      const record = await service.capturePhoto(CAPTURE);
      await store.updateSyncState(record.localId, 'synced', 'ph-1');
      connectivity.online = false;

      await expect(service.deletePhoto(record.localId)).rejects.toMatchObject({ code: SyncErrorCodes.OFFLINE });
      expect(await store.get('photo', record.localId)).toBeDefined();
    });

    it('deletes a synced photo on the server, then locally', async () => {
      const record = await service.capturePhoto(CAPTURE);
      await store.updateSyncState(record.localId, 'synced', 'ph-1');

      expect(await service.deletePhoto(record.localId)).toBe(true);

      expect(transport.deletePhoto).toHaveBeenCalledWith('ph-1');
      expect(await store.get('photo', record.localId)).toBeUndefined();
      expect(removeFile).toHaveBeenCalledWith('photos/door.jpg');
    });

    it('keeps a synced photo when the server delete fails', async () => {
      const record = await service.capturePhoto(CAPTURE);
      await store.updateSyncState(record.localId, 'synced', 'ph-1');
      transport.deletePhoto.mockRejectedValue(new TransportError('DELETE /photos/ph-1 returned HTTP 500', 500));

      await expect(service.deletePhoto(record.localId)).rejects.toBeInstanceOf(TransportError);
      expect(await store.get('photo', record.localId)).toBeDefined();
      expect(removeFile).not.toHaveBeenCalled();
    });

    it('still reports success when only the file removal fails', async () => {
      const record = await service.capturePhoto(CAPTURE);
      removeFile.mockRejectedValue(new Error('file locked'));

      expect(await service.deletePhoto(record.localId)).toBe(true);
      expect(await store.get('photo', record.localId)).toBeUndefined();
    });

    it('returns false for an unknown photo', async () => {
      expect(await service.deletePhoto('missing')).toBe(false);
    });
  });
});
