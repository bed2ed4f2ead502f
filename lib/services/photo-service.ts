// PatrolSync - Photo Service
// Photo capture, upload progress lookup and deletion

import type { PatrolTransport } from '@/lib/api/patrol-api';
import { createSyncError, getErrorMessage, SyncErrorCodes } from '@/lib/errors/sync-errors';
import type { ConnectivityOracle } from '@/lib/offline/connectivity';
import { logStorageError, logValidationError } from '@/lib/offline/diagnostics-service';
import { createPendingRecord, getRemoteId } from '@/lib/offline/offline-entity';
import type { RecordStore } from '@/lib/offline/record-store';
import { validateWith } from '@/lib/validations/common';
import { photoCaptureInputSchema, type PhotoCaptureInput } from '@/lib/validations/patrol';
import type { PhotoRecord, RecordKind, UploadProgress } from '@/types';

/**
 * Platform file storage holding the captured images
 */
export interface PhotoFileStorage {
  remove(fileRef: string): Promise<void>;
}

export interface PhotoServiceOptions {
  store: RecordStore;
  transport: Pick<PatrolTransport, 'deletePhoto'>;
  connectivity: ConnectivityOracle;
  files: PhotoFileStorage;
  onQueued?: (kind: RecordKind) => void;
  now?: () => Date;
}

export class PhotoService {
  private readonly store: RecordStore;
  private readonly transport: Pick<PatrolTransport, 'deletePhoto'>;
  private readonly connectivity: ConnectivityOracle;
  private readonly files: PhotoFileStorage;
  private readonly onQueued: ((kind: RecordKind) => void) | undefined;
  private readonly now: () => Date;

  constructor(options: PhotoServiceOptions) {
    this.store = options.store;
    this.transport = options.transport;
    this.connectivity = options.connectivity;
    this.files = options.files;
    this.onQueued = options.onQueued;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Queues a captured photo for upload
   */
  async capturePhoto(input: PhotoCaptureInput): Promise<PhotoRecord> {
    const validation = validateWith(photoCaptureInputSchema, input);
    if (!validation.isValid) {
      const message = validation.errors.map((error) => `${error.field}: ${error.message}`).join('; ');
      logValidationError(SyncErrorCodes.VALIDATION_ERROR, message, { source: 'photo' });
      throw createSyncError(SyncErrorCodes.VALIDATION_ERROR, message, { errors: validation.errors });
    }

    const now = this.now();
    const base = createPendingRecord(
      'photo',
      {
        userId: input.userId,
        fileRef: input.fileRef,
        timestamp: now.toISOString(),
        latitude: input.latitude,
        longitude: input.longitude,
        upload: { localId: '', progress: 0, status: 'pending' },
      },
      now
    );
    const record: PhotoRecord = {
      ...base,
      payload: { ...base.payload, upload: { localId: base.localId, progress: 0, status: 'pending' } },
    };

    await this.store.save(record);
    this.onQueued?.('photo');
    return record;
  }

  async getUploadProgress(localId: string): Promise<UploadProgress | null> {
    const record = await this.store.get('photo', localId);
    return record ? record.payload.upload : null;
  }

  async getPhotos(userId: string): Promise<PhotoRecord[]> {
    return this.store.query('photo', (record) => record.payload.userId === userId, { direction: 'newest_first' });
  }

  /**
   * Deletes a photo and its file. A never-synced photo goes at once without
   * network; a synced one is deleted on the server first.
   *
   * @returns false when the photo does not exist
   * @throws PatrolSyncError PHOTO_UPLOADING while an upload is running, OFFLINE for a synced photo without network
   */
  async deletePhoto(localId: string): Promise<boolean> {
    const record = await this.store.get('photo', localId);
    if (!record) return false;

    if (record.syncState === 'in_flight') {
      throw createSyncError(SyncErrorCodes.PHOTO_UPLOADING, undefined, { localId });
    }

    const remoteId = getRemoteId(record);
    if (remoteId === null) {
      const deleted = await this.store.deletePending('photo', localId);
      if (!deleted) {
        // An upload claimed it between the read and the delete
        const current = await this.store.get('photo', localId);
        if (current?.syncState === 'in_flight') {
          throw createSyncError(SyncErrorCodes.PHOTO_UPLOADING, undefined, { localId });
        }
        return false;
      }
      await this.removeFile(record.payload.fileRef);
      return true;
    }

    if (!this.connectivity.isConnected()) {
      throw createSyncError(SyncErrorCodes.OFFLINE, undefined, { localId });
    }

    await this.transport.deletePhoto(remoteId);
    await this.store.remove('photo', localId);
    await this.removeFile(record.payload.fileRef);
    return true;
  }

  private async removeFile(fileRef: string): Promise<void> {
    try {
      await this.files.remove(fileRef);
    } catch (error) {
      // The record is already gone; an orphaned file is left for retention cleanup
      logStorageError('PHOTO_FILE_DELETE_FAILED', getErrorMessage(error), { fileRef });
    }
  }
}
