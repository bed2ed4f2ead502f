// PatrolSync - Configuration Tests

import { describe, expect, it } from 'vitest';

import { PatrolSyncError, SyncErrorCodes } from '@/lib/errors/sync-errors';

import { loadConfig } from '../index';

describe('loadConfig', () => {
  it('applies defaults around the required API URL', () => {
    expect(loadConfig({ PATROL_API_URL: 'https://patrol.test' })).toEqual({
      apiUrl: 'https://patrol.test',
      apiTimeoutMs: 30000,
      syncIntervalMs: 900000,
      locationBatchSize: 50,
      itemBatchSize: 20,
      checkpointRadiusMeters: 15.24,
      reportMaxLength: 500,
      dbName: 'patrol-sync',
      allowMeteredPhotoUpload: false,
    });
  });

  it('coerces numeric and boolean variables', () => {
    const config = loadConfig({
      PATROL_API_URL: 'https://patrol.test',
      PATROL_API_TIMEOUT_MS: '5000',
      PATROL_LOCATION_BATCH_SIZE: '25',
      PATROL_CHECKPOINT_RADIUS_METERS: '20.5',
      PATROL_ALLOW_METERED_PHOTO_UPLOAD: 'true',
      PATROL_DB_NAME: 'site-42',
    });

    expect(config).toMatchObject({
      apiTimeoutMs: 5000,
      locationBatchSize: 25,
      checkpointRadiusMeters: 20.5,
      allowMeteredPhotoUpload: true,
      dbName: 'site-42',
    });
  });

  it('throws CONFIG_ERROR naming every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ PATROL_API_URL: 'not a url', PATROL_ITEM_BATCH_SIZE: '0' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PatrolSyncError);
    expect(caught).toMatchObject({
      code: SyncErrorCodes.CONFIG_ERROR,
      details: { fields: ['PATROL_API_URL', 'PATROL_ITEM_BATCH_SIZE'] },
    });
  });

  it('requires the API URL', () => {
    expect(() => loadConfig({})).toThrow(/PATROL_API_URL/);
  });
});
