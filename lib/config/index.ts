// PatrolSync - Configuration
// Runtime settings read from PATROL_* environment variables

import { z } from 'zod';

import { DEFAULT_API_TIMEOUT_MS } from '@/lib/api/patrol-api';
import { createSyncError, SyncErrorCodes } from '@/lib/errors/sync-errors';
import { DB_NAME } from '@/lib/offline/indexed-db';
import { LOCATION_BATCH_SIZE, MAX_BATCH_SIZE } from '@/lib/offline/sync-engine';
import { SYNC_INTERVAL_MS } from '@/lib/offline/sync-scheduler';
import { CHECKPOINT_PROXIMITY_METERS } from '@/lib/services/geofence-service';
import { REPORT_MAX_LENGTH } from '@/lib/validations/patrol';

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const configSchema = z.object({
  PATROL_API_URL: z.string().url(),
  PATROL_API_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_API_TIMEOUT_MS),
  PATROL_SYNC_INTERVAL_MS: z.coerce.number().int().positive().default(SYNC_INTERVAL_MS),
  PATROL_LOCATION_BATCH_SIZE: z.coerce.number().int().positive().default(LOCATION_BATCH_SIZE),
  PATROL_ITEM_BATCH_SIZE: z.coerce.number().int().positive().default(MAX_BATCH_SIZE),
  PATROL_CHECKPOINT_RADIUS_METERS: z.coerce.number().positive().default(CHECKPOINT_PROXIMITY_METERS),
  PATROL_REPORT_MAX_LENGTH: z.coerce.number().int().positive().default(REPORT_MAX_LENGTH),
  PATROL_DB_NAME: z.string().trim().min(1).default(DB_NAME),
  PATROL_ALLOW_METERED_PHOTO_UPLOAD: booleanFromEnv.default('false'),
});

export interface PatrolSyncConfig {
  apiUrl: string;
  apiTimeoutMs: number;
  syncIntervalMs: number;
  locationBatchSize: number;
  itemBatchSize: number;
  checkpointRadiusMeters: number;
  reportMaxLength: number;
  dbName: string;
  allowMeteredPhotoUpload: boolean;
}

/**
 * Parses and validates the configuration
 *
 * @param env - Variables to read, process.env by default
 * @throws PatrolSyncError CONFIG_ERROR listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PatrolSyncConfig {
  const parsed = configSchema.safeParse(env);

  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw createSyncError(SyncErrorCodes.CONFIG_ERROR, `Invalid configuration: ${message}`, {
      fields: parsed.error.issues.map((issue) => issue.path.join('.')),
    });
  }

  const data = parsed.data;
  return {
    apiUrl: data.PATROL_API_URL,
    apiTimeoutMs: data.PATROL_API_TIMEOUT_MS,
    syncIntervalMs: data.PATROL_SYNC_INTERVAL_MS,
    locationBatchSize: data.PATROL_LOCATION_BATCH_SIZE,
    itemBatchSize: data.PATROL_ITEM_BATCH_SIZE,
    checkpointRadiusMeters: data.PATROL_CHECKPOINT_RADIUS_METERS,
    reportMaxLength: data.PATROL_REPORT_MAX_LENGTH,
    dbName: data.PATROL_DB_NAME,
    allowMeteredPhotoUpload: data.PATROL_ALLOW_METERED_PHOTO_UPLOAD,
  };
}
