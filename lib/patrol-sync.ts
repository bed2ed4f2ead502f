// PatrolSync - Client Assembly
// Wires store, transport, oracle, orchestrators, scheduler and capture services from one config

import { PatrolApiClient, type AccessTokenProvider, type PhotoReader } from '@/lib/api/patrol-api';
import type { PatrolSyncConfig } from '@/lib/config';
import { NetworkConnectivityOracle, type NetworkStatusProvider } from '@/lib/offline/connectivity';
import { getDiagnosticsService, type DiagnosticsService } from '@/lib/offline/diagnostics-service';
import { IndexedDbRecordStore } from '@/lib/offline/indexed-db';
import { applyRetention, type RetentionResult } from '@/lib/offline/retention';
import { SyncEventBus } from '@/lib/offline/sync-events';
import { SyncScheduler } from '@/lib/offline/sync-scheduler';
import { createSyncOrchestrators, type SyncOrchestratorMap } from '@/lib/offline/sync-strategies';
import { GeofenceEngine } from '@/lib/services/geofence-service';
import { LocationService } from '@/lib/services/location-service';
import { PatrolCatalogService } from '@/lib/services/patrol-catalog-service';
import { PatrolService } from '@/lib/services/patrol-service';
import { PhotoService, type PhotoFileStorage } from '@/lib/services/photo-service';
import { ReportService } from '@/lib/services/report-service';
import { TimeTrackingService } from '@/lib/services/time-tracking-service';

export interface PatrolSyncPlatform {
  network: NetworkStatusProvider;
  readPhoto: PhotoReader;
  files: PhotoFileStorage;
  getUserId: () => string;
  getAccessToken?: AccessTokenProvider;
  fetch?: typeof fetch;
}

export interface PatrolSyncClient {
  store: IndexedDbRecordStore;
  api: PatrolApiClient;
  connectivity: NetworkConnectivityOracle;
  events: SyncEventBus;
  diagnostics: DiagnosticsService;
  orchestrators: SyncOrchestratorMap;
  scheduler: SyncScheduler;
  geofence: GeofenceEngine;
  catalog: PatrolCatalogService;
  patrol: PatrolService;
  timeTracking: TimeTrackingService;
  reports: ReportService;
  photos: PhotoService;
  locations: LocationService;
  start(): void;
  stop(): Promise<void>;
  applyRetention(now?: Date): Promise<RetentionResult>;
}

/**
 * Builds a ready-to-start client. Nothing touches the network or the
 * database until a service or the scheduler is used.
 */
export function createPatrolSync(config: PatrolSyncConfig, platform: PatrolSyncPlatform): PatrolSyncClient {
  const store = new IndexedDbRecordStore({ dbName: config.dbName });
  const api = new PatrolApiClient({
    baseUrl: config.apiUrl,
    timeoutMs: config.apiTimeoutMs,
    readPhoto: platform.readPhoto,
    getAccessToken: platform.getAccessToken,
    fetch: platform.fetch,
  });
  const connectivity = new NetworkConnectivityOracle(platform.network, {
    allowMeteredPhotoUpload: config.allowMeteredPhotoUpload,
  });
  const events = new SyncEventBus();
  const diagnostics = getDiagnosticsService();

  const orchestrators = createSyncOrchestrators({
    store,
    connectivity,
    transport: api,
    events,
    diagnostics,
    locationBatchSize: config.locationBatchSize,
    itemBatchSize: config.itemBatchSize,
  });
  const scheduler = new SyncScheduler({ orchestrators, intervalMs: config.syncIntervalMs, connectivity });
  const requestSync = scheduler.requestSync.bind(scheduler);

  const geofence = new GeofenceEngine({ radiusMeters: config.checkpointRadiusMeters, events });
  const catalog = new PatrolCatalogService({ transport: api, cache: store, connectivity });
  const patrol = new PatrolService({
    store,
    checkpoints: catalog,
    geofence,
    getUserId: platform.getUserId,
    events,
    onVerificationQueued: (record) => requestSync(record.kind),
  });
  const locations = new LocationService({ store });
  let unsubscribeLocations: (() => void) | null = null;

  return {
    store,
    api,
    connectivity,
    events,
    diagnostics,
    orchestrators,
    scheduler,
    geofence,
    catalog,
    patrol,
    timeTracking: new TimeTrackingService({ store, onQueued: requestSync }),
    reports: new ReportService({ store, maxLength: config.reportMaxLength, onQueued: requestSync }),
    photos: new PhotoService({ store, transport: api, connectivity, files: platform.files, onQueued: requestSync }),
    locations,
    start() {
      if (!unsubscribeLocations) {
        unsubscribeLocations = locations.onSample((sample) => {
          patrol.handleLocation(sample.payload);
        });
      }
      scheduler.start();
    },
    async stop() {
      scheduler.stop();
      unsubscribeLocations?.();
      unsubscribeLocations = null;
      await Promise.all(Object.values(orchestrators).map((orchestrator) => orchestrator.whenIdle()));
      await store.close();
    },
    applyRetention: (now) => applyRetention(store, now),
  };
}
