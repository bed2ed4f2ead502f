// PatrolSync - Public API
// Offline-first sync and checkpoint verification core

export * from '@/types';

export * from './api/patrol-api';
export * from './config';
export * from './errors/sync-errors';

export * from './offline/connectivity';
export * from './offline/diagnostics-service';
export * from './offline/indexed-db';
export * from './offline/offline-entity';
export * from './offline/record-store';
export * from './offline/retention';
export * from './offline/sync-engine';
export * from './offline/sync-events';
export * from './offline/sync-scheduler';
export * from './offline/sync-strategies';

export * from './services/geofence-service';
export * from './services/location-service';
export * from './services/patrol-catalog-service';
export * from './services/patrol-service';
export * from './services/patrol-status';
export * from './services/photo-service';
export * from './services/report-service';
export * from './services/time-tracking-service';

export * from './validations/common';
export * from './validations/patrol';

export * from './patrol-sync';
