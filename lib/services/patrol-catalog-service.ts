// PatrolSync - Patrol Catalog Service
// Patrol locations and checkpoints: fetched from the server when the network allows, cached for offline use

import type { PatrolTransport } from '@/lib/api/patrol-api';
import { getErrorMessage } from '@/lib/errors/sync-errors';
import type { ConnectivityOracle } from '@/lib/offline/connectivity';
import { logNetworkError } from '@/lib/offline/diagnostics-service';
import type { CatalogStore } from '@/lib/offline/record-store';
import type { Checkpoint, PatrolLocation } from '@/types';

import type { CheckpointSource } from './patrol-service';

export interface PatrolCatalogServiceOptions {
  transport: Pick<PatrolTransport, 'getPatrolLocations' | 'getCheckpoints'>;
  cache: CatalogStore;
  connectivity: ConnectivityOracle;
}

/**
 * Network first, cache second. A failed download is logged and the cached
 * copy is returned, so a patrol can start with no connection.
 */
export class PatrolCatalogService implements CheckpointSource {
  private readonly transport: Pick<PatrolTransport, 'getPatrolLocations' | 'getCheckpoints'>;
  private readonly cache: CatalogStore;
  private readonly connectivity: ConnectivityOracle;

  constructor(options: PatrolCatalogServiceOptions) {
    this.transport = options.transport;
    this.cache = options.cache;
    this.connectivity = options.connectivity;
  }

  async getPatrolLocations(): Promise<PatrolLocation[]> {
    if (this.connectivity.shouldAttempt('data_download')) {
      try {
        const locations = await this.transport.getPatrolLocations();
        await this.cache.savePatrolLocations(locations);
        return locations;
      } catch (error) {
        logNetworkError('CATALOG_DOWNLOAD_FAILED', getErrorMessage(error), { resource: 'patrol_locations' });
      }
    }
    return this.cache.getPatrolLocations();
  }

  async getCheckpoints(locationId: number): Promise<Checkpoint[]> {
    if (this.connectivity.shouldAttempt('data_download')) {
      try {
        const checkpoints = await this.transport.getCheckpoints(locationId);
        await this.cache.saveCheckpoints(locationId, checkpoints);
        return checkpoints;
      } catch (error) {
        logNetworkError('CATALOG_DOWNLOAD_FAILED', getErrorMessage(error), { resource: 'checkpoints', locationId });
      }
    }
    return this.cache.getCheckpoints(locationId);
  }
}
