// PatrolSync - Connectivity Oracle
// Network reachability plus the per-operation "should attempt now" policy

import type { ConnectionQuality, NetworkStatus, OperationKind } from '@/types';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Consulted by every orchestrator before any network call. A negative answer
 * is a deferral, not an error.
 */
export interface ConnectivityOracle {
  isConnected(): boolean;
  shouldAttempt(operation: OperationKind): boolean;
}

export type NetworkStatusListener = (status: NetworkStatus, previous: NetworkStatus) => void;

/**
 * Platform side of the oracle: reports the current network status and
 * pushes changes
 */
export interface NetworkStatusProvider {
  getStatus(): NetworkStatus;
  subscribe(listener: NetworkStatusListener): () => void;
}

export interface ConnectivityPolicy {
  /** Battery percentage under which background-heavy operations wait */
  minBatteryLevel: number;
  /** Allow photo uploads over metered connections */
  allowMeteredPhotoUpload: boolean;
}

// ============================================================================
// CONSTANTS
// ============================================================================

/**
 * Ordering of connection qualities, weakest first
 */
export const QUALITY_RANK: Record<ConnectionQuality, number> = {
  none: 0,
  poor: 1,
  fair: 2,
  good: 3,
  excellent: 4,
};

/**
 * Weakest connection each operation is attempted on
 */
export const MIN_QUALITY_BY_OPERATION: Record<OperationKind, ConnectionQuality> = {
  authentication: 'poor',
  clock_event: 'fair',
  photo_upload: 'good',
  location_sync: 'poor',
  report_sync: 'fair',
  checkpoint_sync: 'poor',
  data_download: 'good',
};

/**
 * Operations that wait when the battery is low
 */
export const BATTERY_SENSITIVE_OPERATIONS: readonly OperationKind[] = ['photo_upload', 'location_sync'];

/**
 * Minimum battery level for battery-sensitive operations (15%)
 */
export const MIN_BATTERY_LEVEL = 15;

export const DEFAULT_CONNECTIVITY_POLICY: ConnectivityPolicy = {
  minBatteryLevel: MIN_BATTERY_LEVEL,
  allowMeteredPhotoUpload: false,
};

export const OFFLINE_STATUS: NetworkStatus = {
  connected: false,
  quality: 'none',
  metered: false,
  batteryLevel: null,
};

// ============================================================================
// POLICY
// ============================================================================

/**
 * Pure policy decision for one operation on a given network status
 *
 * @param operation - Operation about to touch the network
 * @param status - Current network status
 * @param policy - Battery and metered-connection rules
 * @returns true when the operation should be attempted now
 */
export function shouldAttemptOperation(
  operation: OperationKind,
  status: NetworkStatus,
  policy: ConnectivityPolicy = DEFAULT_CONNECTIVITY_POLICY
): boolean {
  // Authentication can fall back to cached credentials
  if (!status.connected) {
    return operation === 'authentication';
  }

  if (QUALITY_RANK[status.quality] < QUALITY_RANK[MIN_QUALITY_BY_OPERATION[operation]]) {
    return false;
  }

  if (
    BATTERY_SENSITIVE_OPERATIONS.includes(operation) &&
    status.batteryLevel !== null &&
    status.batteryLevel < policy.minBatteryLevel
  ) {
    return false;
  }

  if (operation === 'photo_upload' && status.metered && !policy.allowMeteredPhotoUpload) {
    return false;
  }

  return true;
}

// ============================================================================
// NETWORK STATUS PROVIDER
// ============================================================================

/**
 * Status provider the platform layer pushes network and battery changes into
 */
export class ManualNetworkStatusProvider implements NetworkStatusProvider {
  private status: NetworkStatus;
  private listeners = new Set<NetworkStatusListener>();

  constructor(initial: NetworkStatus = OFFLINE_STATUS) {
    this.status = { ...initial };
  }

  getStatus(): NetworkStatus {
    return { ...this.status };
  }

  setStatus(next: Partial<NetworkStatus>): void {
    const previous = this.status;
    this.status = { ...previous, ...next };

    if (!this.status.connected) {
      this.status.quality = 'none';
    }

    for (const listener of this.listeners) {
      try {
        listener(this.getStatus(), { ...previous });
      } catch (error) {
        console.error('[Connectivity] Status listener failed:', error);
      }
    }
  }

  subscribe(listener: NetworkStatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}

// ============================================================================
// ORACLE
// ============================================================================

export class NetworkConnectivityOracle implements ConnectivityOracle {
  private readonly policy: ConnectivityPolicy;

  constructor(
    private readonly provider: NetworkStatusProvider,
    policy: Partial<ConnectivityPolicy> = {}
  ) {
    this.policy = { ...DEFAULT_CONNECTIVITY_POLICY, ...policy };
  }

  isConnected(): boolean {
    return this.provider.getStatus().connected;
  }

  shouldAttempt(operation: OperationKind): boolean {
    return shouldAttemptOperation(operation, this.provider.getStatus(), this.policy);
  }

  /**
   * Calls the listener each time the network goes from disconnected to connected
   *
   * @returns Unsubscribe function
   */
  onConnectivityRestored(listener: () => void): () => void {
    return this.provider.subscribe((status, previous) => {
      if (status.connected && !previous.connected) {
        console.log('[Connectivity] Connection restored');
        listener();
      }
    });
  }
}
