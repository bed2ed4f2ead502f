// PatrolSync - Patrol Status
// Derived progress of a patrol; never persisted as a primary record

export interface PatrolStatus {
  locationId: number;
  totalCheckpoints: number;
  verifiedCheckpoints: number;
  startTime: string;
  endTime: string | null;
}

export function createPatrolStatus(locationId: number, totalCheckpoints: number, startTime: Date): PatrolStatus {
  return {
    locationId,
    totalCheckpoints,
    verifiedCheckpoints: 0,
    startTime: startTime.toISOString(),
    endTime: null,
  };
}

/**
 * 100 × verified / total, 0 when the location has no checkpoints
 */
export function getCompletionPercentage(status: PatrolStatus): number {
  if (status.totalCheckpoints === 0) return 0;
  return (status.verifiedCheckpoints / status.totalCheckpoints) * 100;
}

export function isPatrolComplete(status: PatrolStatus): boolean {
  return status.totalCheckpoints > 0 && status.verifiedCheckpoints === status.totalCheckpoints;
}

export function clonePatrolStatus(status: PatrolStatus): PatrolStatus {
  return { ...status };
}
