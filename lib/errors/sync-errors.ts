// PatrolSync - Error Handling
// Standardized error codes, messages and error classes for the sync core

// =============================================================================
// Error Code Enum (for runtime use)
// =============================================================================

/**
 * Error codes raised by capture services, the record store and the transport.
 *
 * @example
 * ```typescript
 * import { SyncErrorCodes, createSyncError } from '@/lib/errors/sync-errors';
 *
 * if (text.trim().length === 0) {
 *   throw createSyncError(SyncErrorCodes.REPORT_EMPTY);
 * }
 * ```
 */
export enum SyncErrorCodes {
  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  REPORT_EMPTY = 'REPORT_EMPTY',
  REPORT_TOO_LONG = 'REPORT_TOO_LONG',
  ALREADY_CLOCKED_IN = 'ALREADY_CLOCKED_IN',
  NOT_CLOCKED_IN = 'NOT_CLOCKED_IN',

  // Patrol errors
  NO_CHECKPOINTS = 'NO_CHECKPOINTS',
  PATROL_ALREADY_ACTIVE = 'PATROL_ALREADY_ACTIVE',
  INVALID_LOCATION_ID = 'INVALID_LOCATION_ID',

  // Photo errors
  PHOTO_UPLOADING = 'PHOTO_UPLOADING',

  // Transport errors
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  OFFLINE = 'OFFLINE',

  // Local errors
  STORAGE_ERROR = 'STORAGE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

// =============================================================================
// Error Messages (Default messages for each error code)
// =============================================================================

export const SYNC_ERROR_MESSAGES: Record<SyncErrorCodes, string> = {
  [SyncErrorCodes.VALIDATION_ERROR]: 'Validation error',
  [SyncErrorCodes.REPORT_EMPTY]: 'Report text cannot be empty.',
  [SyncErrorCodes.REPORT_TOO_LONG]: 'Report text exceeds maximum length.',
  [SyncErrorCodes.ALREADY_CLOCKED_IN]: 'Already clocked in.',
  [SyncErrorCodes.NOT_CLOCKED_IN]: 'Not clocked in.',
  [SyncErrorCodes.NO_CHECKPOINTS]: 'No checkpoints found for this location.',
  [SyncErrorCodes.PATROL_ALREADY_ACTIVE]: 'End the current patrol before starting another.',
  [SyncErrorCodes.INVALID_LOCATION_ID]: 'Location id must be a positive integer.',
  [SyncErrorCodes.PHOTO_UPLOADING]: 'Photo is being uploaded and cannot be deleted right now.',
  [SyncErrorCodes.TRANSPORT_ERROR]: 'The server could not be reached.',
  [SyncErrorCodes.OFFLINE]: 'This action requires a network connection.',
  [SyncErrorCodes.STORAGE_ERROR]: 'Local storage is unavailable.',
  [SyncErrorCodes.CONFIG_ERROR]: 'Invalid configuration.',
};

// =============================================================================
// Error Classes
// =============================================================================

export class PatrolSyncError extends Error {
  readonly code: SyncErrorCodes;
  readonly details: Record<string, unknown>;

  constructor(code: SyncErrorCodes, message?: string, details: Record<string, unknown> = {}) {
    super(message || SYNC_ERROR_MESSAGES[code]);
    this.name = 'PatrolSyncError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Network failure, timeout, non-2xx response or unreadable response body.
 * The affected records go back to pending.
 */
export class TransportError extends PatrolSyncError {
  /** HTTP status, null when no response was received */
  readonly status: number | null;

  constructor(message: string, status: number | null = null, details: Record<string, unknown> = {}) {
    super(SyncErrorCodes.TRANSPORT_ERROR, message, { ...details, status });
    this.name = 'TransportError';
    this.status = status;
  }
}

/**
 * Fatal local error: the store could not be opened, read or written.
 */
export class RecordStoreError extends PatrolSyncError {
  constructor(operation: string, cause: unknown) {
    super(
      SyncErrorCodes.STORAGE_ERROR,
      `Record store ${operation} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      { operation }
    );
    this.name = 'RecordStoreError';
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Create a PatrolSyncError with the default message for its code
 *
 * @param code - Error code from SyncErrorCodes
 * @param message - Optional custom message
 * @param details - Additional error details
 */
export function createSyncError(
  code: SyncErrorCodes,
  message?: string,
  details: Record<string, unknown> = {}
): PatrolSyncError {
  return new PatrolSyncError(code, message, details);
}

export function isPatrolSyncError(error: unknown): error is PatrolSyncError {
  return error instanceof PatrolSyncError;
}

/**
 * Extract a printable message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
