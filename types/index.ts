// PatrolSync - Domain Types
// Shared record, envelope and catalog types for the offline sync core

// =============================================================================
// Enums and Constants
// =============================================================================

/**
 * Record kinds that travel through the sync core.
 * Listed in scheduler priority order.
 */
export const RECORD_KINDS = [
  'time_record',
  'checkpoint_verification',
  'location_sample',
  'report',
  'photo',
] as const;

export type RecordKind = (typeof RECORD_KINDS)[number];

/**
 * Lifecycle of a syncable record with respect to the remote service.
 * 'failed' is never written by the sync core: transient errors go back to 'pending'.
 */
export type SyncState = 'pending' | 'in_flight' | 'synced' | 'failed';

export type TimeRecordType = 'clock_in' | 'clock_out';

export type UploadStatus = 'pending' | 'uploading' | 'completed' | 'error' | 'cancelled';

// =============================================================================
// Shared Shapes
// =============================================================================

export interface Coordinates {
  latitude: number;
  longitude: number;
}

/**
 * Server identity of a record. Only a confirmed acceptance carries an id.
 */
export type RemoteRef =
  | { status: 'unsynced' }
  | { status: 'synced'; remoteId: string; syncedAt: string };

/**
 * Bookkeeping fields attached to every syncable record
 */
export interface SyncEnvelope {
  localId: string;
  remote: RemoteRef;
  syncState: SyncState;
  createdAt: string;
}

// =============================================================================
// Payloads
// =============================================================================

export interface TimeRecordPayload extends Coordinates {
  userId: string;
  type: TimeRecordType;
  timestamp: string;
}

export interface LocationSamplePayload extends Coordinates {
  userId: string;
  accuracy: number;
  timestamp: string;
}

export interface UploadProgress {
  localId: string;
  /** 0-100 */
  progress: number;
  status: UploadStatus;
  errorMessage?: string;
}

export interface PhotoPayload extends Coordinates {
  userId: string;
  fileRef: string;
  timestamp: string;
  upload: UploadProgress;
}

export interface ReportPayload extends Coordinates {
  userId: string;
  text: string;
  timestamp: string;
}

export interface CheckpointVerificationPayload extends Coordinates {
  checkpointId: number;
  locationId: number;
  userId: string;
  timestamp: string;
}

export interface PayloadByKind {
  time_record: TimeRecordPayload;
  location_sample: LocationSamplePayload;
  photo: PhotoPayload;
  report: ReportPayload;
  checkpoint_verification: CheckpointVerificationPayload;
}

/**
 * A persisted record: sync envelope plus the payload for its kind
 */
export type SyncRecord<K extends RecordKind = RecordKind> = {
  [P in K]: SyncEnvelope & { kind: P; payload: PayloadByKind[P] };
}[K];

export type TimeRecord = SyncRecord<'time_record'>;
export type LocationSample = SyncRecord<'location_sample'>;
export type PhotoRecord = SyncRecord<'photo'>;
export type ReportRecord = SyncRecord<'report'>;
export type CheckpointVerification = SyncRecord<'checkpoint_verification'>;

// =============================================================================
// Catalog (reference data)
// =============================================================================

export interface PatrolLocation extends Coordinates {
  id: number;
  name: string;
}

export interface Checkpoint extends Coordinates {
  id: number;
  locationId: number;
  name: string;
}

// =============================================================================
// Connectivity
// =============================================================================

export type ConnectionQuality = 'none' | 'poor' | 'fair' | 'good' | 'excellent';

export type OperationKind =
  | 'authentication'
  | 'clock_event'
  | 'photo_upload'
  | 'location_sync'
  | 'report_sync'
  | 'checkpoint_sync'
  | 'data_download';

export interface NetworkStatus {
  connected: boolean;
  quality: ConnectionQuality;
  metered: boolean;
  /** 0-100, null when the platform cannot report it */
  batteryLevel: number | null;
}
