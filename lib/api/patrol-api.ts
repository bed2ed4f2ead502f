// PatrolSync - Patrol API Client
// HTTP transport to the patrol backend; every response is validated before use

import { z } from 'zod';

import { getErrorMessage, TransportError } from '@/lib/errors/sync-errors';
import { logNetworkError } from '@/lib/offline/diagnostics-service';
import type { BatchOutcome, ItemOutcome } from '@/lib/offline/sync-engine';
import type {
  Checkpoint,
  CheckpointVerification,
  LocationSample,
  PatrolLocation,
  PhotoRecord,
  ReportRecord,
  TimeRecord,
} from '@/types';

// ============================================================================
// CONSTANTS
// ============================================================================

export const API_VERSION_PATH = '/api/v1';

/**
 * Default request timeout (30 seconds)
 */
export const DEFAULT_API_TIMEOUT_MS = 30000;

export const API_ENDPOINTS = {
  timeClock: '/time/clock',
  locationBatch: '/location/batch',
  photoUpload: '/photos/upload',
  photo: (remoteId: string) => `/photos/${encodeURIComponent(remoteId)}`,
  reports: '/reports',
  patrolLocations: '/patrol/locations',
  patrolCheckpoints: (locationId: number) => `/patrol/locations/${locationId}/checkpoints`,
  patrolVerify: '/patrol/verify',
} as const;

// ============================================================================
// RESPONSE SCHEMAS
// ============================================================================

export const itemResponseSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  status: z.enum(['accepted', 'rejected']),
  message: z.string().optional(),
});

export const batchResponseSchema = z.object({
  acceptedIds: z.array(z.string()),
  rejectedIds: z.array(z.string()).default([]),
  remoteIds: z.record(z.string()).optional(),
});

const patrolLocationSchema = z.object({
  id: z.number().int().positive(),
  name: z.string(),
  latitude: z.number(),
  longitude: z.number(),
});

const checkpointSchema = z.object({
  id: z.number().int().positive(),
  locationId: z.number().int().positive(),
  name: z.string().default(''),
  latitude: z.number(),
  longitude: z.number(),
});

const emptyResponseSchema = z.unknown();

// ============================================================================
// TYPES
// ============================================================================

/**
 * Remote side of the sync core, one call per endpoint
 */
export interface PatrolTransport {
  submitLocationBatch(samples: LocationSample[]): Promise<BatchOutcome>;
  submitTimeRecord(record: TimeRecord): Promise<ItemOutcome>;
  uploadPhoto(record: PhotoRecord, onProgress: (progress: number) => void): Promise<ItemOutcome>;
  submitReport(record: ReportRecord): Promise<ItemOutcome>;
  submitCheckpointVerification(record: CheckpointVerification): Promise<ItemOutcome>;
  deletePhoto(remoteId: string): Promise<void>;
  getPatrolLocations(): Promise<PatrolLocation[]>;
  getCheckpoints(locationId: number): Promise<Checkpoint[]>;
}

export type AccessTokenProvider = () => Promise<string | null> | string | null;

/** Reads the bytes of a captured photo */
export type PhotoReader = (fileRef: string) => Promise<Blob>;

export interface PatrolApiClientOptions {
  /** Server origin, e.g. https://patrol.example.com */
  baseUrl: string;
  readPhoto: PhotoReader;
  timeoutMs?: number;
  getAccessToken?: AccessTokenProvider;
  fetch?: typeof fetch;
}

interface RequestOptions {
  json?: unknown;
  form?: FormData;
}

// ============================================================================
// HELPERS
// ============================================================================

function toItemOutcome(response: z.infer<typeof itemResponseSchema>): ItemOutcome {
  if (response.status === 'rejected') {
    return { status: 'rejected', message: response.message ?? 'Rejected by server' };
  }
  return {
    status: 'accepted',
    remoteId: response.id === null || response.id === undefined ? null : String(response.id),
  };
}

function fileNameOf(fileRef: string): string {
  const parts = fileRef.split(/[\\/]/);
  return parts[parts.length - 1] || 'photo.jpg';
}

// ============================================================================
// API CLIENT
// ============================================================================

export class PatrolApiClient implements PatrolTransport {
  private readonly apiBase: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly getAccessToken: AccessTokenProvider | undefined;
  private readonly readPhoto: PhotoReader;

  constructor(options: PatrolApiClientOptions) {
    this.apiBase = `${options.baseUrl.replace(/\/+$/, '')}${API_VERSION_PATH}`;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_API_TIMEOUT_MS;
    // Browsers reject fetch called with a foreign receiver
    this.fetchImpl = options.fetch ?? ((input, init) => globalThis.fetch(input, init));
    this.getAccessToken = options.getAccessToken;
    this.readPhoto = options.readPhoto;
  }

  // ==========================================================================
  // SYNC ENDPOINTS
  // ==========================================================================

  async submitLocationBatch(samples: LocationSample[]): Promise<BatchOutcome> {
    const body = {
      locations: samples.map((sample) => ({
        clientId: sample.localId,
        userId: sample.payload.userId,
        latitude: sample.payload.latitude,
        longitude: sample.payload.longitude,
        accuracy: sample.payload.accuracy,
        timestamp: sample.payload.timestamp,
      })),
    };

    return this.request('POST', API_ENDPOINTS.locationBatch, batchResponseSchema, { json: body });
  }

  async submitTimeRecord(record: TimeRecord): Promise<ItemOutcome> {
    const response = await this.request('POST', API_ENDPOINTS.timeClock, itemResponseSchema, {
      json: { clientId: record.localId, ...record.payload },
    });
    return toItemOutcome(response);
  }

  /**
   * Multipart upload of one photo. fetch exposes no upload progress, so
   * progress moves in two steps: file read, then server response.
   */
  async uploadPhoto(record: PhotoRecord, onProgress: (progress: number) => void): Promise<ItemOutcome> {
    const { fileRef, userId, timestamp, latitude, longitude } = record.payload;
    const file = await this.readPhoto(fileRef);
    onProgress(10);

    const form = new FormData();
    form.append('clientId', record.localId);
    form.append('userId', userId);
    form.append('timestamp', timestamp);
    form.append('latitude', String(latitude));
    form.append('longitude', String(longitude));
    form.append('file', file, fileNameOf(fileRef));

    const response = await this.request('POST', API_ENDPOINTS.photoUpload, itemResponseSchema, { form });
    onProgress(90);
    return toItemOutcome(response);
  }

  async submitReport(record: ReportRecord): Promise<ItemOutcome> {
    const response = await this.request('POST', API_ENDPOINTS.reports, itemResponseSchema, {
      json: { clientId: record.localId, ...record.payload },
    });
    return toItemOutcome(response);
  }

  async submitCheckpointVerification(record: CheckpointVerification): Promise<ItemOutcome> {
    const response = await this.request('POST', API_ENDPOINTS.patrolVerify, itemResponseSchema, {
      json: { clientId: record.localId, ...record.payload },
    });
    return toItemOutcome(response);
  }

  async deletePhoto(remoteId: string): Promise<void> {
    await this.request('DELETE', API_ENDPOINTS.photo(remoteId), emptyResponseSchema);
  }

  // ==========================================================================
  // CATALOG ENDPOINTS
  // ==========================================================================

  async getPatrolLocations(): Promise<PatrolLocation[]> {
    return this.request('GET', API_ENDPOINTS.patrolLocations, z.array(patrolLocationSchema));
  }

  async getCheckpoints(locationId: number): Promise<Checkpoint[]> {
    return this.request('GET', API_ENDPOINTS.patrolCheckpoints(locationId), z.array(checkpointSchema));
  }

  // ==========================================================================
  // TRANSPORT
  // ==========================================================================

  private async request<T>(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: RequestOptions = {}
  ): Promise<T> {
    const url = `${this.apiBase}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json' };

    const token = this.getAccessToken ? await this.getAccessToken() : null;
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    let body: string | FormData | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    const fetchImpl = this.fetchImpl;
    let response: Response;
    try {
      response = await fetchImpl(url, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = `${method} ${path} failed: ${getErrorMessage(error)}`;
      logNetworkError('NETWORK_ERROR', message, { url });
      throw new TransportError(message);
    }

    if (!response.ok) {
      const message = `${method} ${path} returned HTTP ${response.status}`;
      logNetworkError(`HTTP_${response.status}`, message, { url });
      throw new TransportError(message, response.status);
    }

    const text = await response.text();
    let data: unknown = null;
    if (text.length > 0) {
      try {
        data = JSON.parse(text);
      } catch (error) {
        throw new TransportError(`${method} ${path} returned invalid JSON: ${getErrorMessage(error)}`, response.status);
      }
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(
        `${method} ${path} returned an unexpected body: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        response.status
      );
    }
    return parsed.data;
  }
}
