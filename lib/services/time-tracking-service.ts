// PatrolSync - Time Tracking Service
// Clock-in/clock-out capture; events must alternate per user

import { createSyncError, SyncErrorCodes } from '@/lib/errors/sync-errors';
import { logValidationError } from '@/lib/offline/diagnostics-service';
import { createPendingRecord } from '@/lib/offline/offline-entity';
import type { RecordStore } from '@/lib/offline/record-store';
import { clockEventInputSchema } from '@/lib/validations/patrol';
import { validateWith } from '@/lib/validations/common';
import type { Coordinates, RecordKind, TimeRecord, TimeRecordType } from '@/types';

export interface ClockStatus {
  isClockedIn: boolean;
  lastClockIn: string | null;
  lastClockOut: string | null;
}

export interface TimeTrackingServiceOptions {
  store: RecordStore;
  /** Called after a record was queued */
  onQueued?: (kind: RecordKind) => void;
  now?: () => Date;
}

export class TimeTrackingService {
  /** Serializes check-then-save so two calls cannot both pass the alternation check */
  private queue: Promise<unknown> = Promise.resolve();

  private readonly store: RecordStore;
  private readonly onQueued: ((kind: RecordKind) => void) | undefined;
  private readonly now: () => Date;

  constructor(options: TimeTrackingServiceOptions) {
    this.store = options.store;
    this.onQueued = options.onQueued;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws PatrolSyncError ALREADY_CLOCKED_IN when the last event of the user is a clock-in
   */
  clockIn(userId: string, position: Coordinates): Promise<TimeRecord> {
    return this.serialize(() => this.record(userId, 'clock_in', position));
  }

  /**
   * @throws PatrolSyncError NOT_CLOCKED_IN when the user is not clocked in
   */
  clockOut(userId: string, position: Coordinates): Promise<TimeRecord> {
    return this.serialize(() => this.record(userId, 'clock_out', position));
  }

  async getClockStatus(userId: string): Promise<ClockStatus> {
    const history = await this.getHistory(userId);
    const lastClockIn = history.find((record) => record.payload.type === 'clock_in');
    const lastClockOut = history.find((record) => record.payload.type === 'clock_out');

    return {
      isClockedIn: history[0]?.payload.type === 'clock_in',
      lastClockIn: lastClockIn?.payload.timestamp ?? null,
      lastClockOut: lastClockOut?.payload.timestamp ?? null,
    };
  }

  /**
   * Time records of a user, most recent first
   */
  async getHistory(userId: string, limit?: number): Promise<TimeRecord[]> {
    return this.store.query('time_record', (record) => record.payload.userId === userId, {
      direction: 'newest_first',
      limit,
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async record(userId: string, type: TimeRecordType, position: Coordinates): Promise<TimeRecord> {
    const validation = validateWith(clockEventInputSchema, { userId, ...position });
    if (!validation.isValid) {
      const message = validation.errors.map((error) => `${error.field}: ${error.message}`).join('; ');
      logValidationError(SyncErrorCodes.VALIDATION_ERROR, message, { type });
      throw createSyncError(SyncErrorCodes.VALIDATION_ERROR, message, { errors: validation.errors });
    }

    const [latest] = await this.getHistory(userId, 1);
    const clockedIn = latest?.payload.type === 'clock_in';

    if (type === 'clock_in' && clockedIn) {
      throw createSyncError(SyncErrorCodes.ALREADY_CLOCKED_IN, undefined, { userId });
    }
    if (type === 'clock_out' && !clockedIn) {
      throw createSyncError(SyncErrorCodes.NOT_CLOCKED_IN, undefined, { userId });
    }

    const now = this.now();
    const record = createPendingRecord(
      'time_record',
      {
        userId,
        type,
        timestamp: now.toISOString(),
        latitude: position.latitude,
        longitude: position.longitude,
      },
      now
    );

    await this.store.save(record);
    console.log(`[TimeTracking] ${type} queued for ${userId}`);
    this.onQueued?.('time_record');
    return record;
  }
}
