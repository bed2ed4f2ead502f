// PatrolSync - Report Service
// Activity report capture with bounded free text

import { createSyncError, SyncErrorCodes } from '@/lib/errors/sync-errors';
import { logValidationError } from '@/lib/offline/diagnostics-service';
import { createPendingRecord } from '@/lib/offline/offline-entity';
import type { RecordStore } from '@/lib/offline/record-store';
import { coordinatesSchema, userIdSchema, validateWith } from '@/lib/validations/common';
import { REPORT_MAX_LENGTH, reportTextSchema } from '@/lib/validations/patrol';
import type { Coordinates, RecordKind, ReportRecord } from '@/types';

export interface ReportServiceOptions {
  store: RecordStore;
  maxLength?: number;
  onQueued?: (kind: RecordKind) => void;
  now?: () => Date;
}

export class ReportService {
  private readonly store: RecordStore;
  private readonly maxLength: number;
  private readonly onQueued: ((kind: RecordKind) => void) | undefined;
  private readonly now: () => Date;

  constructor(options: ReportServiceOptions) {
    this.store = options.store;
    this.maxLength = options.maxLength ?? REPORT_MAX_LENGTH;
    this.onQueued = options.onQueued;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Queues a report. Succeeds offline; text is stored trimmed.
   *
   * @throws PatrolSyncError REPORT_EMPTY, REPORT_TOO_LONG or VALIDATION_ERROR
   */
  async createReport(userId: string, text: string, position: Coordinates): Promise<ReportRecord> {
    const parsedText = reportTextSchema(this.maxLength).safeParse(text);
    if (!parsedText.success) {
      const tooLong = parsedText.error.issues.some((issue) => issue.code === 'too_big');
      const code = tooLong ? SyncErrorCodes.REPORT_TOO_LONG : SyncErrorCodes.REPORT_EMPTY;
      logValidationError(code, parsedText.error.issues[0]?.message ?? code, { length: text.length });
      throw createSyncError(code);
    }

    const validation = validateWith(coordinatesSchema.extend({ userId: userIdSchema }), { userId, ...position });
    if (!validation.isValid) {
      throw createSyncError(SyncErrorCodes.VALIDATION_ERROR, validation.errors[0]?.message, {
        errors: validation.errors,
      });
    }

    const now = this.now();
    const record = createPendingRecord(
      'report',
      {
        userId,
        text: parsedText.data,
        timestamp: now.toISOString(),
        latitude: position.latitude,
        longitude: position.longitude,
      },
      now
    );

    await this.store.save(record);
    this.onQueued?.('report');
    return record;
  }

  /**
   * Reports of a user, most recent first
   */
  async getReports(userId: string, limit?: number): Promise<ReportRecord[]> {
    return this.store.query('report', (record) => record.payload.userId === userId, {
      direction: 'newest_first',
      limit,
    });
  }
}
