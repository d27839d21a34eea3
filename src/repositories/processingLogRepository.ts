import type { SqliteDatabase } from '../infrastructure/database';
import { PersistenceFailedError } from '../services/invoices/errors';
import {
  PROCESSING_ERROR_TYPES,
  PROCESSING_STATUSES,
  type ProcessingErrorType,
  type ProcessingLogEntry,
  type ProcessingStatus,
  type StoredProcessingLogEntry,
  type SystemProcessingStats,
  type UserProcessingStats,
} from '../services/invoices/types';

type ProcessingLogRow = {
  id: number;
  submission_id: string;
  url: string;
  origin: string;
  user_id: number;
  chat_id: string;
  status: string;
  error_type: string | null;
  error_message: string | null;
  cufe: string | null;
  execution_time_ms: number;
  scraped_fields_count: number;
  pending_id: number | null;
  request_timestamp: string;
  response_timestamp: string;
};

type StatsRow = {
  total: number;
  successful: number;
  duplicates: number;
  failed: number;
  unique_users: number;
  avg_ms: number | null;
  max_ms: number | null;
};

const STATS_COLUMNS = `
  COUNT(*) AS total,
  COUNT(CASE WHEN status = 'SUCCESS' THEN 1 END) AS successful,
  COUNT(CASE WHEN status = 'DUPLICATE' THEN 1 END) AS duplicates,
  COUNT(CASE WHEN status NOT IN ('SUCCESS', 'DUPLICATE') THEN 1 END) AS failed,
  COUNT(DISTINCT user_id) AS unique_users,
  AVG(execution_time_ms) AS avg_ms,
  MAX(execution_time_ms) AS max_ms`;

function isStatus(value: string): value is ProcessingStatus {
  return PROCESSING_STATUSES.some((s) => s === value);
}

function isErrorType(value: string): value is ProcessingErrorType {
  return PROCESSING_ERROR_TYPES.some((t) => t === value);
}

function rowToEntry(row: ProcessingLogRow): StoredProcessingLogEntry {
  if (!isStatus(row.status)) {
    throw new PersistenceFailedError(`Processing log ${row.id} has an unknown status: ${row.status}`);
  }
  const errorType = row.error_type;
  if (errorType !== null && !isErrorType(errorType)) {
    throw new PersistenceFailedError(`Processing log ${row.id} has an unknown error type: ${errorType}`);
  }

  return {
    id: row.id,
    submissionId: row.submission_id,
    url: row.url,
    origin: row.origin,
    userId: row.user_id,
    chatId: row.chat_id,
    status: row.status,
    errorType,
    errorMessage: row.error_message,
    cufe: row.cufe,
    executionTimeMs: row.execution_time_ms,
    scrapedFieldsCount: row.scraped_fields_count,
    pendingId: row.pending_id,
    requestTimestamp: new Date(row.request_timestamp),
    responseTimestamp: new Date(row.response_timestamp),
  };
}

function toUserStats(row: StatsRow | undefined): UserProcessingStats {
  return {
    totalRequests: row?.total ?? 0,
    successfulRequests: row?.successful ?? 0,
    duplicateRequests: row?.duplicates ?? 0,
    failedRequests: row?.failed ?? 0,
    avgExecutionTimeMs: row?.avg_ms ?? null,
  };
}

export type ProcessingLogRepository = ReturnType<typeof createProcessingLogRepository>;

export function createProcessingLogRepository(db: SqliteDatabase) {
  const insertStmt = db.prepare<[Omit<ProcessingLogRow, 'id'>]>(`
    INSERT INTO processing_log (
      submission_id, url, origin, user_id, chat_id, status, error_type, error_message, cufe,
      execution_time_ms, scraped_fields_count, pending_id, request_timestamp, response_timestamp
    ) VALUES (
      @submission_id, @url, @origin, @user_id, @chat_id, @status, @error_type, @error_message, @cufe,
      @execution_time_ms, @scraped_fields_count, @pending_id, @request_timestamp, @response_timestamp
    )
  `);
  const listStmt = db.prepare<[number], ProcessingLogRow>('SELECT * FROM processing_log ORDER BY id DESC LIMIT ?');
  const listForUserStmt = db.prepare<[number, number], ProcessingLogRow>(
    'SELECT * FROM processing_log WHERE user_id = ? ORDER BY id DESC LIMIT ?'
  );
  const userStatsStmt = db.prepare<[number, string], StatsRow>(
    `SELECT ${STATS_COLUMNS} FROM processing_log WHERE user_id = ? AND request_timestamp >= ?`
  );
  const systemStatsStmt = db.prepare<[string], StatsRow>(
    `SELECT ${STATS_COLUMNS} FROM processing_log WHERE request_timestamp >= ?`
  );

  return {
    insert(entry: ProcessingLogEntry): number {
      const result = insertStmt.run({
        submission_id: entry.submissionId,
        url: entry.url,
        origin: entry.origin,
        user_id: entry.userId,
        chat_id: entry.chatId,
        status: entry.status,
        error_type: entry.errorType,
        error_message: entry.errorMessage,
        cufe: entry.cufe,
        execution_time_ms: entry.executionTimeMs,
        scraped_fields_count: entry.scrapedFieldsCount,
        pending_id: entry.pendingId,
        request_timestamp: entry.requestTimestamp.toISOString(),
        response_timestamp: entry.responseTimestamp.toISOString(),
      });
      return Number(result.lastInsertRowid);
    },

    listRecent(limit: number, userId?: number): StoredProcessingLogEntry[] {
      const rows = userId === undefined ? listStmt.all(limit) : listForUserStmt.all(userId, limit);
      return rows.map(rowToEntry);
    },

    /** Outcome counts for one user over submissions received at or after `since`. */
    userStats(userId: number, since: Date): UserProcessingStats {
      return toUserStats(userStatsStmt.get(userId, since.toISOString()));
    },

    systemStats(since: Date): SystemProcessingStats {
      const row = systemStatsStmt.get(since.toISOString());
      return {
        ...toUserStats(row),
        uniqueUsers: row?.unique_users ?? 0,
        maxExecutionTimeMs: row?.max_ms ?? null,
      };
    },
  };
}
