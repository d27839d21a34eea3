import type { SqliteDatabase } from '../infrastructure/database';
import type { PendingRecoveryEntry, StoredPendingRecoveryEntry } from '../services/invoices/types';

type PendingRecoveryRow = {
  id: number;
  url: string;
  chat_id: string | null;
  reception_date: string;
  type_document: string;
  user_id: number | null;
  error_message: string;
  origin: string;
  ws_id: string | null;
};

export type PendingRecoveryRepository = ReturnType<typeof createPendingRecoveryRepository>;

// Append-only: the table rejects UPDATE and DELETE.
export function createPendingRecoveryRepository(db: SqliteDatabase) {
  const insertStmt = db.prepare<[Omit<PendingRecoveryRow, 'id'>]>(`
    INSERT INTO pending_recovery (url, chat_id, reception_date, type_document, user_id, error_message, origin, ws_id)
    VALUES (@url, @chat_id, @reception_date, @type_document, @user_id, @error_message, @origin, @ws_id)
  `);
  const listStmt = db.prepare<[number], PendingRecoveryRow>(
    'SELECT * FROM pending_recovery ORDER BY id DESC LIMIT ?'
  );

  return {
    insert(entry: PendingRecoveryEntry): number {
      const result = insertStmt.run({
        url: entry.url,
        chat_id: entry.chatId,
        reception_date: entry.receptionDate.toISOString(),
        type_document: entry.typeDocument,
        user_id: entry.userId,
        error_message: entry.errorMessage,
        origin: entry.origin,
        ws_id: entry.wsId,
      });
      return Number(result.lastInsertRowid);
    },

    listRecent(limit: number): StoredPendingRecoveryEntry[] {
      return listStmt.all(limit).map((row) => ({
        id: row.id,
        url: row.url,
        chatId: row.chat_id,
        receptionDate: new Date(row.reception_date),
        typeDocument: row.type_document,
        userId: row.user_id,
        errorMessage: row.error_message,
        origin: row.origin,
        wsId: row.ws_id,
      }));
    },
  };
}
