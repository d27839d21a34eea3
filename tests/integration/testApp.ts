import { buildApp } from '../../src/app';
import { openDatabase, type SqliteDatabase } from '../../src/infrastructure/database';
import { logger } from '../../src/infrastructure/logger';
import { createInvoiceRepository } from '../../src/repositories/invoiceRepository';
import { createPendingRecoveryRepository } from '../../src/repositories/pendingRecoveryRepository';
import { createProcessingLogRepository } from '../../src/repositories/processingLogRepository';
import { InvoicePipelineService } from '../../src/services/InvoicePipelineService';
import { InvoiceFetcher, type FetchFn } from '../../src/services/invoices/invoiceFetcher';

export type PortalStub = {
  fetchImpl: FetchFn;
  /** Answer every following request with this page. */
  serve(html: string, opts?: { finalUrl?: string }): void;
  fail(err: unknown): void;
  /** Never answers; the request ends when the fetcher's timeout aborts it. */
  hang(): void;
  calls: string[];
};

export function createPortalStub(): PortalStub {
  let next: (url: string, init?: RequestInit) => Response | Promise<Response> = () =>
    new Response('', { status: 404 });
  const calls: string[] = [];

  return {
    calls,
    fetchImpl: async (input, init) => {
      calls.push(input);
      return next(input, init);
    },
    serve(html, opts = {}) {
      next = () => {
        const res = new Response(html, { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } });
        if (opts.finalUrl) Object.defineProperty(res, 'url', { value: opts.finalUrl });
        return res;
      };
    },
    fail(err) {
      next = () => {
        throw err;
      };
    },
    hang() {
      next = (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          const signal = init?.signal;
          if (signal) signal.addEventListener('abort', () => reject(signal.reason));
        });
    },
  };
}

export function createTestDatabase(): SqliteDatabase {
  return openDatabase(':memory:', { busyTimeoutMs: 1000 });
}

export function createTestPipeline(db: SqliteDatabase = createTestDatabase()) {
  const portal = createPortalStub();
  const invoices = createInvoiceRepository(db);
  const pendingRecovery = createPendingRecoveryRepository(db);
  const processingLog = createProcessingLogRepository(db);
  const pipeline = new InvoicePipelineService({
    fetcher: new InvoiceFetcher({ fetchImpl: portal.fetchImpl, timeoutMs: 50 }),
    invoices,
    pendingRecovery,
    processingLog,
    logger,
  });
  return { db, portal, invoices, pendingRecovery, processingLog, pipeline };
}

export async function buildTestApp() {
  const db = createTestDatabase();
  const portal = createPortalStub();
  const app = buildApp({ db, fetcher: new InvoiceFetcher({ fetchImpl: portal.fetchImpl, timeoutMs: 50 }) });
  await app.ready();
  return { app, db, portal };
}

type Table = 'invoice_header' | 'invoice_detail' | 'invoice_payment' | 'pending_recovery' | 'processing_log';

export function countRows(db: SqliteDatabase, table: Table) {
  return db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
}
