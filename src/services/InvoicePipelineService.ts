import * as Sentry from '@sentry/node';
import { randomUUID } from 'crypto';
import { config } from '../config/env';
import { logger as rootLogger, type Logger } from '../infrastructure/logger';
import { runWithRequestContext } from '../infrastructure/requestContext';
import type { InvoiceRepository } from '../repositories/invoiceRepository';
import type { PendingRecoveryRepository } from '../repositories/pendingRecoveryRepository';
import type { ProcessingLogRepository } from '../repositories/processingLogRepository';
import {
  DuplicateInvoiceError,
  FetchTimeoutError,
  NormalizationFailedError,
  PipelineError,
  describeError,
  type PipelineErrorKind,
} from './invoices/errors';
import { extractInvoiceData } from './invoices/invoiceExtractor';
import type { InvoiceFetcher } from './invoices/invoiceFetcher';
import { normalizeInvoice } from './invoices/invoiceNormalizer';
import type {
  FailureStage,
  InvoiceSubmission,
  InvoiceSummary,
  NormalizedInvoice,
  PipelineOutcome,
  PipelineState,
  ProcessingErrorType,
  ProcessingLogEntry,
  ProcessingStatus,
} from './invoices/types';

export type InvoicePipelineDeps = {
  fetcher: InvoiceFetcher;
  invoices: InvoiceRepository;
  pendingRecovery: PendingRecoveryRepository;
  processingLog: ProcessingLogRepository;
  logger?: Logger;
  now?: () => Date;
  defaultOrigin?: string;
  pendingDocumentType?: string;
};

// Failures before anything is written are reported as scraping errors.
const SCRAPING_STAGES: Partial<Record<FailureStage, PipelineErrorKind>> = {
  FETCHING: 'FetchFailed',
  EXTRACTING: 'ExtractionFailed',
  NORMALIZING: 'NormalizationFailed',
};

// What the processing log learns about a submission while it runs.
type SubmissionTrace = {
  scrapedFieldsCount: number;
  cufe: string | null;
  error?: unknown;
};

export type FailureClassification = { status: ProcessingStatus; errorType: ProcessingErrorType };

export function classifyFailure(stage: FailureStage, err: unknown): FailureClassification {
  switch (stage) {
    case 'FETCHING':
      return err instanceof FetchTimeoutError
        ? { status: 'TIMEOUT_ERROR', errorType: 'TIMEOUT' }
        : { status: 'NETWORK_ERROR', errorType: 'UNKNOWN' };
    case 'EXTRACTING':
      return { status: 'SCRAPING_ERROR', errorType: 'HTML_PARSE_ERROR' };
    case 'NORMALIZING':
      return {
        status: 'SCRAPING_ERROR',
        errorType: err instanceof NormalizationFailedError && err.field === 'cufe' ? 'CUFE_NOT_FOUND' : 'MISSING_FIELDS',
      };
    case 'DEDUPLICATION_CHECK':
      return { status: 'DATABASE_ERROR', errorType: 'DB_CONNECTION_ERROR' };
    case 'PERSISTING':
      return { status: 'DATABASE_ERROR', errorType: 'DB_TRANSACTION_ERROR' };
  }
}

function describeForLog(
  outcome: PipelineOutcome,
  trace: SubmissionTrace
): Pick<ProcessingLogEntry, 'status' | 'errorType' | 'errorMessage' | 'cufe' | 'pendingId'> {
  switch (outcome.status) {
    case 'COMMITTED':
      return { status: 'SUCCESS', errorType: null, errorMessage: null, cufe: outcome.summary.cufe, pendingId: null };
    case 'DUPLICATE':
      return {
        status: 'DUPLICATE',
        errorType: null,
        errorMessage: 'Invoice already registered',
        cufe: outcome.cufe,
        pendingId: null,
      };
    case 'FALLBACK_PENDING':
      return {
        ...classifyFailure(outcome.stage, trace.error),
        errorMessage: outcome.reason,
        cufe: trace.cufe,
        pendingId: outcome.pendingId,
      };
  }
}

export function summarizeInvoice(invoice: NormalizedInvoice): InvoiceSummary {
  return {
    cufe: invoice.header.cufe,
    invoiceNumber: invoice.header.no,
    issuerName: invoice.header.issuerName,
    totalAmount: invoice.header.totAmount.toFixed(2),
    totalItbms: invoice.header.totItbms ? invoice.header.totItbms.toFixed(2) : null,
    itemsCount: invoice.details.length,
  };
}

function formatSummary(s: InvoiceSummary): string {
  return `cufe=${s.cufe} no=${s.invoiceNumber} issuer=${s.issuerName} total=${s.totalAmount} items=${s.itemsCount}`;
}

export function buildFailureMessage(stage: FailureStage, err: unknown, invoice?: NormalizedInvoice): string {
  const cause = describeError(err);
  const scrapingKind = SCRAPING_STAGES[stage];
  if (scrapingKind) {
    const kind = err instanceof PipelineError ? err.kind : scrapingKind;
    return `Scraping error (${kind}): ${cause}`;
  }
  return invoice ? `Save error: ${cause} | ${formatSummary(summarizeInvoice(invoice))}` : `Save error: ${cause}`;
}

/**
 * Drives one submission from URL to either a stored invoice or a pending-recovery
 * entry. processSubmission never rejects: every failure ends as FALLBACK_PENDING.
 */
export class InvoicePipelineService {
  private readonly fetcher: InvoiceFetcher;
  private readonly invoices: InvoiceRepository;
  private readonly pendingRecovery: PendingRecoveryRepository;
  private readonly processingLog: ProcessingLogRepository;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly defaultOrigin: string;
  private readonly pendingDocumentType: string;

  constructor(deps: InvoicePipelineDeps) {
    this.fetcher = deps.fetcher;
    this.invoices = deps.invoices;
    this.pendingRecovery = deps.pendingRecovery;
    this.processingLog = deps.processingLog;
    this.log = deps.logger ?? rootLogger;
    this.now = deps.now ?? (() => new Date());
    this.defaultOrigin = deps.defaultOrigin ?? config.SUBMISSION_ORIGIN;
    this.pendingDocumentType = deps.pendingDocumentType ?? config.PENDING_DOCUMENT_TYPE;
  }

  async processSubmission(submission: InvoiceSubmission): Promise<PipelineOutcome> {
    const ctx = {
      submissionId: randomUUID(),
      userId: submission.userId,
      chatId: submission.chatId,
      startAtMs: Date.now(),
    };
    return runWithRequestContext(ctx, async () => {
      const startedAt = this.now();
      const origin = submission.origin ?? this.defaultOrigin;
      const trace: SubmissionTrace = { scrapedFieldsCount: 0, cufe: null };

      const outcome = await this.run(submission, { receptionDate: submission.receptionDate ?? startedAt, origin }, trace);

      const durationMs = Date.now() - ctx.startAtMs;
      this.log.info({ status: outcome.status, durationMs }, '[InvoicePipeline] Submission finished');
      this.recordProcessing({ submissionId: ctx.submissionId, submission, origin, outcome, trace, startedAt, durationMs });
      return outcome;
    });
  }

  private enter(state: PipelineState, extra: Record<string, unknown> = {}) {
    this.log.info({ state, ...extra }, `[InvoicePipeline] ${state}`);
  }

  private async run(
    submission: InvoiceSubmission,
    { receptionDate, origin }: { receptionDate: Date; origin: string },
    trace: SubmissionTrace
  ): Promise<PipelineOutcome> {
    let stage: FailureStage = 'FETCHING';
    let invoice: NormalizedInvoice | undefined;

    try {
      this.enter('FETCHING', { url: submission.url });
      const page = await this.fetcher.fetchInvoicePage(submission.url);

      stage = 'EXTRACTING';
      this.enter('EXTRACTING', { finalUrl: page.finalUrl });
      const extracted = extractInvoiceData(page.body);
      trace.scrapedFieldsCount = Object.keys(extracted.header).length;

      stage = 'NORMALIZING';
      this.enter('NORMALIZING', { anomalies: extracted.anomalies });
      invoice = normalizeInvoice(extracted, {
        url: page.finalUrl,
        userId: submission.userId,
        source: origin,
        receptionDate,
        processDate: this.now(),
      });
      trace.cufe = invoice.header.cufe;
      if (invoice.warnings.length > 0) {
        this.log.warn({ cufe: invoice.header.cufe, warnings: invoice.warnings }, '[InvoicePipeline] Normalization warnings');
      }

      stage = 'DEDUPLICATION_CHECK';
      this.enter('DEDUPLICATION_CHECK', { cufe: invoice.header.cufe });
      const existing = this.invoices.findHeaderByCufe(invoice.header.cufe);
      if (existing) {
        this.enter('DUPLICATE', { cufe: invoice.header.cufe });
        return {
          status: 'DUPLICATE',
          cufe: invoice.header.cufe,
          existingUserId: existing.userId,
          processedAt: existing.processDate,
        };
      }

      stage = 'PERSISTING';
      this.enter('PERSISTING', { cufe: invoice.header.cufe, details: invoice.details.length });
      try {
        this.invoices.insertInvoice(invoice);
      } catch (err) {
        if (err instanceof DuplicateInvoiceError) {
          return this.duplicateAfterRace(err.cufe);
        }
        throw err;
      }

      this.enter('COMMITTED', { cufe: invoice.header.cufe });
      return { status: 'COMMITTED', summary: summarizeInvoice(invoice), warnings: invoice.warnings };
    } catch (err) {
      trace.error = err;
      return this.fallback(submission, { stage, err, invoice, receptionDate, origin });
    }
  }

  // Another submission stored the same CUFE between the check and the write.
  private duplicateAfterRace(cufe: string): PipelineOutcome {
    this.log.info({ cufe }, '[InvoicePipeline] Lost insert race, treating as duplicate');
    this.enter('DUPLICATE', { cufe });
    const existing = this.invoices.findHeaderByCufe(cufe);
    return {
      status: 'DUPLICATE',
      cufe,
      existingUserId: existing?.userId ?? null,
      processedAt: existing?.processDate ?? null,
    };
  }

  private fallback(
    submission: InvoiceSubmission,
    failure: { stage: FailureStage; err: unknown; invoice?: NormalizedInvoice; receptionDate: Date; origin: string }
  ): PipelineOutcome {
    const reason = buildFailureMessage(failure.stage, failure.err, failure.invoice);
    this.log.warn({ stage: failure.stage, err: failure.err }, `[InvoicePipeline] ${reason}`);
    this.enter('FALLBACK_PENDING', { stage: failure.stage });

    let pendingId: number | null = null;
    try {
      pendingId = this.pendingRecovery.insert({
        url: submission.url,
        chatId: submission.chatId,
        receptionDate: failure.receptionDate,
        typeDocument: this.pendingDocumentType,
        userId: submission.userId,
        errorMessage: reason,
        origin: failure.origin,
        wsId: submission.wsId ?? null,
      });
    } catch (recoveryErr) {
      this.log.error(
        { err: recoveryErr, url: submission.url, reason },
        '[InvoicePipeline] Could not write pending-recovery entry'
      );
      Sentry.captureException(recoveryErr, { extra: { url: submission.url, reason } });
    }

    return { status: 'FALLBACK_PENDING', pendingId, stage: failure.stage, reason };
  }

  private recordProcessing(r: {
    submissionId: string;
    submission: InvoiceSubmission;
    origin: string;
    outcome: PipelineOutcome;
    trace: SubmissionTrace;
    startedAt: Date;
    durationMs: number;
  }): void {
    const result = describeForLog(r.outcome, r.trace);
    try {
      this.processingLog.insert({
        ...result,
        submissionId: r.submissionId,
        url: r.submission.url,
        origin: r.origin,
        userId: r.submission.userId,
        chatId: r.submission.chatId,
        executionTimeMs: r.durationMs,
        scrapedFieldsCount: r.trace.scrapedFieldsCount,
        requestTimestamp: r.startedAt,
        responseTimestamp: this.now(),
      });
    } catch (err) {
      this.log.error({ err, status: result.status }, '[InvoicePipeline] Could not write processing log entry');
    }
  }
}
