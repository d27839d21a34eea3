import type Decimal from 'decimal.js';

export const HEADER_FIELDS = [
  'document_title',
  'cufe',
  'no',
  'date',
  'emisor_ruc',
  'emisor_dv',
  'emisor_name',
  'emisor_address',
  'emisor_phone',
  'receptor_ruc',
  'receptor_dv',
  'receptor_name',
  'receptor_address',
  'receptor_phone',
  'tot_amount',
  'tot_itbms',
  'total_pagado',
  'vuelto',
] as const;

export const DETAIL_FIELDS = [
  'linea',
  'code',
  'description',
  'information_of_interest',
  'quantity',
  'unit_price',
  'unit_discount',
  'amount',
  'itbms',
  'total',
] as const;

export const PAYMENT_FIELDS = ['forma_de_pago', 'valor_pago'] as const;

export type HeaderField = (typeof HEADER_FIELDS)[number];
export type DetailField = (typeof DETAIL_FIELDS)[number];
export type PaymentField = (typeof PAYMENT_FIELDS)[number];

export type ExtractionAnomaly = 'NO_LINE_ITEMS';

/**
 * Raw result of reading the portal page. Nothing is interpreted yet: a field that
 * was not found is simply absent, never an empty string.
 */
export type ExtractedData = {
  header: Partial<Record<HeaderField, string>>;
  details: Array<Partial<Record<DetailField, string>>>;
  payments: Array<Partial<Record<PaymentField, string>>>;
  anomalies: ExtractionAnomaly[];
};

export type InvoiceType = 'QR' | 'CUFE' | 'GENERIC';

export type InvoiceHeader = {
  cufe: string;
  no: string;
  /** Issue date-time as printed by the portal, exact to the second. */
  date: Date;
  issuerName: string;
  issuerRuc: string | null;
  issuerDv: string | null;
  issuerAddress: string | null;
  issuerPhone: string | null;
  receptorName: string | null;
  receptorRuc: string | null;
  receptorDv: string | null;
  receptorAddress: string | null;
  receptorPhone: string | null;
  totAmount: Decimal;
  totItbms: Decimal | null;
  userId: number;
  source: string;
  /** Final URL after redirects. */
  url: string;
  processDate: Date;
  receptionDate: Date;
  type: InvoiceType;
};

export type InvoiceDetail = {
  partkey: string;
  cufe: string;
  linea: string;
  code: string | null;
  description: string | null;
  informationOfInterest: string | null;
  quantity: Decimal | null;
  unitPrice: Decimal | null;
  unitDiscount: Decimal | null;
  amount: Decimal | null;
  itbms: Decimal | null;
  total: Decimal | null;
};

export type InvoicePayment = {
  cufe: string;
  formaDePago: string | null;
  valorPago: Decimal | null;
  totalPagado: Decimal | null;
  vuelto: Decimal | null;
};

export type NormalizationWarning = 'NO_LINE_ITEMS' | 'LINE_TOTAL_MISMATCH';

export type NormalizedInvoice = {
  header: InvoiceHeader;
  details: InvoiceDetail[];
  payments: InvoicePayment[];
  warnings: NormalizationWarning[];
};

export type PendingRecoveryEntry = {
  url: string;
  chatId: string | null;
  receptionDate: Date;
  typeDocument: string;
  userId: number | null;
  errorMessage: string;
  origin: string;
  wsId: string | null;
};

export type StoredPendingRecoveryEntry = PendingRecoveryEntry & { id: number };

export type InvoiceSubmission = {
  url: string;
  userId: number;
  chatId: string;
  wsId?: string | null;
  origin?: string;
  receptionDate?: Date;
};

export type PipelineState =
  | 'FETCHING'
  | 'EXTRACTING'
  | 'NORMALIZING'
  | 'DEDUPLICATION_CHECK'
  | 'PERSISTING'
  | 'COMMITTED'
  | 'DUPLICATE'
  | 'FALLBACK_PENDING';

export type InvoiceSummary = {
  cufe: string;
  invoiceNumber: string;
  issuerName: string;
  totalAmount: string;
  totalItbms: string | null;
  itemsCount: number;
};

export type FailureStage = 'FETCHING' | 'EXTRACTING' | 'NORMALIZING' | 'DEDUPLICATION_CHECK' | 'PERSISTING';

export type PipelineOutcome =
  | { status: 'COMMITTED'; summary: InvoiceSummary; warnings: NormalizationWarning[] }
  | { status: 'DUPLICATE'; cufe: string; existingUserId: number | null; processedAt: Date | null }
  | { status: 'FALLBACK_PENDING'; pendingId: number | null; stage: FailureStage; reason: string };

export const PROCESSING_STATUSES = [
  'SUCCESS',
  'DUPLICATE',
  'SCRAPING_ERROR',
  'DATABASE_ERROR',
  'TIMEOUT_ERROR',
  'NETWORK_ERROR',
] as const;

export const PROCESSING_ERROR_TYPES = [
  'TIMEOUT',
  'UNKNOWN',
  'HTML_PARSE_ERROR',
  'MISSING_FIELDS',
  'CUFE_NOT_FOUND',
  'DB_CONNECTION_ERROR',
  'DB_TRANSACTION_ERROR',
] as const;

export type ProcessingStatus = (typeof PROCESSING_STATUSES)[number];
export type ProcessingErrorType = (typeof PROCESSING_ERROR_TYPES)[number];

/** Telemetry row written once per submission, whatever its outcome. */
export type ProcessingLogEntry = {
  submissionId: string;
  url: string;
  origin: string;
  userId: number;
  chatId: string;
  status: ProcessingStatus;
  errorType: ProcessingErrorType | null;
  errorMessage: string | null;
  cufe: string | null;
  executionTimeMs: number;
  /** Header fields found on the page; 0 when the page was never read. */
  scrapedFieldsCount: number;
  pendingId: number | null;
  requestTimestamp: Date;
  responseTimestamp: Date;
};

export type StoredProcessingLogEntry = ProcessingLogEntry & { id: number };

export type UserProcessingStats = {
  totalRequests: number;
  successfulRequests: number;
  duplicateRequests: number;
  failedRequests: number;
  avgExecutionTimeMs: number | null;
};

export type SystemProcessingStats = UserProcessingStats & {
  uniqueUsers: number;
  maxExecutionTimeMs: number | null;
};
