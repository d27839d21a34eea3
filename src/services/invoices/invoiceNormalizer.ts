import Decimal from 'decimal.js';
import { parsePortalDateTime } from '../../utils/dateParsing';
import { parseDecimalLike, type DecimalKind } from '../../utils/numberParsing';
import { classifyInvoiceType, extractCufeFromUrl } from '../../utils/portalUrl';
import { NormalizationFailedError } from './errors';
import type {
  DetailField,
  ExtractedData,
  InvoiceDetail,
  InvoiceHeader,
  InvoicePayment,
  NormalizationWarning,
  NormalizedInvoice,
} from './types';

export type NormalizationContext = {
  /** Final URL after redirects. */
  url: string;
  userId: number;
  source: string;
  receptionDate: Date;
  processDate: Date;
};

const LINE_TOTAL_TOLERANCE = new Decimal('0.01');

function text(value: string | undefined): string | null {
  const v = (value ?? '').trim();
  return v === '' ? null : v;
}

function required(value: string | undefined, field: string): string {
  const v = text(value);
  if (v === null) throw new NormalizationFailedError(field);
  return v;
}

/** Absent stays null; present but unreadable is a failure naming the field. */
function optionalDecimal(value: string | undefined, kind: DecimalKind, field: string): Decimal | null {
  const v = text(value);
  if (v === null) return null;
  const parsed = parseDecimalLike(v, { kind });
  if (!parsed.value) {
    throw new NormalizationFailedError(field, `${parsed.reason ?? 'INVALID_FORMAT'} (${JSON.stringify(v)})`);
  }
  return parsed.value;
}

function requiredDecimal(value: string | undefined, kind: DecimalKind, field: string): Decimal {
  const d = optionalDecimal(value, kind, field);
  if (!d) throw new NormalizationFailedError(field);
  return d;
}

function normalizeHeader(extracted: ExtractedData, ctx: NormalizationContext): InvoiceHeader {
  const h = extracted.header;

  // Some portal flows only carry the identifier in the redirect target.
  const cufe = text(h.cufe) ?? extractCufeFromUrl(ctx.url);
  if (!cufe) throw new NormalizationFailedError('cufe');

  const issuerName = required(h.emisor_name, 'issuer_name');
  const no = required(h.no, 'invoice_number');

  const rawDate = required(h.date, 'date');
  const date = parsePortalDateTime(rawDate);
  if (!date) throw new NormalizationFailedError('date', `expected dd/MM/yyyy HH:mm:ss, got ${JSON.stringify(rawDate)}`);

  return {
    cufe,
    no,
    date,
    issuerName,
    issuerRuc: text(h.emisor_ruc),
    issuerDv: text(h.emisor_dv),
    issuerAddress: text(h.emisor_address),
    issuerPhone: text(h.emisor_phone),
    receptorName: text(h.receptor_name),
    receptorRuc: text(h.receptor_ruc),
    receptorDv: text(h.receptor_dv),
    receptorAddress: text(h.receptor_address),
    receptorPhone: text(h.receptor_phone),
    totAmount: requiredDecimal(h.tot_amount, 'MONEY', 'total'),
    totItbms: optionalDecimal(h.tot_itbms, 'MONEY', 'tax'),
    userId: ctx.userId,
    source: ctx.source,
    url: ctx.url,
    processDate: ctx.processDate,
    receptionDate: ctx.receptionDate,
    // The CUFE is mandatory, so a normalized invoice is QR or CUFE, never GENERIC.
    type: classifyInvoiceType(ctx.url, cufe),
  };
}

function isEmptyLine(line: Partial<Record<DetailField, string>>): boolean {
  return (
    text(line.description) === null &&
    text(line.quantity) === null &&
    text(line.unit_price) === null &&
    text(line.amount) === null &&
    text(line.total) === null
  );
}

function normalizeDetails(extracted: ExtractedData, cufe: string): InvoiceDetail[] {
  const details: InvoiceDetail[] = [];

  extracted.details.forEach((line, index) => {
    if (isEmptyLine(line)) return;

    const at = (f: DetailField) => `details[${index}].${f}`;
    const linea = text(line.linea) ?? String(index + 1);

    details.push({
      partkey: `${cufe}_${linea}`,
      cufe,
      linea,
      code: text(line.code),
      description: text(line.description),
      informationOfInterest: text(line.information_of_interest),
      quantity: optionalDecimal(line.quantity, 'QUANTITY', at('quantity')),
      unitPrice: optionalDecimal(line.unit_price, 'UNIT_PRICE', at('unit_price')),
      unitDiscount: optionalDecimal(line.unit_discount, 'UNIT_PRICE', at('unit_discount')),
      amount: optionalDecimal(line.amount, 'LINE_AMOUNT', at('amount')),
      itbms: optionalDecimal(line.itbms, 'LINE_AMOUNT', at('itbms')),
      total: optionalDecimal(line.total, 'LINE_AMOUNT', at('total')),
    });
  });

  return details;
}

function normalizePayments(extracted: ExtractedData, cufe: string): InvoicePayment[] {
  const totalPagado = optionalDecimal(extracted.header.total_pagado, 'MONEY', 'total_pagado');
  const vuelto = optionalDecimal(extracted.header.vuelto, 'MONEY', 'vuelto');

  if (extracted.payments.length === 0) {
    if (!totalPagado && !vuelto) return [];
    return [{ cufe, formaDePago: null, valorPago: null, totalPagado, vuelto }];
  }

  return extracted.payments.map((p, index) => ({
    cufe,
    formaDePago: text(p.forma_de_pago),
    valorPago: optionalDecimal(p.valor_pago, 'MONEY', `payments[${index}].valor_pago`),
    totalPagado,
    vuelto,
  }));
}

function lineTotalMismatch(details: InvoiceDetail[]): boolean {
  return details.some((d) => {
    if (!d.total || !d.amount || !d.itbms) return false;
    return d.total.minus(d.amount.plus(d.itbms)).abs().greaterThan(LINE_TOTAL_TOLERANCE);
  });
}

/**
 * Turns the raw field bags into typed, storage-ready records.
 *
 * Mandatory: cufe, issuer name, invoice number, issue date and total. Anything
 * else may be missing, but a value that is present and unreadable still fails.
 */
export function normalizeInvoice(extracted: ExtractedData, ctx: NormalizationContext): NormalizedInvoice {
  const header = normalizeHeader(extracted, ctx);
  const details = normalizeDetails(extracted, header.cufe);
  const payments = normalizePayments(extracted, header.cufe);

  const warnings: NormalizationWarning[] = [];
  if (details.length === 0) warnings.push('NO_LINE_ITEMS');
  if (lineTotalMismatch(details)) warnings.push('LINE_TOTAL_MISMATCH');

  return { header, details, payments, warnings };
}
