import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { InvoiceParams, type ProcessInvoiceRequestType } from '../dtos/invoiceDtos';
import type { StoredInvoice } from '../repositories/invoiceRepository';
import type { PipelineOutcome } from '../services/invoices/types';
import { formatStorageDateTime } from '../utils/dateParsing';
import { formatDecimal } from '../utils/numberParsing';
import type Decimal from 'decimal.js';

const STATUS_CODES: Record<PipelineOutcome['status'], number> = {
  COMMITTED: 201,
  DUPLICATE: 200,
  FALLBACK_PENDING: 202,
};

/** User-facing text for the chat reply. */
export function describeOutcome(outcome: PipelineOutcome): string {
  switch (outcome.status) {
    case 'COMMITTED': {
      const s = outcome.summary;
      const tax = s.totalItbms ? `, ITBMS ${s.totalItbms}` : '';
      return `Invoice ${s.invoiceNumber} from ${s.issuerName} saved: total ${s.totalAmount}${tax}, ${s.itemsCount} item(s).`;
    }
    case 'DUPLICATE':
      return `Invoice ${outcome.cufe} was already registered.`;
    case 'FALLBACK_PENDING':
      return 'We could not read this invoice right now. It has been saved for review and will be processed later.';
  }
}

function dec(value: Decimal | null): string | null {
  return value ? formatDecimal(value) : null;
}

function toInvoiceResponse(invoice: StoredInvoice) {
  const h = invoice.header;
  return {
    header: {
      ...h,
      date: formatStorageDateTime(h.date),
      totAmount: h.totAmount.toFixed(2),
      totItbms: h.totItbms ? h.totItbms.toFixed(2) : null,
      processDate: h.processDate.toISOString(),
      receptionDate: h.receptionDate.toISOString(),
    },
    details: invoice.details.map((d) => ({
      ...d,
      quantity: dec(d.quantity),
      unitPrice: dec(d.unitPrice),
      unitDiscount: dec(d.unitDiscount),
      amount: dec(d.amount),
      itbms: dec(d.itbms),
      total: dec(d.total),
    })),
    payments: invoice.payments.map((p) => ({
      ...p,
      valorPago: dec(p.valorPago),
      totalPagado: dec(p.totalPagado),
      vuelto: dec(p.vuelto),
    })),
  };
}

export const invoiceController = {
  async process(request: FastifyRequest<{ Body: ProcessInvoiceRequestType }>, reply: FastifyReply) {
    const outcome = await request.server.invoicePipeline.processSubmission(request.body);
    return reply.code(STATUS_CODES[outcome.status]).send({ outcome, message: describeOutcome(outcome) });
  },

  async getByCufe(request: FastifyRequest<{ Params: z.infer<typeof InvoiceParams> }>, reply: FastifyReply) {
    const invoice = request.server.invoiceRepository.getInvoiceByCufe(request.params.cufe);
    if (!invoice) {
      return reply.code(404).send({ error: { code: 'NOT_FOUND', message: 'Invoice not found' } });
    }
    return reply.send(toInvoiceResponse(invoice));
  },
};
