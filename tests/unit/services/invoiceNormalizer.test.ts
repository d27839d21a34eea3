import { NormalizationFailedError } from '../../../src/services/invoices/errors';
import { normalizeInvoice, type NormalizationContext } from '../../../src/services/invoices/invoiceNormalizer';
import type { ExtractedData } from '../../../src/services/invoices/types';
import { FIXTURE_CUFE, FIXTURE_URL } from '../../fixtures';

const ctx: NormalizationContext = {
  url: FIXTURE_URL,
  userId: 42,
  source: 'WHATSAPP',
  receptionDate: new Date('2025-05-15T15:00:00.000Z'),
  processDate: new Date('2025-05-15T15:00:01.000Z'),
};

function extracted(overrides: Partial<ExtractedData> = {}): ExtractedData {
  return {
    header: {
      cufe: FIXTURE_CUFE,
      no: '0000181356',
      date: '15/05/2025 09:50:04',
      emisor_name: 'Lum Corporation',
      emisor_ruc: '155612345-2-2015',
      tot_amount: '107.00',
      tot_itbms: '7.00',
    },
    details: [
      {
        linea: '1',
        description: 'Servicio de consultoría',
        quantity: '1.00',
        unit_price: '100.00',
        amount: '100.00',
        itbms: '7.00',
        total: '107.00',
      },
    ],
    payments: [],
    anomalies: [],
    ...overrides,
  };
}

function failureOf(fn: () => unknown): NormalizationFailedError {
  try {
    fn();
  } catch (err) {
    if (err instanceof NormalizationFailedError) return err;
    throw err;
  }
  throw new Error('expected normalizeInvoice to fail');
}

describe('normalizeInvoice', () => {
  it('builds typed header and detail records', () => {
    const invoice = normalizeInvoice(extracted(), ctx);

    expect(invoice.header.cufe).toBe(FIXTURE_CUFE);
    expect(invoice.header.no).toBe('0000181356');
    expect(invoice.header.date.toISOString()).toBe('2025-05-15T09:50:04.000Z');
    expect(invoice.header.issuerName).toBe('Lum Corporation');
    expect(invoice.header.issuerRuc).toBe('155612345-2-2015');
    expect(invoice.header.receptorName).toBeNull();
    expect(invoice.header.totAmount.toFixed(2)).toBe('107.00');
    expect(invoice.header.totItbms?.toFixed(2)).toBe('7.00');
    expect(invoice.header.type).toBe('QR');
    expect(invoice.header.userId).toBe(42);
    expect(invoice.header.source).toBe('WHATSAPP');
    expect(invoice.header.url).toBe(FIXTURE_URL);

    expect(invoice.details).toHaveLength(1);
    expect(invoice.details[0].partkey).toBe(`${FIXTURE_CUFE}_1`);
    expect(invoice.details[0].quantity?.toFixed(2)).toBe('1.00');
    expect(invoice.details[0].unitPrice?.toFixed(2)).toBe('100.00');
    expect(invoice.details[0].unitDiscount).toBeNull();
    expect(invoice.payments).toEqual([]);
    expect(invoice.warnings).toEqual([]);
  });

  it('fails citing total when the total is missing', () => {
    const base = extracted();
    const { tot_amount: _omit, ...header } = base.header;

    const err = failureOf(() => normalizeInvoice({ ...base, header }, ctx));
    expect(err.field).toBe('total');
    expect(err.message).toBe("missing or invalid field 'total'");
  });

  it('names each mandatory header field', () => {
    const base = extracted();
    expect(failureOf(() => normalizeInvoice({ ...base, header: { ...base.header, emisor_name: undefined } }, ctx)).field).toBe(
      'issuer_name'
    );
    expect(failureOf(() => normalizeInvoice({ ...base, header: { ...base.header, no: undefined } }, ctx)).field).toBe(
      'invoice_number'
    );
  });

  it('rejects a date in any other shape', () => {
    const base = extracted();
    const err = failureOf(() => normalizeInvoice({ ...base, header: { ...base.header, date: '2025-05-15' } }, ctx));
    expect(err.message).toBe(`missing or invalid field 'date': expected dd/MM/yyyy HH:mm:ss, got "2025-05-15"`);
  });

  it('falls back to the chFE parameter for the CUFE', () => {
    const base = extracted();
    const invoice = normalizeInvoice({ ...base, header: { ...base.header, cufe: undefined } }, ctx);
    expect(invoice.header.cufe).toBe(FIXTURE_CUFE);
  });

  it('fails citing cufe when neither page nor URL carries one', () => {
    const base = extracted();
    const err = failureOf(() =>
      normalizeInvoice(
        { ...base, header: { ...base.header, cufe: undefined } },
        { ...ctx, url: 'https://dgi-fep.mef.gob.pa/Consultas/FacturasPorQR' }
      )
    );
    expect(err.field).toBe('cufe');
  });

  it('classifies a page reached outside the QR consultation as CUFE', () => {
    const invoice = normalizeInvoice(extracted(), {
      ...ctx,
      url: 'https://dgi-fep.mef.gob.pa/Consultas/FacturasPorCUFE',
    });
    expect(invoice.header.type).toBe('CUFE');
  });

  it('fails on an unreadable optional amount, naming the line', () => {
    const err = failureOf(() => normalizeInvoice(extracted({ details: [{ description: 'Café', unit_price: '12,5' }] }), ctx));
    expect(err.field).toBe('details[0].unit_price');
    expect(err.message).toBe(`missing or invalid field 'details[0].unit_price': AMBIGUOUS_DECIMAL_SEPARATOR ("12,5")`);
  });

  it('drops empty lines and numbers lines without a linea by position', () => {
    const invoice = normalizeInvoice(
      extracted({ details: [{ code: 'X-1' }, { description: 'Soporte técnico', total: '5.00' }] }),
      ctx
    );

    expect(invoice.details).toHaveLength(1);
    expect(invoice.details[0].linea).toBe('2');
    expect(invoice.details[0].partkey).toBe(`${FIXTURE_CUFE}_2`);
    expect(invoice.details[0].total?.toFixed(2)).toBe('5.00');
  });

  it('writes one payment row per method, each with paid total and change', () => {
    const base = extracted();
    const invoice = normalizeInvoice(
      {
        ...base,
        header: { ...base.header, total_pagado: '110.00', vuelto: '3.00' },
        payments: [
          { forma_de_pago: 'EFECTIVO', valor_pago: '60.00' },
          { forma_de_pago: 'TARJETA', valor_pago: '50.00' },
        ],
      },
      ctx
    );

    expect(
      invoice.payments.map((p) => [p.formaDePago, p.valorPago?.toFixed(2), p.totalPagado?.toFixed(2), p.vuelto?.toFixed(2)])
    ).toEqual([
      ['EFECTIVO', '60.00', '110.00', '3.00'],
      ['TARJETA', '50.00', '110.00', '3.00'],
    ]);
  });

  it('writes a single method-less payment row when only totals are printed', () => {
    const base = extracted();
    const invoice = normalizeInvoice({ ...base, header: { ...base.header, total_pagado: '107.00' } }, ctx);

    expect(invoice.payments).toHaveLength(1);
    expect(invoice.payments[0].formaDePago).toBeNull();
    expect(invoice.payments[0].valorPago).toBeNull();
    expect(invoice.payments[0].totalPagado?.toFixed(2)).toBe('107.00');
    expect(invoice.payments[0].vuelto).toBeNull();
  });

  it('warns when there are no line items', () => {
    const invoice = normalizeInvoice(extracted({ details: [], anomalies: ['NO_LINE_ITEMS'] }), ctx);
    expect(invoice.details).toEqual([]);
    expect(invoice.warnings).toEqual(['NO_LINE_ITEMS']);
  });

  it('warns when a line total disagrees with amount plus tax', () => {
    const mismatched = normalizeInvoice(
      extracted({ details: [{ description: 'A', amount: '100.00', itbms: '7.00', total: '110.00' }] }),
      ctx
    );
    expect(mismatched.warnings).toEqual(['LINE_TOTAL_MISMATCH']);

    const withinCent = normalizeInvoice(
      extracted({ details: [{ description: 'A', amount: '100.00', itbms: '7.00', total: '107.005' }] }),
      ctx
    );
    expect(withinCent.warnings).toEqual([]);
  });
});
