import Decimal from 'decimal.js';
import type { SqliteDatabase } from '../infrastructure/database';
import { DuplicateInvoiceError, PersistenceFailedError, describeError } from '../services/invoices/errors';
import type {
  InvoiceDetail,
  InvoiceHeader,
  InvoicePayment,
  InvoiceType,
  NormalizedInvoice,
} from '../services/invoices/types';
import { formatStorageDateTime, parseStorageDateTime } from '../utils/dateParsing';
import { formatDecimal } from '../utils/numberParsing';

export type ExistingInvoiceRef = {
  userId: number;
  processDate: Date;
};

export type StoredInvoice = {
  header: InvoiceHeader;
  details: InvoiceDetail[];
  payments: InvoicePayment[];
};

type HeaderRow = {
  cufe: string;
  no: string;
  date: string;
  issuer_name: string;
  issuer_ruc: string | null;
  issuer_dv: string | null;
  issuer_address: string | null;
  issuer_phone: string | null;
  receptor_name: string | null;
  receptor_ruc: string | null;
  receptor_dv: string | null;
  receptor_address: string | null;
  receptor_phone: string | null;
  tot_amount: string;
  tot_itbms: string | null;
  user_id: number;
  source: string;
  url: string;
  process_date: string;
  reception_date: string;
  type: string;
};

type DetailRow = {
  partkey: string;
  cufe: string;
  linea: string;
  code: string | null;
  description: string | null;
  information_of_interest: string | null;
  quantity: string | null;
  unit_price: string | null;
  unit_discount: string | null;
  amount: string | null;
  itbms: string | null;
  total: string | null;
};

type PaymentRow = {
  cufe: string;
  forma_de_pago: string | null;
  valor_pago: string | null;
  total_pagado: string | null;
  vuelto: string | null;
};

const INSERT_HEADER_SQL = `
  INSERT INTO invoice_header (
    cufe, no, date, issuer_name, issuer_ruc, issuer_dv, issuer_address, issuer_phone,
    receptor_name, receptor_ruc, receptor_dv, receptor_address, receptor_phone,
    tot_amount, tot_itbms, user_id, source, url, process_date, reception_date, type
  ) VALUES (
    @cufe, @no, @date, @issuer_name, @issuer_ruc, @issuer_dv, @issuer_address, @issuer_phone,
    @receptor_name, @receptor_ruc, @receptor_dv, @receptor_address, @receptor_phone,
    @tot_amount, @tot_itbms, @user_id, @source, @url, @process_date, @reception_date, @type
  )`;

const INSERT_DETAIL_SQL = `
  INSERT INTO invoice_detail (
    partkey, cufe, linea, code, description, information_of_interest,
    quantity, unit_price, unit_discount, amount, itbms, total
  ) VALUES (
    @partkey, @cufe, @linea, @code, @description, @information_of_interest,
    @quantity, @unit_price, @unit_discount, @amount, @itbms, @total
  )`;

const INSERT_PAYMENT_SQL = `
  INSERT INTO invoice_payment (cufe, forma_de_pago, valor_pago, total_pagado, vuelto)
  VALUES (@cufe, @forma_de_pago, @valor_pago, @total_pagado, @vuelto)`;

const INVOICE_TYPES: readonly InvoiceType[] = ['QR', 'CUFE', 'GENERIC'];

function isInvoiceType(value: string): value is InvoiceType {
  return INVOICE_TYPES.some((t) => t === value);
}

function decimalOrNull(value: Decimal | null): string | null {
  return value ? formatDecimal(value) : null;
}

function toDecimal(value: string | null): Decimal | null {
  return value === null ? null : new Decimal(value);
}

// better-sqlite3 reports "UNIQUE constraint failed: invoice_header.cufe" for the header key.
function isHeaderKeyViolation(err: unknown): boolean {
  if (!(err instanceof Error) || !('code' in err)) return false;
  const code = String(err.code);
  return code.startsWith('SQLITE_CONSTRAINT') && err.message.includes('invoice_header.cufe');
}

function headerToRow(h: InvoiceHeader): HeaderRow {
  return {
    cufe: h.cufe,
    no: h.no,
    date: formatStorageDateTime(h.date),
    issuer_name: h.issuerName,
    issuer_ruc: h.issuerRuc,
    issuer_dv: h.issuerDv,
    issuer_address: h.issuerAddress,
    issuer_phone: h.issuerPhone,
    receptor_name: h.receptorName,
    receptor_ruc: h.receptorRuc,
    receptor_dv: h.receptorDv,
    receptor_address: h.receptorAddress,
    receptor_phone: h.receptorPhone,
    tot_amount: h.totAmount.toFixed(2),
    tot_itbms: h.totItbms ? h.totItbms.toFixed(2) : null,
    user_id: h.userId,
    source: h.source,
    url: h.url,
    process_date: h.processDate.toISOString(),
    reception_date: h.receptionDate.toISOString(),
    type: h.type,
  };
}

function rowToHeader(row: HeaderRow): InvoiceHeader {
  const date = parseStorageDateTime(row.date);
  if (!date) throw new PersistenceFailedError(`Stored invoice ${row.cufe} has an unreadable date: ${row.date}`);
  if (!isInvoiceType(row.type)) {
    throw new PersistenceFailedError(`Stored invoice ${row.cufe} has an unknown type: ${row.type}`);
  }

  return {
    cufe: row.cufe,
    no: row.no,
    date,
    issuerName: row.issuer_name,
    issuerRuc: row.issuer_ruc,
    issuerDv: row.issuer_dv,
    issuerAddress: row.issuer_address,
    issuerPhone: row.issuer_phone,
    receptorName: row.receptor_name,
    receptorRuc: row.receptor_ruc,
    receptorDv: row.receptor_dv,
    receptorAddress: row.receptor_address,
    receptorPhone: row.receptor_phone,
    totAmount: new Decimal(row.tot_amount),
    totItbms: toDecimal(row.tot_itbms),
    userId: row.user_id,
    source: row.source,
    url: row.url,
    processDate: new Date(row.process_date),
    receptionDate: new Date(row.reception_date),
    type: row.type,
  };
}

function rowToDetail(row: DetailRow): InvoiceDetail {
  return {
    partkey: row.partkey,
    cufe: row.cufe,
    linea: row.linea,
    code: row.code,
    description: row.description,
    informationOfInterest: row.information_of_interest,
    quantity: toDecimal(row.quantity),
    unitPrice: toDecimal(row.unit_price),
    unitDiscount: toDecimal(row.unit_discount),
    amount: toDecimal(row.amount),
    itbms: toDecimal(row.itbms),
    total: toDecimal(row.total),
  };
}

function rowToPayment(row: PaymentRow): InvoicePayment {
  return {
    cufe: row.cufe,
    formaDePago: row.forma_de_pago,
    valorPago: toDecimal(row.valor_pago),
    totalPagado: toDecimal(row.total_pagado),
    vuelto: toDecimal(row.vuelto),
  };
}

export type InvoiceRepository = ReturnType<typeof createInvoiceRepository>;

export function createInvoiceRepository(db: SqliteDatabase) {
  const findHeaderStmt = db.prepare<[string], { user_id: number; process_date: string }>(
    'SELECT user_id, process_date FROM invoice_header WHERE cufe = ?'
  );
  const selectHeaderStmt = db.prepare<[string], HeaderRow>('SELECT * FROM invoice_header WHERE cufe = ?');
  const selectDetailsStmt = db.prepare<[string], DetailRow>(
    'SELECT * FROM invoice_detail WHERE cufe = ? ORDER BY rowid'
  );
  const selectPaymentsStmt = db.prepare<[string], PaymentRow>(
    'SELECT cufe, forma_de_pago, valor_pago, total_pagado, vuelto FROM invoice_payment WHERE cufe = ? ORDER BY id'
  );
  const countDetailsStmt = db.prepare<[string], { count: number }>(
    'SELECT COUNT(*) AS count FROM invoice_detail WHERE cufe = ?'
  );
  const insertHeaderStmt = db.prepare<[HeaderRow]>(INSERT_HEADER_SQL);
  const insertDetailStmt = db.prepare<[DetailRow]>(INSERT_DETAIL_SQL);
  const insertPaymentStmt = db.prepare<[PaymentRow]>(INSERT_PAYMENT_SQL);

  const writeInvoice = db.transaction((invoice: NormalizedInvoice) => {
    insertHeaderStmt.run(headerToRow(invoice.header));
    for (const d of invoice.details) {
      insertDetailStmt.run({
        partkey: d.partkey,
        cufe: d.cufe,
        linea: d.linea,
        code: d.code,
        description: d.description,
        information_of_interest: d.informationOfInterest,
        quantity: decimalOrNull(d.quantity),
        unit_price: decimalOrNull(d.unitPrice),
        unit_discount: decimalOrNull(d.unitDiscount),
        amount: decimalOrNull(d.amount),
        itbms: decimalOrNull(d.itbms),
        total: decimalOrNull(d.total),
      });
    }
    for (const p of invoice.payments) {
      insertPaymentStmt.run({
        cufe: p.cufe,
        forma_de_pago: p.formaDePago,
        valor_pago: decimalOrNull(p.valorPago),
        total_pagado: decimalOrNull(p.totalPagado),
        vuelto: decimalOrNull(p.vuelto),
      });
    }
  });

  return {
    findHeaderByCufe(cufe: string): ExistingInvoiceRef | undefined {
      const row = findHeaderStmt.get(cufe);
      return row ? { userId: row.user_id, processDate: new Date(row.process_date) } : undefined;
    },

    getInvoiceByCufe(cufe: string): StoredInvoice | undefined {
      const header = selectHeaderStmt.get(cufe);
      if (!header) return undefined;
      return {
        header: rowToHeader(header),
        details: selectDetailsStmt.all(cufe).map(rowToDetail),
        payments: selectPaymentsStmt.all(cufe).map(rowToPayment),
      };
    },

    countDetails(cufe: string): number {
      return countDetailsStmt.get(cufe)?.count ?? 0;
    },

    /**
     * Header, details and payments in one transaction; any failure leaves none of
     * them behind. A taken CUFE surfaces as DuplicateInvoiceError.
     */
    insertInvoice(invoice: NormalizedInvoice): void {
      try {
        writeInvoice(invoice);
      } catch (err) {
        if (isHeaderKeyViolation(err)) throw new DuplicateInvoiceError(invoice.header.cufe);
        throw new PersistenceFailedError(describeError(err), err);
      }
    },
  };
}
