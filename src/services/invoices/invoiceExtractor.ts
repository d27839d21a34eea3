import * as cheerio from 'cheerio';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { ExtractionFailedError, describeError } from './errors';
import type { DetailField, ExtractedData, HeaderField, PaymentField } from './types';

const ANCHOR_MARKER = 'FACTURA';
const ROW_SEARCH_DEPTH = 3;
const MIN_CUFE_LENGTH = 50;

// Containers the portal uses for its own error / validation messages.
const PORTAL_ERROR_SELECTORS = [
  'div.alert-danger',
  'div.alert-warning',
  'div.alert-error',
  '.alert.alert-danger',
  '.alert.alert-warning',
  '#validacionMensajeCriterioResultado',
  '#cuerpoVentanaMensajes',
  '.validation-summary-errors',
];

const PORTAL_ERROR_PHRASES = [
  'factura no encontrada',
  'cufe no encontrado',
  'documento no existe',
  'no se pudo procesar',
  'acceso denegado',
  'página no encontrada',
  'error interno',
  'internal server error',
  'service unavailable',
  'servicio no disponible',
  'sesión expirada',
  'servidor no disponible',
];

type PanelRole = 'emisor' | 'receptor';

const PANEL_KEYS: Record<string, 'ruc' | 'dv' | 'name' | 'address' | 'phone'> = {
  nombre: 'name',
  ruc: 'ruc',
  'cédula de identidad': 'ruc',
  'cédula': 'ruc',
  dv: 'dv',
  'dirección': 'address',
  'teléfono': 'phone',
};

const TOTAL_LABELS: Array<[label: string, field: HeaderField]> = [
  ['VALOR TOTAL:', 'tot_amount'],
  ['ITBMS TOTAL:', 'tot_itbms'],
  ['TOTAL PAGADO:', 'total_pagado'],
  ['VUELTO:', 'vuelto'],
];

// Payment methods the portal prints in the totals table, compared without accents or punctuation.
const PAYMENT_METHODS = new Set([
  'EFECTIVO',
  'TARJETA CREDITO',
  'TARJETA DEBITO',
  'TARJETA CLAVE BANISTMO',
  'CHEQUE',
  'TRANSFERENCIA',
  'ACH',
]);

const DETAIL_COLUMNS: Record<string, DetailField> = {
  linea: 'linea',
  'código': 'code',
  'descripción': 'description',
  'información de interés': 'information_of_interest',
  cantidad: 'quantity',
  precio: 'unit_price',
  descuento: 'unit_discount',
  monto: 'amount',
  impuesto: 'itbms',
  total: 'total',
};

function clean(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function textOf(el: Cheerio<AnyNode>): string {
  return clean(el.text());
}

/** Cell text with the value element's text taken out, so wrapped labels still count. */
function labelOf(cell: Cheerio<Element>): string {
  const copy = cell.clone();
  copy.find('div').first().remove();
  return clean(copy.text());
}

function paymentMethodKey(label: string): string {
  return label
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .toUpperCase()
    .replace(/[^A-Z]+/g, ' ')
    .trim();
}

function setIfPresent<K extends string>(target: Partial<Record<K, string>>, key: K, value: string | null | undefined) {
  if (value !== null && value !== undefined && value !== '') {
    target[key] = value;
  }
}

function findPortalError($: CheerioAPI, anchorFound: boolean): string | null {
  for (const selector of PORTAL_ERROR_SELECTORS) {
    const message = $(selector)
      .toArray()
      .map((el) => textOf($(el)))
      .find((t) => t !== '');
    if (message) return message;
  }

  // Free-text phrases are only trusted on pages that are not an invoice at all.
  if (!anchorFound) {
    const allText = clean($('body').text()).toLowerCase();
    const phrase = PORTAL_ERROR_PHRASES.find((p) => allText.includes(p));
    if (phrase) return `Detected error pattern: ${phrase}`;
  }
  return null;
}

function findAnchor($: CheerioAPI): Cheerio<Element> {
  return $('h4')
    .filter((_, el) => textOf($(el)).toUpperCase().includes(ANCHOR_MARKER))
    .first();
}

function findAnchorRow($: CheerioAPI, anchor: Cheerio<Element>): Cheerio<Element> | null {
  const row = anchor
    .parents()
    .slice(0, ROW_SEARCH_DEPTH)
    .filter((_, el) => ($(el).attr('class') ?? '').split(/\s+/).some((c) => c.includes('row')))
    .first();
  return row.length > 0 ? row : null;
}

/** "No. 0000181356" or a bare 10-digit number. */
function readInvoiceNumber(text: string): string | null {
  const upper = text.toUpperCase();
  const idx = upper.indexOf('NO.');
  if (idx >= 0) {
    const rest = text.slice(idx + 3).trim();
    return /^\d[\d\s]*$/.test(rest) ? rest.replace(/\s+/g, '') : null;
  }
  return /^\d{10}$/.test(text) ? text : null;
}

/** "DD/MM/YYYY HH:MM:SS", or a bare date which is completed with midnight. */
function readInvoiceDate(text: string): string | null {
  if (/^\d{2}\/\d{2}\/\d{4} \d{2}:\d{2}:\d{2}$/.test(text)) return text;
  if (/^\d{2}\/\d{2}\/\d{4}$/.test(text)) return `${text} 00:00:00`;
  return null;
}

function extractNumberAndDate($: CheerioAPI, row: Cheerio<Element>, header: ExtractedData['header']) {
  row.find('h5').each((_, el) => {
    const text = textOf($(el));
    if (!header.no) setIfPresent(header, 'no', readInvoiceNumber(text));
    if (!header.date) setIfPresent(header, 'date', readInvoiceDate(text));
  });
}

function extractCufe($: CheerioAPI): string | null {
  for (const dt of $('dt').toArray()) {
    const label = textOf($(dt)).toUpperCase();
    if (!label.includes('CÓDIGO ÚNICO') || !label.includes('CUFE')) continue;

    for (const dd of $(dt).nextAll('dd').toArray()) {
      const value = textOf($(dd));
      if (value.startsWith('FE') && value.length > MIN_CUFE_LENGTH) return value;
    }
  }
  return null;
}

function extractPanel($: CheerioAPI, role: PanelRole, header: ExtractedData['header']) {
  const title = role.toUpperCase();

  $('div.panel-heading').each((_, heading) => {
    if (!textOf($(heading)).toUpperCase().includes(title)) return;

    const body = $(heading).nextAll('.panel-body').first();
    body.find('dt').each((__, dt) => {
      const key = textOf($(dt)).toLowerCase().replace(/:$/, '').trim();
      const suffix = PANEL_KEYS[key];
      const dd = $(dt).next();
      if (!suffix || dd.length === 0 || !dd.is('dd')) return;

      const field = `${role}_${suffix}` as const satisfies HeaderField;
      setIfPresent(header, field, textOf(dd));
    });
  });
}

function extractTotalsAndPayments($: CheerioAPI, data: ExtractedData) {
  $('td.text-right').each((_, td) => {
    const cell = $(td);
    if (cell.is('[data-title]')) return;

    const valueEl = cell.find('div').first();
    if (valueEl.length === 0) return;

    const label = labelOf(cell);
    const value = textOf(valueEl);
    const upper = label.toUpperCase();
    const known = TOTAL_LABELS.find(([l]) => upper.includes(l));
    if (known) {
      setIfPresent(data.header, known[1], value);
      return;
    }

    if (value !== '' && PAYMENT_METHODS.has(paymentMethodKey(label))) {
      const payment: Partial<Record<PaymentField, string>> = {};
      setIfPresent(payment, 'forma_de_pago', label.replace(/:$/, '').trim());
      setIfPresent(payment, 'valor_pago', value);
      data.payments.push(payment);
    }
  });
}

function extractLineItems($: CheerioAPI): ExtractedData['details'] {
  const items: ExtractedData['details'] = [];

  $('div.panel-body.collapse.in tbody tr').each((_, tr) => {
    const item: Partial<Record<DetailField, string>> = {};
    $(tr)
      .find('td[data-title]')
      .each((__, td) => {
        const title = clean($(td).attr('data-title') ?? '').toLowerCase();
        const field = DETAIL_COLUMNS[title];
        if (field) setIfPresent(item, field, textOf($(td)));
      });
    if (Object.keys(item).length > 0) items.push(item);
  });

  return items;
}

/**
 * Reads the DGI confirmation page into loosely typed field bags.
 *
 * Only fails when the page is not an invoice page at all (portal error message,
 * or no "FACTURA" heading). Which fields are mandatory is decided later by the
 * normalizer.
 */
export function extractInvoiceData(html: string): ExtractedData {
  let $: CheerioAPI;
  try {
    $ = cheerio.load(html);
  } catch (err) {
    throw new ExtractionFailedError(`HTML parse error: ${describeError(err)}`);
  }

  const anchor = findAnchor($);
  const portalError = findPortalError($, anchor.length > 0);
  if (portalError) {
    throw new ExtractionFailedError(`Portal returned an error page: ${portalError}`);
  }
  if (anchor.length === 0) {
    throw new ExtractionFailedError(`Document does not match the invoice template: no "${ANCHOR_MARKER}" heading`);
  }

  const data: ExtractedData = { header: {}, details: [], payments: [], anomalies: [] };
  setIfPresent(data.header, 'document_title', textOf(anchor));

  const row = findAnchorRow($, anchor);
  if (row) extractNumberAndDate($, row, data.header);

  setIfPresent(data.header, 'cufe', extractCufe($));
  extractPanel($, 'emisor', data.header);
  extractPanel($, 'receptor', data.header);
  extractTotalsAndPayments($, data);

  try {
    data.details = extractLineItems($);
  } catch (err) {
    throw new ExtractionFailedError(`Failed to read line items: ${describeError(err)}`);
  }
  if (data.details.length === 0) {
    data.anomalies.push('NO_LINE_ITEMS');
  }

  return data;
}
