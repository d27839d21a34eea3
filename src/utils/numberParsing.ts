import Decimal from 'decimal.js';

export type DecimalKind = 'MONEY' | 'LINE_AMOUNT' | 'UNIT_PRICE' | 'QUANTITY';

export type ParseDecimalOptions = {
  kind: DecimalKind;
  maxDecimals?: number; // overrides kind default if provided
};

export type ParsedDecimal = {
  value: Decimal | null;
  normalized: string | null;
  wasNormalized: boolean;
  reason?: 'INVALID_FORMAT' | 'AMBIGUOUS_DECIMAL_SEPARATOR' | 'TOO_MANY_DECIMALS';
};

const KIND_MAX_DECIMALS: Record<DecimalKind, number> = {
  MONEY: 2,
  LINE_AMOUNT: 4,
  UNIT_PRICE: 6,
  QUANTITY: 6,
};

// Currency markers printed by the portal: "B/. 1.07", "$1.07", "PAB 1.07"
const CURRENCY_MARKERS = /B\/\.|\$|\b(?:PAB|USD)\b/gi;

function getMaxDecimals(opts: ParseDecimalOptions): number {
  if (typeof opts.maxDecimals === 'number') return opts.maxDecimals;
  return KIND_MAX_DECIMALS[opts.kind];
}

function stripNbsp(s: string) {
  return s.replace(/\u00A0/g, ' ');
}

function applyParenthesesNegative(raw: string): { s: string; wasNormalized: boolean } {
  const s0 = raw.trim();
  if (!/^\(.*\)$/.test(s0)) return { s: s0, wasNormalized: false };
  const inner = s0.slice(1, -1);
  if (!/[0-9]/.test(inner)) return { s: s0, wasNormalized: false };
  return { s: `-${inner}`, wasNormalized: true };
}

function invalid(reason: NonNullable<ParsedDecimal['reason']>, wasNormalized: boolean): ParsedDecimal {
  return { value: null, normalized: null, wasNormalized, reason };
}

function finalize(normalized: string, opts: ParseDecimalOptions, wasNormalized: boolean): ParsedDecimal {
  const fracLen = normalized.match(/\.(\d+)$/)?.[1]?.length ?? 0;
  if (fracLen > getMaxDecimals(opts)) return invalid('TOO_MANY_DECIMALS', wasNormalized);

  return { value: new Decimal(normalized), normalized, wasNormalized };
}

/**
 * parseDecimalLike
 *
 * Exact decimal parser for amounts printed by the DGI portal. The portal locale is
 * fixed: "." is the decimal separator and "," only ever groups thousands, so
 * "1,234.56" and "1,234" are accepted while "12,5" is rejected as ambiguous rather
 * than guessed. Values never pass through binary floating point.
 */
export function parseDecimalLike(input: unknown, opts: ParseDecimalOptions): ParsedDecimal {
  if (Decimal.isDecimal(input)) {
    return parseDecimalLike(input.toFixed(), opts);
  }
  if (typeof input !== 'string') return invalid('INVALID_FORMAT', false);

  const paren = applyParenthesesNegative(stripNbsp(input));
  const raw = paren.s;

  // Cleaning:
  // - remove currency markers
  // - remove whitespace
  // - keep a single leading minus
  const cleaned = raw
    .replace(CURRENCY_MARKERS, '')
    .replace(/\s+/g, '')
    .replace(/(?!^)-/g, '');

  const wasNormalized = paren.wasNormalized || cleaned !== input.trim();

  if (!/^-?[0-9.,]+$/.test(cleaned) || !/[0-9]/.test(cleaned)) {
    return invalid('INVALID_FORMAT', wasNormalized);
  }

  const hasDot = cleaned.includes('.');
  const hasComma = cleaned.includes(',');

  if (hasComma) {
    const grouped = hasDot ? /^-?\d{1,3}(?:,\d{3})+\.\d+$/ : /^-?\d{1,3}(?:,\d{3})+$/;
    if (!grouped.test(cleaned)) return invalid('AMBIGUOUS_DECIMAL_SEPARATOR', wasNormalized);
    return finalize(cleaned.replace(/,/g, ''), opts, true);
  }

  if (hasDot) {
    const parts = cleaned.split('.');
    if (parts.length !== 2 || parts[0].replace('-', '') === '' || parts[1] === '') {
      return invalid('INVALID_FORMAT', wasNormalized);
    }
  }

  return finalize(cleaned, opts, wasNormalized);
}

/** Storage form: at least two fraction digits, never exponent notation. */
export function formatDecimal(value: Decimal): string {
  return value.decimalPlaces() <= 2 ? value.toFixed(2) : value.toFixed();
}
