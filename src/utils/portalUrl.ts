import type { InvoiceType } from '../services/invoices/types';

const QR_CONSULTATION_PATH = /FacturasPorQR/i;

/** Reads the `chFE` query parameter the portal uses to carry the CUFE. */
export function extractCufeFromUrl(url: string): string | null {
  try {
    const value = new URL(url).searchParams.get('chFE');
    return value && value.trim() !== '' ? value.trim() : null;
  } catch {
    return null;
  }
}

export function isPortalUrl(url: string, portalHost: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') return false;
  const host = parsed.hostname.toLowerCase();
  const expected = portalHost.toLowerCase();
  return host === expected || host.endsWith(`.${expected}`);
}

/**
 * QR consultations and CUFE consultations land on different portal pages; anything
 * that carries no fiscal identifier at all is GENERIC.
 */
export function classifyInvoiceType(url: string, documentCufe?: string | null): InvoiceType {
  if (QR_CONSULTATION_PATH.test(url)) return 'QR';
  if (documentCufe || extractCufeFromUrl(url)) return 'CUFE';
  return 'GENERIC';
}
