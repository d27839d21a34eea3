import { isMatch } from 'date-fns';

/** The only shape the portal prints: day first, 24h clock, seconds included. */
export const PORTAL_DATE_TIME_FORMAT = 'dd/MM/yyyy HH:mm:ss';

/** Column format for invoice_header.date; keeps the printed wall-clock time as-is. */
export const STORAGE_DATE_TIME_FORMAT = 'yyyy-MM-dd HH:mm:ss';

const PORTAL_DATE_TIME_RE = /^(\d{2})\/(\d{2})\/(\d{4}) (\d{2}):(\d{2}):(\d{2})$/;
const STORAGE_DATE_TIME_RE = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/*
 * Portal times carry no zone. They are held as UTC instants whose UTC fields are the
 * printed wall clock, so no local-zone rule (DST gaps included) can shift them.
 */
function wallClock(year: string, month: string, day: string, hour: string, minute: string, second: string): Date {
  return new Date(Date.UTC(Number(year), Number(month) - 1, Number(day), Number(hour), Number(minute), Number(second)));
}

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

/**
 * Parses "15/05/2025 09:50:04" into a Date whose UTC fields are exactly those
 * components. Returns null for anything else: month-first input, missing seconds,
 * or impossible dates such as 31/02/2025 are rejected instead of being reinterpreted.
 */
export function parsePortalDateTime(input: string): Date | null {
  const s = input.trim().replace(/\s+/g, ' ');
  const m = PORTAL_DATE_TIME_RE.exec(s);
  if (!m || !isMatch(s, PORTAL_DATE_TIME_FORMAT)) return null;

  const [, day, month, year, hour, minute, second] = m;
  return wallClock(year, month, day, hour, minute, second);
}

export function formatStorageDateTime(d: Date): string {
  const date = `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
  return `${date} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

export function parseStorageDateTime(input: string): Date | null {
  const m = STORAGE_DATE_TIME_RE.exec(input);
  if (!m || !isMatch(input, STORAGE_DATE_TIME_FORMAT)) return null;

  const [, year, month, day, hour, minute, second] = m;
  return wallClock(year, month, day, hour, minute, second);
}
