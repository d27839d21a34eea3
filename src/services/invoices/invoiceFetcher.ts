import { config } from '../../config/env';
import { logger as rootLogger, type Logger } from '../../infrastructure/logger';
import { FetchFailedError, FetchTimeoutError, describeError } from './errors';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type FetchedPage = {
  body: string;
  /** URL after redirects; the CUFE query parameter only exists here in some flows. */
  finalUrl: string;
  redirected: boolean;
};

export type InvoiceFetcherOptions = {
  timeoutMs?: number;
  fetchImpl?: FetchFn;
  logger?: Logger;
};

// The portal serves a reduced page to clients that do not look like a browser.
const PORTAL_REQUEST_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'es-PA,es;q=0.9,en;q=0.5',
};

function isTextContentType(contentType: string | null): boolean {
  // Missing header: let the extractor decide.
  if (!contentType) return true;
  const mime = contentType.split(';')[0].trim().toLowerCase();
  return mime.startsWith('text/') || mime.endsWith('+xml') || mime === 'application/xml';
}

// AbortSignal.timeout() rejects with a DOMException, not necessarily an Error subclass.
function isTimeout(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false;
  return err.name === 'TimeoutError' || err.name === 'AbortError';
}

export class InvoiceFetcher {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly logger: Logger;

  constructor(opts: InvoiceFetcherOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? config.FETCH_TIMEOUT_MS;
    this.fetchImpl = opts.fetchImpl ?? ((input, init) => fetch(input, init));
    this.logger = opts.logger ?? rootLogger;
  }

  /**
   * GET the page, following redirects. Every failure (network, timeout, non-2xx,
   * non-text body) surfaces as FetchFailedError; no retries happen here.
   */
  async fetchInvoicePage(url: string): Promise<FetchedPage> {
    let res: Response;
    try {
      res = await this.fetchImpl(url, {
        method: 'GET',
        redirect: 'follow',
        headers: PORTAL_REQUEST_HEADERS,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (isTimeout(err)) {
        throw new FetchTimeoutError(url, this.timeoutMs, err);
      }
      throw new FetchFailedError(url, `Request failed: ${describeError(err)}`, err);
    }

    if (!res.ok) {
      await this.discardBody(res, url);
      throw new FetchFailedError(url, `HTTP error: ${res.status}`);
    }

    const contentType = res.headers.get('content-type');
    if (!isTextContentType(contentType)) {
      await this.discardBody(res, url);
      throw new FetchFailedError(url, `Unexpected content-type: ${contentType}`);
    }

    let body: string;
    try {
      body = await res.text();
    } catch (err) {
      if (isTimeout(err)) {
        throw new FetchTimeoutError(url, this.timeoutMs, err);
      }
      throw new FetchFailedError(url, `Failed to read response text: ${describeError(err)}`, err);
    }

    const finalUrl = res.url || url;
    const redirected = finalUrl !== url;
    if (redirected) {
      this.logger.info({ url, finalUrl }, 'URL redirection detected');
    } else {
      this.logger.debug({ url }, 'No redirection needed for URL');
    }
    this.logger.debug({ finalUrl, chars: body.length }, 'Fetched invoice page');

    return { body, finalUrl, redirected };
  }

  // Releases the connection of a response that will not be read.
  private async discardBody(res: Response, url: string): Promise<void> {
    try {
      await res.body?.cancel();
    } catch (err) {
      this.logger.debug({ url, err }, 'Could not discard response body');
    }
  }
}
