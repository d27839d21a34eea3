import type { FastifyInstance } from 'fastify';
import { FIXTURE_CUFE, FIXTURE_URL, loadFixture } from '../fixtures';
import { buildTestApp, type PortalStub } from './testApp';

describe('invoice routes', () => {
  let app: FastifyInstance;
  let portal: PortalStub;

  beforeEach(async () => {
    ({ app, portal } = await buildTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  const processBody = { url: FIXTURE_URL, userId: 42, chatId: 'chat-1' };

  it('GET /health', async () => {
    const res = await app.inject({ method: 'GET', url: '/health' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok' });
  });

  it('POST /invoices/process commits and composes the reply text', async () => {
    portal.serve(loadFixture('valid-invoice.html'));

    const res = await app.inject({ method: 'POST', url: '/invoices/process', payload: processBody });

    expect(res.statusCode).toBe(201);
    expect(res.json().outcome.status).toBe('COMMITTED');
    expect(res.json().message).toBe('Invoice 0000181356 from Lum Corporation saved: total 107.00, ITBMS 7.00, 1 item(s).');
  });

  it('POST /invoices/process reports duplicates', async () => {
    portal.serve(loadFixture('valid-invoice.html'));
    await app.inject({ method: 'POST', url: '/invoices/process', payload: processBody });

    const res = await app.inject({ method: 'POST', url: '/invoices/process', payload: processBody });

    expect(res.statusCode).toBe(200);
    expect(res.json().outcome).toMatchObject({ status: 'DUPLICATE', cufe: FIXTURE_CUFE, existingUserId: 42 });
    expect(res.json().message).toBe(`Invoice ${FIXTURE_CUFE} was already registered.`);
  });

  it('POST /invoices/process accepts failures for later recovery', async () => {
    portal.hang();

    const res = await app.inject({ method: 'POST', url: '/invoices/process', payload: processBody });

    expect(res.statusCode).toBe(202);
    expect(res.json().outcome).toEqual({
      status: 'FALLBACK_PENDING',
      pendingId: 1,
      stage: 'FETCHING',
      reason: 'Scraping error (FetchFailed): Request timed out after 50ms',
    });

    const pending = await app.inject({ method: 'GET', url: '/pending-recovery?limit=5' });
    expect(pending.statusCode).toBe(200);
    expect(pending.json().items).toHaveLength(1);
    expect(pending.json().items[0]).toMatchObject({ id: 1, url: FIXTURE_URL, chatId: 'chat-1', typeDocument: 'QR_INVOICE' });
  });

  it('POST /invoices/process keeps the submitted URL as sent', async () => {
    portal.fail(new TypeError('fetch failed'));
    const url = `  ${FIXTURE_URL} `;

    const res = await app.inject({ method: 'POST', url: '/invoices/process', payload: { ...processBody, url } });

    expect(res.statusCode).toBe(202);
    expect(portal.calls).toEqual([url]);
    const pending = await app.inject({ method: 'GET', url: '/pending-recovery' });
    expect(pending.json().items[0].url).toBe(url);
  });

  it('POST /invoices/process rejects links outside the portal', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/invoices/process',
      payload: { ...processBody, url: 'https://example.com/?chFE=FE01' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json().error.code).toBe('VALIDATION_ERROR');
    expect(portal.calls).toEqual([]);
  });

  it('GET /invoices/:cufe returns the stored invoice', async () => {
    portal.serve(loadFixture('valid-invoice.html'));
    await app.inject({ method: 'POST', url: '/invoices/process', payload: processBody });

    const res = await app.inject({ method: 'GET', url: `/invoices/${FIXTURE_CUFE}` });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.header).toMatchObject({
      cufe: FIXTURE_CUFE,
      date: '2025-05-15 09:50:04',
      issuerName: 'Lum Corporation',
      totAmount: '107.00',
      totItbms: '7.00',
      type: 'QR',
    });
    expect(body.details).toHaveLength(1);
    expect(body.details[0]).toMatchObject({ linea: '1', quantity: '1.00', unitPrice: '100.00', total: '107.00' });
    expect(body.payments).toEqual([
      { cufe: FIXTURE_CUFE, formaDePago: 'EFECTIVO', valorPago: '110.00', totalPagado: '110.00', vuelto: '3.00' },
    ]);
  });

  it('GET /invoices/:cufe is 404 for unknown invoices', async () => {
    const res = await app.inject({ method: 'GET', url: '/invoices/FE0000' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Invoice not found' } });
  });

  it('GET /processing-log lists finished submissions', async () => {
    portal.serve(loadFixture('valid-invoice.html'));
    await app.inject({ method: 'POST', url: '/invoices/process', payload: processBody });
    await app.inject({ method: 'POST', url: '/invoices/process', payload: { ...processBody, userId: 7 } });

    const res = await app.inject({ method: 'GET', url: '/processing-log?userId=7' });

    expect(res.statusCode).toBe(200);
    expect(res.json().items).toHaveLength(1);
    expect(res.json().items[0]).toMatchObject({ userId: 7, status: 'DUPLICATE', cufe: FIXTURE_CUFE });
  });

  it('GET /processing-log/stats counts outcomes', async () => {
    portal.serve(loadFixture('valid-invoice.html'));
    await app.inject({ method: 'POST', url: '/invoices/process', payload: processBody });
    await app.inject({ method: 'POST', url: '/invoices/process', payload: processBody });
    portal.fail(new TypeError('fetch failed'));
    await app.inject({ method: 'POST', url: '/invoices/process', payload: { ...processBody, userId: 7 } });

    const system = await app.inject({ method: 'GET', url: '/processing-log/stats?hours=1' });
    expect(system.statusCode).toBe(200);
    expect(system.json()).toMatchObject({
      hours: 1,
      totalRequests: 3,
      successfulRequests: 1,
      duplicateRequests: 1,
      failedRequests: 1,
      uniqueUsers: 2,
    });

    const user = await app.inject({ method: 'GET', url: '/processing-log/users/42/stats' });
    expect(user.statusCode).toBe(200);
    expect(user.json()).toMatchObject({
      userId: 42,
      days: 30,
      totalRequests: 2,
      successfulRequests: 1,
      duplicateRequests: 1,
      failedRequests: 0,
    });
  });

  it('GET /processing-log/users/:userId/stats validates the user id', async () => {
    const res = await app.inject({ method: 'GET', url: '/processing-log/users/abc/stats' });
    expect(res.statusCode).toBe(400);
  });

  it('GET /pending-recovery validates the limit', async () => {
    const res = await app.inject({ method: 'GET', url: '/pending-recovery?limit=0' });
    expect(res.statusCode).toBe(400);
  });
});
