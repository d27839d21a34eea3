import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { invoiceController } from '../controllers/invoiceController';
import { InvoiceParams, ProcessInvoiceRequest } from '../dtos/invoiceDtos';

export default async function invoiceRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  // POST /invoices/process
  app.post('/process', { schema: { body: ProcessInvoiceRequest } }, invoiceController.process);

  // GET /invoices/:cufe
  app.get('/:cufe', { schema: { params: InvoiceParams } }, invoiceController.getByCufe);
}
