import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { pendingRecoveryController } from '../controllers/pendingRecoveryController';
import { PendingRecoveryQuery } from '../dtos/invoiceDtos';

export default async function pendingRecoveryRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get('/', { schema: { querystring: PendingRecoveryQuery } }, pendingRecoveryController.listRecent);
}
