import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { processingLogController } from '../controllers/processingLogController';
import { ProcessingLogQuery, SystemStatsQuery, UserStatsParams, UserStatsQuery } from '../dtos/invoiceDtos';

export default async function processingLogRoutes(fastify: FastifyInstance) {
  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.get('/', { schema: { querystring: ProcessingLogQuery } }, processingLogController.listRecent);
  app.get('/stats', { schema: { querystring: SystemStatsQuery } }, processingLogController.systemStats);
  app.get(
    '/users/:userId/stats',
    { schema: { params: UserStatsParams, querystring: UserStatsQuery } },
    processingLogController.userStats
  );
}
