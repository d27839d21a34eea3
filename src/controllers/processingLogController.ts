import { subDays, subHours } from 'date-fns';
import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { ProcessingLogQuery, SystemStatsQuery, UserStatsParams, UserStatsQuery } from '../dtos/invoiceDtos';

export const processingLogController = {
  async listRecent(request: FastifyRequest<{ Querystring: z.infer<typeof ProcessingLogQuery> }>, reply: FastifyReply) {
    const entries = request.server.processingLogRepository.listRecent(request.query.limit, request.query.userId);
    return reply.send({
      items: entries.map((e) => ({
        ...e,
        requestTimestamp: e.requestTimestamp.toISOString(),
        responseTimestamp: e.responseTimestamp.toISOString(),
      })),
    });
  },

  async systemStats(request: FastifyRequest<{ Querystring: z.infer<typeof SystemStatsQuery> }>, reply: FastifyReply) {
    const { hours } = request.query;
    const stats = request.server.processingLogRepository.systemStats(subHours(new Date(), hours));
    return reply.send({ hours, ...stats });
  },

  async userStats(
    request: FastifyRequest<{ Params: z.infer<typeof UserStatsParams>; Querystring: z.infer<typeof UserStatsQuery> }>,
    reply: FastifyReply
  ) {
    const { userId } = request.params;
    const { days } = request.query;
    const stats = request.server.processingLogRepository.userStats(userId, subDays(new Date(), days));
    return reply.send({ userId, days, ...stats });
  },
};
