import { FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { PendingRecoveryQuery } from '../dtos/invoiceDtos';

export const pendingRecoveryController = {
  async listRecent(request: FastifyRequest<{ Querystring: z.infer<typeof PendingRecoveryQuery> }>, reply: FastifyReply) {
    const entries = request.server.pendingRecoveryRepository.listRecent(request.query.limit);
    return reply.send({
      items: entries.map((e) => ({ ...e, receptionDate: e.receptionDate.toISOString() })),
    });
  },
};
