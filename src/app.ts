import Fastify, { FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit, { RateLimitPluginOptions } from '@fastify/rate-limit';
import Redis from 'ioredis';
import { serializerCompiler, validatorCompiler } from 'fastify-type-provider-zod';
import * as Sentry from '@sentry/node';
import invoiceRoutes from './routes/invoiceRoutes';
import pendingRecoveryRoutes from './routes/pendingRecoveryRoutes';
import processingLogRoutes from './routes/processingLogRoutes';
import { config } from './config/env';
import { getDatabase, type SqliteDatabase } from './infrastructure/database';
import { loggerOptions } from './infrastructure/logger';
import { createInvoiceRepository } from './repositories/invoiceRepository';
import { createPendingRecoveryRepository } from './repositories/pendingRecoveryRepository';
import { createProcessingLogRepository } from './repositories/processingLogRepository';
import { InvoicePipelineService } from './services/InvoicePipelineService';
import { InvoiceFetcher } from './services/invoices/invoiceFetcher';

export type AppDeps = {
  db?: SqliteDatabase;
  fetcher?: InvoiceFetcher;
};

export function buildApp(deps: AppDeps = {}): FastifyInstance {
  const app = Fastify({
    // Trust X-Forwarded-For so rate limiting keys on the real client behind a proxy.
    trustProxy: true,
    logger: loggerOptions,
  });

  const db = deps.db ?? getDatabase();
  const invoiceRepository = createInvoiceRepository(db);
  const pendingRecoveryRepository = createPendingRecoveryRepository(db);
  const processingLogRepository = createProcessingLogRepository(db);

  app.decorate('invoiceRepository', invoiceRepository);
  app.decorate('pendingRecoveryRepository', pendingRecoveryRepository);
  app.decorate('processingLogRepository', processingLogRepository);
  app.decorate(
    'invoicePipeline',
    new InvoicePipelineService({
      fetcher: deps.fetcher ?? new InvoiceFetcher(),
      invoices: invoiceRepository,
      pendingRecovery: pendingRecoveryRepository,
      processingLog: processingLogRepository,
    })
  );

  // Security Headers
  app.register(helmet, {
    contentSecurityPolicy: config.NODE_ENV === 'production',
  });

  // Rate Limiting
  if (config.ENABLE_RATE_LIMIT === 'true') {
    const rateLimitConfig: RateLimitPluginOptions = {
      max: 100,
      timeWindow: '1 minute',
    };

    if (config.REDIS_URL) {
      rateLimitConfig.redis = new Redis(config.REDIS_URL);
    }

    app.register(rateLimit, rateLimitConfig);
  }

  app.register(cors, {
    origin: config.NODE_ENV !== 'production',
    methods: ['GET', 'POST', 'OPTIONS'],
  });

  // Setup Zod validation
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.register(invoiceRoutes, { prefix: '/invoices' });
  app.register(pendingRecoveryRoutes, { prefix: '/pending-recovery' });
  app.register(processingLogRoutes, { prefix: '/processing-log' });

  // Health Check
  app.get('/health', async () => {
    return { status: 'ok' };
  });

  // Global Error Handler
  app.setErrorHandler((error, request, reply) => {
    request.log.error(error);

    if (error.validation || error.code === 'FST_ERR_VALIDATION') {
      return reply.status(400).send({
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: error.validation,
        },
      });
    }

    const statusCode = error.statusCode || 500;
    if (statusCode >= 500) {
      Sentry.withScope((scope) => {
        scope.setContext('request', { method: request.method, url: request.url });
        scope.setTag('error_code', error.code || 'INTERNAL_ERROR');
        scope.setTag('status_code', String(statusCode));
        Sentry.captureException(error);
      });
    }

    return reply.status(statusCode).send({
      error: {
        code: error.code || 'INTERNAL_ERROR',
        message: error.message || 'Something went wrong',
      },
    });
  });

  return app;
}
