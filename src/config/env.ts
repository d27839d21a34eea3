import z from 'zod';
import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'development') {
  dotenv.config({ path: '.env.local' });
} else {
  dotenv.config();
}

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(4001),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

  // SQLite file holding invoice_header / invoice_detail / invoice_payment / pending_recovery.
  // ':memory:' is accepted (tests).
  DATABASE_PATH: z.string().min(1).default('data/invoices.db'),

  // Upper bound for one portal request, redirects included.
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  // Busy timeout for the write lock; a transaction that cannot start in time is rolled back.
  PERSIST_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),

  PORTAL_HOST: z.string().min(1).default('dgi-fep.mef.gob.pa'),
  SUBMISSION_ORIGIN: z.string().min(1).default('WHATSAPP'),
  PENDING_DOCUMENT_TYPE: z.string().min(1).default('QR_INVOICE'),

  // Infrastructure
  SENTRY_DSN: z.string().url().optional(),
  REDIS_URL: z.string().optional(),
  ENABLE_RATE_LIMIT: z.string().optional().default('true'),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.format());
  process.exit(1);
}

export const config: AppConfig = parsed.data;
