import { z } from 'zod';
import { config } from '../config/env';
import { isPortalUrl } from '../utils/portalUrl';

export const ProcessInvoiceRequest = z.object({
  // Checked trimmed, passed on as submitted.
  url: z
    .string()
    .min(1, 'url is required')
    .refine((url) => isPortalUrl(url.trim(), config.PORTAL_HOST), {
      message: `url must be an http(s) link to ${config.PORTAL_HOST}`,
    }),
  userId: z.number().int().positive(),
  chatId: z.string().min(1),
  wsId: z.string().min(1).nullable().optional(),
  origin: z.string().min(1).optional(),
});

export type ProcessInvoiceRequestType = z.infer<typeof ProcessInvoiceRequest>;

export const InvoiceParams = z.object({
  cufe: z.string().min(1),
});

export const PendingRecoveryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
});

export const ProcessingLogQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(50),
  userId: z.coerce.number().int().positive().optional(),
});

export const SystemStatsQuery = z.object({
  hours: z.coerce.number().int().min(1).max(24 * 90).default(24),
});

export const UserStatsParams = z.object({
  userId: z.coerce.number().int().positive(),
});

export const UserStatsQuery = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});
