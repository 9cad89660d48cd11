import { z } from 'zod';

/**
 * Request schemas for the research API
 * Validated by ZodValidationPipe; failures become HTTP 400
 */

export const MAX_BATCH_TICKERS = 50;
export const MAX_HISTORY_LIMIT = 50;

const tickerSchema = z
  .string()
  .trim()
  .min(1, 'ticker is required')
  .max(10, 'ticker must be at most 10 characters')
  .regex(/^[A-Za-z][A-Za-z0-9.-]*$/, 'ticker must be a symbol such as ACME or BRK.B')
  .transform((value) => value.toUpperCase());

const sessionIdSchema = z.string().trim().min(1).optional();

export const researchRequestSchema = z.object({
  ticker: tickerSchema,
  sessionId: sessionIdSchema,
});

export const batchResearchRequestSchema = z.object({
  tickers: z.array(tickerSchema).min(1, 'at least one ticker is required').max(MAX_BATCH_TICKERS),
  sessionId: sessionIdSchema,
});

export const historyQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(MAX_HISTORY_LIMIT).optional(),
});

export const activityQuerySchema = z.object({
  sessionId: z.string().min(1).optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

export type ResearchRequest = z.infer<typeof researchRequestSchema>;
export type BatchResearchRequest = z.infer<typeof batchResearchRequestSchema>;
export type HistoryQuery = z.infer<typeof historyQuerySchema>;
export type ActivityQuery = z.infer<typeof activityQuerySchema>;
