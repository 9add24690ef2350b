/**
 * Query-string validation shared by the routes.
 */

import { z } from 'zod';
import { EXPLORER } from '../../config/api.js';
import { DataValidationError } from '../../errors/index.js';

const flag = z
  .enum(['true', 'false'])
  .optional()
  .transform((value) => (value === undefined ? undefined : value === 'true'));

const HISTORY_INTERVALS = [1, 60, 1440];

export const MarketsQuerySchema = z.object({
  page: z.coerce.number().int().positive().optional(),
  pageSize: z.coerce.number().int().positive().max(EXPLORER.MAX_PAGE_SIZE).optional(),
  search: z.string().max(100).optional(),
  category: z.string().max(100).optional(),
  refresh: flag,
});

export const HistoryQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).optional(),
  interval: z.coerce
    .number()
    .int()
    .refine((value) => HISTORY_INTERVALS.includes(value), { message: 'interval must be 1, 60 or 1440' })
    .optional(),
});

export const RefreshQuerySchema = z.object({ refresh: flag });

export const GameQuerySchema = z.object({ summary: flag });

/**
 * @throws DataValidationError naming the first invalid parameter
 */
export function parseQuery<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, query: unknown): T {
  const result = schema.safeParse(query);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join('.') || 'query';
    throw new DataValidationError(`Invalid query parameter ${field}: ${issue?.message ?? 'invalid value'}`, field);
  }
  return result.data;
}
