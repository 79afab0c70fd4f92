/**
 * Recycling request schemas
 */

import { z } from 'zod';

export const RecyclingMethodSchema = z.enum(['destruction', 'transfer']);

const identifier = (label: string) => z.string().trim().min(1, `${label} is required`);

/**
 * Request schema for a single exchange
 * - method: 'destruction' burns the unit, 'transfer' moves it into custody
 */
export const RecycleRequestSchema = z.object({
  classId: identifier('Asset class id'),
  unitId: identifier('Unit id'),
  method: RecyclingMethodSchema,
});

/**
 * Request schema for a batch of exchanges
 * Batch size limits are enforced by the batch coordinator
 */
export const BatchRecycleRequestSchema = z.object({
  items: z.array(RecycleRequestSchema),
});

export const EligibilityQuerySchema = z.object({
  classId: identifier('Asset class id'),
  unitId: identifier('Unit id'),
});

export const HistoryQuerySchema = z.object({
  offset: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).optional(),
});

export type RecycleRequest = z.infer<typeof RecycleRequestSchema>;
export type BatchRecycleRequest = z.infer<typeof BatchRecycleRequestSchema>;
export type EligibilityQuery = z.infer<typeof EligibilityQuerySchema>;
export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;
