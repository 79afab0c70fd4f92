/**
 * Asset class administration schemas
 * Used for request validation on the admin endpoints
 */

import { z } from 'zod';

const classId = z
  .string()
  .trim()
  .min(1, 'Asset class id is required')
  .max(200, 'Asset class id must be 200 characters or less');

const pointsPerUnit = z
  .number()
  .int('Points per unit must be a whole number')
  .positive('Points per unit must be positive');

/**
 * Request schema for registering (or reactivating) an asset class
 * - Upper bound of the rate is enforced by the registry's configured maximum
 */
export const RegisterClassRequestSchema = z.object({
  classId,
  pointsPerUnit,
});

export const UpdateRateRequestSchema = z.object({
  pointsPerUnit,
});

export const SetClassStatusRequestSchema = z.object({
  active: z.boolean(),
});

export const PointsQuerySchema = z.object({
  quantity: z.coerce.number().int('Quantity must be a whole number').positive().default(1),
});

export type RegisterClassRequest = z.infer<typeof RegisterClassRequestSchema>;
export type UpdateRateRequest = z.infer<typeof UpdateRateRequestSchema>;
export type SetClassStatusRequest = z.infer<typeof SetClassStatusRequestSchema>;
export type PointsQuery = z.infer<typeof PointsQuerySchema>;
