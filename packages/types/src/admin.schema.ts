import { z } from 'zod';

/**
 * Request schema for moving a unit out of custodial holding
 */
export const RescueRequestSchema = z.object({
  classId: z.string().trim().min(1, 'Asset class id is required'),
  unitId: z.string().trim().min(1, 'Unit id is required'),
  to: z.string().trim().min(1, 'Rescue destination is required'),
});

export type RescueRequest = z.infer<typeof RescueRequestSchema>;
