import { z } from 'zod';
import type { AssetClassSeed } from './assets/asset-class-seed.js';
import { DEFAULT_MAX_POINTS_PER_UNIT } from './registry/registry-types.js';

export const DEFAULT_CUSTODY_ID = 'recycler-custody';

const AssetClassSeedSchema = z.object({
  classId: z
    .string()
    .min(1, 'classId must not be empty')
    .refine((id) => id === id.trim(), 'classId must not have surrounding whitespace'),
  destructible: z.boolean().default(true),
  units: z.record(z.string().min(1, 'unit owner must not be empty')).default({}),
});

/** JSON array of asset classes to attach at startup */
const AssetClassSeedsSchema = z
  .string()
  .default('[]')
  .transform((raw, ctx) => {
    try {
      const value: unknown = JSON.parse(raw);
      return value;
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'RECYCLER_CLASSES must be valid JSON' });
      return z.NEVER;
    }
  })
  .pipe(
    z.array(AssetClassSeedSchema).superRefine((seeds, ctx) => {
      const seen = new Set<string>();
      for (const [index, seed] of seeds.entries()) {
        if (seen.has(seed.classId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [index, 'classId'],
            message: `duplicate classId ${seed.classId}`,
          });
        }
        seen.add(seed.classId);
      }
    })
  );

const RecyclerEnvSchema = z.object({
  RECYCLER_ADMIN_ID: z
    .string({ required_error: 'RECYCLER_ADMIN_ID must be set' })
    .trim()
    .min(1, 'RECYCLER_ADMIN_ID must not be empty'),
  RECYCLER_CUSTODY_ID: z.string().trim().min(1).default(DEFAULT_CUSTODY_ID),
  RECYCLER_MAX_POINTS_PER_UNIT: z.coerce
    .number()
    .int('RECYCLER_MAX_POINTS_PER_UNIT must be an integer')
    .positive('RECYCLER_MAX_POINTS_PER_UNIT must be positive')
    .max(Number.MAX_SAFE_INTEGER)
    .default(DEFAULT_MAX_POINTS_PER_UNIT),
  RECYCLER_CLASSES: AssetClassSeedsSchema,
});

export type RecyclerConfig = {
  adminId: string;
  custodyId: string;
  maxPointsPerUnit: number;
  classes: AssetClassSeed[];
};

export function loadRecyclerConfig(
  env: Record<string, string | undefined> = process.env
): RecyclerConfig {
  const parsed = RecyclerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid recycler configuration: ${details}`);
  }

  if (parsed.data.RECYCLER_CUSTODY_ID === parsed.data.RECYCLER_ADMIN_ID) {
    throw new Error('Invalid recycler configuration: custody and admin identities must differ');
  }

  return {
    adminId: parsed.data.RECYCLER_ADMIN_ID,
    custodyId: parsed.data.RECYCLER_CUSTODY_ID,
    maxPointsPerUnit: parsed.data.RECYCLER_MAX_POINTS_PER_UNIT,
    classes: parsed.data.RECYCLER_CLASSES,
  };
}
