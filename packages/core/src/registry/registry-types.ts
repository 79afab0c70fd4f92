/**
 * Registry Domain Types
 */

export type ClassStatus = 'active' | 'inactive';

/**
 * Configuration of one registered asset class.
 * registeredAt > 0 iff the class was ever registered.
 */
export interface AssetClassConfig {
  classId: string;
  pointsPerUnit: number;
  active: boolean;
  totalRecycled: number;
  registeredAt: number;
  updatedAt: number;
}

export interface AssetClassSnapshot extends AssetClassConfig {
  status: ClassStatus;
}

export interface RegisterClassParams {
  actor: string;
  classId: string;
  pointsPerUnit: number;
}

export interface UpdateRateParams {
  actor: string;
  classId: string;
  pointsPerUnit: number;
}

export interface SetActiveParams {
  actor: string;
  classId: string;
  active: boolean;
}

export interface RegistryLimits {
  maxPointsPerUnit: number;
}

export const DEFAULT_MAX_POINTS_PER_UNIT = 1_000_000;
