/**
 * Query Domain Types
 */

export interface RecyclerStats {
  totalRecyclings: number;
  totalPointsGenerated: number;
  activeClassCount: number;
}

export interface Eligibility {
  eligible: boolean;
  reason: string;
}

export const ELIGIBILITY_REASONS = {
  eligible: 'Eligible',
  paused: 'Recycling is paused',
  invalidInput: 'Actor, asset class and unit id are required',
  notRegistered: 'Asset class not registered',
  notActive: 'Asset class not active',
  unitNotFound: 'Unit does not exist',
  notOwner: 'Not owner of unit',
} as const;
