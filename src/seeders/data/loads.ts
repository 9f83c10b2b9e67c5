import type { Urgency } from '../../modules/negotiation/engine/types.js';

export interface LoadSeed {
  referenceNumber: string;
  loadboardRate: number;
  fuelSurcharge: number;
  urgency: Urgency;
}

/**
 * One load per urgency tier, plus one with a fuel surcharge.
 */
export const loadSeeds: LoadSeed[] = [
  { referenceNumber: 'LD-1001', loadboardRate: 2800, fuelSurcharge: 0, urgency: 'NORMAL' },
  { referenceNumber: 'LD-1002', loadboardRate: 1000, fuelSurcharge: 0, urgency: 'LOW' },
  { referenceNumber: 'LD-1003', loadboardRate: 1500, fuelSurcharge: 0, urgency: 'HIGH' },
  { referenceNumber: 'LD-1004', loadboardRate: 1000, fuelSurcharge: 0, urgency: 'CRITICAL' },
  { referenceNumber: 'LD-1005', loadboardRate: 2400, fuelSurcharge: 185.5, urgency: 'NORMAL' },
];
