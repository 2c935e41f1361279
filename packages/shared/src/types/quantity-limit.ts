import type { QuantityLimitType } from '../schemas/rule-config.schema.js';

export interface QuantityLimitResult {
  passed: boolean;
  limitId?: string;
  limitType?: QuantityLimitType;

  requestedQuantity: number;
  allowedQuantity: number;
  maxQuantity?: number;

  requestedDaysSupply: number;
  allowedDaysSupply: number;
  maxDaysSupply?: number;

  // Accumulating limits only
  quantityUsedInPeriod: number;
  quantityRemainingInPeriod?: number;

  message: string;
}

/** The governing result plus every individual limit evaluation behind it. */
export interface QuantityLimitCheck extends QuantityLimitResult {
  evaluations: QuantityLimitResult[];
  notes: string[];
}
