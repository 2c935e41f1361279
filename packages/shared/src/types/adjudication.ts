import type { DurValidationResult } from './dur.js';
import type { PriorAuthResponse } from './prior-auth.js';
import type { QuantityLimitCheck } from './quantity-limit.js';
import type { StepTherapyResult } from './step-therapy.js';

export type AdjudicationOutcome = 'PAYABLE' | 'OVERRIDE_REQUIRED' | 'PRIOR_AUTH_REQUIRED' | 'REJECTED';

export interface RejectCode {
  code: string;
  description: string;
}

export interface AdjudicationResult {
  claimId: string;
  outcome: AdjudicationOutcome;
  payableQuantity: number;
  allowedQuantity: number;
  rejectCodes: RejectCode[];
  quantityLimit: QuantityLimitCheck;
  dur: DurValidationResult;
  stepTherapy: StepTherapyResult | null;
  priorAuthRequired: boolean;
  existingAuthorization: PriorAuthResponse | null;
}
