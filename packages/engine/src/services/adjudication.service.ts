import {
  REJECT_CODES,
  type AdjudicationOutcome,
  type AdjudicationResult,
  type ClaimHistoryEntry,
  type DurValidationResult,
  type MemberContext,
  type PharmacyClaim,
  type PriorAuthResponse,
  type QuantityLimitCheck,
  type RejectCode,
  type StepTherapyResult,
} from '@rxadjudicate/shared';
import { getConfig } from '../config.js';
import { moduleLogger, type Logger } from '../lib/logger.js';
import type { RuleSnapshot } from '../rules/rule-snapshot.js';
import type { RuleProvider } from '../rules/rule-store.js';
import type { DurOverrideManager } from './dur-override.service.js';
import { evaluateDur, parseClaimInputs } from './dur-validator.service.js';
import type { PriorAuthWorkflow } from './prior-auth.service.js';
import { evaluateQuantityLimits } from './quantity-limit.service.js';
import { evaluateStepTherapy } from './step-therapy.service.js';

export interface ClaimAdjudicatorOptions {
  priorAuth?: PriorAuthWorkflow;
  overrides?: DurOverrideManager;
  earlyRefillGraceDays?: number;
  logger?: Logger;
}

/** A drug is PA-gated when it is listed as PA-required or has a criteria set. */
export function requiresPriorAuth(snapshot: RuleSnapshot, claim: PharmacyClaim): boolean {
  return snapshot.priorAuthRequired.match(claim.drug).length > 0 || snapshot.criteriaSets.match(claim.drug).length > 0;
}

interface Decision {
  outcome: AdjudicationOutcome;
  rejectCodes: RejectCode[];
}

/**
 * PA required outranks a quantity or step-therapy rejection, which outranks
 * a DUR override requirement. Reject codes list every failed gate.
 */
export function decideOutcome(
  priorAuthRequired: boolean,
  quantity: QuantityLimitCheck,
  stepTherapy: StepTherapyResult | null,
  dur: DurValidationResult
): Decision {
  const stepFailed = stepTherapy !== null && !stepTherapy.satisfied;
  const rejectCodes: RejectCode[] = [];
  if (priorAuthRequired) rejectCodes.push({ ...REJECT_CODES.PRIOR_AUTH_REQUIRED });
  if (!quantity.passed) rejectCodes.push({ ...REJECT_CODES.PLAN_LIMITATIONS_EXCEEDED });
  if (stepFailed) rejectCodes.push({ ...REJECT_CODES.STEP_THERAPY_REQUIRED });
  if (!dur.canProceed) rejectCodes.push({ ...REJECT_CODES.DUR_REJECT });

  let outcome: AdjudicationOutcome = 'PAYABLE';
  if (priorAuthRequired) outcome = 'PRIOR_AUTH_REQUIRED';
  else if (!quantity.passed || stepFailed) outcome = 'REJECTED';
  else if (!dur.canProceed) outcome = 'OVERRIDE_REQUIRED';
  return { outcome, rejectCodes };
}

/**
 * Runs quantity limits, DUR, step therapy and the PA gate for a claim
 * against a single rule snapshot and merges them into one decision.
 */
export class ClaimAdjudicator {
  private readonly log: Logger;
  private readonly earlyRefillGraceDays: number;

  constructor(
    private readonly rules: RuleProvider,
    private readonly options: ClaimAdjudicatorOptions = {}
  ) {
    this.log = options.logger ?? moduleLogger('adjudication');
    this.earlyRefillGraceDays = options.earlyRefillGraceDays ?? getConfig().dur.earlyRefillGraceDays;
  }

  adjudicateClaim(
    claim: PharmacyClaim,
    member: MemberContext,
    history: readonly ClaimHistoryEntry[]
  ): AdjudicationResult {
    const inputs = parseClaimInputs(claim, member, history);
    const snapshot = this.rules.current();
    const { drug, serviceDate } = inputs.claim;

    const quantityLimit = evaluateQuantityLimits(
      snapshot,
      {
        drug,
        requestedQuantity: inputs.claim.quantity,
        requestedDaysSupply: inputs.claim.daysSupply,
        claimHistory: inputs.history,
        serviceDate,
      },
      this.log
    );

    const overrides = this.options.overrides?.listOverrides(inputs.claim.claimId) ?? [];
    const dur = evaluateDur(
      snapshot,
      inputs.claim,
      inputs.member,
      inputs.history,
      overrides,
      this.earlyRefillGraceDays
    );

    const existingAuthorization: PriorAuthResponse | null =
      this.options.priorAuth?.checkExistingAuth(inputs.claim.memberId, drug.ndc, serviceDate) ?? null;
    const authNumber = inputs.claim.priorAuthNumber?.trim() ?? '';
    const authorized = existingAuthorization !== null || authNumber !== '';
    const priorAuthRequired = !authorized && requiresPriorAuth(snapshot, inputs.claim);

    // An authorization covers the step-therapy requirement.
    const stepTherapy = authorized ? null : evaluateStepTherapy(snapshot, drug, inputs.history, serviceDate);

    const { outcome, rejectCodes } = decideOutcome(priorAuthRequired, quantityLimit, stepTherapy, dur);
    this.log.info(
      { claimId: inputs.claim.claimId, outcome, rejectCodes: rejectCodes.map((r) => r.code), rulesVersion: snapshot.version },
      'Claim adjudicated'
    );

    return {
      claimId: inputs.claim.claimId,
      outcome,
      payableQuantity: outcome === 'PAYABLE' ? quantityLimit.allowedQuantity : 0,
      allowedQuantity: quantityLimit.allowedQuantity,
      rejectCodes,
      quantityLimit,
      dur,
      stepTherapy,
      priorAuthRequired,
      existingAuthorization,
    };
  }
}
