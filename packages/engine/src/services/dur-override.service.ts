import { randomUUID } from 'node:crypto';
import {
  VALID_OVERRIDE_COMBINATIONS,
  isProfessionalServiceCode,
  isReasonForServiceCode,
  isResultOfServiceCode,
  type DurAlert,
  type DurOverride,
  type DurOverrideCodes,
  type DurValidationResult,
  type OverrideValidation,
} from '@rxadjudicate/shared';
import { OperatorMisuseError } from '../lib/errors.js';
import { moduleLogger, type Logger } from '../lib/logger.js';

/** Check override codes against the closed NCPDP code sets and the allowed pairs. */
export function validateOverride(codes: DurOverrideCodes): OverrideValidation {
  const { reasonForService, professionalService, resultOfService } = codes;
  if (reasonForService !== undefined && !isReasonForServiceCode(reasonForService)) {
    return { valid: false, reason: `Invalid reason for service code: ${reasonForService}` };
  }
  if (!isProfessionalServiceCode(professionalService)) {
    return { valid: false, reason: `Invalid professional service code: ${professionalService}` };
  }
  if (!isResultOfServiceCode(resultOfService)) {
    return { valid: false, reason: `Invalid result of service code: ${resultOfService}` };
  }
  if (!VALID_OVERRIDE_COMBINATIONS[professionalService].includes(resultOfService)) {
    return {
      valid: false,
      reason: `Result of service ${resultOfService} is not valid with professional service ${professionalService}`,
    };
  }
  return { valid: true, reason: 'Override valid' };
}

/** True when every level-1 alert has an override recorded for its alert type. */
export function isCoveredByOverrides(alerts: readonly DurAlert[], overrides: readonly DurOverride[]): boolean {
  return alerts
    .filter((alert) => alert.significance === 1)
    .every((alert) => overrides.some((o) => o.alertType === alert.type));
}

export interface DurOverrideManagerOptions {
  now?: () => Date;
  logger?: Logger;
}

/**
 * Records pharmacist overrides per claim. The ledger is append-only and
 * recording an override never touches the alert it answers.
 */
export class DurOverrideManager {
  private readonly ledger = new Map<string, DurOverride[]>();
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(options: DurOverrideManagerOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? moduleLogger('dur-override');
  }

  validateOverride(codes: DurOverrideCodes): OverrideValidation {
    return validateOverride(codes);
  }

  createOverride(
    claimId: string,
    alert: DurAlert,
    codes: Omit<DurOverrideCodes, 'reasonForService'>,
    actorId: string,
    notes?: string
  ): DurOverride {
    const validation = validateOverride({ ...codes, reasonForService: alert.reasonForService });
    const { professionalService, resultOfService } = codes;
    if (
      !validation.valid ||
      !isProfessionalServiceCode(professionalService) ||
      !isResultOfServiceCode(resultOfService)
    ) {
      this.log.warn({ claimId, alertType: alert.type, professionalService, resultOfService }, 'Override rejected');
      throw new OperatorMisuseError(validation.reason, { claimId, alertType: alert.type });
    }

    const override: DurOverride = {
      overrideId: randomUUID(),
      claimId,
      alertType: alert.type,
      reasonForService: alert.reasonForService,
      professionalService,
      resultOfService,
      actorId,
      overriddenAt: this.now().toISOString(),
      notes,
    };
    const entries = this.ledger.get(claimId) ?? [];
    entries.push(override);
    this.ledger.set(claimId, entries);
    this.log.info({ claimId, overrideId: override.overrideId, alertType: alert.type }, 'Override recorded');
    return override;
  }

  listOverrides(claimId: string): DurOverride[] {
    return [...(this.ledger.get(claimId) ?? [])];
  }

  /**
   * Attach overrides for the result's claim and recompute `canProceed`.
   * Alerts are carried over untouched.
   */
  applyOverrides(result: DurValidationResult, overrides: readonly DurOverride[]): DurValidationResult {
    const known = new Set(result.overrides.map((o) => o.overrideId));
    const merged = [
      ...result.overrides,
      ...overrides.filter((o) => o.claimId === result.claimId && !known.has(o.overrideId)),
    ];
    return {
      ...result,
      alerts: [...result.alerts],
      overrides: merged,
      canProceed: isCoveredByOverrides(result.alerts, merged),
    };
  }
}
