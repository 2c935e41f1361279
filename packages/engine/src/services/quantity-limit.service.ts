import { z } from 'zod';
import {
  ClaimHistorySchema,
  DrugIdentifierSchema,
  ServiceDateSchema,
  type ClaimHistoryEntry,
  type DrugIdentifier,
  type QuantityLimit,
  type QuantityLimitCheck,
  type QuantityLimitResult,
} from '@rxadjudicate/shared';
import { InputValidationError } from '../lib/errors.js';
import { moduleLogger, type Logger } from '../lib/logger.js';
import type { RuleProvider } from '../rules/rule-store.js';
import type { RuleSnapshot } from '../rules/rule-snapshot.js';
import { accumulateQuantity } from './claim-history.service.js';

const DEFAULT_PERIOD_DAYS = { PER_MONTH: 30, PER_YEAR: 365 } as const;

const QuantityRequestSchema = z.object({
  drug: DrugIdentifierSchema,
  requestedQuantity: z.number().nonnegative(),
  requestedDaysSupply: z.number().int().nonnegative(),
  claimHistory: ClaimHistorySchema,
  serviceDate: ServiceDateSchema,
});

export interface QuantityRequest {
  drug: DrugIdentifier;
  requestedQuantity: number;
  requestedDaysSupply: number;
  claimHistory: readonly ClaimHistoryEntry[];
  serviceDate: string;
}

type LimitEvaluation = { kind: 'evaluated'; result: QuantityLimitResult } | { kind: 'skipped'; note: string };

function baseResult(request: QuantityRequest, limit?: QuantityLimit): QuantityLimitResult {
  return {
    passed: true,
    limitId: limit?.limitId,
    limitType: limit?.limitType,
    requestedQuantity: request.requestedQuantity,
    allowedQuantity: request.requestedQuantity,
    maxQuantity: limit?.maxQuantity,
    requestedDaysSupply: request.requestedDaysSupply,
    allowedDaysSupply: request.requestedDaysSupply,
    maxDaysSupply: limit?.maxDaysSupply,
    quantityUsedInPeriod: 0,
    message: '',
  };
}

function skipped(limit: QuantityLimit, reason: string): LimitEvaluation {
  return { kind: 'skipped', note: `Limit ${limit.limitId} (${limit.limitType}) is non-binding: ${reason}` };
}

function checkPerFill(limit: QuantityLimit, request: QuantityRequest): LimitEvaluation {
  const { maxQuantity, maxDaysSupply } = limit;
  if (maxQuantity === undefined && maxDaysSupply === undefined) {
    return skipped(limit, 'neither maxQuantity nor maxDaysSupply is set');
  }
  const result = baseResult(request, limit);
  const problems: string[] = [];

  if (maxQuantity !== undefined && request.requestedQuantity > maxQuantity) {
    result.allowedQuantity = maxQuantity;
    problems.push(`Quantity exceeds limit of ${maxQuantity}`);
  }
  if (maxDaysSupply !== undefined && request.requestedDaysSupply > maxDaysSupply) {
    result.allowedDaysSupply = maxDaysSupply;
    problems.push(`Days supply exceeds limit of ${maxDaysSupply}`);
  }

  result.passed = problems.length === 0;
  result.message = result.passed ? 'Within per-fill limit' : problems.join('; ');
  return { kind: 'evaluated', result };
}

function checkMaxDaysSupply(limit: QuantityLimit, request: QuantityRequest): LimitEvaluation {
  const { maxDaysSupply } = limit;
  if (maxDaysSupply === undefined) return skipped(limit, 'maxDaysSupply is not set');

  const result = baseResult(request, limit);
  result.maxQuantity = undefined;
  if (request.requestedDaysSupply > maxDaysSupply) {
    result.passed = false;
    result.allowedDaysSupply = maxDaysSupply;
    result.message = `Days supply exceeds maximum of ${maxDaysSupply}`;
  } else {
    result.message = 'Within days supply limit';
  }
  return { kind: 'evaluated', result };
}

function checkPerDay(limit: QuantityLimit, request: QuantityRequest): LimitEvaluation {
  const { maxQuantity } = limit;
  if (maxQuantity === undefined) return skipped(limit, 'maxQuantity is not set');
  if (request.requestedDaysSupply === 0) return skipped(limit, 'request has no days supply');

  const ceiling = maxQuantity * request.requestedDaysSupply;
  const result = baseResult(request, limit);
  result.allowedQuantity = Math.min(request.requestedQuantity, ceiling);
  result.passed = request.requestedQuantity <= ceiling;
  result.message = result.passed
    ? 'Within daily limit'
    : `Exceeds daily limit of ${maxQuantity}. Allowed for ${request.requestedDaysSupply} days: ${ceiling}`;
  return { kind: 'evaluated', result };
}

function checkAccumulating(limit: QuantityLimit, request: QuantityRequest): LimitEvaluation {
  const { maxQuantity } = limit;
  if (maxQuantity === undefined) return skipped(limit, 'maxQuantity is not set');

  const periodDays =
    limit.periodDays ?? (limit.limitType === 'PER_YEAR' ? DEFAULT_PERIOD_DAYS.PER_YEAR : DEFAULT_PERIOD_DAYS.PER_MONTH);
  const used = accumulateQuantity(request.claimHistory, request.drug.ndc, periodDays, request.serviceDate);
  const remaining = Math.max(maxQuantity - used, 0);

  const result = baseResult(request, limit);
  result.maxDaysSupply = undefined;
  result.quantityUsedInPeriod = used;
  result.quantityRemainingInPeriod = remaining;
  result.allowedQuantity = Math.min(request.requestedQuantity, remaining);
  result.passed = request.requestedQuantity <= remaining;
  result.message = result.passed
    ? `Within ${periodDays}-day limit`
    : `Exceeds ${periodDays}-day limit. Used: ${used}, Max: ${maxQuantity}, Remaining: ${remaining}`;
  return { kind: 'evaluated', result };
}

function evaluateLimit(limit: QuantityLimit, request: QuantityRequest): LimitEvaluation {
  switch (limit.limitType) {
    case 'PER_FILL':
      return checkPerFill(limit, request);
    case 'MAX_DAYS_SUPPLY':
      return checkMaxDaysSupply(limit, request);
    case 'PER_DAY':
      return checkPerDay(limit, request);
    case 'PER_MONTH':
    case 'PER_YEAR':
      return checkAccumulating(limit, request);
  }
}

/**
 * Pick the governing result: the first failure in configuration order,
 * otherwise the passing result with the smallest allowed quantity (ties go
 * to the earlier limit).
 */
export function selectGoverningResult(results: readonly QuantityLimitResult[]): QuantityLimitResult | undefined {
  const failure = results.find((r) => !r.passed);
  if (failure) return failure;
  return results.reduce<QuantityLimitResult | undefined>(
    (best, r) => (best === undefined || r.allowedQuantity < best.allowedQuantity ? r : best),
    undefined
  );
}

/** Evaluate every limit that applies to the requested drug against one snapshot. */
export function evaluateQuantityLimits(
  snapshot: RuleSnapshot,
  request: QuantityRequest,
  log?: Logger
): QuantityLimitCheck {
  if (request.requestedQuantity === 0) {
    return { ...baseResult(request), message: 'Zero quantity requested', evaluations: [], notes: [] };
  }

  const limits = snapshot.quantityLimits.match(request.drug);
  if (limits.length === 0) {
    return { ...baseResult(request), message: 'No quantity limits apply', evaluations: [], notes: [] };
  }

  const evaluations: QuantityLimitResult[] = [];
  const notes: string[] = [];
  for (const limit of limits) {
    const outcome = evaluateLimit(limit, request);
    if (outcome.kind === 'skipped') {
      notes.push(outcome.note);
      log?.warn({ limitId: limit.limitId, limitType: limit.limitType }, outcome.note);
    } else {
      evaluations.push(outcome.result);
    }
  }

  const governing = selectGoverningResult(evaluations);
  if (!governing) {
    return { ...baseResult(request), message: 'No binding quantity limits apply', evaluations, notes };
  }
  return { ...governing, evaluations, notes };
}

/**
 * Quantity and days-supply limits for a claim. Reads the current rule
 * snapshot once per check.
 */
export class QuantityLimitEngine {
  private readonly log: Logger;

  constructor(
    private readonly rules: RuleProvider,
    logger?: Logger
  ) {
    this.log = logger ?? moduleLogger('quantity-limit');
  }

  check(
    drug: DrugIdentifier,
    requestedQuantity: number,
    requestedDaysSupply: number,
    claimHistory: readonly ClaimHistoryEntry[],
    serviceDate: string
  ): QuantityLimitCheck {
    const parsed = QuantityRequestSchema.safeParse({
      drug,
      requestedQuantity,
      requestedDaysSupply,
      claimHistory,
      serviceDate,
    });
    if (!parsed.success) {
      throw new InputValidationError('Invalid quantity limit request', parsed.error.flatten().fieldErrors);
    }
    return evaluateQuantityLimits(this.rules.current(), parsed.data, this.log);
  }
}
