import type {
  ClaimHistoryEntry,
  DrugIdentifier,
  DrugTarget,
  StepTherapyProtocol,
  StepTherapyResult,
  StepTherapyStep,
} from '@rxadjudicate/shared';
import { describeTarget, matchesTarget } from '../matching/drug-rule-index.js';
import type { RuleSnapshot } from '../rules/rule-snapshot.js';
import type { RuleProvider } from '../rules/rule-store.js';
import { fillsWithin } from './claim-history.service.js';

function targetSatisfied(step: StepTherapyStep, target: DrugTarget, history: readonly ClaimHistoryEntry[]): boolean {
  const fills = history.filter((entry) => matchesTarget(target, entry));
  if (fills.length === 0) return false;
  const totalDays = fills.reduce((sum, entry) => sum + entry.daysSupply, 0);
  return totalDays >= step.minimumDays && fills.length >= step.minimumFills;
}

/**
 * Walk the protocol's steps in order and stop at the first one no required
 * drug satisfies.
 */
export function checkProtocol(
  protocol: StepTherapyProtocol,
  drug: DrugIdentifier,
  history: readonly ClaimHistoryEntry[],
  serviceDate: string
): StepTherapyResult {
  const relevant = fillsWithin(history, protocol.lookbackDays, serviceDate, () => true);
  const steps = [...protocol.steps].sort((a, b) => a.stepNumber - b.stepNumber);

  const completedSteps: number[] = [];
  let failed: StepTherapyStep | undefined;
  for (const step of steps) {
    if (!step.requiredDrugs.some((target) => targetSatisfied(step, target, relevant))) {
      failed = step;
      break;
    }
    completedSteps.push(step.stepNumber);
  }

  if (!failed) {
    return {
      protocolId: protocol.protocolId,
      targetNdc: drug.ndc,
      satisfied: true,
      completedSteps,
      requiredDrugs: [],
      message: 'Step therapy requirements satisfied',
    };
  }

  const requiredDrugs = failed.requiredDrugs.map(describeTarget);
  return {
    protocolId: protocol.protocolId,
    targetNdc: drug.ndc,
    satisfied: false,
    completedSteps,
    failedStep: failed.stepNumber,
    requiredDrugs,
    message: `Step therapy not satisfied: ${failed.stepName} required. Try one of: ${requiredDrugs.join(', ')}`,
  };
}

/**
 * Every protocol targeting the drug must be satisfied. Returns the first
 * unsatisfied one in configuration order, otherwise the first protocol's
 * result; null when no protocol targets the drug.
 */
export function evaluateStepTherapy(
  snapshot: RuleSnapshot,
  drug: DrugIdentifier,
  history: readonly ClaimHistoryEntry[],
  serviceDate: string
): StepTherapyResult | null {
  const results = snapshot.stepTherapy.match(drug).map((protocol) => checkProtocol(protocol, drug, history, serviceDate));
  return results.find((result) => !result.satisfied) ?? results[0] ?? null;
}

export class StepTherapyChecker {
  constructor(private readonly rules: RuleProvider) {}

  checkStepTherapy(
    drug: DrugIdentifier,
    history: readonly ClaimHistoryEntry[],
    serviceDate: string
  ): StepTherapyResult | null {
    return evaluateStepTherapy(this.rules.current(), drug, history, serviceDate);
  }
}
