import {
  ClinicalContextSchema,
  type ClinicalContext,
  type ClinicalCriteriaSet,
  type ClinicalCriterion,
  type CriteriaEvaluationResult,
  type CriterionResult,
  type DrugIdentifier,
  type PriorTherapy,
} from '@rxadjudicate/shared';
import { InputValidationError } from '../lib/errors.js';
import type { RuleProvider } from '../rules/rule-store.js';

type CriterionOf<T extends ClinicalCriterion['type']> = Extract<ClinicalCriterion, { type: T }>;

function assertNever(value: never): never {
  throw new Error(`Unhandled criterion: ${JSON.stringify(value)}`);
}

/** ICD-10 codes compare without the dot and case-insensitively ("e11.9" matches "E11"). */
function normalizeDiagnosis(code: string): string {
  return code.replace(/\./g, '').toUpperCase();
}

function checkDiagnosis(criterion: CriterionOf<'DIAGNOSIS'>, context: ClinicalContext): boolean {
  const codes = (context.diagnosisCodes ?? []).map(normalizeDiagnosis);
  const required = criterion.diagnosisCodes.map(normalizeDiagnosis);
  return codes.some((code) => required.some((prefix) => code.startsWith(prefix)));
}

function therapyMatches(required: string, therapy: PriorTherapy): boolean {
  const wanted = required.toLowerCase();
  if (therapy.name.toLowerCase() === wanted) return true;
  if (!therapy.code) return false;
  if (therapy.code.toLowerCase() === wanted) return true;
  // Numeric entries are class-code prefixes.
  return /^\d+$/.test(required) && therapy.code.startsWith(required);
}

function checkPreviousTherapy(criterion: CriterionOf<'PREVIOUS_THERAPY'>, context: ClinicalContext): boolean {
  const { minimumDays } = criterion;
  return (context.priorTherapies ?? []).some((therapy) => {
    if (!criterion.requiredTherapies.some((required) => therapyMatches(required, therapy))) return false;
    if (minimumDays === undefined) return true;
    return therapy.daysOnTherapy !== undefined && therapy.daysOnTherapy >= minimumDays;
  });
}

function checkAge(criterion: CriterionOf<'AGE'>, context: ClinicalContext): boolean {
  const { age } = context;
  if (age === undefined) {
    throw new InputValidationError(`Criterion ${criterion.criterionId} needs the member's age`, {
      criterionId: criterion.criterionId,
      field: 'age',
    });
  }
  if (criterion.minAge !== undefined && age < criterion.minAge) return false;
  return !(criterion.maxAge !== undefined && age > criterion.maxAge);
}

function checkSpecialist(criterion: CriterionOf<'SPECIALIST'>, context: ClinicalContext): boolean {
  const specialty = context.prescriberSpecialty?.toLowerCase();
  if (!specialty) return false;
  return criterion.specialties.some((s) => s.toLowerCase() === specialty);
}

function findLabValue(labResults: Record<string, number> | undefined, labName: string): number | undefined {
  if (!labResults) return undefined;
  if (Object.hasOwn(labResults, labName)) return labResults[labName];
  const wanted = labName.toLowerCase();
  const key = Object.keys(labResults).find((k) => k.toLowerCase() === wanted);
  return key === undefined ? undefined : labResults[key];
}

function checkLabResult(criterion: CriterionOf<'LAB_RESULT'>, context: ClinicalContext): boolean {
  const value = findLabValue(context.labResults, criterion.labName);
  if (value === undefined) return false;
  if (criterion.minValue !== undefined && value < criterion.minValue) return false;
  return !(criterion.maxValue !== undefined && value > criterion.maxValue);
}

function checkQuantity(criterion: CriterionOf<'QUANTITY'>, context: ClinicalContext): boolean {
  const { maxQuantity, maxDaysSupply } = criterion;
  const { requestedQuantity, requestedDaysSupply } = context;
  if (maxQuantity !== undefined && requestedQuantity === undefined) {
    throw new InputValidationError(`Criterion ${criterion.criterionId} needs the requested quantity`, {
      criterionId: criterion.criterionId,
      field: 'requestedQuantity',
    });
  }
  if (maxDaysSupply !== undefined && requestedDaysSupply === undefined) {
    throw new InputValidationError(`Criterion ${criterion.criterionId} needs the requested days supply`, {
      criterionId: criterion.criterionId,
      field: 'requestedDaysSupply',
    });
  }
  if (maxQuantity !== undefined && requestedQuantity !== undefined && requestedQuantity > maxQuantity) return false;
  return !(maxDaysSupply !== undefined && requestedDaysSupply !== undefined && requestedDaysSupply > maxDaysSupply);
}

export function evaluateCriterion(criterion: ClinicalCriterion, context: ClinicalContext): boolean {
  switch (criterion.type) {
    case 'DIAGNOSIS':
      return checkDiagnosis(criterion, context);
    case 'PREVIOUS_THERAPY':
      return checkPreviousTherapy(criterion, context);
    case 'AGE':
      return checkAge(criterion, context);
    case 'SPECIALIST':
      return checkSpecialist(criterion, context);
    case 'LAB_RESULT':
      return checkLabResult(criterion, context);
    case 'QUANTITY':
      return checkQuantity(criterion, context);
    default:
      return assertNever(criterion);
  }
}

/** All criteria must hold. An empty set is met. */
export function evaluateCriteriaSet(set: ClinicalCriteriaSet, context: ClinicalContext): CriteriaEvaluationResult {
  const details: CriterionResult[] = set.criteria.map((criterion) => ({
    criterionId: criterion.criterionId,
    type: criterion.type,
    description: criterion.description,
    met: evaluateCriterion(criterion, context),
  }));
  const unmet = details.filter((d) => !d.met);

  return {
    criteriaSetId: set.criteriaSetId,
    met: unmet.length === 0,
    evaluatedCount: details.length,
    metCount: details.length - unmet.length,
    unmetDescriptions: unmet.map((d) => d.description),
    details,
  };
}

export class ClinicalCriteriaEvaluator {
  constructor(private readonly rules: RuleProvider) {}

  evaluate(set: ClinicalCriteriaSet, context: ClinicalContext): CriteriaEvaluationResult {
    const parsed = ClinicalContextSchema.safeParse(context);
    if (!parsed.success) {
      throw new InputValidationError('Invalid clinical context', parsed.error.flatten().fieldErrors);
    }
    return evaluateCriteriaSet(set, parsed.data);
  }

  /** Exact code first, then the longest matching class prefix. */
  findCriteriaSet(drug: DrugIdentifier): ClinicalCriteriaSet | undefined {
    return this.rules.current().criteriaSets.mostSpecific(drug);
  }

  /** Null when no criteria set is configured for the drug. */
  evaluateForDrug(drug: DrugIdentifier, context: ClinicalContext): CriteriaEvaluationResult | null {
    const set = this.findCriteriaSet(drug);
    return set ? this.evaluate(set, context) : null;
  }
}
