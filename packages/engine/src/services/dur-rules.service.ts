import {
  REASON_FOR_SERVICE,
  addServiceDays,
  daysBetween,
  type AlertDrug,
  type ClaimHistoryEntry,
  type CurrentMedication,
  type DrugAgeAlert,
  type DrugDrugAlert,
  type DrugGenderAlert,
  type DrugIdentifier,
  type DurAlert,
  type EarlyRefillAlert,
  type Gender,
  type TherapeuticDuplicationAlert,
} from '@rxadjudicate/shared';
import { getConfig } from '../config.js';
import { InputValidationError } from '../lib/errors.js';
import type { IndexedInteraction, RuleSnapshot } from '../rules/rule-snapshot.js';
import type { RuleProvider } from '../rules/rule-store.js';
import { findLatestFill } from './claim-history.service.js';

export interface DurCheckInput {
  drug: DrugIdentifier;
  serviceDate: string;
  age?: number;
  gender: Gender;
  currentMedications: readonly CurrentMedication[];
  history: readonly ClaimHistoryEntry[];
}

function toAlertDrug(drug: { ndc: string; name?: string; classCode?: string }): AlertDrug {
  return { ndc: drug.ndc, name: drug.name, classCode: drug.classCode };
}

/**
 * Interactions where the new drug sits on one side of the pair and the
 * current medication on the other, in configuration order. A pair with the
 * same class on both sides is reported once.
 */
function interactionsBetween(snapshot: RuleSnapshot, newClass: string, currentClass: string): IndexedInteraction[] {
  const hits = [
    ...snapshot.interactionsByFirst
      .matchAll(newClass)
      .filter((h) => currentClass.startsWith(h.interaction.drug2ClassPrefix)),
    ...snapshot.interactionsBySecond
      .matchAll(newClass)
      .filter((h) => currentClass.startsWith(h.interaction.drug1ClassPrefix)),
  ].sort((a, b) => a.order - b.order);
  return hits.filter((hit, i) => i === 0 || hits[i - 1].order !== hit.order);
}

export function checkDrugDrugInteractions(
  snapshot: RuleSnapshot,
  drug: DrugIdentifier,
  currentMedications: readonly CurrentMedication[]
): DrugDrugAlert[] {
  const newClass = drug.classCode;
  if (!newClass) return [];

  const alerts: DrugDrugAlert[] = [];
  for (const med of currentMedications) {
    for (const { interaction } of interactionsBetween(snapshot, newClass, med.classCode)) {
      alerts.push({
        type: 'DRUG_DRUG',
        significance: interaction.significance,
        drug: toAlertDrug(drug),
        interactingDrug: toAlertDrug(med),
        interactionId: interaction.interactionId,
        clinicalEffect: interaction.clinicalEffect,
        message: interaction.description,
        recommendation: interaction.recommendation,
        reasonForService: REASON_FOR_SERVICE.DRUG_DRUG,
      });
    }
  }
  return alerts;
}

export function checkTherapeuticDuplication(
  snapshot: RuleSnapshot,
  drug: DrugIdentifier,
  currentMedications: readonly CurrentMedication[]
): TherapeuticDuplicationAlert[] {
  const newClass = drug.classCode;
  if (!newClass) return [];

  const alerts: TherapeuticDuplicationAlert[] = [];
  for (const group of snapshot.duplications.matchAll(newClass)) {
    const sameClass = currentMedications.filter(
      (med) => med.ndc !== drug.ndc && med.classCode.startsWith(group.classPrefix)
    );
    if (sameClass.length === 0 || sameClass.length < group.maxConcurrent) continue;

    for (const existing of sameClass) {
      alerts.push({
        type: 'THERAPEUTIC_DUPLICATION',
        significance: group.significance,
        drug: toAlertDrug(drug),
        duplicateDrug: toAlertDrug(existing),
        duplicationId: group.duplicationId,
        message: `Therapeutic duplication: ${group.className}`,
        recommendation: `Maximum ${group.maxConcurrent} concurrent`,
        reasonForService: REASON_FOR_SERVICE.THERAPEUTIC_DUPLICATION,
      });
    }
  }
  return alerts;
}

/**
 * Compares the new fill against the most recent earlier fill of the same
 * exact code. `graceDays` lets a refill that early or less through.
 */
export function checkEarlyRefill(
  drug: DrugIdentifier,
  serviceDate: string,
  history: readonly ClaimHistoryEntry[],
  graceDays = 0
): EarlyRefillAlert | null {
  const lastFill = findLatestFill(history, drug.ndc, serviceDate);
  if (!lastFill) return null;

  const expectedExhaustionDate = addServiceDays(lastFill.serviceDate, lastFill.daysSupply);
  const daysEarly = daysBetween(serviceDate, expectedExhaustionDate);
  if (daysEarly <= 0 || daysEarly <= graceDays) return null;

  return {
    type: 'EARLY_REFILL',
    significance: 3,
    drug: toAlertDrug(drug),
    daysEarly,
    previousFillDate: lastFill.serviceDate,
    expectedExhaustionDate,
    message: `Refill ${daysEarly} days early`,
    recommendation: 'Wait until medication supply is lower',
    reasonForService: REASON_FOR_SERVICE.EARLY_REFILL,
  };
}

/** Drugs without a configured restriction never alert. */
export function checkAgeRestriction(
  snapshot: RuleSnapshot,
  drug: DrugIdentifier,
  age: number | undefined
): DrugAgeAlert | null {
  const restrictions = snapshot.ageRestrictions.match(drug);
  if (restrictions.length === 0) return null;
  if (age === undefined) {
    throw new InputValidationError(`Patient age is required to check age restrictions for ${drug.ndc}`, {
      restrictionIds: restrictions.map((r) => r.restrictionId),
    });
  }

  for (const restriction of restrictions) {
    const { minAge, maxAge } = restriction;
    const violated = (minAge !== undefined && age < minAge) || (maxAge !== undefined && age > maxAge);
    if (!violated) continue;

    return {
      type: 'DRUG_AGE',
      significance: restriction.significance,
      drug: toAlertDrug(drug),
      restrictionId: restriction.restrictionId,
      patientAge: age,
      minAge,
      maxAge,
      message: restriction.message,
      recommendation: `Patient age ${age} outside range ${minAge ?? 0}-${maxAge ?? 'unlimited'}`,
      reasonForService: REASON_FOR_SERVICE.DRUG_AGE,
    };
  }
  return null;
}

export function checkGenderRestriction(
  snapshot: RuleSnapshot,
  drug: DrugIdentifier,
  gender: Gender
): DrugGenderAlert | null {
  const restriction = snapshot.genderRestrictions.match(drug).find((r) => r.allowedGender !== gender);
  if (!restriction) return null;

  return {
    type: 'DRUG_GENDER',
    significance: restriction.significance,
    drug: toAlertDrug(drug),
    restrictionId: restriction.restrictionId,
    patientGender: gender,
    allowedGender: restriction.allowedGender,
    message: restriction.message,
    recommendation: `Drug intended for gender: ${restriction.allowedGender}`,
    reasonForService: REASON_FOR_SERVICE.DRUG_GENDER,
  };
}

export interface DurCheckResults {
  drugDrug: DrugDrugAlert[];
  duplication: TherapeuticDuplicationAlert[];
  earlyRefill: EarlyRefillAlert | null;
  age: DrugAgeAlert | null;
  gender: DrugGenderAlert | null;
}

/** Run all five checks against one snapshot. None of them depends on another. */
export function runDurChecks(snapshot: RuleSnapshot, input: DurCheckInput, earlyRefillGraceDays = 0): DurCheckResults {
  return {
    drugDrug: checkDrugDrugInteractions(snapshot, input.drug, input.currentMedications),
    duplication: checkTherapeuticDuplication(snapshot, input.drug, input.currentMedications),
    earlyRefill: checkEarlyRefill(input.drug, input.serviceDate, input.history, earlyRefillGraceDays),
    age: checkAgeRestriction(snapshot, input.drug, input.age),
    gender: checkGenderRestriction(snapshot, input.drug, input.gender),
  };
}

export function collectAlerts(results: DurCheckResults): DurAlert[] {
  const alerts: DurAlert[] = [...results.drugDrug, ...results.duplication];
  if (results.earlyRefill) alerts.push(results.earlyRefill);
  if (results.age) alerts.push(results.age);
  if (results.gender) alerts.push(results.gender);
  return alerts;
}

export class DurRulesEngine {
  constructor(
    private readonly rules: RuleProvider,
    private readonly earlyRefillGraceDays: number = getConfig().dur.earlyRefillGraceDays
  ) {}

  check(input: DurCheckInput): DurAlert[] {
    return collectAlerts(runDurChecks(this.rules.current(), input, this.earlyRefillGraceDays));
  }
}
