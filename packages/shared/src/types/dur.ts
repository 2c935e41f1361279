import type { ClinicalSignificance } from '../schemas/rule-config.schema.js';
import type { Gender } from '../schemas/claim.schema.js';
import type {
  ProfessionalServiceCode,
  ReasonForServiceCode,
  ResultOfServiceCode,
} from '../constants/ncpdp.js';

export type DurAlertType =
  | 'DRUG_DRUG'
  | 'THERAPEUTIC_DUPLICATION'
  | 'EARLY_REFILL'
  | 'DRUG_AGE'
  | 'DRUG_GENDER';

export interface AlertDrug {
  ndc: string;
  name?: string;
  classCode?: string;
}

interface DurAlertBase {
  significance: ClinicalSignificance;
  drug: AlertDrug;
  message: string;
  recommendation: string;
  reasonForService: ReasonForServiceCode;
}

export interface DrugDrugAlert extends DurAlertBase {
  type: 'DRUG_DRUG';
  interactionId: string;
  interactingDrug: AlertDrug;
  clinicalEffect: string;
}

export interface TherapeuticDuplicationAlert extends DurAlertBase {
  type: 'THERAPEUTIC_DUPLICATION';
  duplicationId: string;
  duplicateDrug: AlertDrug;
}

export interface EarlyRefillAlert extends DurAlertBase {
  type: 'EARLY_REFILL';
  daysEarly: number;
  previousFillDate: string;
  expectedExhaustionDate: string;
}

export interface DrugAgeAlert extends DurAlertBase {
  type: 'DRUG_AGE';
  restrictionId: string;
  patientAge: number;
  minAge?: number;
  maxAge?: number;
}

export interface DrugGenderAlert extends DurAlertBase {
  type: 'DRUG_GENDER';
  restrictionId: string;
  patientGender: Gender;
  allowedGender: 'M' | 'F';
}

export type DurAlert =
  | DrugDrugAlert
  | TherapeuticDuplicationAlert
  | EarlyRefillAlert
  | DrugAgeAlert
  | DrugGenderAlert;

export interface DurOverride {
  overrideId: string;
  claimId: string;
  alertType: DurAlertType;
  reasonForService: ReasonForServiceCode;
  professionalService: ProfessionalServiceCode;
  resultOfService: ResultOfServiceCode;
  actorId: string;
  overriddenAt: string;
  notes?: string;
}

/** Codes submitted for an override before they are checked against the NCPDP tables. */
export interface DurOverrideCodes {
  reasonForService?: string;
  professionalService: string;
  resultOfService: string;
}

export interface OverrideValidation {
  valid: boolean;
  reason: string;
}

export interface DurSummary {
  total: number;
  major: number;
  moderate: number;
  minor: number;
}

export interface DurValidationResult {
  claimId: string;
  passed: boolean;
  requiresOverride: boolean;
  canProceed: boolean;
  alerts: DurAlert[];
  summary: DurSummary;
  messages: string[];
  overrides: DurOverride[];
}

/** Field layout of an NCPDP DUR/PPS response entry. */
export interface NcpdpDurResponse {
  reasonForService: string;
  clinicalSignificance: string;
  otherPharmacyIndicator: string;
  previousFillDate: string;
  quantityOfPreviousFill: string;
  databaseIndicator: string;
  otherPrescriberIndicator: string;
  conflictCode: string;
  interventionCode: string;
  outcomeCode: string;
}
