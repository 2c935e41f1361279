import type { DurAlertType } from '../types/dur.js';

/** NCPDP DUR Reason for Service codes, keyed by the alert that raises them. */
export const REASON_FOR_SERVICE = {
  DRUG_DRUG: 'MA',
  THERAPEUTIC_DUPLICATION: 'TD',
  EARLY_REFILL: 'ER',
  DRUG_AGE: 'PA',
  DRUG_GENDER: 'PG',
} as const satisfies Record<DurAlertType, string>;

export type ReasonForServiceCode = (typeof REASON_FOR_SERVICE)[DurAlertType];

export const PROFESSIONAL_SERVICE_CODES = {
  M0: 'Prescriber consulted',
  R0: 'Pharmacist consulted other source',
  P0: 'Patient consulted',
  CC: 'Coordination of care',
  MR: 'Medication review',
} as const;

export type ProfessionalServiceCode = keyof typeof PROFESSIONAL_SERVICE_CODES;

export const RESULT_OF_SERVICE_CODES = {
  '1A': 'Filled as is, false positive',
  '1B': 'Filled prescription as is',
  '1C': 'Filled with different dose',
  '1D': 'Filled with different directions',
  '1E': 'Filled with different drug',
  '1F': 'Filled with different quantity',
  '1G': 'Filled with prescriber approval',
  '2A': 'Prescription not filled',
} as const;

export type ResultOfServiceCode = keyof typeof RESULT_OF_SERVICE_CODES;

/**
 * Professional service / result of service pairs accepted on a DUR override.
 * Anything outside this table is rejected.
 */
export const VALID_OVERRIDE_COMBINATIONS: Readonly<
  Record<ProfessionalServiceCode, readonly ResultOfServiceCode[]>
> = {
  M0: ['1B', '1C', '1D', '1E', '1F', '1G', '2A'],
  R0: ['1A', '1B', '1C', '1D', '1F'],
  P0: ['1A', '1B', '1F', '2A'],
  CC: ['1B', '1G', '2A'],
  MR: ['1A', '1B', '2A'],
};

export const REJECT_CODES = {
  PRIOR_AUTH_REQUIRED: { code: '75', description: 'Prior Authorization Required' },
  PLAN_LIMITATIONS_EXCEEDED: { code: '76', description: 'Plan Limitations Exceeded' },
  DUR_REJECT: { code: '88', description: 'DUR Reject Error' },
  STEP_THERAPY_REQUIRED: {
    code: '608',
    description: 'Step Therapy, Alternate Drug Therapy Required Prior To Use Of Submitted Product Service ID',
  },
} as const;

export const CLINICAL_SIGNIFICANCE_LABELS = {
  1: 'MAJOR',
  2: 'MODERATE',
  3: 'MINOR',
} as const;

export const DUR_ALERT_LABELS = {
  DRUG_DRUG: 'Drug-Drug Interaction',
  THERAPEUTIC_DUPLICATION: 'Therapeutic Duplication',
  EARLY_REFILL: 'Early Refill',
  DRUG_AGE: 'Age Precaution',
  DRUG_GENDER: 'Gender Precaution',
} as const satisfies Record<DurAlertType, string>;

export function isProfessionalServiceCode(code: string): code is ProfessionalServiceCode {
  return Object.hasOwn(PROFESSIONAL_SERVICE_CODES, code);
}

export function isResultOfServiceCode(code: string): code is ResultOfServiceCode {
  return Object.hasOwn(RESULT_OF_SERVICE_CODES, code);
}

export function isReasonForServiceCode(code: string): code is ReasonForServiceCode {
  return Object.values<string>(REASON_FOR_SERVICE).includes(code);
}
