// Types
export type {
  QuantityLimitResult,
  QuantityLimitCheck,
} from './types/quantity-limit.js';

export type {
  DurAlertType,
  AlertDrug,
  DrugDrugAlert,
  TherapeuticDuplicationAlert,
  EarlyRefillAlert,
  DrugAgeAlert,
  DrugGenderAlert,
  DurAlert,
  DurOverride,
  DurOverrideCodes,
  OverrideValidation,
  DurSummary,
  DurValidationResult,
  NcpdpDurResponse,
} from './types/dur.js';

export type { CriterionResult, CriteriaEvaluationResult } from './types/criteria.js';

export type { StepTherapyResult } from './types/step-therapy.js';

export type {
  PriorAuthStatus,
  PriorAuthRequest,
  PriorAuthResponse,
  PriorAuthStatusChange,
  PriorAuthRecord,
} from './types/prior-auth.js';

export type { AdjudicationOutcome, RejectCode, AdjudicationResult } from './types/adjudication.js';

// Schemas
export {
  ServiceDateSchema,
  ClassCodeSchema,
  GenderSchema,
  DrugIdentifierSchema,
  ClaimHistoryEntrySchema,
  ClaimHistorySchema,
  CurrentMedicationSchema,
  PriorTherapySchema,
  ClinicalContextSchema,
  MemberContextSchema,
  PharmacyClaimSchema,
} from './schemas/claim.schema.js';
export type {
  Gender,
  DrugIdentifier,
  ClaimHistoryEntry,
  CurrentMedication,
  PriorTherapy,
  ClinicalContext,
  MemberContext,
  PharmacyClaim,
} from './schemas/claim.schema.js';

export {
  QUANTITY_LIMIT_TYPES,
  ClinicalSignificanceSchema,
  DrugTargetSchema,
  DrugInteractionSchema,
  DuplicationGroupSchema,
  AgeRestrictionSchema,
  GenderRestrictionSchema,
  QuantityLimitSchema,
  ClinicalCriterionSchema,
  ClinicalCriteriaSetSchema,
  StepTherapyStepSchema,
  StepTherapyProtocolSchema,
  PriorAuthRequiredDrugSchema,
  RuleConfigSchema,
} from './schemas/rule-config.schema.js';
export type {
  ClinicalSignificance,
  DrugTarget,
  DrugInteraction,
  DuplicationGroup,
  AgeRestriction,
  GenderRestriction,
  QuantityLimitType,
  QuantityLimit,
  ClinicalCriterion,
  ClinicalCriterionType,
  ClinicalCriteriaSet,
  StepTherapyStep,
  StepTherapyProtocol,
  PriorAuthRequiredDrug,
  RuleConfig,
  RuleConfigInput,
} from './schemas/rule-config.schema.js';

export {
  PriorAuthUrgencySchema,
  PriorAuthRequestTypeSchema,
  PriorAuthRequestInputSchema,
  PriorAuthDenialReasonSchema,
} from './schemas/prior-auth.schema.js';
export type {
  PriorAuthUrgency,
  PriorAuthRequestType,
  PriorAuthDenialReason,
  PriorAuthRequestInput,
} from './schemas/prior-auth.schema.js';

// Constants
export {
  REASON_FOR_SERVICE,
  PROFESSIONAL_SERVICE_CODES,
  RESULT_OF_SERVICE_CODES,
  VALID_OVERRIDE_COMBINATIONS,
  REJECT_CODES,
  CLINICAL_SIGNIFICANCE_LABELS,
  DUR_ALERT_LABELS,
  isProfessionalServiceCode,
  isResultOfServiceCode,
  isReasonForServiceCode,
} from './constants/ncpdp.js';
export type {
  ReasonForServiceCode,
  ProfessionalServiceCode,
  ResultOfServiceCode,
} from './constants/ncpdp.js';

// Utils
export {
  isValidServiceDate,
  parseServiceDate,
  toServiceDate,
  addServiceDays,
  daysBetween,
  isWithinLookback,
  toNcpdpDate,
} from './utils/date.js';
