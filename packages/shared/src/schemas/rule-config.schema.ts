import { z } from 'zod';
import { ClassCodeSchema } from './claim.schema.js';

export const QUANTITY_LIMIT_TYPES = ['PER_FILL', 'PER_DAY', 'PER_MONTH', 'PER_YEAR', 'MAX_DAYS_SUPPLY'] as const;

export const ClinicalSignificanceSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);

/** A rule targets either one exact product code or every drug under a class prefix. */
export const DrugTargetSchema = z.union([
  z.object({ ndc: z.string().min(1) }).strict(),
  z.object({ classPrefix: ClassCodeSchema }).strict(),
]);

export const DrugInteractionSchema = z.object({
  interactionId: z.string().min(1),
  drug1ClassPrefix: ClassCodeSchema,
  drug2ClassPrefix: ClassCodeSchema,
  drug1Name: z.string(),
  drug2Name: z.string(),
  description: z.string(),
  clinicalEffect: z.string(),
  significance: ClinicalSignificanceSchema,
  recommendation: z.string(),
  documentationLevel: z.enum(['GOOD', 'FAIR', 'POOR']).default('GOOD'),
});

export const DuplicationGroupSchema = z.object({
  duplicationId: z.string().min(1),
  classPrefix: ClassCodeSchema,
  className: z.string(),
  maxConcurrent: z.number().int().positive().default(1),
  significance: ClinicalSignificanceSchema.default(2),
});

export const AgeRestrictionSchema = z
  .object({
    restrictionId: z.string().min(1),
    drug: DrugTargetSchema,
    drugName: z.string(),
    minAge: z.number().int().nonnegative().optional(),
    maxAge: z.number().int().nonnegative().optional(),
    significance: ClinicalSignificanceSchema.default(2),
    message: z.string(),
  })
  .refine((r) => r.minAge !== undefined || r.maxAge !== undefined, {
    message: 'Age restriction needs minAge or maxAge',
  });

export const GenderRestrictionSchema = z.object({
  restrictionId: z.string().min(1),
  drug: DrugTargetSchema,
  drugName: z.string(),
  allowedGender: z.enum(['M', 'F']),
  significance: ClinicalSignificanceSchema.default(1),
  message: z.string(),
});

export const QuantityLimitSchema = z
  .object({
    limitId: z.string().min(1),
    drug: DrugTargetSchema,
    limitType: z.enum(QUANTITY_LIMIT_TYPES),
    maxQuantity: z.number().positive().optional(),
    maxDaysSupply: z.number().int().positive().optional(),
    periodDays: z.number().int().positive().optional(),
    description: z.string().optional(),
    clinicalRationale: z.string().optional(),
  })
  .superRefine((limit, ctx) => {
    const needsQuantity = limit.limitType === 'PER_DAY' || limit.limitType === 'PER_MONTH' || limit.limitType === 'PER_YEAR';
    if (needsQuantity && limit.maxQuantity === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxQuantity'],
        message: `${limit.limitType} limit ${limit.limitId} needs maxQuantity`,
      });
    }
    if (limit.limitType === 'MAX_DAYS_SUPPLY' && limit.maxDaysSupply === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['maxDaysSupply'],
        message: `MAX_DAYS_SUPPLY limit ${limit.limitId} needs maxDaysSupply`,
      });
    }
    if (limit.maxQuantity === undefined && limit.maxDaysSupply === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Limit ${limit.limitId} sets neither maxQuantity nor maxDaysSupply`,
      });
    }
  });

const criterionBase = {
  criterionId: z.string().min(1),
  description: z.string(),
};

export const DiagnosisCriterionSchema = z.object({
  ...criterionBase,
  type: z.literal('DIAGNOSIS'),
  diagnosisCodes: z.array(z.string().min(1)).min(1),
});

export const PreviousTherapyCriterionSchema = z.object({
  ...criterionBase,
  type: z.literal('PREVIOUS_THERAPY'),
  requiredTherapies: z.array(z.string().min(1)).min(1),
  minimumDays: z.number().int().positive().optional(),
});

export const AgeCriterionSchema = z.object({
  ...criterionBase,
  type: z.literal('AGE'),
  minAge: z.number().int().nonnegative().optional(),
  maxAge: z.number().int().nonnegative().optional(),
});

export const SpecialistCriterionSchema = z.object({
  ...criterionBase,
  type: z.literal('SPECIALIST'),
  specialties: z.array(z.string().min(1)).min(1),
});

export const LabResultCriterionSchema = z.object({
  ...criterionBase,
  type: z.literal('LAB_RESULT'),
  labName: z.string().min(1),
  minValue: z.number().optional(),
  maxValue: z.number().optional(),
});

export const QuantityCriterionSchema = z.object({
  ...criterionBase,
  type: z.literal('QUANTITY'),
  maxQuantity: z.number().positive().optional(),
  maxDaysSupply: z.number().int().positive().optional(),
});

export const ClinicalCriterionSchema = z
  .discriminatedUnion('type', [
    DiagnosisCriterionSchema,
    PreviousTherapyCriterionSchema,
    AgeCriterionSchema,
    SpecialistCriterionSchema,
    LabResultCriterionSchema,
    QuantityCriterionSchema,
  ])
  .superRefine((criterion, ctx) => {
    const missing =
      (criterion.type === 'AGE' && criterion.minAge === undefined && criterion.maxAge === undefined) ||
      (criterion.type === 'LAB_RESULT' && criterion.minValue === undefined && criterion.maxValue === undefined) ||
      (criterion.type === 'QUANTITY' && criterion.maxQuantity === undefined && criterion.maxDaysSupply === undefined);
    if (missing) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${criterion.type} criterion ${criterion.criterionId} has no bounds`,
      });
    }
  });

export const ClinicalCriteriaSetSchema = z.object({
  criteriaSetId: z.string().min(1),
  drug: DrugTargetSchema,
  drugName: z.string(),
  description: z.string().optional(),
  criteria: z.array(ClinicalCriterionSchema),
});

export const StepTherapyStepSchema = z.object({
  stepNumber: z.number().int().positive(),
  stepName: z.string(),
  requiredDrugs: z.array(DrugTargetSchema).min(1),
  minimumDays: z.number().int().nonnegative().default(30),
  minimumFills: z.number().int().positive().default(1),
  description: z.string().optional(),
});

export const StepTherapyProtocolSchema = z.object({
  protocolId: z.string().min(1),
  protocolName: z.string(),
  description: z.string().optional(),
  targetDrugs: z.array(DrugTargetSchema).min(1),
  steps: z.array(StepTherapyStepSchema).min(1),
  lookbackDays: z.number().int().positive().default(365),
});

export const PriorAuthRequiredDrugSchema = z.object({
  drug: DrugTargetSchema,
  drugName: z.string(),
  reason: z.string().optional(),
});

function findDuplicates(ids: string[]): string[] {
  const seen = new Set<string>();
  const dupes = new Set<string>();
  for (const id of ids) {
    if (seen.has(id)) dupes.add(id);
    seen.add(id);
  }
  return [...dupes];
}

export const RuleConfigSchema = z
  .object({
    version: z.string().min(1),
    interactions: z.array(DrugInteractionSchema).default([]),
    duplications: z.array(DuplicationGroupSchema).default([]),
    ageRestrictions: z.array(AgeRestrictionSchema).default([]),
    genderRestrictions: z.array(GenderRestrictionSchema).default([]),
    quantityLimits: z.array(QuantityLimitSchema).default([]),
    criteriaSets: z.array(ClinicalCriteriaSetSchema).default([]),
    stepTherapy: z.array(StepTherapyProtocolSchema).default([]),
    priorAuthRequired: z.array(PriorAuthRequiredDrugSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const idGroups: Array<[string, string[]]> = [
      ['interactions', config.interactions.map((i) => i.interactionId)],
      ['duplications', config.duplications.map((d) => d.duplicationId)],
      ['ageRestrictions', config.ageRestrictions.map((r) => r.restrictionId)],
      ['genderRestrictions', config.genderRestrictions.map((r) => r.restrictionId)],
      ['quantityLimits', config.quantityLimits.map((l) => l.limitId)],
      ['criteriaSets', config.criteriaSets.map((s) => s.criteriaSetId)],
      ['stepTherapy', config.stepTherapy.map((p) => p.protocolId)],
    ];
    for (const [table, ids] of idGroups) {
      for (const id of findDuplicates(ids)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [table], message: `Duplicate id ${id}` });
      }
    }
  });

export type ClinicalSignificance = z.infer<typeof ClinicalSignificanceSchema>;
export type DrugTarget = z.infer<typeof DrugTargetSchema>;
export type DrugInteraction = z.infer<typeof DrugInteractionSchema>;
export type DuplicationGroup = z.infer<typeof DuplicationGroupSchema>;
export type AgeRestriction = z.infer<typeof AgeRestrictionSchema>;
export type GenderRestriction = z.infer<typeof GenderRestrictionSchema>;
export type QuantityLimitType = (typeof QUANTITY_LIMIT_TYPES)[number];
export type QuantityLimit = z.infer<typeof QuantityLimitSchema>;
export type ClinicalCriterion = z.infer<typeof ClinicalCriterionSchema>;
export type ClinicalCriterionType = ClinicalCriterion['type'];
export type ClinicalCriteriaSet = z.infer<typeof ClinicalCriteriaSetSchema>;
export type StepTherapyStep = z.infer<typeof StepTherapyStepSchema>;
export type StepTherapyProtocol = z.infer<typeof StepTherapyProtocolSchema>;
export type PriorAuthRequiredDrug = z.infer<typeof PriorAuthRequiredDrugSchema>;
export type RuleConfig = z.infer<typeof RuleConfigSchema>;
export type RuleConfigInput = z.input<typeof RuleConfigSchema>;
