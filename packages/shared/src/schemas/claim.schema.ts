import { z } from 'zod';
import { isValidServiceDate } from '../utils/date.js';

export const ServiceDateSchema = z
  .string()
  .refine(isValidServiceDate, { message: 'Expected a calendar date in yyyy-MM-dd format' });

export const ClassCodeSchema = z.string().regex(/^\d+$/, 'Class codes are numeric');

export const GenderSchema = z.enum(['M', 'F', 'U']);

export const DrugIdentifierSchema = z.object({
  ndc: z.string().min(1),
  classCode: ClassCodeSchema.optional(),
  name: z.string().optional(),
});

export const ClaimHistoryEntrySchema = z.object({
  ndc: z.string().min(1),
  classCode: ClassCodeSchema.optional(),
  serviceDate: ServiceDateSchema,
  quantityDispensed: z.number().nonnegative(),
  daysSupply: z.number().int().nonnegative(),
});

export const ClaimHistorySchema = z.array(ClaimHistoryEntrySchema);

export const CurrentMedicationSchema = z.object({
  ndc: z.string().min(1),
  classCode: ClassCodeSchema,
  name: z.string().optional(),
});

export const PriorTherapySchema = z.object({
  name: z.string().min(1),
  code: z.string().optional(),
  daysOnTherapy: z.number().int().nonnegative().optional(),
});

/** Clinical facts the criteria evaluator reads. Every field is optional; criteria decide what they need. */
export const ClinicalContextSchema = z.object({
  age: z.number().int().nonnegative().optional(),
  diagnosisCodes: z.array(z.string().min(1)).optional(),
  priorTherapies: z.array(PriorTherapySchema).optional(),
  labResults: z.record(z.string(), z.number()).optional(),
  prescriberSpecialty: z.string().optional(),
  requestedQuantity: z.number().nonnegative().optional(),
  requestedDaysSupply: z.number().int().nonnegative().optional(),
});

export const MemberContextSchema = ClinicalContextSchema.extend({
  memberId: z.string().min(1),
  gender: GenderSchema,
  currentMedications: z.array(CurrentMedicationSchema).optional(),
});

export const PharmacyClaimSchema = z.object({
  claimId: z.string().min(1),
  memberId: z.string().min(1),
  drug: DrugIdentifierSchema,
  quantity: z.number().nonnegative(),
  daysSupply: z.number().int().nonnegative(),
  serviceDate: ServiceDateSchema,
  prescriberNpi: z.string().optional(),
  priorAuthNumber: z.string().optional(),
});

export type Gender = z.infer<typeof GenderSchema>;
export type DrugIdentifier = z.infer<typeof DrugIdentifierSchema>;
export type ClaimHistoryEntry = z.infer<typeof ClaimHistoryEntrySchema>;
export type CurrentMedication = z.infer<typeof CurrentMedicationSchema>;
export type PriorTherapy = z.infer<typeof PriorTherapySchema>;
export type ClinicalContext = z.infer<typeof ClinicalContextSchema>;
export type MemberContext = z.infer<typeof MemberContextSchema>;
export type PharmacyClaim = z.infer<typeof PharmacyClaimSchema>;
