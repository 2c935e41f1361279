import { z } from 'zod';
import { DrugIdentifierSchema } from './claim.schema.js';

export const PriorAuthUrgencySchema = z.enum(['routine', 'urgent', 'emergency']);
export const PriorAuthRequestTypeSchema = z.enum(['initial', 'renewal']);

export const PriorAuthRequestInputSchema = z.object({
  memberId: z.string().min(1),
  drug: DrugIdentifierSchema,
  quantity: z.number().positive(),
  daysSupply: z.number().int().positive(),
  prescriberNpi: z.string().regex(/^\d{10}$/, 'NPI must be 10 digits'),
  prescriberSpecialty: z.string().optional(),
  diagnosisCodes: z.array(z.string().min(1)).default([]),
  urgency: PriorAuthUrgencySchema.default('routine'),
  requestType: PriorAuthRequestTypeSchema.default('initial'),
});

export const PriorAuthDenialReasonSchema = z.enum([
  'CRITERIA_NOT_MET',
  'STEP_THERAPY_REQUIRED',
  'ALTERNATIVE_AVAILABLE',
  'QUANTITY_EXCEEDS_LIMIT',
  'NOT_MEDICALLY_NECESSARY',
  'DOCUMENTATION_INSUFFICIENT',
  'DIAGNOSIS_NOT_COVERED',
]);

export type PriorAuthUrgency = z.infer<typeof PriorAuthUrgencySchema>;
export type PriorAuthRequestType = z.infer<typeof PriorAuthRequestTypeSchema>;
export type PriorAuthDenialReason = z.infer<typeof PriorAuthDenialReasonSchema>;
export type PriorAuthRequestInput = z.input<typeof PriorAuthRequestInputSchema>;
