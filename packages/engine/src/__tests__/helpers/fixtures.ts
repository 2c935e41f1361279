import type {
  ClaimHistoryEntry,
  CurrentMedication,
  DrugIdentifier,
  MemberContext,
  PharmacyClaim,
  RuleConfigInput,
} from '@rxadjudicate/shared';
import type { PriorAuthSettings } from '../../config.js';
import { createLogger } from '../../lib/logger.js';
import { loadRuleSnapshot, type RuleSnapshot } from '../../rules/rule-snapshot.js';
import type { RuleProvider } from '../../rules/rule-store.js';

export const SERVICE_DATE = '2026-03-15';
/** Noon local time on SERVICE_DATE. */
export const fixedClock = (): Date => new Date(2026, 2, 15, 12, 0, 0);

export const silentLogger = createLogger('silent');

export const DRUGS = {
  warfarin: { ndc: '00056017270', classCode: '83300010100305', name: 'Warfarin 5mg' },
  ibuprofen: { ndc: '00093505601', classCode: '66100010000310', name: 'Ibuprofen 800mg' },
  atorvastatin: { ndc: '60505257809', classCode: '39400010100320', name: 'Atorvastatin 20mg' },
  simvastatin: { ndc: '00093715410', classCode: '39400075000330', name: 'Simvastatin 40mg' },
  clarithromycin: { ndc: '00074336860', classCode: '03000020000310', name: 'Clarithromycin 500mg' },
  omeprazole: { ndc: '62175011843', classCode: '49270060006520', name: 'Omeprazole 20mg' },
  brandPpi: { ndc: '00186504031', classCode: '49270025106520', name: 'Brand PPI 40mg' },
  sumatriptan: { ndc: '65862014736', classCode: '67406070100320', name: 'Sumatriptan 50mg' },
  oxycodone: { ndc: '00406055262', classCode: '65100075100310', name: 'Oxycodone 5mg' },
  hydrocodone: { ndc: '00406012301', classCode: '65100020200310', name: 'Hydrocodone 10mg' },
  tramadol: { ndc: '00093005801', classCode: '65100095100320', name: 'Tramadol 50mg' },
  semaglutide: { ndc: '00169413013', classCode: '27170070002020', name: 'Semaglutide 1mg' },
  liraglutide: { ndc: '00169406013', classCode: '27170050002020', name: 'Liraglutide 18mg' },
  methylphenidate: { ndc: '00591271601', classCode: '61400020100310', name: 'Methylphenidate 10mg' },
  testosterone: { ndc: '00591321379', classCode: '23100030002020', name: 'Testosterone cypionate' },
  lisinopril: { ndc: '68180098001', classCode: '36100030000310', name: 'Lisinopril 10mg' },
} satisfies Record<string, Required<DrugIdentifier>>;

export function medication(drug: Required<DrugIdentifier>): CurrentMedication {
  return { ndc: drug.ndc, classCode: drug.classCode, name: drug.name };
}

export function fill(
  drug: DrugIdentifier,
  serviceDate: string,
  quantityDispensed: number,
  daysSupply = 30
): ClaimHistoryEntry {
  return { ndc: drug.ndc, classCode: drug.classCode, serviceDate, quantityDispensed, daysSupply };
}

export function buildClaim(overrides: Partial<PharmacyClaim> = {}): PharmacyClaim {
  return {
    claimId: 'CLM-0001',
    memberId: 'MBR-1001',
    drug: DRUGS.lisinopril,
    quantity: 30,
    daysSupply: 30,
    serviceDate: SERVICE_DATE,
    ...overrides,
  };
}

export function buildMember(overrides: Partial<MemberContext> = {}): MemberContext {
  return {
    memberId: 'MBR-1001',
    gender: 'F',
    age: 45,
    currentMedications: [],
    ...overrides,
  };
}

export const PA_SETTINGS: PriorAuthSettings = {
  appealWindowDays: 60,
  approvalDurationDays: 365,
  emergencyApprovalDays: 30,
  defaultRefills: 12,
  partialApprovalRefills: 3,
  partialApprovalDays: 90,
};

export const TEST_RULES: RuleConfigInput = {
  version: 'test-1',
  interactions: [
    {
      interactionId: 'DD-001',
      drug1ClassPrefix: '8330',
      drug2ClassPrefix: '6610',
      drug1Name: 'Warfarin',
      drug2Name: 'NSAIDs',
      description: 'Increased bleeding risk',
      clinicalEffect: 'NSAIDs increase anticoagulant effect and bleeding risk',
      significance: 1,
      recommendation: 'Avoid combination or use with close monitoring',
    },
    {
      interactionId: 'DD-002',
      drug1ClassPrefix: '3940',
      drug2ClassPrefix: '0300',
      drug1Name: 'Statins',
      drug2Name: 'Macrolides',
      description: 'Increased myopathy risk',
      clinicalEffect: 'Macrolides inhibit statin metabolism',
      significance: 2,
      recommendation: 'Use lower statin dose or avoid combination',
    },
  ],
  duplications: [
    { duplicationId: 'TD-001', classPrefix: '3940', className: 'Statins' },
    { duplicationId: 'TD-002', classPrefix: '6510', className: 'Opioid Analgesics', maxConcurrent: 2 },
  ],
  ageRestrictions: [
    {
      restrictionId: 'AGE-001',
      drug: { classPrefix: '6140' },
      drugName: 'CNS Stimulants',
      minAge: 6,
      maxAge: 65,
      message: 'CNS stimulants are indicated for ages 6 to 65',
    },
  ],
  genderRestrictions: [
    {
      restrictionId: 'GEN-001',
      drug: { classPrefix: '2310' },
      drugName: 'Testosterone',
      allowedGender: 'M',
      message: 'Testosterone is indicated for males only',
    },
  ],
  quantityLimits: [
    { limitId: 'PPI-QL', drug: { classPrefix: '4927' }, limitType: 'PER_FILL', maxQuantity: 30, maxDaysSupply: 30 },
    { limitId: 'TRIPTAN-QL', drug: { classPrefix: '6740' }, limitType: 'PER_MONTH', maxQuantity: 9, periodDays: 30 },
    { limitId: 'TRIPTAN-YR-QL', drug: { classPrefix: '6740' }, limitType: 'PER_YEAR', maxQuantity: 20 },
    { limitId: 'OPIOID-QL', drug: { classPrefix: '6510' }, limitType: 'PER_FILL', maxQuantity: 120, maxDaysSupply: 30 },
    { limitId: 'OPIOID-DAILY-QL', drug: { classPrefix: '6510' }, limitType: 'PER_DAY', maxQuantity: 4 },
    { limitId: 'GLP1-QL', drug: { classPrefix: '2717' }, limitType: 'MAX_DAYS_SUPPLY', maxDaysSupply: 28 },
  ],
  criteriaSets: [
    {
      criteriaSetId: 'GLP1-PA',
      drug: { classPrefix: '2717' },
      drugName: 'GLP-1 Agonists',
      criteria: [
        {
          criterionId: 'GLP1-DX',
          type: 'DIAGNOSIS',
          description: 'Diagnosis of type 2 diabetes (E11.x)',
          diagnosisCodes: ['E11'],
        },
        {
          criterionId: 'GLP1-STEP',
          type: 'PREVIOUS_THERAPY',
          description: 'Previous trial of metformin',
          requiredTherapies: ['metformin'],
        },
        {
          criterionId: 'GLP1-A1C',
          type: 'LAB_RESULT',
          description: 'HbA1c of at least 7.0%',
          labName: 'HbA1c',
          minValue: 7.0,
        },
      ],
    },
    {
      criteriaSetId: 'LIRA-PA',
      drug: { classPrefix: '27170050' },
      drugName: 'Liraglutide',
      criteria: [
        {
          criterionId: 'LIRA-SPEC',
          type: 'SPECIALIST',
          description: 'Prescribed by an endocrinologist',
          specialties: ['Endocrinology'],
        },
      ],
    },
  ],
  stepTherapy: [
    {
      protocolId: 'PPI-ST',
      protocolName: 'PPI Step Therapy',
      targetDrugs: [{ ndc: '00186504031' }],
      steps: [
        {
          stepNumber: 1,
          stepName: 'Generic PPI',
          requiredDrugs: [{ classPrefix: '49270060' }, { classPrefix: '49270040' }],
          minimumDays: 30,
          minimumFills: 1,
        },
      ],
    },
  ],
  priorAuthRequired: [{ drug: { classPrefix: '2717' }, drugName: 'GLP-1 Agonists' }],
};

export function testSnapshot(overrides: Partial<RuleConfigInput> = {}): RuleSnapshot {
  return loadRuleSnapshot({ ...TEST_RULES, ...overrides }, fixedClock());
}

export function staticRules(snapshot: RuleSnapshot = testSnapshot()): RuleProvider {
  return { current: () => snapshot };
}
