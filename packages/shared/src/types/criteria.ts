import type { ClinicalCriterionType } from '../schemas/rule-config.schema.js';

export interface CriterionResult {
  criterionId: string;
  type: ClinicalCriterionType;
  description: string;
  met: boolean;
}

export interface CriteriaEvaluationResult {
  criteriaSetId: string;
  met: boolean;
  evaluatedCount: number;
  metCount: number;
  unmetDescriptions: string[];
  details: CriterionResult[];
}
