import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  RuleConfigSchema,
  type AgeRestriction,
  type ClinicalCriteriaSet,
  type DrugInteraction,
  type DuplicationGroup,
  type GenderRestriction,
  type PriorAuthRequiredDrug,
  type QuantityLimit,
  type RuleConfig,
  type StepTherapyProtocol,
} from '@rxadjudicate/shared';
import { ConfigurationError, describeIssues } from '../lib/errors.js';
import { ClassCodeIndex } from '../matching/class-code-index.js';
import { DrugRuleIndex, type ReadonlyDrugRuleIndex } from '../matching/drug-rule-index.js';

export const DEFAULT_RULES_PATH = fileURLToPath(new URL('./default-rules.json', import.meta.url));

export interface IndexedInteraction {
  order: number;
  interaction: DrugInteraction;
}

/**
 * Immutable, indexed view of one rule configuration version. Built once,
 * never mutated; reloads produce a new snapshot.
 */
export interface RuleSnapshot {
  readonly version: string;
  readonly loadedAt: string;
  readonly config: Readonly<RuleConfig>;
  readonly quantityLimits: ReadonlyDrugRuleIndex<QuantityLimit>;
  readonly ageRestrictions: ReadonlyDrugRuleIndex<AgeRestriction>;
  readonly genderRestrictions: ReadonlyDrugRuleIndex<GenderRestriction>;
  readonly criteriaSets: ReadonlyDrugRuleIndex<ClinicalCriteriaSet>;
  readonly stepTherapy: ReadonlyDrugRuleIndex<StepTherapyProtocol>;
  readonly priorAuthRequired: ReadonlyDrugRuleIndex<PriorAuthRequiredDrug>;
  /** Interactions keyed by the class prefix of their first drug. */
  readonly interactionsByFirst: Omit<ClassCodeIndex<IndexedInteraction>, 'add'>;
  /** Interactions keyed by the class prefix of their second drug. */
  readonly interactionsBySecond: Omit<ClassCodeIndex<IndexedInteraction>, 'add'>;
  readonly duplications: Omit<ClassCodeIndex<DuplicationGroup>, 'add'>;
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

/**
 * Index an already-typed configuration. The caller is responsible for it
 * being well formed; use {@link loadRuleSnapshot} for untrusted input.
 */
export function buildRuleSnapshot(config: RuleConfig, loadedAt: Date = new Date()): RuleSnapshot {
  const frozen = deepFreeze(structuredClone(config));

  const interactionsByFirst = new ClassCodeIndex<IndexedInteraction>();
  const interactionsBySecond = new ClassCodeIndex<IndexedInteraction>();
  frozen.interactions.forEach((interaction, order) => {
    interactionsByFirst.add(interaction.drug1ClassPrefix, { order, interaction });
    interactionsBySecond.add(interaction.drug2ClassPrefix, { order, interaction });
  });

  const duplications = new ClassCodeIndex<DuplicationGroup>();
  for (const group of frozen.duplications) duplications.add(group.classPrefix, group);

  return Object.freeze({
    version: frozen.version,
    loadedAt: loadedAt.toISOString(),
    config: frozen,
    quantityLimits: DrugRuleIndex.build(frozen.quantityLimits, (l) => [l.drug]),
    ageRestrictions: DrugRuleIndex.build(frozen.ageRestrictions, (r) => [r.drug]),
    genderRestrictions: DrugRuleIndex.build(frozen.genderRestrictions, (r) => [r.drug]),
    criteriaSets: DrugRuleIndex.build(frozen.criteriaSets, (s) => [s.drug]),
    stepTherapy: DrugRuleIndex.build(frozen.stepTherapy, (p) => p.targetDrugs),
    priorAuthRequired: DrugRuleIndex.build(frozen.priorAuthRequired, (d) => [d.drug]),
    interactionsByFirst,
    interactionsBySecond,
    duplications,
  });
}

/**
 * Validate raw configuration and build a snapshot from it. Any schema
 * violation rejects the whole configuration.
 */
export function loadRuleSnapshot(raw: unknown, loadedAt: Date = new Date()): RuleSnapshot {
  const result = RuleConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError('Rule configuration rejected', describeIssues(result.error));
  }
  return buildRuleSnapshot(result.data, loadedAt);
}

export function loadRuleSnapshotFromFile(path: string = DEFAULT_RULES_PATH): RuleSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Could not read rule configuration from ${path}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return loadRuleSnapshot(raw);
}
