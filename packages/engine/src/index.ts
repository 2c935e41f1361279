import { getConfig, type EngineConfig } from './config.js';
import { createLogger, type Logger } from './lib/logger.js';
import { loadRuleSnapshotFromFile, DEFAULT_RULES_PATH, type RuleSnapshot } from './rules/rule-snapshot.js';
import { RuleStore } from './rules/rule-store.js';
import { ClaimAdjudicator } from './services/adjudication.service.js';
import { ClinicalCriteriaEvaluator } from './services/criteria.service.js';
import { DurOverrideManager } from './services/dur-override.service.js';
import { DurRulesEngine } from './services/dur-rules.service.js';
import { DurValidator } from './services/dur-validator.service.js';
import { PriorAuthWorkflow } from './services/prior-auth.service.js';
import { QuantityLimitEngine } from './services/quantity-limit.service.js';
import { StepTherapyChecker } from './services/step-therapy.service.js';

// Config, logging, errors
export { loadEngineConfig, getConfig } from './config.js';
export type { EngineConfig, PriorAuthSettings, DurSettings } from './config.js';
export { createLogger, moduleLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export {
  EngineError,
  ConfigurationError,
  InputValidationError,
  OperatorMisuseError,
  PriorAuthStateError,
} from './lib/errors.js';
export type { EngineErrorCode } from './lib/errors.js';

// Rules
export {
  DEFAULT_RULES_PATH,
  buildRuleSnapshot,
  loadRuleSnapshot,
  loadRuleSnapshotFromFile,
} from './rules/rule-snapshot.js';
export type { RuleSnapshot, IndexedInteraction } from './rules/rule-snapshot.js';
export { RuleStore } from './rules/rule-store.js';
export type { RuleProvider } from './rules/rule-store.js';
export { ClassCodeIndex } from './matching/class-code-index.js';
export { DrugRuleIndex, matchesTarget, describeTarget } from './matching/drug-rule-index.js';
export type { ReadonlyDrugRuleIndex } from './matching/drug-rule-index.js';

// Services
export { accumulateQuantity, findLatestFill } from './services/claim-history.service.js';
export {
  QuantityLimitEngine,
  evaluateQuantityLimits,
  selectGoverningResult,
} from './services/quantity-limit.service.js';
export type { QuantityRequest } from './services/quantity-limit.service.js';
export {
  DurRulesEngine,
  checkDrugDrugInteractions,
  checkTherapeuticDuplication,
  checkEarlyRefill,
  checkAgeRestriction,
  checkGenderRestriction,
} from './services/dur-rules.service.js';
export type { DurCheckInput } from './services/dur-rules.service.js';
export { DurValidator, evaluateDur, summarizeAlerts } from './services/dur-validator.service.js';
export { DurOverrideManager, validateOverride, isCoveredByOverrides } from './services/dur-override.service.js';
export { formatAlertForDisplay, formatAlertForNcpdp } from './services/dur-alert-formatter.js';
export { ClinicalCriteriaEvaluator, evaluateCriteriaSet, evaluateCriterion } from './services/criteria.service.js';
export { StepTherapyChecker, checkProtocol, evaluateStepTherapy } from './services/step-therapy.service.js';
export { PriorAuthWorkflow, AUTO_REVIEWER, CRITERIA_REVIEWER } from './services/prior-auth.service.js';
export type { ApproveOptions, PriorAuthWorkflowOptions } from './services/prior-auth.service.js';
export { ClaimAdjudicator, decideOutcome, requiresPriorAuth } from './services/adjudication.service.js';

export interface AdjudicationEngineOptions {
  config?: EngineConfig;
  /** A prepared snapshot or store; defaults to the file at `config.rulesPath` or the bundled rules. */
  rules?: RuleSnapshot | RuleStore;
  now?: () => Date;
  logger?: Logger;
}

export interface AdjudicationEngine {
  config: EngineConfig;
  rules: RuleStore;
  quantityLimits: QuantityLimitEngine;
  durRules: DurRulesEngine;
  durValidator: DurValidator;
  overrides: DurOverrideManager;
  criteria: ClinicalCriteriaEvaluator;
  stepTherapy: StepTherapyChecker;
  priorAuth: PriorAuthWorkflow;
  adjudicator: ClaimAdjudicator;
}

/** Wire every service to one rule store and one root logger. */
export function createAdjudicationEngine(options: AdjudicationEngineOptions = {}): AdjudicationEngine {
  const config = options.config ?? getConfig();
  const logger = options.logger ?? createLogger(config.logLevel);
  const child = (module: string): Logger => logger.child({ module });

  const rules =
    options.rules instanceof RuleStore
      ? options.rules
      : new RuleStore(
          options.rules ?? loadRuleSnapshotFromFile(config.rulesPath ?? DEFAULT_RULES_PATH),
          child('rule-store')
        );

  const criteria = new ClinicalCriteriaEvaluator(rules);
  const overrides = new DurOverrideManager({ now: options.now, logger: child('dur-override') });
  const priorAuth = new PriorAuthWorkflow(criteria, {
    settings: config.priorAuth,
    now: options.now,
    logger: child('prior-auth'),
  });
  const graceDays = config.dur.earlyRefillGraceDays;

  return {
    config,
    rules,
    quantityLimits: new QuantityLimitEngine(rules, child('quantity-limit')),
    durRules: new DurRulesEngine(rules, graceDays),
    durValidator: new DurValidator(rules, graceDays),
    overrides,
    criteria,
    stepTherapy: new StepTherapyChecker(rules),
    priorAuth,
    adjudicator: new ClaimAdjudicator(rules, {
      priorAuth,
      overrides,
      earlyRefillGraceDays: graceDays,
      logger: child('adjudication'),
    }),
  };
}
