import { moduleLogger, type Logger } from '../lib/logger.js';
import { loadRuleSnapshot, type RuleSnapshot } from './rule-snapshot.js';

export interface RuleProvider {
  current(): RuleSnapshot;
}

/**
 * Holds the active rule snapshot. A reload builds the replacement in full
 * before swapping the reference, so readers see either the old or the new
 * version, never a mix.
 */
export class RuleStore implements RuleProvider {
  private snapshot: RuleSnapshot;
  private readonly log: Logger;

  constructor(initial: RuleSnapshot, logger?: Logger) {
    this.log = logger ?? moduleLogger('rule-store');
    this.snapshot = initial;
    this.log.info(summarize(initial), 'Rule snapshot loaded');
  }

  current(): RuleSnapshot {
    return this.snapshot;
  }

  reload(raw: unknown): RuleSnapshot {
    const next = loadRuleSnapshot(raw);
    this.replace(next);
    return next;
  }

  replace(next: RuleSnapshot): void {
    const previousVersion = this.snapshot.version;
    this.snapshot = next;
    this.log.info({ ...summarize(next), previousVersion }, 'Rule snapshot replaced');
  }
}

function summarize(snapshot: RuleSnapshot): Record<string, unknown> {
  return {
    version: snapshot.version,
    interactions: snapshot.config.interactions.length,
    duplications: snapshot.config.duplications.length,
    quantityLimits: snapshot.quantityLimits.size,
    criteriaSets: snapshot.criteriaSets.size,
    stepTherapy: snapshot.stepTherapy.size,
  };
}
