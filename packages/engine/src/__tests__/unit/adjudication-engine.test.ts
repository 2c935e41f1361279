import { describe, it, expect } from 'vitest';
import { loadEngineConfig } from '../../config.js';
import { createAdjudicationEngine } from '../../index.js';
import { RuleStore } from '../../rules/rule-store.js';
import { DRUGS, buildClaim, buildMember, fixedClock, silentLogger, testSnapshot } from '../helpers/fixtures.js';

const config = loadEngineConfig({ LOG_LEVEL: 'silent' });

describe('createAdjudicationEngine', () => {
  it('loads the bundled rules when no path is configured', () => {
    const engine = createAdjudicationEngine({ config, logger: silentLogger });
    expect(engine.rules.current().version).toBe('2026.1');
    const result = engine.adjudicator.adjudicateClaim(
      buildClaim({ drug: DRUGS.semaglutide, quantity: 4, daysSupply: 28 }),
      buildMember(),
      []
    );
    expect(result.outcome).toBe('PRIOR_AUTH_REQUIRED');
  });

  it('shares one prior authorization workflow with the adjudicator', () => {
    const engine = createAdjudicationEngine({ config, rules: testSnapshot(), now: fixedClock, logger: silentLogger });
    const request = engine.priorAuth.createRequest({
      memberId: 'MBR-1001',
      drug: DRUGS.semaglutide,
      quantity: 4,
      daysSupply: 28,
      prescriberNpi: '1234567890',
      requestType: 'renewal',
    });
    engine.priorAuth.checkAutoApproval(request);

    const result = engine.adjudicator.adjudicateClaim(
      buildClaim({ drug: DRUGS.semaglutide, quantity: 4, daysSupply: 28 }),
      buildMember(),
      []
    );
    expect(result.outcome).toBe('PAYABLE');
  });

  it('picks up a reloaded rule set on the next claim', () => {
    const store = new RuleStore(testSnapshot(), silentLogger);
    const engine = createAdjudicationEngine({ config, rules: store, now: fixedClock, logger: silentLogger });
    const claim = buildClaim({ drug: DRUGS.omeprazole, quantity: 90, daysSupply: 90 });

    expect(engine.adjudicator.adjudicateClaim(claim, buildMember(), []).outcome).toBe('REJECTED');
    store.replace(testSnapshot({ version: 'test-2', quantityLimits: [] }));
    expect(engine.adjudicator.adjudicateClaim(claim, buildMember(), []).outcome).toBe('PAYABLE');
    expect(engine.rules).toBe(store);
  });
});
