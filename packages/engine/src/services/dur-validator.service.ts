import {
  ClaimHistorySchema,
  MemberContextSchema,
  PharmacyClaimSchema,
  type ClaimHistoryEntry,
  type DurAlert,
  type DurOverride,
  type DurSummary,
  type DurValidationResult,
  type MemberContext,
  type PharmacyClaim,
} from '@rxadjudicate/shared';
import { getConfig } from '../config.js';
import { InputValidationError, describeIssues } from '../lib/errors.js';
import type { RuleSnapshot } from '../rules/rule-snapshot.js';
import type { RuleProvider } from '../rules/rule-store.js';
import { collectAlerts, runDurChecks, type DurCheckResults } from './dur-rules.service.js';
import { isCoveredByOverrides } from './dur-override.service.js';

export function summarizeAlerts(alerts: readonly DurAlert[]): DurSummary {
  return {
    total: alerts.length,
    major: alerts.filter((a) => a.significance === 1).length,
    moderate: alerts.filter((a) => a.significance === 2).length,
    minor: alerts.filter((a) => a.significance === 3).length,
  };
}

function describeChecks(results: DurCheckResults): string[] {
  const messages: string[] = [];
  if (results.drugDrug.length > 0) messages.push(`${results.drugDrug.length} drug-drug interaction(s) found`);
  if (results.duplication.length > 0) {
    messages.push(`${results.duplication.length} therapeutic duplication(s) found`);
  }
  if (results.earlyRefill) messages.push('Early refill detected');
  if (results.age) messages.push('Age restriction violation');
  if (results.gender) messages.push('Gender restriction violation');
  return messages;
}

/** DUR decision for a claim against one snapshot. Inputs must already be validated. */
export function evaluateDur(
  snapshot: RuleSnapshot,
  claim: PharmacyClaim,
  member: MemberContext,
  history: readonly ClaimHistoryEntry[],
  overrides: readonly DurOverride[] = [],
  earlyRefillGraceDays = 0
): DurValidationResult {
  const results = runDurChecks(
    snapshot,
    {
      drug: claim.drug,
      serviceDate: claim.serviceDate,
      age: member.age,
      gender: member.gender,
      currentMedications: member.currentMedications ?? [],
      history,
    },
    earlyRefillGraceDays
  );
  const alerts = collectAlerts(results);
  const summary = summarizeAlerts(alerts);
  const claimOverrides = overrides.filter((o) => o.claimId === claim.claimId);

  return {
    claimId: claim.claimId,
    passed: summary.major === 0,
    requiresOverride: summary.major > 0,
    canProceed: isCoveredByOverrides(alerts, claimOverrides),
    alerts,
    summary,
    messages: describeChecks(results),
    overrides: claimOverrides,
  };
}

export function parseClaimInputs(
  claim: unknown,
  member: unknown,
  history: unknown
): { claim: PharmacyClaim; member: MemberContext; history: ClaimHistoryEntry[] } {
  const parsedClaim = PharmacyClaimSchema.safeParse(claim);
  if (!parsedClaim.success) {
    throw new InputValidationError('Invalid claim', parsedClaim.error.flatten().fieldErrors);
  }
  const parsedMember = MemberContextSchema.safeParse(member);
  if (!parsedMember.success) {
    throw new InputValidationError('Invalid member context', parsedMember.error.flatten().fieldErrors);
  }
  const parsedHistory = ClaimHistorySchema.safeParse(history);
  if (!parsedHistory.success) {
    throw new InputValidationError('Invalid claim history', describeIssues(parsedHistory.error));
  }
  if (parsedClaim.data.memberId !== parsedMember.data.memberId) {
    throw new InputValidationError('Claim and member context refer to different members', {
      claimMemberId: parsedClaim.data.memberId,
      memberId: parsedMember.data.memberId,
    });
  }
  return { claim: parsedClaim.data, member: parsedMember.data, history: parsedHistory.data };
}

export class DurValidator {
  constructor(
    private readonly rules: RuleProvider,
    private readonly earlyRefillGraceDays: number = getConfig().dur.earlyRefillGraceDays
  ) {}

  validate(
    claim: PharmacyClaim,
    member: MemberContext,
    history: readonly ClaimHistoryEntry[],
    overrides: readonly DurOverride[] = []
  ): DurValidationResult {
    const inputs = parseClaimInputs(claim, member, history);
    return evaluateDur(
      this.rules.current(),
      inputs.claim,
      inputs.member,
      inputs.history,
      overrides,
      this.earlyRefillGraceDays
    );
  }
}
