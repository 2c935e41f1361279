import { randomInt } from 'node:crypto';
import { format } from 'date-fns';
import {
  PriorAuthRequestInputSchema,
  addServiceDays,
  toServiceDate,
  type ClinicalContext,
  type PriorAuthDenialReason,
  type PriorAuthRecord,
  type PriorAuthRequest,
  type PriorAuthRequestInput,
  type PriorAuthResponse,
} from '@rxadjudicate/shared';
import { getConfig, type PriorAuthSettings } from '../config.js';
import { InputValidationError, OperatorMisuseError, PriorAuthStateError } from '../lib/errors.js';
import { moduleLogger, type Logger } from '../lib/logger.js';
import type { ClinicalCriteriaEvaluator } from './criteria.service.js';

export const AUTO_REVIEWER = 'AUTO';
export const CRITERIA_REVIEWER = 'CRITERIA_ENGINE';

const APPEAL_INSTRUCTIONS =
  'Submit appeal with additional clinical documentation to the PA department. ' +
  'Include relevant lab results, clinical notes, and documentation of previous therapy failures.';

export interface PriorAuthWorkflowOptions {
  settings?: PriorAuthSettings;
  now?: () => Date;
  logger?: Logger;
}

export interface ApproveOptions {
  auto?: boolean;
  durationDays?: number;
  refills?: number;
  reviewedBy?: string;
}

function assertDuration(requestId: string, durationDays: number): void {
  if (!Number.isInteger(durationDays) || durationDays <= 0) {
    throw new OperatorMisuseError(`Approval duration ${durationDays} must be a positive whole number of days`, {
      requestId,
    });
  }
}

function digits(count: number): string {
  return String(randomInt(0, 10 ** count)).padStart(count, '0');
}

/**
 * Prior authorization state machine. A request starts pending and takes
 * exactly one determination (approved, partial or denied); a second
 * determination is rejected. Determinations read the stored request; the
 * caller's copy only identifies it by `requestId`.
 */
export class PriorAuthWorkflow {
  private readonly records = new Map<string, PriorAuthRecord>();
  private readonly settings: PriorAuthSettings;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly criteria: ClinicalCriteriaEvaluator,
    options: PriorAuthWorkflowOptions = {}
  ) {
    this.settings = options.settings ?? getConfig().priorAuth;
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? moduleLogger('prior-auth');
  }

  createRequest(input: PriorAuthRequestInput): PriorAuthRequest {
    const parsed = PriorAuthRequestInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new InputValidationError('Invalid prior authorization request', parsed.error.flatten().fieldErrors);
    }
    const data = parsed.data;
    const request: PriorAuthRequest = {
      requestId: this.generateRequestId(),
      requestType: data.requestType,
      requestDate: this.today(),
      urgency: data.urgency,
      memberId: data.memberId,
      drug: data.drug,
      quantityRequested: data.quantity,
      daysSupplyRequested: data.daysSupply,
      prescriberNpi: data.prescriberNpi,
      prescriberSpecialty: data.prescriberSpecialty,
      diagnosisCodes: data.diagnosisCodes,
    };

    this.records.set(request.requestId, {
      request: structuredClone(request),
      statusHistory: [{ status: 'pending', timestamp: this.now().toISOString(), note: 'Request created' }],
    });
    this.log.info({ requestId: request.requestId, ndc: request.drug.ndc, urgency: request.urgency }, 'PA request created');
    return structuredClone(request);
  }

  /**
   * Emergency requests and renewals are approved without a criteria review.
   * Anything else returns null and needs a determination.
   */
  checkAutoApproval(request: PriorAuthRequest): PriorAuthResponse | null {
    const stored = this.assertPending(request.requestId).request;
    if (stored.urgency === 'emergency') {
      return this.approve(stored, { auto: true, durationDays: this.settings.emergencyApprovalDays });
    }
    if (stored.requestType === 'renewal') {
      return this.approve(stored, { auto: true });
    }
    return null;
  }

  /** Latest approval for the member and exact drug code in effect on `serviceDate`. */
  checkExistingAuth(memberId: string, ndc: string, serviceDate: string = this.today()): PriorAuthResponse | null {
    let found: PriorAuthResponse | undefined;
    for (const { request, response } of this.records.values()) {
      if (request.memberId !== memberId || request.drug.ndc !== ndc) continue;
      if (!response || response.status !== 'approved') continue;
      const { effectiveDate, expirationDate } = response;
      if (!effectiveDate || !expirationDate) continue;
      if (serviceDate < effectiveDate || serviceDate > expirationDate) continue;
      if (!found || (found.effectiveDate !== undefined && effectiveDate >= found.effectiveDate)) found = response;
    }
    return found ? structuredClone(found) : null;
  }

  approve(request: PriorAuthRequest, options: ApproveOptions = {}): PriorAuthResponse {
    const stored = this.assertPending(request.requestId).request;
    const durationDays = options.durationDays ?? this.settings.approvalDurationDays;
    assertDuration(stored.requestId, durationDays);
    const auto = options.auto ?? false;
    const today = this.today();
    return this.record(stored, {
      requestId: stored.requestId,
      status: 'approved',
      responseDate: today,
      authorizationNumber: this.generateAuthorizationNumber(),
      effectiveDate: today,
      expirationDate: addServiceDays(today, durationDays),
      quantityApproved: stored.quantityRequested,
      daysSupplyApproved: stored.daysSupplyRequested,
      refillsApproved: options.refills ?? this.settings.defaultRefills,
      suggestedAlternatives: [],
      reviewedBy: options.reviewedBy ?? (auto ? AUTO_REVIEWER : undefined),
      autoApproved: auto,
    });
  }

  /** Approve with reduced terms. Neither value may exceed what was originally requested. */
  partialApprove(
    request: PriorAuthRequest,
    quantity: number,
    daysSupply: number,
    durationDays: number = this.settings.partialApprovalDays,
    reason?: string,
    reviewedBy?: string
  ): PriorAuthResponse {
    const stored = this.assertPending(request.requestId).request;
    if (!(quantity > 0) || quantity > stored.quantityRequested) {
      throw new OperatorMisuseError(
        `Partial approval quantity ${quantity} must be positive and at most ${stored.quantityRequested}`,
        { requestId: stored.requestId }
      );
    }
    if (!Number.isInteger(daysSupply) || daysSupply <= 0 || daysSupply > stored.daysSupplyRequested) {
      throw new OperatorMisuseError(
        `Partial approval days supply ${daysSupply} must be a positive whole number at most ${stored.daysSupplyRequested}`,
        { requestId: stored.requestId }
      );
    }
    assertDuration(stored.requestId, durationDays);

    const today = this.today();
    return this.record(stored, {
      requestId: stored.requestId,
      status: 'partial',
      responseDate: today,
      authorizationNumber: this.generateAuthorizationNumber(),
      effectiveDate: today,
      expirationDate: addServiceDays(today, durationDays),
      quantityApproved: quantity,
      daysSupplyApproved: daysSupply,
      refillsApproved: this.settings.partialApprovalRefills,
      denialMessage: reason ?? 'Approved with modifications',
      suggestedAlternatives: [],
      reviewedBy,
      autoApproved: false,
    });
  }

  deny(
    request: PriorAuthRequest,
    reason: PriorAuthDenialReason,
    message?: string,
    alternatives: readonly string[] = [],
    reviewedBy?: string
  ): PriorAuthResponse {
    const stored = this.assertPending(request.requestId).request;
    const today = this.today();
    return this.record(stored, {
      requestId: request.requestId,
      status: 'denied',
      responseDate: today,
      denialReason: reason,
      denialMessage: message ?? `Denied: ${reason}`,
      suggestedAlternatives: [...alternatives],
      appealDeadline: addServiceDays(today, this.settings.appealWindowDays),
      appealInstructions: APPEAL_INSTRUCTIONS,
      reviewedBy,
      autoApproved: false,
    });
  }

  /**
   * Auto-approval shortcut first, then the drug's criteria set. A drug with
   * no criteria set has no clinical gate and is approved.
   */
  processRequest(request: PriorAuthRequest, context: ClinicalContext = {}): PriorAuthResponse {
    const auto = this.checkAutoApproval(request);
    if (auto) return auto;

    const stored = this.assertPending(request.requestId).request;
    const set = this.criteria.findCriteriaSet(stored.drug);
    if (!set) return this.approve(stored, { reviewedBy: CRITERIA_REVIEWER });

    const evaluation = this.criteria.evaluate(set, {
      ...context,
      diagnosisCodes: context.diagnosisCodes ?? stored.diagnosisCodes,
      prescriberSpecialty: context.prescriberSpecialty ?? stored.prescriberSpecialty,
      requestedQuantity: context.requestedQuantity ?? stored.quantityRequested,
      requestedDaysSupply: context.requestedDaysSupply ?? stored.daysSupplyRequested,
    });
    if (evaluation.met) return this.approve(stored, { reviewedBy: CRITERIA_REVIEWER });

    return this.deny(
      stored,
      'CRITERIA_NOT_MET',
      `Criteria not met: ${evaluation.unmetDescriptions.join('; ')}`,
      [],
      CRITERIA_REVIEWER
    );
  }

  getRecord(requestId: string): PriorAuthRecord | undefined {
    const record = this.records.get(requestId);
    return record ? structuredClone(record) : undefined;
  }

  private assertPending(requestId: string): PriorAuthRecord {
    const record = this.records.get(requestId);
    if (!record) {
      throw new OperatorMisuseError(`Unknown prior authorization request ${requestId}`, { requestId });
    }
    if (record.response) throw new PriorAuthStateError(requestId, record.response.status);
    return record;
  }

  private record(request: PriorAuthRequest, response: PriorAuthResponse): PriorAuthResponse {
    const record = this.assertPending(request.requestId);
    record.response = response;
    record.statusHistory.push({
      status: response.status,
      timestamp: this.now().toISOString(),
      note: `Status changed to ${response.status}`,
    });
    this.log.info(
      { requestId: request.requestId, status: response.status, autoApproved: response.autoApproved },
      'PA determination recorded'
    );
    return structuredClone(response);
  }

  private today(): string {
    return toServiceDate(this.now());
  }

  private generateRequestId(): string {
    const datePart = format(this.now(), 'yyyyMMdd');
    let id: string;
    do {
      id = `PA-${datePart}-${digits(6)}`;
    } while (this.records.has(id));
    return id;
  }

  private generateAuthorizationNumber(): string {
    return `AUTH${digits(9)}`;
  }
}
