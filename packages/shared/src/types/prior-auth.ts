import type { DrugIdentifier } from '../schemas/claim.schema.js';
import type {
  PriorAuthDenialReason,
  PriorAuthRequestType,
  PriorAuthUrgency,
} from '../schemas/prior-auth.schema.js';

export type PriorAuthStatus = 'pending' | 'approved' | 'denied' | 'partial';

export interface PriorAuthRequest {
  requestId: string;
  requestType: PriorAuthRequestType;
  requestDate: string;
  urgency: PriorAuthUrgency;
  memberId: string;
  drug: DrugIdentifier;
  quantityRequested: number;
  daysSupplyRequested: number;
  prescriberNpi: string;
  prescriberSpecialty?: string;
  diagnosisCodes: string[];
}

export interface PriorAuthResponse {
  requestId: string;
  status: PriorAuthStatus;
  responseDate: string;
  authorizationNumber?: string;

  // Approval details
  effectiveDate?: string;
  expirationDate?: string;
  quantityApproved?: number;
  daysSupplyApproved?: number;
  refillsApproved?: number;

  // Denial details
  denialReason?: PriorAuthDenialReason;
  denialMessage?: string;
  suggestedAlternatives: string[];
  appealDeadline?: string;
  appealInstructions?: string;

  reviewedBy?: string;
  autoApproved: boolean;
}

export interface PriorAuthStatusChange {
  status: PriorAuthStatus;
  timestamp: string;
  note: string;
}

export interface PriorAuthRecord {
  request: PriorAuthRequest;
  response?: PriorAuthResponse;
  statusHistory: PriorAuthStatusChange[];
}
