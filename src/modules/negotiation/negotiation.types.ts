import type {
  NegotiationStatus,
  OfferKind,
  OfferProposal,
  ProposedTerms,
  RoundStatus,
  VehicleDescriptor,
} from '../../types/index.js';

export interface BudgetRange {
  min: number;
  max: number;
}

export interface BusinessObjectives {
  /** Target margin as a fraction in [0, 1]. */
  targetMargin: number;
  /** Weight of customer satisfaction against margin, in [0, 1]. */
  satisfactionPriority: number;
}

export interface ProposalRequest {
  vehicleId: number | null;
  vehicle: VehicleDescriptor;
  tradeInValue: number;
  kinds: OfferKind[];
  budget: BudgetRange;
  objectives: BusinessObjectives;
}

/**
 * Advisor output with every field optional. Numeric fields are already
 * parsed; `undefined` means the model did not supply a usable value.
 */
export interface StructuredDecision {
  shouldConclude?: boolean;
  proposedOffer?: ProposedTerms;
  finalPrice?: number;
  margin?: number;
  confidenceScore?: number;
  reasoning?: string;
}

export type AdvisorDecision =
  | { kind: 'structured'; decision: StructuredDecision }
  | { kind: 'raw'; text: string; degraded: boolean };

export interface AdviseRoundInput {
  currentOffer: OfferProposal;
  feedback: string;
  roundNumber: number;
  maxRounds: number;
  counterProposal?: ProposedTerms | null;
}

export interface InitiateInput {
  clientId: number;
  tradeInVehicleId?: number | null;
  targetVehicleId?: number | null;
  marginTarget?: number;
}

export type DefaultedField = 'finalPrice' | 'margin' | 'confidence';

export interface RoundResult {
  sessionId: string;
  roundNumber: number;
  /** Terms the advisor put forward this round; empty when it proposed none. */
  proposedOffer: ProposedTerms;
  /** Id of the offer in force after the round, if one was persisted. */
  offerId: number | null;
  roundStatus: RoundStatus | null;
  status: NegotiationStatus;
  shouldContinue: boolean;
  confidence: number;
  /** Set once the round budget is spent without agreement. */
  exhausted: boolean;
  /** Values that fell back to 0 because the advisor omitted them. */
  defaultedFields: DefaultedField[];
  reasoning: string;
}
