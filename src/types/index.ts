// Domain types shared by the negotiation core, its collaborators and the HTTP layer

export const fuelTypes = ['petrol', 'diesel', 'hybrid', 'electric'] as const;
export type FuelType = (typeof fuelTypes)[number];

export const transmissions = ['manual', 'automatic'] as const;
export type Transmission = (typeof transmissions)[number];

export const vehicleConditions = ['excellent', 'good', 'fair', 'acceptable'] as const;
export type VehicleCondition = (typeof vehicleConditions)[number];

export const offerKinds = ['purchase', 'long_term_lease', 'subscription'] as const;
export type OfferKind = (typeof offerKinds)[number];

/** Financed kinds carry a monthly payment and a duration instead of a purchase price. */
export const financedOfferKinds: readonly OfferKind[] = ['long_term_lease', 'subscription'];

export const offerPreferences = [...offerKinds, 'flexible'] as const;
export type OfferPreference = (typeof offerPreferences)[number];

export const offerStatuses = ['proposed', 'accepted', 'rejected', 'negotiating'] as const;
export type OfferStatus = (typeof offerStatuses)[number];

export const negotiationStatuses = [
  'initiated',
  'in_progress',
  'concluded',
  'failed',
  'cancelled',
] as const;
export type NegotiationStatus = (typeof negotiationStatuses)[number];

export const terminalStatuses: readonly NegotiationStatus[] = ['concluded', 'failed', 'cancelled'];

export const roundStatuses = ['ongoing', 'accepted', 'rejected', 'counter'] as const;
export type RoundStatus = (typeof roundStatuses)[number];

export const MIN_DURATION_MONTHS = 1;
export const MAX_DURATION_MONTHS = 84;

export interface Vehicle {
  id: number;
  vin: string;
  registrationNumber: string;
  make: string;
  model: string;
  year: number;
  version: string | null;
  mileage: number;
  fuelType: FuelType;
  transmission: Transmission;
  powerHp: number;
  condition: VehicleCondition;
  currentMarketValue: number;
  estimatedTradeInValue: number | null;
  inStock: boolean;
  createdAt: Date;
}

/** The immutable view of a vehicle the core reasons about. */
export interface VehicleDescriptor {
  make: string;
  model: string;
  year: number;
  mileage: number;
  fuelType: FuelType;
  condition: VehicleCondition;
  powerHp: number;
  currentMarketValue: number;
}

export interface PartyProfile {
  id: number;
  firstName: string;
  lastName: string;
  email: string;
  phone: string | null;
  preferredFuel: FuelType | null;
  preferredTransmission: Transmission | null;
  budgetMin: number | null;
  budgetMax: number | null;
  offerPreference: OfferPreference;
  loyaltyScore: number;
  riskScore: number;
}

export interface MarketSnapshot {
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  listingsCount: number;
  averageMileage: number | null;
  lastUpdated: Date;
}

export interface OfferBenefits {
  warrantyMonths: number;
  maintenanceIncluded: boolean;
  roadsideAssistance: boolean;
  insuranceIncluded: boolean;
}

/** A validated candidate offer, not yet persisted. */
export interface OfferProposal extends OfferBenefits {
  kind: OfferKind;
  vehicleId: number | null;
  tradeInValue: number;
  purchasePrice: number | null;
  monthlyPayment: number | null;
  durationMonths: number | null;
  totalCost: number;
  justification: string;
  confidenceScore: number;
  status: OfferStatus;
}

export interface Offer extends OfferProposal {
  id: number;
  negotiationId: string;
  createdAt: Date;
}

/** Partial financial terms as proposed by the strategy advisor or the counterparty. */
export interface ProposedTerms {
  kind?: OfferKind;
  tradeInValue?: number;
  purchasePrice?: number;
  monthlyPayment?: number;
  durationMonths?: number;
  totalCost?: number;
  warrantyMonths?: number;
  maintenanceIncluded?: boolean;
  roadsideAssistance?: boolean;
  insuranceIncluded?: boolean;
}

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface NegotiationSession {
  id: string;
  clientId: number;
  tradeInVehicleId: number | null;
  targetVehicleId: number | null;
  status: NegotiationStatus;
  roundCounter: number;
  maxRounds: number;
  marginTarget: number;
  tradeInOfferedValue: number | null;
  finalPrice: number | null;
  marginAchieved: number | null;
  chosenOfferKind: OfferKind | null;
  marketAnalysis: Record<string, unknown>;
  agentReasoning: Record<string, unknown>;
  conversation: ChatMessage[];
  startedAt: Date;
  endedAt: Date | null;
  updatedAt: Date;
}

export interface NegotiationRoundRecord {
  id: string;
  negotiationId: string;
  roundNumber: number;
  agentProposal: ProposedTerms;
  agentReasoning: string;
  clientFeedback: string | null;
  clientCounterProposal: ProposedTerms | null;
  roundStatus: RoundStatus;
  createdAt: Date;
}
