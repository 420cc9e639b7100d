import logger from '../../config/logger.js';
import {
  offerKinds,
  type ChatMessage,
  type MarketSnapshot,
  type OfferKind,
  type OfferProposal,
  type PartyProfile,
  type ProposedTerms,
  type Vehicle,
} from '../../types/index.js';
import type { CompletionFn } from '../../services/llm.service.js';
import {
  isRecord,
  optionalBoolean,
  optionalNumber,
  optionalString,
  parseObjectPayload,
  rawPayload,
  roundTo,
  type JsonRecord,
  type LlmPayload,
} from '../../utils/llmPayload.js';
import { withTimeout } from '../../utils/withTimeout.js';
import type { ConversationContext } from './conversationContext.js';
import type {
  AdviseRoundInput,
  AdvisorDecision,
  BusinessObjectives,
  StructuredDecision,
} from './negotiation.types.js';

const OPENING_PROMPT = `You are the negotiation strategist of a car dealership.
Plan how to open a negotiation with the customer below so the deal closes at or above the margin target
while keeping the customer satisfied. Reply with JSON only:
{"approach": "<one sentence>", "opening_position": "<terms to lead with>", "concession_plan": ["<step>", "..."],
 "walk_away_point": <number|null>, "key_arguments": ["<argument>", "..."], "confidence_score": <0-100>}`;

const ROUND_PROMPT = `You are negotiating a vehicle deal on behalf of a dealership.
Given the offer on the table and the customer's latest message, decide the next move.
Conclude only when the customer has clearly agreed. Reply with JSON only:
{"should_conclude": <bool>, "proposed_offer": {"kind": "purchase|long_term_lease|subscription", "purchase_price": <number>,
 "monthly_payment": <number>, "duration_months": <integer>, "total_cost": <number>, "warranty_months": <integer>,
 "maintenance_included": <bool>, "roadside_assistance": <bool>, "insurance_included": <bool>} | null,
 "final_price": <number|null>, "margin": <percent|null>, "confidence_score": <0-100>, "reasoning": "<reply to the customer>"}`;

export interface OpeningStrategyInput {
  client: PartyProfile;
  targetVehicle: Vehicle | null;
  tradeInValue: number | null;
  snapshot: MarketSnapshot | null;
  objectives: BusinessObjectives;
}

export interface NegotiationStrategyAdvisor {
  planOpening(input: OpeningStrategyInput): Promise<LlmPayload<JsonRecord>>;
  adviseRound(input: AdviseRoundInput, context?: ConversationContext): Promise<AdvisorDecision>;
}

type NumericTerm = 'tradeInValue' | 'purchasePrice' | 'monthlyPayment' | 'totalCost';
type FlagTerm = 'maintenanceIncluded' | 'roadsideAssistance' | 'insuranceIncluded';

const parseOfferKind = (value: unknown): OfferKind | undefined => {
  if (value === 'lease') return 'long_term_lease';
  return offerKinds.find((kind) => kind === value);
};

/**
 * Reads the advisor's nested `proposed_offer`. Unusable fields are dropped.
 */
export function parseProposedTerms(value: unknown): ProposedTerms {
  if (!isRecord(value)) return {};

  const terms: ProposedTerms = {};
  const kind = parseOfferKind(value.kind ?? value.type);
  if (kind) terms.kind = kind;

  const numeric: Array<[NumericTerm, string]> = [
    ['tradeInValue', 'trade_in_value'],
    ['purchasePrice', 'purchase_price'],
    ['monthlyPayment', 'monthly_payment'],
    ['totalCost', 'total_cost'],
  ];
  for (const [field, key] of numeric) {
    const parsed = optionalNumber(value[key]);
    if (parsed !== undefined && parsed >= 0) {
      terms[field] = roundTo(parsed);
    }
  }
  const duration = optionalNumber(value.duration_months);
  if (duration !== undefined) terms.durationMonths = Math.round(duration);
  const warranty = optionalNumber(value.warranty_months);
  if (warranty !== undefined && warranty >= 0) terms.warrantyMonths = Math.round(warranty);

  const flags: Array<[FlagTerm, string]> = [
    ['maintenanceIncluded', 'maintenance_included'],
    ['roadsideAssistance', 'roadside_assistance'],
    ['insuranceIncluded', 'insurance_included'],
  ];
  for (const [field, key] of flags) {
    const parsed = optionalBoolean(value[key]);
    if (parsed !== undefined) terms[field] = parsed;
  }

  return terms;
}

export function parseStructuredDecision(data: JsonRecord): StructuredDecision {
  const decision: StructuredDecision = {};

  const shouldConclude = optionalBoolean(data.should_conclude);
  if (shouldConclude !== undefined) decision.shouldConclude = shouldConclude;

  const terms = parseProposedTerms(data.proposed_offer);
  if (Object.keys(terms).length > 0) decision.proposedOffer = terms;

  const finalPrice = optionalNumber(data.final_price);
  if (finalPrice !== undefined) decision.finalPrice = finalPrice;
  const margin = optionalNumber(data.margin);
  if (margin !== undefined) decision.margin = margin;
  const confidence = optionalNumber(data.confidence_score);
  if (confidence !== undefined) decision.confidenceScore = confidence;
  const reasoning = optionalString(data.reasoning);
  if (reasoning !== undefined) decision.reasoning = reasoning;

  return decision;
}

export const describeOffer = (offer: OfferProposal): string => {
  const terms =
    offer.purchasePrice !== null
      ? `purchase price ${offer.purchasePrice}`
      : `${offer.monthlyPayment ?? 0}/month over ${offer.durationMonths ?? 0} months`;
  const benefits = [
    `${offer.warrantyMonths} months warranty`,
    offer.maintenanceIncluded ? 'maintenance included' : null,
    offer.roadsideAssistance ? 'roadside assistance' : null,
    offer.insuranceIncluded ? 'insurance included' : null,
  ].filter((b): b is string => b !== null);
  return `${offer.kind}: ${terms}, total cost ${offer.totalCost}, trade-in credit ${offer.tradeInValue}; ${benefits.join(', ')}`;
};

const describeTerms = (terms: ProposedTerms): string =>
  Object.entries(terms)
    .map(([field, value]) => `${field}=${String(value)}`)
    .join(', ');

const buildOpeningMessage = (input: OpeningStrategyInput): string => {
  const { client, targetVehicle, snapshot, objectives } = input;
  const lines = [
    `Customer: ${client.firstName} ${client.lastName}, prefers ${client.offerPreference}, ` +
      `budget ${client.budgetMin ?? 'unknown'} - ${client.budgetMax ?? 'unknown'}, ` +
      `loyalty ${client.loyaltyScore}, risk ${client.riskScore}.`,
    targetVehicle
      ? `Target vehicle: ${targetVehicle.year} ${targetVehicle.make} ${targetVehicle.model}, ` +
        `market value ${targetVehicle.currentMarketValue}, retail price ${roundTo(targetVehicle.currentMarketValue * 1.2)}.`
      : 'No target vehicle selected yet.',
    input.tradeInValue !== null ? `Trade-in credit: ${input.tradeInValue}.` : 'No trade-in.',
  ];
  if (snapshot) {
    lines.push(
      `Trade-in market: average ${snapshot.averagePrice}, range ${snapshot.minPrice} - ${snapshot.maxPrice}, ` +
        `${snapshot.listingsCount} listings.`
    );
  }
  lines.push(
    `Margin target ${roundTo(objectives.targetMargin * 100)}%, satisfaction priority ${objectives.satisfactionPriority}.`
  );
  return lines.join('\n');
};

const buildRoundMessage = (input: AdviseRoundInput): string => {
  const lines = [
    `Round ${input.roundNumber} of ${input.maxRounds}.`,
    input.currentOffer.status === 'rejected'
      ? `Last offer, refused by the customer: ${describeOffer(input.currentOffer)}. Propose new terms to conclude.`
      : `Offer on the table: ${describeOffer(input.currentOffer)}.`,
    `Customer says: ${input.feedback}`,
  ];
  if (input.counterProposal && Object.keys(input.counterProposal).length > 0) {
    lines.push(`Customer counter-proposal: ${describeTerms(input.counterProposal)}.`);
  }
  return lines.join('\n');
};

export function createStrategyAdvisor(complete: CompletionFn, timeoutMs: number): NegotiationStrategyAdvisor {
  const ask = async (label: string, messages: ChatMessage[]): Promise<LlmPayload<JsonRecord>> => {
    try {
      const text = await withTimeout(complete(messages, { temperature: 0.5 }), timeoutMs, label);
      return parseObjectPayload(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('[StrategyAdvisor] Advice unavailable', { label, error: message });
      return rawPayload(`${label} unavailable: ${message}`, true);
    }
  };

  return {
    planOpening: (input) =>
      ask('Opening strategy', [
        { role: 'system', content: OPENING_PROMPT },
        { role: 'user', content: buildOpeningMessage(input) },
      ]),

    adviseRound: async (input, context) => {
      const userMessage: ChatMessage = { role: 'user', content: buildRoundMessage(input) };
      const messages: ChatMessage[] = context
        ? context.toMessages(ROUND_PROMPT, userMessage)
        : [{ role: 'system', content: ROUND_PROMPT }, userMessage];

      const payload = await ask(`Round ${input.roundNumber} advice`, messages);
      switch (payload.kind) {
        case 'structured':
          return { kind: 'structured', decision: parseStructuredDecision(payload.data) };
        case 'raw':
          return { kind: 'raw', text: payload.text, degraded: payload.degraded };
      }
    },
  };
}
