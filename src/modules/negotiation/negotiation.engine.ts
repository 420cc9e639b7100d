import logger from '../../config/logger.js';
import type { OfferSelectionPolicy } from '../../config/env.js';
import {
  terminalStatuses,
  type MarketSnapshot,
  type NegotiationSession,
  type NegotiationStatus,
  type Offer,
  type OfferProposal,
  type OfferStatus,
  type PartyProfile,
  type ProposedTerms,
  type Vehicle,
  type VehicleDescriptor,
} from '../../types/index.js';
import {
  CustomError,
  NotFoundError,
  PersistenceError,
  PreconditionError,
} from '../../utils/custom-error.js';
import { KeyedLock } from '../../utils/keyedLock.js';
import {
  clamp,
  coerceNumber,
  payloadToText,
  roundTo,
  type Coerced,
  type JsonRecord,
  type LlmPayload,
} from '../../utils/llmPayload.js';
import type { ClientRepository } from '../client/client.repo.js';
import type { MarketAnalyst } from '../market/market.analyst.js';
import type { MarketSnapshotProvider } from '../market/market.service.js';
import { resolveTradeInValue, type TradeInEvaluator } from '../market/tradeIn.evaluator.js';
import type { VehicleRepository } from '../vehicle/vehicle.repo.js';
import { ConversationContext } from './conversationContext.js';
import type { NegotiationRepository, OfferStatusUpdate } from './negotiation.repo.js';
import type {
  AdvisorDecision,
  DefaultedField,
  InitiateInput,
  ProposalRequest,
  RoundResult,
} from './negotiation.types.js';
import {
  applyProposedTerms,
  assertProposalRequest,
  kindsForPreference,
  selectBestProposal,
  type OfferProposalGenerator,
} from './offer.generator.js';
import type { NegotiationStrategyAdvisor } from './strategy.service.js';

export interface NegotiationEngineConfig {
  maxRounds: number;
  marginTarget: number;
  satisfactionPriority: number;
  budgetMin: number;
  budgetMax: number;
  selectionPolicy: OfferSelectionPolicy;
  historyLimit: number;
}

export interface NegotiationEngineDeps {
  clients: ClientRepository;
  vehicles: VehicleRepository;
  negotiations: NegotiationRepository;
  market: MarketSnapshotProvider;
  generator: OfferProposalGenerator;
  advisor: NegotiationStrategyAdvisor;
  analyst: MarketAnalyst;
  tradeInEvaluator: TradeInEvaluator;
  config: NegotiationEngineConfig;
  now?: () => Date;
  lock?: KeyedLock;
}

export interface OfferDecisionResult {
  session: NegotiationSession;
  offer: Offer;
  defaultedFields: DefaultedField[];
}

interface CurrentOffer {
  proposal: OfferProposal;
  /** Null when the offer was generated for this round and is not persisted yet. */
  offerId: number | null;
}

interface RoundOutcome {
  shouldConclude: boolean;
  terms: ProposedTerms;
  reasoning: string;
  confidence: Coerced;
  finalPrice: Coerced;
  margin: Coerced;
  degraded: boolean;
}

export const isTerminalStatus = (status: NegotiationStatus): boolean => terminalStatuses.includes(status);

export const descriptorOf = (vehicle: Vehicle): VehicleDescriptor => ({
  make: vehicle.make,
  model: vehicle.model,
  year: vehicle.year,
  mileage: vehicle.mileage,
  fuelType: vehicle.fuelType,
  condition: vehicle.condition,
  powerHp: vehicle.powerHp,
  currentMarketValue: vehicle.currentMarketValue,
});

export const toProposal = (offer: Offer): OfferProposal => ({
  kind: offer.kind,
  vehicleId: offer.vehicleId,
  tradeInValue: offer.tradeInValue,
  purchasePrice: offer.purchasePrice,
  monthlyPayment: offer.monthlyPayment,
  durationMonths: offer.durationMonths,
  totalCost: offer.totalCost,
  warrantyMonths: offer.warrantyMonths,
  maintenanceIncluded: offer.maintenanceIncluded,
  roadsideAssistance: offer.roadsideAssistance,
  insuranceIncluded: offer.insuranceIncluded,
  justification: offer.justification,
  confidenceScore: offer.confidenceScore,
  status: offer.status,
});

/**
 * Margin in percent of the final price over the vehicle's market value.
 */
export const computeMargin = (finalPrice: number, marketValue: number | null): Coerced =>
  marketValue === null || finalPrice <= 0
    ? { value: 0, defaulted: true }
    : { value: roundTo(((finalPrice - marketValue) / finalPrice) * 100), defaulted: false };

const serializeSnapshot = (snapshot: MarketSnapshot): JsonRecord => ({
  average_price: snapshot.averagePrice,
  min_price: snapshot.minPrice,
  max_price: snapshot.maxPrice,
  listings_count: snapshot.listingsCount,
  average_mileage: snapshot.averageMileage,
  last_updated: snapshot.lastUpdated.toISOString(),
});

/**
 * Structured data is stored as-is (or under `structuredKey`); raw text is
 * stored verbatim under `rawKey`.
 */
const payloadRecord = (payload: LlmPayload<JsonRecord>, rawKey: string, structuredKey?: string): JsonRecord => {
  switch (payload.kind) {
    case 'structured':
      return structuredKey ? { [structuredKey]: payload.data } : { ...payload.data };
    case 'raw':
      return payload.degraded ? { [rawKey]: payload.text, degraded: true } : { [rawKey]: payload.text };
  }
};

const interpretAdvice = (advice: AdvisorDecision): RoundOutcome => {
  switch (advice.kind) {
    case 'structured': {
      const { decision } = advice;
      const confidence = coerceNumber(decision.confidenceScore);
      return {
        shouldConclude: decision.shouldConclude ?? false,
        terms: decision.proposedOffer ?? {},
        reasoning: decision.reasoning ?? '',
        confidence: { ...confidence, value: clamp(confidence.value, 0, 100) },
        finalPrice: coerceNumber(decision.finalPrice),
        margin: coerceNumber(decision.margin),
        degraded: false,
      };
    }
    case 'raw':
      return {
        shouldConclude: false,
        terms: {},
        reasoning: advice.text,
        confidence: { value: 0, defaulted: true },
        finalPrice: { value: 0, defaulted: true },
        margin: { value: 0, defaulted: true },
        degraded: advice.degraded,
      };
  }
};

const numbersIn = (value: unknown): number[] =>
  Array.isArray(value) ? value.filter((n): n is number => typeof n === 'number') : [];

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Owns the negotiation state machine:
 * `initiated -> in_progress -> concluded | failed | cancelled`.
 *
 * Every operation on a session runs under that session's lock, so round
 * numbering and "latest offer" lookups never interleave.
 */
export class NegotiationEngine {
  private readonly lock: KeyedLock;
  private readonly now: () => Date;

  constructor(private readonly deps: NegotiationEngineDeps) {
    this.lock = deps.lock ?? new KeyedLock();
    this.now = deps.now ?? (() => new Date());
  }

  async initiate(input: InitiateInput): Promise<NegotiationSession> {
    const { clients, negotiations, config } = this.deps;

    const client = await clients.findById(input.clientId);
    if (!client) {
      throw new NotFoundError(`Client ${input.clientId} not found`);
    }

    const tradeIn =
      input.tradeInVehicleId !== undefined && input.tradeInVehicleId !== null
        ? await this.requireVehicle(input.tradeInVehicleId, 'Trade-in vehicle')
        : null;
    const target =
      input.targetVehicleId !== undefined && input.targetVehicleId !== null
        ? await this.requireVehicle(input.targetVehicleId, 'Target vehicle')
        : await this.pickTargetVehicle(client, tradeIn?.id ?? null);

    const marginTarget = input.marginTarget ?? config.marginTarget;
    const session = await negotiations.create({
      clientId: client.id,
      tradeInVehicleId: tradeIn?.id ?? null,
      targetVehicleId: target?.id ?? null,
      maxRounds: config.maxRounds,
      marginTarget,
    });

    logger.info('[NegotiationEngine] Session created', {
      negotiationId: session.id,
      clientId: client.id,
      tradeInVehicleId: session.tradeInVehicleId,
      targetVehicleId: session.targetVehicleId,
    });
    if (!target) {
      logger.warn('[NegotiationEngine] No target vehicle matched the client profile', {
        negotiationId: session.id,
        clientId: client.id,
      });
    }

    try {
      return await this.open(session, client, tradeIn, target);
    } catch (error) {
      await this.abandon(session, error);
      throw error;
    }
  }

  /**
   * Values the trade-in, plans the opening and moves the session to `in_progress`.
   */
  private async open(
    session: NegotiationSession,
    client: PartyProfile,
    tradeIn: Vehicle | null,
    target: Vehicle | null
  ): Promise<NegotiationSession> {
    const { negotiations, market, analyst, tradeInEvaluator, advisor, config } = this.deps;
    const marginTarget = session.marginTarget;

    let marketAnalysis: JsonRecord = {};
    let snapshot: MarketSnapshot | null = null;
    let tradeInValue: number | null = null;

    if (tradeIn) {
      const resolved = await market.resolve(descriptorOf(tradeIn));
      snapshot = resolved.snapshot;

      const [commentary, valuationPayload] = await Promise.all([
        analyst.analyze(tradeIn, resolved.snapshot),
        tradeInEvaluator.evaluate(tradeIn, resolved.snapshot),
      ]);
      const valuation = resolveTradeInValue(valuationPayload, tradeIn, resolved.snapshot);
      tradeInValue = valuation.value;

      marketAnalysis = {
        snapshot: serializeSnapshot(resolved.snapshot),
        origin: resolved.origin,
        sources_used: resolved.sourcesUsed,
        degraded: resolved.degraded,
        ...(resolved.failures.length > 0 ? { source_failures: resolved.failures } : {}),
        commentary: payloadRecord(commentary, 'raw_analysis'),
        trade_in_valuation: {
          ...payloadRecord(valuationPayload, 'raw_valuation'),
          value: valuation.value,
          source: valuation.source,
        },
      };
    }

    const objectives = { targetMargin: marginTarget, satisfactionPriority: config.satisfactionPriority };
    const strategy = await advisor.planOpening({
      client,
      targetVehicle: target,
      tradeInValue,
      snapshot,
      objectives,
    });

    const context = new ConversationContext([], config.historyLimit);
    if (strategy.kind === 'structured' || !strategy.degraded) {
      context.add('assistant', `Opening strategy: ${payloadToText(strategy)}`);
    }

    const started = await negotiations.update(session.id, {
      status: 'in_progress',
      roundCounter: 0,
      tradeInOfferedValue: tradeInValue,
      marketAnalysis,
      agentReasoning: {
        objectives: {
          target_margin: objectives.targetMargin,
          satisfaction_priority: objectives.satisfactionPriority,
        },
        ...payloadRecord(strategy, 'raw_strategy', 'opening_strategy'),
      },
      conversation: context.snapshot(),
    });

    logger.info('[NegotiationEngine] Session in progress', {
      negotiationId: started.id,
      tradeInOfferedValue: started.tradeInOfferedValue,
      strategy: strategy.kind,
    });
    return started;
  }

  /** Marks a session whose opening could not be completed as `failed`. */
  private async abandon(session: NegotiationSession, cause: unknown): Promise<void> {
    logger.error('[NegotiationEngine] Opening failed', {
      negotiationId: session.id,
      error: errorMessage(cause),
    });
    try {
      await this.deps.negotiations.update(session.id, {
        status: 'failed',
        endedAt: this.now(),
        agentReasoning: { ...session.agentReasoning, outcome: `Opening failed: ${errorMessage(cause)}` },
      });
    } catch (error) {
      logger.error('[NegotiationEngine] Could not mark the session failed', {
        negotiationId: session.id,
        error: errorMessage(error),
      });
    }
  }

  executeRound(
    sessionId: string,
    feedback: string,
    counterProposal: ProposedTerms | null = null
  ): Promise<RoundResult> {
    return this.lock.run(sessionId, async () => {
      const session = await this.requireSession(sessionId);

      if (isTerminalStatus(session.status)) {
        return this.terminalResult(session);
      }
      if (session.status !== 'in_progress') {
        throw new PreconditionError(`Negotiation ${sessionId} is ${session.status} and not accepting rounds`);
      }
      if (session.roundCounter >= session.maxRounds) {
        return this.exhaust(session);
      }

      const roundNumber = session.roundCounter + 1;
      try {
        return await this.runRound(session, roundNumber, feedback, counterProposal);
      } catch (error) {
        if (error instanceof CustomError) throw error;

        logger.error('[NegotiationEngine] Round failed, nothing committed', {
          negotiationId: sessionId,
          roundNumber,
          error: errorMessage(error),
        });
        throw new PersistenceError(
          `Round ${roundNumber} of negotiation ${sessionId} failed: ${errorMessage(error)}`,
          { roundNumber, cause: error }
        );
      }
    });
  }

  cancel(sessionId: string, reason?: string): Promise<NegotiationSession> {
    return this.lock.run(sessionId, async () => {
      const session = await this.requireSession(sessionId);
      if (session.status === 'cancelled') return session;
      if (isTerminalStatus(session.status)) {
        throw new PreconditionError(`Negotiation ${sessionId} is already ${session.status}`);
      }

      const cancelled = await this.deps.negotiations.update(sessionId, {
        status: 'cancelled',
        endedAt: this.now(),
        agentReasoning: { ...session.agentReasoning, cancellation_reason: reason ?? null },
      });
      logger.info('[NegotiationEngine] Session cancelled', { negotiationId: sessionId, reason });
      return cancelled;
    });
  }

  async acceptOffer(offerId: number): Promise<OfferDecisionResult> {
    const found = await this.requireOffer(offerId);

    return this.lock.run(found.negotiationId, async () => {
      const offer = await this.requireOffer(offerId);
      const session = await this.requireSession(offer.negotiationId);

      if (session.status === 'concluded' && offer.status === 'accepted') {
        return { session, offer, defaultedFields: [] };
      }
      if (isTerminalStatus(session.status)) {
        throw new PreconditionError(`Negotiation ${session.id} is already ${session.status}`);
      }
      if (offer.status === 'rejected') {
        throw new PreconditionError(`Offer ${offerId} was rejected and cannot be accepted`);
      }

      const target =
        session.targetVehicleId !== null ? await this.deps.vehicles.findById(session.targetVehicleId) : null;
      const margin = computeMargin(offer.totalCost, target?.currentMarketValue ?? null);

      const result = await this.deps.negotiations.commit({
        negotiationId: session.id,
        patch: {
          status: 'concluded',
          finalPrice: offer.totalCost,
          marginAchieved: margin.value,
          chosenOfferKind: offer.kind,
          endedAt: this.now(),
        },
        offerStatusUpdates: [{ offerId, status: 'accepted' }],
      });

      logger.info('[NegotiationEngine] Offer accepted', {
        negotiationId: session.id,
        offerId,
        finalPrice: offer.totalCost,
        marginAchieved: margin.value,
      });
      return {
        session: result.session,
        offer: { ...offer, status: 'accepted' },
        defaultedFields: margin.defaulted ? ['margin'] : [],
      };
    });
  }

  async rejectOffer(offerId: number, reason?: string): Promise<Offer> {
    const found = await this.requireOffer(offerId);

    return this.lock.run(found.negotiationId, async () => {
      const offer = await this.requireOffer(offerId);
      if (offer.status === 'rejected') return offer;
      if (offer.status === 'accepted') {
        throw new PreconditionError(`Offer ${offerId} was already accepted`);
      }

      const session = await this.requireSession(offer.negotiationId);
      if (isTerminalStatus(session.status)) {
        throw new PreconditionError(`Negotiation ${session.id} is already ${session.status}`);
      }

      await this.deps.negotiations.commit({
        negotiationId: session.id,
        patch: {
          agentReasoning: {
            ...session.agentReasoning,
            last_rejection: { offer_id: offerId, reason: reason ?? null },
          },
        },
        offerStatusUpdates: [{ offerId, status: 'rejected' }],
      });

      logger.info('[NegotiationEngine] Offer rejected', { negotiationId: session.id, offerId });
      return { ...offer, status: 'rejected' };
    });
  }

  private async runRound(
    session: NegotiationSession,
    roundNumber: number,
    feedback: string,
    counterProposal: ProposedTerms | null
  ): Promise<RoundResult> {
    const { negotiations, advisor, config } = this.deps;

    const current = await this.resolveCurrentOffer(session);
    const context = new ConversationContext(session.conversation, config.historyLimit);

    const advice = await advisor.adviseRound(
      {
        currentOffer: current.proposal,
        feedback,
        roundNumber,
        maxRounds: session.maxRounds,
        counterProposal,
      },
      context
    );
    const outcome = interpretAdvice(advice);
    const proposedTerms = Object.keys(outcome.terms).length > 0;
    const evolved = proposedTerms ? applyProposedTerms(current.proposal, outcome.terms) : null;

    // A refused offer keeps its status; only new terms can conclude on top of it.
    const refused = current.proposal.status === 'rejected';
    const concluded = outcome.shouldConclude && (evolved !== null || !refused);
    if (outcome.shouldConclude && !concluded) {
      logger.warn('[NegotiationEngine] Advisor concluded on a rejected offer, round kept open', {
        negotiationId: session.id,
        roundNumber,
        offerId: current.offerId,
      });
    }
    const currentStatus: OfferStatus = concluded && !evolved ? 'accepted' : 'negotiating';

    const newOffers: OfferProposal[] = [];
    const offerStatusUpdates: OfferStatusUpdate[] = [];
    if (current.offerId === null) {
      newOffers.push({ ...current.proposal, status: currentStatus });
    } else if (!refused && current.proposal.status !== currentStatus) {
      offerStatusUpdates.push({ offerId: current.offerId, status: currentStatus });
    }
    if (evolved) {
      newOffers.push({
        ...evolved,
        justification: outcome.reasoning || evolved.justification,
        confidenceScore: outcome.confidence.defaulted ? evolved.confidenceScore : outcome.confidence.value,
        status: concluded ? 'accepted' : 'proposed',
      });
    }
    const finalOffer = evolved ?? current.proposal;

    context.add('user', feedback);
    if (!outcome.degraded) context.add('assistant', outcome.reasoning);

    const degradedRounds = numbersIn(session.agentReasoning.degraded_rounds);
    const agentReasoning: JsonRecord = {
      ...session.agentReasoning,
      last_round: {
        round_number: roundNumber,
        reasoning: outcome.reasoning,
        confidence: outcome.confidence.value,
        structured: advice.kind === 'structured',
      },
      ...(outcome.degraded ? { degraded_rounds: [...degradedRounds, roundNumber] } : {}),
    };

    const defaultedFields: DefaultedField[] = [];
    if (outcome.confidence.defaulted) defaultedFields.push('confidence');
    if (concluded && outcome.finalPrice.defaulted) defaultedFields.push('finalPrice');
    if (concluded && outcome.margin.defaulted) defaultedFields.push('margin');

    const roundStatus = concluded ? 'accepted' : proposedTerms ? 'counter' : 'ongoing';

    const result = await negotiations.commit({
      negotiationId: session.id,
      patch: {
        roundCounter: roundNumber,
        conversation: context.snapshot(),
        agentReasoning,
        ...(concluded
          ? {
              status: 'concluded' as const,
              finalPrice: outcome.finalPrice.value,
              marginAchieved: outcome.margin.value,
              chosenOfferKind: finalOffer.kind,
              endedAt: this.now(),
            }
          : {}),
      },
      round: {
        roundNumber,
        agentProposal: outcome.terms,
        agentReasoning: outcome.reasoning,
        clientFeedback: feedback,
        clientCounterProposal: counterProposal,
        roundStatus,
      },
      newOffers,
      offerStatusUpdates,
    });

    if (defaultedFields.length > 0) {
      logger.warn('[NegotiationEngine] Advisor omitted values, defaults applied', {
        negotiationId: session.id,
        roundNumber,
        defaultedFields,
      });
    }
    logger.info('[NegotiationEngine] Round committed', {
      negotiationId: session.id,
      roundNumber,
      roundStatus,
      status: result.session.status,
    });

    return {
      sessionId: session.id,
      roundNumber,
      proposedOffer: outcome.terms,
      offerId: result.offers.at(-1)?.id ?? current.offerId,
      roundStatus,
      status: result.session.status,
      shouldContinue: !concluded && roundNumber < session.maxRounds,
      confidence: outcome.confidence.value,
      exhausted: false,
      defaultedFields,
      reasoning: outcome.reasoning,
    };
  }

  private async resolveCurrentOffer(session: NegotiationSession): Promise<CurrentOffer> {
    const { negotiations, vehicles, clients, generator, config } = this.deps;

    const latest = await negotiations.findLatestOffer(session.id);
    if (latest) {
      return { proposal: toProposal(latest), offerId: latest.id };
    }

    if (session.targetVehicleId === null) {
      throw new PreconditionError(
        `Negotiation ${session.id} has no target vehicle, so no opening offer can be generated`
      );
    }
    const target = await vehicles.findById(session.targetVehicleId);
    if (!target) {
      throw new NotFoundError(`Target vehicle ${session.targetVehicleId} not found`);
    }
    const client = await clients.findById(session.clientId);
    if (!client) {
      throw new NotFoundError(`Client ${session.clientId} not found`);
    }

    const request: ProposalRequest = {
      vehicleId: target.id,
      vehicle: descriptorOf(target),
      tradeInValue: session.tradeInOfferedValue ?? 0,
      kinds: kindsForPreference(client.offerPreference),
      budget: {
        min: client.budgetMin ?? config.budgetMin,
        max: client.budgetMax ?? config.budgetMax,
      },
      objectives: {
        targetMargin: session.marginTarget,
        satisfactionPriority: config.satisfactionPriority,
      },
    };
    assertProposalRequest(request);

    const proposals = await generator.generateOfferProposals(request);
    const best = selectBestProposal(proposals, config.selectionPolicy);
    if (!best) {
      throw new PreconditionError(`No usable offer could be generated for negotiation ${session.id}`);
    }

    logger.info('[NegotiationEngine] Opening offer generated', {
      negotiationId: session.id,
      kind: best.kind,
      candidates: proposals.length,
      policy: config.selectionPolicy,
    });
    return { proposal: best, offerId: null };
  }

  private async exhaust(session: NegotiationSession): Promise<RoundResult> {
    let failed: NegotiationSession;
    try {
      failed = await this.deps.negotiations.update(session.id, {
        status: 'failed',
        endedAt: this.now(),
        agentReasoning: {
          ...session.agentReasoning,
          outcome: `No agreement within ${session.maxRounds} rounds`,
        },
      });
    } catch (error) {
      throw new PersistenceError(
        `Negotiation ${session.id} could not be closed after ${session.maxRounds} rounds: ${errorMessage(error)}`,
        { roundNumber: session.roundCounter, cause: error }
      );
    }

    logger.warn('[NegotiationEngine] Round budget exhausted without agreement', {
      negotiationId: session.id,
      maxRounds: session.maxRounds,
    });
    return this.terminalResult(failed);
  }

  private terminalResult(session: NegotiationSession): RoundResult {
    const exhausted = session.status === 'failed' && session.roundCounter >= session.maxRounds;
    return {
      sessionId: session.id,
      roundNumber: session.roundCounter,
      proposedOffer: {},
      offerId: null,
      roundStatus: null,
      status: session.status,
      shouldContinue: false,
      confidence: 0,
      exhausted,
      defaultedFields: [],
      reasoning: exhausted
        ? `No agreement within ${session.maxRounds} rounds`
        : `Negotiation is ${session.status}`,
    };
  }

  private async pickTargetVehicle(client: PartyProfile, excludeId: number | null): Promise<Vehicle | null> {
    const candidates = await this.deps.vehicles.findInStock({
      fuelType: client.preferredFuel,
      transmission: client.preferredTransmission,
      budgetMin: client.budgetMin,
      budgetMax: client.budgetMax,
    });
    return candidates.find((vehicle) => vehicle.id !== excludeId) ?? null;
  }

  private async requireVehicle(id: number, label: string): Promise<Vehicle> {
    const vehicle = await this.deps.vehicles.findById(id);
    if (!vehicle) {
      throw new NotFoundError(`${label} ${id} not found`);
    }
    return vehicle;
  }

  private async requireSession(id: string): Promise<NegotiationSession> {
    const session = await this.deps.negotiations.findById(id);
    if (!session) {
      throw new NotFoundError(`Negotiation ${id} not found`);
    }
    return session;
  }

  private async requireOffer(id: number): Promise<Offer> {
    const offer = await this.deps.negotiations.findOfferById(id);
    if (!offer) {
      throw new NotFoundError(`Offer ${id} not found`);
    }
    return offer;
  }
}

export default NegotiationEngine;
