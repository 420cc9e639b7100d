import type {
  NegotiationRoundRecord,
  NegotiationSession,
  Offer,
  OfferKind,
  NegotiationStatus,
  ProposedTerms,
} from '../../types/index.js';
import { NotFoundError } from '../../utils/custom-error.js';
import { roundTo, type JsonRecord } from '../../utils/llmPayload.js';
import type { NegotiationEngine, OfferDecisionResult } from './negotiation.engine.js';
import type { NegotiationRepository } from './negotiation.repo.js';
import type { InitiateInput, RoundResult } from './negotiation.types.js';

export interface NegotiationDetails {
  negotiation: NegotiationSession;
  offers: Offer[];
  rounds: NegotiationRoundRecord[];
}

export interface NegotiationAnalysis {
  negotiationId: string;
  status: NegotiationStatus;
  roundsExecuted: number;
  maxRounds: number;
  offersCount: number;
  tradeInOfferedValue: number | null;
  finalPrice: number | null;
  marginAchieved: number | null;
  chosenOfferKind: OfferKind | null;
  marketAnalysis: JsonRecord;
  agentReasoning: JsonRecord;
  startedAt: Date;
  endedAt: Date | null;
  /** Null while the negotiation is still open. */
  durationMinutes: number | null;
}

export interface NegotiationService {
  initiate(input: InitiateInput): Promise<NegotiationSession>;
  executeRound(id: string, feedback: string, counterProposal?: ProposedTerms | null): Promise<RoundResult>;
  cancel(id: string, reason?: string): Promise<NegotiationSession>;
  acceptOffer(offerId: number): Promise<OfferDecisionResult>;
  rejectOffer(offerId: number, reason?: string): Promise<Offer>;
  getDetails(id: string): Promise<NegotiationDetails>;
  getHistory(id: string): Promise<NegotiationRoundRecord[]>;
  getAnalysis(id: string): Promise<NegotiationAnalysis>;
}

export function createNegotiationService(
  engine: NegotiationEngine,
  negotiations: NegotiationRepository
): NegotiationService {
  const requireSession = async (id: string): Promise<NegotiationSession> => {
    const session = await negotiations.findById(id);
    if (!session) {
      throw new NotFoundError(`Negotiation ${id} not found`);
    }
    return session;
  };

  return {
    initiate: (input) => engine.initiate(input),
    executeRound: (id, feedback, counterProposal) => engine.executeRound(id, feedback, counterProposal ?? null),
    cancel: (id, reason) => engine.cancel(id, reason),
    acceptOffer: (offerId) => engine.acceptOffer(offerId),
    rejectOffer: (offerId, reason) => engine.rejectOffer(offerId, reason),

    getDetails: async (id) => {
      const negotiation = await requireSession(id);
      const [offers, rounds] = await Promise.all([
        negotiations.listOffers(id),
        negotiations.listRounds(id),
      ]);
      return { negotiation, offers, rounds };
    },

    getHistory: async (id) => {
      await requireSession(id);
      return negotiations.listRounds(id);
    },

    getAnalysis: async (id) => {
      const session = await requireSession(id);
      const [offers, rounds] = await Promise.all([
        negotiations.listOffers(id),
        negotiations.listRounds(id),
      ]);

      return {
        negotiationId: session.id,
        status: session.status,
        roundsExecuted: rounds.length,
        maxRounds: session.maxRounds,
        offersCount: offers.length,
        tradeInOfferedValue: session.tradeInOfferedValue,
        finalPrice: session.finalPrice,
        marginAchieved: session.marginAchieved,
        chosenOfferKind: session.chosenOfferKind,
        marketAnalysis: session.marketAnalysis,
        agentReasoning: session.agentReasoning,
        startedAt: session.startedAt,
        endedAt: session.endedAt,
        durationMinutes: session.endedAt
          ? roundTo((session.endedAt.getTime() - session.startedAt.getTime()) / 60000)
          : null,
      };
    },
  };
}
