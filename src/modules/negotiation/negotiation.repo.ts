import type { Transaction } from 'sequelize';
import { v4 as uuidv4 } from 'uuid';
import models, { sequelize } from '../../models/index.js';
import type { NegotiationModel } from '../../models/negotiation.js';
import type { NegotiationRoundModel } from '../../models/negotiationRound.js';
import type { OfferModel } from '../../models/offer.js';
import type {
  NegotiationRoundRecord,
  NegotiationSession,
  Offer,
  OfferProposal,
  OfferStatus,
} from '../../types/index.js';

export interface NewNegotiation {
  clientId: number;
  tradeInVehicleId: number | null;
  targetVehicleId: number | null;
  maxRounds: number;
  marginTarget: number;
}

export type NegotiationPatch = Partial<
  Omit<NegotiationSession, 'id' | 'clientId' | 'startedAt' | 'updatedAt'>
>;

export type NewRound = Omit<NegotiationRoundRecord, 'id' | 'negotiationId' | 'createdAt'>;

export interface OfferStatusUpdate {
  offerId: number;
  status: OfferStatus;
}

/**
 * Everything one state transition writes. Applied all-or-nothing by
 * `NegotiationRepository.commit`.
 */
export interface NegotiationCommit {
  negotiationId: string;
  patch: NegotiationPatch;
  round?: NewRound;
  newOffers?: OfferProposal[];
  offerStatusUpdates?: OfferStatusUpdate[];
}

export interface CommitResult {
  session: NegotiationSession;
  round: NegotiationRoundRecord | null;
  offers: Offer[];
}

export interface NegotiationRepository {
  create(data: NewNegotiation): Promise<NegotiationSession>;
  findById(id: string): Promise<NegotiationSession | null>;
  update(id: string, patch: NegotiationPatch): Promise<NegotiationSession>;
  listByClient(clientId: number): Promise<NegotiationSession[]>;
  findOfferById(offerId: number): Promise<Offer | null>;
  /** Most recently created offer of the session, by id. */
  findLatestOffer(negotiationId: string): Promise<Offer | null>;
  listOffers(negotiationId: string): Promise<Offer[]>;
  listRounds(negotiationId: string): Promise<NegotiationRoundRecord[]>;
  commit(change: NegotiationCommit): Promise<CommitResult>;
}

const toNullableNumber = (value: number | null | undefined): number | null =>
  value === null || value === undefined ? null : Number(value);

export const toSession = (row: NegotiationModel): NegotiationSession => ({
  id: row.id,
  clientId: row.clientId,
  tradeInVehicleId: row.tradeInVehicleId ?? null,
  targetVehicleId: row.targetVehicleId ?? null,
  status: row.status,
  roundCounter: row.roundCounter,
  maxRounds: row.maxRounds,
  marginTarget: Number(row.marginTarget),
  tradeInOfferedValue: toNullableNumber(row.tradeInOfferedValue),
  finalPrice: toNullableNumber(row.finalPrice),
  marginAchieved: toNullableNumber(row.marginAchieved),
  chosenOfferKind: row.chosenOfferKind ?? null,
  marketAnalysis: row.marketAnalysis ?? {},
  agentReasoning: row.agentReasoning ?? {},
  conversation: row.conversation ?? [],
  startedAt: row.startedAt,
  endedAt: row.endedAt ?? null,
  updatedAt: row.updatedAt,
});

export const toOffer = (row: OfferModel): Offer => ({
  id: row.id,
  negotiationId: row.negotiationId,
  kind: row.kind,
  vehicleId: row.vehicleId ?? null,
  tradeInValue: Number(row.tradeInValue),
  purchasePrice: toNullableNumber(row.purchasePrice),
  monthlyPayment: toNullableNumber(row.monthlyPayment),
  durationMonths: row.durationMonths ?? null,
  totalCost: Number(row.totalCost),
  warrantyMonths: row.warrantyMonths,
  maintenanceIncluded: row.maintenanceIncluded,
  roadsideAssistance: row.roadsideAssistance,
  insuranceIncluded: row.insuranceIncluded,
  justification: row.justification,
  confidenceScore: Number(row.confidenceScore),
  status: row.status,
  createdAt: row.createdAt,
});

export const toRound = (row: NegotiationRoundModel): NegotiationRoundRecord => ({
  id: row.id,
  negotiationId: row.negotiationId,
  roundNumber: row.roundNumber,
  agentProposal: row.agentProposal,
  agentReasoning: row.agentReasoning,
  clientFeedback: row.clientFeedback ?? null,
  clientCounterProposal: row.clientCounterProposal ?? null,
  roundStatus: row.roundStatus,
  createdAt: row.createdAt,
});

const loadOrThrow = async (
  id: string,
  transaction?: Transaction
): Promise<NegotiationModel> => {
  const row = await models.Negotiation.findByPk(id, {
    transaction,
    lock: transaction ? transaction.LOCK.UPDATE : undefined,
  });
  if (!row) {
    throw new Error(`Negotiation ${id} disappeared during update`);
  }
  return row;
};

const repo: NegotiationRepository = {
  create: async (data) => {
    const row = await models.Negotiation.create({
      id: uuidv4(),
      clientId: data.clientId,
      tradeInVehicleId: data.tradeInVehicleId,
      targetVehicleId: data.targetVehicleId,
      maxRounds: data.maxRounds,
      marginTarget: data.marginTarget,
      tradeInOfferedValue: null,
      finalPrice: null,
      marginAchieved: null,
      chosenOfferKind: null,
      endedAt: null,
    });
    return toSession(row);
  },

  findById: async (id) => {
    const row = await models.Negotiation.findByPk(id);
    return row ? toSession(row) : null;
  },

  update: async (id, patch) => {
    const row = await loadOrThrow(id);
    await row.update(patch);
    return toSession(row);
  },

  listByClient: async (clientId) => {
    const rows = await models.Negotiation.findAll({
      where: { clientId },
      order: [['startedAt', 'DESC']],
    });
    return rows.map(toSession);
  },

  findOfferById: async (offerId) => {
    const row = await models.Offer.findByPk(offerId);
    return row ? toOffer(row) : null;
  },

  findLatestOffer: async (negotiationId) => {
    const row = await models.Offer.findOne({
      where: { negotiationId },
      order: [['id', 'DESC']],
    });
    return row ? toOffer(row) : null;
  },

  listOffers: async (negotiationId) => {
    const rows = await models.Offer.findAll({
      where: { negotiationId },
      order: [['id', 'ASC']],
    });
    return rows.map(toOffer);
  },

  listRounds: async (negotiationId) => {
    const rows = await models.NegotiationRound.findAll({
      where: { negotiationId },
      order: [['roundNumber', 'ASC']],
    });
    return rows.map(toRound);
  },

  commit: async (change) =>
    sequelize.transaction(async (transaction) => {
      const row = await loadOrThrow(change.negotiationId, transaction);

      const offers: Offer[] = [];
      for (const proposal of change.newOffers ?? []) {
        const created = await models.Offer.create(
          { ...proposal, negotiationId: change.negotiationId },
          { transaction }
        );
        offers.push(toOffer(created));
      }

      for (const update of change.offerStatusUpdates ?? []) {
        await models.Offer.update(
          { status: update.status },
          { where: { id: update.offerId, negotiationId: change.negotiationId }, transaction }
        );
      }

      let round: NegotiationRoundRecord | null = null;
      if (change.round) {
        const created = await models.NegotiationRound.create(
          { ...change.round, id: uuidv4(), negotiationId: change.negotiationId },
          { transaction }
        );
        round = toRound(created);
      }

      await row.update(change.patch, { transaction });

      return { session: toSession(row), round, offers };
    }),
};

export default repo;
