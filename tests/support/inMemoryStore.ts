import { v4 as uuidv4 } from 'uuid';
import type { ChatSessionRepository } from '../../src/modules/chat/chat.repo.js';
import type { ClientRepository, NewClient } from '../../src/modules/client/client.repo.js';
import type { MarketDataRepository, MarketKey } from '../../src/modules/market/marketData.repo.js';
import type { NegotiationRepository } from '../../src/modules/negotiation/negotiation.repo.js';
import type { NewVehicle, VehicleRepository } from '../../src/modules/vehicle/vehicle.repo.js';
import type {
  ChatMessage,
  MarketSnapshot,
  NegotiationRoundRecord,
  NegotiationSession,
  Offer,
  PartyProfile,
  Vehicle,
} from '../../src/types/index.js';

const keyOf = (key: MarketKey): string => `${key.make}|${key.model}|${key.year}|${key.fuelType}`;

/**
 * In-process stand-in for the Sequelize repositories. `commit` applies all
 * of its writes or none, and round numbers are unique per negotiation like
 * the database index.
 */
export class InMemoryStore {
  readonly vehicles = new Map<number, Vehicle>();
  readonly clients = new Map<number, PartyProfile>();
  readonly sessions = new Map<string, NegotiationSession>();
  readonly offers = new Map<number, Offer>();
  readonly rounds: NegotiationRoundRecord[] = [];
  readonly market = new Map<string, MarketSnapshot>();
  readonly chats = new Map<string, ChatMessage[]>();

  /** The next commit rejects with this error and writes nothing. */
  failNextCommitWith: Error | null = null;
  failNextUpdateWith: Error | null = null;
  commitCount = 0;

  private vehicleSeq = 0;
  private clientSeq = 0;
  private offerSeq = 0;
  private clockMs: number;

  constructor(start: Date = new Date('2026-03-01T09:00:00.000Z')) {
    this.clockMs = start.getTime();
  }

  readonly now = (): Date => new Date(this.clockMs);

  advance(ms: number): void {
    this.clockMs += ms;
  }

  addVehicle(data: NewVehicle): Vehicle {
    this.vehicleSeq += 1;
    const vehicle: Vehicle = {
      id: this.vehicleSeq,
      vin: data.vin,
      registrationNumber: data.registrationNumber,
      make: data.make,
      model: data.model,
      year: data.year,
      version: data.version ?? null,
      mileage: data.mileage,
      fuelType: data.fuelType,
      transmission: data.transmission,
      powerHp: data.powerHp,
      condition: data.condition,
      currentMarketValue: data.currentMarketValue,
      estimatedTradeInValue: data.estimatedTradeInValue ?? null,
      inStock: data.inStock ?? true,
      // Later inserts are newer
      createdAt: new Date(this.clockMs + this.vehicleSeq * 1000),
    };
    this.vehicles.set(vehicle.id, vehicle);
    return structuredClone(vehicle);
  }

  addClient(data: NewClient): PartyProfile {
    this.clientSeq += 1;
    const client: PartyProfile = {
      id: this.clientSeq,
      firstName: data.firstName,
      lastName: data.lastName,
      email: data.email,
      phone: data.phone ?? null,
      preferredFuel: data.preferredFuel ?? null,
      preferredTransmission: data.preferredTransmission ?? null,
      budgetMin: data.budgetMin ?? null,
      budgetMax: data.budgetMax ?? null,
      offerPreference: data.offerPreference ?? 'flexible',
      loyaltyScore: data.loyaltyScore ?? 0.5,
      riskScore: data.riskScore ?? 0.5,
    };
    this.clients.set(client.id, client);
    return structuredClone(client);
  }

  setMarketEntry(key: MarketKey, snapshot: MarketSnapshot): void {
    this.market.set(keyOf(key), structuredClone(snapshot));
  }

  getMarketEntry(key: MarketKey): MarketSnapshot | undefined {
    return this.market.get(keyOf(key));
  }

  roundsOf(negotiationId: string): NegotiationRoundRecord[] {
    return this.rounds
      .filter((r) => r.negotiationId === negotiationId)
      .sort((a, b) => a.roundNumber - b.roundNumber)
      .map((r) => structuredClone(r));
  }

  offersOf(negotiationId: string): Offer[] {
    return [...this.offers.values()]
      .filter((o) => o.negotiationId === negotiationId)
      .sort((a, b) => a.id - b.id)
      .map((o) => structuredClone(o));
  }

  session(id: string): NegotiationSession {
    const session = this.sessions.get(id);
    if (!session) throw new Error(`No session ${id} in store`);
    return structuredClone(session);
  }

  /** Overwrites session fields directly, bypassing the repository. */
  patchSession(id: string, patch: Partial<NegotiationSession>): void {
    this.sessions.set(id, { ...this.session(id), ...patch });
  }

  private applyPatch(session: NegotiationSession, patch: Partial<NegotiationSession>): NegotiationSession {
    const next: NegotiationSession = { ...session, ...patch, updatedAt: this.now() };
    if (next.roundCounter > next.maxRounds) {
      throw new Error('roundCounter cannot exceed maxRounds');
    }
    return next;
  }

  readonly chatRepo: ChatSessionRepository = {
    findHistory: async (sessionId) => {
      const history = this.chats.get(sessionId);
      return history ? structuredClone(history) : null;
    },

    saveHistory: async (sessionId, history) => {
      this.chats.set(sessionId, structuredClone(history));
    },

    remove: async (sessionId) => this.chats.delete(sessionId),
  };

  readonly vehicleRepo: VehicleRepository = {
    findById: async (id) => {
      const vehicle = this.vehicles.get(id);
      return vehicle ? structuredClone(vehicle) : null;
    },
    findByVin: async (vin) => {
      const vehicle = [...this.vehicles.values()].find((v) => v.vin === vin);
      return vehicle ? structuredClone(vehicle) : null;
    },
    findInStock: async (filter) =>
      [...this.vehicles.values()]
        .filter((v) => v.inStock)
        .filter((v) => !filter.fuelType || v.fuelType === filter.fuelType)
        .filter((v) => !filter.transmission || v.transmission === filter.transmission)
        .filter((v) => filter.budgetMin === null || filter.budgetMin === undefined || v.currentMarketValue >= filter.budgetMin)
        .filter((v) => filter.budgetMax === null || filter.budgetMax === undefined || v.currentMarketValue <= filter.budgetMax)
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
        .map((v) => structuredClone(v)),
    create: async (data) => this.addVehicle(data),
  };

  readonly clientRepo: ClientRepository = {
    findById: async (id) => {
      const client = this.clients.get(id);
      return client ? structuredClone(client) : null;
    },
    findByEmail: async (email) => {
      const client = [...this.clients.values()].find((c) => c.email === email);
      return client ? structuredClone(client) : null;
    },
    create: async (data) => this.addClient(data),
  };

  readonly marketRepo: MarketDataRepository = {
    findByKey: async (key) => {
      const entry = this.market.get(keyOf(key));
      return entry ? structuredClone(entry) : null;
    },
    upsert: async (key, snapshot) => {
      this.market.set(keyOf(key), structuredClone(snapshot));
    },
  };

  readonly negotiationRepo: NegotiationRepository = {
    create: async (data) => {
      const now = this.now();
      const session: NegotiationSession = {
        id: uuidv4(),
        clientId: data.clientId,
        tradeInVehicleId: data.tradeInVehicleId,
        targetVehicleId: data.targetVehicleId,
        status: 'initiated',
        roundCounter: 0,
        maxRounds: data.maxRounds,
        marginTarget: data.marginTarget,
        tradeInOfferedValue: null,
        finalPrice: null,
        marginAchieved: null,
        chosenOfferKind: null,
        marketAnalysis: {},
        agentReasoning: {},
        conversation: [],
        startedAt: now,
        endedAt: null,
        updatedAt: now,
      };
      this.sessions.set(session.id, session);
      return structuredClone(session);
    },

    findById: async (id) => {
      const session = this.sessions.get(id);
      return session ? structuredClone(session) : null;
    },

    update: async (id, patch) => {
      if (this.failNextUpdateWith) {
        const error = this.failNextUpdateWith;
        this.failNextUpdateWith = null;
        throw error;
      }
      const next = this.applyPatch(this.session(id), patch);
      this.sessions.set(id, next);
      return structuredClone(next);
    },

    listByClient: async (clientId) =>
      [...this.sessions.values()]
        .filter((s) => s.clientId === clientId)
        .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
        .map((s) => structuredClone(s)),

    findOfferById: async (offerId) => {
      const offer = this.offers.get(offerId);
      return offer ? structuredClone(offer) : null;
    },

    findLatestOffer: async (negotiationId) => this.offersOf(negotiationId).at(-1) ?? null,

    listOffers: async (negotiationId) => this.offersOf(negotiationId),

    listRounds: async (negotiationId) => this.roundsOf(negotiationId),

    commit: async (change) => {
      // Let concurrent callers interleave here, as a real database would
      await new Promise<void>((resolve) => setImmediate(resolve));

      if (this.failNextCommitWith) {
        const error = this.failNextCommitWith;
        this.failNextCommitWith = null;
        throw error;
      }

      const session = this.applyPatch(this.session(change.negotiationId), change.patch);

      if (
        change.round &&
        this.rounds.some(
          (r) => r.negotiationId === change.negotiationId && r.roundNumber === change.round?.roundNumber
        )
      ) {
        throw new Error(`Duplicate round ${change.round.roundNumber} for ${change.negotiationId}`);
      }
      for (const update of change.offerStatusUpdates ?? []) {
        const offer = this.offers.get(update.offerId);
        if (!offer || offer.negotiationId !== change.negotiationId) {
          throw new Error(`Offer ${update.offerId} not in negotiation ${change.negotiationId}`);
        }
      }

      // Validation passed: apply everything
      this.commitCount += 1;
      const createdAt = this.now();
      const offers: Offer[] = (change.newOffers ?? []).map((proposal) => {
        this.offerSeq += 1;
        const offer: Offer = { ...proposal, id: this.offerSeq, negotiationId: change.negotiationId, createdAt };
        this.offers.set(offer.id, offer);
        return structuredClone(offer);
      });
      for (const update of change.offerStatusUpdates ?? []) {
        const offer = this.offers.get(update.offerId);
        if (offer) this.offers.set(offer.id, { ...offer, status: update.status });
      }

      let round: NegotiationRoundRecord | null = null;
      if (change.round) {
        round = {
          ...change.round,
          id: uuidv4(),
          negotiationId: change.negotiationId,
          createdAt,
        };
        this.rounds.push(round);
      }
      this.sessions.set(session.id, session);

      return {
        session: structuredClone(session),
        round: round ? structuredClone(round) : null,
        offers,
      };
    },
  };
}
