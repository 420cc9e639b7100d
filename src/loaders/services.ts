import env from '../config/env.js';
import { complete } from '../services/openai.service.js';
import type { CompletionFn } from '../services/llm.service.js';
import chatSessionRepo, { type ChatSessionRepository } from '../modules/chat/chat.repo.js';
import { createChatService, type ChatService } from '../modules/chat/chat.service.js';
import clientRepo, { type ClientRepository } from '../modules/client/client.repo.js';
import { createClientService, type ClientService } from '../modules/client/client.service.js';
import { createMarketAnalyst } from '../modules/market/market.analyst.js';
import { createDefaultMarketSnapshotProvider, type MarketSnapshotProvider } from '../modules/market/market.service.js';
import { createTradeInEvaluator } from '../modules/market/tradeIn.evaluator.js';
import { NegotiationEngine } from '../modules/negotiation/negotiation.engine.js';
import negotiationRepo, { type NegotiationRepository } from '../modules/negotiation/negotiation.repo.js';
import { createNegotiationService, type NegotiationService } from '../modules/negotiation/negotiation.service.js';
import { createOfferProposalGenerator } from '../modules/negotiation/offer.generator.js';
import { createStrategyAdvisor } from '../modules/negotiation/strategy.service.js';
import vehicleRepo, { type VehicleRepository } from '../modules/vehicle/vehicle.repo.js';
import { createVehicleService, type VehicleService } from '../modules/vehicle/vehicle.service.js';

export interface AppServices {
  negotiation: NegotiationService;
  vehicle: VehicleService;
  client: ClientService;
  chat: ChatService;
}

export interface ServiceDependencies {
  clients: ClientRepository;
  vehicles: VehicleRepository;
  negotiations: NegotiationRepository;
  chatSessions: ChatSessionRepository;
  market: MarketSnapshotProvider;
  complete: CompletionFn;
  now?: () => Date;
}

export function createServices(deps: ServiceDependencies): AppServices {
  const { negotiation } = env;

  const engine = new NegotiationEngine({
    clients: deps.clients,
    vehicles: deps.vehicles,
    negotiations: deps.negotiations,
    market: deps.market,
    generator: createOfferProposalGenerator(deps.complete, negotiation.proposalTimeout),
    advisor: createStrategyAdvisor(deps.complete, negotiation.advisorTimeout),
    analyst: createMarketAnalyst(deps.complete, negotiation.advisorTimeout),
    tradeInEvaluator: createTradeInEvaluator(deps.complete, negotiation.advisorTimeout),
    config: {
      maxRounds: negotiation.maxRounds,
      marginTarget: negotiation.marginTarget,
      satisfactionPriority: negotiation.satisfactionPriority,
      budgetMin: negotiation.budgetMin,
      budgetMax: negotiation.budgetMax,
      selectionPolicy: negotiation.selectionPolicy,
      historyLimit: negotiation.historyLimit,
    },
    now: deps.now,
  });

  return {
    negotiation: createNegotiationService(engine, deps.negotiations),
    vehicle: createVehicleService(deps.vehicles),
    client: createClientService(deps.clients, deps.negotiations),
    chat: createChatService({
      sessions: deps.chatSessions,
      vehicles: deps.vehicles,
      complete: deps.complete,
      timeoutMs: negotiation.advisorTimeout,
      historyLimit: negotiation.historyLimit,
      now: deps.now,
    }),
  };
}

/** Sequelize repositories, configured market sources and the OpenAI/Ollama transport. */
export const createDefaultServices = (): AppServices =>
  createServices({
    clients: clientRepo,
    vehicles: vehicleRepo,
    negotiations: negotiationRepo,
    chatSessions: chatSessionRepo,
    market: createDefaultMarketSnapshotProvider(),
    complete,
  });

export default createDefaultServices;
