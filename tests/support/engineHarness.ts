import { createMarketAnalyst } from '../../src/modules/market/market.analyst.js';
import { createMarketSnapshotProvider } from '../../src/modules/market/market.service.js';
import type { MarketSource } from '../../src/modules/market/market.sources.js';
import { createTradeInEvaluator } from '../../src/modules/market/tradeIn.evaluator.js';
import {
  NegotiationEngine,
  type NegotiationEngineConfig,
} from '../../src/modules/negotiation/negotiation.engine.js';
import { createOfferProposalGenerator } from '../../src/modules/negotiation/offer.generator.js';
import { createStrategyAdvisor } from '../../src/modules/negotiation/strategy.service.js';
import { FakeLlm } from './fakeLlm.js';
import { InMemoryStore } from './inMemoryStore.js';

export const DEFAULT_ENGINE_CONFIG: NegotiationEngineConfig = {
  maxRounds: 10,
  marginTarget: 0.15,
  satisfactionPriority: 0.7,
  budgetMin: 10000,
  budgetMax: 50000,
  selectionPolicy: 'first',
  historyLimit: 20,
};

export interface EngineHarness {
  engine: NegotiationEngine;
  store: InMemoryStore;
  llm: FakeLlm;
}

export interface HarnessOptions {
  config?: Partial<NegotiationEngineConfig>;
  sources?: MarketSource[];
  llm?: FakeLlm;
  store?: InMemoryStore;
}

export const failingSource = (name: string, message = 'connection refused'): MarketSource => ({
  name,
  fetchQuote: async () => {
    throw new Error(message);
  },
});

export function createEngineHarness(options: HarnessOptions = {}): EngineHarness {
  const store = options.store ?? new InMemoryStore();
  const llm = options.llm ?? new FakeLlm();

  const engine = new NegotiationEngine({
    clients: store.clientRepo,
    vehicles: store.vehicleRepo,
    negotiations: store.negotiationRepo,
    market: createMarketSnapshotProvider({
      repo: store.marketRepo,
      sources: options.sources ?? [failingSource('listings')],
      sourceTimeoutMs: 200,
      freshnessHours: 24,
      now: store.now,
    }),
    generator: createOfferProposalGenerator(llm.complete, 200),
    advisor: createStrategyAdvisor(llm.complete, 200),
    analyst: createMarketAnalyst(llm.complete, 200),
    tradeInEvaluator: createTradeInEvaluator(llm.complete, 200),
    config: { ...DEFAULT_ENGINE_CONFIG, ...options.config },
    now: store.now,
  });

  return { engine, store, llm };
}
