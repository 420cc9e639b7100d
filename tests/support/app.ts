import type { Application } from 'express';
import { createExpressApp } from '../../src/loaders/express.js';
import { createServices } from '../../src/loaders/services.js';
import { createMarketSnapshotProvider } from '../../src/modules/market/market.service.js';
import { failingSource } from './engineHarness.js';
import { FakeLlm } from './fakeLlm.js';
import { InMemoryStore } from './inMemoryStore.js';

export interface TestApp {
  app: Application;
  store: InMemoryStore;
  llm: FakeLlm;
}

/** The real Express app over in-memory repositories and a scripted model. */
export function createTestApp(): TestApp {
  const store = new InMemoryStore();
  const llm = new FakeLlm();

  const services = createServices({
    clients: store.clientRepo,
    vehicles: store.vehicleRepo,
    negotiations: store.negotiationRepo,
    chatSessions: store.chatRepo,
    market: createMarketSnapshotProvider({
      repo: store.marketRepo,
      sources: [failingSource('listings')],
      sourceTimeoutMs: 200,
      freshnessHours: 24,
      now: store.now,
    }),
    complete: llm.complete,
    now: store.now,
  });

  return { app: createExpressApp(services), store, llm };
}
