import env from '../../config/env.js';
import logger from '../../config/logger.js';
import type { MarketSnapshot, VehicleDescriptor } from '../../types/index.js';
import { roundTo } from '../../utils/llmPayload.js';
import { withTimeout } from '../../utils/withTimeout.js';
import marketDataRepo, { type MarketDataRepository, type MarketKey } from './marketData.repo.js';
import { createHttpMarketSources, type MarketSource, type SourceQuote } from './market.sources.js';

export type SnapshotOrigin = 'cache' | 'sources' | 'fallback';

export interface ResolvedSnapshot {
  snapshot: MarketSnapshot;
  origin: SnapshotOrigin;
  sourcesUsed: string[];
  /** Set when no source answered and the heuristic band was used. */
  degraded: boolean;
  failures: string[];
}

export interface MarketSnapshotProvider {
  /** Never rejects; falls back to a band around the descriptor's market value. */
  getAggregateMarketSnapshot(descriptor: VehicleDescriptor): Promise<MarketSnapshot>;
  resolve(descriptor: VehicleDescriptor): Promise<ResolvedSnapshot>;
}

export interface MarketSnapshotProviderOptions {
  repo: MarketDataRepository;
  sources: MarketSource[];
  sourceTimeoutMs: number;
  freshnessHours: number;
  now?: () => Date;
}

const HOUR_MS = 60 * 60 * 1000;

export const marketKeyOf = (descriptor: VehicleDescriptor): MarketKey => ({
  make: descriptor.make,
  model: descriptor.model,
  year: descriptor.year,
  fuelType: descriptor.fuelType,
});

/** The ±10% band around a reference price that counts as fair. */
export const fairPriceBand = (referencePrice: number): { min: number; max: number } => ({
  min: roundTo(referencePrice * 0.9),
  max: roundTo(referencePrice * 1.1),
});

/**
 * Heuristic snapshot used when no source answers. `listingsCount: 0` is what
 * tells callers it is not real data.
 */
export const fallbackSnapshot = (referencePrice: number, lastUpdated: Date): MarketSnapshot => {
  const band = fairPriceBand(referencePrice);
  return {
    averagePrice: roundTo(referencePrice),
    minPrice: band.min,
    maxPrice: band.max,
    listingsCount: 0,
    averageMileage: null,
    lastUpdated,
  };
};

const mean = (values: number[]): number => values.reduce((sum, v) => sum + v, 0) / values.length;

/**
 * Averages average/min/max across sources, sums listings, and averages
 * mileage over the sources that report it.
 */
export function aggregateQuotes(quotes: SourceQuote[], lastUpdated: Date): MarketSnapshot {
  const mileages = quotes
    .map((q) => q.averageMileage)
    .filter((m): m is number => m !== null);

  return {
    averagePrice: roundTo(mean(quotes.map((q) => q.averagePrice))),
    minPrice: roundTo(mean(quotes.map((q) => q.minPrice))),
    maxPrice: roundTo(mean(quotes.map((q) => q.maxPrice))),
    listingsCount: quotes.reduce((sum, q) => sum + q.listingsCount, 0),
    averageMileage: mileages.length > 0 ? Math.round(mean(mileages)) : null,
    lastUpdated,
  };
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

export function createMarketSnapshotProvider(options: MarketSnapshotProviderOptions): MarketSnapshotProvider {
  const now = options.now ?? (() => new Date());
  const freshnessMs = options.freshnessHours * HOUR_MS;

  const readCache = async (key: MarketKey): Promise<MarketSnapshot | null> => {
    try {
      return await options.repo.findByKey(key);
    } catch (error) {
      logger.warn('[MarketSnapshot] Cache read failed, treating as miss', { key, error: errorMessage(error) });
      return null;
    }
  };

  const writeCache = async (key: MarketKey, snapshot: MarketSnapshot): Promise<void> => {
    try {
      await options.repo.upsert(key, snapshot);
    } catch (error) {
      logger.warn('[MarketSnapshot] Cache write failed', { key, error: errorMessage(error) });
    }
  };

  const resolve = async (descriptor: VehicleDescriptor): Promise<ResolvedSnapshot> => {
    const key = marketKeyOf(descriptor);
    const cached = await readCache(key);
    const current = now();

    if (cached && current.getTime() - cached.lastUpdated.getTime() < freshnessMs) {
      return { snapshot: cached, origin: 'cache', sourcesUsed: [], degraded: false, failures: [] };
    }

    const settled = await Promise.allSettled(
      options.sources.map((source) =>
        withTimeout(source.fetchQuote(key), options.sourceTimeoutMs, `Market source ${source.name}`)
      )
    );

    const quotes: SourceQuote[] = [];
    const sourcesUsed: string[] = [];
    const failures: string[] = [];
    settled.forEach((result, index) => {
      const name = options.sources[index]?.name ?? `source-${index}`;
      if (result.status === 'fulfilled') {
        quotes.push(result.value);
        sourcesUsed.push(name);
      } else {
        failures.push(`${name}: ${errorMessage(result.reason)}`);
      }
    });

    if (quotes.length === 0) {
      logger.warn('[MarketSnapshot] No market source succeeded, using heuristic band', {
        key,
        referencePrice: descriptor.currentMarketValue,
        failures,
      });
      return {
        snapshot: fallbackSnapshot(descriptor.currentMarketValue, current),
        origin: 'fallback',
        sourcesUsed,
        degraded: true,
        failures,
      };
    }

    const snapshot = aggregateQuotes(quotes, current);
    await writeCache(key, snapshot);
    logger.info('[MarketSnapshot] Refreshed', { key, sourcesUsed, listingsCount: snapshot.listingsCount });

    return { snapshot, origin: 'sources', sourcesUsed, degraded: false, failures };
  };

  return {
    resolve,
    getAggregateMarketSnapshot: async (descriptor) => (await resolve(descriptor)).snapshot,
  };
}

export const createDefaultMarketSnapshotProvider = (): MarketSnapshotProvider =>
  createMarketSnapshotProvider({
    repo: marketDataRepo,
    sources: createHttpMarketSources(env.market.sources, env.market.sourceTimeout),
    sourceTimeoutMs: env.market.sourceTimeout,
    freshnessHours: env.market.freshnessHours,
  });
