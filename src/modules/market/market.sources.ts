import axios from 'axios';
import Joi from 'joi';
import type { MarketSourceConfig } from '../../config/env.js';
import type { MarketKey } from './marketData.repo.js';

/** Aggregate price statistics reported by one external source. */
export interface SourceQuote {
  averagePrice: number;
  minPrice: number;
  maxPrice: number;
  listingsCount: number;
  averageMileage: number | null;
}

export interface MarketSource {
  readonly name: string;
  fetchQuote(key: MarketKey): Promise<SourceQuote>;
}

const quoteSchema = Joi.object<SourceQuote>({
  averagePrice: Joi.number().min(0).required(),
  minPrice: Joi.number().min(0).required(),
  maxPrice: Joi.number().min(0).required(),
  listingsCount: Joi.number().integer().min(1).required(),
  averageMileage: Joi.number().min(0).allow(null).default(null),
})
  .rename('average_price', 'averagePrice', { ignoreUndefined: true })
  .rename('min_price', 'minPrice', { ignoreUndefined: true })
  .rename('max_price', 'maxPrice', { ignoreUndefined: true })
  .rename('listings_count', 'listingsCount', { ignoreUndefined: true })
  .rename('average_mileage', 'averageMileage', { ignoreUndefined: true })
  .custom((quote: SourceQuote, helpers) => {
    if (quote.minPrice > quote.averagePrice || quote.averagePrice > quote.maxPrice) {
      return helpers.message({ custom: 'price statistics must satisfy min <= average <= max' });
    }
    return quote;
  });

/**
 * Validates a source payload. Throws when it is not a usable quote.
 */
export function parseSourceQuote(source: string, payload: unknown): SourceQuote {
  const { error, value } = quoteSchema.validate(payload, { stripUnknown: true, convert: true });
  if (error) {
    throw new Error(`[MarketSnapshot] Source ${source} returned an invalid quote: ${error.message}`);
  }
  return value;
}

/**
 * A JSON endpoint queried with `make`, `model`, `year` and `fuel_type`.
 */
export function createHttpMarketSource(config: MarketSourceConfig, timeoutMs: number): MarketSource {
  return {
    name: config.name,
    fetchQuote: async (key) => {
      const response = await axios.get<unknown>(config.url, {
        params: {
          make: key.make,
          model: key.model,
          year: key.year,
          fuel_type: key.fuelType,
        },
        timeout: timeoutMs,
      });
      return parseSourceQuote(config.name, response.data);
    },
  };
}

export const createHttpMarketSources = (
  configs: MarketSourceConfig[],
  timeoutMs: number
): MarketSource[] => configs.map((config) => createHttpMarketSource(config, timeoutMs));
