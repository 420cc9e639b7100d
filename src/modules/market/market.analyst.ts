import logger from '../../config/logger.js';
import type { MarketSnapshot, Vehicle } from '../../types/index.js';
import type { CompletionFn } from '../../services/llm.service.js';
import { parseObjectPayload, rawPayload, type JsonRecord, type LlmPayload } from '../../utils/llmPayload.js';
import { withTimeout } from '../../utils/withTimeout.js';

const ANALYST_PROMPT = `You are an automotive market analyst for a car dealership.
Given a vehicle and aggregated listing statistics, assess its position in the market.
Reply with JSON only:
{"market_position": "below|at|above market", "demand": "low|medium|high", "price_trend": "falling|stable|rising", "commentary": "<two sentences>", "confidence_score": <0-100>}`;

export interface MarketAnalyst {
  analyze(vehicle: Vehicle, snapshot: MarketSnapshot): Promise<LlmPayload<JsonRecord>>;
}

export const describeVehicle = (vehicle: Vehicle): string =>
  `${vehicle.year} ${vehicle.make} ${vehicle.model}${vehicle.version ? ` ${vehicle.version}` : ''}, ` +
  `${vehicle.mileage} km, ${vehicle.fuelType}, ${vehicle.transmission}, ${vehicle.powerHp} hp, ` +
  `condition ${vehicle.condition}, estimated market value ${vehicle.currentMarketValue}`;

export const describeSnapshot = (snapshot: MarketSnapshot): string =>
  snapshot.listingsCount === 0
    ? `No live listings; estimated band ${snapshot.minPrice} - ${snapshot.maxPrice}, midpoint ${snapshot.averagePrice}`
    : `${snapshot.listingsCount} listings, average ${snapshot.averagePrice}, range ${snapshot.minPrice} - ${snapshot.maxPrice}` +
      (snapshot.averageMileage !== null ? `, average mileage ${snapshot.averageMileage} km` : '');

/**
 * Market commentary for a trade-in. Model failures come back as degraded raw text.
 */
export function createMarketAnalyst(complete: CompletionFn, timeoutMs: number): MarketAnalyst {
  return {
    analyze: async (vehicle, snapshot) => {
      try {
        const text = await withTimeout(
          complete(
            [
              { role: 'system', content: ANALYST_PROMPT },
              {
                role: 'user',
                content: `Vehicle: ${describeVehicle(vehicle)}\nMarket: ${describeSnapshot(snapshot)}`,
              },
            ],
            { temperature: 0.3 }
          ),
          timeoutMs,
          'Market analysis'
        );
        return parseObjectPayload(text);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('[MarketAnalyst] Analysis unavailable', { vehicleId: vehicle.id, error: message });
        return rawPayload(`Market analysis unavailable: ${message}`, true);
      }
    },
  };
}
