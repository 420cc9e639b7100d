import logger from '../../config/logger.js';
import type { MarketSnapshot, Vehicle } from '../../types/index.js';
import type { CompletionFn } from '../../services/llm.service.js';
import {
  optionalNumber,
  parseObjectPayload,
  rawPayload,
  roundTo,
  type JsonRecord,
  type LlmPayload,
} from '../../utils/llmPayload.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { describeSnapshot, describeVehicle } from './market.analyst.js';

const VALUATION_PROMPT = `You value trade-in vehicles for a dealership that must resell them at a profit.
Account for reconditioning costs, mileage, condition and the resale market.
Reply with JSON only:
{"recommended_value": <number>, "min_value": <number>, "max_value": <number>, "reasoning": "<short explanation>"}`;

export type TradeInValueSource = 'valuation' | 'vehicle_estimate' | 'market_minimum';

export interface TradeInValuation {
  value: number;
  source: TradeInValueSource;
}

export interface TradeInEvaluator {
  evaluate(vehicle: Vehicle, snapshot: MarketSnapshot): Promise<LlmPayload<JsonRecord>>;
}

export function createTradeInEvaluator(complete: CompletionFn, timeoutMs: number): TradeInEvaluator {
  return {
    evaluate: async (vehicle, snapshot) => {
      try {
        const text = await withTimeout(
          complete(
            [
              { role: 'system', content: VALUATION_PROMPT },
              {
                role: 'user',
                content: `Trade-in: ${describeVehicle(vehicle)}\nMarket: ${describeSnapshot(snapshot)}`,
              },
            ],
            { temperature: 0.2 }
          ),
          timeoutMs,
          'Trade-in valuation'
        );
        return parseObjectPayload(text);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.warn('[TradeInEvaluator] Valuation unavailable', { vehicleId: vehicle.id, error: message });
        return rawPayload(`Trade-in valuation unavailable: ${message}`, true);
      }
    },
  };
}

/**
 * Picks the trade-in value: the model's non-negative `recommended_value`,
 * else the vehicle's stored estimate, else the snapshot minimum.
 */
export function resolveTradeInValue(
  payload: LlmPayload<JsonRecord>,
  vehicle: Vehicle,
  snapshot: MarketSnapshot
): TradeInValuation {
  switch (payload.kind) {
    case 'structured': {
      const recommended = optionalNumber(payload.data.recommended_value);
      if (recommended !== undefined && recommended >= 0) {
        return { value: roundTo(recommended), source: 'valuation' };
      }
      break;
    }
    case 'raw':
      break;
  }

  if (vehicle.estimatedTradeInValue !== null) {
    return { value: vehicle.estimatedTradeInValue, source: 'vehicle_estimate' };
  }
  return { value: snapshot.minPrice, source: 'market_minimum' };
}
