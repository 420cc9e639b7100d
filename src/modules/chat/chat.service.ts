import { v4 as uuidv4 } from 'uuid';
import logger from '../../config/logger.js';
import type { CompletionFn } from '../../services/llm.service.js';
import type { Vehicle } from '../../types/index.js';
import { NotFoundError } from '../../utils/custom-error.js';
import { payloadToText, rawPayload, roundTo, type LlmPayload } from '../../utils/llmPayload.js';
import { withTimeout } from '../../utils/withTimeout.js';
import { fairPriceBand } from '../market/market.service.js';
import { ConversationContext } from '../negotiation/conversationContext.js';
import type { VehicleRepository } from '../vehicle/vehicle.repo.js';
import type { ChatSessionRepository } from './chat.repo.js';

const CHAT_PROMPT = `You are the sales assistant of a car dealership.
Answer questions about buying, leasing or subscribing to a vehicle and about trading one in.
Be concise and concrete. When a price comes up, say whether it is fair for the market and what you would counter with.`;

export type PricePosition = 'below' | 'within' | 'above';

export interface PriceQuote {
  vehicleId: number;
  marketValue: number;
  proposedPrice: number;
  fairMin: number;
  fairMax: number;
  counterOffer: number;
  position: PricePosition;
}

export interface ChatReply {
  sessionId: string;
  message: string;
  degraded: boolean;
  /** Messages retained for the next turn. */
  turns: number;
  timestamp: Date;
}

export interface PriceNegotiation extends PriceQuote {
  sessionId: string;
  recommendation: string;
  degraded: boolean;
}

export interface SendMessageInput {
  message: string;
  sessionId?: string;
}

export interface NegotiatePriceInput {
  vehicleId: number;
  proposedPrice: number;
  sessionId?: string;
}

export interface ChatService {
  sendMessage(input: SendMessageInput): Promise<ChatReply>;
  negotiatePrice(input: NegotiatePriceInput): Promise<PriceNegotiation>;
  clearSession(sessionId: string): Promise<{ sessionId: string; cleared: boolean }>;
}

export interface ChatServiceDeps {
  sessions: ChatSessionRepository;
  vehicles: VehicleRepository;
  complete: CompletionFn;
  timeoutMs: number;
  historyLimit: number;
  now?: () => Date;
}

/**
 * Fair range is ±10% of the vehicle's market value; the counter-offer is its
 * midpoint.
 */
export function quoteFairPrice(vehicle: Vehicle, proposedPrice: number): PriceQuote {
  const band = fairPriceBand(vehicle.currentMarketValue);
  const position: PricePosition =
    proposedPrice < band.min ? 'below' : proposedPrice > band.max ? 'above' : 'within';

  return {
    vehicleId: vehicle.id,
    marketValue: vehicle.currentMarketValue,
    proposedPrice,
    fairMin: band.min,
    fairMax: band.max,
    counterOffer: roundTo((band.min + band.max) / 2),
    position,
  };
}

const describeQuote = (vehicle: Vehicle, quote: PriceQuote): string =>
  [
    'Negotiate this:',
    `Vehicle: ${vehicle.year} ${vehicle.make} ${vehicle.model}`,
    `Market value: ${quote.marketValue}`,
    `Proposed price: ${quote.proposedPrice}`,
    `Fair range: ${quote.fairMin} - ${quote.fairMax}`,
    `Suggested counter-offer: ${quote.counterOffer}`,
  ].join('\n');

export function createChatService(deps: ChatServiceDeps): ChatService {
  const { sessions, vehicles, complete, timeoutMs, historyLimit } = deps;
  const now = deps.now ?? (() => new Date());

  const converse = async (sessionId: string, content: string): Promise<ChatReply> => {
    const context = new ConversationContext((await sessions.findHistory(sessionId)) ?? [], historyLimit);

    let reply: LlmPayload<never>;
    try {
      const text = await withTimeout(
        complete(context.toMessages(CHAT_PROMPT, { role: 'user', content }), { temperature: 0.7 }),
        timeoutMs,
        'Chat reply'
      );
      reply = rawPayload(text.trim());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('[ChatService] Reply unavailable', { sessionId, error: message });
      reply = rawPayload(`Chat reply unavailable: ${message}`, true);
    }

    const text = payloadToText(reply);
    const degraded = reply.kind === 'raw' && reply.degraded;
    context.add('user', content);
    if (!degraded) context.add('assistant', text);
    await sessions.saveHistory(sessionId, context.snapshot());

    return { sessionId, message: text, degraded, turns: context.size, timestamp: now() };
  };

  return {
    sendMessage: async ({ message, sessionId }) => {
      const reply = await converse(sessionId ?? uuidv4(), message);
      logger.info('[ChatService] Message answered', {
        sessionId: reply.sessionId,
        degraded: reply.degraded,
        turns: reply.turns,
      });
      return reply;
    },

    negotiatePrice: async ({ vehicleId, proposedPrice, sessionId }) => {
      const vehicle = await vehicles.findById(vehicleId);
      if (!vehicle) {
        throw new NotFoundError(`Vehicle ${vehicleId} not found`);
      }

      const quote = quoteFairPrice(vehicle, proposedPrice);
      const reply = await converse(sessionId ?? uuidv4(), describeQuote(vehicle, quote));

      logger.info('[ChatService] Price quoted', {
        sessionId: reply.sessionId,
        vehicleId,
        proposedPrice,
        position: quote.position,
      });
      return { ...quote, sessionId: reply.sessionId, recommendation: reply.message, degraded: reply.degraded };
    },

    clearSession: async (sessionId) => {
      const cleared = await sessions.remove(sessionId);
      logger.info('[ChatService] Session cleared', { sessionId, cleared });
      return { sessionId, cleared };
    },
  };
}
