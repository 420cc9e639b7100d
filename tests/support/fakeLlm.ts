import type { CompletionFn, LLMOptions } from '../../src/services/llm.service.js';
import type { ChatMessage, OfferKind } from '../../src/types/index.js';

export type Capability = 'generator' | 'advisor' | 'opening' | 'analyst' | 'valuation' | 'chat';

type Reply = string | Error;
export type Responder = Reply | ((messages: ChatMessage[]) => Reply | Promise<Reply>);

export interface RecordedCall {
  capability: Capability;
  messages: ChatMessage[];
  options?: LLMOptions;
}

const MARKERS: Array<[Capability, string]> = [
  ['generator', 'pricing desk'],
  ['advisor', 'negotiating a vehicle deal'],
  ['opening', 'negotiation strategist'],
  ['analyst', 'market analyst'],
  ['valuation', 'value trade-in vehicles'],
  ['chat', 'sales assistant of a car dealership'],
];

export const capabilityOf = (messages: ChatMessage[]): Capability => {
  const system = messages.find((m) => m.role === 'system')?.content ?? '';
  const match = MARKERS.find(([, marker]) => system.includes(marker));
  if (!match) throw new Error(`Unrecognised prompt: ${system.slice(0, 60)}`);
  return match[0];
};

export const requestedKind = (messages: ChatMessage[]): OfferKind => {
  const user = messages.find((m) => m.role === 'user')?.content ?? '';
  if (user.startsWith('Prepare an outright purchase')) return 'purchase';
  if (user.startsWith('Prepare a long-term lease')) return 'long_term_lease';
  return 'subscription';
};

export const GENERATED_OFFERS: Record<OfferKind, string> = {
  purchase:
    '{"purchase_price": 32000, "total_cost": 32000, "warranty_months": 24, "maintenance_included": true, ' +
    '"justification": "Fits budget", "confidence_score": 80}',
  long_term_lease:
    '```json\n{"monthly_payment": 450, "duration_months": 48, "justification": "Low monthly", "confidence_score": 85}\n```',
  subscription: '{"monthly_payment": 650, "duration_months": 12, "insurance_included": true, "confidence_score": 60}',
};

const DEFAULTS: Record<Capability, Responder> = {
  generator: (messages) => GENERATED_OFFERS[requestedKind(messages)],
  advisor: '{"should_conclude": false, "reasoning": "Holding price", "confidence_score": 55}',
  opening: '{"approach": "Lead with warranty", "confidence_score": 70}',
  analyst: '{"market_position": "at market", "demand": "medium", "commentary": "Stable prices."}',
  valuation: '{"recommended_value": 14200, "reasoning": "Average condition"}',
  chat: '  Happy to help with that.  ',
};

/**
 * Scripted stand-in for the completion transport. Each capability answers
 * from its queue first, then from its default.
 */
export class FakeLlm {
  readonly calls: RecordedCall[] = [];
  private readonly queues = new Map<Capability, Responder[]>();
  private readonly defaults: Record<Capability, Responder>;

  constructor(overrides: Partial<Record<Capability, Responder>> = {}) {
    this.defaults = { ...DEFAULTS, ...overrides };
  }

  /** Queues one-off replies for a capability, used before its default. */
  enqueue(capability: Capability, ...replies: Responder[]): this {
    this.queues.set(capability, [...(this.queues.get(capability) ?? []), ...replies]);
    return this;
  }

  callsFor(capability: Capability): RecordedCall[] {
    return this.calls.filter((c) => c.capability === capability);
  }

  readonly complete: CompletionFn = async (messages, options) => {
    const capability = capabilityOf(messages);
    this.calls.push({ capability, messages, options });

    const responder = this.queues.get(capability)?.shift() ?? this.defaults[capability];
    const reply = typeof responder === 'function' ? await responder(messages) : responder;
    if (reply instanceof Error) throw reply;
    return reply;
  };
}
