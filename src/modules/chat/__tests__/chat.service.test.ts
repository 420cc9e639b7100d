import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError } from '../../../utils/custom-error.js';
import { createMockVehicle } from '../../../../tests/factories.js';
import { FakeLlm } from '../../../../tests/support/fakeLlm.js';
import { InMemoryStore } from '../../../../tests/support/inMemoryStore.js';
import { createChatService, quoteFairPrice, type ChatService } from '../chat.service.js';

describe('Chat Service', () => {
  let store: InMemoryStore;
  let llm: FakeLlm;
  let service: ChatService;

  const build = (historyLimit = 20): ChatService =>
    createChatService({
      sessions: store.chatRepo,
      vehicles: store.vehicleRepo,
      complete: llm.complete,
      timeoutMs: 200,
      historyLimit,
      now: store.now,
    });

  beforeEach(() => {
    store = new InMemoryStore();
    llm = new FakeLlm();
    service = build();
  });

  describe('quoteFairPrice', () => {
    it('should place the proposed price against the ±10% band', () => {
      const vehicle = store.addVehicle(createMockVehicle());

      expect(quoteFairPrice(vehicle, 28000)).toEqual({
        vehicleId: vehicle.id,
        marketValue: 30000,
        proposedPrice: 28000,
        fairMin: 27000,
        fairMax: 33000,
        counterOffer: 30000,
        position: 'within',
      });
      expect(quoteFairPrice(vehicle, 26999).position).toBe('below');
      expect(quoteFairPrice(vehicle, 33000).position).toBe('within');
      expect(quoteFairPrice(vehicle, 33000.01).position).toBe('above');
    });
  });

  describe('sendMessage', () => {
    it('should open a session and keep both sides of the exchange', async () => {
      const reply = await service.sendMessage({ message: 'Do you have diesels?' });

      expect(reply.sessionId).toMatch(/^[0-9a-f-]{36}$/);
      expect(reply).toMatchObject({
        message: 'Happy to help with that.',
        degraded: false,
        turns: 2,
        timestamp: store.now(),
      });
      expect(store.chats.get(reply.sessionId)).toEqual([
        { role: 'user', content: 'Do you have diesels?' },
        { role: 'assistant', content: 'Happy to help with that.' },
      ]);
    });

    it('should replay the session history to the model', async () => {
      await service.sendMessage({ message: 'Hello', sessionId: 'visit-1' });
      llm.enqueue('chat', 'The Octavia is in stock.');

      const reply = await service.sendMessage({ message: 'Is the Octavia available?', sessionId: 'visit-1' });

      expect(reply.message).toBe('The Octavia is in stock.');
      const messages = llm.callsFor('chat')[1]?.messages ?? [];
      expect(messages.map((m) => [m.role, m.content])).toEqual([
        ['system', messages[0]?.content],
        ['user', 'Hello'],
        ['assistant', 'Happy to help with that.'],
        ['user', 'Is the Octavia available?'],
      ]);
    });

    it('should keep sessions apart', async () => {
      await service.sendMessage({ message: 'First visitor', sessionId: 'a' });

      await service.sendMessage({ message: 'Second visitor', sessionId: 'b' });

      expect(llm.callsFor('chat')[1]?.messages.slice(1)).toEqual([{ role: 'user', content: 'Second visitor' }]);
    });

    it('should retain only the most recent messages', async () => {
      service = build(3);

      await service.sendMessage({ message: 'one', sessionId: 's' });
      const reply = await service.sendMessage({ message: 'two', sessionId: 's' });

      expect(reply.turns).toBe(3);
      expect(store.chats.get('s')?.map((m) => m.content)).toEqual([
        'Happy to help with that.',
        'two',
        'Happy to help with that.',
      ]);
    });

    it('should answer in degraded mode when the model fails', async () => {
      llm.enqueue('chat', new Error('model offline'));

      const reply = await service.sendMessage({ message: 'Anyone there?', sessionId: 's' });

      expect(reply).toMatchObject({
        message: 'Chat reply unavailable: model offline',
        degraded: true,
        turns: 1,
      });
      expect(store.chats.get('s')).toEqual([{ role: 'user', content: 'Anyone there?' }]);
    });
  });

  describe('negotiatePrice', () => {
    it('should quote the fair range and ask the model for a recommendation', async () => {
      const vehicle = store.addVehicle(createMockVehicle());
      llm.enqueue('chat', 'Counter at 30000.');

      const result = await service.negotiatePrice({ vehicleId: vehicle.id, proposedPrice: 26000, sessionId: 'p' });

      expect(result).toEqual({
        vehicleId: vehicle.id,
        marketValue: 30000,
        proposedPrice: 26000,
        fairMin: 27000,
        fairMax: 33000,
        counterOffer: 30000,
        position: 'below',
        sessionId: 'p',
        recommendation: 'Counter at 30000.',
        degraded: false,
      });
      expect(llm.callsFor('chat')[0]?.messages.at(-1)?.content).toBe(
        [
          'Negotiate this:',
          'Vehicle: 2021 Skoda Octavia',
          'Market value: 30000',
          'Proposed price: 26000',
          'Fair range: 27000 - 33000',
          'Suggested counter-offer: 30000',
        ].join('\n')
      );
    });

    it('should still quote when the model is unavailable', async () => {
      const vehicle = store.addVehicle(createMockVehicle());
      llm.enqueue('chat', new Error('timeout'));

      const result = await service.negotiatePrice({ vehicleId: vehicle.id, proposedPrice: 31000 });

      expect(result.counterOffer).toBe(30000);
      expect(result.position).toBe('within');
      expect(result.degraded).toBe(true);
      expect(result.recommendation).toBe('Chat reply unavailable: timeout');
    });

    it('should reject unknown vehicles without calling the model', async () => {
      await expect(service.negotiatePrice({ vehicleId: 99, proposedPrice: 1000 })).rejects.toBeInstanceOf(
        NotFoundError
      );
      expect(llm.calls).toHaveLength(0);
    });
  });

  describe('clearSession', () => {
    it('should drop the history and report whether there was any', async () => {
      await service.sendMessage({ message: 'Hello', sessionId: 'gone' });

      expect(await service.clearSession('gone')).toEqual({ sessionId: 'gone', cleared: true });
      expect(store.chats.has('gone')).toBe(false);
      expect(await service.clearSession('gone')).toEqual({ sessionId: 'gone', cleared: false });
    });
  });
});
