import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { createMockVehicle } from './factories.js';
import { createTestApp, type TestApp } from './support/app.js';

describe('Chat API', () => {
  let t: TestApp;

  beforeEach(() => {
    t = createTestApp();
  });

  describe('POST /api/chat/messages', () => {
    it('should answer within the given session', async () => {
      const response = await request(t.app)
        .post('/api/chat/messages')
        .send({ message: 'Do you take trade-ins?', sessionId: 'visit-1' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        message: 'Message answered',
        data: {
          sessionId: 'visit-1',
          message: 'Happy to help with that.',
          degraded: false,
          turns: 2,
          timestamp: '2026-03-01T09:00:00.000Z',
        },
      });
    });

    it('should reject an empty message', async () => {
      const response = await request(t.app).post('/api/chat/messages').send({ message: '   ' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ message: 'Validation error', details: ['message cannot be empty'] });
      expect(t.llm.calls).toHaveLength(0);
    });

    it('should reject a malformed session id', async () => {
      const response = await request(t.app)
        .post('/api/chat/messages')
        .send({ message: 'Hi', sessionId: 'not a valid id!' });

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual([
        'sessionId may only contain letters, digits, dashes and underscores',
      ]);
    });
  });

  describe('POST /api/chat/price', () => {
    it('should quote a price above the fair range', async () => {
      const vehicle = t.store.addVehicle(createMockVehicle());

      const response = await request(t.app)
        .post('/api/chat/price')
        .send({ vehicleId: vehicle.id, proposedPrice: 34000, sessionId: 'visit-2' });

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Price negotiated');
      expect(response.body.data).toEqual({
        vehicleId: vehicle.id,
        marketValue: 30000,
        proposedPrice: 34000,
        fairMin: 27000,
        fairMax: 33000,
        counterOffer: 30000,
        position: 'above',
        sessionId: 'visit-2',
        recommendation: 'Happy to help with that.',
        degraded: false,
      });
    });

    it('should return 404 for an unknown vehicle', async () => {
      const response = await request(t.app).post('/api/chat/price').send({ vehicleId: 99, proposedPrice: 20000 });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Vehicle 99 not found');
    });

    it('should require a positive proposed price', async () => {
      const vehicle = t.store.addVehicle(createMockVehicle());

      const response = await request(t.app).post('/api/chat/price').send({ vehicleId: vehicle.id, proposedPrice: 0 });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Validation error');
    });
  });

  describe('DELETE /api/chat/sessions/:sessionId', () => {
    it('should clear a session history', async () => {
      await request(t.app).post('/api/chat/messages').send({ message: 'Hello', sessionId: 'visit-3' });

      const response = await request(t.app).delete('/api/chat/sessions/visit-3');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        message: 'Session visit-3 cleared',
        data: { sessionId: 'visit-3', cleared: true },
      });
      expect(t.store.chats.has('visit-3')).toBe(false);
    });
  });
});
