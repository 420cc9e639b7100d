import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { PartyProfile, Vehicle } from '../src/types/index.js';
import { createMockClient, createMockTradeIn, createMockVehicle } from './factories.js';
import { createTestApp, type TestApp } from './support/app.js';

const UNKNOWN_ID = '3f1c6a52-8d4e-4b7a-9c1e-2a5b6c7d8e9f';

describe('Negotiation API', () => {
  let t: TestApp;
  let client: PartyProfile;
  let target: Vehicle;
  let tradeIn: Vehicle;

  beforeEach(() => {
    t = createTestApp();
    client = t.store.addClient(createMockClient());
    target = t.store.addVehicle(createMockVehicle());
    tradeIn = t.store.addVehicle(createMockTradeIn());
  });

  const initiate = async (): Promise<string> => {
    const response = await request(t.app)
      .post('/api/negotiation/initiate')
      .send({ clientId: client.id, targetVehicleId: target.id, tradeInVehicleId: tradeIn.id });
    expect(response.status).toBe(201);
    return response.body.data.id;
  };

  describe('POST /api/negotiation/initiate', () => {
    it('should create an in-progress negotiation', async () => {
      const response = await request(t.app)
        .post('/api/negotiation/initiate')
        .send({ clientId: client.id, targetVehicleId: target.id, tradeInVehicleId: tradeIn.id });

      expect(response.status).toBe(201);
      expect(response.body.message).toBe('Negotiation initiated');
      expect(response.body.data).toMatchObject({
        clientId: client.id,
        targetVehicleId: target.id,
        tradeInVehicleId: tradeIn.id,
        status: 'in_progress',
        roundCounter: 0,
        maxRounds: 10,
        tradeInOfferedValue: 14200,
      });
    });

    it('should require a client id', async () => {
      const response = await request(t.app).post('/api/negotiation/initiate').send({});

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ message: 'Validation error', details: ['clientId is required'] });
    });

    it('should return 404 for an unknown client', async () => {
      const response = await request(t.app).post('/api/negotiation/initiate').send({ clientId: 99 });

      expect(response.status).toBe(404);
      expect(response.body.message).toBe('Client 99 not found');
    });
  });

  describe('POST /api/negotiation/:id/rounds', () => {
    it('should run a round and expose it through history and details', async () => {
      const id = await initiate();

      const round = await request(t.app)
        .post(`/api/negotiation/${id}/rounds`)
        .send({ feedback: 'Can you include roadside assistance?', counterProposal: { roadsideAssistance: true } });

      expect(round.status).toBe(200);
      expect(round.body.data).toMatchObject({
        sessionId: id,
        roundNumber: 1,
        offerId: 1,
        roundStatus: 'ongoing',
        status: 'in_progress',
        shouldContinue: true,
        reasoning: 'Holding price',
      });

      const history = await request(t.app).get(`/api/negotiation/${id}/history`);
      expect(history.status).toBe(200);
      expect(history.body.data).toHaveLength(1);
      expect(history.body.data[0]).toMatchObject({
        roundNumber: 1,
        clientFeedback: 'Can you include roadside assistance?',
        clientCounterProposal: { roadsideAssistance: true },
      });

      const details = await request(t.app).get(`/api/negotiation/${id}`);
      expect(details.status).toBe(200);
      expect(details.body.data.offers).toHaveLength(1);
      expect(details.body.data.offers[0]).toMatchObject({ kind: 'purchase', tradeInValue: 14200, totalCost: 32000 });
    });

    it('should require feedback', async () => {
      const id = await initiate();

      const response = await request(t.app).post(`/api/negotiation/${id}/rounds`).send({});

      expect(response.status).toBe(400);
      expect(response.body.details).toEqual(['feedback is required']);
    });

    it('should reject a counter-proposal with an out-of-range duration', async () => {
      const id = await initiate();

      const response = await request(t.app)
        .post(`/api/negotiation/${id}/rounds`)
        .send({ feedback: 'Longer please', counterProposal: { durationMonths: 120 } });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Validation error');
    });

    it('should return 422 when there is no target vehicle to price', async () => {
      const tight = t.store.addClient(
        createMockClient({ email: 'tight@example.com', budgetMin: 1000, budgetMax: 2000 })
      );
      const started = await request(t.app).post('/api/negotiation/initiate').send({ clientId: tight.id });

      const response = await request(t.app)
        .post(`/api/negotiation/${started.body.data.id}/rounds`)
        .send({ feedback: 'Hi' });

      expect(response.status).toBe(422);
    });

    it('should report the round number of a round that failed to commit', async () => {
      const id = await initiate();
      t.store.failNextCommitWith = new Error('connection reset');

      const response = await request(t.app).post(`/api/negotiation/${id}/rounds`).send({ feedback: 'Hi' });

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        message: `Round 1 of negotiation ${id} failed: connection reset`,
        details: { roundNumber: 1 },
        roundNumber: 1,
      });
    });
  });

  describe('offers', () => {
    it('should conclude the negotiation when an offer is accepted', async () => {
      const id = await initiate();
      await request(t.app).post(`/api/negotiation/${id}/rounds`).send({ feedback: 'Looks fine' });
      t.store.advance(90 * 1000);

      const accepted = await request(t.app).post('/api/negotiation/offers/1/accept').send();

      expect(accepted.status).toBe(200);
      expect(accepted.body.data.session).toMatchObject({
        status: 'concluded',
        finalPrice: 32000,
        marginAchieved: 6.25,
        chosenOfferKind: 'purchase',
      });

      const analysis = await request(t.app).get(`/api/negotiation/${id}/analysis`);
      expect(analysis.body.data).toMatchObject({
        status: 'concluded',
        roundsExecuted: 1,
        offersCount: 1,
        finalPrice: 32000,
        durationMinutes: 1.5,
      });

      const late = await request(t.app).post(`/api/negotiation/${id}/rounds`).send({ feedback: 'One more?' });
      expect(late.body.data).toMatchObject({ status: 'concluded', roundNumber: 1, roundStatus: null });
    });

    it('should record a rejection reason', async () => {
      const id = await initiate();
      await request(t.app).post(`/api/negotiation/${id}/rounds`).send({ feedback: 'Hmm' });

      const rejected = await request(t.app)
        .post('/api/negotiation/offers/1/reject')
        .send({ reason: 'Monthly cost too high' });

      expect(rejected.status).toBe(200);
      expect(rejected.body.data.status).toBe('rejected');
      const details = await request(t.app).get(`/api/negotiation/${id}`);
      expect(details.body.data.negotiation.agentReasoning.last_rejection).toEqual({
        offer_id: 1,
        reason: 'Monthly cost too high',
      });
    });

    it('should validate offer ids', async () => {
      const response = await request(t.app).post('/api/negotiation/offers/abc/accept').send();

      expect(response.status).toBe(400);
    });
  });

  describe('POST /api/negotiation/:id/cancel', () => {
    it('should cancel and then report the cancelled state for further rounds', async () => {
      const id = await initiate();

      const cancelled = await request(t.app).post(`/api/negotiation/${id}/cancel`).send({ reason: 'Bought elsewhere' });
      const round = await request(t.app).post(`/api/negotiation/${id}/rounds`).send({ feedback: 'Hello?' });

      expect(cancelled.status).toBe(200);
      expect(cancelled.body.data.status).toBe('cancelled');
      expect(round.body.data).toMatchObject({ status: 'cancelled', exhausted: false, shouldContinue: false });
    });
  });

  describe('lookups', () => {
    it('should reject ids that are not UUIDs', async () => {
      const response = await request(t.app).get('/api/negotiation/not-a-uuid');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Validation error');
    });

    it('should return 404 for an unknown negotiation', async () => {
      const response = await request(t.app).get(`/api/negotiation/${UNKNOWN_ID}/analysis`);

      expect(response.status).toBe(404);
      expect(response.body.message).toBe(`Negotiation ${UNKNOWN_ID} not found`);
    });
  });
});
