import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import createExpressApp from '../../../loaders/express.js';
import { createHealthService } from '../../health/health.service.js';
import { createTestNegotiation, TestNegotiationContext } from '../../../tests/factories.js';

describe('Negotiation API', () => {
  let app: Application;
  let ctx: TestNegotiationContext;

  const offer = (body: Record<string, unknown>) =>
    request(app)
      .post('/api/negotiations/evaluate')
      .send({ loadId: 'LD-1001', sessionId: 'call-1', carrierOffer: 3200, roundNumber: 1, ...body });

  beforeEach(() => {
    ctx = createTestNegotiation({ ids: ['neg-a'] });
    app = createExpressApp({
      negotiationService: ctx.service,
      healthService: createHealthService({ database: async () => {}, timeoutScheduler: () => false }),
    });
  });

  describe('POST /api/negotiations/evaluate', () => {
    it('should record a counter offer and answer 201', async () => {
      const response = await offer({});

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        message: 'Negotiation round evaluated',
        data: {
          negotiationId: 'neg-a',
          sessionId: 'call-1',
          loadId: 'LD-1001',
          carrierId: null,
          roundNumber: 1,
          carrierOffer: 3200,
          response: 'COUNTER_OFFER',
          counterOffer: 2940,
          remainingRounds: 2,
          message: 'I understand you need $3200.00, but the best I can do is $2940.00.',
          justification: 'Counter-offering to find middle ground',
          rateDifference: 400,
          percentageOverLoadboard: 14.29,
          nextSteps: { action: 'CONTINUE_NEGOTIATION' },
          createdAt: '2026-03-02T15:00:00.000Z',
        },
      });
    });

    it('should record a long carrier id unknown to the carrier directory', async () => {
      const carrierId = 'C'.repeat(80);
      const response = await offer({ carrierId });

      expect(response.status).toBe(201);
      expect(response.body.data.carrierId).toBe(carrierId);
      expect(response.body.data.counterOffer).toBe(2940);
      expect(ctx.store.rounds[0].carrierId).toBe(carrierId);
    });

    it('should answer a replayed round with 200 and the stored decision', async () => {
      const first = await offer({});
      const replay = await offer({});

      expect(replay.status).toBe(200);
      expect(replay.body.message).toBe('Negotiation round already recorded');
      expect(replay.body.data).toEqual(first.body.data);
    });

    it('should hand an accepted offer off to booking', async () => {
      const response = await offer({ carrierOffer: 2900, carrierId: 'MC-100002' });

      expect(response.status).toBe(201);
      expect(response.body.data.finalStatus).toBe('DEAL_ACCEPTED');
      expect(response.body.data.nextSteps).toEqual({
        action: 'PROCEED_TO_BOOKING',
        handoffData: { loadId: 'LD-1001', carrierId: 'MC-100002', agreedRate: 2900 },
      });
    });

    it('should answer 409 when a round is resubmitted with another offer', async () => {
      await offer({});
      const response = await offer({ carrierOffer: 3100 });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        message: 'Round 1 of session call-1 was already recorded with a different offer',
        code: 'DUPLICATE_ROUND_CONFLICT',
        details: { sessionId: 'call-1', roundNumber: 1, recordedOffer: 3200, submittedOffer: 3100 },
      });
    });

    it('should answer 409 when a session switches loads', async () => {
      await offer({});
      const response = await offer({ loadId: 'LD-1002', roundNumber: 2 });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe('SESSION_LOAD_MISMATCH');
    });

    it('should answer 400 INVALID_ROUND for an out-of-range round', async () => {
      const response = await offer({ roundNumber: 4 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        message: 'Round 4 exceeds the maximum of 3 rounds',
        code: 'INVALID_ROUND',
        details: { roundNumber: 4, maxRounds: 3 },
      });
    });

    it('should answer 400 INVALID_ROUND for round zero', async () => {
      const response = await offer({ roundNumber: 0 });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('INVALID_ROUND');
      expect(response.body.message).toBe('Round number must be a positive integer');
    });

    it('should answer 400 INVALID_OFFER for a negative offer', async () => {
      const response = await offer({ carrierOffer: -5 });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('INVALID_OFFER');
      expect(response.body.message).toBe('Carrier offer must be between 0.01 and 999999.99');
    });

    it('should answer 404 LOAD_NOT_FOUND for an unknown load', async () => {
      const response = await offer({ loadId: 'LD-404' });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ message: 'Load LD-404 not found', code: 'LOAD_NOT_FOUND' });
    });

    it('should answer 422 INVALID_PRICING for a load with an unknown urgency', async () => {
      ctx.loads.set('LD-BAD', { baseRate: 1000, fuelSurcharge: 0, urgency: 'SOMEDAY' });
      const response = await offer({ loadId: 'LD-BAD' });

      expect(response.status).toBe(422);
      expect(response.body).toEqual({
        message: 'Unknown urgency tier: SOMEDAY',
        code: 'INVALID_PRICING',
        details: { urgency: 'SOMEDAY' },
      });
    });

    it('should reject a body without an offer', async () => {
      const response = await request(app)
        .post('/api/negotiations/evaluate')
        .send({ loadId: 'LD-1001', sessionId: 'call-1', roundNumber: 1 });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        message: 'Validation error',
        errors: ['Carrier offer is required'],
      });
    });

    it('should reject a session id with spaces', async () => {
      const response = await offer({ sessionId: 'call 1' });

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual([
        'Session ID may only contain letters, digits, ".", "_", ":" and "-"',
      ]);
    });

    it('should reject malformed JSON', async () => {
      const response = await request(app)
        .post('/api/negotiations/evaluate')
        .set('Content-Type', 'application/json')
        .send('{"loadId": ');

      expect(response.status).toBe(400);
    });
  });

  describe('GET /api/negotiations/sessions/:sessionId', () => {
    it('should return the session summary', async () => {
      await offer({});
      const response = await request(app).get('/api/negotiations/sessions/call-1');

      expect(response.status).toBe(200);
      expect(response.body.data).toMatchObject({
        sessionId: 'call-1',
        status: 'ACTIVE',
        currentRound: 1,
        remainingRounds: 2,
        lastCounterOffer: 2940,
      });
      expect(response.body.data.rounds).toHaveLength(1);
    });

    it('should answer 404 for an unknown session', async () => {
      const response = await request(app).get('/api/negotiations/sessions/call-404');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ message: 'Session call-404 not found', code: 'SESSION_NOT_FOUND' });
    });
  });

  describe('POST /api/negotiations/sessions/:sessionId/close', () => {
    it('should close an open session', async () => {
      await offer({});
      const response = await request(app)
        .post('/api/negotiations/sessions/call-1/close')
        .send({ status: 'ABANDONED', reason: 'Carrier hung up' });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        sessionId: 'call-1',
        finalStatus: 'ABANDONED',
        reason: 'Carrier hung up',
        closedAt: '2026-03-02T15:00:00.000Z',
      });
    });

    it('should store an empty reason as null', async () => {
      await offer({});
      const response = await request(app)
        .post('/api/negotiations/sessions/call-1/close')
        .send({ status: 'TIMEOUT', reason: '' });

      expect(response.body.data.reason).toBeNull();
    });

    it('should reject an unknown closure status', async () => {
      const response = await request(app)
        .post('/api/negotiations/sessions/call-1/close')
        .send({ status: 'DONE' });

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual(['Status must be either "ABANDONED" or "TIMEOUT"']);
    });

    it('should answer 409 for a session with a deal outcome', async () => {
      await offer({ carrierOffer: 2900 });
      const response = await request(app)
        .post('/api/negotiations/sessions/call-1/close')
        .send({ status: 'ABANDONED' });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe('SESSION_ALREADY_CLOSED');
    });
  });

  describe('GET /api/negotiations/loads/:loadId/rounds', () => {
    it('should page the rounds of a load', async () => {
      await offer({ sessionId: 'call-1' });
      await offer({ sessionId: 'call-2' });
      await offer({ sessionId: 'call-3' });

      const response = await request(app).get('/api/negotiations/loads/LD-1001/rounds?page=2&limit=2');

      expect(response.status).toBe(200);
      expect(response.body.message).toBe('Negotiation rounds');
      expect(response.body.total).toBe(3);
      expect(response.body.page).toBe(2);
      expect(response.body.totalPages).toBe(2);
      expect(response.body.data).toHaveLength(1);
    });

    it('should reject a page size above 100', async () => {
      const response = await request(app).get('/api/negotiations/loads/LD-1001/rounds?limit=500');

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual(['"limit" must be less than or equal to 100']);
    });
  });

  describe('GET /api/negotiations/loads/:loadId/price-band', () => {
    it('should quote the band with carrier history', async () => {
      const response = await request(app).get(
        '/api/negotiations/loads/LD-1001/price-band?carrierId=MC-100001'
      );

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        loadId: 'LD-1001',
        carrierId: 'MC-100001',
        effectiveRate: 2800,
        minimumRate: 2660,
        autoAcceptRate: 2856,
        maximumRate: 3145.8,
        urgencyFactor: 1.05,
        historyFactor: 1.07,
      });
    });

    it('should answer 404 for an unknown load', async () => {
      const response = await request(app).get('/api/negotiations/loads/LD-404/price-band');

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('LOAD_NOT_FOUND');
    });
  });

  it('should answer 404 for an unknown route', async () => {
    const response = await request(app).get('/api/negotiations/unknown');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ message: 'Route /api/negotiations/unknown not found' });
  });
});
