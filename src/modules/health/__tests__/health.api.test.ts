import { describe, it, expect } from 'vitest';
import request from 'supertest';
import express from 'express';
import { createHealthRouter } from '../health.routes.js';
import { createHealthService } from '../health.service.js';

const buildApp = (database: () => Promise<void>, schedulerRunning = false) => {
  const app = express();
  app.use(
    '/api/health',
    createHealthRouter(createHealthService({ database, timeoutScheduler: () => schedulerRunning }))
  );
  return app;
};

describe('Health API', () => {
  it('should report ok when the database answers', async () => {
    const response = await request(buildApp(async () => {})).get('/api/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok', message: 'Rate negotiation API is running' });
  });

  it('should report ready when the database answers', async () => {
    const response = await request(buildApp(async () => {})).get('/api/health/ready');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ ready: true });
  });

  it('should answer 503 when the database is down', async () => {
    const app = buildApp(async () => {
      throw new Error('connect ECONNREFUSED');
    });

    const health = await request(app).get('/api/health');
    const ready = await request(app).get('/api/health/ready');

    expect(health.status).toBe(503);
    expect(health.body).toEqual({ status: 'error', message: 'Database connection failed' });
    expect(ready.status).toBe(503);
    expect(ready.body).toEqual({ ready: false, reason: 'Database connection failed' });
  });

  it('should list the database and timeout sweep in the service report', async () => {
    const response = await request(buildApp(async () => {})).get('/api/health/services');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('healthy');
    expect(response.body.environment).toBe('test');
    expect(response.body.services.map((service: { name: string }) => service.name)).toEqual([
      'database',
      'session-timeout',
    ]);
    expect(response.body.services[1].message).toBe('Session timeout sweep disabled');
  });

  it('should mark the report unhealthy when the database is down', async () => {
    const response = await request(
      buildApp(async () => {
        throw new Error('connect ECONNREFUSED');
      })
    ).get('/api/health/services');

    expect(response.status).toBe(503);
    expect(response.body.status).toBe('unhealthy');
    expect(response.body.services[0].message).toBe('connect ECONNREFUSED');
  });

  it('should report liveness without checking dependencies', async () => {
    const response = await request(
      buildApp(async () => {
        throw new Error('connect ECONNREFUSED');
      })
    ).get('/api/health/live');

    expect(response.status).toBe(200);
    expect(response.body.alive).toBe(true);
  });
});
