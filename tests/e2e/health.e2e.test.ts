/**
 * Health, Metrics and Root Endpoint E2E Tests
 */

import request from 'supertest';

import { createTestContext, connectedProbes } from '../helpers';

describe('Health E2E Tests', () => {
  it('should report healthy when every dependency is up', async () => {
    const { app } = createTestContext();

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({
      status: 'healthy',
      services: { database: { connected: true, readyState: 1 }, redis: { connected: true } },
    });
  });

  it('should report degraded but stay up without Redis', async () => {
    const { app } = createTestContext({ healthProbes: { ...connectedProbes, redis: () => false } });

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body.status).toBe('degraded');
  });

  it('should report unhealthy and not ready without the database', async () => {
    const { app } = createTestContext({
      healthProbes: { ...connectedProbes, database: () => ({ connected: false, readyState: 0 }) },
    });

    const health = await request(app).get('/health');
    const ready = await request(app).get('/health/ready');
    const live = await request(app).get('/health/live');

    expect(health.status).toBe(503);
    expect(health.body.status).toBe('unhealthy');
    expect(ready.status).toBe(503);
    expect(ready.body.status).toBe('not ready');
    expect(live.status).toBe(200);
  });

  it('should expose Prometheus metrics', async () => {
    const { app } = createTestContext();
    await request(app).get('/api/transactions/health');

    const response = await request(app).get('/metrics');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.text).toContain('# TYPE http_requests_total counter');
  });

  it('should echo the correlation id', async () => {
    const { app } = createTestContext();

    const response = await request(app).get('/health/live').set('x-correlation-id', 'corr-e2e');

    expect(response.headers['x-correlation-id']).toBe('corr-e2e');
  });

  it('should describe the service at the root and 404 elsewhere', async () => {
    const { app } = createTestContext();

    const root = await request(app).get('/');
    const missing = await request(app).get('/api/unknown');

    expect(root.body.name).toBe('OpenBank Transaction Service');
    expect(missing.status).toBe(404);
    expect(missing.body.error.message).toBe('Route GET /api/unknown not found');
  });
});
