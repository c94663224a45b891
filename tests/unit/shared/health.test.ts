import { describe, it, expect } from 'vitest';
import request from 'supertest';
import { RedisBackend } from '../../../src/backend/redis-store.js';
import { createFakeRedis } from '../../fixtures/fake-redis.js';
import { createTestLab } from '../../fixtures/lab.js';

describe('Health Check', () => {
  it('should return status ok with memory and backend info', async () => {
    const { app } = createTestLab();
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('ok');
    expect(res.body.version).toBeDefined();
    expect(res.body.uptime).toBeTypeOf('number');
    expect(res.body.timestamp).toBeDefined();
    expect(res.body.memory.rss).toBeTypeOf('number');
    expect(res.body.memory.heapUsed).toBeTypeOf('number');
    expect(res.body.memory.heapTotal).toBeTypeOf('number');
    expect(res.body.backend).toEqual({ kind: 'memory', status: 'connected' });
  });

  it('should report a reachable Redis backend', async () => {
    const { redis } = createFakeRedis();
    const { app } = createTestLab({ backend: new RedisBackend(redis) });
    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body.backend).toEqual({ kind: 'redis', status: 'connected' });
  });

  it('should answer 503 when Redis does not respond', async () => {
    const { client, redis } = createFakeRedis();
    client.failPing = true;
    const { app } = createTestLab({ backend: new RedisBackend(redis) });
    const res = await request(app).get('/health');

    expect(res.status).toBe(503);
    expect(res.body.status).toBe('degraded');
    expect(res.body.backend).toEqual({ kind: 'redis', status: 'disconnected' });
  });

  it('returns 404 for unknown routes', async () => {
    const { app } = createTestLab();
    const res = await request(app).get('/unknown');
    expect(res.status).toBe(404);
  });
});
