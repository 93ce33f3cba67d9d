/**
 * Rate Limiter Unit Tests
 */

import express, { Application, RequestHandler } from 'express';
import request from 'supertest';

import { errorHandler } from '../../../src/middlewares/errorHandler';
import { createRateLimiter, RateLimiterOptions } from '../../../src/middlewares/rateLimiter';
import { ErrorCode } from '../../../src/types/errors';

const buildApp = (limiter: RequestHandler): Application => {
  const app = express();
  app.use(express.json());
  app.get('/calls', limiter, (_req, res) => {
    res.json({ ok: true });
  });
  app.post('/calls', limiter, (_req, res) => {
    res.json({ ok: true });
  });
  app.use(errorHandler);
  return app;
};

const limiterWith = (overrides: Partial<RateLimiterOptions> = {}): RequestHandler =>
  createRateLimiter({
    name: 'test',
    windowMs: 60000,
    maxRequests: 2,
    errorCode: ErrorCode.TOO_MANY_LEDGER_CALLS,
    message: 'Too many ledger calls, please try again later',
    ...overrides,
  });

describe('createRateLimiter', () => {
  it('should reject requests over the limit with a 429 error response', async () => {
    const app = buildApp(limiterWith());

    await request(app).post('/calls').expect(200);
    await request(app).post('/calls').expect(200);
    const res = await request(app).post('/calls').expect(429);

    expect(res.body.success).toBe(false);
    expect(res.body.error.code).toBe(ErrorCode.TOO_MANY_LEDGER_CALLS);
    expect(res.body.error.reason).toBe('TOO_MANY_LEDGER_CALLS');
    expect(res.body.error.message).toBe('Too many ledger calls, please try again later');
  });

  it('should send standard rate limit headers', async () => {
    const app = buildApp(limiterWith());

    const res = await request(app).post('/calls').expect(200);

    expect(res.headers['ratelimit-limit']).toBe('2');
    expect(res.headers['ratelimit-remaining']).toBe('1');
  });

  it('should count each key separately', async () => {
    const app = buildApp(
      limiterWith({ maxRequests: 1, keyGenerator: (req) => req.get('X-Caller') ?? 'none' })
    );

    await request(app).post('/calls').set('X-Caller', 'alice').expect(200);
    await request(app).post('/calls').set('X-Caller', 'alice').expect(429);
    await request(app).post('/calls').set('X-Caller', 'bob').expect(200);
  });

  it('should not count skipped requests', async () => {
    const app = buildApp(limiterWith({ maxRequests: 1, skip: (req) => req.method === 'GET' }));

    await request(app).get('/calls').expect(200);
    await request(app).get('/calls').expect(200);
    await request(app).post('/calls').expect(200);
    await request(app).post('/calls').expect(429);
  });

  it('should let requests with the bypass token through', async () => {
    const app = buildApp(limiterWith({ maxRequests: 1 }));

    await request(app).post('/calls').expect(200);
    await request(app).post('/calls').set('X-Load-Test-Token', 'test-bypass-secret').expect(200);
    await request(app).post('/calls').set('X-Load-Test-Token', 'wrong-secret').expect(429);
  });
});
