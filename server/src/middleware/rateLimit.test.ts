import express from 'express';
import request from 'supertest';
import { createGlobalRateLimit, createCheckRateLimit, parseRateLimitConfig } from './rateLimit';

function createApp(opts: { globalMax?: number; checkMax?: number } = {}) {
  const app = express();

  app.use(createGlobalRateLimit({ windowMs: 60000, max: opts.globalMax ?? 3 }));

  app.get('/api/status', (_req, res) => {
    res.json({ ok: true });
  });

  app.post('/api/check', createCheckRateLimit({ windowMs: 60000, max: opts.checkMax ?? 1 }), (_req, res) => {
    res.json({ ok: true });
  });

  return app;
}

describe('Rate Limit Middleware', () => {
  describe('global rate limit', () => {
    it('allows requests under the limit', async () => {
      const app = createApp({ globalMax: 3 });

      const res = await request(app).get('/api/status');

      expect(res.status).toBe(200);
      expect(res.headers['ratelimit-limit']).toBeDefined();
      expect(res.headers['ratelimit-remaining']).toBeDefined();
    });

    it('returns 429 after exceeding the limit', async () => {
      const app = createApp({ globalMax: 2 });

      await request(app).get('/api/status');
      await request(app).get('/api/status');
      const res = await request(app).get('/api/status');

      expect(res.status).toBe(429);
      expect(res.body.error).toBe('Too many requests, please try again later');
      expect(res.headers['retry-after']).toBeDefined();
    });
  });

  describe('manual check rate limit', () => {
    it('limits manual checks separately from other routes', async () => {
      const app = createApp({ globalMax: 10, checkMax: 1 });

      const first = await request(app).post('/api/check');
      const second = await request(app).post('/api/check');
      const status = await request(app).get('/api/status');

      expect(first.status).toBe(200);
      expect(second.status).toBe(429);
      expect(second.body.error).toBe('Too many manual checks, please try again later');
      expect(status.status).toBe(200);
    });
  });

  describe('parseRateLimitConfig', () => {
    it('returns defaults when nothing is set', () => {
      expect(parseRateLimitConfig({})).toEqual({
        global: { windowMs: 900000, max: 300 },
        check: { windowMs: 60000, max: 3 },
      });
    });

    it('reads the environment', () => {
      const config = parseRateLimitConfig({
        RATE_LIMIT_WINDOW_MS: '300000',
        RATE_LIMIT_MAX: '50',
        CHECK_RATE_LIMIT_WINDOW_MS: '120000',
        CHECK_RATE_LIMIT_MAX: '2',
      });

      expect(config.global).toEqual({ windowMs: 300000, max: 50 });
      expect(config.check).toEqual({ windowMs: 120000, max: 2 });
    });

    it('falls back on invalid values', () => {
      const config = parseRateLimitConfig({ CHECK_RATE_LIMIT_MAX: 'lots', CHECK_RATE_LIMIT_WINDOW_MS: '0' });

      expect(config.check).toEqual({ windowMs: 60000, max: 3 });
    });
  });
});
