import express from 'express';
import request from 'supertest';
import pino from 'pino';
import { createRequestLogger, redactHeaders } from './requestLogger';

function createTestLogger() {
  const logs: Record<string, unknown>[] = [];
  const stream = {
    write(msg: string) {
      logs.push(JSON.parse(msg));
    },
  };
  const logger = pino({ level: 'info' }, stream);
  return { logger, logs };
}

function createApp(opts: { quietHealthCheck?: boolean } = {}) {
  const { logger, logs } = createTestLogger();
  const app = express();

  app.use(createRequestLogger({ logger, quietHealthCheck: opts.quietHealthCheck ?? true }));

  app.get('/api/health', (_req, res) => res.json({ status: 'healthy' }));
  app.get('/api/status', (_req, res) => res.json({ ok: true }));
  app.post('/api/check', (_req, res) => res.status(429).json({ error: 'slow down' }));
  app.get('/api/broken', (_req, res) => res.status(500).json({ error: 'fail' }));

  return { app, logs };
}

function field(log: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = log[key];
  return typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {};
}

describe('Request Logger Middleware', () => {
  it('logs method, url and status', async () => {
    const { app, logs } = createApp();

    await request(app).get('/api/status');

    expect(logs).toHaveLength(1);
    expect(field(logs[0], 'req').method).toBe('GET');
    expect(field(logs[0], 'req').url).toBe('/api/status');
    expect(field(logs[0], 'res').statusCode).toBe(200);
    expect(typeof logs[0].responseTime).toBe('number');
  });

  it('logs client errors at warn and server errors at error', async () => {
    const { app, logs } = createApp();

    await request(app).post('/api/check');
    await request(app).get('/api/broken');

    expect(logs.map(log => log.level)).toEqual([40, 50]);
  });

  it('redacts the authorization header', async () => {
    const { app, logs } = createApp();

    await request(app).get('/api/status').set('Authorization', 'Bearer test-token');

    expect(field(field(logs[0], 'req'), 'headers').authorization).toBe('[REDACTED]');
  });

  it('skips health checks by default', async () => {
    const { app, logs } = createApp({ quietHealthCheck: true });

    await request(app).get('/api/health');

    expect(logs).toHaveLength(0);
  });

  it('logs health checks when asked to', async () => {
    const { app, logs } = createApp({ quietHealthCheck: false });

    await request(app).get('/api/health');

    expect(logs).toHaveLength(1);
  });
});

describe('redactHeaders', () => {
  it('redacts credentials case-insensitively', () => {
    const result = redactHeaders({ Authorization: 'Bearer xyz', COOKIE: 'sid=test', 'set-cookie': 'a=b' });

    expect(result).toEqual({ Authorization: '[REDACTED]', COOKIE: '[REDACTED]', 'set-cookie': '[REDACTED]' });
  });

  it('passes other headers through and drops undefined values', () => {
    const result = redactHeaders({ 'content-type': 'application/json', 'x-custom': undefined });

    expect(result).toEqual({ 'content-type': 'application/json' });
  });
});
