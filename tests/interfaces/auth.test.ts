import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import {
  authPlugin,
  errorHandlerPlugin,
  healthRoutes,
  tokensMatch,
  extractBearer,
} from '../../src/interfaces/http/index.js';

describe('tokensMatch', () => {
  it('accepts the same token', () => {
    expect(tokensMatch('test-secret', 'test-secret')).toBe(true);
  });

  it('rejects a different token of the same length', () => {
    expect(tokensMatch('test-secreT', 'test-secret')).toBe(false);
  });

  it('rejects tokens of a different length', () => {
    expect(tokensMatch('test', 'test-secret')).toBe(false);
  });
});

describe('extractBearer', () => {
  it('returns the credential', () => {
    expect(extractBearer('Bearer abc123')).toBe('abc123');
  });

  it('is case-insensitive on the scheme', () => {
    expect(extractBearer('bearer abc123')).toBe('abc123');
  });

  it.each([undefined, '', 'Basic abc123', 'Bearer', 'Bearer a b'])('returns null for %s', (header) => {
    expect(extractBearer(header)).toBeNull();
  });
});

describe('auth plugin', () => {
  let app: FastifyInstance;

  async function build(token: string | undefined): Promise<FastifyInstance> {
    app = Fastify({ logger: false });
    await app.register(errorHandlerPlugin);
    await app.register(authPlugin, { token });
    await app.register(healthRoutes);
    app.get('/api/ping', async () => ({ pong: true }));
    await app.ready();
    return app;
  }

  afterEach(async () => {
    await app.close();
  });

  it('rejects a request without credentials', async () => {
    await build('test-secret');

    const res = await app.inject({ method: 'GET', url: '/api/ping' });

    expect(res.statusCode).toBe(401);
    expect(res.headers['www-authenticate']).toBe('Bearer');
    expect(res.json()).toEqual({
      error: { code: 'UNAUTHORIZED', message: 'Invalid authentication credentials' },
    });
  });

  it('rejects a wrong token', async () => {
    await build('test-secret');

    const res = await app.inject({
      method: 'GET',
      url: '/api/ping',
      headers: { authorization: 'Bearer wrong-secret' },
    });

    expect(res.statusCode).toBe(401);
  });

  it('lets the configured token through', async () => {
    await build('test-secret');

    const res = await app.inject({
      method: 'GET',
      url: '/api/ping',
      headers: { authorization: 'Bearer test-secret' },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ pong: true });
  });

  it('keeps /health public', async () => {
    await build('test-secret');

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: 'ok', app: 'Lifelog' });
  });

  it('allows everything when no token is configured', async () => {
    await build(undefined);

    const res = await app.inject({ method: 'GET', url: '/api/ping' });

    expect(res.statusCode).toBe(200);
  });
});
