import { createHash, timingSafeEqual } from 'node:crypto';
import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';

export interface AuthPluginOptions {
  /** When undefined, every route is public. */
  token: string | undefined;
}

/** Routes reachable without a token. */
const PUBLIC_ROUTES = new Set(['/health']);

/**
 * Compares two secrets in constant time.
 * Both sides are hashed first so differing lengths take the same path.
 */
export function tokensMatch(provided: string, expected: string): boolean {
  const a = createHash('sha256').update(provided).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

/** Extracts the credential from `Authorization: Bearer <token>`. */
export function extractBearer(header: string | undefined): string | null {
  if (header === undefined) return null;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match?.[1] ?? null;
}

/**
 * Single-user bearer-token authentication.
 *
 * Adds an onRequest hook rejecting requests without the configured token
 * with 401 before any route handler runs.
 */
async function authPlugin(fastify: FastifyInstance, opts: AuthPluginOptions): Promise<void> {
  const expected = opts.token;

  if (expected === undefined) {
    fastify.log.warn('API_TOKEN is not set; authentication is disabled');
    return;
  }

  fastify.addHook('onRequest', async (request, reply) => {
    if (PUBLIC_ROUTES.has(request.routeOptions.url ?? '')) return;

    const provided = extractBearer(request.headers.authorization);
    if (provided === null || !tokensMatch(provided, expected)) {
      return reply
        .status(401)
        .header('WWW-Authenticate', 'Bearer')
        .send({ error: { code: 'UNAUTHORIZED', message: 'Invalid authentication credentials' } });
    }
  });
}

export default fp(authPlugin, {
  name: 'auth',
  fastify: '5.x',
});
