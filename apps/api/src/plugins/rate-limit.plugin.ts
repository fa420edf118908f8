import { type FastifyInstance, type FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';
import { AppError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Rate limit tiers:
//   Default:        100 req/min per user (RATE_LIMIT_MAX)
//   Auth endpoints: 10 req/min per IP
// ---------------------------------------------------------------------------

export interface RateLimitPluginOptions {
  /** Override default max (config or tests). */
  defaultMax?: number;
}

async function rateLimitPlugin(app: FastifyInstance, opts: RateLimitPluginOptions) {
  const defaultMax = opts.defaultMax ?? 100;

  await app.register(rateLimit, {
    max: defaultMax,
    timeWindow: '1 minute',
    keyGenerator: (request) => {
      // Use authenticated userId if available, otherwise fall back to IP
      return request.authContext?.userId ?? request.ip;
    },
    // The builder's result is thrown, so the global error handler renders it.
    errorResponseBuilder: (_request, context) =>
      new AppError(
        context.statusCode,
        'RATE_LIMITED',
        `Rate limit exceeded. Retry after ${Math.ceil(context.ttl / 1000)} seconds.`,
      ),
  });
}

// ---------------------------------------------------------------------------
// Route-level rate limit config factories
// ---------------------------------------------------------------------------

/**
 * Auth endpoint rate limiting: 10 req/min per IP.
 * Use as route-level config: { config: { rateLimit: authRateLimit() } }
 */
export function authRateLimit() {
  return {
    max: 10,
    timeWindow: '1 minute',
    keyGenerator: (request: FastifyRequest) => request.ip,
  };
}

// ---------------------------------------------------------------------------
// Export
// ---------------------------------------------------------------------------

export const rateLimitPluginFp = fp(rateLimitPlugin, {
  name: 'rate-limit-plugin',
});

export { rateLimitPlugin };
