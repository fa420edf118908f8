import { type FastifyInstance } from 'fastify';
import { claimShareCodeSchema } from '@carelink/shared/schemas/link.schema.js';
import { Capability } from '@carelink/shared/constants/iam.constants.js';
import { authRateLimit } from '../../plugins/rate-limit.plugin.js';
import { createShadowHandlers, type ShadowHandlerDeps } from './shadow.handlers.js';

export async function shadowRoutes(
  app: FastifyInstance,
  opts: { deps: ShadowHandlerDeps },
) {
  const handlers = createShadowHandlers(opts.deps);

  // Share codes are short; throttle guessing like the auth routes.
  app.post('/api/v1/links/claim', {
    schema: { body: claimShareCodeSchema },
    config: { rateLimit: authRateLimit() },
    preHandler: [app.authenticate, app.authorize(Capability.SHARE_CODE_CLAIM)],
    handler: handlers.claimHandler,
  });
}
