import { type FastifyRequest, type FastifyReply } from 'fastify';
import { type ClaimShareCode } from '@carelink/shared/schemas/link.schema.js';
import { claimShareCode, type ShadowServiceDeps } from './shadow.service.js';

export interface ShadowHandlerDeps {
  serviceDeps: ShadowServiceDeps;
}

export function createShadowHandlers(deps: ShadowHandlerDeps) {
  // -------------------------------------------------------------------------
  // POST /api/v1/links/claim
  // -------------------------------------------------------------------------

  async function claimHandler(
    request: FastifyRequest<{ Body: ClaimShareCode }>,
    reply: FastifyReply,
  ) {
    const result = await claimShareCode(
      deps.serviceDeps,
      request.authContext,
      request.body.share_code,
    );
    request.log.info(
      { linkId: result.linkId, status: result.status },
      'Share code claimed',
    );
    return reply.code(200).send({ data: result });
  }

  return { claimHandler };
}
