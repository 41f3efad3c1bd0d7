import Fastify, { type FastifyInstance } from 'fastify';
import type { CollectorStatus } from './status.js';

export interface HealthServerOptions {
  logger?: boolean;
}

/**
 * Health endpoint for the container: 200 while the last cycle succeeded
 * (or none ran yet), 503 after a failed one.
 */
export function buildHealthServer(
  status: CollectorStatus,
  options: HealthServerOptions = {}
): FastifyInstance {
  const fastify = Fastify({
    logger: options.logger ?? false,
  });

  fastify.get('/health', async (_request, reply) => {
    const snapshot = status.snapshot();
    return reply.code(snapshot.status === 'ok' ? 200 : 503).send(snapshot);
  });

  return fastify;
}
