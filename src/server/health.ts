import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { RecordStore } from '../modules/records/store.js';

export interface HealthRoutesOptions {
  store: RecordStore;
}

export async function healthRoutes(
  fastify: FastifyInstance,
  opts: HealthRoutesOptions
): Promise<void> {
  /**
   * GET /health
   * Basic liveness check - always returns 200 if server is running
   */
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /ready
   * Readiness check - reports how many records can be matched against.
   * An empty store is still ready: callers may send their own candidates.
   */
  fastify.get('/ready', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      status: 'ready',
      timestamp: new Date().toISOString(),
      checks: {
        records: opts.store.size,
      },
    });
  });
}

export default healthRoutes;
