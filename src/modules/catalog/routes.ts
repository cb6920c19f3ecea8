import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { findCommonMedication, suggestCommonMedications } from './commonMedications.js';
import { catalogFindQuerySchema, catalogSuggestQuerySchema } from './schemas.js';

export async function catalogRoutes(fastify: FastifyInstance): Promise<void> {
  /**
   * GET /api/v1/catalog/find?q=advil
   * First common medication matching the term anywhere in its names
   */
  fastify.get('/api/v1/catalog/find', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = catalogFindQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Invalid query parameters',
        details: parsed.error.format(),
      });
    }

    const medication = findCommonMedication(parsed.data.q);
    if (!medication) {
      return reply.status(404).send({ error: 'No matching medication' });
    }
    return reply.send(medication);
  });

  /**
   * GET /api/v1/catalog/suggestions?q=asp&limit=5
   * Prefix suggestions for autocomplete
   */
  fastify.get('/api/v1/catalog/suggestions', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = catalogSuggestQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Invalid query parameters',
        details: parsed.error.format(),
      });
    }

    const { q, limit } = parsed.data;
    return reply.send({ suggestions: suggestCommonMedications(q, limit) });
  });
}

export default catalogRoutes;
