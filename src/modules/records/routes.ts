import { randomUUID } from 'crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { DuplicateRecordError, type RecordStore } from './store.js';
import {
  createRecordSchema,
  recordParamsSchema,
  updateMetadataSchema,
  type RecordParams,
} from './schemas.js';

export interface RecordRoutesOptions {
  store: RecordStore;
}

export async function recordRoutes(
  fastify: FastifyInstance,
  opts: RecordRoutesOptions
): Promise<void> {
  const { store } = opts;

  /**
   * GET /api/v1/records
   * All records in insertion order
   */
  fastify.get('/api/v1/records', async (_request: FastifyRequest, reply: FastifyReply) => {
    const records = store.list();
    return reply.send({ records, total: records.length });
  });

  /**
   * GET /api/v1/records/:id
   */
  fastify.get('/api/v1/records/:id', async (
    request: FastifyRequest<{ Params: RecordParams }>,
    reply: FastifyReply
  ) => {
    const record = store.get(request.params.id);
    if (!record) {
      return reply.status(404).send({ error: 'Record not found' });
    }
    return reply.send(record);
  });

  /**
   * POST /api/v1/records
   * Creates a record; the id is generated when omitted and is immutable afterwards.
   */
  fastify.post('/api/v1/records', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = createRecordSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid request body', details: parsed.error.flatten() });
    }

    const { id, name, metadata } = parsed.data;

    try {
      const record = store.create({ id: id ?? randomUUID(), name, metadata });
      request.log.info({ recordId: record.id }, 'Record created');
      return reply.status(201).send(record);
    } catch (err) {
      if (err instanceof DuplicateRecordError) {
        return reply.status(409).send({ error: err.message });
      }
      throw err;
    }
  });

  /**
   * PUT /api/v1/records/:id/metadata
   * Replaces the record's metadata (null clears it)
   */
  fastify.put('/api/v1/records/:id/metadata', async (
    request: FastifyRequest<{ Params: RecordParams }>,
    reply: FastifyReply
  ) => {
    const params = recordParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: 'Invalid record id', details: params.error.flatten() });
    }

    const body = updateMetadataSchema.safeParse(request.body ?? null);
    if (!body.success) {
      return reply.status(400).send({ error: 'Invalid metadata', details: body.error.flatten() });
    }

    const updated = store.setMetadata(params.data.id, body.data);
    if (!updated) {
      return reply.status(404).send({ error: 'Record not found' });
    }

    return reply.send(updated);
  });

  /**
   * DELETE /api/v1/records/:id
   */
  fastify.delete('/api/v1/records/:id', async (
    request: FastifyRequest<{ Params: RecordParams }>,
    reply: FastifyReply
  ) => {
    if (!store.remove(request.params.id)) {
      return reply.status(404).send({ error: 'Record not found' });
    }
    request.log.info({ recordId: request.params.id }, 'Record deleted');
    return reply.status(204).send();
  });
}

export default recordRoutes;
