import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { identifyScored, score, type IdentifyOptions } from '../matching/identify.js';
import { aggregateSignals } from '../matching/signals.js';
import { InputValidationError } from '../matching/validation.js';
import type { RecordStore } from '../records/store.js';
import { explainTerms, toResultItem } from './helpers.js';
import {
  identifyBodySchema,
  scoreBodySchema,
  type IdentifyResponse,
  type ScoreResponse,
} from './schemas.js';

export interface IdentifyRoutesOptions {
  store: RecordStore;
  defaults: IdentifyOptions;
  deepLinkScheme: string;
}

export async function identifyRoutes(
  fastify: FastifyInstance,
  opts: IdentifyRoutesOptions
): Promise<void> {
  const { store, defaults, deepLinkScheme } = opts;

  // --------------------------------------------------------------------------
  // POST /api/v1/identify
  //
  // Ranks candidates for a set of visual signals. Candidates default to the
  // whole store; a barcode hit returns that single record.
  // --------------------------------------------------------------------------
  fastify.post('/api/v1/identify', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = identifyBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid request body', details: parsed.error.flatten() });
    }

    const { signals, candidates, options } = parsed.data;
    const resolved: IdentifyOptions = {
      minRelevance: options?.minRelevance ?? defaults.minRelevance,
      maxResults: options?.maxResults ?? defaults.maxResults,
      maxEditDistance: options?.maxEditDistance ?? defaults.maxEditDistance,
      textMode: options?.textMode ?? defaults.textMode,
    };

    try {
      const results = identifyScored(signals, candidates ?? store.list(), resolved);
      const response: IdentifyResponse = {
        results: results.map(r => toResultItem(r, deepLinkScheme)),
        query_terms: aggregateSignals(signals, { textMode: resolved.textMode }),
      };

      request.log.info({
        candidates: candidates?.length ?? store.size,
        results: results.length,
        matchedBy: results[0]?.matchedBy ?? null,
      }, 'Identification complete');

      return reply.send(response);
    } catch (err) {
      if (err instanceof InputValidationError) {
        return reply.status(400).send({ error: err.message, details: err.details });
      }
      request.log.error({ error: err }, 'Identification failed');
      return reply.status(500).send({ error: 'Identification failed' });
    }
  });

  // --------------------------------------------------------------------------
  // POST /api/v1/score
  //
  // Raw relevance of one record, with the tier each query term hit.
  // --------------------------------------------------------------------------
  fastify.post('/api/v1/score', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = scoreBodySchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: 'Invalid request body', details: parsed.error.flatten() });
    }

    const { queryTerms, record, options } = parsed.data;
    const maxEditDistance = options?.maxEditDistance ?? defaults.maxEditDistance;

    const response: ScoreResponse = {
      score: score(queryTerms, record, { maxEditDistance }),
      terms: explainTerms(queryTerms, record, maxEditDistance),
    };

    return reply.send(response);
  });
}

export default identifyRoutes;
