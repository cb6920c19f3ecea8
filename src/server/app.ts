import Fastify, { type FastifyError, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import config from '../config/index.js';
import type { IdentifyOptions } from '../modules/matching/identify.js';
import { RecordStore } from '../modules/records/store.js';
import { recordRoutes } from '../modules/records/routes.js';
import { identifyRoutes } from '../modules/identify/routes.js';
import { catalogRoutes } from '../modules/catalog/routes.js';
import { healthRoutes } from './health.js';

export interface BuildServerOptions {
  store?: RecordStore;
  logger?: FastifyServerOptions['logger'];
  defaults?: Partial<IdentifyOptions>;
}

export function defaultLoggerOptions(): FastifyServerOptions['logger'] {
  return {
    level: config.LOG_LEVEL ?? (config.NODE_ENV === 'production' ? 'info' : 'debug'),
    transport: config.NODE_ENV !== 'production'
      ? { target: 'pino-pretty', options: { colorize: true } }
      : undefined,
  };
}

export async function buildServer(options: BuildServerOptions = {}) {
  const store = options.store ?? new RecordStore();

  const fastify = Fastify({
    logger: options.logger ?? defaultLoggerOptions(),
    // Signals are small JSON; candidate sets can be a few thousand records
    bodyLimit: 2 * 1024 * 1024,
  });

  // CORS - restrict to allowed origins in production
  const allowedOrigins = config.ALLOWED_ORIGINS
    ? config.ALLOWED_ORIGINS.split(',').map(o => o.trim())
    : true; // Allow all in dev when ALLOWED_ORIGINS is not set

  await fastify.register(cors, {
    origin: allowedOrigins,
  });

  await fastify.register(rateLimit, {
    max: config.RATE_LIMIT_MAX,
    timeWindow: '1 minute',
    keyGenerator: (request) => request.ip,
    // Probes are never limited
    allowList: (request) => {
      const url = request.url.split('?')[0];
      return url === '/health' || url === '/ready';
    },
  });

  const defaults: IdentifyOptions = {
    minRelevance: options.defaults?.minRelevance ?? config.MATCH_MIN_RELEVANCE,
    maxResults: options.defaults?.maxResults ?? config.MATCH_MAX_RESULTS,
    maxEditDistance: options.defaults?.maxEditDistance ?? config.MATCH_MAX_EDIT_DISTANCE,
    textMode: options.defaults?.textMode ?? 'raw',
  };

  // Register routes
  await fastify.register(healthRoutes, { store });
  await fastify.register(recordRoutes, { store });
  await fastify.register(identifyRoutes, {
    store,
    defaults,
    deepLinkScheme: config.DEEP_LINK_SCHEME,
  });
  await fastify.register(catalogRoutes);

  // Global error handler
  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ error }, 'Unhandled error');

    // Don't expose internal errors in production
    const message = config.NODE_ENV === 'production'
      ? 'Internal Server Error'
      : error.message;

    return reply.status(error.statusCode ?? 500).send({
      error: message,
    });
  });

  return fastify;
}
