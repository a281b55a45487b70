import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';

import { ConfigError, RequestCancelledError, ValidationError } from './errors.js';
import { toPolicyDocument } from './policy/index.js';
import type { ShieldServices } from './services.js';
import type { ErrorResponse } from './types/index.js';

export const VERSION = '1.0.0';

export function parseLimit(raw: string | undefined, defaultLimit: number, maxLimit: number): number {
  if (raw === undefined || raw === '') return Math.min(defaultLimit, maxLimit);
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError('Query parameter "limit" must be a non-negative integer');
  }
  return Math.min(Number(raw), maxLimit);
}

function errorBody(reason: string): ErrorResponse {
  return { status: 'error', reason };
}

export async function buildApp(services: ShieldServices, logger: Logger): Promise<FastifyInstance> {
  const { config, pipeline, policies, events, sessions, registry, backend } = services;

  const app = Fastify({ logger: false });

  await app.register(cors, {
    origin: config.cors.allowed_origins,
    credentials: true
  });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ValidationError) {
      return reply.status(400).send(errorBody(error.message));
    }
    if (error instanceof ConfigError) {
      logger.warn({ error: error.message, url: request.url }, 'Configuration rejected');
      return reply.status(422).send(errorBody(error.message));
    }
    if (error instanceof RequestCancelledError) {
      return reply.status(499).send(errorBody(error.message));
    }
    // Body parse failures, rate limiting and other client errors raised by fastify
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send(errorBody(error.message));
    }
    logger.error({ err: error, url: request.url }, 'Unhandled error');
    return reply.status(500).send(errorBody('Internal error'));
  });

  app.get('/api/health', async () => {
    const policy = policies.current();
    return {
      status: 'healthy',
      version: VERSION,
      policy: { version: policy.version, fingerprint: policy.fingerprint },
      backends: backend.getAvailableBackends(),
      detectors: registry.describe()
    };
  });

  app.post('/shield_prompt', async (request, reply) => {
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.on('close', onClose);

    try {
      const result = await pipeline.handle(request.body, controller.signal);
      reply.status(result.status === 'success' ? 200 : 403);
      return result;
    } finally {
      reply.raw.off('close', onClose);
    }
  });

  app.get('/api/policy', async () => toPolicyDocument(policies.current()));

  app.post('/api/policy/reload', async () => {
    const policy = policies.reload(services.policySource);
    return { status: 'reloaded', version: policy.version, fingerprint: policy.fingerprint };
  });

  app.get<{ Querystring: { limit?: string } }>('/api/logs', async (request) => {
    const limit = parseLimit(request.query.limit, config.events.default_limit, config.events.max_limit);
    return { events: await events.query(limit) };
  });

  app.delete<{ Params: { id: string } }>('/api/sessions/:id', async (request, reply) => {
    if (!sessions.reset(request.params.id)) {
      reply.status(404);
      return errorBody(`No active session "${request.params.id}"`);
    }
    return { status: 'reset', session_id: request.params.id };
  });

  return app;
}
