import Fastify, { type FastifyError, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import type { ClassifyRequest, ClassifyResponse, ConvertRequest, ErrorResponse } from '../types/index.js';
import type { ClassificationGate } from '../gate/index.js';
import type { ConversionCallback } from '../conversion/index.js';
import type { GuardrailEvaluator } from '../scanners/index.js';
import { AppError } from '../errors.js';
import { toCorsOrigins } from './origins.js';

export const VERSION = '1.0.0';

export interface AppDeps {
  gate: ClassificationGate;
  conversion: ConversionCallback;
  evaluator: GuardrailEvaluator;
  inferenceBackends: string[];
  monitoringBackend: string;
  logger: Logger;
  cors: { allowedOrigins: string[] };
  rateLimit: { requestsPerMinute: number };
}

const classifyBodySchema = {
  type: 'object',
  required: ['description'],
  properties: {
    description: { type: 'string' }
  }
} as const;

const convertBodySchema = {
  type: 'object',
  required: ['trace_id', 'score_id'],
  properties: {
    trace_id: { type: 'string', minLength: 1 },
    score_id: { type: 'string', minLength: 1 }
  }
} as const;

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const logger = deps.logger.child({ component: 'http' });

  const app = Fastify({
    logger: false,
    // A number is not a description
    ajv: { customOptions: { coerceTypes: false } }
  });

  await app.register(cors, {
    origin: toCorsOrigins(deps.cors.allowedOrigins)
  });

  await app.register(rateLimit, {
    max: deps.rateLimit.requestsPerMinute,
    timeWindow: '1 minute'
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof AppError) {
      const body: ErrorResponse = { error: error.code, message: error.message };
      if (error.details) body.details = error.details;
      logger.info({ url: request.url, code: error.code }, 'Request rejected');
      return reply.status(error.statusCode).send(body);
    }

    if (error.validation || error.statusCode === 400) {
      const body: ErrorResponse = { error: 'INVALID_INPUT', message: error.message };
      return reply.status(400).send(body);
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      const body: ErrorResponse = { error: error.code ?? 'REQUEST_ERROR', message: error.message };
      return reply.status(error.statusCode).send(body);
    }

    logger.error({ err: error, url: request.url }, 'Unhandled error');
    const body: ErrorResponse = { error: 'INTERNAL_ERROR', message: 'Internal server error' };
    return reply.status(500).send(body);
  });

  app.get('/health', async () => {
    return {
      status: 'healthy',
      version: VERSION,
      backends: deps.inferenceBackends,
      scanners: deps.evaluator.describe(),
      monitoring: deps.monitoringBackend
    };
  });

  app.post<{ Body: ClassifyRequest }>('/classify', { schema: { body: classifyBodySchema } }, async (request) => {
    const startTime = Date.now();
    const outcome = await deps.gate.handle(request.body.description);

    const response: ClassifyResponse = {
      trace_id: outcome.traceId,
      result: outcome.result
    };
    if (outcome.scoreId !== undefined) {
      response.score_id = outcome.scoreId;
    }

    logger.info({
      trace_id: outcome.traceId,
      processing_time_ms: Date.now() - startTime
    }, 'Classify request processed');

    return response;
  });

  app.post<{ Body: ConvertRequest }>('/convert', { schema: { body: convertBodySchema } }, async (request) => {
    return deps.conversion.convert(request.body.trace_id, request.body.score_id);
  });

  return app;
}
