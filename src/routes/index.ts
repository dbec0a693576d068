import type { FastifyInstance } from 'fastify';
import type { ErrorResponse, RatesQuerystring, RatesResponse } from '../types/index.js';
import { openApiSpec } from '../config/openapi.js';
import { SERIES, SOURCE_NAME, VALET_MAX_REQ_PER_MIN, CACHE_TTL_SECONDS } from '../config/constants.js';
import {
  InputError,
  ParseError,
  ProtocolError,
  RateLimitError,
  SelectionError,
  TransportError,
  ValetError,
} from '../errors.js';
import { describeIssues, ratesQuerySchema } from '../schemas/valet.schema.js';
import { serializeObservation } from '../utils/format.js';
import { CACHE_KEY_PREFIX } from '../services/redis.service.js';
import type RedisService from '../services/redis.service.js';
import type RateLimiterService from '../services/rateLimiter.service.js';
import type ValetService from '../services/valet.service.js';

export type HealthSource = Pick<RedisService, 'ping' | 'keys' | 'isEnabled'>;

export function toErrorResponse(error: unknown): { statusCode: number; body: ErrorResponse } {
  const message = error instanceof Error ? error.message : String(error);
  const body: ErrorResponse = { status: 'error', message };
  if (error instanceof ValetError && error.requestUrl) body.valetRequestUrl = error.requestUrl;

  if (error instanceof InputError) return { statusCode: 400, body };
  if (error instanceof SelectionError) return { statusCode: 404, body };
  if (error instanceof RateLimitError) {
    return {
      statusCode: 429,
      body: {
        ...body,
        message: 'Valet access is temporarily blocked (too many requests). Please wait a few minutes.',
        blocked: true,
      },
    };
  }
  if (error instanceof ProtocolError) {
    return {
      statusCode: 502,
      body: { ...body, upstreamStatus: error.status, upstreamPayload: error.payload },
    };
  }
  if (error instanceof TransportError || error instanceof ParseError) return { statusCode: 502, body };
  return { statusCode: 500, body: { status: 'error', message: 'Internal error' } };
}

export function setupRoutes(
  fastify: FastifyInstance,
  redisService: HealthSource,
  rateLimiter: RateLimiterService,
  valetService: Pick<ValetService, 'fetchObservations'>
) {
  // API info endpoint
  fastify.get('/api', async () => ({
    service: 'Bank of Canada FX Rates API',
    version: '1.0.0',
    endpoints: {
      health: 'GET /api/health',
      rates: 'GET /api/boc-exchange?start=2025-01-15&end=2025-01-21&reverse=false',
      openapi: 'GET /api/openapi.json'
    }
  }));

  // OpenAPI JSON endpoint
  fastify.get('/api/openapi.json', async () => openApiSpec);

  // Health check endpoint
  fastify.get('/api/health', async () => {
    let redisStatus = redisService.isEnabled() ? 'disconnected' : 'disabled';
    let cacheKeys = 0;

    if (redisService.isEnabled()) {
      try {
        await redisService.ping();
        redisStatus = 'connected';
        const keys = await redisService.keys(`${CACHE_KEY_PREFIX}*`);
        cacheKeys = keys.length;
      } catch (err) {
        fastify.log.error({ err }, 'Redis health check failed');
      }
    }

    const blockedUntil = rateLimiter.getBlockedUntil();

    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      valetBlockedUntil: blockedUntil > Date.now() ? new Date(blockedUntil).toISOString() : null,
      rateLimitPerMinute: VALET_MAX_REQ_PER_MIN,
      redis: {
        status: redisStatus,
        cachedKeys: cacheKeys,
        ttlSeconds: CACHE_TTL_SECONDS
      }
    };
  });

  // Exchange rates endpoint: single date, or range when `end` is given
  fastify.get<{ Querystring: RatesQuerystring }>('/api/boc-exchange', async (request, reply) => {
    const parsed = ratesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      const body: ErrorResponse = { status: 'error', message: describeIssues(parsed.error) };
      return reply.code(400).send(body);
    }
    const { start, end, reverse } = parsed.data;

    try {
      const result = await valetService.fetchObservations({ startDate: start, endDate: end, reverse });
      const { base, quote } = SERIES[result.series];
      const payload: RatesResponse = {
        status: 'success',
        series: result.series,
        base,
        quote,
        start,
        end: end ?? null,
        observations: result.observations.map(serializeObservation),
        source: SOURCE_NAME,
        queriedAt: new Date().toISOString(),
        valetRequestUrl: result.valetRequestUrl,
        cached: result.cached === true
      };
      return payload;
    } catch (error) {
      request.log.error({ err: error }, 'Error in /api/boc-exchange');
      const { statusCode, body } = toErrorResponse(error);
      return reply.code(statusCode).send({ ...body, requestedStart: start, requestedEnd: end });
    }
  });

  // 404 handler
  fastify.setNotFoundHandler((request, reply) => {
    const body: ErrorResponse = { status: 'error', message: 'Not found' };
    return reply.code(404).send(body);
  });
}
