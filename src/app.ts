import Fastify, { type FastifyBaseLogger, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import { setupRoutes, type HealthSource } from './routes/index.js';
import type RateLimiterService from './services/rateLimiter.service.js';
import type ValetService from './services/valet.service.js';

export interface AppServices {
  redisService: HealthSource;
  rateLimiter: RateLimiterService;
  valetService: Pick<ValetService, 'fetchObservations'>;
}

/**
 * Creates the Fastify instance and wires the routes. Services are built from
 * the instance's logger so everything logs through the same pino instance.
 */
export async function buildApp(
  createServices: (log: FastifyBaseLogger) => AppServices,
  logger: FastifyServerOptions['logger'] = true
) {
  const fastify = Fastify({ logger });

  // CORS configuration
  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'OPTIONS']
  });

  const services = createServices(fastify.log);
  setupRoutes(fastify, services.redisService, services.rateLimiter, services.valetService);
  return { fastify, services };
}
