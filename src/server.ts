import { buildApp } from './app.js';
import RedisService from './services/redis.service.js';
import RateLimiterService from './services/rateLimiter.service.js';
import ValetService from './services/valet.service.js';
import { CACHE_TTL_SECONDS, LOG_LEVEL, VALET_MAX_REQ_PER_MIN } from './config/constants.js';

let redis: RedisService | undefined;

const { fastify } = await buildApp((log) => {
  redis = new RedisService(log);
  const rateLimiter = new RateLimiterService(log);
  const valetService = new ValetService(log, { cache: redis, rateLimiter });
  return { redisService: redis, rateLimiter, valetService };
}, { level: LOG_LEVEL });

fastify.addHook('onClose', async () => {
  await redis?.quit();
});

// Start server
const start = async () => {
  try {
    const port = parseInt(process.env.PORT || '8000', 10);
    const host = process.env.HOST || '0.0.0.0';

    await fastify.listen({ port, host });
    fastify.log.info(`Rate limit: ${VALET_MAX_REQ_PER_MIN} requests/min to Valet`);
    fastify.log.info(`Redis cache TTL: ${CACHE_TTL_SECONDS}s (${CACHE_TTL_SECONDS / 60} min)`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      }
    );
  });
}

await start();
