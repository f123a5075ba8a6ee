import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { AdapterStats } from '../../application/index.js';
import statsPlugin from './stats-plugin.js';
import healthRoutes from './health-routes.js';

export interface HttpServerOptions {
  stats: AdapterStats;
  logLevel?: string | undefined;
}

/**
 * Builds the adapter's HTTP surface. Logging is disabled unless a level is given.
 * The caller decides when to `listen()`.
 */
export async function buildHttpServer(options: HttpServerOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logLevel ? { level: options.logLevel } : false,
  });

  await fastify.register(statsPlugin, { stats: options.stats });
  await fastify.register(healthRoutes);

  return fastify;
}
