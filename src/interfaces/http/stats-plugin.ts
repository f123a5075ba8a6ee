import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { AdapterStats } from '../../application/index.js';

export interface StatsPluginOptions {
  stats: AdapterStats;
}

/**
 * Fastify plugin exposing the adapter counters.
 *
 * Decorates `fastify.stats` for use by downstream routes.
 */
async function statsPlugin(fastify: FastifyInstance, options: StatsPluginOptions): Promise<void> {
  fastify.decorate('stats', options.stats);
}

export default fp(statsPlugin, {
  name: 'stats',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.stats` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    stats: AdapterStats;
  }
}
