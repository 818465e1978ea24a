import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Level } from 'pino';
import bridgePlugin, { type BridgeStatus } from './bridge-plugin.js';
import statusRoutes from './status-routes.js';

export interface StatusServerOptions {
  /** Log level for Fastify's own request logger; `false` disables it. */
  logLevel: Level | false;
}

/**
 * Builds the status API. Listening is left to the caller so tests can use
 * `inject()` without opening a socket.
 */
export async function buildStatusServer(
  status: BridgeStatus,
  options: StatusServerOptions,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logLevel === false ? false : { level: options.logLevel },
  });

  await fastify.register(bridgePlugin, { status });
  await fastify.register(statusRoutes);

  return fastify;
}
