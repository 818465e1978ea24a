import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ConnectionState, ProcessedMessageStore } from '../../domain/index.js';
import type { PipelineStats } from '../../application/pipeline.js';

/** Read-only view of the running bridge that the status routes report on. */
export interface BridgeStatus {
  connectionState(): ConnectionState;
  stats(): PipelineStats;
  shuttingDown(): boolean;
  store: Pick<ProcessedMessageStore, 'listRecent' | 'countByStatus'>;
}

export interface BridgePluginOptions {
  status: BridgeStatus;
}

/** Decorates `fastify.bridge` for use by the status routes. */
async function bridgePlugin(fastify: FastifyInstance, options: BridgePluginOptions): Promise<void> {
  fastify.decorate('bridge', options.status);
}

export default fp(bridgePlugin, {
  name: 'bridge',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    bridge: BridgeStatus;
  }
}
