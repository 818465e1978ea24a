import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ForwardStatus } from '../../domain/index.js';
import { FORWARD_STATUSES } from '../../infrastructure/db/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 200;

/**
 * Parses a querystring value to an integer.
 * Returns `undefined` for missing values, `NaN` for anything else non-integral.
 */
function safeInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (value.trim() === '' || !Number.isFinite(n) || n !== Math.floor(n)) return NaN;
  return n;
}

function isForwardStatus(value: string): value is ForwardStatus {
  return FORWARD_STATUSES.some((status) => status === value);
}

/**
 * Status API.
 *
 * GET /health           connection state and pipeline counters
 * GET /api/v1/messages  most recent processed messages
 */
async function statusRoutes(fastify: FastifyInstance): Promise<void> {

  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { bridge } = fastify;
    const connection = bridge.connectionState();

    const status = bridge.shuttingDown()
      ? 'stopping'
      : connection === 'connected' ? 'ok' : 'degraded';

    return reply.status(status === 'ok' ? 200 : 503).send({
      status,
      connection,
      stats: bridge.stats(),
    });
  });

  /**
   * GET /api/v1/messages
   *
   * Query params: limit (1..200, default 50), status (pending|delivered|failed)
   */
  fastify.get(
    '/api/v1/messages',
    async (
      request: FastifyRequest<{
        Querystring: {
          limit?: string;
          status?: string;
        };
      }>,
      reply: FastifyReply,
    ) => {
      const q = request.query;

      const limit = safeInt(q.limit);
      if (limit !== undefined && Number.isNaN(limit)) {
        return reply.status(400).send({ error: 'limit must be an integer' });
      }
      if (limit !== undefined && (limit < 1 || limit > MAX_LIMIT)) {
        return reply.status(400).send({ error: `limit must be between 1 and ${MAX_LIMIT}` });
      }

      let status: ForwardStatus | undefined;
      if (q.status !== undefined) {
        if (!isForwardStatus(q.status)) {
          return reply
            .status(400)
            .send({ error: `status must be one of: ${FORWARD_STATUSES.join(', ')}` });
        }
        status = q.status;
      }

      const { store } = fastify.bridge;
      const [messages, counts] = await Promise.all([
        store.listRecent({ limit: limit ?? DEFAULT_LIMIT, status }),
        store.countByStatus(),
      ]);

      return reply.status(200).send({ data: messages, counts });
    },
  );
}

export default fp(statusRoutes, {
  name: 'status-routes',
  dependencies: ['bridge'],
  fastify: '5.x',
});
