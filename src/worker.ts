import dotenv from 'dotenv';
import pino from 'pino';
import type { FastifyInstance } from 'fastify';
import { ConfigurationError } from './domain/index.js';
import {
  BackoffPolicy,
  Pipeline,
  ServiceContext,
  loadConfig,
  summarizeConfig,
  type BridgeConfig,
} from './application/index.js';
import { createLogger } from './infrastructure/logger.js';
import { createDbClient, ensureTables, DedupeStore } from './infrastructure/db/index.js';
import { AppMessageDecoder, loadMeshSchema } from './infrastructure/mesh/index.js';
import { BusConnection, createMqttConnector } from './infrastructure/mqtt/index.js';
import { DapnetForwarder } from './infrastructure/gateway/index.js';
import { buildStatusServer } from './interfaces/http/index.js';

/**
 * Bridge process.
 *
 * Order:
 * 1) Load and validate configuration (exit 1 on failure, nothing opened)
 * 2) Open the store, build the bus connection and gateway client
 * 3) Optional status API
 * 4) Run the pipeline until SIGINT / SIGTERM
 */
dotenv.config();

const bootstrapLog = pino({ level: 'info' });

const CONNECT_TIMEOUT_MS = 30_000;
const RECONNECT_JITTER = 0.1;

async function main(): Promise<number> {
  let config: BridgeConfig;
  try {
    config = loadConfig(process.env);
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      bootstrapLog.fatal({ issues: err.issues }, 'Invalid configuration, not starting');
      return 1;
    }
    throw err;
  }

  const log = createLogger({ level: config.log.level, file: config.log.file });
  log.info({ config: summarizeConfig(config) }, 'Starting mesh pager bridge');

  const context = new ServiceContext(log);
  const onSignal = (signal: NodeJS.Signals): void => {
    context.requestShutdown(signal);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  const schema = loadMeshSchema(config.protoPath);

  const dbClient = createDbClient(config.database.file);
  ensureTables(dbClient.sqlite);
  const store = new DedupeStore(dbClient, log.child({ component: 'store' }));
  log.info({ file: config.database.file }, 'Database ready');

  const bus = new BusConnection(
    createMqttConnector({
      url: config.mqtt.url,
      username: config.mqtt.username,
      password: config.mqtt.password,
      keepaliveSeconds: config.mqtt.keepaliveSeconds,
      clientId: config.mqtt.clientId,
      connectTimeoutMs: CONNECT_TIMEOUT_MS,
    }),
    {
      topic: config.mqtt.topic,
      backoff: new BackoffPolicy({
        baseDelayMs: config.gateway.retryDelayMs,
        maxDelayMs: config.reconnect.maxDelayMs,
        jitter: RECONNECT_JITTER,
      }),
      escalateAfter: config.gateway.maxRetries,
    },
    context.forComponent('bus'),
  );

  const pipeline = new Pipeline(
    {
      source: bus,
      store,
      forwarder: new DapnetForwarder(config.gateway, log.child({ component: 'gateway' })),
      schema,
      decoder: new AppMessageDecoder(schema, { maxTextBytes: config.decoder.maxTextBytes }),
      channelKey: config.encryptionKey,
    },
    {
      channel: config.channel,
      broadcastOnly: config.decoder.broadcastOnly,
    },
    context.forComponent('pipeline'),
  );

  let server: FastifyInstance | null = null;
  try {
    if (config.http) {
      server = await buildStatusServer(
        {
          connectionState: () => bus.state,
          stats: () => pipeline.stats,
          shuttingDown: () => context.shuttingDown,
          store,
        },
        { logLevel: config.log.level },
      );
      await server.listen({ host: config.http.host, port: config.http.port });
    }

    await pipeline.run();
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    if (server) await server.close();
    // Already closed by the pipeline unless startup failed before it ran.
    store.close();
  }

  log.info('Bridge stopped');
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    bootstrapLog.fatal({ err }, 'Bridge crashed');
    process.exitCode = 1;
  });
