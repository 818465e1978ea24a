import { connect } from 'mqtt';
import type { IClientOptions, MqttClient } from 'mqtt';
import { ConnectionError } from '../../domain/index.js';

/** The few broker operations the bus connection uses. */
export interface BusClient {
  subscribe(topic: string, qos: 0 | 1): Promise<void>;
  end(): Promise<void>;
  onMessage(handler: (topic: string, payload: Uint8Array) => void): void;
  onClose(handler: () => void): void;
  onError(handler: (err: Error) => void): void;
}

/** Opens one broker session. Rejects with ConnectionError on failure or abort. */
export type BusConnector = (signal: AbortSignal) => Promise<BusClient>;

export interface BrokerOptions {
  url: string;
  username: string;
  password: string;
  keepaliveSeconds: number;
  clientId: string;
  connectTimeoutMs: number;
}

const SUBACK_FAILURE = 0x80;

function wrapClient(client: MqttClient): BusClient {
  return {
    async subscribe(topic, qos) {
      const grants = await client.subscribeAsync(topic, { qos });
      const rejected = grants.find((grant) => grant.qos === SUBACK_FAILURE);
      if (rejected) {
        throw new ConnectionError(`Broker rejected subscription to ${rejected.topic}`);
      }
    },
    async end() {
      await client.endAsync();
    },
    onMessage(handler) {
      client.on('message', (topic, payload) => handler(topic, payload));
    },
    onClose(handler) {
      client.on('close', handler);
    },
    onError(handler) {
      client.on('error', (err) => handler(err));
    },
  };
}

/**
 * Builds a connector backed by mqtt.js.
 *
 * mqtt.js's own reconnect loop is disabled (`reconnectPeriod: 0`); the bus
 * connection drives reconnects so it can apply its backoff policy and
 * re-subscribe before delivery resumes.
 */
export function createMqttConnector(options: BrokerOptions): BusConnector {
  const clientOptions: IClientOptions = {
    username: options.username,
    password: options.password,
    keepalive: options.keepaliveSeconds,
    clientId: options.clientId,
    connectTimeout: options.connectTimeoutMs,
    reconnectPeriod: 0,
    clean: true,
  };

  return (signal) => new Promise<BusClient>((resolve, reject) => {
    if (signal.aborted) {
      reject(new ConnectionError('Connect aborted'));
      return;
    }

    const client = connect(options.url, clientOptions);

    const cleanup = (): void => {
      client.removeListener('connect', onConnect);
      client.removeListener('error', onError);
      client.removeListener('close', onClose);
      signal.removeEventListener('abort', onAbort);
    };
    const fail = (err: ConnectionError): void => {
      cleanup();
      client.end(true);
      reject(err);
    };
    const onConnect = (): void => {
      cleanup();
      resolve(wrapClient(client));
    };
    const onError = (err: Error): void => {
      fail(new ConnectionError(`Broker connection failed: ${err.message}`, { cause: err }));
    };
    const onClose = (): void => {
      fail(new ConnectionError('Broker closed the connection before CONNACK'));
    };
    const onAbort = (): void => {
      fail(new ConnectionError('Connect aborted'));
    };

    client.once('connect', onConnect);
    client.once('error', onError);
    client.once('close', onClose);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}
