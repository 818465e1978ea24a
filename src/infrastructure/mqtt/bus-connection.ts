import type { BusMessage, ConnectionState, PacketSource } from '../../domain/index.js';
import { ConnectionError } from '../../domain/index.js';
import type { RuntimeContext } from '../../application/context.js';
import { retryWithBackoff, type BackoffPolicy, type SleepFn } from '../../application/backoff.js';
import type { BusClient, BusConnector } from './mqtt-client.js';

export interface BusConnectionOptions {
  topic: string;
  qos?: 0 | 1;
  /** Reconnect policy. Attempts are unbounded; only the delay is capped. */
  backoff: BackoffPolicy;
  /** Log at fatal level after every this-many consecutive connect failures. */
  escalateAfter: number;
  /** Messages buffered while the consumer is busy; the oldest is dropped beyond this. */
  maxQueue?: number;
  sleep?: SleepFn;
}

export type StateListener = (next: ConnectionState, previous: ConnectionState) => void;

const TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  disconnected: ['connecting', 'shutting_down'],
  connecting: ['connected', 'disconnected', 'reconnecting', 'shutting_down'],
  connected: ['reconnecting', 'shutting_down'],
  reconnecting: ['connecting', 'shutting_down'],
  shutting_down: [],
};

const DEFAULT_MAX_QUEUE = 1000;

/**
 * Subscription lifecycle for the mesh topic.
 *
 *   disconnected -> connecting -> connected
 *   connected -> reconnecting -> connecting -> connected   (on close / keepalive loss)
 *   any -> shutting_down                                    (terminal)
 *
 * Connect attempts back off exponentially up to the policy ceiling and
 * never give up while the service is running. Every new session is
 * subscribed before it is marked connected.
 *
 * Messages are queued and handed out one at a time through `receive()`,
 * so the single consumer never sees two deliveries concurrently.
 */
export class BusConnection implements PacketSource {
  private current: ConnectionState = 'disconnected';
  private client: BusClient | null = null;
  private everConnected = false;
  private reconnecting: Promise<void> | null = null;
  private readonly queue: BusMessage[] = [];
  private waiter: ((message: BusMessage | null) => void) | null = null;
  private readonly listeners = new Set<StateListener>();
  private readonly closing = new AbortController();
  /** Aborts on service shutdown or on `close()`, whichever comes first. */
  private readonly stopSignal: AbortSignal;

  constructor(
    private readonly connector: BusConnector,
    private readonly options: BusConnectionOptions,
    private readonly context: RuntimeContext,
  ) {
    this.stopSignal = AbortSignal.any([context.signal, this.closing.signal]);
    this.stopSignal.addEventListener('abort', () => this.wake(null), { once: true });
  }

  get state(): ConnectionState {
    return this.current;
  }

  /** Returns an unsubscribe function. */
  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Resolves once connected and subscribed, or when shutdown interrupts. */
  async start(): Promise<void> {
    await this.establish();
  }

  /** Next message in arrival order; null once the connection is stopping. */
  receive(): Promise<BusMessage | null> {
    const next = this.queue.shift();
    if (next) return Promise.resolve(next);
    if (this.stopped()) return Promise.resolve(null);
    if (this.waiter) {
      return Promise.reject(new Error('receive() already pending: the bus connection has a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  async close(): Promise<void> {
    if (this.current === 'shutting_down' && this.client === null) return;

    this.transition('shutting_down');
    this.closing.abort();
    const client = this.client;
    this.client = null;
    this.queue.length = 0;
    this.wake(null);

    if (client) {
      try {
        await client.end();
        this.context.log.info('Bus connection closed');
      } catch (err: unknown) {
        this.context.log.warn({ err }, 'Error closing bus client');
      }
    }
  }

  private stopped(): boolean {
    return this.current === 'shutting_down' || this.stopSignal.aborted;
  }

  private transition(next: ConnectionState): void {
    const previous = this.current;
    if (previous === next) return;
    if (!TRANSITIONS[previous].includes(next)) {
      this.context.log.debug({ from: previous, to: next }, 'Ignoring invalid connection state transition');
      return;
    }

    this.current = next;
    this.context.log.info({ from: previous, to: next }, 'Bus connection state changed');
    for (const listener of this.listeners) {
      try {
        listener(next, previous);
      } catch (err: unknown) {
        this.context.log.warn({ err }, 'Connection state listener failed');
      }
    }
  }

  private async establish(): Promise<void> {
    const { log } = this.context;
    const signal = this.stopSignal;

    const result = await retryWithBackoff<BusClient, unknown>(
      this.options.backoff,
      async () => {
        this.transition('connecting');
        let client: BusClient | null = null;
        try {
          client = await this.connector(signal);
          await this.attach(client);
          if (this.client !== client) {
            throw new ConnectionError('Broker closed the session during subscribe');
          }
          return { done: true, value: client };
        } catch (err: unknown) {
          if (client) this.detach(client);
          this.transition(this.everConnected ? 'reconnecting' : 'disconnected');
          return { done: false, retryable: true, error: err };
        }
      },
      {
        signal,
        sleep: this.options.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          const failures = attempt + 1;
          if (failures % this.options.escalateAfter === 0) {
            log.fatal(
              { err: error, failures, delayMs, topic: this.options.topic },
              'Broker unreachable after repeated attempts, still retrying',
            );
          } else {
            log.warn({ err: error, failures, delayMs }, 'Broker connection attempt failed');
          }
        },
      },
    );

    if (!result.ok) {
      log.info({ attempts: result.attempts }, 'Stopped connecting to broker (shutdown)');
      return;
    }

    if (this.stopped()) {
      // Shutdown raced with a successful connect: release the fresh session.
      this.detach(result.value);
      return;
    }

    this.everConnected = true;
    this.transition('connected');
    log.info({ topic: this.options.topic, attempts: result.attempts }, 'Subscribed to mesh topic');
  }

  /** Wires handlers for a fresh session and subscribes. Throws if the subscribe fails. */
  private async attach(client: BusClient): Promise<void> {
    this.client = client;

    client.onMessage((topic, payload) => {
      if (this.client !== client) return;
      this.deliver({ topic, payload, receivedAt: new Date() });
    });
    client.onError((err) => {
      if (this.client !== client) return;
      this.context.log.warn({ err }, 'Bus client error');
    });
    client.onClose(() => {
      if (this.client !== client) return;
      if (this.current === 'connected') {
        this.handleDisconnect(client);
      } else {
        this.client = null;
      }
    });

    await client.subscribe(this.options.topic, this.options.qos ?? 0);
  }

  private detach(client: BusClient): void {
    if (this.client === client) this.client = null;
    client.end().catch((err: unknown) => {
      this.context.log.debug({ err }, 'Error ending stale bus client');
    });
  }

  private handleDisconnect(client: BusClient): void {
    if (this.stopped() || this.reconnecting) return;

    this.context.log.warn('Bus connection lost, reconnecting');
    this.detach(client);
    this.transition('reconnecting');

    this.reconnecting = this.establish()
      .catch((err: unknown) => {
        this.context.log.error({ err }, 'Reconnect loop failed unexpectedly');
      })
      .finally(() => {
        this.reconnecting = null;
      });
  }

  private deliver(message: BusMessage): void {
    if (this.waiter) {
      const waiter = this.waiter;
      this.waiter = null;
      waiter(message);
      return;
    }

    const limit = this.options.maxQueue ?? DEFAULT_MAX_QUEUE;
    if (this.queue.length >= limit) {
      this.queue.shift();
      this.context.log.warn({ limit }, 'Bus queue full, dropped oldest message');
    }
    this.queue.push(message);
  }

  private wake(message: BusMessage | null): void {
    if (!this.waiter) return;
    const waiter = this.waiter;
    this.waiter = null;
    waiter(message);
  }
}
