import type {
  BusMessage,
  ForwardFailureReason,
  MalformedReason,
  MessageForwarder,
  PacketSource,
  ProcessedMessageStore,
  ProcessedRecord,
  RawPacket,
  RecordResult,
  TextMessage,
} from '../domain/index.js';
import {
  BROADCAST_NODE_ID,
  DecryptionError,
  PersistenceBusyError,
  assertNever,
  formatNodeId,
} from '../domain/index.js';
import { decryptPayload } from '../infrastructure/crypto/index.js';
import type { AppMessageDecoder, EnvelopeDropReason, MeshSchema } from '../infrastructure/mesh/index.js';
import { parseServiceEnvelope } from '../infrastructure/mesh/index.js';
import type { RuntimeContext } from './context.js';

export type DropReason =
  | EnvelopeDropReason
  | MalformedReason
  | 'not_broadcast'
  | 'wrong_channel'
  | 'decrypt_failed'
  | 'not_text';

/** What happened to one bus message. */
export type HandleOutcome =
  | { readonly outcome: 'delivered'; readonly packetId: number; readonly attempts: number }
  | { readonly outcome: 'failed'; readonly packetId: number; readonly reason: Exclude<ForwardFailureReason, 'cancelled'> }
  /** Forward cancelled by shutdown; the record stays pending for the next start. */
  | { readonly outcome: 'interrupted'; readonly packetId: number }
  | { readonly outcome: 'duplicate'; readonly packetId: number }
  | { readonly outcome: 'dropped'; readonly reason: DropReason }
  /** Store stayed busy; nothing recorded, safe to process again on redelivery. */
  | { readonly outcome: 'deferred'; readonly packetId: number; readonly reason: 'persistence_busy' };

export interface PipelineStats {
  received: number;
  delivered: number;
  failed: number;
  duplicates: number;
  deferred: number;
  interrupted: number;
  resumed: number;
  errors: number;
  dropped: Partial<Record<DropReason, number>>;
}

export interface PipelineDeps {
  source: PacketSource;
  store: ProcessedMessageStore;
  forwarder: MessageForwarder;
  schema: MeshSchema;
  decoder: AppMessageDecoder;
  channelKey: Uint8Array;
}

export interface PipelineOptions {
  /** Packets from any other channel are dropped. */
  channel: string;
  broadcastOnly: boolean;
  /** Upper bound on pending records re-forwarded at startup. */
  resumeBatchSize?: number;
}

const DEFAULT_RESUME_BATCH = 100;

/** Drop reasons that point at a problem worth a warning rather than routine filtering. */
const WARN_DROPS: ReadonlySet<DropReason> = new Set<DropReason>([
  'envelope_decode_failed',
  'decrypt_failed',
  'parse_failed',
  'unknown_portnum',
  'empty_text',
  'text_too_long',
  'invalid_utf8',
]);

/**
 * Single worker loop that moves packets from the bus to the gateway.
 *
 * Per message:
 *   envelope -> broadcast/channel filter -> seen? -> decrypt -> decode
 *     -> recordPending -> forward -> markOutcome
 *
 * Every stage reports an expected failure as a HandleOutcome; anything
 * unexpected is caught per message and logged so the loop keeps running.
 * Shutdown stops new receives, lets the in-flight message finish (a
 * forward in backoff is cancelled), closes the store, then the bus.
 */
export class Pipeline {
  private readonly counters: PipelineStats = {
    received: 0,
    delivered: 0,
    failed: 0,
    duplicates: 0,
    deferred: 0,
    interrupted: 0,
    resumed: 0,
    errors: 0,
    dropped: {},
  };

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions,
    private readonly context: RuntimeContext,
  ) {}

  /** Snapshot of the counters. */
  get stats(): PipelineStats {
    return { ...this.counters, dropped: { ...this.counters.dropped } };
  }

  /** Runs until the context signal aborts or the source stops. */
  async run(): Promise<void> {
    const { log, signal } = this.context;

    log.info({ channel: this.options.channel, broadcastOnly: this.options.broadcastOnly }, 'Pipeline starting');

    try {
      await this.deps.source.start();
      await this.resumePending();

      while (!signal.aborted) {
        const message = await this.deps.source.receive();
        if (message === null) break;

        try {
          await this.handle(message);
        } catch (err: unknown) {
          this.counters.errors++;
          log.error({ err, topic: message.topic }, 'Unexpected error handling bus message');
        }
      }
    } finally {
      await this.shutdown();
    }

    log.info({ stats: this.stats }, 'Pipeline stopped');
  }

  /** Processes one bus message end to end. */
  async handle(message: BusMessage): Promise<HandleOutcome> {
    this.counters.received++;

    const envelope = parseServiceEnvelope(this.deps.schema, message.topic, message.payload, message.receivedAt);
    if (!envelope.ok) {
      return this.drop(envelope.reason, { topic: message.topic, detail: envelope.detail });
    }

    const packet = envelope.packet;
    const packetId = packet.packetId;
    const from = formatNodeId(packet.sourceNodeId);

    if (this.options.broadcastOnly && packet.destNodeId !== BROADCAST_NODE_ID) {
      return this.drop('not_broadcast', { packetId, from, to: formatNodeId(packet.destNodeId) });
    }
    if (packet.channelName !== this.options.channel) {
      return this.drop('wrong_channel', { packetId, channel: packet.channelName });
    }

    try {
      if (await this.deps.store.hasSeen(packetId)) {
        return this.duplicate(packetId);
      }
    } catch (err: unknown) {
      return this.deferOrThrow(err, packetId);
    }

    let plaintext: Uint8Array;
    try {
      plaintext = decryptPayload(
        this.deps.channelKey,
        { packetId, fromNodeId: packet.sourceNodeId },
        packet.encryptedPayload,
      );
    } catch (err: unknown) {
      if (!(err instanceof DecryptionError)) throw err;
      return this.drop('decrypt_failed', { packetId, from, err });
    }

    const decoded = this.deps.decoder.decode(plaintext, packet);
    switch (decoded.kind) {
      case 'malformed':
        return this.drop(decoded.reason, { packetId, from });
      case 'other':
        return this.drop('not_text', { packetId, from, port: decoded.portName });
      case 'text':
        return this.accept(decoded, packet);
      default:
        return assertNever(decoded);
    }
  }

  /**
   * Re-forwards records left pending by an earlier run that stopped between
   * recording and delivery. One batch, oldest first.
   */
  async resumePending(): Promise<number> {
    const { log, signal } = this.context;
    if (signal.aborted) return 0;

    const limit = this.options.resumeBatchSize ?? DEFAULT_RESUME_BATCH;
    let pending: ProcessedRecord[];
    try {
      pending = await this.deps.store.listPending(limit);
    } catch (err: unknown) {
      if (!(err instanceof PersistenceBusyError)) throw err;
      log.warn({ err }, 'Could not load pending records, skipping resume');
      return 0;
    }

    if (pending.length === 0) return 0;
    log.info({ count: pending.length, limit }, 'Resuming interrupted deliveries');

    let resumed = 0;
    for (const record of pending) {
      if (signal.aborted) break;

      const message: TextMessage = {
        kind: 'text',
        text: record.text,
        fromNodeId: record.fromNodeId,
        toNodeId: record.toNodeId,
        packetId: record.packetId,
      };
      const outcome = await this.forwardAndRecord(message);
      if (outcome.outcome !== 'interrupted') {
        resumed++;
        this.counters.resumed++;
      }
    }

    if (pending.length === limit) {
      log.warn({ limit }, 'More pending records may remain; they are retried on the next start');
    }
    return resumed;
  }

  private async accept(message: TextMessage, packet: RawPacket): Promise<HandleOutcome> {
    const { log } = this.context;

    let recorded: RecordResult;
    try {
      recorded = await this.deps.store.recordPending({
        packetId: message.packetId,
        fromNodeId: message.fromNodeId,
        toNodeId: message.toNodeId,
        channel: packet.channelName,
        text: message.text,
      });
    } catch (err: unknown) {
      return this.deferOrThrow(err, message.packetId);
    }

    if (recorded === 'already_exists') {
      return this.duplicate(message.packetId);
    }

    log.info(
      {
        packetId: message.packetId,
        from: formatNodeId(message.fromNodeId),
        gateway: packet.gatewayId,
        text: message.text,
      },
      'Text message received',
    );

    return this.forwardAndRecord(message);
  }

  private async forwardAndRecord(message: TextMessage): Promise<HandleOutcome> {
    const { log, signal } = this.context;
    const { packetId } = message;

    const result = await this.deps.forwarder.forward(message, signal);

    if (result.status === 'delivered') {
      this.counters.delivered++;
      await this.recordOutcome(packetId, 'delivered', result.attempts);
      return { outcome: 'delivered', packetId, attempts: result.attempts };
    }

    const { reason, attempts } = result;
    if (reason === 'cancelled') {
      this.counters.interrupted++;
      log.info({ packetId }, 'Forward interrupted by shutdown, record left pending');
      return { outcome: 'interrupted', packetId };
    }

    this.counters.failed++;
    await this.recordOutcome(packetId, 'failed', attempts);
    return { outcome: 'failed', packetId, reason };
  }

  /** A busy store here leaves the record pending, so it is resumed on the next start. */
  private async recordOutcome(packetId: number, status: 'delivered' | 'failed', attempts: number): Promise<void> {
    try {
      await this.deps.store.markOutcome(packetId, status, attempts);
    } catch (err: unknown) {
      if (!(err instanceof PersistenceBusyError)) throw err;
      this.context.log.error({ err, packetId, status }, 'Could not record forward outcome, record left pending');
    }
  }

  private drop(reason: DropReason, context: Record<string, unknown>): HandleOutcome {
    this.counters.dropped[reason] = (this.counters.dropped[reason] ?? 0) + 1;
    if (WARN_DROPS.has(reason)) {
      this.context.log.warn({ ...context, reason }, 'Dropped packet');
    } else {
      this.context.log.debug({ ...context, reason }, 'Dropped packet');
    }
    return { outcome: 'dropped', reason };
  }

  private duplicate(packetId: number): HandleOutcome {
    this.counters.duplicates++;
    this.context.log.debug({ packetId }, 'Duplicate packet, already processed');
    return { outcome: 'duplicate', packetId };
  }

  private deferOrThrow(err: unknown, packetId: number): HandleOutcome {
    if (!(err instanceof PersistenceBusyError)) throw err;
    this.counters.deferred++;
    this.context.log.warn({ err, packetId }, 'Store busy, packet not recorded');
    return { outcome: 'deferred', packetId, reason: 'persistence_busy' };
  }

  private async shutdown(): Promise<void> {
    const { log } = this.context;

    try {
      this.deps.store.close();
    } catch (err: unknown) {
      log.error({ err }, 'Failed to close store');
    }

    await this.deps.source.close();
  }
}
