import type { Logger } from 'pino';
import type {
  ForwardStatus,
  PendingRecordInput,
  ProcessedMessageStore,
  ProcessedRecord,
  RecentRecordFilters,
  RecordResult,
} from '../../domain/index.js';
import type { DbClient } from './client.js';
import { DEFAULT_BUSY_RETRY, withBusyRetry, type BusyRetryOptions } from './busy-retry.js';
import {
  countByStatus,
  existsByPacketId,
  findPending,
  findRecent,
  insertPending,
  updateOutcome,
} from './processed-message-repository.js';

/**
 * Durable record of handled packets, keyed by packet id.
 *
 * The bridge is the only writer, so no locking beyond SQLite's own busy
 * timeout and the bounded retry in `withBusyRetry` is needed.
 */
export class DedupeStore implements ProcessedMessageStore {
  private closed = false;

  constructor(
    private readonly client: DbClient,
    private readonly log: Logger,
    private readonly retry: BusyRetryOptions = DEFAULT_BUSY_RETRY,
  ) {}

  hasSeen(packetId: number): Promise<boolean> {
    return withBusyRetry('hasSeen', () => existsByPacketId(this.client.db, packetId), this.log, this.retry);
  }

  async recordPending(input: PendingRecordInput): Promise<RecordResult> {
    const inserted = await withBusyRetry(
      'recordPending',
      () => insertPending(this.client.db, input),
      this.log,
      this.retry,
    );
    return inserted ? 'unique' : 'already_exists';
  }

  async markOutcome(
    packetId: number,
    status: Exclude<ForwardStatus, 'pending'>,
    attempts: number,
  ): Promise<void> {
    const changed = await withBusyRetry(
      'markOutcome',
      () => updateOutcome(this.client.db, packetId, status, attempts),
      this.log,
      this.retry,
    );
    if (!changed) {
      this.log.debug({ packetId, status }, 'Outcome not recorded (unknown or already delivered)');
    }
  }

  listPending(limit: number): Promise<ProcessedRecord[]> {
    return withBusyRetry('listPending', () => findPending(this.client.db, limit), this.log, this.retry);
  }

  listRecent(filters: RecentRecordFilters): Promise<ProcessedRecord[]> {
    return withBusyRetry('listRecent', () => findRecent(this.client.db, filters), this.log, this.retry);
  }

  countByStatus(): Promise<Record<ForwardStatus, number>> {
    return withBusyRetry('countByStatus', () => countByStatus(this.client.db), this.log, this.retry);
  }

  /** Checkpoints the WAL and closes the file. Safe to call twice. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.client.sqlite.pragma('wal_checkpoint(TRUNCATE)');
    this.client.sqlite.close();
    this.log.info('Store closed');
  }
}
