import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_BUSY_TIMEOUT_MS,
  DedupeStore,
  createDbClient,
  ensureTables,
  findByPacketId,
  findPending,
  findRecent,
  insertPending,
  type DbClient,
} from '../../src/infrastructure/db/index.js';
import { fakeLogger } from '../helpers.js';

function input(packetId: number, text = `message ${packetId}`) {
  return { packetId, fromNodeId: 0x1234abcd, toNodeId: 0xffffffff, channel: 'LongFast', text };
}

describe('DedupeStore', () => {
  let client: DbClient;
  let log: ReturnType<typeof fakeLogger>;
  let store: DedupeStore;

  beforeEach(() => {
    client = createDbClient(':memory:');
    ensureTables(client.sqlite);
    log = fakeLogger();
    store = new DedupeStore(client, log);
  });

  afterEach(() => {
    store.close();
  });

  it('records a packet once', async () => {
    expect(await store.hasSeen(1)).toBe(false);
    expect(await store.recordPending(input(1))).toBe('unique');
    expect(await store.recordPending(input(1, 'different text'))).toBe('already_exists');
    expect(await store.hasSeen(1)).toBe(true);

    const row = findByPacketId(client.db, 1);
    expect(row).toMatchObject({ text: 'message 1', forwardStatus: 'pending', forwardAttempts: 0, forwardedAt: null });
  });

  it('marks a delivery with its attempt count and time', async () => {
    await store.recordPending(input(2));
    await store.markOutcome(2, 'delivered', 3);

    const row = findByPacketId(client.db, 2);
    expect(row?.forwardStatus).toBe('delivered');
    expect(row?.forwardAttempts).toBe(3);
    expect(row?.forwardedAt).not.toBeNull();
  });

  it('never changes a delivered record', async () => {
    await store.recordPending(input(3));
    await store.markOutcome(3, 'delivered', 1);
    await store.markOutcome(3, 'failed', 5);

    expect(findByPacketId(client.db, 3)).toMatchObject({ forwardStatus: 'delivered', forwardAttempts: 1 });
    expect(log.debug).toHaveBeenCalledWith(
      { packetId: 3, status: 'failed' },
      'Outcome not recorded (unknown or already delivered)',
    );
  });

  it('lets a failed record be retried to delivered', async () => {
    await store.recordPending(input(4));
    await store.markOutcome(4, 'failed', 5);
    await store.markOutcome(4, 'delivered', 1);

    expect(findByPacketId(client.db, 4)?.forwardStatus).toBe('delivered');
  });

  it('counts records by status', async () => {
    await store.recordPending(input(10));
    await store.recordPending(input(11));
    await store.recordPending(input(12));
    await store.markOutcome(11, 'delivered', 1);
    await store.markOutcome(12, 'failed', 5);

    expect(await store.countByStatus()).toEqual({ pending: 1, delivered: 1, failed: 1 });
  });

  it('closes once', () => {
    store.close();
    store.close();

    expect(log.info).toHaveBeenCalledTimes(1);
    expect(log.info).toHaveBeenCalledWith('Store closed');
  });
});

describe('processed message queries', () => {
  let client: DbClient;

  beforeEach(() => {
    client = createDbClient(':memory:');
    ensureTables(client.sqlite);
    insertPending(client.db, input(1), new Date('2026-01-01T00:00:03Z'));
    insertPending(client.db, input(2), new Date('2026-01-01T00:00:01Z'));
    insertPending(client.db, input(3), new Date('2026-01-01T00:00:02Z'));
  });

  afterEach(() => {
    client.sqlite.close();
  });

  it('lists pending records oldest first', () => {
    expect(findPending(client.db, 10).map((row) => row.packetId)).toEqual([2, 3, 1]);
    expect(findPending(client.db, 2).map((row) => row.packetId)).toEqual([2, 3]);
  });

  it('lists recent records newest first, optionally by status', () => {
    client.sqlite.prepare("UPDATE processed_messages SET forward_status = 'delivered' WHERE packet_id = 3").run();

    expect(findRecent(client.db, { limit: 10 }).map((row) => row.packetId)).toEqual([1, 3, 2]);
    expect(findRecent(client.db, { limit: 10, status: 'delivered' }).map((row) => row.packetId)).toEqual([3]);
    expect(findPending(client.db, 10).map((row) => row.packetId)).toEqual([2, 1]);
  });
});

describe('createDbClient', () => {
  it('keeps the driver busy wait short', () => {
    const client = createDbClient(':memory:');

    expect(DEFAULT_BUSY_TIMEOUT_MS).toBe(1000);
    expect(client.sqlite.pragma('busy_timeout', { simple: true })).toBe(1000);
    client.sqlite.close();
  });

  it('takes an explicit busy timeout', () => {
    const client = createDbClient(':memory:', { busyTimeoutMs: 250 });

    expect(client.sqlite.pragma('busy_timeout', { simple: true })).toBe(250);
    client.sqlite.close();
  });
});
