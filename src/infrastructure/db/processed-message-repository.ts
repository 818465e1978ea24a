import { and, count, desc, eq, ne, type SQL } from 'drizzle-orm';
import type { ForwardStatus, PendingRecordInput, RecentRecordFilters } from '../../domain/index.js';
import type { Database } from './client.js';
import { processedMessages } from './schema.js';

/** Row shape returned by processed-message queries. */
export type ProcessedMessageRow = typeof processedMessages.$inferSelect;

/**
 * Inserts a pending record idempotently.
 *
 * Uses ON CONFLICT DO NOTHING on the packet_id primary key, so an existing
 * row (whatever its status) is never overwritten.
 * Returns true if a row was inserted, false if it was a duplicate.
 */
export function insertPending(db: Database, input: PendingRecordInput, now: Date = new Date()): boolean {
  const timestamp = now.toISOString();
  const result = db
    .insert(processedMessages)
    .values({
      packetId: input.packetId,
      fromNodeId: input.fromNodeId,
      toNodeId: input.toNodeId,
      channel: input.channel,
      text: input.text,
      forwardStatus: 'pending',
      forwardAttempts: 0,
      forwardedAt: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    })
    .onConflictDoNothing({ target: processedMessages.packetId })
    .run();

  return result.changes > 0;
}

export function existsByPacketId(db: Database, packetId: number): boolean {
  const row = db
    .select({ packetId: processedMessages.packetId })
    .from(processedMessages)
    .where(eq(processedMessages.packetId, packetId))
    .limit(1)
    .get();
  return row !== undefined;
}

export function findByPacketId(db: Database, packetId: number): ProcessedMessageRow | undefined {
  return db
    .select()
    .from(processedMessages)
    .where(eq(processedMessages.packetId, packetId))
    .get();
}

/**
 * Records the forwarding outcome. A delivered row is final and is left
 * untouched. Returns true if a row changed.
 */
export function updateOutcome(
  db: Database,
  packetId: number,
  status: Exclude<ForwardStatus, 'pending'>,
  attempts: number,
  now: Date = new Date(),
): boolean {
  const timestamp = now.toISOString();
  const result = db
    .update(processedMessages)
    .set({
      forwardStatus: status,
      forwardAttempts: attempts,
      forwardedAt: status === 'delivered' ? timestamp : null,
      updatedAt: timestamp,
    })
    .where(and(
      eq(processedMessages.packetId, packetId),
      ne(processedMessages.forwardStatus, 'delivered'),
    ))
    .run();

  return result.changes > 0;
}

/** Oldest-first, so interrupted messages are resumed in arrival order. */
export function findPending(db: Database, limit: number): ProcessedMessageRow[] {
  return db
    .select()
    .from(processedMessages)
    .where(eq(processedMessages.forwardStatus, 'pending'))
    .orderBy(processedMessages.createdAt)
    .limit(limit)
    .all();
}

/** Newest-first listing for the status API. */
export function findRecent(db: Database, filters: RecentRecordFilters): ProcessedMessageRow[] {
  const conditions: SQL[] = [];

  if (filters.status !== undefined) {
    conditions.push(eq(processedMessages.forwardStatus, filters.status));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  return db
    .select()
    .from(processedMessages)
    .where(whereClause)
    .orderBy(desc(processedMessages.createdAt))
    .limit(filters.limit)
    .all();
}

export function countByStatus(db: Database): Record<ForwardStatus, number> {
  const rows = db
    .select({ status: processedMessages.forwardStatus, total: count() })
    .from(processedMessages)
    .groupBy(processedMessages.forwardStatus)
    .all();

  const totals: Record<ForwardStatus, number> = { pending: 0, delivered: 0, failed: 0 };
  for (const row of rows) {
    totals[row.status] = row.total;
  }
  return totals;
}
