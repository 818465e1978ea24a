import { sqliteTable, integer, text, index } from 'drizzle-orm/sqlite-core';

export const FORWARD_STATUSES = ['pending', 'delivered', 'failed'] as const;

/**
 * Drizzle schema for the `processed_messages` table.
 *
 * `packet_id` is the natural primary key, the sender-assigned id of the
 * mesh packet. Using it as PK gives idempotent inserts via
 * ON CONFLICT DO NOTHING without a separate uniqueness constraint.
 *
 * Timestamps are ISO-8601 text. Rows are never deleted by the bridge.
 */
export const processedMessages = sqliteTable('processed_messages', {
  packetId: integer('packet_id').primaryKey(),
  fromNodeId: integer('from_node_id').notNull(),
  toNodeId: integer('to_node_id').notNull(),
  channel: text('channel').notNull(),
  text: text('text').notNull(),
  forwardStatus: text('forward_status', { enum: FORWARD_STATUSES }).notNull().default('pending'),
  forwardAttempts: integer('forward_attempts').notNull().default(0),
  forwardedAt: text('forwarded_at'),
  createdAt: text('created_at').notNull(),
  updatedAt: text('updated_at').notNull(),
}, (table) => [
  index('idx_processed_messages_status').on(table.forwardStatus),
  index('idx_processed_messages_created_at').on(table.createdAt),
]);
