export { processedMessages, FORWARD_STATUSES } from './schema.js';
export { createDbClient, ensureTables, DEFAULT_BUSY_TIMEOUT_MS } from './client.js';
export type { Database, DbClient, DbClientOptions } from './client.js';
export {
  insertPending,
  existsByPacketId,
  findByPacketId,
  updateOutcome,
  findPending,
  findRecent,
  countByStatus,
} from './processed-message-repository.js';
export type { ProcessedMessageRow } from './processed-message-repository.js';
export { withBusyRetry, isBusyError, DEFAULT_BUSY_RETRY } from './busy-retry.js';
export type { BusyRetryOptions } from './busy-retry.js';
export { DedupeStore } from './dedupe-store.js';
