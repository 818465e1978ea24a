import type {
  BusMessage,
  ConnectionState,
  ForwardStatus,
  ProcessedRecord,
  TextMessage,
} from './packet.js';

/**
 * Contracts the pipeline depends on. Infrastructure provides the real
 * implementations; tests provide in-memory ones.
 */

/** Single-consumer source of bus messages. `receive()` yields null once stopped. */
export interface PacketSource {
  readonly state: ConnectionState;
  start(): Promise<void>;
  receive(): Promise<BusMessage | null>;
  close(): Promise<void>;
}

export type ForwardFailureReason = 'authentication' | 'retries_exhausted' | 'cancelled';

export type ForwardResult =
  | { readonly status: 'delivered'; readonly attempts: number; readonly httpStatus: number }
  | {
      readonly status: 'failed';
      readonly reason: ForwardFailureReason;
      readonly attempts: number;
      readonly error: string;
    };

export interface MessageForwarder {
  forward(message: TextMessage, signal?: AbortSignal): Promise<ForwardResult>;
}

export type RecordResult = 'unique' | 'already_exists';

export interface PendingRecordInput {
  packetId: number;
  fromNodeId: number;
  toNodeId: number;
  channel: string;
  text: string;
}

export interface RecentRecordFilters {
  limit: number;
  status?: ForwardStatus | undefined;
}

export interface ProcessedMessageStore {
  hasSeen(packetId: number): Promise<boolean>;
  recordPending(input: PendingRecordInput): Promise<RecordResult>;
  markOutcome(packetId: number, status: Exclude<ForwardStatus, 'pending'>, attempts: number): Promise<void>;
  listPending(limit: number): Promise<ProcessedRecord[]>;
  listRecent(filters: RecentRecordFilters): Promise<ProcessedRecord[]>;
  countByStatus(): Promise<Record<ForwardStatus, number>>;
  close(): void;
}
