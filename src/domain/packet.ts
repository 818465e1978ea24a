/**
 * Core domain types for the mesh-to-pager bridge.
 *
 * These types describe a packet as it moves from the bus to the paging
 * gateway. They carry no framework dependencies.
 */

/** Node id that addresses every node on the mesh. */
export const BROADCAST_NODE_ID = 0xffffffff;

/** A message exactly as delivered by the bus, before any decoding. */
export interface BusMessage {
  readonly topic: string;
  readonly payload: Uint8Array;
  readonly receivedAt: Date;
}

/**
 * An encrypted mesh packet lifted out of its bus envelope.
 *
 * Immutable once received. `packetId` is the sender-assigned 32-bit id and
 * doubles as the dedupe key.
 */
export interface RawPacket {
  readonly sourceNodeId: number;
  readonly destNodeId: number;
  readonly channelName: string;
  readonly packetId: number;
  readonly encryptedPayload: Uint8Array;
  readonly receivedAt: Date;
  readonly gatewayId: string;
}

export interface TextMessage {
  readonly kind: 'text';
  readonly text: string;
  readonly fromNodeId: number;
  readonly toNodeId: number;
  readonly packetId: number;
}

/** A recognised, non-text application payload (position, telemetry, ...). */
export interface OtherTelemetry {
  readonly kind: 'other';
  readonly portnum: number;
  readonly portName: string;
  readonly packetId: number;
}

export interface Malformed {
  readonly kind: 'malformed';
  readonly reason: MalformedReason;
}

export type MalformedReason =
  | 'parse_failed'
  | 'unknown_portnum'
  | 'empty_text'
  | 'text_too_long'
  | 'invalid_utf8';

export type AppMessage = TextMessage | OtherTelemetry | Malformed;

export type ForwardStatus = 'pending' | 'delivered' | 'failed';

/** Persisted outcome of handling one text message. */
export interface ProcessedRecord {
  readonly packetId: number;
  readonly fromNodeId: number;
  readonly toNodeId: number;
  readonly channel: string;
  readonly text: string;
  readonly forwardStatus: ForwardStatus;
  readonly forwardAttempts: number;
  readonly forwardedAt: string | null; // ISO-8601
  readonly createdAt: string; // ISO-8601
  readonly updatedAt: string; // ISO-8601
}

export type ConnectionState =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'reconnecting'
  | 'shutting_down';

/** Formats a node number the way Meshtastic clients show it, e.g. `!a1b2c3d4`. */
export function formatNodeId(nodeId: number): string {
  return `!${(nodeId >>> 0).toString(16).padStart(8, '0')}`;
}

/** Compile-time exhaustiveness guard for discriminated unions. */
export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
