export {
  BROADCAST_NODE_ID,
  formatNodeId,
  assertNever,
} from './packet.js';
export type {
  BusMessage,
  RawPacket,
  TextMessage,
  OtherTelemetry,
  Malformed,
  MalformedReason,
  AppMessage,
  ForwardStatus,
  ProcessedRecord,
  ConnectionState,
} from './packet.js';
export {
  BridgeError,
  ConfigurationError,
  ConnectionError,
  DecryptionError,
  DecodeError,
  PersistenceBusyError,
  AuthenticationError,
  GatewayTransientError,
} from './errors.js';
export type {
  PacketSource,
  ForwardFailureReason,
  ForwardResult,
  MessageForwarder,
  RecordResult,
  PendingRecordInput,
  RecentRecordFilters,
  ProcessedMessageStore,
} from './ports.js';
