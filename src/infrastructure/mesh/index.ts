export { loadMeshSchema, decodeToObject, PortNum, DEFAULT_PROTO_PATH } from './proto-loader.js';
export type { MeshSchema } from './proto-loader.js';
export { parseServiceEnvelope, channelFromTopic } from './envelope.js';
export type { EnvelopeResult, EnvelopeDropReason } from './envelope.js';
export { AppMessageDecoder, DEFAULT_MAX_TEXT_BYTES } from './app-decoder.js';
export type { AppMessageDecoderOptions, PacketOrigin } from './app-decoder.js';
