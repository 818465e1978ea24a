export {
  DEFAULT_CHANNEL_KEY,
  decodeChannelKey,
  buildNonce,
  decryptPayload,
  encryptPayload,
} from './channel-cipher.js';
export type { NonceSeed } from './channel-cipher.js';
