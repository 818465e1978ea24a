import { vi } from 'vitest';
import type { Logger } from 'pino';
import { BROADCAST_NODE_ID } from '../src/domain/index.js';
import { DEFAULT_CHANNEL_KEY, encryptPayload } from '../src/infrastructure/crypto/index.js';
import { PortNum, loadMeshSchema } from '../src/infrastructure/mesh/index.js';

export const schema = loadMeshSchema();

export const TEST_KEY = Uint8Array.from(DEFAULT_CHANNEL_KEY);
export const TEST_CHANNEL = 'LongFast';
export const TEST_TOPIC = `msh/TEST/2/e/${TEST_CHANNEL}/!0000abcd`;

export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

/** Serialises a Meshtastic `Data` message. */
export function encodeData(portnum: number, payload: Uint8Array): Uint8Array {
  return schema.data.encode(schema.data.create({ portnum, payload })).finish();
}

export function utf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export interface EnvelopeFields {
  from?: number;
  to?: number;
  id?: number;
  channelId?: string;
  gatewayId?: string;
  portnum?: number;
  text?: string;
  /** Raw Data payload bytes; overrides `text`. */
  payload?: Uint8Array;
  key?: Uint8Array;
}

/** Builds the bytes a gateway would publish for an encrypted packet. */
export function encryptedEnvelope(fields: EnvelopeFields = {}): Uint8Array {
  const from = fields.from ?? 0x1234abcd;
  const id = fields.id ?? 1001;
  const plain = encodeData(fields.portnum ?? PortNum.TEXT_MESSAGE_APP, fields.payload ?? utf8(fields.text ?? 'hello mesh'));
  const encrypted = encryptPayload(fields.key ?? TEST_KEY, { packetId: id, fromNodeId: from }, plain);

  const envelope = schema.serviceEnvelope.fromObject({
    packet: {
      from,
      to: fields.to ?? BROADCAST_NODE_ID,
      id,
      channel: 8,
      encrypted,
    },
    channelId: fields.channelId ?? TEST_CHANNEL,
    gatewayId: fields.gatewayId ?? '!0000abcd',
  });
  return schema.serviceEnvelope.encode(envelope).finish();
}

/** Deterministic PRNG (mulberry32) for fuzz inputs. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
