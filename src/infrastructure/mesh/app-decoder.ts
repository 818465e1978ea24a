import { z } from 'zod';
import type { AppMessage, Malformed, MalformedReason, RawPacket } from '../../domain/index.js';
import { DecodeError } from '../../domain/index.js';
import type { MeshSchema } from './proto-loader.js';
import { PortNum, decodeToObject } from './proto-loader.js';

export const DEFAULT_MAX_TEXT_BYTES = 512;

const dataSchema = z.object({
  portnum: z.number().int(),
  payload: z.instanceof(Uint8Array),
});

export interface AppMessageDecoderOptions {
  /** Text payloads longer than this many bytes are rejected as malformed. */
  maxTextBytes: number;
}

/** Packet fields the decoder copies onto the message it produces. */
export type PacketOrigin = Pick<RawPacket, 'sourceNodeId' | 'destNodeId' | 'packetId'>;

function malformed(reason: MalformedReason): Malformed {
  return { kind: 'malformed', reason };
}

/**
 * Classifies decrypted bytes as a Meshtastic `Data` payload.
 *
 * Arbitrary input is expected here: a packet decrypted with the wrong key
 * is indistinguishable from random bytes. `decode()` therefore never throws;
 * anything that is not a well-formed, bounded UTF-8 text message or a known
 * port comes back as `Malformed`.
 */
export class AppMessageDecoder {
  private readonly utf8 = new TextDecoder('utf-8', { fatal: true });

  constructor(
    private readonly schema: MeshSchema,
    private readonly options: AppMessageDecoderOptions = { maxTextBytes: DEFAULT_MAX_TEXT_BYTES },
  ) {}

  decode(bytes: Uint8Array, origin: PacketOrigin): AppMessage {
    let plain: Record<string, unknown>;
    try {
      plain = decodeToObject(this.schema.data, bytes);
    } catch (err: unknown) {
      if (err instanceof DecodeError) return malformed('parse_failed');
      throw err;
    }

    const parsed = dataSchema.safeParse(plain);
    if (!parsed.success) return malformed('parse_failed');

    const { portnum, payload } = parsed.data;
    const portName = this.schema.portNum.valuesById[portnum];

    if (portName === undefined || portnum === PortNum.UNKNOWN_APP) {
      return malformed('unknown_portnum');
    }

    if (portnum !== PortNum.TEXT_MESSAGE_APP) {
      return { kind: 'other', portnum, portName, packetId: origin.packetId };
    }

    if (payload.length === 0) return malformed('empty_text');
    if (payload.length > this.options.maxTextBytes) return malformed('text_too_long');

    let text: string;
    try {
      text = this.utf8.decode(payload);
    } catch {
      return malformed('invalid_utf8');
    }

    return {
      kind: 'text',
      text,
      fromNodeId: origin.sourceNodeId,
      toNodeId: origin.destNodeId,
      packetId: origin.packetId,
    };
  }
}
