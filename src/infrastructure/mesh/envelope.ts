import { z } from 'zod';
import type { RawPacket } from '../../domain/index.js';
import { DecodeError } from '../../domain/index.js';
import type { MeshSchema } from './proto-loader.js';
import { decodeToObject } from './proto-loader.js';

const uint32 = z.number().int().min(0).max(0xffffffff);

/**
 * Shape of a decoded ServiceEnvelope after `toObject({ defaults: true })`.
 * An absent sub-message comes back as null. Only the fields the bridge
 * reads are validated; the rest are stripped.
 */
const serviceEnvelopeSchema = z.object({
  packet: z
    .object({
      from: uint32,
      to: uint32,
      id: uint32,
      encrypted: z.instanceof(Uint8Array).optional(),
      decoded: z.unknown().optional(),
    })
    .nullish(),
  channelId: z.string(),
  gatewayId: z.string(),
});

export type EnvelopeDropReason = 'envelope_decode_failed' | 'missing_packet' | 'not_encrypted';

export type EnvelopeResult =
  | { readonly ok: true; readonly packet: RawPacket }
  | { readonly ok: false; readonly reason: EnvelopeDropReason; readonly detail?: string };

/**
 * Channel name from a topic such as `msh/EU_868/2/e/LongFast/!a1b2c3d4`:
 * the segment before the gateway id.
 */
export function channelFromTopic(topic: string): string {
  const parts = topic.split('/').filter((part) => part.length > 0);
  if (parts.length < 2) return '';
  return parts[parts.length - 2] ?? '';
}

/**
 * Lifts the encrypted MeshPacket out of a ServiceEnvelope delivered on
 * `topic`. Packets that arrive already decoded (unencrypted channels) are
 * not handled by the bridge and are reported as `not_encrypted`.
 */
export function parseServiceEnvelope(
  schema: MeshSchema,
  topic: string,
  payload: Uint8Array,
  receivedAt: Date,
): EnvelopeResult {
  let plain: Record<string, unknown>;
  try {
    plain = decodeToObject(schema.serviceEnvelope, payload);
  } catch (err: unknown) {
    if (err instanceof DecodeError) {
      return { ok: false, reason: 'envelope_decode_failed', detail: err.message };
    }
    throw err;
  }

  const parsed = serviceEnvelopeSchema.safeParse(plain);
  if (!parsed.success) {
    return {
      ok: false,
      reason: 'envelope_decode_failed',
      detail: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    };
  }

  const { packet, channelId, gatewayId } = parsed.data;
  if (!packet) {
    return { ok: false, reason: 'missing_packet' };
  }
  if (!packet.encrypted || packet.encrypted.length === 0) {
    return { ok: false, reason: 'not_encrypted' };
  }

  return {
    ok: true,
    packet: {
      sourceNodeId: packet.from,
      destNodeId: packet.to,
      channelName: channelId || channelFromTopic(topic),
      packetId: packet.id,
      encryptedPayload: packet.encrypted,
      receivedAt,
      gatewayId,
    },
  };
}
