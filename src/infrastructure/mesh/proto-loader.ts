import { resolve } from 'node:path';
import protobuf from 'protobufjs';
import type { Enum, Type } from 'protobufjs';
import { DecodeError } from '../../domain/index.js';

export const DEFAULT_PROTO_PATH = resolve(process.cwd(), 'proto', 'meshtastic.proto');

/** Reflected Meshtastic types the bridge needs. */
export interface MeshSchema {
  readonly serviceEnvelope: Type;
  readonly data: Type;
  readonly portNum: Enum;
}

/** Port numbers the pipeline branches on. */
export const PortNum = {
  UNKNOWN_APP: 0,
  TEXT_MESSAGE_APP: 1,
} as const;

/**
 * Loads `meshtastic.proto` at run time. The file is a checked-in subset of
 * the upstream definitions, so no code generation step is involved.
 */
export function loadMeshSchema(protoPath: string = DEFAULT_PROTO_PATH): MeshSchema {
  const root = protobuf.loadSync(protoPath);
  return {
    serviceEnvelope: root.lookupType('meshtastic.ServiceEnvelope'),
    data: root.lookupType('meshtastic.Data'),
    portNum: root.lookupEnum('meshtastic.PortNum'),
  };
}

/**
 * Decodes `bytes` as `type` and converts the result to a plain object with
 * numeric enums, numeric longs and Uint8Array bytes.
 *
 * Any wire-level failure surfaces as DecodeError.
 */
export function decodeToObject(type: Type, bytes: Uint8Array): Record<string, unknown> {
  try {
    const message = type.decode(bytes);
    const plain: Record<string, unknown> = type.toObject(message, {
      longs: Number,
      defaults: true,
    });
    return plain;
  } catch (err: unknown) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new DecodeError(`Failed to decode ${type.name}: ${detail}`, { cause: err });
  }
}
