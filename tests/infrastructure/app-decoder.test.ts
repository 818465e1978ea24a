import { describe, it, expect } from 'vitest';
import { AppMessageDecoder, PortNum } from '../../src/infrastructure/mesh/index.js';
import { decryptPayload, encryptPayload } from '../../src/infrastructure/crypto/index.js';
import { TEST_KEY, encodeData, schema, seededRandom, utf8 } from '../helpers.js';

const origin = { sourceNodeId: 0x1234abcd, destNodeId: 0xffffffff, packetId: 77 };

describe('AppMessageDecoder', () => {
  const decoder = new AppMessageDecoder(schema, { maxTextBytes: 16 });

  it('decodes a text message', () => {
    const result = decoder.decode(encodeData(PortNum.TEXT_MESSAGE_APP, utf8('hello')), origin);
    expect(result).toEqual({
      kind: 'text',
      text: 'hello',
      fromNodeId: 0x1234abcd,
      toNodeId: 0xffffffff,
      packetId: 77,
    });
  });

  it('reproduces the original text after encrypt, decrypt and decode', () => {
    const text = 'Grüße vom Berg';
    const seed = { packetId: origin.packetId, fromNodeId: origin.sourceNodeId };
    const ciphertext = encryptPayload(TEST_KEY, seed, encodeData(PortNum.TEXT_MESSAGE_APP, utf8(text)));

    const result = decoder.decode(decryptPayload(TEST_KEY, seed, ciphertext), origin);
    expect(result).toMatchObject({ kind: 'text', text });
  });

  it('classifies known non-text ports as other', () => {
    const result = decoder.decode(encodeData(3, Uint8Array.from([1, 2, 3])), origin);
    expect(result).toEqual({ kind: 'other', portnum: 3, portName: 'POSITION_APP', packetId: 77 });
  });

  it('rejects ports missing from the enum', () => {
    const result = decoder.decode(encodeData(9999, utf8('x')), origin);
    expect(result).toEqual({ kind: 'malformed', reason: 'unknown_portnum' });
  });

  it('rejects UNKNOWN_APP', () => {
    const result = decoder.decode(encodeData(PortNum.UNKNOWN_APP, utf8('x')), origin);
    expect(result).toEqual({ kind: 'malformed', reason: 'unknown_portnum' });
  });

  it('rejects empty text', () => {
    const result = decoder.decode(encodeData(PortNum.TEXT_MESSAGE_APP, new Uint8Array(0)), origin);
    expect(result).toEqual({ kind: 'malformed', reason: 'empty_text' });
  });

  it('rejects text over the byte limit', () => {
    const result = decoder.decode(encodeData(PortNum.TEXT_MESSAGE_APP, utf8('seventeen bytes!!')), origin);
    expect(result).toEqual({ kind: 'malformed', reason: 'text_too_long' });
  });

  it('accepts text exactly at the byte limit', () => {
    const result = decoder.decode(encodeData(PortNum.TEXT_MESSAGE_APP, utf8('sixteen bytes!!!')), origin);
    expect(result).toMatchObject({ kind: 'text', text: 'sixteen bytes!!!' });
  });

  it('rejects invalid UTF-8', () => {
    const result = decoder.decode(encodeData(PortNum.TEXT_MESSAGE_APP, Uint8Array.from([0xc3, 0x28])), origin);
    expect(result).toEqual({ kind: 'malformed', reason: 'invalid_utf8' });
  });

  it('reports bytes that are not a Data message as parse_failed', () => {
    const result = decoder.decode(Uint8Array.from([0xff, 0xff, 0xff]), origin);
    expect(result).toEqual({ kind: 'malformed', reason: 'parse_failed' });
  });

  it('never throws on random input', () => {
    const random = seededRandom(20240601);
    const kinds = new Set<string>();

    for (let i = 0; i < 1000; i++) {
      const length = Math.floor(random() * 64);
      const bytes = Uint8Array.from({ length }, () => Math.floor(random() * 256));

      const result = decoder.decode(bytes, origin);
      kinds.add(result.kind);
      if (result.kind === 'text') {
        expect(utf8(result.text).length).toBeLessThanOrEqual(16);
      }
    }

    expect(kinds.has('malformed')).toBe(true);
  });
});
