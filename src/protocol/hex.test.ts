import { describe, it, expect } from 'vitest';
import { fromHex, toHex } from './hex';

describe('toHex', () => {
  it('formats lowercase, zero-padded bytes', () => {
    expect(toHex(Uint8Array.from([0xd4, 0x05, 0x01]))).toBe('d40501');
    expect(toHex(Uint8Array.from([0x0a]))).toBe('0a');
  });

  it('returns an empty string for no bytes', () => {
    expect(toHex(new Uint8Array(0))).toBe('');
  });
});

describe('fromHex', () => {
  it('parses hex with or without spaces', () => {
    expect(Array.from(fromHex('c502'))).toEqual([0xc5, 0x02]);
    expect(Array.from(fromHex('D4 00 03'))).toEqual([0xd4, 0x00, 0x03]);
  });

  it('rejects odd-length and non-hex input', () => {
    expect(() => fromHex('c50')).toThrow('Invalid hex string: "c50"');
    expect(() => fromHex('zz')).toThrow('Invalid hex string: "zz"');
  });
});
