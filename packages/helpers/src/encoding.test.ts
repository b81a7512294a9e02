import { describe, expect, it } from 'vitest';
import { bytesToHex, bytesToUtf8, hexToBytes, isHexString, utf8ToBytes } from './encoding';
import { concatBytes, constantTimeEqual } from './bytes';

describe('hex encoding', () => {
  it('decodes with and without a 0x prefix', () => {
    expect(Array.from(hexToBytes('0x00ff10'))).toEqual([0, 255, 16]);
    expect(Array.from(hexToBytes('00ff10'))).toEqual([0, 255, 16]);
  });

  it('encodes lowercase, zero-padded', () => {
    expect(bytesToHex(new Uint8Array([0, 255, 16, 1]))).toBe('00ff1001');
  });

  it('rejects odd-length and non-hex input', () => {
    expect(() => hexToBytes('abc')).toThrow('Hex string must contain an even number of characters');
    expect(() => hexToBytes('zz')).toThrow('Hex string contains invalid characters');
  });

  it('recognises hex strings', () => {
    expect(isHexString('0xdeadbeef')).toBe(true);
    expect(isHexString('')).toBe(false);
    expect(isHexString('xyz0')).toBe(false);
  });
});

describe('utf-8', () => {
  it('round-trips non-ascii text', () => {
    expect(bytesToUtf8(utf8ToBytes('validator ключ'))).toBe('validator ключ');
  });

  it('throws on invalid sequences', () => {
    expect(() => bytesToUtf8(new Uint8Array([0xc3, 0x28]))).toThrow();
  });
});

describe('bytes', () => {
  it('concatenates in order', () => {
    const joined = concatBytes(new Uint8Array([1, 2]), new Uint8Array([]), new Uint8Array([3]));
    expect(Array.from(joined)).toEqual([1, 2, 3]);
  });

  it('compares contents and length', () => {
    expect(constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(constantTimeEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(constantTimeEqual(new Uint8Array([1]), new Uint8Array([1, 0]))).toBe(false);
  });
});
