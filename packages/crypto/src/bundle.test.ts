import { describe, it, expect } from 'vitest';
import { BUNDLE_DECRYPTION_FAILED, BundleCipher } from './bundle';

const plaintext = new TextEncoder().encode('{"wallet":{},"accounts":[]}');

describe('BundleCipher', () => {
  const cipher = new BundleCipher({ logN: 10 });

  it('should open what it sealed', async () => {
    const blob = await cipher.seal(plaintext, 'export-passphrase');
    expect(new TextDecoder().decode(await cipher.open(blob, 'export-passphrase'))).toBe(
      '{"wallet":{},"accounts":[]}'
    );
  });

  it('should write the version and cost into the header', async () => {
    const blob = await cipher.seal(plaintext, 'export-passphrase');
    expect(blob[0]).toBe(1);
    expect(blob[1]).toBe(10);
    // header (2) + salt (16) + nonce (24) + plaintext + poly1305 tag (16)
    expect(blob.length).toBe(42 + plaintext.length + 16);
  });

  it('should draw a fresh salt and nonce for every seal', async () => {
    const a = await cipher.seal(plaintext, 'export-passphrase');
    const b = await cipher.seal(plaintext, 'export-passphrase');
    expect(Array.from(a.subarray(2, 18))).not.toEqual(Array.from(b.subarray(2, 18)));
    expect(Array.from(a.subarray(18, 42))).not.toEqual(Array.from(b.subarray(18, 42)));
  });

  it('should read the cost from the blob rather than its own options', async () => {
    const blob = await new BundleCipher({ logN: 9 }).seal(plaintext, 'export-passphrase');
    expect(Array.from(await cipher.open(blob, 'export-passphrase'))).toEqual(Array.from(plaintext));
  });

  it('should reject a wrong passphrase', async () => {
    const blob = await cipher.seal(plaintext, 'export-passphrase');
    await expect(cipher.open(blob, 'wrong-passphrase')).rejects.toThrow(BUNDLE_DECRYPTION_FAILED);
  });

  it('should reject truncated or foreign blobs', async () => {
    await expect(cipher.open(new Uint8Array(10), 'export-passphrase')).rejects.toThrow(BUNDLE_DECRYPTION_FAILED);
    const blob = await cipher.seal(plaintext, 'export-passphrase');
    blob[0] = 9;
    await expect(cipher.open(blob, 'export-passphrase')).rejects.toThrow(BUNDLE_DECRYPTION_FAILED);
  });

  it('should refuse out-of-range costs', () => {
    expect(() => new BundleCipher({ logN: 0 })).toThrow('logN must be an integer between 1 and 20');
    expect(() => new BundleCipher({ logN: 21 })).toThrow('logN must be an integer between 1 and 20');
  });
});
