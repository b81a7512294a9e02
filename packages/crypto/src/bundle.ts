import { xchacha20poly1305 } from '@noble/ciphers/chacha.js';
import { randomBytes } from '@noble/hashes/utils';
import scrypt from 'scrypt-js';
import { concatBytes, utf8ToBytes, zeroize } from '@hdkeystore/helpers';

export interface BundleCipherOptions {
  /** log2 of the scrypt cost used when sealing (default: 15) */
  logN?: number;
}

export const BUNDLE_DECRYPTION_FAILED = 'Bundle decryption failed - incorrect passphrase or corrupted data';

const BUNDLE_VERSION = 1;
const DEFAULT_LOG_N = 15;
const MAX_LOG_N = 20;
const SCRYPT_R = 8;
const SCRYPT_P = 1;
const KEY_LENGTH = 32;
const SALT_LENGTH = 16;
const NONCE_LENGTH = 24;
const HEADER_LENGTH = 2 + SALT_LENGTH + NONCE_LENGTH;

/**
 * Seals arbitrary bytes into a single self-describing blob:
 * `version | logN | salt | nonce | xchacha20poly1305(ciphertext)`.
 */
export class BundleCipher {
  private readonly logN: number;

  constructor(options: BundleCipherOptions = {}) {
    const logN = options.logN ?? DEFAULT_LOG_N;
    if (!Number.isInteger(logN) || logN < 1 || logN > MAX_LOG_N) {
      throw new Error(`logN must be an integer between 1 and ${MAX_LOG_N}`);
    }
    this.logN = logN;
  }

  async seal(plaintext: Uint8Array, passphrase: string): Promise<Uint8Array> {
    const salt = randomBytes(SALT_LENGTH);
    const nonce = randomBytes(NONCE_LENGTH);
    const key = await deriveBundleKey(passphrase, salt, this.logN);
    try {
      const ciphertext = xchacha20poly1305(key, nonce).encrypt(plaintext);
      return concatBytes(new Uint8Array([BUNDLE_VERSION, this.logN]), salt, nonce, ciphertext);
    } finally {
      zeroize(key);
    }
  }

  async open(blob: Uint8Array, passphrase: string): Promise<Uint8Array> {
    if (blob.length <= HEADER_LENGTH || blob[0] !== BUNDLE_VERSION) {
      throw new Error(BUNDLE_DECRYPTION_FAILED);
    }
    const logN = blob[1];
    if (logN < 1 || logN > MAX_LOG_N) {
      throw new Error(BUNDLE_DECRYPTION_FAILED);
    }
    const salt = blob.slice(2, 2 + SALT_LENGTH);
    const nonce = blob.slice(2 + SALT_LENGTH, HEADER_LENGTH);
    const ciphertext = blob.slice(HEADER_LENGTH);

    const key = await deriveBundleKey(passphrase, salt, logN);
    try {
      return xchacha20poly1305(key, nonce).decrypt(ciphertext);
    } catch {
      throw new Error(BUNDLE_DECRYPTION_FAILED);
    } finally {
      zeroize(key);
    }
  }
}

async function deriveBundleKey(passphrase: string, salt: Uint8Array, logN: number): Promise<Uint8Array> {
  const passphraseBytes = utf8ToBytes(passphrase);
  try {
    return await scrypt.scrypt(passphraseBytes, salt, 2 ** logN, SCRYPT_R, SCRYPT_P, KEY_LENGTH);
  } finally {
    zeroize(passphraseBytes);
  }
}
