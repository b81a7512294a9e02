import { ctr } from '@noble/ciphers/aes.js';
import { randomBytes } from '@noble/hashes/utils';
import { pbkdf2Async } from '@noble/hashes/pbkdf2';
import { sha256 } from '@noble/hashes/sha2';
import scrypt from 'scrypt-js';
import { z } from 'zod';
import { bytesToHex, concatBytes, constantTimeEqual, hexToBytes, isHexString, utf8ToBytes, zeroize } from '@hdkeystore/helpers';
import type { EncryptedPayload, Encryptor } from './types';

export type KeystoreKdf = 'scrypt' | 'pbkdf2';

export interface KeystoreEncryptorOptions {
  /** Key derivation function (default: scrypt) */
  kdf?: KeystoreKdf;
  /** scrypt CPU/memory cost (default: 262144) */
  scryptN?: number;
  /** pbkdf2 iteration count (default: 262144) */
  pbkdf2Iterations?: number;
}

export const KEYSTORE_DECRYPTION_FAILED = 'Decryption failed - incorrect passphrase or corrupted data';

const KEYSTORE_VERSION = 4;
const DEFAULT_SCRYPT_N = 262144;
const SCRYPT_R = 8;
const SCRYPT_P = 1;
const DEFAULT_PBKDF2_ITERATIONS = 262144;
const KEY_LENGTH = 32;
const SALT_LENGTH = 32;
const IV_LENGTH = 16;

const hexString = z.string().refine((value) => value === '' || isHexString(value), 'expected hex');

const kdfSchema = z.discriminatedUnion('function', [
  z.object({
    function: z.literal('scrypt'),
    params: z.object({
      dklen: z.literal(KEY_LENGTH),
      n: z.number().int().positive(),
      r: z.number().int().positive(),
      p: z.number().int().positive(),
      salt: hexString,
    }),
    message: z.literal(''),
  }),
  z.object({
    function: z.literal('pbkdf2'),
    params: z.object({
      dklen: z.literal(KEY_LENGTH),
      c: z.number().int().positive(),
      prf: z.literal('hmac-sha256'),
      salt: hexString,
    }),
    message: z.literal(''),
  }),
]);

const keystoreCryptoSchema = z.object({
  kdf: kdfSchema,
  checksum: z.object({
    function: z.literal('sha256'),
    params: z.object({}),
    message: hexString,
  }),
  cipher: z.object({
    function: z.literal('aes-128-ctr'),
    params: z.object({ iv: hexString }),
    message: hexString,
  }),
});

export type KeystoreCrypto = z.infer<typeof keystoreCryptoSchema>;
type KeystoreKdfModule = KeystoreCrypto['kdf'];

/**
 * EIP-2335 passphrases are NFKD-normalised with C0, C1 and DEL control codes removed.
 */
export function normalizePassphrase(passphrase: string): Uint8Array {
  return utf8ToBytes(passphrase.normalize('NFKD').replace(/[\u0000-\u001f\u007f-\u009f]/g, ''));
}

/**
 * EIP-2335 style keystore encryption: scrypt or pbkdf2 KDF, sha256 checksum
 * and AES-128-CTR.
 */
export class KeystoreEncryptor implements Encryptor {
  readonly name = 'keystore';
  private readonly kdf: KeystoreKdf;
  private readonly scryptN: number;
  private readonly pbkdf2Iterations: number;

  constructor(options: KeystoreEncryptorOptions = {}) {
    this.kdf = options.kdf ?? 'scrypt';
    this.scryptN = options.scryptN ?? DEFAULT_SCRYPT_N;
    this.pbkdf2Iterations = options.pbkdf2Iterations ?? DEFAULT_PBKDF2_ITERATIONS;
  }

  version(): number {
    return KEYSTORE_VERSION;
  }

  async encrypt(plaintext: Uint8Array, passphrase: string): Promise<KeystoreCrypto> {
    const salt = randomBytes(SALT_LENGTH);
    const iv = randomBytes(IV_LENGTH);
    const kdf = this.kdfModule(bytesToHex(salt));

    const derivedKey = await deriveKey(kdf, passphrase);
    const ciphertext = ctr(derivedKey.slice(0, 16), iv).encrypt(plaintext);
    const checksum = sha256(concatBytes(derivedKey.slice(16, 32), ciphertext));
    zeroize(derivedKey);

    return {
      kdf,
      checksum: { function: 'sha256', params: {}, message: bytesToHex(checksum) },
      cipher: { function: 'aes-128-ctr', params: { iv: bytesToHex(iv) }, message: bytesToHex(ciphertext) },
    };
  }

  async decrypt(payload: EncryptedPayload, passphrase: string): Promise<Uint8Array> {
    const parsed = keystoreCryptoSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error(KEYSTORE_DECRYPTION_FAILED);
    }
    const { kdf, checksum, cipher } = parsed.data;

    let derivedKey: Uint8Array | undefined;
    try {
      derivedKey = await deriveKey(kdf, passphrase);
      const ciphertext = hexToBytes(cipher.message);
      const expected = sha256(concatBytes(derivedKey.slice(16, 32), ciphertext));
      if (!constantTimeEqual(expected, hexToBytes(checksum.message))) {
        throw new Error('checksum mismatch');
      }
      return ctr(derivedKey.slice(0, 16), hexToBytes(cipher.params.iv)).decrypt(ciphertext);
    } catch {
      // Wrong passphrase and corrupt payload are reported identically.
      throw new Error(KEYSTORE_DECRYPTION_FAILED);
    } finally {
      if (derivedKey) zeroize(derivedKey);
    }
  }

  private kdfModule(salt: string): KeystoreKdfModule {
    if (this.kdf === 'pbkdf2') {
      return {
        function: 'pbkdf2',
        params: { dklen: KEY_LENGTH, c: this.pbkdf2Iterations, prf: 'hmac-sha256', salt },
        message: '',
      };
    }
    return {
      function: 'scrypt',
      params: { dklen: KEY_LENGTH, n: this.scryptN, r: SCRYPT_R, p: SCRYPT_P, salt },
      message: '',
    };
  }
}

async function deriveKey(kdf: KeystoreKdfModule, passphrase: string): Promise<Uint8Array> {
  const passphraseBytes = normalizePassphrase(passphrase);
  const salt = hexToBytes(kdf.params.salt);
  try {
    if (kdf.function === 'pbkdf2') {
      return await pbkdf2Async(sha256, passphraseBytes, salt, { c: kdf.params.c, dkLen: kdf.params.dklen });
    }
    return await scrypt.scrypt(passphraseBytes, salt, kdf.params.n, kdf.params.r, kdf.params.p, kdf.params.dklen);
  } finally {
    zeroize(passphraseBytes);
  }
}
