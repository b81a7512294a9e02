import { bls12_381 } from '@noble/curves/bls12-381.js';
import { deriveSeedTree } from 'bls12-381-keygen';
import type { KeyDeriver, KeyPair } from './types';

const MAX_PATH_SEGMENT = 0xffffffff;

/**
 * HD wallet helpers for BLS12-381 validator keys (EIP-2333 derivation,
 * EIP-2334 paths). Public keys are 48-byte compressed G1 points.
 */
export class BlsHDWallet {
  static readonly BLS_PURPOSE = 12381;
  static readonly ETH_COIN_TYPE = 3600;
  static readonly VALIDATOR_DERIVATION_PATH = `m/${BlsHDWallet.BLS_PURPOSE}/${BlsHDWallet.ETH_COIN_TYPE}`;
  static readonly MIN_SEED_LENGTH = 32;

  private static ensureSeed(seed: Uint8Array): void {
    if (seed.length < BlsHDWallet.MIN_SEED_LENGTH) {
      throw new Error(`Seed must be at least ${BlsHDWallet.MIN_SEED_LENGTH} bytes`);
    }
  }

  private static ensureIndex(value: number, label: string): void {
    if (!Number.isInteger(value) || value < 0 || value > MAX_PATH_SEGMENT) {
      throw new Error(`${label} must be a non-negative 32-bit integer`);
    }
  }

  /**
   * Splits a path such as `m/12381/3600/0/0/0` into its numeric segments.
   * Hardened (`'`) segments do not exist in EIP-2334 and are rejected.
   */
  static parsePath(path: string): number[] {
    const [root, ...segments] = path.split('/');
    if (root !== 'm') {
      throw new Error(`Path "${path}" must start with "m"`);
    }
    if (segments.length === 0) {
      throw new Error(`Path "${path}" has no segments`);
    }
    return segments.map((segment) => {
      if (!/^\d+$/.test(segment)) {
        throw new Error(`Path "${path}" has invalid segment "${segment}"`);
      }
      const index = Number(segment);
      if (index > MAX_PATH_SEGMENT) {
        throw new Error(`Path "${path}" segment ${segment} is out of range`);
      }
      return index;
    });
  }

  static isValidPath(path: string): boolean {
    try {
      BlsHDWallet.parsePath(path);
      return true;
    } catch {
      return false;
    }
  }

  /** `m/12381/3600/{walletIndex}/{accountIndex}/0` */
  static validatorPath(walletIndex: number, accountIndex: number): string {
    BlsHDWallet.ensureIndex(walletIndex, 'Wallet index');
    BlsHDWallet.ensureIndex(accountIndex, 'Account index');
    return `${BlsHDWallet.VALIDATOR_DERIVATION_PATH}/${walletIndex}/${accountIndex}/0`;
  }

  static async deriveKeyPair(seed: Uint8Array, path: string): Promise<KeyPair> {
    BlsHDWallet.ensureSeed(seed);
    const indices = BlsHDWallet.parsePath(path);
    const privateKey = deriveSeedTree(seed, `m/${indices.join('/')}`);

    return {
      path,
      privateKey,
      publicKey: bls12_381.getPublicKey(privateKey),
    };
  }

  static async getAccount(seed: Uint8Array, walletIndex: number, accountIndex: number): Promise<KeyPair> {
    return BlsHDWallet.deriveKeyPair(seed, BlsHDWallet.validatorPath(walletIndex, accountIndex));
  }
}

export const blsKeyDeriver: KeyDeriver = {
  deriveKeyPair: (seed, path) => BlsHDWallet.deriveKeyPair(seed, path),
};

export function blsPublicKey(privateKey: Uint8Array): Uint8Array {
  return bls12_381.getPublicKey(privateKey);
}

/** Signs with a 32-byte BLS secret key. Returns a 96-byte G2 signature. */
export function blsSign(message: Uint8Array, privateKey: Uint8Array): Uint8Array {
  return bls12_381.sign(message, privateKey);
}

export function blsVerify(signature: Uint8Array, message: Uint8Array, publicKey: Uint8Array): boolean {
  return bls12_381.verify(signature, message, publicKey);
}
