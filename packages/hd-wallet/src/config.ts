/**
 * Wallet configuration types and defaults.
 */

import { blsKeyDeriver, BundleCipher, type Encryptor, type KeyDeriver } from "@hdkeystore/crypto";
import type { Store } from "@hdkeystore/wallet-store";
import { InvalidInputError } from "./errors";
import { NOOP_LOGGER, type WalletLogger } from "./logger";

export const WALLET_TYPE = "hierarchical deterministic";
export const WALLET_VERSION = 1;
export const SEED_LENGTH = 32;
/** Account names may not start with this; it is kept for programmatic use. */
export const RESERVED_NAME_PREFIX = "_";
/** Names with this prefix are derivation paths, resolved without the index. */
export const PROGRAMMATIC_NAME_PREFIX = "m/";
export const DEFAULT_ACCOUNTS_BUFFER_SIZE = 1024;
/** Largest wallet index or account number a derivation path can carry. */
export const MAX_PATH_INDEX = 0xffffffff;

/**
 * Seals and opens exported wallet bundles.
 */
export interface BundleSealer {
  seal(plaintext: Uint8Array, passphrase: string): Promise<Uint8Array>;
  open(blob: Uint8Array, passphrase: string): Promise<Uint8Array>;
}

/**
 * Capabilities and settings shared by every wallet operation.
 */
export interface WalletOptions {
  /** Durable storage for wallet, account and index records */
  store: Store;

  /** Encrypts the seed and every account's private key */
  encryptor: Encryptor;

  /** Seed + path -> key pair (default: EIP-2333 over BLS12-381) */
  deriver?: KeyDeriver;

  /** Cipher for export bundles (default: scrypt + XChaCha20-Poly1305) */
  bundleCipher?: BundleSealer;

  /** Logger (default: silent) */
  logger?: WalletLogger;

  /** Decoded accounts buffered ahead of an `accounts()` consumer (default: 1024) */
  accountsBufferSize?: number;
}

export type ResolvedWalletOptions = Required<WalletOptions>;

export function resolveWalletOptions(options: WalletOptions): ResolvedWalletOptions {
  const accountsBufferSize = options.accountsBufferSize ?? DEFAULT_ACCOUNTS_BUFFER_SIZE;
  if (!Number.isInteger(accountsBufferSize) || accountsBufferSize < 1) {
    throw new InvalidInputError("accountsBufferSize must be a positive integer", { accountsBufferSize });
  }

  return {
    store: options.store,
    encryptor: options.encryptor,
    deriver: options.deriver ?? blsKeyDeriver,
    bundleCipher: options.bundleCipher ?? new BundleCipher(),
    logger: options.logger ?? NOOP_LOGGER,
    accountsBufferSize,
  };
}
