import { BundleCipher, KeystoreEncryptor } from "@hdkeystore/crypto";
import type { WalletOptions } from "../config";
import { RecordingStore } from "./recording-store";

export const TEST_SEED = Uint8Array.from({ length: 32 }, (_, i) => i + 1);
export const WALLET_PASSPHRASE = "test-wallet-passphrase";
export const ACCOUNT_PASSPHRASE = "test-account-passphrase";
export const EXPORT_PASSPHRASE = "test-export-passphrase";

export interface TestWalletOptions extends WalletOptions {
  store: RecordingStore;
}

/** Wallet options with cheap KDF costs over a fresh recording store. */
export function createTestOptions(overrides: Partial<Omit<WalletOptions, "store">> = {}): TestWalletOptions {
  return {
    encryptor: new KeystoreEncryptor({ scryptN: 1024 }),
    bundleCipher: new BundleCipher({ logN: 10 }),
    ...overrides,
    store: new RecordingStore(),
  };
}
