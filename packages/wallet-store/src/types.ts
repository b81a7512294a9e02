/**
 * Durable byte-blob persistence for wallets, accounts and account indices.
 *
 * Lookups resolve to `null` when nothing is stored under the key; a rejected
 * promise always means the backend itself failed.
 */
export interface Store {
  /** Human-readable backend name, used in logs. */
  readonly name: string;

  storeWallet(walletId: string, walletName: string, data: Uint8Array): Promise<void>;
  retrieveWallet(walletName: string): Promise<Uint8Array | null>;
  retrieveWallets(): AsyncIterable<Uint8Array>;

  storeAccount(walletId: string, accountId: string, data: Uint8Array): Promise<void>;
  retrieveAccount(walletId: string, accountId: string): Promise<Uint8Array | null>;
  /**
   * Reads are pulled one record at a time; ending iteration early releases
   * whatever the backend holds open.
   */
  retrieveAccounts(walletId: string): AsyncIterable<Uint8Array>;

  storeAccountsIndex(walletId: string, data: Uint8Array): Promise<void>;
  retrieveAccountsIndex(walletId: string): Promise<Uint8Array | null>;
}
