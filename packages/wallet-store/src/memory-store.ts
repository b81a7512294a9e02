import type { Store } from './types';

interface WalletEntry {
  name: string;
  data: Uint8Array;
}

/**
 * In-process scratch store. Bytes are copied on the way in and out so that
 * callers never share buffers with the store.
 */
export class MemoryStore implements Store {
  readonly name = 'memory';
  private readonly wallets = new Map<string, WalletEntry>();
  private readonly accounts = new Map<string, Map<string, Uint8Array>>();
  private readonly indexes = new Map<string, Uint8Array>();

  async storeWallet(walletId: string, walletName: string, data: Uint8Array): Promise<void> {
    this.wallets.set(walletId, { name: walletName, data: data.slice() });
  }

  async retrieveWallet(walletName: string): Promise<Uint8Array | null> {
    for (const entry of this.wallets.values()) {
      if (entry.name === walletName) {
        return entry.data.slice();
      }
    }
    return null;
  }

  async *retrieveWallets(): AsyncGenerator<Uint8Array> {
    for (const entry of [...this.wallets.values()]) {
      yield entry.data.slice();
    }
  }

  async storeAccount(walletId: string, accountId: string, data: Uint8Array): Promise<void> {
    let walletAccounts = this.accounts.get(walletId);
    if (!walletAccounts) {
      walletAccounts = new Map();
      this.accounts.set(walletId, walletAccounts);
    }
    walletAccounts.set(accountId, data.slice());
  }

  async retrieveAccount(walletId: string, accountId: string): Promise<Uint8Array | null> {
    return this.accounts.get(walletId)?.get(accountId)?.slice() ?? null;
  }

  async *retrieveAccounts(walletId: string): AsyncGenerator<Uint8Array> {
    const walletAccounts = this.accounts.get(walletId);
    if (!walletAccounts) return;
    // Snapshot so that accounts created mid-iteration do not affect this pass.
    for (const data of [...walletAccounts.values()]) {
      yield data.slice();
    }
  }

  async storeAccountsIndex(walletId: string, data: Uint8Array): Promise<void> {
    this.indexes.set(walletId, data.slice());
  }

  async retrieveAccountsIndex(walletId: string): Promise<Uint8Array | null> {
    return this.indexes.get(walletId)?.slice() ?? null;
  }

  /** Removes a stored index, as if it had been lost. */
  async deleteAccountsIndex(walletId: string): Promise<void> {
    this.indexes.delete(walletId);
  }
}
