import { MemoryStore, type Store } from "@hdkeystore/wallet-store";

export type StoreWriteKind = "wallet" | "account" | "index";

export interface StoreWrite {
  kind: StoreWriteKind;
  walletId: string;
  key: string;
}

/**
 * MemoryStore wrapper that records every write and can be told to fail the
 * next write of a given kind.
 */
export class RecordingStore implements Store {
  readonly name = "recording";
  readonly writes: StoreWrite[] = [];
  private readonly pendingFailures = new Map<StoreWriteKind, Error>();

  constructor(readonly inner: MemoryStore = new MemoryStore()) {}

  failNext(kind: StoreWriteKind, error: Error = new Error(`simulated ${kind} write failure`)): void {
    this.pendingFailures.set(kind, error);
  }

  async storeWallet(walletId: string, walletName: string, data: Uint8Array): Promise<void> {
    this.record("wallet", walletId, walletId);
    await this.inner.storeWallet(walletId, walletName, data);
  }

  retrieveWallet(walletName: string): Promise<Uint8Array | null> {
    return this.inner.retrieveWallet(walletName);
  }

  retrieveWallets(): AsyncIterable<Uint8Array> {
    return this.inner.retrieveWallets();
  }

  async storeAccount(walletId: string, accountId: string, data: Uint8Array): Promise<void> {
    this.record("account", walletId, accountId);
    await this.inner.storeAccount(walletId, accountId, data);
  }

  retrieveAccount(walletId: string, accountId: string): Promise<Uint8Array | null> {
    return this.inner.retrieveAccount(walletId, accountId);
  }

  retrieveAccounts(walletId: string): AsyncIterable<Uint8Array> {
    return this.inner.retrieveAccounts(walletId);
  }

  async storeAccountsIndex(walletId: string, data: Uint8Array): Promise<void> {
    this.record("index", walletId, walletId);
    await this.inner.storeAccountsIndex(walletId, data);
  }

  retrieveAccountsIndex(walletId: string): Promise<Uint8Array | null> {
    return this.inner.retrieveAccountsIndex(walletId);
  }

  private record(kind: StoreWriteKind, walletId: string, key: string): void {
    const failure = this.pendingFailures.get(kind);
    if (failure) {
      this.pendingFailures.delete(kind);
      throw failure;
    }
    this.writes.push({ kind, walletId, key });
  }
}
