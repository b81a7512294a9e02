import { openDB, type IDBPDatabase } from 'idb';
import { DB_NAME, DB_VERSION, initializeSchema, StoreName, type KeystoreDB } from './schema';
import type { Store } from './types';

/**
 * IndexedDB storage for browser hosts. Requires a global `indexedDB`.
 */
export class IndexedDBStore implements Store {
  readonly name = 'indexeddb';
  private dbPromise: Promise<IDBPDatabase<KeystoreDB>> | null = null;

  constructor(private readonly dbName: string = DB_NAME) {}

  /**
   * Get or create database connection
   */
  private getDB(): Promise<IDBPDatabase<KeystoreDB>> {
    if (!this.dbPromise) {
      this.dbPromise = openDB<KeystoreDB>(this.dbName, DB_VERSION, {
        upgrade(db) {
          initializeSchema(db);
        },
      });
    }
    return this.dbPromise;
  }

  async storeWallet(walletId: string, walletName: string, data: Uint8Array): Promise<void> {
    const db = await this.getDB();
    await db.put(StoreName.WALLETS, { id: walletId, name: walletName, data: data.slice() });
  }

  async retrieveWallet(walletName: string): Promise<Uint8Array | null> {
    const db = await this.getDB();
    const row = await db.getFromIndex(StoreName.WALLETS, 'by-name', walletName);
    return row?.data ?? null;
  }

  async *retrieveWallets(): AsyncGenerator<Uint8Array> {
    const db = await this.getDB();
    const walletIds = await db.getAllKeys(StoreName.WALLETS);
    for (const walletId of walletIds) {
      const row = await db.get(StoreName.WALLETS, walletId);
      if (row) yield row.data;
    }
  }

  async storeAccount(walletId: string, accountId: string, data: Uint8Array): Promise<void> {
    const db = await this.getDB();
    await db.put(StoreName.ACCOUNTS, { walletId, id: accountId, data: data.slice() });
  }

  async retrieveAccount(walletId: string, accountId: string): Promise<Uint8Array | null> {
    const db = await this.getDB();
    const row = await db.get(StoreName.ACCOUNTS, [walletId, accountId]);
    return row?.data ?? null;
  }

  async *retrieveAccounts(walletId: string): AsyncGenerator<Uint8Array> {
    const db = await this.getDB();
    // Cursors cannot outlive their transaction across consumer awaits, so keys
    // are listed up front and each record is fetched when pulled.
    const keys = await db.getAllKeysFromIndex(StoreName.ACCOUNTS, 'by-wallet', walletId);
    for (const key of keys) {
      const row = await db.get(StoreName.ACCOUNTS, key);
      if (row) yield row.data;
    }
  }

  async storeAccountsIndex(walletId: string, data: Uint8Array): Promise<void> {
    const db = await this.getDB();
    await db.put(StoreName.INDEXES, { walletId, data: data.slice() });
  }

  async retrieveAccountsIndex(walletId: string): Promise<Uint8Array | null> {
    const db = await this.getDB();
    const row = await db.get(StoreName.INDEXES, walletId);
    return row?.data ?? null;
  }

  async close(): Promise<void> {
    if (!this.dbPromise) return;
    const db = await this.dbPromise;
    db.close();
    this.dbPromise = null;
  }
}
