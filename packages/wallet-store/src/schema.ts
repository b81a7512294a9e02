import type { DBSchema, IDBPDatabase } from 'idb';

export const DB_NAME = 'hd-keystore';
export const DB_VERSION = 1;

export const StoreName = {
  WALLETS: 'wallets',
  ACCOUNTS: 'accounts',
  INDEXES: 'indexes',
} as const;

export interface WalletRow {
  id: string;
  name: string;
  data: Uint8Array;
}

export interface AccountRow {
  walletId: string;
  id: string;
  data: Uint8Array;
}

export interface IndexRow {
  walletId: string;
  data: Uint8Array;
}

export interface KeystoreDB extends DBSchema {
  wallets: {
    key: string;
    value: WalletRow;
    indexes: { 'by-name': string };
  };
  accounts: {
    key: [string, string];
    value: AccountRow;
    indexes: { 'by-wallet': string };
  };
  indexes: {
    key: string;
    value: IndexRow;
  };
}

/**
 * Initialize database schema.
 */
export function initializeSchema(db: IDBPDatabase<KeystoreDB>): void {
  const wallets = db.createObjectStore(StoreName.WALLETS, { keyPath: 'id' });
  wallets.createIndex('by-name', 'name', { unique: true });

  const accounts = db.createObjectStore(StoreName.ACCOUNTS, { keyPath: ['walletId', 'id'] });
  accounts.createIndex('by-wallet', 'walletId', { unique: false });

  db.createObjectStore(StoreName.INDEXES, { keyPath: 'walletId' });
}
