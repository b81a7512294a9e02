export type { Store } from './types';
export { MemoryStore } from './memory-store';
export { FilesystemStore } from './filesystem-store';
export { IndexedDBStore } from './idb-store';
export {
  DB_NAME,
  DB_VERSION,
  StoreName,
  type AccountRow,
  type IndexRow,
  type KeystoreDB,
  type WalletRow,
} from './schema';
