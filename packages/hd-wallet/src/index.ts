export { Account, type AccountFields, type AccountOwner } from "./account";
export { AccountStream, type AccountStreamOptions } from "./account-stream";
export { BoundedQueue } from "./bounded-queue";
export {
  DEFAULT_ACCOUNTS_BUFFER_SIZE,
  MAX_PATH_INDEX,
  PROGRAMMATIC_NAME_PREFIX,
  RESERVED_NAME_PREFIX,
  resolveWalletOptions,
  SEED_LENGTH,
  WALLET_TYPE,
  WALLET_VERSION,
  type BundleSealer,
  type ResolvedWalletOptions,
  type WalletOptions,
} from "./config";
export {
  AlreadyExistsError,
  AuthenticationError,
  CorruptStateError,
  EncryptionError,
  InvalidInputError,
  isWalletError,
  KeyDerivationError,
  LockedAccountError,
  LockedWalletError,
  NotFoundError,
  StorageError,
  WalletError,
  type WalletErrorCode,
} from "./errors";
export {
  createConsoleLogger,
  NOOP_LOGGER,
  withLogContext,
  type LogLevel,
  type LogMeta,
  type WalletLogger,
} from "./logger";
export { Mutex } from "./mutex";
export { NameIndex, NAME_INDEX_VERSION, type NameIndexEntry } from "./name-index";
export {
  decodeAccountRecord,
  decodeExportBundle,
  decodeWalletRecord,
  encodeRecord,
  isRecordId,
  migrateLegacyIdentifier,
  type AccountRecord,
  type ExportBundle,
  type WalletRecord,
} from "./records";
export { importWallet } from "./transfer";
export {
  createWallet,
  createWalletFromSeed,
  deserializeWallet,
  HDWallet,
  openWallet,
  type CreateWalletFromSeedOptions,
} from "./wallet";
