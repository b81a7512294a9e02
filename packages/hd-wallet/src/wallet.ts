/**
 * Hierarchical deterministic wallet: one encrypted seed, a counter handing
 * out account numbers, and a name index over the accounts in storage.
 */

import { BlsHDWallet, type EncryptedPayload, type Encryptor, type KeyPair } from "@hdkeystore/crypto";
import { zeroize } from "@hdkeystore/helpers";
import type { Store } from "@hdkeystore/wallet-store";
import { randomBytes } from "@noble/hashes/utils";
import { Account, type AccountOwner } from "./account";
import { AccountStream } from "./account-stream";
import {
  MAX_PATH_INDEX,
  PROGRAMMATIC_NAME_PREFIX,
  RESERVED_NAME_PREFIX,
  resolveWalletOptions,
  SEED_LENGTH,
  WALLET_TYPE,
  WALLET_VERSION,
  type ResolvedWalletOptions,
  type WalletOptions,
} from "./config";
import {
  AlreadyExistsError,
  AuthenticationError,
  CorruptStateError,
  EncryptionError,
  InvalidInputError,
  KeyDerivationError,
  LockedWalletError,
  NotFoundError,
  withStorage,
} from "./errors";
import { withLogContext, type WalletLogger } from "./logger";
import { Mutex } from "./mutex";
import { NameIndex, type NameIndexEntry } from "./name-index";
import {
  decodeWalletRecord,
  encodeRecord,
  isRecordId,
  type AccountRecord,
  type ExportBundle,
  type WalletRecord,
} from "./records";

export class HDWallet implements AccountOwner {
  readonly id: string;
  readonly name: string;
  readonly type = WALLET_TYPE;
  readonly version: number;
  readonly walletIndex: number;

  private readonly crypto: EncryptedPayload;
  private readonly options: ResolvedWalletOptions;
  private readonly log: WalletLogger;
  private readonly mutex = new Mutex();
  private nextAccountCounter: number;
  private seed: Uint8Array | null = null;
  private index = new NameIndex();
  /** Path-named accounts handed out unlocked; locked with the wallet. */
  private readonly derivedAccounts = new Set<Account>();

  private constructor(record: WalletRecord, options: ResolvedWalletOptions) {
    this.id = record.uuid;
    this.name = record.name;
    this.version = record.version;
    this.walletIndex = record.walletIndex;
    this.crypto = record.crypto;
    this.nextAccountCounter = record.nextaccount;
    this.options = options;
    this.log = withLogContext(options.logger, { wallet: record.name });
  }

  /**
   * Builds a locked wallet from a decoded record without touching storage.
   * @internal
   */
  static restore(record: WalletRecord, options: ResolvedWalletOptions): HDWallet {
    return new HDWallet(record, options);
  }

  get store(): Store {
    return this.options.store;
  }

  get encryptor(): Encryptor {
    return this.options.encryptor;
  }

  /** Account number the next created account will use. */
  get nextAccount(): number {
    return this.nextAccountCounter;
  }

  isUnlocked(): boolean {
    return this.seed !== null;
  }

  async unlock(passphrase: string): Promise<void> {
    await this.mutex.runExclusive(async () => {
      let seed: Uint8Array;
      try {
        seed = await this.encryptor.decrypt(this.crypto, passphrase);
      } catch {
        throw new AuthenticationError("Incorrect passphrase", { wallet: this.name });
      }
      // A payload that opens to the wrong length is treated like one that does not open.
      if (seed.length !== SEED_LENGTH) {
        zeroize(seed);
        throw new AuthenticationError("Incorrect passphrase", { wallet: this.name });
      }

      this.clearSeed();
      this.seed = seed;
      this.log.debug("Wallet unlocked");
    });
  }

  /** Zeroises the seed and locks every path-named account handed out since unlock. */
  async lock(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      this.clearSeed();
      for (const account of this.derivedAccounts) {
        account.lock();
      }
      this.derivedAccounts.clear();
    });
  }

  /** Copy of the resident seed. */
  key(): Uint8Array {
    if (!this.seed) {
      throw new LockedWalletError("Wallet must be unlocked to provide seed", { wallet: this.name });
    }
    return this.seed.slice();
  }

  /**
   * Derives the next account, encrypts its key under `passphrase` and stores
   * it. The account number is reserved and persisted before anything is
   * derived, so a failure later on skips that number rather than reusing it.
   * A wallet whose counter has run past the last path index refuses without
   * writing.
   */
  async createAccount(name: string, passphrase: string): Promise<Account> {
    if (name === "") {
      throw new InvalidInputError("Account name missing", { wallet: this.name });
    }
    if (name.startsWith(RESERVED_NAME_PREFIX)) {
      throw new InvalidInputError(`Invalid account name "${name}"`, { wallet: this.name, account: name });
    }

    return this.mutex.runExclusive(async () => {
      const seed = this.seed;
      if (!seed) {
        throw new LockedWalletError("Wallet must be unlocked to create accounts", {
          wallet: this.name,
          account: name,
        });
      }
      if (this.index.has(name)) {
        throw new AlreadyExistsError(`Account with name "${name}" already exists`, {
          wallet: this.name,
          account: name,
        });
      }

      const accountNumber = this.nextAccountCounter;
      if (accountNumber > MAX_PATH_INDEX) {
        throw new InvalidInputError("Wallet has no account numbers left", {
          wallet: this.name,
          account: name,
          nextAccount: accountNumber,
        });
      }
      const path = BlsHDWallet.validatorPath(this.walletIndex, accountNumber);
      this.nextAccountCounter += 1;
      await this.storeRecord();

      const keyPair = await this.derive(seed, path, name);
      const account = await this.sealAccount(crypto.randomUUID(), name, keyPair, passphrase);

      this.index.add(account.id, account.name);
      try {
        await this.storeAccount(account);
      } catch (err) {
        this.index.remove(account.id);
        throw err;
      }
      await this.storeIndex();

      this.log.info("Created account", { account: name, path });
      return account;
    });
  }

  /**
   * Looks an account up through the name index. Names starting with `m/` are
   * derivation paths: the account is derived on the spot from the resident
   * seed, never stored, and returned unlocked.
   */
  async accountByName(name: string): Promise<Account> {
    if (name.startsWith(PROGRAMMATIC_NAME_PREFIX)) {
      return this.programmaticAccount(name);
    }
    const id = this.index.id(name);
    if (id === undefined) {
      throw new NotFoundError(`No account with name "${name}"`, { wallet: this.name, account: name });
    }
    return this.accountById(id);
  }

  async accountById(id: string): Promise<Account> {
    if (!isRecordId(id)) {
      throw new NotFoundError(`No account with ID "${id}"`, { wallet: this.name, accountId: id });
    }
    const data = await withStorage("retrieve account", { wallet: this.name, accountId: id }, () =>
      this.store.retrieveAccount(this.id, id),
    );
    if (!data) {
      throw new NotFoundError(`No account with ID "${id}"`, { wallet: this.name, accountId: id });
    }
    return Account.deserialize(this, data);
  }

  accounts(): AccountStream {
    return new AccountStream(
      () => this.store.retrieveAccounts(this.id),
      (data) => Account.deserialize(this, data),
      { bufferSize: this.options.accountsBufferSize, logger: this.options.logger, walletId: this.id },
    );
  }

  indexEntries(): NameIndexEntry[] {
    return this.index.entries();
  }

  /**
   * Seals the wallet record and every decodable account into one blob under
   * `passphrase`. Seed and account keys stay encrypted under their own
   * passphrases inside it.
   */
  async export(passphrase: string): Promise<Uint8Array> {
    const accounts: AccountRecord[] = [];
    for await (const account of this.accounts()) {
      accounts.push(account.toRecord());
    }
    const bundle: ExportBundle = { wallet: this.toRecord(), accounts };

    try {
      return await this.options.bundleCipher.seal(encodeRecord(bundle), passphrase);
    } catch (err) {
      throw new EncryptionError("Failed to seal wallet export", { wallet: this.name }, { cause: err });
    }
  }

  toRecord(): WalletRecord {
    return {
      type: WALLET_TYPE,
      uuid: this.id,
      name: this.name,
      crypto: this.crypto,
      walletIndex: this.walletIndex,
      nextaccount: this.nextAccountCounter,
      version: this.version,
    };
  }

  serialize(): Uint8Array {
    return encodeRecord(this.toRecord());
  }

  /**
   * Writes the index, then the wallet record.
   * @internal
   */
  async persist(): Promise<void> {
    await this.storeIndex();
    await this.storeRecord();
  }

  /**
   * Stores an account carried over from elsewhere and indexes it.
   * @internal
   */
  async adoptAccount(record: AccountRecord): Promise<Account> {
    const account = Account.fromRecord(this, record);
    await this.storeAccount(account);
    this.index.add(account.id, account.name);
    await this.storeIndex();
    return account;
  }

  /**
   * Loads the persisted index, rebuilding it from the stored accounts when it
   * is missing or cannot be decoded. A readable index is trusted as is.
   * @internal
   */
  async loadIndex(): Promise<void> {
    const data = await withStorage("retrieve accounts index", { wallet: this.name }, () =>
      this.store.retrieveAccountsIndex(this.id),
    );
    if (data) {
      try {
        this.index = NameIndex.deserialize(data);
        return;
      } catch (err) {
        if (!(err instanceof CorruptStateError)) throw err;
        this.log.warn("Accounts index corrupt; rebuilding", { error: err });
      }
    } else {
      this.log.warn("Accounts index missing; rebuilding");
    }

    const index = new NameIndex();
    const stream = this.accounts();
    for await (const account of stream) {
      index.add(account.id, account.name);
    }
    this.index = index;
    await this.storeIndex();
    this.log.info("Rebuilt accounts index", {
      accounts: index.size,
      skipped: stream.skipped,
    });
  }

  private async programmaticAccount(path: string): Promise<Account> {
    const seed = this.seed;
    if (!seed) {
      throw new LockedWalletError("Wallet must be unlocked to derive accounts by path", {
        wallet: this.name,
        path,
      });
    }
    try {
      BlsHDWallet.parsePath(path);
    } catch (err) {
      throw new InvalidInputError(`Invalid derivation path "${path}"`, { wallet: this.name, path }, { cause: err });
    }

    const keyPair = await this.derive(seed, path, path);
    let account: Account;
    try {
      account = await this.sealAccount(crypto.randomUUID(), path, keyPair, "", keyPair.privateKey);
    } finally {
      zeroize(keyPair.privateKey);
    }
    this.derivedAccounts.add(account);
    return account;
  }

  private async derive(seed: Uint8Array, path: string, account: string): Promise<KeyPair> {
    try {
      return await this.options.deriver.deriveKeyPair(seed, path);
    } catch (err) {
      throw new KeyDerivationError(
        `Failed to derive key for account "${account}"`,
        { wallet: this.name, account, path },
        { cause: err },
      );
    }
  }

  private async sealAccount(
    id: string,
    name: string,
    keyPair: KeyPair,
    passphrase: string,
    residentKey?: Uint8Array,
  ): Promise<Account> {
    let encrypted: EncryptedPayload;
    try {
      encrypted = await this.encryptor.encrypt(keyPair.privateKey, passphrase);
    } catch (err) {
      throw new EncryptionError(
        `Failed to encrypt key for account "${name}"`,
        { wallet: this.name, account: name },
        { cause: err },
      );
    } finally {
      if (!residentKey) zeroize(keyPair.privateKey);
    }

    return new Account(
      this,
      {
        id,
        name,
        path: keyPair.path,
        publicKey: keyPair.publicKey,
        crypto: encrypted,
        encryptor: this.encryptor.name,
        version: this.encryptor.version(),
      },
      residentKey,
    );
  }

  private storeRecord(): Promise<void> {
    return withStorage("store wallet", { wallet: this.name }, () =>
      this.store.storeWallet(this.id, this.name, this.serialize()),
    );
  }

  private storeAccount(account: Account): Promise<void> {
    return withStorage("store account", { wallet: this.name, account: account.name }, () =>
      this.store.storeAccount(this.id, account.id, account.serialize()),
    );
  }

  private storeIndex(): Promise<void> {
    return withStorage("store accounts index", { wallet: this.name }, () =>
      this.store.storeAccountsIndex(this.id, this.index.serialize()),
    );
  }

  private clearSeed(): void {
    if (this.seed) {
      zeroize(this.seed);
      this.seed = null;
    }
  }
}

/**
 * Rejects with AlreadyExistsError when `store` holds a wallet called `name`.
 * @internal
 */
export async function ensureWalletAbsent(store: Store, name: string): Promise<void> {
  const existing = await withStorage("look up wallet", { wallet: name }, () => store.retrieveWallet(name));
  if (existing) {
    throw new AlreadyExistsError(`Wallet "${name}" already exists`, { wallet: name });
  }
}

export interface CreateWalletFromSeedOptions extends WalletOptions {
  /** Path segment separating sibling wallets (default: 0) */
  walletIndex?: number;
}

/**
 * Creates and stores a wallet around an existing 32-byte seed. The returned
 * wallet is locked.
 */
export async function createWalletFromSeed(
  name: string,
  passphrase: string,
  seed: Uint8Array,
  options: CreateWalletFromSeedOptions,
): Promise<HDWallet> {
  const resolved = resolveWalletOptions(options);
  const walletIndex = options.walletIndex ?? 0;

  if (name === "") {
    throw new InvalidInputError("Wallet name missing");
  }
  if (!Number.isInteger(walletIndex) || walletIndex < 0 || walletIndex > MAX_PATH_INDEX) {
    throw new InvalidInputError("Wallet index must be a non-negative 32-bit integer", { wallet: name, walletIndex });
  }
  await ensureWalletAbsent(resolved.store, name);
  if (seed.length !== SEED_LENGTH) {
    throw new InvalidInputError(`Seed must be ${SEED_LENGTH} bytes`, { wallet: name, length: seed.length });
  }

  let encryptedSeed: EncryptedPayload;
  try {
    encryptedSeed = await resolved.encryptor.encrypt(seed, passphrase);
  } catch (err) {
    throw new EncryptionError("Failed to encrypt seed", { wallet: name }, { cause: err });
  }

  const wallet = HDWallet.restore(
    {
      type: WALLET_TYPE,
      uuid: crypto.randomUUID(),
      name,
      crypto: encryptedSeed,
      walletIndex,
      nextaccount: 0,
      version: WALLET_VERSION,
    },
    resolved,
  );
  await wallet.persist();

  resolved.logger.info("Created wallet", { wallet: name, id: wallet.id, store: resolved.store.name });
  return wallet;
}

/** Creates and stores a wallet around a fresh random seed. */
export async function createWallet(name: string, passphrase: string, options: WalletOptions): Promise<HDWallet> {
  const seed = randomBytes(SEED_LENGTH);
  try {
    return await createWalletFromSeed(name, passphrase, seed, { ...options, walletIndex: 0 });
  } finally {
    zeroize(seed);
  }
}

export async function openWallet(name: string, options: WalletOptions): Promise<HDWallet> {
  const { store } = options;
  const data = await withStorage("retrieve wallet", { wallet: name }, () => store.retrieveWallet(name));
  if (!data) {
    throw new NotFoundError(`Wallet "${name}" not found`, { wallet: name });
  }
  return deserializeWallet(data, options);
}

/**
 * Decodes a stored wallet record and loads (or rebuilds) its name index.
 * The wallet starts locked.
 */
export async function deserializeWallet(data: Uint8Array, options: WalletOptions): Promise<HDWallet> {
  const resolved = resolveWalletOptions(options);
  const wallet = HDWallet.restore(decodeWalletRecord(data), resolved);
  await wallet.loadIndex();
  resolved.logger.debug("Opened wallet", { wallet: wallet.name, accounts: wallet.indexEntries().length });
  return wallet;
}
