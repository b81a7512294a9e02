import { blsPublicKey, blsSign, blsVerify, type EncryptedPayload, type Encryptor } from "@hdkeystore/crypto";
import { bytesToHex, constantTimeEqual, hexToBytes, zeroize } from "@hdkeystore/helpers";
import { AuthenticationError, CorruptStateError, LockedAccountError } from "./errors";
import { decodeAccountRecord, encodeRecord, type AccountRecord } from "./records";

/**
 * What an account needs from the wallet it belongs to. Accounts never mutate
 * their wallet through this reference.
 */
export interface AccountOwner {
  readonly id: string;
  readonly encryptor: Encryptor;
}

export interface AccountFields {
  id: string;
  name: string;
  path: string;
  publicKey: Uint8Array;
  crypto: EncryptedPayload;
  /** Name of the encryptor that produced `crypto` */
  encryptor: string;
  version: number;
}

/**
 * One derived key: its metadata, encrypted private key and, while unlocked,
 * the plaintext private key.
 */
export class Account {
  readonly id: string;
  readonly name: string;
  readonly path: string;
  readonly publicKey: Uint8Array;
  readonly crypto: EncryptedPayload;
  readonly encryptor: string;
  readonly version: number;
  readonly wallet: AccountOwner;

  private secretKey: Uint8Array | null = null;

  constructor(wallet: AccountOwner, fields: AccountFields, secretKey?: Uint8Array) {
    this.wallet = wallet;
    this.id = fields.id;
    this.name = fields.name;
    this.path = fields.path;
    this.publicKey = fields.publicKey;
    this.crypto = fields.crypto;
    this.encryptor = fields.encryptor;
    this.version = fields.version;
    if (secretKey) {
      this.secretKey = secretKey.slice();
    }
  }

  static fromRecord(wallet: AccountOwner, record: AccountRecord): Account {
    return new Account(wallet, {
      id: record.uuid,
      name: record.name,
      path: record.path,
      publicKey: hexToBytes(record.pubkey),
      crypto: record.crypto,
      encryptor: record.encryptor,
      version: record.version,
    });
  }

  static deserialize(wallet: AccountOwner, data: Uint8Array): Account {
    return Account.fromRecord(wallet, decodeAccountRecord(data));
  }

  get publicKeyHex(): string {
    return bytesToHex(this.publicKey);
  }

  toRecord(): AccountRecord {
    return {
      uuid: this.id,
      name: this.name,
      pubkey: this.publicKeyHex,
      path: this.path,
      crypto: this.crypto,
      encryptor: this.encryptor,
      version: this.version,
    };
  }

  serialize(): Uint8Array {
    return encodeRecord(this.toRecord());
  }

  isUnlocked(): boolean {
    return this.secretKey !== null;
  }

  async unlock(passphrase: string): Promise<void> {
    let secretKey: Uint8Array;
    try {
      secretKey = await this.wallet.encryptor.decrypt(this.crypto, passphrase);
    } catch {
      throw new AuthenticationError("Incorrect passphrase", { wallet: this.wallet.id, account: this.name });
    }

    let publicKey: Uint8Array;
    try {
      publicKey = blsPublicKey(secretKey);
    } catch (err) {
      zeroize(secretKey);
      throw new CorruptStateError(
        "Decrypted private key is not a valid key",
        { wallet: this.wallet.id, account: this.name },
        { cause: err },
      );
    }
    if (!constantTimeEqual(publicKey, this.publicKey)) {
      zeroize(secretKey);
      throw new CorruptStateError("Private key does not correspond to public key", {
        wallet: this.wallet.id,
        account: this.name,
      });
    }

    this.lock();
    this.secretKey = secretKey;
  }

  lock(): void {
    if (this.secretKey) {
      zeroize(this.secretKey);
      this.secretKey = null;
    }
  }

  sign(message: Uint8Array): Uint8Array {
    if (!this.secretKey) {
      throw new LockedAccountError("Account must be unlocked to sign", {
        wallet: this.wallet.id,
        account: this.name,
      });
    }
    return blsSign(message, this.secretKey);
  }

  /** Checks a signature against this account's public key; malformed input is not valid. */
  verify(signature: Uint8Array, message: Uint8Array): boolean {
    try {
      return blsVerify(signature, message, this.publicKey);
    } catch {
      return false;
    }
  }
}
