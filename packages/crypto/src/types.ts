/**
 * Opaque, JSON-serialisable output of an {@link Encryptor}.
 */
export type EncryptedPayload = { [key: string]: unknown };

/**
 * Passphrase-based encryption of arbitrary byte payloads.
 */
export interface Encryptor {
  /** Identifier written alongside payloads this encryptor produced. */
  readonly name: string;
  version(): number;
  encrypt(plaintext: Uint8Array, passphrase: string): Promise<EncryptedPayload>;
  /**
   * Rejects on a wrong passphrase and on a corrupt payload alike; the error
   * does not say which.
   */
  decrypt(payload: EncryptedPayload, passphrase: string): Promise<Uint8Array>;
}

export interface KeyPair {
  path: string;
  publicKey: Uint8Array;
  privateKey: Uint8Array;
}

/**
 * Deterministic seed + path -> key pair derivation.
 */
export interface KeyDeriver {
  deriveKeyPair(seed: Uint8Array, path: string): Promise<KeyPair>;
}
