export type WalletErrorCode =
  | "ALREADY_EXISTS"
  | "NOT_FOUND"
  | "INVALID_INPUT"
  | "LOCKED_WALLET"
  | "AUTHENTICATION_FAILURE"
  | "CORRUPT_STATE"
  | "STORAGE_FAILURE"
  | "DERIVATION_FAILURE"
  | "ENCRYPTION_FAILURE";

export class WalletError extends Error {
  readonly code: WalletErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: WalletErrorCode,
    message: string,
    details?: Record<string, unknown>,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
  }
}

export class AlreadyExistsError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("ALREADY_EXISTS", message, details);
  }
}

export class NotFoundError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("NOT_FOUND", message, details);
  }
}

export class InvalidInputError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super("INVALID_INPUT", message, details, options);
  }
}

export class LockedWalletError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("LOCKED_WALLET", message, details);
  }
}

export class LockedAccountError extends LockedWalletError {}

/**
 * Never carries a cause: a wrong passphrase and a corrupt ciphertext must be
 * indistinguishable to the caller.
 */
export class AuthenticationError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("AUTHENTICATION_FAILURE", message, details);
  }
}

export class CorruptStateError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super("CORRUPT_STATE", message, details, options);
  }
}

export class StorageError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super("STORAGE_FAILURE", message, details, options);
  }
}

export class KeyDerivationError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super("DERIVATION_FAILURE", message, details, options);
  }
}

export class EncryptionError extends WalletError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super("ENCRYPTION_FAILURE", message, details, options);
  }
}

export function isWalletError(err: unknown, code?: WalletErrorCode): err is WalletError {
  return err instanceof WalletError && (code === undefined || err.code === code);
}

/**
 * Runs a storage call, wrapping anything it throws as a StorageError.
 */
export async function withStorage<T>(
  action: string,
  details: Record<string, unknown>,
  task: () => Promise<T>,
): Promise<T> {
  try {
    return await task();
  } catch (err) {
    if (err instanceof WalletError) throw err;
    throw new StorageError(`Failed to ${action}`, details, { cause: err });
  }
}
