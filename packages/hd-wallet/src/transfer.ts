import { resolveWalletOptions, type WalletOptions } from "./config";
import { AuthenticationError } from "./errors";
import { decodeExportBundle } from "./records";
import { ensureWalletAbsent, HDWallet } from "./wallet";

/**
 * Recreates an exported wallet in `options.store`.
 *
 * Nothing is written when a wallet of the same name already exists. Past that
 * point writes are not rolled back: a failure part way leaves the accounts
 * stored so far in place.
 */
export async function importWallet(blob: Uint8Array, passphrase: string, options: WalletOptions): Promise<HDWallet> {
  const resolved = resolveWalletOptions(options);

  let plaintext: Uint8Array;
  try {
    plaintext = await resolved.bundleCipher.open(blob, passphrase);
  } catch {
    throw new AuthenticationError("Incorrect export passphrase");
  }

  const bundle = decodeExportBundle(plaintext);
  await ensureWalletAbsent(resolved.store, bundle.wallet.name);

  const wallet = HDWallet.restore(bundle.wallet, resolved);
  await wallet.persist();
  for (const record of bundle.accounts) {
    await wallet.adoptAccount(record);
  }

  resolved.logger.info("Imported wallet", {
    wallet: wallet.name,
    accounts: bundle.accounts.length,
    store: resolved.store.name,
  });
  return wallet;
}
