import { describe, expect, it } from "vitest";
import { BundleCipher } from "@hdkeystore/crypto";
import { utf8ToBytes } from "@hdkeystore/helpers";
import { AlreadyExistsError, AuthenticationError, CorruptStateError } from "./errors";
import {
  ACCOUNT_PASSPHRASE,
  createTestOptions,
  EXPORT_PASSPHRASE,
  TEST_SEED,
  WALLET_PASSPHRASE,
  type TestWalletOptions,
} from "./testing/fixtures";
import { encodeRecord } from "./records";
import { importWallet } from "./transfer";
import { createWalletFromSeed, type HDWallet, openWallet } from "./wallet";

async function populatedWallet(options: TestWalletOptions = createTestOptions()): Promise<HDWallet> {
  const wallet = await createWalletFromSeed("primary", WALLET_PASSPHRASE, TEST_SEED, { ...options, walletIndex: 2 });
  await wallet.unlock(WALLET_PASSPHRASE);
  await wallet.createAccount("validator-1", ACCOUNT_PASSPHRASE);
  await wallet.createAccount("validator-2", "test-second-account-passphrase");
  return wallet;
}

describe("export and import", () => {
  it("reproduces the wallet and its accounts in another store", async () => {
    const source = await populatedWallet();
    const blob = await source.export(EXPORT_PASSPHRASE);

    const target = createTestOptions();
    const imported = await importWallet(blob, EXPORT_PASSPHRASE, target);

    expect(imported.id).toBe(source.id);
    expect(imported.name).toBe("primary");
    expect(imported.walletIndex).toBe(2);
    expect(imported.nextAccount).toBe(2);
    expect(imported.isUnlocked()).toBe(false);

    const sourceAccounts = await source.accounts().toArray();
    const importedAccounts = await imported.accounts().toArray();
    expect(importedAccounts.map((account) => account.toRecord())).toEqual(
      sourceAccounts.map((account) => account.toRecord()),
    );

    await imported.unlock(WALLET_PASSPHRASE);
    expect(Array.from(imported.key())).toEqual(Array.from(TEST_SEED));
  });

  it("keeps each account key under its original passphrase", async () => {
    const source = await populatedWallet();
    const blob = await source.export(EXPORT_PASSPHRASE);
    const imported = await importWallet(blob, EXPORT_PASSPHRASE, createTestOptions());

    const first = await imported.accountByName("validator-1");
    const second = await imported.accountByName("validator-2");
    await first.unlock(ACCOUNT_PASSPHRASE);
    await second.unlock("test-second-account-passphrase");

    const message = utf8ToBytes("attestation");
    const original = await source.accountByName("validator-1");
    expect(original.verify(first.sign(message), message)).toBe(true);
    expect(second.isUnlocked()).toBe(true);
  });

  it("stores the wallet, an empty index, then each account and its index entry", async () => {
    const source = await populatedWallet();
    const [first, second] = await source.accounts().toArray();
    const blob = await source.export(EXPORT_PASSPHRASE);

    const target = createTestOptions();
    await importWallet(blob, EXPORT_PASSPHRASE, target);

    expect(target.store.writes.map((write) => `${write.kind}:${write.key}`)).toEqual([
      `index:${source.id}`,
      `wallet:${source.id}`,
      `account:${first.id}`,
      `index:${source.id}`,
      `account:${second.id}`,
      `index:${source.id}`,
    ]);

    const reopened = await openWallet("primary", target);
    expect(reopened.indexEntries()).toEqual([
      { id: first.id, name: first.name },
      { id: second.id, name: second.name },
    ]);
  });

  it("refuses to import over an existing wallet and writes nothing", async () => {
    const source = await populatedWallet();
    const blob = await source.export(EXPORT_PASSPHRASE);

    const target = createTestOptions();
    await createWalletFromSeed("primary", "test-other-passphrase", new Uint8Array(32).fill(9), target);
    const writes = target.store.writes.length;
    const existing = await target.store.retrieveWallet("primary");

    await expect(importWallet(blob, EXPORT_PASSPHRASE, target)).rejects.toBeInstanceOf(AlreadyExistsError);
    expect(target.store.writes).toHaveLength(writes);
    expect(await target.store.retrieveWallet("primary")).toEqual(existing);
  });

  it("rejects a wrong export passphrase without writing", async () => {
    const source = await populatedWallet();
    const blob = await source.export(EXPORT_PASSPHRASE);
    const target = createTestOptions();

    const err = await importWallet(blob, "test-wrong-passphrase", target).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err instanceof Error ? err.cause : "not an error").toBeUndefined();
    expect(target.store.writes).toEqual([]);
  });

  it("rejects a bundle that does not decode", async () => {
    const blob = await new BundleCipher({ logN: 10 }).seal(utf8ToBytes(`{"wallet":{}}`), EXPORT_PASSPHRASE);
    const target = createTestOptions();

    await expect(importWallet(blob, EXPORT_PASSPHRASE, target)).rejects.toBeInstanceOf(CorruptStateError);
    expect(target.store.writes).toEqual([]);
  });

  it("rejects a bundle that repeats an account name without writing", async () => {
    const source = await populatedWallet();
    const first = (await source.accountByName("validator-1")).toRecord();
    const repeated = { ...first, uuid: "77777777-7777-4777-8777-777777777777" };
    const bundle = encodeRecord({ wallet: source.toRecord(), accounts: [first, repeated] });
    const blob = await new BundleCipher({ logN: 10 }).seal(bundle, EXPORT_PASSPHRASE);
    const target = createTestOptions();

    const err = await importWallet(blob, EXPORT_PASSPHRASE, target).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CorruptStateError);
    expect(err).toMatchObject({ details: { record: "export bundle", field: "accounts.1.name" } });
    expect(target.store.writes).toEqual([]);
  });

  it("rejects a bundle that repeats an account ID without writing", async () => {
    const source = await populatedWallet();
    const first = (await source.accountByName("validator-1")).toRecord();
    const second = (await source.accountByName("validator-2")).toRecord();
    const bundle = encodeRecord({ wallet: source.toRecord(), accounts: [first, { ...second, uuid: first.uuid }] });
    const blob = await new BundleCipher({ logN: 10 }).seal(bundle, EXPORT_PASSPHRASE);
    const target = createTestOptions();

    const err = await importWallet(blob, EXPORT_PASSPHRASE, target).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CorruptStateError);
    expect(err).toMatchObject({ details: { record: "export bundle", field: "accounts.1.uuid" } });
    expect(target.store.writes).toEqual([]);
  });

  it("exports an empty wallet", async () => {
    const options = createTestOptions();
    const source = await createWalletFromSeed("empty", WALLET_PASSPHRASE, TEST_SEED, options);
    const blob = await source.export(EXPORT_PASSPHRASE);

    const imported = await importWallet(blob, EXPORT_PASSPHRASE, createTestOptions());
    expect(imported.name).toBe("empty");
    expect(imported.indexEntries()).toEqual([]);
  });
});
