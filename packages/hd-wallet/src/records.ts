/**
 * Serialized wallet, account and export-bundle records.
 * Each record is decoded in one step; the first invalid field is reported.
 */

import { z } from "zod";
import { bytesToUtf8, isHexString, utf8ToBytes } from "@hdkeystore/helpers";
import { MAX_PATH_INDEX, WALLET_TYPE } from "./config";
import { CorruptStateError } from "./errors";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Records written before the `uuid` field existed carry their identifier as
 * `id`. They are read as if it had been written under `uuid`.
 */
export function migrateLegacyIdentifier(raw: unknown): unknown {
  if (!isPlainObject(raw) || raw.uuid !== undefined || raw.id === undefined) {
    return raw;
  }
  const { id, ...rest } = raw;
  return { ...rest, uuid: id };
}

const uint = z.number().int().nonnegative();
const pathIndex = uint.max(MAX_PATH_INDEX);
// One past the last path index marks a wallet that has handed out every number.
const accountCounter = uint.max(MAX_PATH_INDEX + 1);
const recordId = z.string().uuid();
const encryptedPayloadSchema = z.record(z.unknown());

const walletRecordSchema = z.preprocess(
  migrateLegacyIdentifier,
  z.object({
    type: z.literal(WALLET_TYPE),
    uuid: recordId,
    name: z.string(),
    crypto: encryptedPayloadSchema,
    walletIndex: pathIndex,
    nextaccount: accountCounter,
    version: uint,
  }),
);

const accountRecordSchema = z.preprocess(
  migrateLegacyIdentifier,
  z.object({
    uuid: recordId,
    name: z.string().min(1),
    pubkey: z.string().refine(isHexString, "expected a hex public key"),
    path: z.string().min(1),
    crypto: encryptedPayloadSchema,
    encryptor: z.string(),
    version: uint,
  }),
);

const exportBundleSchema = z
  .object({
    wallet: walletRecordSchema,
    accounts: z.array(accountRecordSchema),
  })
  .superRefine((bundle, ctx) => {
    const ids = new Set<string>();
    const names = new Set<string>();
    bundle.accounts.forEach((account, i) => {
      if (ids.has(account.uuid)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["accounts", i, "uuid"], message: "duplicate account ID" });
      }
      if (names.has(account.name)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["accounts", i, "name"], message: "duplicate account name" });
      }
      ids.add(account.uuid);
      names.add(account.name);
    });
  });

export type WalletRecord = z.infer<typeof walletRecordSchema>;
export type AccountRecord = z.infer<typeof accountRecordSchema>;
export type ExportBundle = z.infer<typeof exportBundleSchema>;

/**
 * Parse JSON bytes against a schema, turning any failure into a CorruptStateError.
 */
export function decodeJsonRecord<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: Uint8Array,
  kind: string,
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(bytesToUtf8(data));
  } catch (err) {
    throw new CorruptStateError(`${kind} record is not valid JSON`, { record: kind }, { cause: err });
  }

  const result = schema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const field = issue.path.join(".");
  throw new CorruptStateError(
    field ? `${kind} record field "${field}" invalid: ${issue.message}` : `${kind} record invalid: ${issue.message}`,
    { record: kind, field },
  );
}

/** True when `value` has the shape of a record identifier. */
export function isRecordId(value: string): boolean {
  return recordId.safeParse(value).success;
}

export function encodeRecord(record: WalletRecord | AccountRecord | ExportBundle): Uint8Array {
  return utf8ToBytes(JSON.stringify(record));
}

export function decodeWalletRecord(data: Uint8Array): WalletRecord {
  return decodeJsonRecord(walletRecordSchema, data, "wallet");
}

export function decodeAccountRecord(data: Uint8Array): AccountRecord {
  return decodeJsonRecord(accountRecordSchema, data, "account");
}

export function decodeExportBundle(data: Uint8Array): ExportBundle {
  return decodeJsonRecord(exportBundleSchema, data, "export bundle");
}
