import { z } from "zod";
import { bytesToUtf8, utf8ToBytes } from "@hdkeystore/helpers";
import { CorruptStateError } from "./errors";

export const NAME_INDEX_VERSION = 1;

const serializedIndexSchema = z.object({
  version: z.literal(NAME_INDEX_VERSION),
  entries: z.array(z.object({ uuid: z.string().uuid(), name: z.string().min(1) })),
});

export interface NameIndexEntry {
  id: string;
  name: string;
}

/**
 * Bidirectional account name <-> identifier mapping for one wallet.
 * Names and identifiers are each unique; adding either again replaces the
 * earlier pairing.
 */
export class NameIndex {
  private readonly idsByName = new Map<string, string>();
  private readonly namesById = new Map<string, string>();

  add(id: string, name: string): void {
    this.remove(id);
    const previousId = this.idsByName.get(name);
    if (previousId !== undefined) {
      this.namesById.delete(previousId);
    }
    this.idsByName.set(name, id);
    this.namesById.set(id, name);
  }

  remove(id: string): boolean {
    const name = this.namesById.get(id);
    if (name === undefined) return false;
    this.namesById.delete(id);
    this.idsByName.delete(name);
    return true;
  }

  id(name: string): string | undefined {
    return this.idsByName.get(name);
  }

  name(id: string): string | undefined {
    return this.namesById.get(id);
  }

  has(name: string): boolean {
    return this.idsByName.has(name);
  }

  get size(): number {
    return this.namesById.size;
  }

  entries(): NameIndexEntry[] {
    return Array.from(this.namesById, ([id, name]) => ({ id, name }));
  }

  serialize(): Uint8Array {
    return utf8ToBytes(
      JSON.stringify({
        version: NAME_INDEX_VERSION,
        entries: this.entries().map(({ id, name }) => ({ uuid: id, name })),
      }),
    );
  }

  static deserialize(data: Uint8Array): NameIndex {
    let raw: unknown;
    try {
      raw = JSON.parse(bytesToUtf8(data));
    } catch (err) {
      throw new CorruptStateError("Accounts index is not valid JSON", { record: "index" }, { cause: err });
    }

    const parsed = serializedIndexSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptStateError("Accounts index is malformed", { record: "index" }, { cause: parsed.error });
    }

    const index = new NameIndex();
    for (const entry of parsed.data.entries) {
      if (index.has(entry.name) || index.name(entry.uuid) !== undefined) {
        throw new CorruptStateError(`Accounts index has a duplicate entry for "${entry.name}"`, {
          record: "index",
          account: entry.name,
        });
      }
      index.add(entry.uuid, entry.name);
    }
    return index;
  }
}
