import { describe, expect, it } from "vitest";
import { bytesToUtf8, utf8ToBytes } from "@hdkeystore/helpers";
import { CorruptStateError } from "./errors";
import { NameIndex } from "./name-index";

const ID_A = "11111111-1111-4111-8111-111111111111";
const ID_B = "22222222-2222-4222-8222-222222222222";

describe("NameIndex", () => {
  it("resolves names and identifiers in both directions", () => {
    const index = new NameIndex();
    index.add(ID_A, "alpha");
    index.add(ID_B, "beta");

    expect(index.id("alpha")).toBe(ID_A);
    expect(index.name(ID_B)).toBe("beta");
    expect(index.has("beta")).toBe(true);
    expect(index.has("gamma")).toBe(false);
    expect(index.id("gamma")).toBeUndefined();
    expect(index.size).toBe(2);
  });

  it("replaces an earlier pairing of the same identifier", () => {
    const index = new NameIndex();
    index.add(ID_A, "alpha");
    index.add(ID_A, "renamed");

    expect(index.has("alpha")).toBe(false);
    expect(index.name(ID_A)).toBe("renamed");
    expect(index.size).toBe(1);
  });

  it("replaces an earlier pairing of the same name", () => {
    const index = new NameIndex();
    index.add(ID_A, "alpha");
    index.add(ID_B, "alpha");

    expect(index.id("alpha")).toBe(ID_B);
    expect(index.name(ID_A)).toBeUndefined();
    expect(index.size).toBe(1);
  });

  it("removes entries by identifier", () => {
    const index = new NameIndex();
    index.add(ID_A, "alpha");

    expect(index.remove(ID_A)).toBe(true);
    expect(index.remove(ID_A)).toBe(false);
    expect(index.has("alpha")).toBe(false);
    expect(index.entries()).toEqual([]);
  });

  it("serializes entries in insertion order", () => {
    const index = new NameIndex();
    index.add(ID_B, "beta");
    index.add(ID_A, "alpha");

    expect(bytesToUtf8(index.serialize())).toBe(
      `{"version":1,"entries":[{"uuid":"${ID_B}","name":"beta"},{"uuid":"${ID_A}","name":"alpha"}]}`,
    );
  });

  it("restores what it serialized", () => {
    const index = new NameIndex();
    index.add(ID_A, "alpha");
    index.add(ID_B, "beta");

    const restored = NameIndex.deserialize(index.serialize());
    expect(restored.entries()).toEqual([
      { id: ID_A, name: "alpha" },
      { id: ID_B, name: "beta" },
    ]);
  });

  it.each([
    ["invalid JSON", "{"],
    ["an unknown version", `{"version":2,"entries":[]}`],
    ["a missing entries list", `{"version":1}`],
    ["an identifier that is not a UUID", `{"version":1,"entries":[{"uuid":"nope","name":"alpha"}]}`],
    ["an empty name", `{"version":1,"entries":[{"uuid":"${ID_A}","name":""}]}`],
    [
      "a duplicate name",
      `{"version":1,"entries":[{"uuid":"${ID_A}","name":"alpha"},{"uuid":"${ID_B}","name":"alpha"}]}`,
    ],
  ])("rejects %s", (_label, json) => {
    expect(() => NameIndex.deserialize(utf8ToBytes(json))).toThrow(CorruptStateError);
  });
});
