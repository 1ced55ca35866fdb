import { describe, it, expect } from "vitest";
import { KeywordHash, UNSPECIFIED, isUnspecified } from "../index.js";

describe("KeywordHash", () => {
  it("looks up stored values and reports absent keys as unspecified", () => {
    const hash = KeywordHash.fromRecord({ a: 1 });
    expect(hash.lookup("a")).toBe(1);
    expect(hash.lookup("b")).toBe(UNSPECIFIED);
    expect(isUnspecified(hash.lookup("b"))).toBe(true);
  });

  it("keeps a stored undefined apart from an absent key", () => {
    const hash = new KeywordHash<undefined>([["a", undefined]]);
    expect(hash.lookup("a")).toBeUndefined();
    expect(isUnspecified(hash.lookup("a"))).toBe(false);
  });

  it("keeps insertion order when a key is overwritten", () => {
    const hash = KeywordHash.fromRecord({ a: 1, b: 2 });
    hash.set("a", 3).set("c", 4);
    expect([...hash.entries()]).toEqual([
      ["a", 3],
      ["b", 2],
      ["c", 4],
    ]);
  });

  it("deletes keys and tracks size", () => {
    const hash = KeywordHash.fromRecord({ a: 1, b: 2 });
    expect(hash.delete("a")).toBe(true);
    expect(hash.delete("a")).toBe(false);
    expect(hash.size).toBe(1);
    expect(hash.has("b")).toBe(true);
    expect([...hash.keys()]).toEqual(["b"]);
  });

  it("holds keys of any type", () => {
    const sym = Symbol("s");
    const hash = new KeywordHash<string>([
      [sym, "symbol"],
      [1, "number"],
    ]);
    expect(hash.lookup(sym)).toBe("symbol");
    expect([...hash.keys()]).toEqual([sym, 1]);
  });
});
