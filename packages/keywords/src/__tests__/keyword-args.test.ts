import { describe, it, expect } from "vitest";
import {
  keywordArgs,
  registerKeywordSchema,
  getKeywordSchema,
  defineKeywordSchema,
  KeywordHash,
  UNSPECIFIED,
  isUnspecified,
  MissingKeywordError,
  UnknownKeywordError,
} from "../index.js";

const openSchema = defineKeywordSchema({ required: ["path"], optional: ["mode"] });

const open = keywordArgs<unknown, { path: unknown; mode: unknown }>(
  "open",
  openSchema,
  ([path, mode]) => ({ path, mode: isUnspecified(mode) ? "r" : mode }),
);

describe("keywordArgs", () => {
  describe("basic usage", () => {
    it("calls the implementation with extracted values", () => {
      expect(open(KeywordHash.fromRecord({ path: "/tmp/x", mode: "w" }))).toEqual({
        path: "/tmp/x",
        mode: "w",
      });
    });

    it("passes unspecified slots for omitted optional keywords", () => {
      expect(open(KeywordHash.fromRecord({ path: "/tmp/x" }))).toEqual({ path: "/tmp/x", mode: "r" });
    });

    it("passes the found count", () => {
      const counted = keywordArgs("counted", openSchema, (values, filled) => ({ values, filled }));
      expect(counted(KeywordHash.fromRecord({ path: "p" }))).toEqual({
        values: ["p", UNSPECIFIED],
        filled: 1,
      });
    });

    it("exposes its name and schema", () => {
      expect(open.functionName).toBe("open");
      expect(open.schema).toBe(openSchema);
    });
  });

  describe("consumption", () => {
    it("removes matched keys from the caller's mapping", () => {
      const schema = defineKeywordSchema({ required: ["a"], restAllowed: true });
      const fn = keywordArgs("consume", schema, ([a]) => a);
      const mapping = KeywordHash.fromRecord({ a: 1, rest: 2 });

      expect(fn(mapping)).toBe(1);
      expect([...mapping.keys()]).toEqual(["rest"]);
    });
  });

  describe("validation", () => {
    it("propagates a missing required keyword", () => {
      expect(() => open(KeywordHash.fromRecord({ mode: "w" }))).toThrow(MissingKeywordError);
    });

    it("propagates unknown keywords", () => {
      expect(() => open(KeywordHash.fromRecord({ path: "p", size: 1 }))).toThrow(UnknownKeywordError);
      expect(() => open(KeywordHash.fromRecord({ path: "p", size: 1 }))).toThrow("unknown keyword: size");
    });

    it("rejects a call without a mapping when keywords are required", () => {
      expect(() => open(null)).toThrow("missing keyword: path");
    });
  });
});

describe("registry", () => {
  it("registers schemas of wrapped functions", () => {
    keywordArgs("registered", openSchema, () => undefined);
    expect(getKeywordSchema("registered")).toBe(openSchema);
  });

  it("registerKeywordSchema can be called directly", () => {
    const schema = defineKeywordSchema({ optional: ["x"] });
    registerKeywordSchema("direct", schema);
    expect(getKeywordSchema("direct")).toBe(schema);
  });

  it("returns undefined for unregistered functions", () => {
    expect(getKeywordSchema("nonexistent_fn_xyz")).toBeUndefined();
  });
});
