import type { Keyword } from "./types.js";

/** Which check a keyword argument failed. */
export type KeywordErrorReason = "missing" | "unknown";

/** Reason codes for malformed schemas and buffers. */
export type KeywordSchemaErrorReason =
  | "duplicate_keyword"
  | "invalid_keyword"
  | "table_length"
  | "buffer_length"
  | "missing_buffer";

export function isKeyword(value: unknown): value is Keyword {
  return typeof value === "string" || typeof value === "symbol";
}

function describeType(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "Array";
  if (typeof value === "object") return value.constructor?.name ?? "Object";
  return typeof value;
}

/**
 * The printed name of a keyword.
 *
 * Throws {@link KeywordTypeError} for anything that is not a keyword, which
 * means the mapping was keyed by something else.
 */
export function keywordName(key: unknown): string {
  if (typeof key === "string") return key;
  if (typeof key === "symbol") return key.description ?? "";
  throw new KeywordTypeError(key);
}

/**
 * Build `"<reason> keyword[s][: k1, k2]"`.
 *
 * @example
 * ```ts
 * formatKeywordMessage("missing", ["a"]);      // "missing keyword: a"
 * formatKeywordMessage("unknown", ["a", "b"]); // "unknown keywords: a, b"
 * formatKeywordMessage("unknown", []);         // "unknown keyword"
 * ```
 */
export function formatKeywordMessage(reason: KeywordErrorReason, keys: ReadonlyArray<unknown>): string {
  const head = `${reason} keyword${keys.length > 1 ? "s" : ""}`;
  if (keys.length === 0) return head;
  return `${head}: ${keys.map(keywordName).join(", ")}`;
}

/** A keyword argument the caller passed (or failed to pass) was rejected. */
export class KeywordArgumentError extends Error {
  readonly keywords: ReadonlyArray<Keyword>;

  constructor(
    readonly reason: KeywordErrorReason,
    keywords: ReadonlyArray<unknown>,
  ) {
    super(formatKeywordMessage(reason, keywords));
    this.name = "KeywordArgumentError";
    this.keywords = keywords.filter(isKeyword);
  }
}

/** A required keyword was absent. Carries only the first one found missing. */
export class MissingKeywordError extends KeywordArgumentError {
  constructor(readonly keyword: Keyword) {
    super("missing", [keyword]);
    this.name = "MissingKeywordError";
  }
}

/** Keys outside the schema were left in a mapping that does not allow them. */
export class UnknownKeywordError extends KeywordArgumentError {
  constructor(keywords: ReadonlyArray<unknown>) {
    super("unknown", keywords);
    this.name = "UnknownKeywordError";
  }
}

/** A mapping key that had to be printed was not a keyword. */
export class KeywordTypeError extends TypeError {
  constructor(readonly value: unknown) {
    super(`wrong argument type ${describeType(value)} (expected keyword)`);
    this.name = "KeywordTypeError";
  }
}

/** A schema or output buffer was malformed. This is a bug in the caller. */
export class KeywordSchemaError extends Error {
  constructor(
    readonly reason: KeywordSchemaErrorReason,
    message: string,
    readonly keyword?: Keyword,
  ) {
    super(message);
    this.name = "KeywordSchemaError";
  }
}
