/** A keyword name as the host represents it. */
export type Keyword = string | symbol;

/** Marker for "no argument supplied", distinct from every host value. */
export const UNSPECIFIED: unique symbol = Symbol("kwargs.unspecified");
export type Unspecified = typeof UNSPECIFIED;

/** An output slot: an extracted value, or {@link UNSPECIFIED}. */
export type KeywordSlot<V> = V | Unspecified;

export function isUnspecified(value: unknown): value is Unspecified {
  return value === UNSPECIFIED;
}

/**
 * The capabilities the extractor needs from the host's keyword hash.
 *
 * Keys held by the mapping are not guaranteed to be keywords; only the
 * schema's keys are.
 */
export interface KeywordMapping<V = unknown> {
  readonly size: number;
  /** The stored value, or {@link UNSPECIFIED} when the key is absent. */
  lookup(key: Keyword): KeywordSlot<V>;
  delete(key: Keyword): boolean;
  /** Remaining keys, in insertion order. */
  keys(): Iterable<unknown>;
}

/** Declared keyword names: a required prefix and an optional suffix. */
export interface KeywordSchema {
  readonly required: ReadonlyArray<Keyword>;
  readonly optional: ReadonlyArray<Keyword>;
  /** Whether keys outside the schema may remain in the mapping. */
  readonly restAllowed: boolean;
}

/**
 * Mode flags for `extractKeywords`.
 *
 * Both default to whether an output buffer was passed, so a call with a
 * buffer extracts and consumes and a call without one only validates.
 */
export interface ExtractOptions {
  /** Record found values (and {@link UNSPECIFIED} for absent ones) in the buffer. */
  writeValues?: boolean;
  /** Delete found keys from the mapping. */
  consumeKeys?: boolean;
}
