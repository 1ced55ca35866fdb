import type { KeywordMapping, KeywordSchema, KeywordSlot } from "./types.js";
import { extractKeywords } from "./extract.js";

/** Registry of keyword schemas, keyed by function name. */
const keywordSchemaRegistry = new Map<string, KeywordSchema>();

/** Register the keyword schema of a function. */
export function registerKeywordSchema(functionName: string, schema: KeywordSchema): void {
  keywordSchemaRegistry.set(functionName, schema);
}

/** Look up a registered schema by function name. */
export function getKeywordSchema(functionName: string): KeywordSchema | undefined {
  return keywordSchemaRegistry.get(functionName);
}

/** Receives the extracted slots, required first, and how many were found. */
export type KeywordImpl<V, R> = (values: ReadonlyArray<KeywordSlot<V>>, filled: number) => R;

/** A function that takes its arguments as a keyword mapping. */
export interface KeywordFunction<V, R> {
  (mapping: KeywordMapping<V> | null | undefined): R;
  readonly functionName: string;
  readonly schema: KeywordSchema;
}

/**
 * Wrap `impl` so it is called with keyword arguments.
 *
 * Each call extracts into a fresh buffer, consuming the matched keys from the
 * caller's mapping, then hands the buffer to `impl`. The schema is registered
 * under `functionName`.
 *
 * @example
 * ```ts
 * const open = keywordArgs("open", schema, ([path, mode]) => ({ path, mode }));
 * open(KeywordHash.fromRecord({ path: "/tmp/x" }));
 * ```
 */
export function keywordArgs<V, R>(
  functionName: string,
  schema: KeywordSchema,
  impl: KeywordImpl<V, R>,
): KeywordFunction<V, R> {
  registerKeywordSchema(functionName, schema);
  const slots = schema.required.length + schema.optional.length;

  const call = (mapping: KeywordMapping<V> | null | undefined): R => {
    const values = new Array<KeywordSlot<V>>(slots);
    const filled = extractKeywords(mapping, schema, values);
    return impl(values, filled);
  };

  return Object.assign(call, { functionName, schema });
}
