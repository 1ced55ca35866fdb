import { config, createLogger } from "@kwargs-kit/core";
import { UNSPECIFIED } from "./types.js";
import type { ExtractOptions, Keyword, KeywordMapping, KeywordSchema, KeywordSlot } from "./types.js";
import {
  KeywordSchemaError,
  MissingKeywordError,
  UnknownKeywordError,
  keywordName,
} from "./errors.js";

const log = createLogger("keywords");

function checkBuffer(
  values: ReadonlyArray<unknown> | undefined,
  writeValues: boolean,
  total: number,
): void {
  if (writeValues && values === undefined) {
    throw new KeywordSchemaError("missing_buffer", "writeValues requires an output buffer");
  }
  if (values !== undefined && values.length !== total) {
    throw new KeywordSchemaError(
      "buffer_length",
      `Output buffer has ${values.length} slots but the schema declares ${total} keywords`,
    );
  }
}

/**
 * Extract keyword arguments from `mapping` into `values`.
 *
 * Required keywords are looked up in schema order and the first one missing
 * raises {@link MissingKeywordError}. Optional keywords that are absent leave
 * their slot {@link UNSPECIFIED}. Unless the schema allows extra keys, any
 * key left over raises {@link UnknownKeywordError}.
 *
 * Without an output buffer the call only validates and never touches the
 * mapping. With one, found keys are deleted from the mapping as they are
 * read; deletions already made are kept when an error is thrown.
 *
 * @returns the number of keywords found
 *
 * @example
 * ```ts
 * const schema = defineKeywordSchema({ required: ["name"], optional: ["age"] });
 * const values = new Array<KeywordSlot<unknown>>(2);
 * extractKeywords(KeywordHash.fromRecord({ name: "x" }), schema, values); // 1
 * // values → ["x", UNSPECIFIED]
 * ```
 */
export function extractKeywords<V>(
  mapping: KeywordMapping<V> | null | undefined,
  schema: KeywordSchema,
  values?: KeywordSlot<V>[] | null,
  options: ExtractOptions = {},
): number {
  const buffer = values ?? undefined;
  const writeValues = options.writeValues ?? buffer !== undefined;
  const consumeKeys = options.consumeKeys ?? buffer !== undefined;
  const { required, optional, restAllowed } = schema;
  const total = required.length + optional.length;

  if (config.get("checks") !== "none") {
    checkBuffer(buffer, writeValues, total);
  }

  const write = (index: number, value: KeywordSlot<V>): void => {
    if (writeValues && buffer !== undefined) buffer[index] = value;
  };

  const take = (key: Keyword): KeywordSlot<V> => {
    if (!mapping) return UNSPECIFIED;
    const value = mapping.lookup(key);
    if (consumeKeys && value !== UNSPECIFIED) mapping.delete(key);
    return value;
  };

  let filled = 0;

  required.forEach((key, index) => {
    const value = take(key);
    write(index, value);
    if (value === UNSPECIFIED) {
      log.debug(`missing required keyword '${keywordName(key)}'`);
      throw new MissingKeywordError(key);
    }
    filled++;
  });

  if (mapping) {
    optional.forEach((key, index) => {
      const value = take(key);
      write(required.length + index, value);
      if (value !== UNSPECIFIED) filled++;
    });

    if (!restAllowed) {
      const permitted = consumeKeys ? 0 : filled;
      if (mapping.size > permitted) {
        const declared = new Set<unknown>([...required, ...optional]);
        const unknown = [...mapping.keys()].filter((key) => !declared.has(key));
        log.debug(`${unknown.length} unknown keyword(s) left after extraction`);
        throw new UnknownKeywordError(unknown);
      }
    }
  }

  // Clears from the found count on, including a found optional value that
  // follows an absent one.
  for (let i = filled; i < total; i++) {
    write(i, UNSPECIFIED);
  }

  log.debug(
    `${consumeKeys ? "extracted" : "probed"} ${filled}/${total} keywords` +
      (writeValues ? "" : " without recording values"),
  );

  return filled;
}
