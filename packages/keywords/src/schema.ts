import type { Keyword, KeywordSchema } from "./types.js";
import { KeywordSchemaError, isKeyword, keywordName } from "./errors.js";

export interface KeywordSchemaInit {
  readonly required?: ReadonlyArray<Keyword>;
  readonly optional?: ReadonlyArray<Keyword>;
  readonly restAllowed?: boolean;
}

/** Required keywords followed by optional ones, in declaration order. */
export function schemaKeywords(schema: KeywordSchema): Keyword[] {
  return [...schema.required, ...schema.optional];
}

/**
 * Throw {@link KeywordSchemaError} unless every declared name is a keyword
 * and no name is declared twice.
 */
export function assertValidSchema(schema: KeywordSchema): void {
  const seen = new Set<Keyword>();
  for (const key of schemaKeywords(schema)) {
    if (!isKeyword(key)) {
      throw new KeywordSchemaError(
        "invalid_keyword",
        `Schema keywords must be strings or symbols, got ${typeof key}`,
      );
    }
    if (seen.has(key)) {
      throw new KeywordSchemaError(
        "duplicate_keyword",
        `Keyword '${keywordName(key)}' is declared more than once`,
        key,
      );
    }
    seen.add(key);
  }
}

/**
 * Validate and freeze a keyword schema.
 *
 * @example
 * ```ts
 * const schema = defineKeywordSchema({
 *   required: ["name"],
 *   optional: ["age", "email"],
 * });
 * ```
 */
export function defineKeywordSchema(init: KeywordSchemaInit): KeywordSchema {
  const schema: KeywordSchema = Object.freeze({
    required: Object.freeze([...(init.required ?? [])]),
    optional: Object.freeze([...(init.optional ?? [])]),
    restAllowed: init.restAllowed ?? false,
  });
  assertValidSchema(schema);
  return schema;
}

/**
 * Decode a schema from a keyword table and counts.
 *
 * The first `required` entries are required and the next ones optional. A
 * negative `optional` count `n` allows extra keys and declares `-1 - n`
 * optional entries, so `-1` means "no optional keywords, rest allowed".
 */
export function schemaFromTable(
  table: ReadonlyArray<Keyword>,
  required: number,
  optional: number,
): KeywordSchema {
  const restAllowed = optional < 0;
  const optionalCount = restAllowed ? -1 - optional : optional;

  if (required < 0 || required + optionalCount > table.length) {
    throw new KeywordSchemaError(
      "table_length",
      `Keyword table has ${table.length} entries but ${required} required and ` +
        `${optionalCount} optional were declared`,
    );
  }

  return defineKeywordSchema({
    required: table.slice(0, required),
    optional: table.slice(required, required + optionalCount),
    restAllowed,
  });
}
