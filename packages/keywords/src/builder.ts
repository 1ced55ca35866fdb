import type { Keyword, KeywordSchema } from "./types.js";
import { KeywordSchemaError, keywordName } from "./errors.js";
import { defineKeywordSchema } from "./schema.js";

/**
 * An immutable builder for keyword schemas.
 *
 * Each call returns a new builder, so a partial schema can be shared and
 * extended in several directions.
 */
export interface SchemaBuilder {
  /** Append required keywords. */
  required(...keys: Keyword[]): SchemaBuilder;

  /** Append optional keywords. */
  optional(...keys: Keyword[]): SchemaBuilder;

  /** Allow or forbid keys outside the schema (allowed by default when called). */
  allowRest(allowed?: boolean): SchemaBuilder;

  /** Validate and freeze the accumulated schema. */
  build(): KeywordSchema;
}

interface BuilderState {
  readonly required: ReadonlyArray<Keyword>;
  readonly optional: ReadonlyArray<Keyword>;
  readonly restAllowed: boolean;
}

/**
 * Create an empty schema builder.
 *
 * @example
 * ```ts
 * const schema = createSchemaBuilder()
 *   .required("path")
 *   .optional("mode", "encoding")
 *   .build();
 * ```
 */
export function createSchemaBuilder(): SchemaBuilder {
  return makeBuilder({ required: [], optional: [], restAllowed: false });
}

function makeBuilder(state: BuilderState): SchemaBuilder {
  const declared = new Set<Keyword>([...state.required, ...state.optional]);

  const checkNew = (keys: ReadonlyArray<Keyword>): void => {
    const added = new Set<Keyword>();
    for (const key of keys) {
      if (declared.has(key) || added.has(key)) {
        throw new KeywordSchemaError(
          "duplicate_keyword",
          `Keyword '${keywordName(key)}' is already declared`,
          key,
        );
      }
      added.add(key);
    }
  };

  return {
    required(...keys: Keyword[]): SchemaBuilder {
      checkNew(keys);
      return makeBuilder({ ...state, required: [...state.required, ...keys] });
    },

    optional(...keys: Keyword[]): SchemaBuilder {
      checkNew(keys);
      return makeBuilder({ ...state, optional: [...state.optional, ...keys] });
    },

    allowRest(allowed = true): SchemaBuilder {
      return makeBuilder({ ...state, restAllowed: allowed });
    },

    build(): KeywordSchema {
      return defineKeywordSchema(state);
    },
  };
}
