/**
 * @kwargs-kit/keywords — keyword-argument extraction at a native call boundary.
 *
 * Declare the keywords a function expects with a schema, then pull them out
 * of the caller's keyword hash with `extractKeywords()`. Missing required
 * keywords and unexpected extras raise descriptive errors.
 *
 * @packageDocumentation
 */

export { UNSPECIFIED, isUnspecified } from "./types.js";
export type {
  Keyword,
  Unspecified,
  KeywordSlot,
  KeywordMapping,
  KeywordSchema,
  ExtractOptions,
} from "./types.js";

export {
  KeywordArgumentError,
  MissingKeywordError,
  UnknownKeywordError,
  KeywordTypeError,
  KeywordSchemaError,
  formatKeywordMessage,
  keywordName,
  isKeyword,
} from "./errors.js";
export type { KeywordErrorReason, KeywordSchemaErrorReason } from "./errors.js";

export { defineKeywordSchema, schemaFromTable, schemaKeywords, assertValidSchema } from "./schema.js";
export type { KeywordSchemaInit } from "./schema.js";

export { createSchemaBuilder } from "./builder.js";
export type { SchemaBuilder } from "./builder.js";

export { KeywordHash } from "./hash.js";

export { extractKeywords } from "./extract.js";

export {
  keywordArgs,
  registerKeywordSchema,
  getKeywordSchema,
} from "./keyword-args.js";
export type { KeywordFunction, KeywordImpl } from "./keyword-args.js";
