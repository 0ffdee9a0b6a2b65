import * as v from "valibot";

const filePath = (label: string) =>
  v.pipe(v.string(`${label} must be a string`), v.trim(), v.nonEmpty(`${label} is required`));

const integer = (label: string, fallback: number) =>
  v.optional(v.pipe(v.number(`${label} must be a number`), v.integer(`${label} must be an integer`)), fallback);

const flag = v.optional(v.boolean(), false);

/** Characters the standard Helvetica font can draw: WinAnsi (Windows-1252) printables. */
const LABEL_TEXT = /^[\x20-\x7E\xA0-\xFF€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ]*$/u;

/** Search-and-filter parameters. Blank queries are dropped before the 1..3 count is checked. */
export const SearchParamsSchema = v.object({
  file: filePath("file"),
  queries: v.pipe(
    v.array(v.string("queries must be strings")),
    v.transform((queries) => queries.map((query) => query.trim()).filter((query) => query !== "")),
    v.minLength(1, "at least one search text is required"),
    v.maxLength(3, "at most three search texts are allowed"),
  ),
  caseSensitive: flag,
  requireAll: flag,
  preview: flag,
});

/**
 * Page numbering parameters. Numbers carry no range checks: a start page past the end of
 * the document is valid and numbers nothing. Labels are drawn in Helvetica, so the prefix
 * is limited to what that font encodes.
 */
export const NumberParamsSchema = v.object({
  file: filePath("file"),
  startNumber: integer("startNumber", 1),
  startPage: integer("startPage", 1),
  useInitial: v.optional(v.boolean(), true),
  x: integer("x", 50),
  y: integer("y", 50),
  prefix: v.optional(
    v.pipe(
      v.string("prefix must be a string"),
      v.regex(LABEL_TEXT, "prefix can only use characters of the Windows-1252 (Latin) set"),
    ),
    "Page ",
  ),
  preview: flag,
});

export const MergeParamsSchema = v.object({
  files: v.pipe(
    v.array(filePath("files entry")),
    v.minLength(1, "add at least one file to merge"),
  ),
  outputName: v.optional(
    v.pipe(v.string("outputName must be a string"), v.trim(), v.nonEmpty("outputName is required")),
    "merged",
  ),
  preview: flag,
});

export const ExtractParamsSchema = v.object({
  file: filePath("file"),
  ranges: v.pipe(v.string("ranges must be a string"), v.trim(), v.nonEmpty("page ranges are required")),
  preview: flag,
});

export const ConvertParamsSchema = v.object({
  file: filePath("file"),
  preview: flag,
});

export type SearchParams = v.InferOutput<typeof SearchParamsSchema>;
export type NumberParams = v.InferOutput<typeof NumberParamsSchema>;
export type MergeParams = v.InferOutput<typeof MergeParamsSchema>;
export type ExtractParams = v.InferOutput<typeof ExtractParamsSchema>;
export type ConvertParams = v.InferOutput<typeof ConvertParamsSchema>;

/** Validated parameters for each task kind, keyed by kind. */
export type TaskParamsMap = {
  search: SearchParams;
  number: NumberParams;
  merge: MergeParams;
  extract: ExtractParams;
  convert: ConvertParams;
};
