import { statSync } from "node:fs";
import * as v from "valibot";
import { ValidationError } from "../shared/errors.js";
import {
  ConvertParamsSchema,
  ExtractParamsSchema,
  MergeParamsSchema,
  NumberParamsSchema,
  SearchParamsSchema,
} from "../shared/params.js";
import type { EventSink, TaskKind, TaskSpec } from "../shared/types.js";
import type { ToolkitConfig } from "./config.js";

export type TaskSpecOptions = {
  config: ToolkitConfig;
  channel: EventSink;
  /** Defaults to a `statSync` check for a regular file. */
  isFile?: (filePath: string) => boolean;
};

function isRegularFile(filePath: string): boolean {
  return statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
}

function parseParams<TSchema extends v.GenericSchema>(
  schema: TSchema,
  input: unknown,
): v.InferOutput<TSchema> {
  const result = v.safeParse(schema, input);
  if (!result.success) {
    throw new ValidationError(
      result.issues.map((issue) => {
        const key = v.getDotPath(issue);
        return key ? `${key}: ${issue.message}` : issue.message;
      }),
    );
  }
  return result.output;
}

function requireFiles(files: readonly string[], isFile: (filePath: string) => boolean): void {
  const missing = files.filter((file) => !isFile(file));
  if (missing.length > 0) {
    throw new ValidationError(missing.map((file) => `"${file}" is not an existing file`));
  }
}

/**
 * Validate raw parameters for `kind` and bind them, with the result folder from `config`,
 * into an immutable spec ready for `TaskRunner.start`.
 *
 * @throws {ValidationError} When parameters are malformed or an input file does not exist.
 */
export function createTaskSpec(kind: TaskKind, input: unknown, options: TaskSpecOptions): TaskSpec {
  const { config, channel, isFile = isRegularFile } = options;
  const base = { outputFolder: config.resultFolder, channel };

  switch (kind) {
    case "search": {
      const params = parseParams(SearchParamsSchema, input);
      requireFiles([params.file], isFile);
      return Object.freeze({ kind, params, ...base });
    }
    case "number": {
      const params = parseParams(NumberParamsSchema, input);
      requireFiles([params.file], isFile);
      return Object.freeze({ kind, params, ...base });
    }
    case "merge": {
      const params = parseParams(MergeParamsSchema, input);
      requireFiles(params.files, isFile);
      return Object.freeze({ kind, params, ...base });
    }
    case "extract": {
      const params = parseParams(ExtractParamsSchema, input);
      requireFiles([params.file], isFile);
      return Object.freeze({ kind, params, ...base });
    }
    case "convert": {
      const params = parseParams(ConvertParamsSchema, input);
      requireFiles([params.file], isFile);
      return Object.freeze({ kind, params, ...base });
    }
  }
}
