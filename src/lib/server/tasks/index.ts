import type { TaskResult, TaskSpec } from "../../shared/types.js";
import type { TaskToolkit } from "../toolkit.js";
import type { TaskContext } from "./context.js";
import { runConvert } from "./convert.js";
import { runExtract } from "./extract.js";
import { runMerge } from "./merge.js";
import { runNumber } from "./number.js";
import { runSearch } from "./search.js";

/** Dispatch a spec to the algorithm for its kind. */
export function runAlgorithm(spec: TaskSpec, ctx: TaskContext, toolkit: TaskToolkit): Promise<TaskResult> {
  switch (spec.kind) {
    case "search":
      return runSearch(spec, ctx, toolkit);
    case "number":
      return runNumber(spec, ctx, toolkit);
    case "merge":
      return runMerge(spec, ctx, toolkit);
    case "extract":
      return runExtract(spec, ctx, toolkit);
    case "convert":
      return runConvert(spec, ctx, toolkit);
  }
}

export { CANCELED_MESSAGE, createTaskContext, eachUnit, type TaskContext } from "./context.js";
