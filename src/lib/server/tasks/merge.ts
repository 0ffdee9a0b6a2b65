import path from "node:path";
import { errorMessage } from "../../shared/errors.js";
import type { TaskResult, TaskSpecOf } from "../../shared/types.js";
import type { DocumentHandle } from "../documents/types.js";
import type { TaskToolkit } from "../toolkit.js";
import { eachUnit, type TaskContext } from "./context.js";
import { writeOutput } from "./output.js";

/**
 * Where a merge writes, before collision handling. Relative names land in the result
 * folder; whatever extension was typed is replaced by `_unido.pdf`.
 */
export function mergeTarget(outputName: string, outputFolder: string): string {
  const resolved = path.isAbsolute(outputName) ? outputName : path.join(outputFolder, outputName);
  const ext = path.extname(resolved);
  return `${ext ? resolved.slice(0, -ext.length) : resolved}_unido.pdf`;
}

async function appendAll(target: DocumentHandle, source: DocumentHandle): Promise<void> {
  if (source.pageCount > 0) await target.insertPages(source, 0, source.pageCount - 1);
}

/** Append every input's pages, in order, to one document. Inputs that fail are logged and skipped. */
export async function runMerge(
  spec: TaskSpecOf<"merge">,
  ctx: TaskContext,
  toolkit: TaskToolkit,
): Promise<TaskResult> {
  const { files, outputName } = spec.params;
  const target = mergeTarget(outputName, spec.outputFolder);
  ctx.log(`merging ${files.length} files into: ${target}`);

  const merged = await toolkit.documents.create();
  try {
    const finished = await eachUnit(ctx, files, async (file) => {
      const name = path.basename(file);
      try {
        const source = await toolkit.documents.open(file);
        try {
          await appendAll(merged, source);
        } finally {
          await source.close();
        }
        ctx.log(`added: ${name}`);
      } catch (error) {
        ctx.logger.warn(`Skipping ${file} in merge:`, error);
        ctx.log(`failed to add ${name}: ${errorMessage(error)}`);
      }
    });
    if (!finished) return { status: "canceled" };

    const outputPath = await writeOutput(ctx, toolkit, target, (filePath) => merged.save(filePath));
    return { status: "completed", outputPath };
  } finally {
    await merged.close();
  }
}
