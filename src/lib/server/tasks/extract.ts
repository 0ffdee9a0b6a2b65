import path from "node:path";
import type { TaskResult, TaskSpecOf } from "../../shared/types.js";
import { parsePageRanges } from "../range-parser.js";
import type { TaskToolkit } from "../toolkit.js";
import { eachUnit, type TaskContext } from "./context.js";
import { stem, writeOutput } from "./output.js";

/** Copy the pages named by a range expression into `<stem>_extraido.pdf`. */
export async function runExtract(
  spec: TaskSpecOf<"extract">,
  ctx: TaskContext,
  toolkit: TaskToolkit,
): Promise<TaskResult> {
  const { file, ranges } = spec.params;
  ctx.log(`extracting pages from: ${path.basename(file)}`);

  const source = await toolkit.documents.open(file);
  try {
    const selected = parsePageRanges(ranges, source.pageCount);
    if (selected.length === 0) {
      ctx.log("no valid pages");
      return { status: "completed" };
    }

    const extracted = await toolkit.documents.create();
    try {
      const finished = await eachUnit(ctx, selected, async (index) => {
        await extracted.insertPages(source, index, index);
        ctx.log(`page ${index + 1} added`);
      });
      if (!finished) return { status: "canceled" };

      const outputPath = await writeOutput(
        ctx,
        toolkit,
        path.join(spec.outputFolder, `${stem(file)}_extraido.pdf`),
        (target) => extracted.save(target),
      );
      return { status: "completed", outputPath };
    } finally {
      await extracted.close();
    }
  } finally {
    await source.close();
  }
}
