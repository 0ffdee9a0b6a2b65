import path from "node:path";
import type { NumberParams } from "../../shared/params.js";
import type { TaskResult, TaskSpecOf } from "../../shared/types.js";
import type { TextStyle } from "../documents/types.js";
import type { TaskToolkit } from "../toolkit.js";
import { eachUnit, indices, type TaskContext } from "./context.js";
import { stem, writeOutput } from "./output.js";

const LABEL_STYLE: TextStyle = { font: "helvetica", size: 12, color: [0, 0, 0] };

/**
 * Label for the page at 0-based `index`, or `undefined` before the 1-based `startPage`.
 * With `useInitial` the first numbered page gets `startNumber`; otherwise pages keep
 * their own 1-based position.
 */
export function pageLabel(
  index: number,
  params: Pick<NumberParams, "startNumber" | "startPage" | "useInitial">,
): number | undefined {
  const position = index + 1;
  if (position < params.startPage) return undefined;
  return params.useInitial ? params.startNumber + (position - params.startPage) : position;
}

/** Stamp `prefix + label` on every page from `startPage` on and save as `<stem>_numerado.pdf`. */
export async function runNumber(
  spec: TaskSpecOf<"number">,
  ctx: TaskContext,
  toolkit: TaskToolkit,
): Promise<TaskResult> {
  const { file, x, y, prefix } = spec.params;
  ctx.log(`numbering: ${path.basename(file)}`);

  const document = await toolkit.documents.open(file);
  try {
    const finished = await eachUnit(ctx, indices(document.pageCount), async (index) => {
      const page = await document.loadPage(index);
      const label = pageLabel(index, spec.params);
      if (label === undefined) return;
      await page.insertText({ x, y }, `${prefix}${label}`, LABEL_STYLE);
    });
    if (!finished) return { status: "canceled" };

    const outputPath = await writeOutput(
      ctx,
      toolkit,
      path.join(spec.outputFolder, `${stem(file)}_numerado.pdf`),
      (target) => document.save(target),
    );
    return { status: "completed", outputPath };
  } finally {
    await document.close();
  }
}
