import path from "node:path";
import type { TaskResult, TaskSpecOf } from "../../shared/types.js";
import type { TaskToolkit } from "../toolkit.js";
import { eachUnit, indices, type TaskContext } from "./context.js";
import { stem, writeOutput } from "./output.js";

/** Does `text` satisfy the queries? Queries must already be case-folded when `caseSensitive` is off. */
export function matchesQueries(
  text: string,
  queries: readonly string[],
  options: { caseSensitive: boolean; requireAll: boolean },
): boolean {
  const haystack = options.caseSensitive ? text : text.toLowerCase();
  const found = (query: string) => haystack.includes(query);
  return options.requireAll ? queries.every(found) : queries.some(found);
}

/** Copy every page whose text matches the queries into `<stem>_resultado.pdf`. */
export async function runSearch(
  spec: TaskSpecOf<"search">,
  ctx: TaskContext,
  toolkit: TaskToolkit,
): Promise<TaskResult> {
  const { file, queries, caseSensitive, requireAll } = spec.params;
  ctx.log(`searching in: ${path.basename(file)}`);

  const source = await toolkit.documents.open(file);
  try {
    const result = await toolkit.documents.create();
    try {
      const needles = caseSensitive ? queries : queries.map((query) => query.toLowerCase());
      let matched = 0;

      const finished = await eachUnit(ctx, indices(source.pageCount), async (index) => {
        const page = await source.loadPage(index);
        if (!matchesQueries(await page.textContent(), needles, { caseSensitive, requireAll })) return;
        await result.insertPages(source, index, index);
        matched++;
        ctx.log(`match on page ${index + 1}`);
      });
      if (!finished) return { status: "canceled" };

      if (matched === 0) {
        ctx.log("no matches");
        return { status: "completed" };
      }

      const outputPath = await writeOutput(
        ctx,
        toolkit,
        path.join(spec.outputFolder, `${stem(file)}_resultado.pdf`),
        (target) => result.save(target),
      );
      return { status: "completed", outputPath };
    } finally {
      await result.close();
    }
  } finally {
    await source.close();
  }
}
