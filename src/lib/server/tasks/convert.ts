import path from "node:path";
import { errorMessage } from "../../shared/errors.js";
import type { TaskResult, TaskSpecOf } from "../../shared/types.js";
import type { TaskToolkit } from "../toolkit.js";
import { eachUnit, type TaskContext } from "./context.js";
import { stem, writeOutput } from "./output.js";

/** Progress reserved for the up-front text extraction. */
const EXTRACTED_PERCENT = 10;
/** Progress band the per-line loop maps onto, starting at {@link EXTRACTED_PERCENT}. */
const LINES_BAND = 80;

/** Split on `\r\n`, `\r` or `\n`. A trailing line break does not produce an empty last line. */
export function splitLines(text: string): string[] {
  if (text === "") return [];
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

async function pageCountHint(file: string, ctx: TaskContext, toolkit: TaskToolkit): Promise<number> {
  try {
    const document = await toolkit.documents.open(file);
    try {
      return Math.max(1, document.pageCount);
    } finally {
      await document.close();
    }
  } catch (error) {
    ctx.logger.debug(`No page count for ${file}: ${errorMessage(error)}`);
    return 1;
  }
}

/** Extract the document's text and write it out as a text document, one paragraph per line. */
export async function runConvert(
  spec: TaskSpecOf<"convert">,
  ctx: TaskContext,
  toolkit: TaskToolkit,
): Promise<TaskResult> {
  const { file } = spec.params;
  ctx.log(`converting: ${path.basename(file)}`);

  const pages = await pageCountHint(file, ctx, toolkit);
  const lines = splitLines(await toolkit.text.extractAllText(file));
  ctx.progress(1, pages, EXTRACTED_PERCENT);

  const output = toolkit.writer.create();
  const total = Math.max(1, lines.length);
  const finished = await eachUnit(
    ctx,
    lines,
    async (line) => output.addParagraph(line),
    (done) => ctx.progress(done, total, EXTRACTED_PERCENT + Math.floor((LINES_BAND * done) / total)),
  );
  if (!finished) return { status: "canceled" };

  const outputPath = await writeOutput(
    ctx,
    toolkit,
    path.join(spec.outputFolder, `${stem(file)}${toolkit.writer.extension}`),
    (target) => output.save(target),
  );
  ctx.progress(total, total, 100);
  return { status: "completed", outputPath };
}
