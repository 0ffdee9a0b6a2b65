import path from "node:path";
import { uniquePath } from "../output-namer.js";
import type { TaskToolkit } from "../toolkit.js";
import type { TaskContext } from "./context.js";

/** File name of `filePath` without its extension. */
export const stem = (filePath: string): string => path.parse(filePath).name;

/**
 * Pick a free name for `candidate`, write the artifact there and announce it.
 *
 * @returns The path actually written.
 */
export async function writeOutput(
  ctx: TaskContext,
  toolkit: TaskToolkit,
  candidate: string,
  save: (outputPath: string) => Promise<void>,
): Promise<string> {
  const outputPath = uniquePath(candidate, toolkit.pathExists);
  await save(outputPath);
  ctx.log(`generated: ${outputPath}`);
  return outputPath;
}
