import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

/** Write `bytes` to `filePath`, creating the parent folder first. */
export async function writeBytes(filePath: string, bytes: Uint8Array): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, bytes);
}
