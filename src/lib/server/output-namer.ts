import { existsSync } from "node:fs";
import path from "node:path";

/**
 * Return `candidate` when nothing exists there, otherwise the first free
 * `<base>_<n><ext>` with `n` counting up from 1.
 *
 * Only computes a name. The caller creates the file; the gap between the check and
 * the write is acceptable because a single task writes at a time.
 */
export function uniquePath(
  candidate: string,
  exists: (filePath: string) => boolean = existsSync,
): string {
  if (!exists(candidate)) return candidate;

  const ext = path.extname(candidate);
  const base = ext ? candidate.slice(0, -ext.length) : candidate;

  for (let counter = 1; ; counter++) {
    const next = `${base}_${counter}${ext}`;
    if (!exists(next)) return next;
  }
}
