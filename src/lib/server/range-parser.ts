const INTEGER = /^[+-]?\d+$/;

function parseInteger(raw: string): number | undefined {
  const trimmed = raw.trim();
  return INTEGER.test(trimmed) ? Number.parseInt(trimmed, 10) : undefined;
}

/**
 * Parse a 1-based page selection such as `"1-3, 6, 9-10"` into sorted, unique 0-based
 * indices within `[0, totalPages)`.
 *
 * Malformed tokens (`"abc"`, `"5-2"`, `"3-x"`) are skipped rather than rejected, so a bad
 * expression yields fewer pages or none at all.
 */
export function parsePageRanges(expr: string, totalPages: number): number[] {
  const pages = new Set<number>();
  const last = totalPages - 1;

  for (const part of expr.split(",")) {
    const token = part.trim();
    if (!token) continue;

    const dash = token.indexOf("-");
    if (dash === -1) {
      const value = parseInteger(token);
      if (value !== undefined) pages.add(value - 1);
      continue;
    }

    const start = parseInteger(token.slice(0, dash));
    const end = parseInteger(token.slice(dash + 1));
    if (start === undefined || end === undefined || start > end) continue;

    // Clamp before expanding so "1-999999999" costs no more than the document itself
    for (let index = Math.max(start - 1, 0); index <= Math.min(end - 1, last); index++) {
      pages.add(index);
    }
  }

  return [...pages].filter((index) => index >= 0 && index <= last).sort((a, b) => a - b);
}
