export interface RepeatedLines {
  header: string | null;
  footer: string | null;
}

function mostFrequent(lines: string[], minCount: number): string | null {
  const counts = new Map<string, number>();
  for (const line of lines) {
    counts.set(line, (counts.get(line) ?? 0) + 1);
  }

  let best: string | null = null;
  let bestCount = 0;
  // Map order is first appearance, so strictly greater keeps ties with the earlier line
  for (const [line, count] of counts) {
    if (count > bestCount) {
      best = line;
      bestCount = count;
    }
  }
  return bestCount >= minCount ? best : null;
}

function edgeLines(text: string): { first: string; last: string } {
  const lines = text.trim().split("\n");
  return {
    first: (lines[0] ?? "").trim(),
    last: (lines[lines.length - 1] ?? "").trim(),
  };
}

/**
 * The most common non-empty first and last lines over every page of one document. With
 * more than one page a line must recur to count; a lone page's own edges always do.
 */
export function findRepeatedLines(pages: string[]): RepeatedLines {
  const firsts: string[] = [];
  const lasts: string[] = [];
  for (const page of pages) {
    const { first, last } = edgeLines(page);
    if (first) firsts.push(first);
    if (last) lasts.push(last);
  }
  return {
    header: mostFrequent(firsts, firsts.length > 1 ? 2 : 1),
    footer: mostFrequent(lasts, lasts.length > 1 ? 2 : 1),
  };
}

/**
 * Drops at most one leading and one trailing line. A line is only removed while
 * another line remains, so a page is never reduced to nothing.
 */
export function removeRepeatedLines(text: string, repeated: RepeatedLines): string {
  const lines = text.trim().split("\n");

  if (lines.length > 1 && repeated.header !== null && lines[0]?.trim() === repeated.header) {
    lines.shift();
  }
  if (
    lines.length > 1 &&
    repeated.footer !== null &&
    lines[lines.length - 1]?.trim() === repeated.footer
  ) {
    lines.pop();
  }

  return lines.join("\n");
}

export function cleanPage(text: string, allPages: string[]): string {
  return removeRepeatedLines(text, findRepeatedLines(allPages));
}
