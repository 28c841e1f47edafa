import { logger } from "./logger";

/**
 * First @mention in a tweet's text, without the @. Replies to one's own thread
 * carry no mention; those get `fallback`.
 */
export function extractFirstUsername(text: unknown, fallback?: string): string | undefined {
  if (typeof text !== "string") return undefined;
  const match = /@(\w+)/.exec(text);
  if (match) return match[1];
  logger.debug({ text }, "文本中没有 @用户名");
  return fallback;
}

export interface ClassifiedRow<T> {
  row: T;
  value: number;
  cumulativeShare: number;
  category: string;
}

const PRESET_BREAKPOINTS: Record<number, number[]> = {
  3: [0.5, 0.8, 1.0],
  4: [0.2, 0.5, 0.8, 1.0],
  5: [0.1, 0.3, 0.6, 0.85, 1.0],
};

const pct = (share: number) => Math.round(share * 100);

/**
 * Labels rows by their position in the cumulative sum of `key`, largest first.
 * Suits power-law metrics better than quantiles: with 4 categories the rows
 * that make up the first 20% of the total are `Top-20%`, the next 30% `20%-50%`.
 */
export function classifyByCumulativeShare<T>(
  rows: T[],
  valueOf: (row: T) => number,
  categories = 4
): ClassifiedRow<T>[] {
  const breakpoints =
    PRESET_BREAKPOINTS[categories] ?? Array.from({ length: categories }, (_, i) => (i + 1) / categories);
  const sorted = rows.map((row) => ({ row, value: valueOf(row) })).sort((a, b) => b.value - a.value);
  const total = sorted.reduce((sum, r) => sum + r.value, 0);

  let running = 0;
  return sorted.map(({ row, value }) => {
    running += value;
    const cumulativeShare = total > 0 ? running / total : Number.NaN;
    const index = breakpoints.findIndex((bp) => cumulativeShare <= bp + 1e-9);
    let category = "Bottom";
    if (index === 0) category = `Top-${pct(breakpoints[0])}%`;
    else if (index > 0) category = `${pct(breakpoints[index - 1])}%-${pct(breakpoints[index])}%`;
    return { row, value, cumulativeShare, category };
  });
}
