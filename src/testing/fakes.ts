import type { FetchPageOptions, PageSource } from "../clients/pageFetcher";
import type { Item, Page, Query } from "../data/types";

export const makeItems = (prefix: string, count: number, start = 1): Item[] =>
  Array.from({ length: count }, (_, i) => ({ id: `${prefix}${start + i}`, text: `${prefix} tweet ${start + i}` }));

export interface ScriptedCall {
  query: Query;
  options: FetchPageOptions;
}

/** Replays pages in order and records what the collector asked for. */
export function scriptedSource(pages: Page[]) {
  const calls: ScriptedCall[] = [];
  const source: PageSource = async (query, options) => {
    calls.push({ query, options: { ...options } });
    const page = pages[calls.length - 1];
    if (!page) throw new Error(`unexpected fetch #${calls.length}`);
    return page;
  };
  return { source, calls };
}
