import type { PageSource } from "../clients/pageFetcher";
import type { CollectOptions, CollectionResult, Item, Query } from "../data/types";
import { logger } from "../utils/logger";

export const MIN_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 200;

export const clampPageSize = (pageSize = MIN_PAGE_SIZE): number =>
  Math.min(MAX_PAGE_SIZE, Math.max(MIN_PAGE_SIZE, Math.floor(pageSize)));

export const describeResult = (query: Query, count: number): string =>
  query.kind === "tweets"
    ? `Fetched ${count} tweets for query: \`${query.text}\``
    : `Fetched ${count} ${query.kind} for ${query.text}`;

/**
 * Drives the page source until `limit` items are collected or the stream ends.
 * Items are deduplicated by id across pages (first seen wins) and the last
 * batch is truncated so the result never exceeds `limit`.
 */
export async function collect(source: PageSource, query: Query, options: CollectOptions): Promise<CollectionResult> {
  const limit = Math.floor(options.limit);
  const pageSize = clampPageSize(options.pageSize);
  let cursor: string | null = options.startCursor || null;
  let more = true;

  if (!(limit > 0)) {
    return {
      kind: query.kind,
      items: [],
      has_next_page: more,
      next_cursor: cursor,
      status: "success",
      message: describeResult(query, 0),
    };
  }

  const collected: Item[] = [];
  const seenIds = new Set<string>();
  let pageQuery = query;
  let fallbackUsed = false;
  let pages = 0;

  while (more && collected.length < limit) {
    const page = await source(pageQuery, { cursor, pageSize });
    pages++;

    // 同一页内重复的 id 也只保留第一次出现
    const fresh: Item[] = [];
    for (const item of page.items) {
      if (seenIds.has(item.id)) continue;
      seenIds.add(item.id);
      fresh.push(item);
    }
    collected.push(...fresh.slice(0, limit - collected.length));

    more = page.hasNextPage;
    cursor = more ? page.nextCursor : null;

    if (fresh.length === 0) {
      logger.info({ kind: query.kind, subject: query.subject, pages }, "本页没有新条目，停止翻页");
      break;
    }

    // 游标耗尽但仍有新推文：切换为 max_id 翻页，重叠部分由去重吸收
    if (!more && options.maxIdFallback && query.kind === "tweets" && collected.length < limit) {
      const boundary = fresh[fresh.length - 1].id;
      pageQuery = Object.freeze({ ...query, text: `${query.text} max_id:${boundary}` });
      fallbackUsed = true;
      more = true;
      cursor = null;
      logger.info({ subject: query.subject, maxId: boundary }, "游标已耗尽，切换为 max_id 翻页");
      continue;
    }

    if (more && !cursor) {
      logger.warn({ kind: query.kind, subject: query.subject }, "提供方声明还有下一页但未返回游标");
      break;
    }
  }

  // max_id 翻页后的游标属于改写后的查询，不能用原查询续取
  const resumable = more && !fallbackUsed;
  if (more && fallbackUsed) {
    logger.info({ subject: query.subject, query: pageQuery.text }, "max_id 翻页的游标不随结果返回");
  }
  logger.info({ kind: query.kind, subject: query.subject, pages, count: collected.length }, "翻页完成");
  return {
    kind: query.kind,
    items: collected,
    has_next_page: more,
    next_cursor: resumable ? cursor : null,
    status: "success",
    message: describeResult(query, collected.length),
  };
}
