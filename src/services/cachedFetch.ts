import type { PageSource } from "../clients/pageFetcher";
import { CacheStore, deriveCacheKey, type CacheRef } from "../data/cacheStore";
import type { CollectOptions, CollectionResult, Query } from "../data/types";
import { logger } from "../utils/logger";
import { clampPageSize, collect } from "./collector";

export interface CachedFetchDeps {
  source: PageSource;
  cache: CacheStore;
}

export interface CachedFetchOptions extends CollectOptions {
  /** Skip the lookup and overwrite the entry with a fresh collection. */
  refresh?: boolean;
}

/** Tweet searches also key on the sort order, which changes what the provider returns. */
export const cacheRefFor = (query: Query, limit: number): CacheRef => ({
  kind: query.kind,
  subject: query.subject,
  key: deriveCacheKey(query.kind === "tweets" ? `${query.text}|${query.queryType}` : query.text, limit),
});

/**
 * The single place that decides whether a request repeats an earlier one.
 * A hit returns the stored result untouched; a miss collects and saves.
 */
export async function fetchCached(
  deps: CachedFetchDeps,
  query: Query,
  options: CachedFetchOptions
): Promise<CollectionResult> {
  const ref = cacheRefFor(query, options.limit);

  // 从中途游标续取的结果不代表该查询的完整结果，不读也不写缓存
  if (options.startCursor) {
    logger.info({ kind: query.kind, subject: query.subject }, "指定了起始游标，跳过缓存");
    return collect(deps.source, query, options);
  }
  if (!(options.limit > 0)) {
    return collect(deps.source, query, options);
  }

  if (!options.refresh) {
    const cached = deps.cache.load(ref);
    if (cached) {
      logger.info({ kind: ref.kind, subject: ref.subject, key: ref.key, count: cached.items.length }, "命中缓存");
      return cached;
    }
    logger.info({ kind: ref.kind, subject: ref.subject, key: ref.key }, "缓存未命中，开始拉取");
  }

  const result = await collect(deps.source, query, options);
  try {
    deps.cache.save(ref, result, {
      query: query.text,
      queryType: query.kind === "tweets" ? query.queryType : undefined,
      limit: options.limit,
      pageSize: clampPageSize(options.pageSize),
      startCursor: null,
    });
  } catch (err) {
    // 已拉取的数据照常返回，缓存写失败只记录
    logger.error({ file: deps.cache.entryPath(ref), error: err instanceof Error ? err.message : String(err) }, "写入缓存失败");
  }
  return result;
}
