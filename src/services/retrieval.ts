import type { CollectionResult, QueryType } from "../data/types";
import { fetchCached, type CachedFetchDeps } from "./cachedFetch";
import { buildFollowQuery, buildSearchQuery, buildTweetQuery, type UserQueryOptions } from "./queryBuilder";

export interface RetrievalDefaults {
  limit: number;
  pageSize: number;
  queryType: QueryType;
}

export interface PagingOptions {
  limit?: number;
  pageSize?: number;
  startCursor?: string | null;
  refresh?: boolean;
}

export interface SearchOptions extends PagingOptions {
  queryType?: QueryType;
  maxIdFallback?: boolean;
}

export function createRetrievalService(deps: CachedFetchDeps, defaults: RetrievalDefaults) {
  const paging = (options: PagingOptions) => ({
    limit: options.limit ?? defaults.limit,
    pageSize: options.pageSize ?? defaults.pageSize,
    startCursor: options.startCursor,
    refresh: options.refresh,
  });

  return {
    searchTweets(text: string, options: SearchOptions = {}): Promise<CollectionResult> {
      const query = buildSearchQuery(text, options.queryType ?? defaults.queryType);
      return fetchCached(deps, query, { ...paging(options), maxIdFallback: options.maxIdFallback });
    },

    getUserTweets(filters: UserQueryOptions, options: SearchOptions = {}): Promise<CollectionResult> {
      const query = buildTweetQuery(filters, options.queryType ?? defaults.queryType);
      return fetchCached(deps, query, { ...paging(options), maxIdFallback: options.maxIdFallback });
    },

    getFollowings(username: string, options: PagingOptions = {}): Promise<CollectionResult> {
      return fetchCached(deps, buildFollowQuery("followings", username), paging(options));
    },

    getFollowers(username: string, options: PagingOptions = {}): Promise<CollectionResult> {
      return fetchCached(deps, buildFollowQuery("followers", username), paging(options));
    },
  };
}

export type RetrievalService = ReturnType<typeof createRetrievalService>;
