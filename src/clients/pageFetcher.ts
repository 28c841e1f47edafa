import { z } from "zod";
import { ItemSchema, type Item, type Page, type Query, type ResultKind } from "../data/types";
import { logger } from "../utils/logger";
import { ProviderError, type QueryParams, type Transport } from "./transport";

interface EndpointDef {
  path: string;
  buildParams: (query: Query, pageSize: number) => QueryParams;
}

export const ENDPOINTS: Record<ResultKind, EndpointDef> = {
  tweets: {
    path: "/twitter/tweet/advanced_search",
    buildParams: (query) => ({ query: query.text, queryType: query.queryType }),
  },
  followings: {
    path: "/twitter/user/followings",
    buildParams: (query, pageSize) => ({ userName: query.text, pageSize }),
  },
  followers: {
    path: "/twitter/user/followers",
    buildParams: (query, pageSize) => ({ userName: query.text, pageSize }),
  },
};

const PageBodySchema = z
  .object({
    has_next_page: z.boolean().nullish(),
    next_cursor: z.string().nullish(),
    status: z.string().nullish(),
    msg: z.string().nullish(),
    message: z.string().nullish(),
  })
  .passthrough();

export interface FetchPageOptions {
  cursor?: string | null;
  pageSize: number;
}

const parseItems = (raw: unknown, kind: ResultKind): Item[] => {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new Error(`响应中的 ${kind} 字段不是数组`);
  }
  const items: Item[] = [];
  let dropped = 0;
  for (const entry of raw) {
    const parsed = ItemSchema.safeParse(entry);
    if (parsed.success) items.push(parsed.data);
    else dropped++;
  }
  if (dropped > 0) logger.warn({ kind, dropped }, "忽略缺少 id 的条目");
  return items;
};

/**
 * One provider call for one page. Empty-string and absent cursors are the same
 * "first page" sentinel: no `cursor` parameter is sent for either.
 */
export async function fetchPage(transport: Transport, query: Query, options: FetchPageOptions): Promise<Page> {
  const endpoint = ENDPOINTS[query.kind];
  const params = endpoint.buildParams(query, options.pageSize);
  if (options.cursor) params.cursor = options.cursor;

  const { data } = await transport.get(endpoint.path, params);
  const body = PageBodySchema.safeParse(data);
  if (!body.success) {
    throw new Error(`无法解析 ${endpoint.path} 的响应`);
  }
  if (body.data.status === "error") {
    throw new ProviderError(body.data.msg ?? body.data.message ?? "provider error", endpoint.path);
  }

  const items = parseItems(body.data[query.kind], query.kind);
  const hasNextPage = body.data.has_next_page === true;
  return {
    items,
    hasNextPage,
    nextCursor: body.data.next_cursor ? body.data.next_cursor : null,
  };
}

export type PageSource = (query: Query, options: FetchPageOptions) => Promise<Page>;

export const createPageSource =
  (transport: Transport): PageSource =>
  (query, options) =>
    fetchPage(transport, query, options);
