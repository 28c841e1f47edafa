import type { Query, QueryType, ResultKind } from "../data/types";

export const SEARCH_SUBJECT = "_search";

export interface UserQueryOptions {
  username: string;
  /** Inclusive. `YYYY-MM-DD`, or a Date for second precision. */
  startDate?: string | Date;
  /** Exclusive. */
  endDate?: string | Date;
  minFaves?: number;
  includeReplies?: boolean;
  includeNativeRetweets?: boolean;
}

export const normalizeHandle = (raw: string): string => {
  const handle = raw.trim().replace(/^@/, "").trim();
  if (!handle) throw new Error("username is required");
  return handle;
};

/** Advanced-search time format: 2024-01-01_12:30:00_UTC */
export const formatSearchTime = (date: Date): string =>
  `${date.toISOString().slice(0, 19).replace("T", "_")}_UTC`;

const formatBound = (value: string | Date): string =>
  typeof value === "string" ? value : formatSearchTime(value);

// 子句顺序固定：查询字符串同时是缓存键的输入
export function buildUserQuery(options: UserQueryOptions): string {
  const parts = [`from:${normalizeHandle(options.username)}`];
  if (options.startDate) parts.push(`since:${formatBound(options.startDate)}`);
  if (options.endDate) parts.push(`until:${formatBound(options.endDate)}`);
  if (options.minFaves) parts.push(`min_faves:${options.minFaves}`);
  if (options.includeReplies === false) parts.push("-is:reply");
  if (options.includeNativeRetweets) parts.push("include:nativeretweets");
  return parts.join(" ");
}

const subjectOf = (text: string): string => {
  const match = /(?:^|\s)from:@?(\w+)/.exec(text);
  return match ? match[1] : SEARCH_SUBJECT;
};

export function buildSearchQuery(text: string, queryType: QueryType = "Latest"): Query {
  const trimmed = text.trim();
  if (!trimmed) throw new Error("query is required");
  return Object.freeze({ kind: "tweets", text: trimmed, subject: subjectOf(trimmed), queryType });
}

export function buildTweetQuery(options: UserQueryOptions, queryType: QueryType = "Latest"): Query {
  return buildSearchQuery(buildUserQuery(options), queryType);
}

export function buildFollowQuery(kind: Exclude<ResultKind, "tweets">, username: string): Query {
  const handle = normalizeHandle(username);
  return Object.freeze({ kind, text: handle, subject: handle, queryType: "Latest" });
}
