import { z } from "zod";

export type ResultKind = "tweets" | "followings" | "followers";
export const RESULT_KINDS: readonly ResultKind[] = ["tweets", "followings", "followers"];

export type QueryType = "Latest" | "Top";

export interface RetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  rateLimitDelayMs: number;
}

export interface MonitorConfig {
  target?: string;
  schedule: string; // cron expression
  lookbackMinutes: number;
  maxPerCheck: number;
}

export interface AppConfig {
  baseUrl: string;
  proxy?: string; // http://127.0.0.1:7890
  cacheDir: string;
  dbPath: string;
  requestTimeoutMs: number;
  defaults: {
    limit: number;
    pageSize: number; // follow endpoints only, clamped to 20..200
    queryType: QueryType;
  };
  retry: RetryConfig;
  monitor: MonitorConfig;
}

export interface EnvSecrets {
  TWITTERAPI_IO_KEY?: string;
  TWITTER_USERNAME?: string;
  TWITTER_EMAIL?: string;
  TWITTER_PASSWORD?: string;
  TOTP_SECRET?: string;
}

/** Provider records are opaque apart from a stable string `id`. */
export const ItemSchema = z.object({ id: z.string().min(1) }).passthrough();
export type Item = z.infer<typeof ItemSchema>;

export interface Query {
  readonly kind: ResultKind;
  /** Advanced-search string for tweets, normalized handle for follow kinds. */
  readonly text: string;
  /** Normalized handle, or `_search` for free-text searches. */
  readonly subject: string;
  readonly queryType: QueryType;
}

export interface Page {
  items: Item[];
  nextCursor: string | null;
  hasNextPage: boolean;
}

export interface CollectionResult {
  kind: ResultKind;
  items: Item[];
  has_next_page: boolean;
  next_cursor: string | null;
  status: "success";
  message: string;
}

/** Wire form: items live under the kind name, as in provider responses. */
export type ResultPayload = Partial<Record<ResultKind, Item[]>> & {
  has_next_page: boolean;
  next_cursor: string | null;
  status: "success";
  message: string;
};

export interface CollectOptions {
  limit: number;
  pageSize?: number;
  startCursor?: string | null;
  /** Tweets only: continue with `max_id:` when cursors run out but new items keep arriving. */
  maxIdFallback?: boolean;
}

export interface TweetEntity {
  id: string;
  target: string;
  author?: string;
  text: string;
  created_at?: string;
  raw_json?: string;
}

export const toResultPayload = (result: CollectionResult): ResultPayload => {
  const payload: ResultPayload = {
    has_next_page: result.has_next_page,
    next_cursor: result.next_cursor,
    status: result.status,
    message: result.message,
  };
  payload[result.kind] = result.items;
  return payload;
};
