import type { ScheduledTask } from "node-cron";
import type { PageSource } from "../clients/pageFetcher";
import type { Store } from "../data/store";
import type { Item, TweetEntity } from "../data/types";
import { logger } from "../utils/logger";
import { truncate } from "../utils/text";
import { collect } from "./collector";
import { buildTweetQuery, normalizeHandle } from "./queryBuilder";
import { startScheduler } from "./scheduler";

export interface MonitorOptions {
  target: string;
  lookbackMinutes: number;
  maxPerCheck: number;
  now?: () => number;
}

export interface MonitorCheckSummary {
  target: string;
  query: string;
  fetched: number;
  newTweets: TweetEntity[];
  checkedAt: number;
}

const stringField = (item: Item, key: string): string | undefined => {
  const value = item[key];
  return typeof value === "string" ? value : undefined;
};

const authorOf = (item: Item): string | undefined => {
  const author = item.author;
  if (!author || typeof author !== "object" || !("userName" in author)) return undefined;
  return typeof author.userName === "string" ? author.userName : undefined;
};

export const toTweetEntity = (item: Item, target: string): TweetEntity => ({
  id: item.id,
  target,
  author: authorOf(item),
  text: stringField(item, "text") ?? "",
  created_at: stringField(item, "createdAt"),
  raw_json: JSON.stringify(item),
});

/**
 * Builds the per-tick check: search the window since the last checkpoint,
 * keep tweets the store has not seen, then advance the checkpoint. A failing
 * fetch leaves the checkpoint untouched so the next tick covers the gap.
 */
export function createMonitorCheck(source: PageSource, store: Store, options: MonitorOptions) {
  const target = normalizeHandle(options.target);
  const now = options.now ?? Date.now;

  return async (): Promise<MonitorCheckSummary> => {
    const until = now();
    const since = store.getCheckpoint(target) ?? until - options.lookbackMinutes * 60 * 1000;
    const query = buildTweetQuery({
      username: target,
      startDate: new Date(since),
      endDate: new Date(until),
      includeNativeRetweets: true,
    });

    const result = await collect(source, query, { limit: options.maxPerCheck });
    if (result.has_next_page) {
      logger.warn({ target, maxPerCheck: options.maxPerCheck }, "本轮结果超过上限，窗口内较早的推文未拉取");
    }
    const unseen = new Set(store.filterUnseen(result.items.map((t) => t.id)));
    const newTweets = result.items.filter((t) => unseen.has(t.id)).map((t) => toTweetEntity(t, target));

    store.saveTweets(newTweets, until);
    store.setCheckpoint(target, until);

    if (newTweets.length === 0) {
      logger.info({ target }, "自上次检查以来没有新推文");
    } else {
      logger.info({ target, count: newTweets.length }, "发现新推文");
      for (const t of newTweets) {
        logger.info({ target, id: t.id, createdAt: t.created_at, text: truncate(t.text, 140) }, "新推文");
      }
    }
    return { target, query: query.text, fetched: result.items.length, newTweets, checkedAt: until };
  };
}

/** Runs one check immediately, then on every cron tick. */
export async function startMonitor(
  source: PageSource,
  store: Store,
  options: MonitorOptions & { schedule: string }
): Promise<ScheduledTask> {
  const check = createMonitorCheck(source, store, options);
  logger.info({ target: options.target, cron: options.schedule }, "开始监控账号");
  await check();
  return startScheduler(options.schedule, check, `monitor:${options.target}`);
}
