#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "../config";
import { getProxyAgent } from "../utils/proxy";
import { createHttpTransport, type Transport } from "../clients/transport";
import { createPageSource } from "../clients/pageFetcher";
import { CacheStore } from "../data/cacheStore";
import { Store } from "../data/store";
import { RESULT_KINDS, toResultPayload, type CollectionResult, type Item, type ResultKind } from "../data/types";
import { createRetrievalService } from "../services/retrieval";
import { createMonitorCheck, startMonitor } from "../services/monitor";
import { TwitterPoster } from "../services/poster";
import { createRetryPolicy, withRetryingTransport } from "../utils/retry";
import { collapseTweets, projectTweet, TWEET_FIELDS } from "../utils/projection";
import { logger } from "../utils/logger";
import { truncate } from "../utils/text";
import { classifyByCumulativeShare } from "../utils/engagement";

const FIELD_CHOICES = ["raw", "full", "truncated"] as const;
type Fields = (typeof FIELD_CHOICES)[number];
const DEFAULT_FIELDS: Fields = "truncated";

function bootstrapRuntime() {
  const { config, secrets } = loadConfig();
  const agent = getProxyAgent(config.proxy);
  const http = (): Transport =>
    createHttpTransport({
      baseUrl: config.baseUrl,
      apiKey: secrets.TWITTERAPI_IO_KEY ?? "",
      agent,
      timeoutMs: config.requestTimeoutMs,
    });
  return { config, secrets, http };
}

function buildRetrieval() {
  const runtime = bootstrapRuntime();
  const transport = withRetryingTransport(runtime.http(), createRetryPolicy(runtime.config.retry));
  const source = createPageSource(transport);
  const cache = new CacheStore(runtime.config.cacheDir);
  return { ...runtime, source, cache, service: createRetrievalService({ source, cache }, runtime.config.defaults) };
}

const metricOf = (metric: string) => (item: Item) => {
  const value = item[metric];
  return typeof value === "number" ? value : 0;
};

function printRanking(items: Item[], metric: string) {
  for (const { row, value, category } of classifyByCumulativeShare(items, metricOf(metric))) {
    const text = typeof row.text === "string" ? row.text : "";
    console.log(`${category.padEnd(9)} ${metric}=${value} ${row.id}: ${truncate(text, 120)}`);
  }
}

function printResult(result: CollectionResult, opts: { json: boolean; fields: Fields; rank?: string }) {
  const items =
    result.kind !== "tweets" || opts.fields === "raw"
      ? result.items
      : opts.fields === "full"
        ? result.items.map((t) => projectTweet(t, TWEET_FIELDS.full))
        : collapseTweets(result.items);

  if (opts.json) {
    console.log(JSON.stringify({ ...toResultPayload(result), [result.kind]: items }, null, 2));
    return;
  }
  if (opts.rank && result.kind === "tweets") {
    printRanking(result.items, opts.rank);
    console.log(result.message);
    return;
  }
  for (const item of result.items) {
    if (result.kind === "tweets") {
      const text = typeof item.text === "string" ? item.text : "";
      console.log(`[${String(item.createdAt ?? "")}] ${item.id}: ${truncate(text, 280)}`);
    } else {
      const userName = typeof item.userName === "string" ? item.userName : "?";
      console.log(`@${userName} [${item.id}]`);
    }
  }
  console.log(result.message);
  if (result.has_next_page && result.next_cursor) {
    console.log(`next cursor: ${result.next_cursor}`);
  }
}

async function bootstrap() {
  await yargs(hideBin(process.argv))
    .scriptName("tweetscope")
    .option("limit", { type: "number", describe: "返回条数上限" })
    .option("cursor", { type: "string", describe: "从指定游标续取（不读写缓存）" })
    .option("refresh", { type: "boolean", default: false, describe: "忽略缓存并重新拉取" })
    .option("json", { type: "boolean", default: false, describe: "以 JSON 输出" })
    .command(
      "search <query>",
      "高级搜索推文",
      (y) =>
        y
          .positional("query", { type: "string", demandOption: true, describe: "高级搜索语法" })
          .option("query-type", { choices: ["Latest", "Top"] as const, describe: "排序方式" })
          .option("max-id-fallback", { type: "boolean", default: false, describe: "游标耗尽后改用 max_id 继续翻页" })
          .option("fields", { choices: FIELD_CHOICES, default: DEFAULT_FIELDS, describe: "推文字段：原始、完整或精简" })
          .option("rank", { type: "string", describe: "按指标累计占比分档，如 likeCount、viewCount" }),
      async (argv) => {
        const { service } = buildRetrieval();
        const result = await service.searchTweets(argv.query, {
          limit: argv.limit,
          startCursor: argv.cursor,
          refresh: argv.refresh,
          queryType: argv["query-type"],
          maxIdFallback: argv["max-id-fallback"],
        });
        printResult(result, { json: argv.json, fields: argv.fields, rank: argv.rank });
      }
    )
    .command(
      "tweets <username>",
      "拉取指定用户的推文",
      (y) =>
        y
          .positional("username", { type: "string", demandOption: true })
          .option("since", { type: "string", describe: "起始日期（含），如 2024-01-01" })
          .option("until", { type: "string", describe: "结束日期（不含），如 2024-02-01" })
          .option("min-faves", { type: "number", describe: "最少点赞数" })
          .option("replies", { type: "boolean", default: true, describe: "包含回复（--no-replies 排除）" })
          .option("fields", { choices: FIELD_CHOICES, default: DEFAULT_FIELDS, describe: "推文字段：原始、完整或精简" })
          .option("rank", { type: "string", describe: "按指标累计占比分档，如 likeCount、viewCount" }),
      async (argv) => {
        const { service } = buildRetrieval();
        const result = await service.getUserTweets(
          {
            username: argv.username,
            startDate: argv.since,
            endDate: argv.until,
            minFaves: argv["min-faves"],
            includeReplies: argv.replies,
          },
          { limit: argv.limit, startCursor: argv.cursor, refresh: argv.refresh }
        );
        printResult(result, { json: argv.json, fields: argv.fields, rank: argv.rank });
      }
    )
    .command(
      "followings <username>",
      "拉取关注列表（按关注时间倒序）",
      (y) =>
        y
          .positional("username", { type: "string", demandOption: true })
          .option("page-size", { type: "number", describe: "每页条数（20-200）" }),
      async (argv) => {
        const { service } = buildRetrieval();
        const result = await service.getFollowings(argv.username, {
          limit: argv.limit,
          pageSize: argv["page-size"],
          startCursor: argv.cursor,
          refresh: argv.refresh,
        });
        printResult(result, { json: argv.json, fields: "raw" });
      }
    )
    .command(
      "followers <username>",
      "拉取粉丝列表",
      (y) =>
        y
          .positional("username", { type: "string", demandOption: true })
          .option("page-size", { type: "number", describe: "每页条数（20-200）" }),
      async (argv) => {
        const { service } = buildRetrieval();
        const result = await service.getFollowers(argv.username, {
          limit: argv.limit,
          pageSize: argv["page-size"],
          startCursor: argv.cursor,
          refresh: argv.refresh,
        });
        printResult(result, { json: argv.json, fields: "raw" });
      }
    )
    .command(
      "monitor",
      "定时检查账号新推文",
      (y) =>
        y
          .option("target", { type: "string", describe: "监控的账号，默认取配置 monitor.target" })
          .option("once", { type: "boolean", default: false, describe: "只检查一次" }),
      async (argv) => {
        const { config, source } = buildRetrieval();
        const target = argv.target ?? config.monitor.target;
        if (!target) throw new Error("未指定监控账号：使用 --target 或配置 monitor.target");
        const store = new Store(config.dbPath);
        const options = { ...config.monitor, target };
        if (argv.once) {
          try {
            const summary = await createMonitorCheck(source, store, options)();
            for (const t of summary.newTweets) {
              console.log(`[${t.created_at ?? ""}] ${truncate(t.text, 280)}`);
            }
          } finally {
            store.close();
          }
          return;
        }
        const task = await startMonitor(source, store, options);
        const stop = () => {
          logger.info("监控已停止");
          task.stop();
          store.close();
          process.exit(0);
        };
        process.on("SIGINT", stop);
        process.on("SIGTERM", stop);
      }
    )
    .command(
      "post <text>",
      "登录并发布推文",
      (y) =>
        y
          .positional("text", { type: "string", demandOption: true })
          .option("reply-to", { type: "string", describe: "回复的推文 ID" })
          .option("attachment", { type: "string", describe: "附件 URL" }),
      async (argv) => {
        const { config, secrets, http } = bootstrapRuntime();
        const { TWITTER_USERNAME, TWITTER_EMAIL, TWITTER_PASSWORD, TOTP_SECRET } = secrets;
        if (!TWITTER_USERNAME || !TWITTER_EMAIL || !TWITTER_PASSWORD || !TOTP_SECRET) {
          throw new Error("缺少登录凭据：需要 TWITTER_USERNAME, TWITTER_EMAIL, TWITTER_PASSWORD, TOTP_SECRET");
        }
        // 写操作不经过重试装饰器，避免重复发推
        const poster = new TwitterPoster(
          http(),
          { userName: TWITTER_USERNAME, email: TWITTER_EMAIL, password: TWITTER_PASSWORD, totpSecret: TOTP_SECRET },
          { proxy: config.proxy }
        );
        if (!(await poster.login())) throw new Error("登录失败");
        const result = await poster.postTweet({
          text: argv.text,
          replyToTweetId: argv["reply-to"],
          attachmentUrl: argv.attachment,
        });
        if (!result.ok) throw new Error(`发推失败: ${result.message}`);
        console.log(result.tweetId ? `posted ${result.tweetId}` : "posted");
      }
    )
    .command(
      "show",
      "显示监控已保存的推文",
      (y) =>
        y
          .option("target", { type: "string", describe: "指定账号" })
          .option("contains", { type: "string", describe: "文本包含关键字" }),
      (argv) => {
        const { config } = loadConfig();
        const store = new Store(config.dbPath);
        try {
          const rows = store.listTweets({ target: argv.target, contains: argv.contains, limit: argv.limit ?? 20 });
          for (const r of rows) {
            if (argv.json) console.log(JSON.stringify(r));
            else console.log(`[${r.created_at ?? ""}] @${r.author ?? r.target}: ${truncate(r.text, 280)}`);
          }
        } finally {
          store.close();
        }
      }
    )
    .command("cache", "查看或清理本地缓存", (y) =>
      y
        .option("kind", { choices: RESULT_KINDS, describe: "结果类型" })
        .option("subject", { type: "string", describe: "用户名或 _search" })
        .command(
          "list",
          "列出缓存条目",
          (y) => y,
          (argv) => {
            const { config } = loadConfig();
            const entries = new CacheStore(config.cacheDir).list({ kind: argv.kind, subject: argv.subject });
            for (const e of entries) {
              if (argv.json) console.log(JSON.stringify(e));
              else console.log(`${e.savedAt} ${e.kind}/${e.subject}/${e.key} limit=${e.limit} items=${e.itemCount} ${truncate(e.query, 80)}`);
            }
          }
        )
        .command(
          "clear",
          "删除缓存条目",
          (y) => y,
          (argv) => {
            const { config } = loadConfig();
            const kind: ResultKind | undefined = argv.kind;
            const removed = new CacheStore(config.cacheDir).clear({ kind, subject: argv.subject });
            console.log(`removed ${removed} cache entries`);
          }
        )
        .demandCommand(1)
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
}

bootstrap().catch((e) => {
  logger.error({ error: e instanceof Error ? e.message : String(e) }, "命令执行失败");
  process.exit(1);
});
