import fs from "fs";
import path from "path";
import { z } from "zod";
import dotenv from "dotenv";
import { AppConfig, EnvSecrets } from "../data/types";
import { logger } from "../utils/logger";

const DEFAULT_RETRY = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  rateLimitDelayMs: 1000,
} as const;

const DEFAULT_MONITOR = {
  schedule: "*/5 * * * *",
  lookbackMinutes: 60,
  maxPerCheck: 200,
} as const;

const ConfigSchema = z.object({
  baseUrl: z.string().url().default("https://api.twitterapi.io"),
  proxy: z.string().optional(),
  cacheDir: z.string().min(1).default("data/cache"),
  dbPath: z.string().min(1).default("data/monitor.db"),
  requestTimeoutMs: z.number().int().min(1000).max(120000).default(30000),
  defaults: z
    .object({
      limit: z.number().int().min(1).default(20),
      pageSize: z.number().int().min(20).max(200).default(20),
      queryType: z.enum(["Latest", "Top"]).default("Latest"),
    })
    .default({}),
  retry: z
    .object({
      maxRetries: z.number().int().min(0).max(10).default(DEFAULT_RETRY.maxRetries),
      baseDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.baseDelayMs),
      maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.maxDelayMs),
      rateLimitDelayMs: z.number().int().min(0).default(DEFAULT_RETRY.rateLimitDelayMs),
    })
    .default({}),
  monitor: z
    .object({
      target: z.string().optional(),
      schedule: z.string().default(DEFAULT_MONITOR.schedule),
      lookbackMinutes: z.number().int().min(1).default(DEFAULT_MONITOR.lookbackMinutes),
      maxPerCheck: z.number().int().min(1).max(5000).default(DEFAULT_MONITOR.maxPerCheck),
    })
    .default({}),
});

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function resolveConfigPath(cwd: string): string | undefined {
  const candidates = [path.join(cwd, "config.json"), path.join(cwd, "config.default.json")];
  return candidates.find((p) => fs.existsSync(p));
}

const blankToUndefined = (value?: string) => (value && value.trim() ? value.trim() : undefined);

export function loadConfig(options: LoadConfigOptions = {}): { config: AppConfig; secrets: EnvSecrets } {
  const cwd = options.cwd ?? process.cwd();
  let env = options.env;
  if (!env) {
    dotenv.config({ path: path.join(cwd, ".env") });
    env = process.env;
  }

  const configPath = resolveConfigPath(cwd);
  let raw: unknown = {};
  if (configPath) {
    try {
      raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (err) {
      logger.error({ configPath, error: err instanceof Error ? err.message : String(err) }, "配置文件不是合法 JSON");
      throw new Error("Invalid configuration");
    }
  } else {
    logger.warn({ cwd }, "未找到 config.json / config.default.json，使用默认配置");
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error({ configPath, errors: parsed.error.format() }, "配置文件校验失败");
    throw new Error("Invalid configuration");
  }

  const envProxy = blankToUndefined(env.PROXY_HTTP) ?? blankToUndefined(env.HTTPS_PROXY) ?? blankToUndefined(env.HTTP_PROXY);
  const config: AppConfig = {
    ...parsed.data,
    proxy: blankToUndefined(parsed.data.proxy) ?? envProxy,
    cacheDir: path.resolve(cwd, parsed.data.cacheDir),
    dbPath: path.resolve(cwd, parsed.data.dbPath),
    monitor: {
      ...parsed.data.monitor,
      target: blankToUndefined(parsed.data.monitor.target),
    },
  };

  const secrets: EnvSecrets = {
    TWITTERAPI_IO_KEY: blankToUndefined(env.TWITTERAPI_IO_KEY) ?? blankToUndefined(env.twitterapiio_key),
    TWITTER_USERNAME: blankToUndefined(env.TWITTER_USERNAME),
    TWITTER_EMAIL: blankToUndefined(env.TWITTER_EMAIL),
    TWITTER_PASSWORD: blankToUndefined(env.TWITTER_PASSWORD),
    TOTP_SECRET: blankToUndefined(env.TOTP_SECRET),
  };

  return { config, secrets };
}
