import { HttpsProxyAgent } from "https-proxy-agent";
import type { Agent } from "http";
import { logger } from "./logger";

export function getProxyAgent(proxyUrl?: string): Agent | undefined {
  if (!proxyUrl) return undefined;
  let host: string;
  try {
    host = new URL(proxyUrl).host;
  } catch {
    throw new Error(`无效的代理地址: ${proxyUrl}`);
  }
  logger.info({ proxy: host }, "使用 HTTP 代理");
  return new HttpsProxyAgent(proxyUrl);
}
