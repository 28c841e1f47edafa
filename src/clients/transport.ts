import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import type { Agent } from "http";
import { z } from "zod";

export type QueryParams = Record<string, string | number>;

export interface TransportResponse {
  status: number;
  data: unknown;
}

/** "Send query, get page": one HTTP exchange with the provider, no retry. */
export interface Transport {
  get(endpoint: string, params: QueryParams): Promise<TransportResponse>;
  post(endpoint: string, body: Record<string, unknown>): Promise<TransportResponse>;
}

export class TransportError extends Error {
  readonly status?: number;
  readonly endpoint: string;

  constructor(message: string, endpoint: string, status?: number) {
    super(message);
    this.name = "TransportError";
    this.endpoint = endpoint;
    this.status = status;
  }

  get isRateLimit(): boolean {
    return this.status === 429;
  }
}

/** A 2xx response whose body reports a provider-side failure. */
export class ProviderError extends Error {
  readonly endpoint: string;

  constructor(message: string, endpoint: string) {
    super(message);
    this.name = "ProviderError";
    this.endpoint = endpoint;
  }
}

export interface HttpTransportOptions {
  baseUrl: string;
  apiKey: string;
  agent?: Agent;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

const ErrorBodySchema = z.object({
  message: z.string().optional(),
  msg: z.string().optional(),
  error: z.string().optional(),
});

const describeBody = (data: unknown): string | undefined => {
  if (typeof data === "string") return data.slice(0, 200) || undefined;
  const parsed = ErrorBodySchema.safeParse(data);
  if (!parsed.success) return undefined;
  return parsed.data.message ?? parsed.data.msg ?? parsed.data.error;
};

const toTransportError = (err: unknown, endpoint: string): Error => {
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    const detail = describeBody(err.response?.data) ?? err.message;
    const message = status ? `HTTP ${status} ${endpoint}: ${detail}` : `${endpoint}: ${detail}`;
    return new TransportError(message, endpoint, status);
  }
  return err instanceof Error ? err : new Error(String(err));
};

export function createHttpTransport(options: HttpTransportOptions): Transport {
  if (!options.apiKey) {
    throw new Error("未提供 twitterapi.io API Key：请在 .env 中设置 TWITTERAPI_IO_KEY");
  }
  const http: AxiosInstance = axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs ?? 30000,
    headers: { "X-API-Key": options.apiKey },
    // 代理由 agent 负责，关闭 axios 自带的环境变量代理
    proxy: options.agent ? false : undefined,
    httpAgent: options.agent,
    httpsAgent: options.agent,
    adapter: options.adapter,
  });

  return {
    async get(endpoint, params) {
      try {
        const res = await http.get<unknown>(endpoint, { params });
        return { status: res.status, data: res.data };
      } catch (err) {
        throw toTransportError(err, endpoint);
      }
    },
    async post(endpoint, body) {
      try {
        const res = await http.post<unknown>(endpoint, body, {
          headers: { "Content-Type": "application/json" },
        });
        return { status: res.status, data: res.data };
      } catch (err) {
        throw toTransportError(err, endpoint);
      }
    },
  };
}
