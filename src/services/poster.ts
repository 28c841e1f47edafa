import { z } from "zod";
import type { Transport } from "../clients/transport";
import { logger } from "../utils/logger";
import { sleep } from "../utils/retry";

export interface LoginCredentials {
  userName: string;
  email: string;
  password: string;
  totpSecret: string;
}

export interface PosterOptions {
  proxy?: string;
  maxAttempts?: number;
  /** Multiplied by the attempt number when the account is temporarily blocked. */
  blockedWaitMs?: number;
  /** Wait after a transport failure before the next login attempt. */
  errorWaitMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export interface PostTweetInput {
  text: string;
  replyToTweetId?: string;
  attachmentUrl?: string;
}

export interface PostTweetResult {
  ok: boolean;
  message: string;
  tweetId?: string;
}

const LoginResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  msg: z.string().optional(),
  login_cookies: z.string().optional(),
});

const PostResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  msg: z.string().optional(),
  tweet_id: z.string().optional(),
  data: z.object({ id: z.string().optional() }).passthrough().optional(),
});

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

/** Login + post over twitterapi.io's cookie-based write endpoints. */
export class TwitterPoster {
  private loginCookies?: string;
  private readonly maxAttempts: number;
  private readonly blockedWaitMs: number;
  private readonly errorWaitMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly transport: Transport,
    private readonly credentials: LoginCredentials,
    private readonly options: PosterOptions = {}
  ) {
    this.maxAttempts = options.maxAttempts ?? 3;
    this.blockedWaitMs = options.blockedWaitMs ?? 60_000;
    this.errorWaitMs = options.errorWaitMs ?? 30_000;
    this.sleep = options.sleep ?? sleep;
  }

  get isLoggedIn(): boolean {
    return !!this.loginCookies;
  }

  async login(): Promise<boolean> {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const last = attempt === this.maxAttempts - 1;
      logger.info({ attempt: attempt + 1, maxAttempts: this.maxAttempts }, "尝试登录");

      let data: unknown;
      try {
        ({ data } = await this.transport.post("/twitter/user_login_v2", {
          user_name: this.credentials.userName,
          email: this.credentials.email,
          password: this.credentials.password,
          totp_secret: this.credentials.totpSecret,
          proxy: this.options.proxy,
        }));
      } catch (err) {
        logger.error({ error: errorMessage(err) }, "登录请求失败");
        if (last) return false;
        await this.sleep(this.errorWaitMs);
        continue;
      }

      const parsed = LoginResponseSchema.safeParse(data);
      if (!parsed.success) {
        logger.error("登录响应无法解析");
        return false;
      }
      const body = parsed.data;
      if (body.status === "success") {
        if (!body.login_cookies) {
          logger.error("登录成功但未返回 login_cookies");
          return false;
        }
        this.loginCookies = body.login_cookies;
        logger.info("登录成功");
        return true;
      }

      const message = body.message ?? body.msg ?? "Unknown error";
      logger.warn({ message }, "登录失败");
      // 账号被临时封锁：逐次延长等待后重试
      if (/blocked|wait/i.test(message) && !last) {
        const waitMs = (attempt + 1) * this.blockedWaitMs;
        logger.warn({ waitMs }, "账号被临时限制，等待后重试");
        await this.sleep(waitMs);
        continue;
      }
      return false;
    }
    return false;
  }

  async postTweet(input: PostTweetInput): Promise<PostTweetResult> {
    if (!this.loginCookies) {
      return { ok: false, message: "No login_cookies available. Log in first." };
    }
    if (!input.text.trim()) {
      throw new Error("tweet text is required");
    }

    const payload: Record<string, unknown> = {
      login_cookies: this.loginCookies,
      tweet_text: input.text,
      proxy: this.options.proxy,
    };
    if (input.replyToTweetId) payload.reply_to_tweet_id = input.replyToTweetId;
    if (input.attachmentUrl) payload.attachment_url = input.attachmentUrl;

    const { data } = await this.transport.post("/twitter/create_tweet_v2", payload);
    const parsed = PostResponseSchema.safeParse(data);
    if (!parsed.success) {
      return { ok: false, message: "Unparsable create_tweet_v2 response" };
    }
    const body = parsed.data;
    if (body.status !== "success") {
      const message = body.message ?? body.msg ?? "Unknown error";
      logger.warn({ message }, "发推失败");
      return { ok: false, message };
    }
    const tweetId = body.tweet_id ?? body.data?.id;
    logger.info({ tweetId }, "发推成功");
    return { ok: true, message: "Tweet posted", tweetId };
  }
}
