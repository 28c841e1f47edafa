import tweetFields from "../data/tweetFields.json";

export type FieldSet = "full" | "truncated";

export const TWEET_FIELDS: Record<FieldSet, readonly string[]> = {
  full: tweetFields.full,
  truncated: tweetFields.truncated,
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  !!value && typeof value === "object" && !Array.isArray(value);

/** Reads a dotted path (`author.userName`); any missing segment yields null. */
export function pluckPath(obj: unknown, dottedPath: string): unknown {
  let cur: unknown = obj;
  for (const part of dottedPath.split(".")) {
    if (!isRecord(cur) || !(part in cur)) return null;
    cur = cur[part];
  }
  return cur;
}

export function projectTweet(
  tweet: Record<string, unknown>,
  fields: readonly string[] = TWEET_FIELDS.full
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const field of fields) out[field] = pluckPath(tweet, field);
  return out;
}

export const collapseTweets = (
  tweets: Record<string, unknown>[],
  fields: readonly string[] = TWEET_FIELDS.truncated
): Record<string, unknown>[] => tweets.map((t) => projectTweet(t, fields));
