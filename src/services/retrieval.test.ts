import test from "node:test";
import assert from "node:assert/strict";
import fs from "fs";
import os from "os";
import path from "path";
import { CacheStore } from "../data/cacheStore";
import { makeItems, scriptedSource } from "../testing/fakes";
import { createRetrievalService } from "./retrieval";

const defaults = { limit: 20, pageSize: 20, queryType: "Latest" as const };

const withService = async (
  pages: Parameters<typeof scriptedSource>[0],
  fn: (ctx: { service: ReturnType<typeof createRetrievalService>; calls: ReturnType<typeof scriptedSource>["calls"]; dir: string }) => Promise<void>
) => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tweetscope-retrieval-"));
  const { source, calls } = scriptedSource(pages);
  try {
    await fn({ service: createRetrievalService({ source, cache: new CacheStore(dir) }, defaults), calls, dir });
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
};

test("getUserTweets should build the filtered query and cache under the user", async () => {
  await withService([{ items: makeItems("t", 3), hasNextPage: false, nextCursor: null }], async ({ service, calls, dir }) => {
    const result = await service.getUserTweets({
      username: "@alice",
      startDate: "2024-01-01",
      minFaves: 10,
      includeReplies: false,
    });

    assert.equal(calls[0].query.text, "from:alice since:2024-01-01 min_faves:10 -is:reply");
    assert.equal(calls[0].query.queryType, "Latest");
    assert.equal(result.items.length, 3);
    assert.deepEqual(fs.readdirSync(path.join(dir, "tweets")), ["alice"]);
  });
});

test("searchTweets should apply the default limit and the requested query type", async () => {
  await withService([{ items: makeItems("s", 25), hasNextPage: true, nextCursor: "c1" }], async ({ service, calls }) => {
    const result = await service.searchTweets("typescript", { queryType: "Top" });

    assert.equal(calls.length, 1);
    assert.equal(calls[0].query.queryType, "Top");
    assert.equal(calls[0].query.subject, "_search");
    assert.equal(result.items.length, 20);
    assert.equal(result.next_cursor, "c1");
  });
});

test("getFollowings and getFollowers should page with the requested size", async () => {
  await withService(
    [
      { items: makeItems("f", 2), hasNextPage: false, nextCursor: null },
      { items: makeItems("g", 2), hasNextPage: false, nextCursor: null },
    ],
    async ({ service, calls }) => {
      const followings = await service.getFollowings("@bob", { limit: 100, pageSize: 100 });
      const followers = await service.getFollowers("bob");

      assert.equal(calls[0].query.kind, "followings");
      assert.equal(calls[0].options.pageSize, 100);
      assert.equal(calls[1].query.kind, "followers");
      assert.equal(calls[1].options.pageSize, 20);
      assert.equal(followings.message, "Fetched 2 followings for bob");
      assert.equal(followers.message, "Fetched 2 followers for bob");
    }
  );
});
