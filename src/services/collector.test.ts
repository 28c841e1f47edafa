import test from "node:test";
import assert from "node:assert/strict";
import { clampPageSize, collect } from "./collector";
import { buildFollowQuery, buildSearchQuery } from "./queryBuilder";
import { makeItems, scriptedSource } from "../testing/fakes";

test("collect should merge pages, drop repeated ids and stop at the end of the stream", async () => {
  const page1 = makeItems("t", 20);
  const page2 = [...makeItems("t", 5, 21), page1[0], page1[7]];
  const { source, calls } = scriptedSource([
    { items: page1, hasNextPage: true, nextCursor: "c1" },
    { items: page2, hasNextPage: false, nextCursor: null },
  ]);

  const result = await collect(source, buildSearchQuery("from:alice"), { limit: 30, pageSize: 20 });

  assert.equal(result.items.length, 25);
  assert.deepEqual(
    result.items.map((t) => t.id),
    [...page1.map((t) => t.id), "t21", "t22", "t23", "t24", "t25"]
  );
  assert.equal(result.has_next_page, false);
  assert.equal(result.next_cursor, null);
  assert.equal(result.status, "success");
  assert.equal(result.kind, "tweets");
  assert.equal(result.message, "Fetched 25 tweets for query: `from:alice`");
  assert.deepEqual(
    calls.map((c) => c.options.cursor),
    [null, "c1"]
  );
});

test("collect should keep the first occurrence when a duplicate id arrives later", async () => {
  const { source } = scriptedSource([
    { items: [{ id: "123", text: "first" }], hasNextPage: true, nextCursor: "c1" },
    { items: [{ id: "123", text: "second" }, { id: "124" }], hasNextPage: false, nextCursor: null },
  ]);

  const result = await collect(source, buildSearchQuery("x"), { limit: 10 });

  assert.deepEqual(result.items, [{ id: "123", text: "first" }, { id: "124" }]);
});

test("collect should drop an id repeated within the same page", async () => {
  const { source } = scriptedSource([
    { items: [{ id: "123" }, { id: "123" }, { id: "124" }], hasNextPage: false, nextCursor: null },
  ]);

  const result = await collect(source, buildSearchQuery("x"), { limit: 10 });

  assert.deepEqual(
    result.items.map((t) => t.id),
    ["123", "124"]
  );
});

test("collect should count only distinct ids towards the limit", async () => {
  const { source } = scriptedSource([
    { items: [{ id: "a" }, { id: "a" }, { id: "b" }, { id: "c" }], hasNextPage: true, nextCursor: "c1" },
  ]);

  const result = await collect(source, buildSearchQuery("x"), { limit: 2 });

  assert.deepEqual(
    result.items.map((t) => t.id),
    ["a", "b"]
  );
  assert.equal(result.next_cursor, "c1");
});

test("collect should return an empty result without fetching when limit is not positive", async () => {
  const { source, calls } = scriptedSource([]);

  const zero = await collect(source, buildSearchQuery("x"), { limit: 0 });
  const negative = await collect(source, buildSearchQuery("x"), { limit: -5, startCursor: "resume" });

  assert.equal(calls.length, 0);
  assert.deepEqual(zero.items, []);
  assert.equal(zero.message, "Fetched 0 tweets for query: `x`");
  assert.deepEqual(negative.items, []);
  assert.equal(negative.next_cursor, "resume");
});

test("collect should truncate the last batch to the limit and keep the continuation", async () => {
  const { source, calls } = scriptedSource([
    { items: makeItems("u", 20), hasNextPage: true, nextCursor: "c1" },
    { items: makeItems("u", 20, 21), hasNextPage: true, nextCursor: "c2" },
  ]);

  const result = await collect(source, buildFollowQuery("followings", "bob"), { limit: 30, pageSize: 20 });

  assert.equal(calls.length, 2);
  assert.equal(result.items.length, 30);
  assert.equal(result.items[29].id, "u30");
  assert.equal(result.has_next_page, true);
  assert.equal(result.next_cursor, "c2");
  assert.equal(result.message, "Fetched 30 followings for bob");
});

test("collect should start from a given cursor and treat an empty one as the first page", async () => {
  const pages = [{ items: makeItems("f", 3), hasNextPage: false, nextCursor: null }];
  const first = scriptedSource(pages);
  const resumed = scriptedSource(pages);

  await collect(first.source, buildFollowQuery("followers", "bob"), { limit: 5, startCursor: "" });
  await collect(resumed.source, buildFollowQuery("followers", "bob"), { limit: 5, startCursor: "c9" });

  assert.equal(first.calls[0].options.cursor, null);
  assert.equal(resumed.calls[0].options.cursor, "c9");
});

test("collect should stop when a page brings no new items even if more pages are reported", async () => {
  const repeated = makeItems("r", 2);
  const { source, calls } = scriptedSource([
    { items: repeated, hasNextPage: true, nextCursor: "c1" },
    { items: repeated, hasNextPage: true, nextCursor: "c2" },
    { items: repeated, hasNextPage: true, nextCursor: "c3" },
  ]);

  const result = await collect(source, buildSearchQuery("loop"), { limit: 100 });

  assert.equal(calls.length, 2);
  assert.equal(result.items.length, 2);
  assert.equal(result.has_next_page, true);
  assert.equal(result.next_cursor, "c2");
});

test("collect should clamp the page size to the provider range", async () => {
  assert.equal(clampPageSize(5), 20);
  assert.equal(clampPageSize(500), 200);
  assert.equal(clampPageSize(75), 75);
  assert.equal(clampPageSize(), 20);

  const { source, calls } = scriptedSource([{ items: makeItems("p", 1), hasNextPage: false, nextCursor: null }]);
  await collect(source, buildFollowQuery("followings", "bob"), { limit: 5, pageSize: 1000 });
  assert.equal(calls[0].options.pageSize, 200);
});

test("collect should switch to max_id paging when cursors run out and the fallback is enabled", async () => {
  const { source, calls } = scriptedSource([
    { items: makeItems("m", 3), hasNextPage: false, nextCursor: null },
    { items: [{ id: "m3" }, { id: "m4" }], hasNextPage: false, nextCursor: null },
    { items: [{ id: "m4" }], hasNextPage: false, nextCursor: null },
  ]);

  const result = await collect(source, buildSearchQuery("from:alice"), { limit: 50, maxIdFallback: true });

  assert.deepEqual(
    calls.map((c) => [c.query.text, c.options.cursor]),
    [
      ["from:alice", null],
      ["from:alice max_id:m3", null],
      ["from:alice max_id:m4", null],
    ]
  );
  assert.deepEqual(
    result.items.map((t) => t.id),
    ["m1", "m2", "m3", "m4"]
  );
  assert.equal(result.has_next_page, false);
  assert.equal(result.message, "Fetched 4 tweets for query: `from:alice`");
});

test("collect should not return a cursor that belongs to the max_id query", async () => {
  const { source, calls } = scriptedSource([
    { items: makeItems("m", 3), hasNextPage: false, nextCursor: null },
    { items: [{ id: "m3" }, { id: "m4" }, { id: "m5" }], hasNextPage: true, nextCursor: "x1" },
  ]);

  const result = await collect(source, buildSearchQuery("from:alice"), { limit: 5, maxIdFallback: true });

  assert.equal(calls.length, 2);
  assert.equal(calls[1].query.text, "from:alice max_id:m3");
  assert.deepEqual(
    result.items.map((t) => t.id),
    ["m1", "m2", "m3", "m4", "m5"]
  );
  assert.equal(result.has_next_page, true);
  assert.equal(result.next_cursor, null);
});
