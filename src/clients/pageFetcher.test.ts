import test from "node:test";
import assert from "node:assert/strict";
import { createPageSource, fetchPage } from "./pageFetcher";
import { ProviderError, type QueryParams, type Transport } from "./transport";
import { buildFollowQuery, buildSearchQuery } from "../services/queryBuilder";

const recordingTransport = (body: unknown) => {
  const calls: { endpoint: string; params: QueryParams }[] = [];
  const transport: Transport = {
    get: async (endpoint, params) => {
      calls.push({ endpoint, params: { ...params } });
      return { status: 200, data: body };
    },
    post: async () => {
      throw new Error("not used");
    },
  };
  return { transport, calls };
};

test("fetchPage should send the same first request for empty and absent cursors", async () => {
  const { transport, calls } = recordingTransport({ tweets: [], has_next_page: false });
  const query = buildSearchQuery("from:alice");

  await fetchPage(transport, query, { cursor: "", pageSize: 20 });
  await fetchPage(transport, query, { cursor: undefined, pageSize: 20 });
  await fetchPage(transport, query, { cursor: null, pageSize: 20 });

  assert.deepEqual(calls[0], {
    endpoint: "/twitter/tweet/advanced_search",
    params: { query: "from:alice", queryType: "Latest" },
  });
  assert.deepEqual(calls[1], calls[0]);
  assert.deepEqual(calls[2], calls[0]);
});

test("fetchPage should pass a cursor and map continuation fields", async () => {
  const { transport, calls } = recordingTransport({
    followings: [{ id: "1", userName: "a" }, { id: "2", userName: "b" }],
    has_next_page: true,
    next_cursor: "c2",
  });

  const page = await fetchPage(transport, buildFollowQuery("followings", "@alice"), { cursor: "c1", pageSize: 50 });

  assert.deepEqual(calls[0], {
    endpoint: "/twitter/user/followings",
    params: { userName: "alice", pageSize: 50, cursor: "c1" },
  });
  assert.deepEqual(page, {
    items: [{ id: "1", userName: "a" }, { id: "2", userName: "b" }],
    hasNextPage: true,
    nextCursor: "c2",
  });
});

test("fetchPage should read items from the kind-specific field and drop items without id", async () => {
  const { transport, calls } = recordingTransport({
    followers: [{ id: "9", name: "x" }, { name: "no id" }],
    next_cursor: "",
  });

  const page = await fetchPage(transport, buildFollowQuery("followers", "bob"), { pageSize: 20 });

  assert.equal(calls[0].endpoint, "/twitter/user/followers");
  assert.deepEqual(page.items, [{ id: "9", name: "x" }]);
  assert.equal(page.hasNextPage, false);
  assert.equal(page.nextCursor, null);
});

test("fetchPage should raise provider-reported errors", async () => {
  const { transport } = recordingTransport({ status: "error", msg: "user not found" });
  await assert.rejects(
    fetchPage(transport, buildFollowQuery("followers", "ghost"), { pageSize: 20 }),
    (err: unknown) => err instanceof ProviderError && err.message === "user not found"
  );
});

test("fetchPage should propagate transport failures untouched", async () => {
  const failure = new Error("socket hang up");
  const transport: Transport = {
    get: async () => {
      throw failure;
    },
    post: async () => {
      throw failure;
    },
  };
  const source = createPageSource(transport);
  await assert.rejects(source(buildSearchQuery("x"), { pageSize: 20 }), (err: unknown) => err === failure);
});
