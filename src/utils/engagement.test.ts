import test from "node:test";
import assert from "node:assert/strict";
import { classifyByCumulativeShare, extractFirstUsername } from "./engagement";

test("extractFirstUsername should return the first mention", () => {
  assert.equal(extractFirstUsername("@bob thanks, cc @carol"), "bob");
  assert.equal(extractFirstUsername("thread continues", "alice"), "alice");
  assert.equal(extractFirstUsername("no mention"), undefined);
  assert.equal(extractFirstUsername(null, "alice"), undefined);
});

test("classifyByCumulativeShare should label rows by cumulative share, largest first", () => {
  const rows = ["a", "b", "c", "d", "e"].map((name) => ({ name, views: 20 }));
  const classified = classifyByCumulativeShare(rows, (r) => r.views);

  assert.deepEqual(
    classified.map((c) => [c.row.name, c.category]),
    [
      ["a", "Top-20%"],
      ["b", "20%-50%"],
      ["c", "50%-80%"],
      ["d", "50%-80%"],
      ["e", "80%-100%"],
    ]
  );
});

test("classifyByCumulativeShare should sort descending and honor presets", () => {
  const classified = classifyByCumulativeShare([{ v: 2 }, { v: 5 }, { v: 3 }], (r) => r.v, 3);
  assert.deepEqual(
    classified.map((c) => [c.value, c.category]),
    [
      [5, "Top-50%"],
      [3, "50%-80%"],
      [2, "80%-100%"],
    ]
  );
});

test("classifyByCumulativeShare should use even steps without a preset", () => {
  const classified = classifyByCumulativeShare([{ v: 1 }, { v: 1 }], (r) => r.v, 2);
  assert.deepEqual(
    classified.map((c) => c.category),
    ["Top-50%", "50%-100%"]
  );
});

test("classifyByCumulativeShare should put everything in Bottom when the total is zero", () => {
  const classified = classifyByCumulativeShare([{ v: 0 }, { v: 0 }], (r) => r.v);
  assert.deepEqual(
    classified.map((c) => c.category),
    ["Bottom", "Bottom"]
  );
});
