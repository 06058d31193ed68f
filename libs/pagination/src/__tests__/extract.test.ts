import { describe, expect, it } from "vitest";
import { extractPage, mergePageToken } from "../extract";

describe("extractPage", () => {
  it("reads the first array field, the token and a string total", () => {
    expect(extractPage({ kind: "list", items: [1, 2], other: [3], nextPageToken: "n", totalItems: "12" })).toEqual({
      items: [1, 2],
      nextToken: "n",
      totalCount: 12,
    });
  });

  it("ignores an empty continuation token", () => {
    expect(extractPage({ items: [], nextPageToken: "" })).toEqual({ items: [], nextToken: undefined });
  });

  it("treats top-level arrays as the item list", () => {
    expect(extractPage(["a", "b"]).items).toEqual(["a", "b"]);
  });

  it("wraps scalars and skips null", () => {
    expect(extractPage("done").items).toEqual(["done"]);
    expect(extractPage(null).items).toEqual([]);
  });
});

describe("mergePageToken", () => {
  it("does not mutate the original arguments", () => {
    const args = { body: { q: 1 }, parent: "p" };
    const merged = mergePageToken(args, "pageToken", "t");

    expect(merged).toEqual({ body: { q: 1, pageToken: "t" }, parent: "p" });
    expect(args).toEqual({ body: { q: 1 }, parent: "p" });
  });
});
