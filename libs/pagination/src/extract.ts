import { isRecord } from "@discovery-engine/http-core";
import type { PageArgs, PageExtraction } from "./types";

export const TOTAL_COUNT_FIELDS = ["totalSize", "totalCount", "totalItems", "totalResults"] as const;

/**
 * Name of the first array-valued top-level field, if any.
 */
export function findItemsField(page: Record<string, unknown>): string | undefined {
  return Object.keys(page).find((key) => Array.isArray(page[key]));
}

/**
 * Splits a decoded page into its items and continuation token.
 *
 * A record without an array field and without a token is treated as a single
 * item (an ordinary non-collection response). An empty record has no items.
 */
export function extractPage(page: unknown, tokenField = "nextPageToken"): PageExtraction {
  if (Array.isArray(page)) {
    return { items: page };
  }
  if (!isRecord(page)) {
    return { items: page === undefined || page === null ? [] : [page] };
  }

  const token = page[tokenField];
  const nextToken = typeof token === "string" && token.length > 0 ? token : undefined;
  const totalCount = readTotalCount(page);
  const itemsField = findItemsField(page);

  if (itemsField !== undefined) {
    const items = page[itemsField];
    return { items: Array.isArray(items) ? items : [], nextToken, totalCount };
  }
  if (nextToken !== undefined || Object.keys(page).length === 0) {
    return { items: [], nextToken, totalCount };
  }
  return { items: [page], totalCount };
}

function readTotalCount(page: Record<string, unknown>): number | undefined {
  for (const field of TOTAL_COUNT_FIELDS) {
    const value = page[field];
    if (typeof value === "number") return value;
    // int64 totals arrive as strings
    if (typeof value === "string" && /^\d+$/.test(value)) return Number(value);
  }
  return undefined;
}

/**
 * Returns a copy of `args` carrying the continuation token: inside `body` when
 * the call sends one, otherwise as a top-level argument.
 */
export function mergePageToken(args: PageArgs, pageTokenParam: string, token: string): PageArgs {
  const body = args.body;
  if (isRecord(body)) {
    return { ...args, body: { ...body, [pageTokenParam]: token } };
  }
  return { ...args, [pageTokenParam]: token };
}
