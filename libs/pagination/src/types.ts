import type { Logger } from "@discovery-engine/http-core";

export type PageArgs = Record<string, unknown>;

/**
 * Fetches one page for the given call arguments. Callers wrap this in the
 * retry executor; the iterator itself never retries.
 */
export type FetchPage = (args: PageArgs) => Promise<unknown>;

export interface PageIteratorOptions<TItem> {
  fetchPage: FetchPage;
  args: PageArgs;
  /** Already-fetched first page. When omitted the first `next()` fetches it. */
  initialPage?: unknown;
  /** Maximum number of items to yield across all pages. */
  limit?: number;
  tokenField?: string;      // default: "nextPageToken"
  pageTokenParam?: string;  // default: "pageToken"
  parseItem: (item: unknown) => TItem;
  logger?: Logger;
  operation?: string;
}

export type UntypedPageIteratorOptions = Omit<PageIteratorOptions<unknown>, "parseItem">;

export interface PageExtraction {
  items: unknown[];
  nextToken?: string;
  totalCount?: number;
}
