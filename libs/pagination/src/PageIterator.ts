import { noopLogger, type Logger } from "@discovery-engine/http-core";
import { extractPage, mergePageToken } from "./extract";
import type { FetchPage, PageArgs, PageIteratorOptions, UntypedPageIteratorOptions } from "./types";

type IteratorState = "start" | "reading" | "exhausted";

/**
 * Lazily walks a token-paginated collection, yielding one item at a time.
 *
 * Single pass and forward only: once exhausted every `next()` resolves to
 * `{ done: true }`. Not safe to share between concurrent consumers.
 */
export class PageIterator<TItem> implements AsyncIterableIterator<TItem> {
  private readonly fetchPage: FetchPage;
  private readonly parseItem: (item: unknown) => TItem;
  private readonly limit?: number;
  private readonly tokenField: string;
  private readonly pageTokenParam: string;
  private readonly logger: Logger;
  private readonly operation?: string;

  private args: PageArgs;
  private pendingPage: unknown;
  private state: IteratorState = "start";
  private items: unknown[] = [];
  private cursor = 0;
  private nextToken?: string;
  private yielded = 0;
  private fetched = 0;
  private latestTotal?: number;

  constructor(options: PageIteratorOptions<TItem>) {
    this.fetchPage = options.fetchPage;
    this.parseItem = options.parseItem;
    this.args = { ...options.args };
    this.pendingPage = options.initialPage;
    this.limit = options.limit;
    this.tokenField = options.tokenField ?? "nextPageToken";
    this.pageTokenParam = options.pageTokenParam ?? "pageToken";
    this.logger = options.logger ?? noopLogger;
    this.operation = options.operation;
  }

  /** Number of pages fetched so far, the initial page included. */
  get pagesFetched(): number {
    return this.fetched;
  }

  /** Total reported by the latest page (`totalSize`, `totalCount`, ...). */
  get totalCount(): number | undefined {
    return this.latestTotal;
  }

  get done(): boolean {
    return this.state === "exhausted";
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<TItem> {
    return this;
  }

  async next(): Promise<IteratorResult<TItem, undefined>> {
    while (this.state !== "exhausted") {
      if (this.limit !== undefined && this.yielded >= this.limit) {
        this.state = "exhausted";
        break;
      }

      if (this.cursor < this.items.length) {
        const item = this.items[this.cursor];
        this.cursor += 1;
        this.yielded += 1;
        return { value: this.parseItem(item), done: false };
      }

      if (this.state === "start") {
        const page = this.pendingPage !== undefined ? this.pendingPage : await this.fetchPage(this.args);
        this.pendingPage = undefined;
        this.state = "reading";
        this.load(page);
        continue;
      }

      if (this.nextToken === undefined) {
        this.state = "exhausted";
        break;
      }

      this.args = mergePageToken(this.args, this.pageTokenParam, this.nextToken);
      this.load(await this.fetchPage(this.args));
    }
    return { value: undefined, done: true };
  }

  async return(): Promise<IteratorResult<TItem, undefined>> {
    this.state = "exhausted";
    this.items = [];
    return { value: undefined, done: true };
  }

  /**
   * Drains the remaining items into an array.
   */
  async collect(): Promise<TItem[]> {
    const collected: TItem[] = [];
    for await (const item of this) {
      collected.push(item);
    }
    return collected;
  }

  private load(page: unknown): void {
    const extraction = extractPage(page, this.tokenField);
    this.fetched += 1;
    this.items = extraction.items;
    this.cursor = 0;
    this.nextToken = extraction.nextToken;
    if (extraction.totalCount !== undefined) {
      this.latestTotal = extraction.totalCount;
    }
    this.logger.debug("pagination.page", {
      operation: this.operation,
      page: this.fetched,
      items: extraction.items.length,
      hasNext: extraction.nextToken !== undefined,
    });
  }
}

/**
 * Iterator over raw decoded items.
 */
export function createPageIterator(options: UntypedPageIteratorOptions): PageIterator<unknown> {
  return new PageIterator<unknown>({ ...options, parseItem: (item) => item });
}
