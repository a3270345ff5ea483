import { InvokeOptions } from "../transports/Transport";

/**
 * Shared machinery for iterators that page through a remote list: a request
 * template that is adjusted between calls, a FIFO of items not yet handed
 * out, the memoized total, and an optional caller quota.
 *
 * Subclasses implement `next()` and call `nextBuffered()` first; only when it
 * reports nothing ready do they go to the network.
 */
export abstract class IterBuffer<Request, Item> implements AsyncIterable<Item> {
  protected readonly buffer: Item[] = [];
  /** Set once a page shows the server has nothing further. Never reset. */
  protected lastChunk = false;
  protected totalCount: number | undefined;
  /** Items handed out so far, counted against `quota`. */
  protected fetched = 0;
  private quota: number | undefined;

  protected constructor(protected readonly request: Request) {}

  abstract next(options?: InvokeOptions): Promise<Item | undefined>;

  /** Stops the iterator after `count` items, fetching no more than needed. `Infinity` lifts the quota. */
  limit(count: number): this {
    if (Number.isNaN(count)) throw new RangeError("limit must be a number");
    this.quota = count === Infinity ? undefined : Math.max(0, Math.floor(count));
    return this;
  }

  get isTerminal(): boolean {
    return this.lastChunk;
  }

  /**
   * Page size for the next request. A met quota still asks for one item:
   * a limit of 0 makes the server fall back to its own default page size.
   */
  protected determineLimit(max: number): number {
    if (this.quota === undefined) return max;
    if (this.fetched < this.quota) return Math.min(this.quota - this.fetched, max);
    return 1;
  }

  /**
   * Answers `next()` without the network when possible. `undefined` means a
   * fetch is required; otherwise `item` is the answer (possibly the end).
   */
  protected nextBuffered(): { item: Item | undefined } | undefined {
    if (this.quota !== undefined && this.fetched >= this.quota) return { item: undefined };
    if (this.buffer.length > 0) return { item: this.popItem() };
    if (this.lastChunk) return { item: undefined };
    return undefined;
  }

  protected popItem(): Item | undefined {
    const item = this.buffer.shift();
    if (item !== undefined) this.fetched += 1;
    return item;
  }

  async collect(options?: InvokeOptions): Promise<Item[]> {
    const items: Item[] = [];
    for (let item = await this.next(options); item !== undefined; item = await this.next(options)) {
      items.push(item);
    }
    return items;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<Item, void, undefined> {
    while (true) {
      const item = await this.next();
      if (item === undefined) return;
      yield item;
    }
  }
}
