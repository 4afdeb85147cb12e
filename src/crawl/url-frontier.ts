/**
 * BFS frontier and visited set
 */

/**
 * Normalize a seed for use as traversal root. Runs it through the URL parser
 * so `https://Example.com` and `https://example.com/` name the same page.
 */
export function normalizeSeed(seed: string): string {
  try {
    const parsed = new URL(seed);
    parsed.hash = '';
    return parsed.href;
  } catch {
    return seed;
  }
}

/**
 * FIFO queue of pending URLs for one seed. Accepts duplicates; the crawler
 * drops already-visited URLs when they are dequeued.
 */
export class UrlFrontier {
  private queue: string[] = [];
  private head = 0;
  private enqueued = 0;

  constructor(seed?: string) {
    if (seed !== undefined) this.push(seed);
  }

  push(url: string): void {
    this.queue.push(url);
    this.enqueued++;
  }

  pushAll(urls: Iterable<string>): void {
    for (const url of urls) this.push(url);
  }

  /** Next URL in discovery order, or null when empty. */
  next(): string | null {
    if (this.head >= this.queue.length) return null;
    const url = this.queue[this.head++];

    // Compact once the consumed prefix dominates the backing array
    if (this.head > 1024 && this.head * 2 > this.queue.length) {
      this.queue = this.queue.slice(this.head);
      this.head = 0;
    }
    return url;
  }

  hasMore(): boolean {
    return this.head < this.queue.length;
  }

  /** URLs waiting to be dequeued. */
  get size(): number {
    return this.queue.length - this.head;
  }

  /** Total pushes, duplicates included. */
  get enqueuedCount(): number {
    return this.enqueued;
  }
}

/**
 * URLs already dequeued. Only grows. `markVisited` checks and inserts in one
 * synchronous step, so concurrent page tasks can never claim the same URL.
 */
export class VisitedSet {
  private visited = new Set<string>();

  /** Returns false if the URL was already visited. */
  markVisited(url: string): boolean {
    if (this.visited.has(url)) return false;
    this.visited.add(url);
    return true;
  }

  has(url: string): boolean {
    return this.visited.has(url);
  }

  get size(): number {
    return this.visited.size;
  }

  values(): string[] {
    return Array.from(this.visited);
  }
}
