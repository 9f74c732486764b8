import type { PageIdentity } from "./types.js";

/**
 * Set of URLs already claimed in this run. Breaks cycles in the chain.
 *
 * `claim` is a synchronous test-and-insert: nothing else on the event loop
 * can interleave with it, and it is never held across a fetch.
 */
export class VisitedGuard {
  private readonly claimed = new Set<PageIdentity>();

  /** True for the first caller with this URL, false for every later one */
  claim(url: PageIdentity): boolean {
    if (this.claimed.has(url)) {
      return false;
    }
    this.claimed.add(url);
    return true;
  }

  has(url: PageIdentity): boolean {
    return this.claimed.has(url);
  }

  get size(): number {
    return this.claimed.size;
  }
}
