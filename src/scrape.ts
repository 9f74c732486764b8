/**
 * Crawl driver: follows a chain of "next chapter" links.
 *
 * Each chapter is one task. A task holds a limiter slot, claims its URL,
 * fetches the page and emits the chapter; when the page names a next chapter,
 * a new task is spawned for it with the index incremented. The next URL is only
 * known once the current page is parsed, so one chain never fans out ahead of
 * discovery.
 */

import { ResultCollector } from "./collector.js";
import { ConcurrencyLimiter, DEFAULT_MAX_CONCURRENCY } from "./limiter.js";
import type {
  ChapterFailure,
  ChapterIndex,
  ChapterResult,
  FetchFailureKind,
  PageFetcher,
  PageIdentity,
} from "./types.js";
import { VisitedGuard } from "./visited.js";

/** Shared state of one crawl run, passed by reference to every task */
export interface CrawlContext {
  limiter: ConcurrencyLimiter;
  visited: VisitedGuard;
  collector: ResultCollector;
  fetchPage: PageFetcher;
  /** Stop spawning once this many chapters are indexed; null means no cap */
  maxChapters: number | null;
  signal?: AbortSignal;
}

/** Terminal state of a single chapter task */
export type ChapterTaskOutcome =
  | { state: "succeeded"; next: PageIdentity | null }
  | { state: "rejected" }
  | { state: "failed"; kind: FetchFailureKind; message: string }
  | { state: "cancelled" };

export interface CrawlOptions {
  startUrl: PageIdentity;
  maxConcurrency?: number;
  maxChapters?: number | null;
  signal?: AbortSignal;
}

export interface CrawlReport {
  /** Collected chapters in completion order */
  chapters: ChapterResult[];
  failures: ChapterFailure[];
  skipped: PageIdentity[];
  /** True if the signal aborted before the run went quiet */
  cancelled: boolean;
  /** Most fetches observed in flight at once */
  peakConcurrency: number;
}

/**
 * Create the shared state for a crawl run.
 */
export function createCrawlContext(
  fetchPage: PageFetcher,
  options: Omit<CrawlOptions, "startUrl"> = {},
): CrawlContext {
  return {
    limiter: new ConcurrencyLimiter(options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY),
    visited: new VisitedGuard(),
    collector: new ResultCollector(),
    fetchPage,
    maxChapters: options.maxChapters ?? null,
    signal: options.signal,
  };
}

/**
 * Run one chapter task through to a terminal state, without spawning.
 * The limiter slot is held for the whole task and released on every path.
 */
export function runChapterTask(
  ctx: CrawlContext,
  index: ChapterIndex,
  url: PageIdentity,
): Promise<ChapterTaskOutcome> {
  return ctx.limiter.run(async (): Promise<ChapterTaskOutcome> => {
    if (ctx.signal?.aborted) {
      return { state: "cancelled" };
    }

    if (!ctx.visited.claim(url)) {
      ctx.collector.skip(url);
      return { state: "rejected" };
    }

    const outcome = await ctx.fetchPage(url, ctx.signal);

    if (!outcome.ok) {
      ctx.collector.fail({ index, url, kind: outcome.kind, message: outcome.message });
      console.error(`  [${index + 1}] FAILED: ${outcome.message}`);
      return { state: "failed", kind: outcome.kind, message: outcome.message };
    }

    const { title, content, nextUrl } = outcome.page;
    ctx.collector.emit({ index, url, title, content });
    console.log(`  [${index + 1}] ${title}`);
    return { state: "succeeded", next: nextUrl };
  });
}

/**
 * Schedule a chapter task and, once it succeeds, its continuation.
 * The continuation is spawned before this task settles, which keeps the
 * collector from seeing the run as finished in between.
 */
export function spawnChapter(ctx: CrawlContext, index: ChapterIndex, url: PageIdentity): void {
  ctx.collector.spawn(async () => {
    let outcome: ChapterTaskOutcome;
    try {
      outcome = await runChapterTask(ctx, index, url);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      ctx.collector.fail({ index, url, kind: "internal", message });
      console.error(`  [${index + 1}] FAILED: ${message}`);
      return;
    }

    if (outcome.state !== "succeeded" || outcome.next === null) {
      return;
    }

    const nextIndex = index + 1;
    if (ctx.maxChapters !== null && nextIndex >= ctx.maxChapters) {
      console.log(`Reached chapter limit (${ctx.maxChapters}), not following ${outcome.next}`);
      return;
    }

    spawnChapter(ctx, nextIndex, outcome.next);
  });
}

/**
 * Crawl a whole chain from its start page and wait until every task is done.
 * Per-page failures truncate the chain at that page; they never reject.
 */
export async function crawlChain(fetchPage: PageFetcher, options: CrawlOptions): Promise<CrawlReport> {
  const ctx = createCrawlContext(fetchPage, options);

  spawnChapter(ctx, 0, options.startUrl);
  const { chapters, failures, skipped } = await ctx.collector.drained();

  return {
    chapters,
    failures,
    skipped,
    cancelled: ctx.signal?.aborted ?? false,
    peakConcurrency: ctx.limiter.peakActive,
  };
}
