/**
 * Shared type definitions for the chapter chain crawler
 */

/** Absolute URL as serialised by the WHATWG URL parser; the deduplication key */
export type PageIdentity = string;

/** Zero-based position of a page in its chain */
export type ChapterIndex = number;

/** A successfully fetched chapter, emitted exactly once per page */
export interface ChapterResult {
  index: ChapterIndex;
  url: PageIdentity;
  /** Chapter title extracted from the page */
  title: string;
  /** Inner HTML of the chapter content element */
  content: string;
}

/** Ways a single page fetch can fail */
export type FetchFailureKind = "network" | "decode" | "content-not-found";

/** Failure recorded by the driver; `internal` marks an unexpected exception */
export interface ChapterFailure {
  index: ChapterIndex;
  url: PageIdentity;
  kind: FetchFailureKind | "internal";
  message: string;
}

/** What the fetcher extracted from one page */
export interface FetchedPage {
  title: string;
  content: string;
  /** Resolved "next chapter" link, or null when the chain ends here */
  nextUrl: PageIdentity | null;
}

export type FetchOutcome =
  | { ok: true; page: FetchedPage }
  | { ok: false; kind: FetchFailureKind; message: string };

/** Fetch one page and extract its chapter. Must not retry or cache. */
export type PageFetcher = (url: PageIdentity, signal?: AbortSignal) => Promise<FetchOutcome>;

/** Everything the collector gathered by the time the run went quiet */
export interface CollectedRun {
  chapters: ChapterResult[];
  failures: ChapterFailure[];
  /** URLs whose claim was rejected because they had already been visited */
  skipped: PageIdentity[];
}
