/**
 * Page fetching and chapter extraction over plain HTTP.
 *
 * One request per call, parsed with cheerio. No retries, no caching.
 */

import * as cheerio from "cheerio";
import type { FetchOutcome, PageFetcher, PageIdentity } from "./types.js";
import { resolveUrl } from "./utils.js";

/**
 * Realistic Chrome user agent to avoid bot detection.
 * Matches a recent stable Chrome version on macOS.
 */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export const DEFAULT_CONTENT_SELECTOR = "main";
export const DEFAULT_NEXT_SELECTOR = "a[title='Next chapter']";
export const DEFAULT_FETCH_TIMEOUT = 30000;

export interface FetcherOptions {
  /** Element whose inner HTML is the chapter */
  contentSelector: string;
  /** Link whose href points at the next chapter */
  nextSelector: string;
  /** Per-page limit covering both the request and reading the body (ms) */
  timeoutMs: number;
  userAgent: string;
  fetchImpl: typeof fetch;
}

export const DEFAULT_FETCHER_OPTIONS: FetcherOptions = {
  contentSelector: DEFAULT_CONTENT_SELECTOR,
  nextSelector: DEFAULT_NEXT_SELECTOR,
  timeoutMs: DEFAULT_FETCH_TIMEOUT,
  userAgent: DEFAULT_USER_AGENT,
  fetchImpl: (input, init) => fetch(input, init),
};

/** Parsed pieces of one chapter page */
export interface ExtractedChapter {
  title: string;
  /** Null when the content selector matched nothing */
  content: string | null;
  nextUrl: PageIdentity | null;
}

/** Whether cheerio can parse the CSS selector */
export function isValidSelector(selector: string): boolean {
  if (selector.trim() === "") return false;
  try {
    cheerio.load("")(selector);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pull title, content and next link out of a chapter page.
 * A next link that cannot be resolved counts as no next link.
 */
export function extractChapter(
  html: string,
  pageUrl: PageIdentity,
  contentSelector: string,
  nextSelector: string,
): ExtractedChapter {
  const $ = cheerio.load(html);

  const title =
    $("h1").first().text().trim() ||
    $('meta[property="og:title"]').attr("content")?.trim() ||
    $("title").first().text().trim() ||
    "Untitled";

  const contentElement = $(contentSelector).first();
  const content = contentElement.length > 0 ? (contentElement.html() ?? "") : null;

  const href = $(nextSelector).first().attr("href");
  const nextUrl = href === undefined ? null : resolveUrl(href, pageUrl);

  return { title, content, nextUrl };
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create a PageFetcher bound to the given selectors and HTTP settings.
 *
 * @param overrides - Options replacing the defaults
 */
export function createPageFetcher(overrides: Partial<FetcherOptions> = {}): PageFetcher {
  const options: FetcherOptions = { ...DEFAULT_FETCHER_OPTIONS, ...overrides };

  return async (url: PageIdentity, signal?: AbortSignal): Promise<FetchOutcome> => {
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Timed out after ${options.timeoutMs}ms`)),
      options.timeoutMs,
    );
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      forwardAbort();
    } else {
      signal?.addEventListener("abort", forwardAbort, { once: true });
    }

    try {
      let response: Response;
      try {
        response = await options.fetchImpl(url, {
          headers: { "User-Agent": options.userAgent },
          signal: controller.signal,
        });
      } catch (error) {
        return { ok: false, kind: "network", message: `Request failed for ${url}: ${errorMessage(error)}` };
      }

      if (!response.ok) {
        return { ok: false, kind: "network", message: `HTTP ${response.status} for ${url}` };
      }

      let html: string;
      try {
        html = await response.text();
      } catch (error) {
        return { ok: false, kind: "decode", message: `Failed to read response from ${url}: ${errorMessage(error)}` };
      }

      const { title, content, nextUrl } = extractChapter(html, url, options.contentSelector, options.nextSelector);
      if (content === null) {
        return {
          ok: false,
          kind: "content-not-found",
          message: `No element matching "${options.contentSelector}" on ${url}`,
        };
      }

      return { ok: true, page: { title, content, nextUrl } };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener("abort", forwardAbort);
    }
  };
}
