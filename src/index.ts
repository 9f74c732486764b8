#!/usr/bin/env node
/**
 * Crawl a chain of "next chapter" links and merge the chapters into one document
 *
 * Usage: npm start -- <start-url> [options]
 * Example: npm start -- https://example.com/book/intro.html --output output/book.html
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { InterruptedError, PersistenceError, StartupError } from "./errors.js";
import {
  DEFAULT_CONTENT_SELECTOR,
  DEFAULT_FETCH_TIMEOUT,
  DEFAULT_NEXT_SELECTOR,
  type FetcherOptions,
  createPageFetcher,
  isValidSelector,
} from "./fetcher.js";
import { DEFAULT_MAX_CONCURRENCY } from "./limiter.js";
import { DEFAULT_TITLE, isMarkdownPath, renderHtmlDocument, renderMarkdownDocument, writeDocument } from "./merge.js";
import { crawlChain } from "./scrape.js";
import type { PageFetcher, PageIdentity } from "./types.js";
import {
  exitCodeForSignal,
  formatDuration,
  getNullableStringArg,
  getPositionalArg,
  getStringArg,
  hasHelpFlag,
  onInterrupt,
  setupSignalHandlers,
  validateUrl,
} from "./utils.js";

export const DEFAULT_OUTPUT_PATH = "output/book.html";

/** Longest delay setTimeout accepts (2^31 - 1 ms) */
export const MAX_TIMEOUT_MS = 2147483647;

/** Options as given on the command line, before validation */
export interface CliOptions {
  startUrl: string;
  outputPath: string;
  /** Raw values of the numeric flags, null when absent */
  maxConcurrency: string | null;
  maxChapters: string | null;
  name: string;
  contentSelector: string;
  nextSelector: string;
  timeoutMs: string | null;
  showHelp: boolean;
}

/** Validated configuration for one run */
export interface RunConfig {
  startUrl: PageIdentity;
  outputPath: string;
  format: "html" | "markdown";
  title: string;
  maxConcurrency: number;
  maxChapters: number | null;
  fetcher: Pick<FetcherOptions, "contentSelector" | "nextSelector" | "timeoutMs">;
}

export interface RunSummary {
  chapterCount: number;
  failureCount: number;
  skippedCount: number;
  cancelled: boolean;
  outputPath: string;
  duration: number;
}

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = ["--output", "--concurrency", "--max-chapters", "--name", "--content", "--next", "--timeout"];

/**
 * Print usage information.
 */
function showUsage(): void {
  console.log("Usage: npm start -- <start-url> [options]");
  console.log("");
  console.log('Follow "next chapter" links from the start page and merge every chapter into one document.');
  console.log("");
  console.log("Options:");
  console.log(`  --output <path>      Output file, .md for markdown (default: ${DEFAULT_OUTPUT_PATH})`);
  console.log(`  --concurrency <n>    Maximum simultaneous requests (default: ${DEFAULT_MAX_CONCURRENCY})`);
  console.log("  --max-chapters <n>   Stop after this many chapters (default: no limit)");
  console.log(`  --name "title"       Document title (default: "${DEFAULT_TITLE}")`);
  console.log(`  --content <sel>      Chapter content selector (default: ${DEFAULT_CONTENT_SELECTOR})`);
  console.log(`  --next <sel>         Next chapter link selector (default: ${DEFAULT_NEXT_SELECTOR})`);
  console.log(`  --timeout <ms>       Per-page request timeout (default: ${DEFAULT_FETCH_TIMEOUT})`);
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Example:");
  console.log("  npm start -- https://example.com/book/intro.html --output output/book.md --concurrency 8");
}

/**
 * Parse command line arguments.
 *
 * @param args - Command line arguments (defaults to process.argv)
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    startUrl: getPositionalArg(args, VALUE_FLAGS),
    outputPath: getStringArg(args, "--output", DEFAULT_OUTPUT_PATH),
    maxConcurrency: getNullableStringArg(args, "--concurrency"),
    maxChapters: getNullableStringArg(args, "--max-chapters"),
    name: getStringArg(args, "--name", DEFAULT_TITLE),
    contentSelector: getStringArg(args, "--content", DEFAULT_CONTENT_SELECTOR),
    nextSelector: getStringArg(args, "--next", DEFAULT_NEXT_SELECTOR),
    timeoutMs: getNullableStringArg(args, "--timeout"),
    showHelp: hasHelpFlag(args),
  };
}

function parsePositiveInteger(flag: string, value: string): number {
  const parsed = /^\d+$/.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new StartupError(`${flag} must be a positive integer, got ${value}`);
  }
  return parsed;
}

/**
 * Validate parsed options into a run configuration.
 *
 * @throws {StartupError} If the start URL, a numeric option or a selector is invalid
 */
export function resolveRunConfig(options: CliOptions): RunConfig {
  const urlValidation = validateUrl(options.startUrl);
  if (!urlValidation.isValid) {
    throw new StartupError(`${urlValidation.error}: ${options.startUrl}`);
  }

  const maxConcurrency =
    options.maxConcurrency === null
      ? DEFAULT_MAX_CONCURRENCY
      : parsePositiveInteger("--concurrency", options.maxConcurrency);
  const maxChapters =
    options.maxChapters === null ? null : parsePositiveInteger("--max-chapters", options.maxChapters);
  const timeoutMs =
    options.timeoutMs === null ? DEFAULT_FETCH_TIMEOUT : parsePositiveInteger("--timeout", options.timeoutMs);
  if (timeoutMs > MAX_TIMEOUT_MS) {
    throw new StartupError(`--timeout must be at most ${MAX_TIMEOUT_MS}, got ${options.timeoutMs}`);
  }

  if (!isValidSelector(options.contentSelector)) {
    throw new StartupError(`Invalid --content selector: ${options.contentSelector}`);
  }
  if (!isValidSelector(options.nextSelector)) {
    throw new StartupError(`Invalid --next selector: ${options.nextSelector}`);
  }

  return {
    startUrl: new URL(options.startUrl).href,
    outputPath: options.outputPath,
    format: isMarkdownPath(options.outputPath) ? "markdown" : "html",
    title: options.name,
    maxConcurrency,
    maxChapters,
    fetcher: {
      contentSelector: options.contentSelector,
      nextSelector: options.nextSelector,
      timeoutMs,
    },
  };
}

/**
 * Crawl the chain, assemble the document and write it.
 * Per-page failures are reported but never abort the run.
 *
 * @throws {PersistenceError} If the output cannot be written
 */
export async function runPipeline(config: RunConfig, fetchPage: PageFetcher, signal?: AbortSignal): Promise<RunSummary> {
  const start = Date.now();

  console.log(`Crawling from ${config.startUrl} (concurrency ${config.maxConcurrency})...\n`);

  const report = await crawlChain(fetchPage, {
    startUrl: config.startUrl,
    maxConcurrency: config.maxConcurrency,
    maxChapters: config.maxChapters,
    signal,
  });

  if (report.cancelled) {
    console.log("\nCrawl cancelled, assembling what was collected.");
  }
  console.log(`\nCrawl complete. Scraped ${report.chapters.length} chapters.`);

  const document =
    config.format === "markdown"
      ? renderMarkdownDocument(report.chapters, config.title, config.startUrl)
      : renderHtmlDocument(report.chapters, config.title);
  await writeDocument(config.outputPath, document);
  console.log(`Saved ${config.format} document to ${config.outputPath}`);

  if (report.skipped.length > 0) {
    console.log(`Skipped ${report.skipped.length} already visited URL(s).`);
  }
  if (report.failures.length > 0) {
    console.log(`\nFailed pages (${report.failures.length}):`);
    for (const { index, url, kind } of report.failures) {
      console.log(`  [${index + 1}] ${url} (${kind})`);
    }
  }

  const duration = Date.now() - start;
  console.log(`\nCompleted in ${formatDuration(duration)}`);

  return {
    chapterCount: report.chapters.length,
    failureCount: report.failures.length,
    skippedCount: report.skipped.length,
    cancelled: report.cancelled,
    outputPath: config.outputPath,
    duration,
  };
}

/**
 * Main entry point.
 * Exits with code 1 on a missing or invalid start URL, or when the output cannot be written.
 * On SIGINT/SIGTERM the crawl stops, the chapters collected so far are written,
 * and the process exits with 130/143.
 *
 * @param fetchPage - Page fetcher to crawl with (defaults to an HTTP fetcher built from the options)
 */
export async function main(args: string[] = process.argv.slice(2), fetchPage?: PageFetcher): Promise<void> {
  const options = parseArgs(args);

  if (options.showHelp) {
    showUsage();
    process.exit(0);
  }

  if (!options.startUrl) {
    showUsage();
    process.exit(1);
  }

  let config: RunConfig;
  try {
    config = resolveRunConfig(options);
  } catch (error) {
    if (error instanceof StartupError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const controller = new AbortController();
  const stopListening = onInterrupt((signal) => controller.abort(new InterruptedError(signal)));

  try {
    await runPipeline(config, fetchPage ?? createPageFetcher(config.fetcher), controller.signal);
  } catch (error) {
    if (error instanceof PersistenceError) {
      console.error(`Error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  } finally {
    stopListening();
  }

  if (controller.signal.aborted) {
    const reason: unknown = controller.signal.reason;
    process.exit(reason instanceof InterruptedError ? exitCodeForSignal(reason.signal) : 130);
  }
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

// Only run main when executed directly (not when imported for testing)
if (isEntryPoint()) {
  setupSignalHandlers("Crawl");
  main().catch((error: unknown) => {
    console.error("Error:", error);
    process.exit(1);
  });
}
