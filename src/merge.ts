/**
 * Assemble collected chapters into a single document
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import TurndownService from "turndown";
import { PersistenceError } from "./errors.js";
import type { ChapterResult } from "./types.js";
import { escapeHtml, generateAnchor } from "./utils.js";

export const DEFAULT_TITLE = "Scraped Documentation";

/** Placed between consecutive chapters in the HTML output */
export const CHAPTER_SEPARATOR = "<hr />\n";

const DOCUMENT_STYLE =
  "body { font-family: sans-serif; line-height: 1.6; max-width: 800px; margin: 2rem auto; padding: 0 1rem; } " +
  "h1, h2, h3 { line-height: 1.2; } hr { margin: 3rem 0; }";

const markdownConverter = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
});

// Remove script/style elements from conversion
markdownConverter.remove(["script", "style", "noscript", "iframe"]);

/**
 * Order chapters by ascending index. Stable, and leaves the input untouched.
 */
export function sortChapters(chapters: readonly ChapterResult[]): ChapterResult[] {
  return [...chapters].sort((a, b) => a.index - b.index);
}

/**
 * Wrap an HTML body in the fixed standalone document shell.
 */
export function wrapHtmlDocument(title: string, body: string): string {
  return [
    "<!DOCTYPE html>",
    '<html lang="en">',
    `<head><meta charset="UTF-8"><title>${escapeHtml(title)}</title>`,
    `<style>${DOCUMENT_STYLE}</style>`,
    "</head>",
    `<body>${body}</body>`,
    "</html>",
    "",
  ].join("\n");
}

/**
 * Render chapters as one HTML document, in index order.
 */
export function renderHtmlDocument(chapters: readonly ChapterResult[], title: string = DEFAULT_TITLE): string {
  const body = sortChapters(chapters)
    .map((chapter) => chapter.content)
    .join(CHAPTER_SEPARATOR);
  return wrapHtmlDocument(title, body);
}

/**
 * Generate a table of contents entry for a chapter.
 *
 * @returns Formatted TOC entry (e.g., '1. [Introduction](#introduction)')
 */
export function generateTocEntry(chapter: ChapterResult): string {
  const anchor = generateAnchor(chapter.title);
  return `${chapter.index + 1}. [${chapter.title}](#${anchor})`;
}

/**
 * Convert one chapter to markdown, adding its title as H1 if not already present.
 */
export function chapterToMarkdown(chapter: ChapterResult): string {
  const markdown = markdownConverter.turndown(chapter.content);
  return markdown.startsWith("#") ? markdown : `# ${chapter.title}\n\n${markdown}`;
}

/**
 * Render chapters as one markdown document with a title block and TOC.
 */
export function renderMarkdownDocument(
  chapters: readonly ChapterResult[],
  title: string = DEFAULT_TITLE,
  startUrl?: string,
): string {
  const sorted = sortChapters(chapters);
  const parts: string[] = [];

  parts.push(`# ${title}\n`);
  if (startUrl) {
    parts.push(`Scraped from: ${startUrl}`);
  }
  parts.push(`Chapters: ${sorted.length}`);
  parts.push("\n---\n");

  parts.push("## Table of Contents\n");
  for (const chapter of sorted) {
    parts.push(generateTocEntry(chapter));
  }
  parts.push("\n---\n");

  for (const chapter of sorted) {
    parts.push(chapterToMarkdown(chapter));
    parts.push("\n---\n");
  }

  return parts.join("\n");
}

/** Markdown output is chosen by the output file's extension */
export function isMarkdownPath(outputPath: string): boolean {
  return /\.(md|markdown)$/i.test(outputPath);
}

/**
 * Write the document, creating its directory first.
 *
 * @throws {PersistenceError} If the directory or file cannot be written
 */
export async function writeDocument(outputPath: string, contents: string): Promise<void> {
  try {
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, contents, "utf-8");
  } catch (error) {
    throw new PersistenceError(outputPath, error);
  }
}
