import { beforeEach, describe, expect, it, vi } from "vitest";
import { PersistenceError } from "./errors.js";
import {
  CHAPTER_SEPARATOR,
  chapterToMarkdown,
  generateTocEntry,
  isMarkdownPath,
  renderHtmlDocument,
  renderMarkdownDocument,
  sortChapters,
  wrapHtmlDocument,
  writeDocument,
} from "./merge.js";
import type { ChapterResult } from "./types.js";

// Mock fs/promises
vi.mock("node:fs/promises", () => ({
  mkdir: vi.fn(),
  writeFile: vi.fn(),
}));

// Import mocked fs after vi.mock
import * as fs from "node:fs/promises";

const chapter = (index: number, content: string, title = `Chapter ${index + 1}`): ChapterResult => ({
  index,
  url: `https://example.com/${index}`,
  title,
  content,
});

describe("sortChapters", () => {
  it("orders by ascending index regardless of arrival order", () => {
    const arrived = [chapter(2, "c"), chapter(0, "a"), chapter(3, "d"), chapter(1, "b")];
    expect(sortChapters(arrived).map((c) => c.index)).toEqual([0, 1, 2, 3]);
  });

  it("does not modify the input", () => {
    const arrived = [chapter(1, "b"), chapter(0, "a")];
    sortChapters(arrived);
    expect(arrived.map((c) => c.index)).toEqual([1, 0]);
  });

  it("keeps arrival order for equal indices", () => {
    const arrived = [chapter(1, "first"), chapter(0, "zero"), chapter(1, "second")];
    expect(sortChapters(arrived).map((c) => c.content)).toEqual(["zero", "first", "second"]);
  });
});

describe("wrapHtmlDocument", () => {
  it("wraps the body in the document shell", () => {
    const html = wrapHtmlDocument("Book", "<p>x</p>");

    expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">\n<head><meta charset="UTF-8"><title>Book</title>\n')).toBe(
      true,
    );
    expect(html.endsWith("</head>\n<body><p>x</p></body>\n</html>\n")).toBe(true);
  });

  it("escapes the title", () => {
    expect(wrapHtmlDocument("Tom & <Jerry>", "")).toContain("<title>Tom &amp; &lt;Jerry&gt;</title>");
  });
});

describe("renderHtmlDocument", () => {
  it("joins fragments in index order with the separator", () => {
    const html = renderHtmlDocument([chapter(2, "B_content"), chapter(0, "start_content"), chapter(1, "A_content")], "Book");

    expect(CHAPTER_SEPARATOR).toBe("<hr />\n");
    expect(html).toBe(wrapHtmlDocument("Book", "start_content<hr />\nA_content<hr />\nB_content"));
  });

  it("uses the default title", () => {
    expect(renderHtmlDocument([chapter(0, "x")])).toContain("<title>Scraped Documentation</title>");
  });

  it("renders an empty body when nothing was collected", () => {
    expect(renderHtmlDocument([], "Empty")).toContain("<body></body>");
  });
});

describe("generateTocEntry", () => {
  it("generates numbered markdown link", () => {
    expect(generateTocEntry(chapter(0, "", "Introduction"))).toBe("1. [Introduction](#introduction)");
  });

  it("handles titles with special characters", () => {
    expect(generateTocEntry(chapter(9, "", "Chapter 10: The End (Final)"))).toBe(
      "10. [Chapter 10: The End (Final)](#chapter-10-the-end-final)",
    );
  });
});

describe("chapterToMarkdown", () => {
  it("keeps a heading the content already starts with", () => {
    expect(chapterToMarkdown(chapter(0, "<h1>Intro</h1><p>Text</p>", "Ignored"))).toBe("# Intro\n\nText");
  });

  it("adds the title as H1 when the content has none", () => {
    expect(chapterToMarkdown(chapter(0, "<p>Text</p>", "Intro"))).toBe("# Intro\n\nText");
  });

  it("drops scripts and styles", () => {
    expect(chapterToMarkdown(chapter(0, "<p>Text</p><script>alert(1)</script><style>p{}</style>", "T"))).toBe(
      "# T\n\nText",
    );
  });
});

describe("renderMarkdownDocument", () => {
  it("renders title block, TOC and chapters in index order", () => {
    const markdown = renderMarkdownDocument(
      [chapter(1, "<p>Two</p>", "Second"), chapter(0, "<h1>First</h1><p>One</p>", "First")],
      "Book",
      "https://example.com/0",
    );

    expect(markdown).toBe(
      [
        "# Book\n",
        "Scraped from: https://example.com/0",
        "Chapters: 2",
        "\n---\n",
        "## Table of Contents\n",
        "1. [First](#first)",
        "2. [Second](#second)",
        "\n---\n",
        "# First\n\nOne",
        "\n---\n",
        "# Second\n\nTwo",
        "\n---\n",
      ].join("\n"),
    );
  });

  it("omits the source line without a start URL", () => {
    expect(renderMarkdownDocument([], "Book")).toBe(
      ["# Book\n", "Chapters: 0", "\n---\n", "## Table of Contents\n", "\n---\n"].join("\n"),
    );
  });
});

describe("isMarkdownPath", () => {
  it("detects markdown extensions", () => {
    expect(isMarkdownPath("output/book.md")).toBe(true);
    expect(isMarkdownPath("book.MARKDOWN")).toBe(true);
    expect(isMarkdownPath("output/book.html")).toBe(false);
    expect(isMarkdownPath("md")).toBe(false);
  });
});

describe("writeDocument", () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("creates the directory and writes UTF-8", async () => {
    vi.mocked(fs.mkdir).mockResolvedValueOnce(undefined);
    vi.mocked(fs.writeFile).mockResolvedValueOnce(undefined);

    await writeDocument("output/book.html", "<p>x</p>");

    expect(fs.mkdir).toHaveBeenCalledWith("output", { recursive: true });
    expect(fs.writeFile).toHaveBeenCalledWith("output/book.html", "<p>x</p>", "utf-8");
  });

  it("wraps write failures in PersistenceError", async () => {
    vi.mocked(fs.mkdir).mockResolvedValueOnce(undefined);
    vi.mocked(fs.writeFile).mockRejectedValueOnce(new Error("EACCES: permission denied"));

    const result = writeDocument("output/book.html", "x");

    await expect(result).rejects.toBeInstanceOf(PersistenceError);
    await expect(result).rejects.toThrow("Could not write output/book.html: EACCES: permission denied");
  });

  it("wraps directory failures in PersistenceError", async () => {
    vi.mocked(fs.mkdir).mockRejectedValueOnce(new Error("ENOTDIR"));

    await expect(writeDocument("file.txt/book.html", "x")).rejects.toThrow(
      "Could not write file.txt/book.html: ENOTDIR",
    );
    expect(fs.writeFile).not.toHaveBeenCalled();
  });
});
