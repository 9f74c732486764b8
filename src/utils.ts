/**
 * Utility functions for the crawler
 * Extracted for testability
 */

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = (signal: NodeJS.Signals) => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Signal that started a graceful shutdown, if any */
let interruptedBy: NodeJS.Signals | null = null;

/**
 * Register a cleanup callback to be called when the process receives SIGINT or SIGTERM.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 * @returns Function that unregisters the callback
 */
export function onInterrupt(callback: CleanupCallback): () => void {
  cleanupCallbacks.push(callback);
  return () => {
    const position = cleanupCallbacks.indexOf(callback);
    if (position !== -1) {
      cleanupCallbacks.splice(position, 1);
    }
  };
}

/** Exit code for a process ended by a signal (128 + signal number) */
export function exitCodeForSignal(signal: NodeJS.Signals): number {
  // SIGINT = 2, SIGTERM = 15
  return signal === "SIGINT" ? 130 : 143;
}

/**
 * React to SIGINT/SIGTERM. The first signal runs the cleanup callbacks and
 * leaves the process running so the command can wind down; a second one exits
 * immediately.
 */
export async function handleInterrupt(commandName: string, signal: NodeJS.Signals): Promise<void> {
  if (interruptedBy !== null) {
    console.log(`\n${commandName} aborted.`);
    process.exit(exitCodeForSignal(signal));
  }
  interruptedBy = signal;

  console.log(`\n${commandName} interrupted, finishing up. Press Ctrl+C again to exit immediately.`);

  for (const callback of cleanupCallbacks) {
    try {
      await callback(signal);
    } catch (error) {
      console.error("Cleanup failed:", error instanceof Error ? error.message : String(error));
    }
  }
}

/**
 * Setup graceful shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Should be called once at the start of the main entry point.
 *
 * @param commandName - Name of the command for the interrupt messages (e.g., "Crawl")
 */
export function setupSignalHandlers(commandName: string): void {
  process.on("SIGINT", (signal) => void handleInterrupt(commandName, signal));
  process.on("SIGTERM", (signal) => void handleInterrupt(commandName, signal));
}

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (minutes > 0) {
    return `${minutes}m ${remainingSeconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Generate a markdown anchor from a heading title.
 * Matches the anchor generation used by GitHub/CommonMark style processors.
 *
 * @example
 * generateAnchor('Hello World') // 'hello-world'
 * generateAnchor('Chapter 1: Introduction') // 'chapter-1-introduction'
 */
export function generateAnchor(title: string): string {
  return title
    .toLowerCase()
    .replace(/ /g, "-")
    // Keep Latin (a-z), Cyrillic (а-яё), digits, and hyphens
    .replace(/[^a-zа-яё0-9-]/gi, "")
    .replace(/^-+|-+$/g, "");
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

/** Escape text for use inside HTML element content or attribute values */
export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Resolve an href against the page it was found on.
 *
 * @returns Absolute URL, or null if the href cannot be resolved
 *
 * @example
 * resolveUrl('next.html', 'https://example.com/book/intro.html') // 'https://example.com/book/next.html'
 * resolveUrl('http://', 'https://example.com') // null
 */
export function resolveUrl(href: string, base: string): string | null {
  try {
    return new URL(href, base).href;
  } catch {
    return null;
  }
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/**
 * Check if help flag is present in arguments.
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Get a string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param flag - Flag to look for (e.g., '--name')
 * @param defaultValue - Default value if flag not found
 */
export function getStringArg(args: string[], flag: string, defaultValue: string): string {
  return getNullableStringArg(args, flag) ?? defaultValue;
}

/**
 * Get a nullable string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: string): string | null {
  let result: string | null = null;
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === flag && value && !value.startsWith("--")) {
      result = value;
    }
  }
  return result;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--timeout 1000', skips '1000').
 *
 * @param knownFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], knownFlags: string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (knownFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("--") && !arg.startsWith("-")) {
      return arg;
    }
  }
  return "";
}

// ============================================================================
// Validation Helpers
// ============================================================================

/**
 * Validate that a string is a valid HTTP/HTTPS URL.
 *
 * @example
 * validateUrl('https://example.com') // { isValid: true }
 * validateUrl('not-a-url') // { isValid: false, error: 'Invalid URL format' }
 * validateUrl('ftp://example.com') // { isValid: false, error: 'URL must use http or https protocol' }
 */
export function validateUrl(url: string): { isValid: true } | { isValid: false; error: string } {
  if (!url) {
    return { isValid: false, error: "URL is required" };
  }

  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      return { isValid: false, error: "URL must use http or https protocol" };
    }
    return { isValid: true };
  } catch {
    return { isValid: false, error: "Invalid URL format" };
  }
}
