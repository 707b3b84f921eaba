/**
 * Utility functions shared by the pipeline stages
 * Extracted for testability
 */

import type { Closeable } from "./types.js";

/** Callback for cleanup actions when process is interrupted */
type CleanupCallback = () => void | Promise<void>;

/** Registered cleanup callbacks for SIGINT handling */
const cleanupCallbacks: CleanupCallback[] = [];

/** Flag to prevent multiple SIGINT handlers from running */
let isExiting = false;

/**
 * Register a cleanup callback to be called when the process receives SIGINT.
 * Multiple callbacks can be registered and will be called in order.
 *
 * @param callback - Async or sync function to call during cleanup
 */
export function onInterrupt(callback: CleanupCallback): void {
  cleanupCallbacks.push(callback);
}

/**
 * Setup shutdown handlers for SIGINT (Ctrl+C) and SIGTERM.
 * Prints a short notice to stderr instead of a stack trace and exits with code 1.
 * Should be called once at the start of the main entry point.
 */
export function setupSignalHandlers(): void {
  const handler = async () => {
    if (isExiting) return;
    isExiting = true;

    console.error("\nInterrupted by user");

    for (const callback of cleanupCallbacks) {
      try {
        await callback();
      } catch (error) {
        console.error(`Cleanup failed: ${getErrorMessage(error)}`);
      }
    }

    process.exit(1);
  };

  process.on("SIGINT", () => void handler());
  process.on("SIGTERM", () => void handler());
}

/**
 * Run a function while holding resources, then close them in reverse order,
 * whether the function resolves or throws.
 *
 * @param resources - Resources owning connections or handles
 * @param fn - Work to perform while the resources are open
 * @returns Whatever fn resolves to
 *
 * @example
 * const client = new BlueskyClient();
 * const posts = await withResources([client], () => client.getAuthorFeed('alice.test', 20));
 */
export async function withResources<T>(resources: readonly Closeable[], fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } finally {
    for (const resource of [...resources].reverse()) {
      await resource.close();
    }
  }
}

/**
 * Message of a thrown value, for one-line user output.
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Make a string safe to use as a filename.
 * Replaces characters reserved on common filesystems with underscores
 * and truncates to 200 characters.
 *
 * @example
 * sanitizeFilename('alice.bsky.social') // 'alice.bsky.social'
 * sanitizeFilename('a/b:c') // 'a_b_c'
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, "_").slice(0, 200);
}

/**
 * Extract a Bluesky handle from a profile URL, or return the input unchanged.
 *
 * @example
 * extractHandleFromUrl('https://bsky.app/profile/alice.bsky.social') // 'alice.bsky.social'
 * extractHandleFromUrl('alice.bsky.social') // 'alice.bsky.social'
 */
export function extractHandleFromUrl(profile: string): string {
  if (!profile.startsWith("http://") && !profile.startsWith("https://")) {
    return profile;
  }

  let parsed: URL;
  try {
    parsed = new URL(profile);
  } catch {
    return profile;
  }

  if (parsed.host.includes("bsky.app") && parsed.pathname.includes("/profile/")) {
    return parsed.pathname.replace("/profile/", "").replace(/^\/+|\/+$/g, "");
  }

  // Unknown URL shape: leave it to the API to reject
  return profile;
}

/**
 * Truncate text to a maximum length, adding an ellipsis if needed.
 *
 * @example
 * truncateText('hello world', 8) // 'hello...'
 */
export function truncateText(text: string, maxLength = 100): string {
  if (text.length <= maxLength) return text;
  return `${text.slice(0, maxLength - 3)}...`;
}

/**
 * Escape the five XML special characters.
 *
 * @example
 * escapeXml('Tom & "Jerry"') // 'Tom &amp; &quot;Jerry&quot;'
 */
export function escapeXml(text: string | undefined | null): string {
  if (!text) return "";
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

/**
 * Format a byte count as kilobytes with one decimal.
 *
 * @example
 * formatKb(2560) // '2.5 KB'
 */
export function formatKb(bytes: number): string {
  return `${(bytes / 1024).toFixed(1)} KB`;
}

// ============================================================================
// Argument Parsing Helpers
// ============================================================================

/** A flag name or a list of equivalent spellings (e.g., ['--count', '-c']) */
export type FlagName = string | readonly string[];

function matchesFlag(arg: string, flag: FlagName): boolean {
  return typeof flag === "string" ? arg === flag : flag.includes(arg);
}

/**
 * Check if help flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @returns True if --help or -h is present
 */
export function hasHelpFlag(args: string[]): boolean {
  return args.includes("--help") || args.includes("-h");
}

/**
 * Check if a boolean flag is present in arguments.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., ['--verbose', '-v'])
 */
export function hasFlag(args: string[], flag: FlagName): boolean {
  return args.some((arg) => matchesFlag(arg, flag));
}

/**
 * Get a nullable string argument value from command line arguments.
 * If the flag appears multiple times, returns the last value.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--output')
 * @returns The argument value or null if not found
 */
export function getNullableStringArg(args: string[], flag: FlagName): string | null {
  let result: string | null = null;
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (matchesFlag(args[i], flag) && value && !value.startsWith("-")) {
      result = value;
    }
  }
  return result;
}

/**
 * Get a number argument value from command line arguments.
 * Values that are not numbers are ignored.
 *
 * @param args - Command line arguments array
 * @param flag - Flag to look for (e.g., '--count')
 * @param defaultValue - Default value if flag not found
 * @returns The parsed number or default
 */
export function getNumberArg(args: string[], flag: FlagName, defaultValue: number): number {
  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (matchesFlag(args[i], flag) && value) {
      const parsed = parseInt(value, 10);
      if (!isNaN(parsed)) {
        return parsed;
      }
    }
  }
  return defaultValue;
}

/**
 * Get the first positional (non-flag) argument.
 * Skips values that follow flags (e.g., in '--count 10', skips '10').
 *
 * @param args - Command line arguments array
 * @param valueFlags - Flags that take values (to skip their values)
 * @returns The first non-flag argument or empty string
 */
export function getPositionalArg(args: string[], valueFlags: readonly string[] = []): string {
  let skipNext = false;
  for (const arg of args) {
    if (skipNext) {
      skipNext = false;
      continue;
    }
    if (valueFlags.includes(arg)) {
      skipNext = true;
      continue;
    }
    if (!arg.startsWith("-")) {
      return arg;
    }
  }
  return "";
}
