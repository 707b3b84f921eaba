#!/usr/bin/env node
/**
 * Create an EPUB book from a Bluesky author's feed
 *
 * Usage: skybook <profile> [options]
 * Example: skybook alice.bsky.social --count 30 --output alice.epub
 *
 * Options:
 *   --count, -c <n>     Number of posts to fetch (default: 20)
 *   --output, -o <path> Output EPUB path (default: <handle>.epub)
 *   --cover <path>      Also save the cover image as JPEG
 *   --timeout <s>       Per-request timeout in seconds (default: 30)
 *   --verbose, -v       Enable verbose logging
 */

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { BlueskyClient, MAX_FEED_LIMIT } from "./bluesky.js";
import { ContentExtractor } from "./content.js";
import { CoverGenerator } from "./cover.js";
import { EpubGenerator } from "./epub.js";
import { createLogger } from "./logger.js";
import { runPipeline, type Reporter } from "./pipeline.js";
import {
  extractHandleFromUrl,
  formatKb,
  getErrorMessage,
  getNullableStringArg,
  getNumberArg,
  getPositionalArg,
  hasFlag,
  hasHelpFlag,
  onInterrupt,
  sanitizeFilename,
  setupSignalHandlers,
  withResources,
} from "./utils.js";

export const DEFAULT_POST_COUNT = 20;
export const DEFAULT_TIMEOUT_SECONDS = 30;

/** Flags that take values, used for positional argument detection */
const VALUE_FLAGS = ["--count", "-c", "--output", "-o", "--cover", "--timeout"];

/** Parsed command line options */
export interface CliOptions {
  /** Handle or profile URL as given */
  profile: string;
  count: number;
  output: string | null;
  coverPath: string | null;
  timeoutSeconds: number;
  verbose: boolean;
  showHelp: boolean;
}

/**
 * Print usage information.
 */
function showUsage(): void {
  console.log("Usage: skybook <profile> [options]");
  console.log("");
  console.log("Create an EPUB ebook from the links in a Bluesky feed.");
  console.log("PROFILE is a handle (alice.bsky.social) or a profile URL");
  console.log("(https://bsky.app/profile/alice.bsky.social).");
  console.log("");
  console.log("Options:");
  console.log("  --count, -c <n>      Number of posts to fetch (default: 20)");
  console.log("  --output, -o <path>  Output EPUB file path (default: <handle>.epub)");
  console.log("  --cover <path>       Also save the cover image as JPEG");
  console.log("  --timeout <s>        Per-request timeout in seconds (default: 30)");
  console.log("  --verbose, -v        Enable verbose output");
  console.log("  --help, -h           Show this help message");
  console.log("");
  console.log("Examples:");
  console.log("  skybook alice.bsky.social");
  console.log("  skybook https://bsky.app/profile/alice.bsky.social --count 30");
  console.log("  skybook alice.bsky.social --output my-book.epub --verbose");
}

/**
 * Parse command line arguments.
 *
 * @param args - Command line arguments (defaults to process.argv)
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  return {
    profile: getPositionalArg(args, VALUE_FLAGS),
    count: getNumberArg(args, ["--count", "-c"], DEFAULT_POST_COUNT),
    output: getNullableStringArg(args, ["--output", "-o"]),
    coverPath: getNullableStringArg(args, "--cover"),
    timeoutSeconds: getNumberArg(args, "--timeout", DEFAULT_TIMEOUT_SECONDS),
    verbose: hasFlag(args, ["--verbose", "-v"]),
    showHelp: hasHelpFlag(args),
  };
}

/**
 * Output path for a handle when none is given.
 *
 * @example
 * defaultOutputPath('alice.bsky.social') // 'alice.bsky.social.epub'
 */
export function defaultOutputPath(handle: string): string {
  return `${sanitizeFilename(handle)}.epub`;
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
 * Display a progress bar in the terminal.
 * Shows percentage, counts, and current item label.
 *
 * @param current - Current item number (1-based)
 * @param total - Total number of items
 * @param label - Label of the item just processed
 */
export function progressBar(current: number, total: number, label: string): void {
  const barWidth = 30;
  const percent = Math.round((current / total) * 100);
  const filled = Math.round((current / total) * barWidth);
  const empty = barWidth - filled;
  const bar = "=".repeat(filled) + " ".repeat(empty);

  // Truncate label to fit in terminal
  const maxLabelLen = 40;
  const shortLabel = label.length > maxLabelLen ? `${label.slice(0, maxLabelLen - 3)}...` : label.padEnd(maxLabelLen);

  process.stdout.write(`\r[${bar}] ${percent.toString().padStart(3)}% (${current}/${total}) ${shortLabel}`);

  if (current === total) {
    process.stdout.write("\n");
  }
}

const consoleReporter: Reporter = {
  step: (message) => console.log(message),
  progress: progressBar,
};

/**
 * Main entry point.
 * Fetches the feed, extracts linked articles, and writes the EPUB.
 *
 * @throws Exits with code 1 if no profile is given or the run fails
 */
export async function main(args: string[] = process.argv.slice(2)): Promise<void> {
  const options = parseArgs(args);

  if (options.showHelp) {
    showUsage();
    process.exit(0);
    return;
  }

  if (!options.profile) {
    showUsage();
    process.exit(1);
    return;
  }

  if (options.count < 1 || options.timeoutSeconds < 1) {
    console.error("Error: --count and --timeout must be positive numbers");
    process.exit(1);
    return;
  }

  if (options.count > MAX_FEED_LIMIT) {
    console.error(`Error: --count must be at most ${MAX_FEED_LIMIT}`);
    process.exit(1);
    return;
  }

  const logger = createLogger({ level: options.verbose ? "debug" : "warn" });
  const handle = extractHandleFromUrl(options.profile);
  const outputPath = options.output ?? defaultOutputPath(handle);
  const timeoutMs = options.timeoutSeconds * 1000;

  const feed = new BlueskyClient({ timeoutMs, logger: logger.child("bluesky") });
  const extractor = new ContentExtractor({ timeoutMs, logger: logger.child("content") });
  const cover = new CoverGenerator({ timeoutMs, logger: logger.child("cover") });
  const book = new EpubGenerator({ logger: logger.child("epub") });
  const resources = [feed, extractor, cover];

  onInterrupt(() => {
    for (const resource of resources) resource.close();
  });

  const start = Date.now();
  try {
    const result = await withResources(resources, () =>
      runPipeline(
        { handle, count: options.count, outputPath, coverPath: options.coverPath },
        { feed, extractor, cover, book },
        logger,
        consoleReporter,
      ),
    );

    switch (result.status) {
      case "no-posts":
        console.error("No posts with links found.");
        return;
      case "no-articles":
        console.error("No articles could be extracted.");
        return;
      case "created":
        console.log(`Successfully created: ${result.outputPath}`);
        console.log(`  Articles: ${result.articleCount}`);
        console.log(`  Size: ${formatKb(result.sizeBytes)}`);
        console.log(`  Time: ${formatDuration(Date.now() - start)}`);
        return;
    }
  } catch (error) {
    logger.error("An error occurred", error);
    console.error(`Error: ${getErrorMessage(error)}`);
    process.exit(1);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Only run main when executed directly (not when imported for testing)
if (isEntryPoint()) {
  setupSignalHandlers();
  main().catch((error: unknown) => {
    console.error("Error:", getErrorMessage(error));
    process.exit(1);
  });
}
