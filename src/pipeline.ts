/**
 * Feed-to-book pipeline: posts → unique links → articles → cover → EPUB
 *
 * Stages run one after another and hand plain immutable values to the next.
 * Collaborators are injected so the entry point owns their lifetimes.
 */

import { uniqueLinks } from "./links.js";
import type { Logger } from "./logger.js";
import type { Article, ArticleSource, FeedSource } from "./types.js";

export interface PipelineOptions {
  handle: string;
  /** Number of posts to request */
  count: number;
  /** Where the EPUB is written */
  outputPath: string;
  /** Also write the cover image here */
  coverPath?: string | null;
}

/** Cover stage: articles + title → JPEG bytes */
export interface CoverSource {
  generateCover(articles: readonly Article[], options: { title: string; outputPath?: string }): Promise<Buffer>;
}

/** Packaging stage: articles + cover → file, resolving to its size in bytes */
export interface BookWriter {
  createEpub(
    articles: readonly Article[],
    options: { title: string; author: string; cover?: Buffer | null; outputPath: string },
  ): Promise<number>;
}

export interface PipelineDeps {
  feed: FeedSource;
  extractor: ArticleSource;
  cover: CoverSource;
  book: BookWriter;
}

/** User-facing progress output */
export interface Reporter {
  /** A progress line for a pipeline step */
  step(message: string): void;
  /** Progress within the extraction loop (1-based) */
  progress(current: number, total: number, label: string): void;
}

export type PipelineResult =
  | { status: "no-posts" }
  | { status: "no-articles"; linkCount: number }
  | { status: "created"; outputPath: string; articleCount: number; sizeBytes: number };

export function bookTitle(handle: string): string {
  return `${handle} - Bluesky Book`;
}

export function bookAuthor(handle: string): string {
  return `@${handle}`;
}

/**
 * Run the whole pipeline for one handle.
 *
 * Empty feeds and feeds whose links yield no articles end the run without
 * an archive; feed failures propagate to the caller.
 */
export async function runPipeline(
  options: PipelineOptions,
  deps: PipelineDeps,
  logger: Logger,
  reporter: Reporter,
): Promise<PipelineResult> {
  const { handle, count, outputPath } = options;
  logger.info(`Processing feed for @${handle}`);

  // Step 1: Fetch posts
  reporter.step(`Fetching ${count} posts from @${handle}...`);
  const posts = await deps.feed.getAuthorFeed(handle, count);
  if (posts.length === 0) {
    return { status: "no-posts" };
  }
  reporter.step(`Found ${posts.length} posts with links`);

  // Step 2: De-duplicate links across the whole batch
  const links = uniqueLinks(posts);
  reporter.step(`Extracting content from ${links.length} unique links...`);

  // Step 3: Extract articles in post order
  const articles: Article[] = [];
  for (let i = 0; i < links.length; i++) {
    const article = await deps.extractor.extractArticle(links[i]);
    if (article) articles.push(article);
    reporter.progress(i + 1, links.length, article ? article.title : links[i]);
  }
  if (articles.length === 0) {
    return { status: "no-articles", linkCount: links.length };
  }
  reporter.step(`Successfully extracted ${articles.length} articles`);

  // Step 4: Cover
  reporter.step("Generating cover image...");
  const title = bookTitle(handle);
  const cover = await deps.cover.generateCover(articles, {
    title,
    outputPath: options.coverPath ?? undefined,
  });

  // Step 5: EPUB
  reporter.step(`Creating EPUB file: ${outputPath}`);
  const sizeBytes = await deps.book.createEpub(articles, {
    title,
    author: bookAuthor(handle),
    cover,
    outputPath,
  });

  return { status: "created", outputPath, articleCount: articles.length, sizeBytes };
}
