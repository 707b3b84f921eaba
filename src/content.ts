/**
 * Article extraction from linked pages
 *
 * Pages are fetched over an HttpSession, parsed with jsdom and reduced to
 * their main content with Readability. The result is normalized into a
 * single Article shape here, so later stages never see library output.
 */

import { Readability } from "@mozilla/readability";
import { JSDOM, VirtualConsole } from "jsdom";
import TurndownService from "turndown";
import { HttpSession } from "./http.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Article, ArticleSource, Closeable } from "./types.js";
import { getErrorMessage } from "./utils.js";

export const UNTITLED = "Untitled";

const markdownConverter = new TurndownService({
  headingStyle: "atx",
  codeBlockStyle: "fenced",
});

// Remove script/style elements from conversion
markdownConverter.remove(["script", "style", "noscript", "iframe"]);

/** Meta tags holding a preview image, in order of preference */
const THUMBNAIL_SELECTORS = ['meta[property="og:image"]', 'meta[name="twitter:image"]'];

/** Meta tags holding a publication date, in order of preference */
const DATE_SELECTORS = [
  'meta[property="article:published_time"]',
  'meta[name="date"]',
  'meta[name="dc.date"]',
  'meta[itemprop="datePublished"]',
];

/**
 * Convert an HTML fragment to Markdown.
 */
export function htmlToMarkdown(html: string): string {
  return markdownConverter.turndown(html);
}

function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href, baseUrl).href;
  } catch {
    return null;
  }
}

function firstMetaContent(document: Document, selectors: readonly string[]): string | null {
  for (const selector of selectors) {
    const content = document.querySelector(selector)?.getAttribute("content")?.trim();
    if (content) return content;
  }
  return null;
}

/**
 * Find a preview image for a page: og:image, then twitter:image, then the
 * first image in the document. Relative URLs are resolved against baseUrl.
 */
export function findThumbnail(document: Document, baseUrl: string): string | null {
  const candidate =
    firstMetaContent(document, THUMBNAIL_SELECTORS) ?? document.querySelector("img[src]")?.getAttribute("src") ?? null;
  return candidate ? resolveUrl(candidate, baseUrl) : null;
}

/**
 * Find a publication date from meta tags or the first time element.
 */
export function findPublishedDate(document: Document): string | null {
  return (
    firstMetaContent(document, DATE_SELECTORS) ??
    (document.querySelector("time[datetime]")?.getAttribute("datetime")?.trim() || null)
  );
}

function createDom(html: string, url: string): JSDOM {
  // A silent virtual console keeps jsdom's CSS parse warnings out of the output
  return new JSDOM(html, { url, virtualConsole: new VirtualConsole() });
}

/**
 * Extract an article from page HTML that has already been fetched.
 *
 * @returns The article, or null if Readability finds no readable content
 */
export function parseArticle(html: string, url: string): Article | null {
  const { document } = createDom(html, url).window;

  // Readability rewrites the document, so metadata is read first
  const thumbnailUrl = findThumbnail(document, url);
  const date = findPublishedDate(document);

  const parsed = new Readability(document).parse();
  const contentHtml = parsed?.content?.trim();
  if (!parsed || !contentHtml || !parsed.textContent?.trim()) {
    return null;
  }

  const title = parsed.title?.trim() || UNTITLED;
  const author = parsed.byline?.trim() || undefined;
  // Readability also reads JSON-LD, which the meta lookup does not cover
  const publishedTime = parsed.publishedTime?.trim() || undefined;

  return {
    url,
    title,
    contentHtml,
    contentMarkdown: htmlToMarkdown(contentHtml),
    author,
    date: date ?? publishedTime,
    thumbnailUrl: thumbnailUrl ?? undefined,
  };
}

export class ContentExtractor implements ArticleSource, Closeable {
  private readonly session: HttpSession;
  private readonly logger: Logger;

  constructor(options: { timeoutMs?: number; logger?: Logger } = {}) {
    this.session = new HttpSession({ timeoutMs: options.timeoutMs });
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Fetch a page and extract its article.
   * Failures are logged and reported as null; they never throw.
   */
  async extractArticle(url: string): Promise<Article | null> {
    this.logger.info(`Extracting content from: ${url}`);

    let html: string;
    try {
      html = await this.session.getText(url);
    } catch (error) {
      this.logger.warn(`Failed to fetch ${url}: ${getErrorMessage(error)}`);
      return null;
    }

    try {
      const article = parseArticle(html, url);
      if (!article) {
        this.logger.warn(`No content extracted from ${url}`);
        return null;
      }
      this.logger.info(`Successfully extracted: ${article.title}`);
      return article;
    } catch (error) {
      this.logger.warn(`Failed to extract content from ${url}: ${getErrorMessage(error)}`);
      return null;
    }
  }

  close(): void {
    this.session.close();
  }
}
