/**
 * Shared type definitions for the feed-to-book pipeline
 */

/** A feed post that links to at least one article */
export interface Post {
  /** AT-URI of the post */
  readonly uri: string;
  /** Post text as written by the author */
  readonly text: string;
  /** Outbound links in text order, embed link last */
  readonly links: readonly string[];
  /** ISO timestamp from the post record */
  readonly createdAt: string;
  /** Handle the feed was fetched for */
  readonly author: string;
}

/** Readable content extracted from one linked page */
export interface Article {
  /** URL the content was extracted from */
  readonly url: string;
  /** Article title ('Untitled' when the page has none) */
  readonly title: string;
  /** Main content as HTML */
  readonly contentHtml: string;
  /** Main content as Markdown */
  readonly contentMarkdown: string;
  readonly author?: string;
  readonly date?: string;
  /** Absolute URL of the page's preview image */
  readonly thumbnailUrl?: string;
}

/** Source of feed posts for a handle */
export interface FeedSource {
  getAuthorFeed(handle: string, limit: number): Promise<Post[]>;
}

/** Turns a URL into an article, or null when nothing could be extracted */
export interface ArticleSource {
  extractArticle(url: string): Promise<Article | null>;
}

/** Anything holding a connection or handle that must be released */
export interface Closeable {
  close(): void | Promise<void>;
}
