/**
 * Bluesky public API client for fetching an author's posts
 */

import { HttpSession, type HttpSessionOptions } from "./http.js";
import { extractPostLinks, type PostEmbed } from "./links.js";
import { silentLogger, type Logger } from "./logger.js";
import type { Closeable, FeedSource, Post } from "./types.js";
import { getErrorMessage, truncateText } from "./utils.js";

export const API_BASE = "https://public.api.bsky.app/xrpc";

/** User agent sent to the Bluesky API */
export const API_USER_AGENT = "skybook/0.1.0";

/** getAuthorFeed accepts 1..100 posts per request */
export const MAX_FEED_LIMIT = 100;

/** Raised when the feed cannot be fetched or its body is not a feed */
export class FeedError extends Error {
  constructor(
    message: string,
    readonly handle: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FeedError";
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringField(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value : "";
}

function toEmbed(value: unknown): PostEmbed | null {
  if (!isRecord(value) || !isRecord(value.external)) return null;
  return { external: { uri: value.external.uri } };
}

/**
 * Turn a getAuthorFeed response body into posts that carry links.
 * Feed entries without a post record or without links are skipped.
 *
 * @throws {FeedError} If the body has no feed array
 */
export function parseAuthorFeed(data: unknown, handle: string, logger: Logger = silentLogger): Post[] {
  if (!isRecord(data) || !Array.isArray(data.feed)) {
    throw new FeedError(`Unexpected response for @${handle}: missing feed array`, handle);
  }

  logger.info(`Retrieved ${data.feed.length} posts from API`);

  const posts: Post[] = [];
  for (const item of data.feed) {
    if (!isRecord(item) || !isRecord(item.post)) continue;
    const postData = item.post;
    const record = isRecord(postData.record) ? postData.record : {};

    const text = stringField(record, "text");
    const links = extractPostLinks(text, toEmbed(record.embed));

    if (links.length === 0) {
      logger.debug(`Skipping post without links: ${truncateText(text, 50)}`);
      continue;
    }

    posts.push({
      uri: stringField(postData, "uri"),
      text,
      links,
      createdAt: stringField(record, "createdAt"),
      author: handle,
    });
  }

  logger.info(`Found ${posts.length} posts with links`);
  return posts;
}

export class BlueskyClient implements FeedSource, Closeable {
  private readonly session: HttpSession;
  private readonly logger: Logger;

  constructor(options: { timeoutMs?: HttpSessionOptions["timeoutMs"]; logger?: Logger } = {}) {
    this.session = new HttpSession({ userAgent: API_USER_AGENT, timeoutMs: options.timeoutMs });
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Fetch the most recent posts of an author and keep those with links.
   *
   * @param handle - Bluesky handle (e.g., 'alice.bsky.social')
   * @param limit - Number of posts to request (clamped to 1..100)
   * @throws {FeedError} If the request fails or the response is not a feed
   */
  async getAuthorFeed(handle: string, limit = 20): Promise<Post[]> {
    const clamped = Math.min(Math.max(Math.trunc(limit), 1), MAX_FEED_LIMIT);
    this.logger.info(`Fetching ${clamped} posts from @${handle}`);

    let data: unknown;
    try {
      data = await this.session.getJson(`${API_BASE}/app.bsky.feed.getAuthorFeed`, {
        actor: handle,
        limit: clamped,
      });
    } catch (error) {
      this.logger.error(`Failed to fetch posts from @${handle}: ${getErrorMessage(error)}`);
      throw new FeedError(`Failed to fetch posts from @${handle}: ${getErrorMessage(error)}`, handle, { cause: error });
    }

    return parseAuthorFeed(data, handle, this.logger);
  }

  close(): void {
    this.session.close();
  }
}
