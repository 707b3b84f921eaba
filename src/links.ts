/**
 * Link extraction from post text and embed data
 */

import type { Post } from "./types.js";

/**
 * Permissive URL pattern: http(s):// followed by letters, digits, the
 * character range $..._ and @.&+!*\(), or percent escapes.
 */
const URL_PATTERN = /https?:\/\/(?:[a-zA-Z]|[0-9]|[$-_@.&+]|[!*\\(),]|(?:%[0-9a-fA-F][0-9a-fA-F]))+/g;

/** Embed data attached to a post record; only external links are used */
export interface PostEmbed {
  external?: { uri?: unknown } | null;
}

/**
 * Remove duplicates while preserving order (first occurrence wins).
 */
export function dedupe(items: Iterable<string>): string[] {
  return [...new Set(items)];
}

/**
 * Extract URLs from free text, in order of appearance, without duplicates.
 *
 * @example
 * extractLinks('Read https://example.com/a and https://example.com/b')
 * // ['https://example.com/a', 'https://example.com/b']
 */
export function extractLinks(text: string): string[] {
  return dedupe(text.match(URL_PATTERN) ?? []);
}

/**
 * Links of a post: URLs in the text, then the embedded external link when
 * it is not already among them.
 */
export function extractPostLinks(text: string, embed?: PostEmbed | null): string[] {
  const links = extractLinks(text);
  const externalUri = embed?.external?.uri;
  if (typeof externalUri === "string" && externalUri && !links.includes(externalUri)) {
    links.push(externalUri);
  }
  return links;
}

/**
 * All links of a batch of posts, de-duplicated across posts in post order.
 */
export function uniqueLinks(posts: readonly Post[]): string[] {
  return dedupe(posts.flatMap((post) => post.links));
}
