import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { API_BASE, API_USER_AGENT, BlueskyClient, FeedError, parseAuthorFeed } from "./bluesky.js";

function feedItem(uri: string, text: string, embed?: unknown) {
  return {
    post: {
      uri,
      record: { text, createdAt: "2025-10-26T09:00:00.000Z", ...(embed ? { embed } : {}) },
    },
  };
}

describe("parseAuthorFeed", () => {
  it("keeps posts with links in feed order", () => {
    const posts = parseAuthorFeed(
      {
        feed: [
          feedItem("at://post/1", "First https://example.com/a"),
          feedItem("at://post/2", "No links at all"),
          feedItem("at://post/3", "Card", { external: { uri: "https://example.com/card" } }),
        ],
      },
      "alice.test",
    );

    expect(posts).toEqual([
      {
        uri: "at://post/1",
        text: "First https://example.com/a",
        links: ["https://example.com/a"],
        createdAt: "2025-10-26T09:00:00.000Z",
        author: "alice.test",
      },
      {
        uri: "at://post/3",
        text: "Card",
        links: ["https://example.com/card"],
        createdAt: "2025-10-26T09:00:00.000Z",
        author: "alice.test",
      },
    ]);
  });

  it("skips malformed feed entries", () => {
    const posts = parseAuthorFeed({ feed: [null, "junk", { post: "junk" }, { post: { record: {} } }] }, "alice.test");
    expect(posts).toEqual([]);
  });

  it("fills missing string fields with empty strings", () => {
    const posts = parseAuthorFeed(
      { feed: [{ post: { record: { text: "https://example.com/x" } } }] },
      "alice.test",
    );
    expect(posts[0]).toMatchObject({ uri: "", createdAt: "" });
  });

  it("throws FeedError when the body has no feed array", () => {
    expect(() => parseAuthorFeed({ cursor: "x" }, "alice.test")).toThrow(FeedError);
    expect(() => parseAuthorFeed("nope", "alice.test")).toThrow("Unexpected response for @alice.test: missing feed array");
  });
});

describe("BlueskyClient", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("requests the author feed with actor and limit", async () => {
    fetchMock.mockResolvedValueOnce(Response.json({ feed: [feedItem("at://post/1", "https://example.com/a")] }));
    const client = new BlueskyClient();

    const posts = await client.getAuthorFeed("alice.test", 20);

    const [target, init] = fetchMock.mock.calls[0];
    expect(String(target)).toBe(`${API_BASE}/app.bsky.feed.getAuthorFeed?actor=alice.test&limit=20`);
    expect(init?.headers).toEqual({ "User-Agent": API_USER_AGENT });
    expect(posts.map((post) => post.links)).toEqual([["https://example.com/a"]]);
  });

  it("clamps the limit to the API maximum", async () => {
    fetchMock.mockResolvedValueOnce(Response.json({ feed: [] }));
    const client = new BlueskyClient();

    await client.getAuthorFeed("alice.test", 500);

    expect(String(fetchMock.mock.calls[0][0])).toContain("limit=100");
  });

  it("wraps HTTP failures in FeedError", async () => {
    fetchMock.mockResolvedValueOnce(new Response("bad", { status: 400, statusText: "Bad Request" }));
    const client = new BlueskyClient();

    const error = await client.getAuthorFeed("nobody.test", 20).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FeedError);
    expect(error).toMatchObject({
      handle: "nobody.test",
      message: "Failed to fetch posts from @nobody.test: HTTP 400 Bad Request for https://public.api.bsky.app/xrpc/app.bsky.feed.getAuthorFeed?actor=nobody.test&limit=20",
    });
  });

  it("wraps network failures in FeedError", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const client = new BlueskyClient();

    await expect(client.getAuthorFeed("alice.test")).rejects.toThrow("Failed to fetch posts from @alice.test: fetch failed");
  });

  it("refuses requests after close", async () => {
    const client = new BlueskyClient();
    client.close();

    await expect(client.getAuthorFeed("alice.test")).rejects.toBeInstanceOf(FeedError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
