import { describe, expect, it } from "vitest";
import { dedupe, extractLinks, extractPostLinks, uniqueLinks } from "./links.js";
import type { Post } from "./types.js";

function post(links: string[]): Post {
  return { uri: "at://did:plc:test/app.bsky.feed.post/1", text: "", links, createdAt: "", author: "alice.test" };
}

describe("extractLinks", () => {
  it("extracts URLs in text order", () => {
    expect(extractLinks("Read https://example.com/a then http://example.org/b?x=1 now")).toEqual([
      "https://example.com/a",
      "http://example.org/b?x=1",
    ]);
  });

  it("returns an empty list for text without URLs", () => {
    expect(extractLinks("no links here, just example.com")).toEqual([]);
  });

  it("returns a URL mentioned twice only once", () => {
    expect(extractLinks("https://example.com/a and again https://example.com/a")).toEqual(["https://example.com/a"]);
  });

  it("keeps percent escapes and punctuation from the permitted set", () => {
    expect(extractLinks("see https://example.com/a%20b/(c)!*,+&d=1 ok")).toEqual([
      "https://example.com/a%20b/(c)!*,+&d=1",
    ]);
  });

  it("stops at characters outside the pattern", () => {
    expect(extractLinks("https://example.com/page#section")).toEqual(["https://example.com/page"]);
    expect(extractLinks("https://example.com/~user")).toEqual(["https://example.com/"]);
  });

  it("ignores other schemes", () => {
    expect(extractLinks("ftp://example.com/file")).toEqual([]);
  });
});

describe("extractPostLinks", () => {
  it("appends the embedded external link last", () => {
    expect(
      extractPostLinks("Text link https://example.com/a", { external: { uri: "https://example.com/card" } }),
    ).toEqual(["https://example.com/a", "https://example.com/card"]);
  });

  it("does not repeat an embed link already in the text", () => {
    expect(
      extractPostLinks("https://example.com/a", { external: { uri: "https://example.com/a" } }),
    ).toEqual(["https://example.com/a"]);
  });

  it("uses the embed link alone when the text has none", () => {
    expect(extractPostLinks("Look at this", { external: { uri: "https://example.com/card" } })).toEqual([
      "https://example.com/card",
    ]);
  });

  it("ignores embeds without an external URI", () => {
    expect(extractPostLinks("Nothing", { external: {} })).toEqual([]);
    expect(extractPostLinks("Nothing", { external: { uri: 42 } })).toEqual([]);
    expect(extractPostLinks("Nothing", null)).toEqual([]);
  });
});

describe("uniqueLinks", () => {
  it("keeps the first occurrence across posts", () => {
    const posts = [
      post(["https://example.com/a", "https://example.com/b"]),
      post(["https://example.com/b", "https://example.com/c"]),
    ];
    expect(uniqueLinks(posts)).toEqual(["https://example.com/a", "https://example.com/b", "https://example.com/c"]);
  });

  it("returns an empty list for no posts", () => {
    expect(uniqueLinks([])).toEqual([]);
  });
});

describe("dedupe", () => {
  it("preserves order", () => {
    expect(dedupe(["b", "a", "b", "c", "a"])).toEqual(["b", "a", "c"]);
  });
});
