import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BROWSER_USER_AGENT, HttpSession, HttpStatusError } from "./http.js";

/** A body that sends one chunk and then never closes */
function stalledBody(firstChunk: string): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode(firstChunk));
    },
  });
}

describe("HttpSession", () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal("fetch", fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("sends the user agent and query parameters", async () => {
    fetchMock.mockResolvedValueOnce(new Response("{}"));
    const session = new HttpSession({ userAgent: "test-agent/1.0" });

    await session.getJson("https://api.example.com/feed", { actor: "alice.test", limit: 20 });

    const [target, init] = fetchMock.mock.calls[0];
    expect(String(target)).toBe("https://api.example.com/feed?actor=alice.test&limit=20");
    expect(init?.headers).toEqual({ "User-Agent": "test-agent/1.0" });
  });

  it("defaults to a browser user agent", () => {
    expect(new HttpSession().userAgent).toBe(BROWSER_USER_AGENT);
  });

  it("rejects non-2xx responses with HttpStatusError", async () => {
    fetchMock.mockResolvedValueOnce(new Response("missing", { status: 404, statusText: "Not Found" }));
    const session = new HttpSession();

    const error = await session.getText("https://example.com/missing").catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 404, message: "HTTP 404 Not Found for https://example.com/missing" });
  });

  it("reads text, bytes and JSON bodies", async () => {
    const session = new HttpSession();

    fetchMock.mockResolvedValueOnce(new Response("<p>hi</p>"));
    expect(await session.getText("https://example.com/page")).toBe("<p>hi</p>");

    fetchMock.mockResolvedValueOnce(new Response(new Uint8Array([1, 2, 3])));
    expect([...(await session.getBuffer("https://example.com/img"))]).toEqual([1, 2, 3]);

    fetchMock.mockResolvedValueOnce(new Response('{"feed":[]}'));
    expect(await session.getJson("https://example.com/api")).toEqual({ feed: [] });
  });

  it("aborts requests that exceed the timeout", async () => {
    fetchMock.mockImplementationOnce(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        }),
    );
    const session = new HttpSession({ timeoutMs: 10 });

    await expect(session.getText("https://example.com/slow")).rejects.toThrow(
      "Request timed out after 10ms: https://example.com/slow",
    );
  });

  it("times out when the body stalls after the headers arrive", async () => {
    fetchMock.mockResolvedValueOnce(new Response(stalledBody("<html><body>partial")));
    const session = new HttpSession({ timeoutMs: 20 });

    await expect(session.getText("https://example.com/stalled")).rejects.toThrow(
      "Request timed out after 20ms: https://example.com/stalled",
    );
  });

  it("aborts a stalled body read on close", async () => {
    fetchMock.mockResolvedValueOnce(new Response(stalledBody("PNG")));
    const session = new HttpSession();

    const pending = session.getBuffer("https://example.com/img");
    session.close();

    await expect(pending).rejects.toThrow("HTTP session closed");
  });

  it("aborts in-flight requests on close and rejects new ones", async () => {
    fetchMock.mockImplementationOnce(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(init?.signal?.reason));
        }),
    );
    const session = new HttpSession();

    const pending = session.getText("https://example.com/slow");
    session.close();

    await expect(pending).rejects.toThrow("HTTP session closed");
    await expect(session.getText("https://example.com/again")).rejects.toThrow("HTTP session is closed");
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
