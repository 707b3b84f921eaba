/**
 * Scoped HTTP session over fetch
 *
 * Every request carries the session's user agent and is aborted after the
 * session timeout. Closing the session aborts requests still in flight and
 * rejects new ones, so a session can be released deterministically with
 * withResources().
 */

import type { Closeable } from "./types.js";

/** Browser-like user agent for fetching article pages and images */
export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

/** Default per-request timeout (ms) */
export const DEFAULT_TIMEOUT_MS = 30_000;

export interface HttpSessionOptions {
  userAgent?: string;
  timeoutMs?: number;
}

/** Raised for non-2xx responses */
export class HttpStatusError extends Error {
  constructor(
    readonly url: string,
    readonly status: number,
    readonly statusText: string,
  ) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ""} for ${url}`);
    this.name = "HttpStatusError";
  }
}

/**
 * Settle with the body read, or reject with the abort reason as soon as the
 * signal fires. A stalled body stream does not always observe the abort itself.
 */
function abortable<T>(pending: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });
}

export class HttpSession implements Closeable {
  readonly userAgent: string;
  readonly timeoutMs: number;
  private readonly inFlight = new Set<AbortController>();
  private closed = false;

  constructor(options: HttpSessionOptions = {}) {
    this.userAgent = options.userAgent ?? BROWSER_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * GET a URL and read its body while the request is still guarded.
   * The timeout and close() cover the body as well as the headers.
   *
   * @throws {HttpStatusError} For non-2xx responses
   * @throws {Error} When the session is closed, the request times out, or the network fails
   */
  async request<T>(
    url: string,
    params: Record<string, string | number> | undefined,
    read: (response: Response) => Promise<T>,
  ): Promise<T> {
    if (this.closed) {
      throw new Error("HTTP session is closed");
    }

    const target = new URL(url);
    for (const [key, value] of Object.entries(params ?? {})) {
      target.searchParams.set(key, String(value));
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`Request timed out after ${this.timeoutMs}ms: ${url}`)), this.timeoutMs);
    this.inFlight.add(controller);

    try {
      const response = await fetch(target, {
        headers: { "User-Agent": this.userAgent },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new HttpStatusError(target.href, response.status, response.statusText);
      }
      return await abortable(read(response), controller.signal);
    } finally {
      clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }

  /** GET and read the body as text */
  async getText(url: string): Promise<string> {
    return await this.request(url, undefined, (response) => response.text());
  }

  /** GET and read the body as bytes */
  async getBuffer(url: string): Promise<Buffer> {
    return await this.request(url, undefined, async (response) => Buffer.from(await response.arrayBuffer()));
  }

  /** GET and parse the body as JSON */
  async getJson(url: string, params?: Record<string, string | number>): Promise<unknown> {
    return await this.request(url, params, async (response) => {
      const data: unknown = await response.json();
      return data;
    });
  }

  close(): void {
    this.closed = true;
    for (const controller of this.inFlight) {
      controller.abort(new Error("HTTP session closed"));
    }
    this.inFlight.clear();
  }
}
