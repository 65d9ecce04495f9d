import { TimeoutError } from "./errors.js";
import type { CookieJar } from "./types.js";

export type TransportRequest = {
  method: "GET" | "POST";
  url: string;
  headers?: Record<string, string>;
  cookies?: CookieJar;
  /** Sent as `application/x-www-form-urlencoded`. */
  form?: Record<string, string>;
  multipart?: FormData;
  body?: string;
  timeoutMs?: number;
};

export type TransportResponse = {
  status: number;
  text: string;
  /** Cookies the server set, last value per name wins. */
  setCookies: CookieJar;
};

/**
 * The long-lived connection a client sends through. Implementations must turn a
 * missed deadline into `TimeoutError` and reject requests after `close()`.
 */
export interface Transport {
  readonly closed: boolean;
  request(request: TransportRequest): Promise<TransportResponse>;
  close(): Promise<void>;
}

export type TransportFactory = () => Transport;

export function serializeCookies(cookies: CookieJar): string {
  return Object.entries(cookies)
    .map(([name, value]) => `${name}=${value}`)
    .join("; ");
}

export function parseSetCookieHeaders(values: readonly string[]): CookieJar {
  const jar: CookieJar = {};
  for (const value of values) {
    const pair = value.split(";")[0] ?? "";
    const separator = pair.indexOf("=");
    if (separator <= 0) {
      continue;
    }

    const name = pair.slice(0, separator).trim();
    if (name) {
      jar[name] = pair.slice(separator + 1).trim();
    }
  }

  return jar;
}

export type FetchTransportOptions = {
  defaultHeaders?: Record<string, string>;
  defaultTimeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/** `Transport` over Node's global fetch. */
export class FetchTransport implements Transport {
  readonly #defaultHeaders: Record<string, string>;
  readonly #defaultTimeoutMs: number;
  readonly #fetch: typeof fetch;
  readonly #inflight = new Set<AbortController>();
  #closed = false;

  constructor(options: FetchTransportOptions = {}) {
    this.#defaultHeaders = options.defaultHeaders ?? {};
    this.#defaultTimeoutMs = options.defaultTimeoutMs ?? 30000;
    this.#fetch = options.fetchImpl ?? fetch;
  }

  get closed(): boolean {
    return this.#closed;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    if (this.#closed) {
      throw new Error("transport_closed");
    }

    const headers = new Headers(this.#defaultHeaders);
    for (const [key, value] of Object.entries(request.headers ?? {})) {
      headers.set(key, value);
    }

    if (request.cookies && Object.keys(request.cookies).length > 0) {
      headers.set("Cookie", serializeCookies(request.cookies));
    }

    let body: string | FormData | undefined = request.body;
    if (request.form) {
      body = new URLSearchParams(request.form).toString();
    } else if (request.multipart) {
      // fetch writes its own multipart boundary.
      headers.delete("Content-Type");
      body = request.multipart;
    }

    const timeoutMs = request.timeoutMs ?? this.#defaultTimeoutMs;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    this.#inflight.add(controller);

    try {
      const response = await this.#fetch(request.url, {
        method: request.method,
        headers,
        body,
        redirect: "follow",
        signal: controller.signal,
      });
      const text = await response.text();
      return {
        status: response.status,
        text,
        setCookies: parseSetCookieHeaders(response.headers.getSetCookie()),
      };
    } catch (error) {
      if (timedOut) {
        throw new TimeoutError(`request_timed_out_after_${timeoutMs}ms: ${request.url}`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
      this.#inflight.delete(controller);
    }
  }

  async close(): Promise<void> {
    this.#closed = true;
    for (const controller of this.#inflight) {
      controller.abort();
    }
    this.#inflight.clear();
  }
}
