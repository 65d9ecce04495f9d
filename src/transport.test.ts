import { describe, expect, it, vi } from "vitest";

import { TimeoutError } from "./errors.js";
import { FetchTransport, parseSetCookieHeaders, serializeCookies } from "./transport.js";

function okFetch() {
  return vi.fn<typeof fetch>(async () => new Response("body text"));
}

function initOf(fetchImpl: ReturnType<typeof okFetch>): RequestInit {
  const init = fetchImpl.mock.calls[0]?.[1];
  if (!init) {
    throw new Error("fetch was not called");
  }
  return init;
}

describe("cookie helpers", () => {
  it("serializes a jar into one header", () => {
    expect(serializeCookies({ a: "1", b: "2" })).toBe("a=1; b=2");
  });

  it("keeps only the name and value of each set-cookie line", () => {
    expect(
      parseSetCookieHeaders([
        "__Secure-1PSIDTS=ts-1; Path=/; Secure; HttpOnly",
        "NID=nid=with=equals; Domain=.google.com",
        "broken",
        "NID=nid-2",
      ]),
    ).toEqual({ "__Secure-1PSIDTS": "ts-1", NID: "nid-2" });
  });
});

describe("FetchTransport", () => {
  it("encodes forms and sends cookies", async () => {
    const fetchImpl = okFetch();
    const transport = new FetchTransport({ fetchImpl, defaultHeaders: { "X-Default": "1" } });

    const response = await transport.request({
      method: "POST",
      url: "https://example.com/rpc",
      headers: { "Content-Type": "application/x-www-form-urlencoded;charset=utf-8" },
      cookies: { "__Secure-1PSID": "test-psid" },
      form: { at: "test-token", "f.req": "[]" },
    });

    const init = initOf(fetchImpl);
    const headers = new Headers(init.headers);
    expect(response).toEqual({ status: 200, text: "body text", setCookies: {} });
    expect(init.method).toBe("POST");
    expect(init.body).toBe("at=test-token&f.req=%5B%5D");
    expect(headers.get("cookie")).toBe("__Secure-1PSID=test-psid");
    expect(headers.get("x-default")).toBe("1");
    expect(headers.get("content-type")).toBe("application/x-www-form-urlencoded;charset=utf-8");
  });

  it("leaves the multipart boundary to fetch", async () => {
    const fetchImpl = okFetch();
    const transport = new FetchTransport({ fetchImpl });
    const form = new FormData();
    form.append("file", new Blob(["x"]), "a.txt");

    await transport.request({
      method: "POST",
      url: "https://example.com/upload",
      headers: { "Content-Type": "text/plain", "Push-ID": "feeds/test" },
      multipart: form,
    });

    const init = initOf(fetchImpl);
    const headers = new Headers(init.headers);
    expect(init.body).toBe(form);
    expect(headers.has("content-type")).toBe(false);
    expect(headers.get("push-id")).toBe("feeds/test");
  });

  it("turns a missed deadline into TimeoutError", async () => {
    const fetchImpl = vi.fn<typeof fetch>(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    );
    const transport = new FetchTransport({ fetchImpl });

    await expect(transport.request({ method: "GET", url: "https://example.com/slow", timeoutMs: 10 })).rejects.toThrow(
      new TimeoutError("request_timed_out_after_10ms: https://example.com/slow"),
    );
  });

  it("refuses requests once closed", async () => {
    const fetchImpl = okFetch();
    const transport = new FetchTransport({ fetchImpl });

    await transport.close();

    expect(transport.closed).toBe(true);
    await expect(transport.request({ method: "GET", url: "https://example.com" })).rejects.toThrow("transport_closed");
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
