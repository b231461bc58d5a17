import type { Server } from "http";
import fetch from "node-fetch";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { MockInstance } from "vitest";
import { createSummaryFetcher } from "./api/summary";
import { createWikipediaProvider } from "./api/wikiSummary";
import { createApp } from "./app";
import { LookupError } from "./errors";
import { startFakeMediaWiki } from "./testing/fakeMediaWiki";
import type { LookupResult } from "./types";
import { closeServer, listen, serverUrl } from "./utils/listen";

// lookup failures are logged with console.warn
let warn: MockInstance;
beforeAll(() => {
  warn = vi.spyOn(console, "warn").mockImplementation(() => {});
});
afterAll(() => {
  warn.mockRestore();
});

const GR_SUMMARY =
  "General relativity, also known as the general theory of relativity, is the geometric theory of gravitation published by Albert Einstein in 1915.";

describe("HTTP routes", () => {
  const fetchSummary = vi.fn(async (topic: string): Promise<LookupResult> => {
    if (topic === "General relativity") return { ok: true, summary: GR_SUMMARY };
    return {
      ok: false,
      error: new LookupError("PageNotFound", topic, `page "${topic}" does not exist`),
    };
  });

  let server: Server;
  let base: string;

  beforeAll(async () => {
    const app = createApp({ fetchSummary, version: "1.2.3-test", bodyLimit: "64b", logRequests: false });
    server = await listen(app, 0, "127.0.0.1");
    base = serverUrl(server);
  });

  afterAll(async () => {
    await closeServer(server);
  });

  beforeEach(() => {
    fetchSummary.mockClear();
  });

  describe("/health", () => {
    it("answers GET with status ok", async () => {
      const res = await fetch(`${base}/health`);
      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("application/json; charset=utf-8");
      expect(await res.text()).toBe('{"status":"ok"}');
    });

    it("answers any method", async () => {
      const res = await fetch(`${base}/health`, { method: "POST", body: "ignored" });
      expect(res.status).toBe(200);
      expect(await res.text()).toBe('{"status":"ok"}');
    });
  });

  describe("/version", () => {
    it("reports service name and version", async () => {
      const res = await fetch(`${base}/version`);
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ name: "wikipedia-agent", version: "1.2.3-test" });
    });
  });

  describe("/lookup", () => {
    it("returns the summary for a known topic", async () => {
      const res = await fetch(`${base}/lookup`, {
        method: "POST",
        headers: { "Content-Type": "text/plain" },
        body: "General relativity",
      });

      expect(res.status).toBe(200);
      expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
      const body = await res.text();
      expect(body).toBe(GR_SUMMARY);
      expect(body.startsWith("General relativity")).toBe(true);
      expect(body).toContain("theory of gravitation");
      expect(fetchSummary).toHaveBeenCalledWith("General relativity");
    });

    it.each(["GET", "PUT", "DELETE", "PATCH"])("rejects %s with 405 without reading the body", async (method) => {
      const res = await fetch(`${base}/lookup`, {
        method,
        ...(method === "GET" ? {} : { body: "General relativity" }),
      });

      expect(res.status).toBe(405);
      expect(res.headers.get("allow")).toBe("POST");
      expect(await res.text()).toBe("POST required\n");
      expect(fetchSummary).not.toHaveBeenCalled();
    });

    it("turns a lookup failure into a 500 with the cause", async () => {
      const res = await fetch(`${base}/lookup`, { method: "POST", body: "Qwxzy unlikely" });

      expect(res.status).toBe(500);
      expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
      expect(res.headers.get("x-content-type-options")).toBe("nosniff");
      expect(await res.text()).toBe('lookup error: page "Qwxzy unlikely" does not exist\n');
    });

    it("passes the body verbatim, whatever the content type", async () => {
      await fetch(`${base}/lookup`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: ' {"topic": 1}\n',
      });
      expect(fetchSummary).toHaveBeenCalledWith(' {"topic": 1}\n');
    });

    it("sends an empty body to the provider as the empty topic", async () => {
      const res = await fetch(`${base}/lookup`, { method: "POST" });
      expect(res.status).toBe(500);
      expect(fetchSummary).toHaveBeenCalledWith("");
    });

    it("looks up again on every request", async () => {
      const first = await fetch(`${base}/lookup`, { method: "POST", body: "General relativity" });
      const second = await fetch(`${base}/lookup`, { method: "POST", body: "General relativity" });

      expect(first.status).toBe(200);
      expect(second.status).toBe(200);
      expect(await first.text()).toBe(await second.text());
      expect(fetchSummary).toHaveBeenCalledTimes(2);
    });

    it("answers 400 when the body cannot be read", async () => {
      const res = await fetch(`${base}/lookup`, { method: "POST", body: "x".repeat(200) });

      expect(res.status).toBe(400);
      expect(await res.text()).toBe("cannot read body\n");
      expect(fetchSummary).not.toHaveBeenCalled();
    });

    it("answers 400 for a charset it cannot decode", async () => {
      const res = await fetch(`${base}/lookup`, {
        method: "POST",
        headers: { "Content-Type": "text/plain; charset=klingon" },
        body: "General relativity",
      });

      expect(res.status).toBe(400);
      expect(await res.text()).toBe("cannot read body\n");
      expect(fetchSummary).not.toHaveBeenCalled();
    });
  });

  it("leaves other paths to the default 404", async () => {
    for (const path of ["/", "/lookup/extra", "/health/", "/Health"]) {
      const res = await fetch(`${base}${path}`);
      expect(res.status).toBe(404);
    }
  });
});

describe("lookup against the MediaWiki stand-in", () => {
  let wiki: Awaited<ReturnType<typeof startFakeMediaWiki>>;
  let server: Server;
  let base: string;

  beforeAll(async () => {
    wiki = await startFakeMediaWiki();
    const provider = createWikipediaProvider({
      apiUrlTemplate: wiki.apiUrlTemplate,
      userAgent: "wikipedia-agent/test",
    });
    const app = createApp({
      fetchSummary: createSummaryFetcher(provider, "en"),
      version: "test",
      logRequests: false,
    });
    server = await listen(app, 0, "127.0.0.1");
    base = serverUrl(server);
  });

  afterAll(async () => {
    await closeServer(server);
    await wiki.close();
  });

  it("serves General relativity", async () => {
    const res = await fetch(`${base}/lookup`, { method: "POST", body: "General relativity" });

    expect(res.status).toBe(200);
    const body = await res.text();
    expect(body.startsWith("General relativity")).toBe(true);
    expect(body).toContain("theory of gravitation");
  });

  it("reports a redirecting title as a lookup error", async () => {
    const res = await fetch(`${base}/lookup`, { method: "POST", body: "Einstein" });

    expect(res.status).toBe(500);
    expect(await res.text()).toBe('lookup error: "Einstein" redirects to "Albert Einstein"\n');
  });

  it("reports a disambiguation page as a lookup error", async () => {
    const res = await fetch(`${base}/lookup`, { method: "POST", body: "Mercury" });

    expect(res.status).toBe(500);
    expect(await res.text()).toBe('lookup error: "Mercury" is a disambiguation page\n');
  });

  it("reports an unknown topic as a lookup error", async () => {
    const res = await fetch(`${base}/lookup`, { method: "POST", body: "Qwxzy unlikely" });

    expect(res.status).toBe(500);
    expect(await res.text()).toContain("lookup error:");
  });
});
