import { describe, it, expect } from "vitest";
import {
  AggregateFailure,
  ErrorCode,
  RedirectLimitError,
  TimeoutError,
  TransportError,
  ValidationError,
} from "../errors.js";
import { executeRequest, redirectTargetOf, stopsAt } from "../middleware/orchestrator.js";
import { Transport } from "../transport.js";
import { DEFAULT_SESSION_OPTIONS, type CallContext, type RequestOptions, type Response } from "../types.js";
import { FakeEngine, redirect, silentLogger } from "./helpers/fake-engine.js";

const context: CallContext = { defaults: DEFAULT_SESSION_OPTIONS, logger: silentLogger };

function setup(engine = new FakeEngine()) {
  const transport = new Transport({ engine, logger: silentLogger });
  const run = (url: string, options: RequestOptions = {}): Promise<Response> =>
    executeRequest(transport, "GET", url, options, context);
  return { engine, transport, run };
}

async function failureOf(promise: Promise<unknown>): Promise<AggregateFailure> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof AggregateFailure)) {
    throw new Error(`Expected AggregateFailure, got ${String(error)}`);
  }
  return error;
}

describe("executeRequest", () => {
  describe("retries", () => {
    it("makes exactly maxRetries attempts when every attempt times out", async () => {
      const { engine, run } = setup();
      engine.always(new TimeoutError(5000));

      const failure = await failureOf(run("https://a.test/", { maxRetries: 3 }));

      expect(engine.requests).toHaveLength(3);
      expect(failure.attempts).toHaveLength(3);
      expect(failure.errors.every((e) => e instanceof TimeoutError)).toBe(true);
      expect(failure.getLastError()?.attempt).toBe(3);
      expect(failure.getLastError()?.kind).toBe(ErrorCode.TIMEOUT);
      expect(failure.getLastError()).toBe(failure.attempts[2]);
    });

    it("defaults to three attempts", async () => {
      const { engine, run } = setup();
      engine.always({ status: 500 });

      const failure = await failureOf(run("https://a.test/"));

      expect(engine.requests).toHaveLength(3);
      expect(failure.attempts.map((a) => a.kind)).toEqual([
        ErrorCode.HTTP_STATUS,
        ErrorCode.HTTP_STATUS,
        ErrorCode.HTTP_STATUS,
      ]);
    });

    it("returns the first passing response", async () => {
      const { engine, run } = setup();
      engine.enqueue({ status: 500 }, { status: 403 }, { status: 200, body: "ok" });

      const response = await run("https://a.test/", { maxRetries: 5 });

      expect(response.body).toBe("ok");
      expect(engine.requests).toHaveLength(3);
    });

    it("classifies raw engine failures", async () => {
      const { engine, run } = setup();
      engine.always(new Error("connect ECONNREFUSED 127.0.0.1:9"));

      const failure = await failureOf(run("https://a.test/", { maxRetries: 2 }));
      const last = failure.getLastError();

      expect(last?.kind).toBe(ErrorCode.TRANSPORT_ERROR);
      expect(last?.error).toBeInstanceOf(TransportError);
      expect(last?.url).toBe("https://a.test/");
    });

    it("lists every attempt in describe()", async () => {
      const { engine, run } = setup();
      engine.always(new TimeoutError(5000));

      const failure = await failureOf(run("https://a.test/", { maxRetries: 2 }));

      expect(failure.describe()).toBe(
        [
          "Request failed after 2 attempts: GET https://a.test/",
          "0. [TimeoutError]: Timeout after 5000ms",
          "1. [TimeoutError]: Timeout after 5000ms",
        ].join("\n")
      );
    });

    it("records custom handler failures as attempts", async () => {
      const { engine, run } = setup();
      engine.enqueue({ status: 200, body: "captcha" }, { status: 200, body: "content" });

      const response = await run("https://a.test/", {
        customStatusHandler: (r) => {
          if (r.body === "captcha") throw new Error("captcha page");
        },
      });

      expect(response.body).toBe("content");
      expect(engine.requests).toHaveLength(2);
    });

    it("skips the status policy on request", async () => {
      const { engine, run } = setup();
      engine.enqueue({ status: 503 });

      const response = await run("https://a.test/", { skipStatusCheck: true });

      expect(response.status).toBe(503);
      expect(engine.requests).toHaveLength(1);
    });
  });

  describe("redirects", () => {
    it("follows a chain to the end without spending retries", async () => {
      const { engine, run } = setup();
      engine.enqueue(redirect("https://b.test/b"), redirect("https://c.test/c"), redirect("https://d.test/d"), {
        status: 200,
      });

      const response = await run("https://a.test/a", { maxRetries: 1 });

      expect(response.status).toBe(200);
      expect(response.url).toBe("https://d.test/d");
      expect(engine.urls).toEqual(["https://a.test/a", "https://b.test/b", "https://c.test/c", "https://d.test/d"]);
    });

    it("stops when the target contains redirectStopContains", async () => {
      const { engine, run } = setup();
      engine.enqueue(redirect("https://b.test/b"), redirect("https://c.test/c"), redirect("https://d.test/d"), {
        status: 200,
      });

      const response = await run("https://a.test/a", { redirectStopContains: "b.test" });

      expect(response.url).toBe("https://b.test/b");
      expect(response.status).toBe(302);
      expect(response.requestUrl).toBe("https://a.test/a");
      expect(engine.urls).toEqual(["https://a.test/a"]);
    });

    it("stops when the target equals redirectStopExact", async () => {
      const { engine, run } = setup();
      engine.enqueue(redirect("https://b.test/b"), redirect("https://c.test/c"), { status: 200 });

      const response = await run("https://a.test/a", { redirectStopExact: "https://c.test/c" });

      expect(response.url).toBe("https://c.test/c");
      expect(engine.urls).toEqual(["https://a.test/a", "https://b.test/b"]);
    });

    it("returns the redirect itself with skipRedirects", async () => {
      const { engine, run } = setup();
      engine.enqueue(redirect("/login", 301));

      const response = await run("https://a.test/account", { skipRedirects: true });

      expect(response.status).toBe(301);
      expect(response.url).toBe("https://a.test/login");
      expect(engine.requests).toHaveLength(1);
    });

    it("resolves relative Location headers against the current URL", async () => {
      const { engine, run } = setup();
      engine.enqueue(redirect("next?step=2"), { status: 200 });

      const response = await run("https://a.test/flow/start");

      expect(response.url).toBe("https://a.test/flow/next?step=2");
    });

    it("treats a 3xx without Location as a final response", async () => {
      const { engine, run } = setup();
      engine.enqueue({ status: 304 });

      const response = await run("https://a.test/");

      expect(response.status).toBe(304);
      expect(response.url).toBe("https://a.test/");
    });

    it("sends params on the first hop only", async () => {
      const { engine, run } = setup();
      engine.enqueue(redirect("https://a.test/results"), { status: 200 });

      await run("https://a.test/search", { params: { q: "shoes", page: 2 } });

      expect(engine.urls).toEqual(["https://a.test/search?q=shoes&page=2", "https://a.test/results"]);
    });

    it("gives up once the redirect budget is spent", async () => {
      const { engine, run } = setup();
      engine.always(redirect("https://loop.test/"));

      const failure = await failureOf(run("https://loop.test/", { maxRedirects: 2 }));

      expect(engine.requests).toHaveLength(3);
      expect(failure.attempts).toHaveLength(1);
      expect(failure.getLastError()?.kind).toBe(ErrorCode.REDIRECT_LIMIT);
      expect(failure.getLastError()?.error).toBeInstanceOf(RedirectLimitError);
    });
  });

  describe("cookies", () => {
    it("stores cookies from failing responses and sends them on the retry", async () => {
      const { engine, transport, run } = setup();
      engine.enqueue({ status: 403, headers: { "set-cookie": ["challenge=token; Path=/"] } }, { status: 200 });

      await run("https://a.test/");

      expect(transport.cookies.get("challenge")?.value).toBe("token");
      expect(engine.requests[0].headers).toEqual([]);
      expect(engine.requests[1].headers).toEqual([["Cookie", "challenge=token"]]);
    });

    it("stores cookies set along a redirect chain", async () => {
      const { engine, transport, run } = setup();
      engine.enqueue(redirect("https://a.test/home", 302, { "set-cookie": ["session=s1"] }), { status: 200 });

      await run("https://a.test/login");

      expect(transport.cookies.get("session")?.domain).toBe("a.test");
      expect(engine.requests[1].headers).toEqual([["Cookie", "session=s1"]]);
    });
  });

  describe("options", () => {
    it("sends with a 5000ms timeout and verification off by default", async () => {
      const { engine, run } = setup();
      engine.enqueue({ status: 200 });

      await run("https://a.test/");

      expect(engine.requests[0].timeoutMs).toBe(5000);
      expect(engine.requests[0].verify).toBe(false);
    });

    it("rejects unusable options before sending anything", async () => {
      const { engine, run } = setup();

      await expect(run("https://a.test/", { maxRetries: 0 })).rejects.toBeInstanceOf(ValidationError);
      await expect(run("https://a.test/", { proxies: { ftp: "x" } })).rejects.toBeInstanceOf(ValidationError);
      expect(engine.requests).toHaveLength(0);
    });

    it("makes one raw call when the middleware is bypassed", async () => {
      const { engine, transport, run } = setup();
      engine.enqueue({ status: 500, headers: { "set-cookie": ["a=1"] } });

      const response = await run("https://a.test/", { bypassMiddleware: true });

      expect(response.status).toBe(500);
      expect(transport.cookies.size).toBe(0);
      expect(engine.requests).toHaveLength(1);
    });

    it("lets bypass errors surface as-is", async () => {
      const { engine, run } = setup();
      const error = new TimeoutError(100);
      engine.enqueue(error);

      await expect(run("https://a.test/", { bypassMiddleware: true })).rejects.toBe(error);
    });
  });
});

describe("redirectTargetOf", () => {
  const base: Response = {
    status: 302,
    statusText: "",
    headers: { location: ["/next"] },
    body: "",
    url: "https://a.test/start",
    requestUrl: "https://a.test/start",
    engine: "http",
    duration: 0,
  };

  it("returns the raw and resolved location", () => {
    expect(redirectTargetOf(base)).toEqual({ location: "/next", url: "https://a.test/next" });
  });

  it("ignores non-3xx responses and empty locations", () => {
    expect(redirectTargetOf({ ...base, status: 200 })).toBeNull();
    expect(redirectTargetOf({ ...base, headers: { location: [""] } })).toBeNull();
  });
});

describe("stopsAt", () => {
  const target = { location: "/login", url: "https://a.test/login" };

  it("matches the raw or resolved target", () => {
    expect(stopsAt(target, { redirectStopExact: "/login" })).toBe(true);
    expect(stopsAt(target, { redirectStopExact: "https://a.test/login" })).toBe(true);
    expect(stopsAt(target, { redirectStopContains: "a.test" })).toBe(true);
  });

  it("treats empty predicates as unset", () => {
    expect(stopsAt(target, { redirectStopExact: "", redirectStopContains: "" })).toBe(false);
  });
});
