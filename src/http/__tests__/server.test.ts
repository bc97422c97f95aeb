import { describe, expect, it } from "vitest";
import { WordCountTrie } from "../../core/index.js";
import { createDictionary, decodeCursor, encodeCursor } from "../dictionary.js";
import { PROBLEM_CONTENT_TYPE } from "../problem.js";
import { route, type RouteContext } from "../server.js";

interface CallOptions {
  body?: unknown;
  rawBody?: string;
  contentType?: string;
}

function setup() {
  const ctx: RouteContext = {
    dictionary: createDictionary(WordCountTrie.fromText("cat cats catacomb apple cats")),
    maxEditDistance: 2,
    startedAt: Date.now(),
  };
  const call = (method: string, path: string, opts: CallOptions = {}) => {
    const hasBody = opts.body !== undefined || opts.rawBody !== undefined;
    return route(ctx, {
      method,
      url: new URL(path, "http://localhost"),
      contentType: opts.contentType ?? (hasBody ? "application/json" : undefined),
      body: opts.rawBody ?? (opts.body === undefined ? "" : JSON.stringify(opts.body)),
      requestId: "req-1",
    });
  };
  return { ctx, call };
}

describe("dictionary routes", () => {
  it("reports health", () => {
    const { call } = setup();
    const res = call("GET", "/health");
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: "ok", service: "prefix_dictionary", keys: 4 });
  });

  it("looks keys up", () => {
    const { call } = setup();
    expect(call("GET", "/keys/cats")).toEqual({
      status: 200,
      contentType: "application/json",
      body: { key: "cats", value: 2 },
    });
  });

  it("answers 404 problems for bare prefixes", () => {
    const { call } = setup();
    const res = call("GET", "/keys/ca");
    expect(res.status).toBe(404);
    expect(res.contentType).toBe(PROBLEM_CONTENT_TYPE);
    expect(res.body).toMatchObject({ code: "NOT_FOUND", detail: 'key not found: "ca"', instance: "/keys/ca", requestId: "req-1" });
  });

  it("decodes percent-encoded keys", () => {
    const { call } = setup();
    expect(call("PUT", "/keys/caf%C3%A9", { body: { value: 1 } }).body).toEqual({ key: "café", value: 1 });
    expect(call("GET", "/keys/%E0%A4%A").status).toBe(400);
  });

  it("creates and overwrites keys", () => {
    const { ctx, call } = setup();
    expect(call("PUT", "/keys/dog", { body: { value: 3 } })).toMatchObject({ status: 201, body: { key: "dog", value: 3 } });
    expect(call("PUT", "/keys/dog", { body: { value: 4 } }).status).toBe(200);
    expect(ctx.dictionary.lookup("dog")).toBe(4);
    expect(ctx.dictionary.size()).toBe(5);
  });

  it("validates key writes", () => {
    const { call } = setup();
    expect(call("PUT", "/keys/dog", { body: { value: -1 } }).body).toMatchObject({
      code: "INVALID_ARGUMENT",
      errors: [{ path: "$.value", message: "must be a non-negative integer" }],
    });
    expect(call("PUT", "/keys/dog", { body: { value: 1 }, contentType: "text/plain" }).status).toBe(415);
    expect(call("PUT", "/keys/dog", { rawBody: "{" }).body).toMatchObject({ detail: "body is not valid JSON" });
  });

  it("deletes keys without cutting off longer ones", () => {
    const { call } = setup();
    expect(call("DELETE", "/keys/cat")).toEqual({ status: 204 });
    expect(call("GET", "/keys/cats").status).toBe(200);
    expect(call("DELETE", "/keys/cat").status).toBe(404);
  });

  it("pages through keys under a prefix", () => {
    const { call } = setup();
    const first = call("GET", "/keys?prefix=cat&limit=2");
    expect(first.body).toEqual({
      prefix: "cat",
      keys: ["cat", "cats"],
      page: { nextCursor: encodeCursor({ offset: 2 }) },
    });

    const second = call("GET", `/keys?prefix=cat&limit=2&cursor=${encodeURIComponent(encodeCursor({ offset: 2 }))}`);
    expect(second.body).toEqual({ prefix: "cat", keys: ["catacomb"], page: { nextCursor: null } });

    expect(call("GET", "/keys").body).toMatchObject({ keys: ["cat", "cats", "catacomb", "apple"] });
  });

  it("rejects bad listings", () => {
    const { call } = setup();
    expect(call("GET", "/keys?prefix=zzz").status).toBe(404);
    expect(call("GET", "/keys?limit=0").body).toMatchObject({ errors: [{ path: "limit" }] });
    expect(call("GET", "/keys?limit=ten").status).toBe(400);
    expect(call("GET", "/keys?cursor=nope").body).toMatchObject({ errors: [{ path: "cursor", message: "invalid cursor" }] });
  });

  it("lists stored prefixes of a key", () => {
    const { call } = setup();
    expect(call("GET", "/prefixes/catacombs").body).toEqual({
      key: "catacombs",
      matches: [
        { key: "cat", value: 1 },
        { key: "catacomb", value: 1 },
      ],
    });
  });

  it("suggests keys within an edit distance", () => {
    const { call } = setup();
    expect(call("POST", "/suggest", { body: { query: "aple", distance: 1 } }).body).toEqual({
      query: "aple",
      distance: 1,
      keys: ["apple"],
    });
    expect(call("POST", "/suggest", { body: { query: "app" } }).body).toEqual({ query: "app", distance: 2, keys: ["apple"] });
    expect(call("POST", "/suggest", { body: { query: "app", distance: 3 } }).body).toMatchObject({
      errors: [{ path: "$.distance", message: "must be an integer between 1 and 2" }],
    });
    expect(call("POST", "/suggest", { body: { query: "" } }).status).toBe(400);
  });

  it("ingests documents and reports per-item failures", () => {
    const { ctx, call } = setup();
    const res = call("POST", "/documents", { body: { documents: [{ text: "dog dog cat" }, { text: "" }, "x"] } });
    expect(res).toEqual({
      status: 207,
      contentType: "application/json",
      body: {
        ingested: 1,
        failed: 2,
        failures: [
          { index: 1, code: "INVALID_ARGUMENT", message: "text must be non-empty" },
          { index: 2, code: "INVALID_ARGUMENT", message: "document must be an object" },
        ],
        keys: 5,
      },
    });
    expect(ctx.dictionary.lookup("cat")).toBe(2);
    expect(ctx.dictionary.lookup("dog")).toBe(2);

    expect(call("POST", "/documents", { body: { documents: [] } }).status).toBe(400);
  });

  it("rejects unknown routes and methods", () => {
    const { call } = setup();
    expect(call("GET", "/nope").status).toBe(404);
    expect(call("POST", "/health").status).toBe(405);
    expect(call("PATCH", "/keys/cat").body).toMatchObject({ code: "METHOD_NOT_ALLOWED" });
  });
});

describe("cursors", () => {
  it("round-trips offsets", () => {
    expect(decodeCursor(encodeCursor({ offset: 5 }))).toEqual({ offset: 5 });
  });

  it("rejects tampered cursors", () => {
    expect(() => decodeCursor(Buffer.from('{"offset":-1}').toString("base64"))).toThrow("invalid cursor");
    expect(() => decodeCursor("nope")).toThrow("invalid cursor");
  });
});
