import http from "node:http";
import { randomUUID } from "node:crypto";

import { isTrieError } from "../core/errors.js";
import { createLogger } from "../logger.js";
import { createDictionary, decodeCursor, encodeCursor, type Dictionary } from "./dictionary.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type ProblemCode } from "./problem.js";
import { asInt, asString, intParam, isRecord, pushErr } from "./validation.js";

const SERVICE = "prefix_dictionary";
const VERSION = "0.1.0";

const MAX_KEY_LENGTH = 256;
const MAX_QUERY_LENGTH = 64;
const MAX_TEXT_LENGTH = 200000;
const MAX_DOCUMENTS = 1000;
const DEFAULT_PAGE_SIZE = 100;
const MAX_PAGE_SIZE = 1000;

const log = createLogger("http");

export interface RouteContext {
  dictionary: Dictionary;
  maxEditDistance: number;
  startedAt: number;
}

export interface RouteRequest {
  method: string;
  url: URL;
  contentType: string | undefined;
  body: string;
  requestId: string;
}

export interface RouteResponse {
  status: number;
  contentType?: string;
  body?: unknown;
}

export interface ServerOptions {
  port?: number;
  dictionary?: Dictionary;
  maxEditDistance?: number;
}

/**
 * Dispatches one request. Dictionary errors become problem responses; anything
 * else is thrown to the caller.
 */
export function route(ctx: RouteContext, req: RouteRequest): RouteResponse {
  const { pathname } = req.url;
  try {
    if (pathname === "/health") {
      if (req.method !== "GET") return methodNotAllowed(req);
      return json(200, {
        status: "ok",
        service: SERVICE,
        version: VERSION,
        uptimeMs: Date.now() - ctx.startedAt,
        keys: ctx.dictionary.size(),
      });
    }

    if (pathname === "/keys") {
      if (req.method !== "GET") return methodNotAllowed(req);
      return listKeys(ctx, req);
    }

    const keyMatch = /^\/keys\/(.+)$/.exec(pathname);
    if (keyMatch?.[1]) {
      const key = decodeSegment(keyMatch[1]);
      if (key === undefined) return invalidPath(req);
      switch (req.method) {
        case "GET":
          return json(200, { key, value: ctx.dictionary.lookup(key) });
        case "PUT":
          return putKey(ctx, req, key);
        case "DELETE":
          ctx.dictionary.remove(key);
          return { status: 204 };
        default:
          return methodNotAllowed(req);
      }
    }

    const prefixMatch = /^\/prefixes\/(.+)$/.exec(pathname);
    if (prefixMatch?.[1]) {
      if (req.method !== "GET") return methodNotAllowed(req);
      const key = decodeSegment(prefixMatch[1]);
      if (key === undefined) return invalidPath(req);
      return json(200, { key, matches: ctx.dictionary.prefixes(key) });
    }

    if (pathname === "/suggest") {
      if (req.method !== "POST") return methodNotAllowed(req);
      return suggest(ctx, req);
    }

    if (pathname === "/documents") {
      if (req.method !== "POST") return methodNotAllowed(req);
      return ingestDocuments(ctx, req);
    }

    return fail(req, 404, "NOT_FOUND", "not found");
  } catch (e) {
    if (!isTrieError(e)) throw e;
    return e.code === "NOT_FOUND" ? fail(req, 404, "NOT_FOUND", e.message) : fail(req, 400, "INVALID_ARGUMENT", e.message);
  }
}

function listKeys(ctx: RouteContext, req: RouteRequest): RouteResponse {
  const params = req.url.searchParams;
  const errors: FieldError[] = [];

  const prefix = params.get("prefix") ?? "";
  if (prefix.length > MAX_KEY_LENGTH) pushErr(errors, "prefix", "too long");

  const limit = intParam(params, "limit") ?? DEFAULT_PAGE_SIZE;
  if (!(limit >= 1 && limit <= MAX_PAGE_SIZE)) pushErr(errors, "limit", `must be between 1 and ${MAX_PAGE_SIZE}`);

  let offset = 0;
  const cursor = params.get("cursor");
  if (cursor !== null) {
    try {
      offset = decodeCursor(cursor).offset;
    } catch {
      pushErr(errors, "cursor", "invalid cursor");
    }
  }

  if (errors.length) return invalid(req, errors);

  const page = ctx.dictionary.complete(prefix, { limit, offset });
  if (!page) return fail(req, 404, "NOT_FOUND", `no keys start with ${JSON.stringify(prefix)}`);
  return json(200, {
    prefix,
    keys: page.keys,
    page: { nextCursor: page.nextOffset === null ? null : encodeCursor({ offset: page.nextOffset }) },
  });
}

function putKey(ctx: RouteContext, req: RouteRequest, key: string): RouteResponse {
  const body = readJson(req);
  if (!body.ok) return body.response;
  if (!isRecord(body.value)) return fail(req, 400, "INVALID_ARGUMENT", "body must be an object");

  const errors: FieldError[] = [];
  if (key.length > MAX_KEY_LENGTH) pushErr(errors, "key", "too long");
  const value = asInt(body.value.value);
  if (value === undefined || value < 0) pushErr(errors, "$.value", "must be a non-negative integer");
  if (errors.length || value === undefined) return invalid(req, errors);

  const created = ctx.dictionary.put(key, value);
  return json(created ? 201 : 200, { key, value });
}

function suggest(ctx: RouteContext, req: RouteRequest): RouteResponse {
  const body = readJson(req);
  if (!body.ok) return body.response;
  if (!isRecord(body.value)) return fail(req, 400, "INVALID_ARGUMENT", "body must be an object");

  const errors: FieldError[] = [];
  const query = asString(body.value.query);
  if (!query) pushErr(errors, "$.query", "must be non-empty");
  if (query && query.length > MAX_QUERY_LENGTH) pushErr(errors, "$.query", "too long");

  const defaultDistance = Math.min(2, ctx.maxEditDistance);
  const distance = body.value.distance === undefined ? defaultDistance : asInt(body.value.distance);
  if (distance === undefined || distance < 1 || distance > ctx.maxEditDistance) {
    pushErr(errors, "$.distance", `must be an integer between 1 and ${ctx.maxEditDistance}`);
  }

  if (errors.length || !query || distance === undefined) return invalid(req, errors);

  return json(200, { query, distance, keys: ctx.dictionary.suggest(query, distance) });
}

function ingestDocuments(ctx: RouteContext, req: RouteRequest): RouteResponse {
  const body = readJson(req);
  if (!body.ok) return body.response;
  if (!isRecord(body.value)) return fail(req, 400, "INVALID_ARGUMENT", "body must be an object");

  const errors: FieldError[] = [];
  const docsVal = body.value.documents;
  if (!Array.isArray(docsVal)) pushErr(errors, "$.documents", "must be an array");
  const docs: unknown[] = Array.isArray(docsVal) ? docsVal : [];
  if (Array.isArray(docsVal) && docsVal.length < 1) pushErr(errors, "$.documents", "must contain at least 1 item");
  if (docs.length > MAX_DOCUMENTS) pushErr(errors, "$.documents", `must contain at most ${MAX_DOCUMENTS} items`);
  if (errors.length) return invalid(req, errors);

  let ingested = 0;
  const failures: Array<{ index: number; code: ProblemCode; message: string }> = [];

  docs.forEach((d, index) => {
    if (!isRecord(d)) {
      failures.push({ index, code: "INVALID_ARGUMENT", message: "document must be an object" });
      return;
    }
    const text = asString(d.text);
    if (!text) {
      failures.push({ index, code: "INVALID_ARGUMENT", message: "text must be non-empty" });
      return;
    }
    if (text.length > MAX_TEXT_LENGTH) {
      failures.push({ index, code: "INVALID_ARGUMENT", message: "text too long" });
      return;
    }
    ctx.dictionary.ingest(text);
    ingested++;
  });

  const failed = failures.length;
  return json(failed > 0 ? 207 : 200, { ingested, failed, failures, keys: ctx.dictionary.size() });
}

type JsonBody = { ok: true; value: unknown } | { ok: false; response: RouteResponse };

function readJson(req: RouteRequest): JsonBody {
  const ct = (req.contentType ?? "").split(";")[0]?.trim().toLowerCase();
  if (ct !== "application/json") {
    return { ok: false, response: fail(req, 415, "UNSUPPORTED_MEDIA_TYPE", "content-type must be application/json") };
  }
  try {
    return { ok: true, value: req.body.length ? JSON.parse(req.body) : null };
  } catch {
    return { ok: false, response: fail(req, 400, "INVALID_ARGUMENT", "body is not valid JSON") };
  }
}

function decodeSegment(segment: string): string | undefined {
  try {
    return decodeURIComponent(segment);
  } catch {
    return undefined;
  }
}

function json(status: number, body: unknown): RouteResponse {
  return { status, contentType: "application/json", body };
}

function fail(req: RouteRequest, status: number, code: ProblemCode, detail: string, errors?: FieldError[]): RouteResponse {
  return {
    status,
    contentType: PROBLEM_CONTENT_TYPE,
    body: problem({ status, code, detail, instance: req.url.pathname, requestId: req.requestId, errors }),
  };
}

function invalid(req: RouteRequest, errors: FieldError[]): RouteResponse {
  return fail(req, 400, "INVALID_ARGUMENT", "invalid request", errors);
}

function invalidPath(req: RouteRequest): RouteResponse {
  return fail(req, 400, "INVALID_ARGUMENT", "malformed path segment");
}

function methodNotAllowed(req: RouteRequest): RouteResponse {
  return fail(req, 405, "METHOD_NOT_ALLOWED", `${req.method} not allowed on ${req.url.pathname}`);
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const ctx: RouteContext = {
    dictionary: opts.dictionary ?? createDictionary(),
    maxEditDistance: opts.maxEditDistance ?? 2,
    startedAt: Date.now(),
  };

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    let out: RouteResponse;
    try {
      const body = await readBody(req);
      out = route(ctx, { method, url, contentType: req.headers["content-type"], body, requestId });
    } catch (e) {
      log.error({ err: e, requestId, method, path: url.pathname }, "request failed");
      out = {
        status: 500,
        contentType: PROBLEM_CONTENT_TYPE,
        body: problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }),
      };
    }

    log.debug({ requestId, method, path: url.pathname, status: out.status }, "request");
    send(res, out);
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(String(c)));
  return Buffer.concat(chunks).toString("utf8");
}

function send(res: http.ServerResponse, out: RouteResponse): void {
  res.statusCode = out.status;
  if (out.body === undefined) {
    res.end();
    return;
  }
  res.setHeader("content-type", out.contentType ?? "application/json");
  res.end(JSON.stringify(out.body));
}
