import http from "node:http";
import { randomUUID } from "node:crypto";

import { MiningError } from "../core/errors.js";
import { getLogger } from "../logging/logger.js";
import { PROBLEM_CONTENT_TYPE, problem, type FieldError } from "./problem.js";
import { asInt, asString, isRecord, isStringArray, pushErr } from "./validation.js";
import { createMiningEngine, type Engine } from "./engine.js";

const SERVICE = "itemset_miner";
const VERSION = "0.1.0";
const MAX_TRANSACTIONS = 100000;
const DEFAULT_MAX_ITEMSETS = 100000;

const logger = getLogger("HttpServer");

export interface ServerOptions {
  port?: number;
  engine?: Engine;
  /** Ceiling on the itemsets one request may produce; past it the request gets a 422. */
  maxItemsets?: number;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createMiningEngine();
  const maxItemsets = opts.maxItemsets ?? DEFAULT_MAX_ITEMSETS;

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
        });
      }

      if (req.method === "POST" && url.pathname === "/mine") {
        if (!isJson(req)) {
          return sendProblem(res, 415, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance: url.pathname, requestId }));
        }

        const started = Date.now();
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance: url.pathname, requestId }));
        }

        const errors: FieldError[] = [];
        const txVal = body.transactions;
        const transactions: Array<string | string[]> = [];
        if (!Array.isArray(txVal)) {
          pushErr(errors, "$.transactions", "must be an array");
        } else if (txVal.length > MAX_TRANSACTIONS) {
          pushErr(errors, "$.transactions", `must contain at most ${MAX_TRANSACTIONS} items`);
        } else {
          txVal.forEach((t: unknown, i) => {
            if (typeof t === "string" || isStringArray(t)) transactions.push(t);
            else pushErr(errors, `$.transactions[${i}]`, "must be a string or an array of strings");
          });
        }

        const minSupport = asInt(body.minSupport);
        if (minSupport === undefined) pushErr(errors, "$.minSupport", "must be an integer");

        const modeVal = asString(body.mode) ?? "characters";
        const mode = modeVal === "characters" || modeVal === "tokens" ? modeVal : undefined;
        if (!mode) pushErr(errors, "$.mode", "must be one of: characters, tokens");

        const algorithmVal = asString(body.algorithm) ?? "dfs";
        const algorithm = algorithmVal === "dfs" || algorithmVal === "bfs" ? algorithmVal : undefined;
        if (!algorithm) pushErr(errors, "$.algorithm", "must be one of: dfs, bfs");

        let maxSize: number | undefined;
        if (body.maxSize != null) {
          maxSize = asInt(body.maxSize);
          if (maxSize === undefined || maxSize < 1) pushErr(errors, "$.maxSize", "must be a positive integer");
        }

        const requireNonEmpty = body.requireNonEmpty ?? false;
        if (typeof requireNonEmpty !== "boolean") pushErr(errors, "$.requireNonEmpty", "must be a boolean");

        if (errors.length || minSupport === undefined || !mode || !algorithm || typeof requireNonEmpty !== "boolean") {
          return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance: url.pathname, requestId, errors }));
        }

        const result = engine.mine({ transactions, minSupport, mode, algorithm, maxSize, maxItemsets, requireNonEmpty });
        return sendJson(res, 200, { ...result, tookMs: Date.now() - started });
      }

      return sendProblem(res, 404, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance: url.pathname, requestId }));
    } catch (e) {
      if (e instanceof MiningError) {
        const status = e.code === "EMPTY_INPUT" || e.code === "RESULT_LIMIT" ? 422 : 400;
        return sendProblem(res, status, problem({ status, code: e.code, detail: e.message, instance: url.pathname, requestId }));
      }
      if (e instanceof SyntaxError) {
        return sendProblem(res, 400, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be valid JSON", instance: url.pathname, requestId }));
      }
      logger.error({ err: e, requestId, path: url.pathname }, "request failed");
      return sendProblem(res, 500, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance: url.pathname, requestId }));
    }
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

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return ct.split(";")[0]?.trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  return raw.length ? JSON.parse(raw) : null;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
