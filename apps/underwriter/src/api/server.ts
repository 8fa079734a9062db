import http from "node:http";
import {
  bindBodySchema,
  quoteBodySchema,
  simulateBodySchema,
  toPolicyholder,
  toQuoteRequest,
  toSimulationRequest,
  type Clock,
  type Logger,
  type Partner,
  type Runtime,
} from "@embedded-uw/shared";
import { ZodError } from "zod";
import type { AuditLog } from "../audit/auditLog.js";
import { UnauthorizedError, ValidationError, isUnderwritingError } from "../errors/errors.js";
import type { QuotePipeline } from "../orchestrator/quotePipeline.js";
import { simulatePortfolio, type SimulatorEnv } from "../simulation/portfolioSimulator.js";
import { findPartnerByToken, type ConfigRegistry } from "../snapshot/configSnapshot.js";
import type { RuntimeState } from "../state/runtimeState.js";
import { toBindingResponse, toPolicyResponse, toQuoteResponse, toSimulationResponse } from "./presenters.js";

export type ApiDeps = {
  pipeline: QuotePipeline;
  config: ConfigRegistry;
  audit: AuditLog;
  state: RuntimeState;
  clock: Clock;
  log: Logger;
  simulator: Runtime<SimulatorEnv>;
};

export type ApiRequest = {
  method: string;
  url: string;
  authorization?: string;
  body?: unknown;
};

export type ApiResponse = {
  status: number;
  body: unknown;
};

const POLICY_PATH = /^\/v1\/policies\/([^/]+)$/;

function ok(body: unknown, status = 200): ApiResponse {
  return { status, body };
}

function notFound(): ApiResponse {
  return { status: 404, body: { error: { code: "NOT_FOUND", message: "Not found" } } };
}

function authenticate(deps: ApiDeps, authorization: string | undefined): Partner {
  const match = /^Bearer\s+(\S+)$/i.exec(authorization ?? "");
  if (!match?.[1]) throw new UnauthorizedError();
  const partner = findPartnerByToken(deps.config.current, match[1]);
  if (!partner) throw new UnauthorizedError("Unknown API token");
  return partner;
}

function errorResponse(err: unknown): ApiResponse {
  if (isUnderwritingError(err)) return { status: err.httpStatus, body: { error: err.toJSON() } };
  if (err instanceof ZodError) {
    return {
      status: 400,
      body: {
        error: {
          code: "VALIDATION_ERROR",
          message: "Request body failed validation",
          details: { issues: err.issues.map((i) => ({ path: i.path.join("."), message: i.message })) },
        },
      },
    };
  }
  return { status: 500, body: { error: { code: "INTERNAL_ERROR", message: String(err) } } };
}

async function dispatch(deps: ApiDeps, req: ApiRequest, path: string, query: URLSearchParams): Promise<ApiResponse> {
  if (req.method === "GET") {
    if (path === "/api/health") return ok({ ok: true, ts: deps.clock.nowIso() });
    if (path === "/api/state") return ok(deps.state);
    if (path === "/api/audit") {
      const lines = Math.max(1, Math.min(5000, Number(query.get("lines") ?? 200) || 200));
      return ok({ lines, items: deps.audit.tail(lines) });
    }
    const policyMatch = POLICY_PATH.exec(path);
    if (policyMatch?.[1]) {
      authenticate(deps, req.authorization);
      const policy = deps.pipeline.getPolicy(decodeURIComponent(policyMatch[1]));
      return policy ? ok(toPolicyResponse(policy)) : notFound();
    }
    return notFound();
  }

  if (req.method !== "POST") return notFound();

  if (path === "/v1/quotes") {
    const partner = authenticate(deps, req.authorization);
    const body = quoteBodySchema.parse(req.body);
    return ok(toQuoteResponse(deps.pipeline.quote(toQuoteRequest(body, partner.id))), 201);
  }

  if (path === "/v1/bindings") {
    const partner = authenticate(deps, req.authorization);
    const body = bindBodySchema.parse(req.body);
    const policy = await deps.pipeline.bind(body.quote_id, toPolicyholder(body.policyholder), partner.id);
    return ok(toBindingResponse(policy), 201);
  }

  if (path === "/v1/portfolio/simulate") {
    authenticate(deps, req.authorization);
    const body = simulateBodySchema.parse(req.body);
    const request = toSimulationRequest(body, deps.pipeline.policyBook(body.as_of_month));
    const result = await deps.simulator.run(simulatePortfolio(request)).promise;
    return ok(toSimulationResponse(result));
  }

  return notFound();
}

/**
 * Route one request. Every failure becomes an `{ error }` body with the
 * status its error class carries, and is written to the audit log.
 */
export async function routeRequest(deps: ApiDeps, req: ApiRequest): Promise<ApiResponse> {
  const parsed = new URL(req.url, "http://localhost");
  try {
    return await dispatch(deps, req, parsed.pathname, parsed.searchParams);
  } catch (err) {
    deps.audit.error(err);
    const res = errorResponse(err);
    if (res.status >= 500) deps.log.error(`[api] ${req.method} ${parsed.pathname} failed`, err);
    else deps.log.warn(`[api] ${req.method} ${parsed.pathname} → ${res.status}`);
    return res;
  }
}

function readBody(req: http.IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (c: Buffer) => chunks.push(c));
    req.on("error", reject);
    req.on("end", () => {
      const text = Buffer.concat(chunks).toString("utf-8");
      if (!text) return resolve(undefined);
      try {
        const parsed: unknown = JSON.parse(text);
        resolve(parsed);
      } catch {
        reject(new ValidationError("Request body is not valid JSON", "body"));
      }
    });
  });
}

function send(res: http.ServerResponse, out: ApiResponse) {
  res.writeHead(out.status, {
    "Content-Type": "application/json",
    "Access-Control-Allow-Origin": "*",
  });
  res.end(JSON.stringify(out.body));
}

/**
 * Endpoints:
 * - GET /api/health
 * - GET /api/state
 * - GET /api/audit?lines=200
 * - POST /v1/quotes
 * - POST /v1/bindings
 * - GET /v1/policies/:id
 * - POST /v1/portfolio/simulate
 */
export function startApiServer(deps: ApiDeps, port: number) {
  const server = http.createServer((req, res) => {
    if (req.method === "OPTIONS") {
      res.writeHead(204, {
        "Access-Control-Allow-Origin": "*",
        "Access-Control-Allow-Methods": "GET,POST,OPTIONS",
        "Access-Control-Allow-Headers": "Content-Type,Authorization",
      });
      res.end();
      return;
    }

    const method = req.method ?? "GET";
    const url = req.url ?? "/";
    const handled = method === "POST"
      ? readBody(req).then((body) => routeRequest(deps, { method, url, authorization: req.headers.authorization, body }))
      : routeRequest(deps, { method, url, authorization: req.headers.authorization });

    handled
      .catch((err: unknown) => {
        deps.audit.error(err);
        return errorResponse(err);
      })
      .then((out) => send(res, out))
      .catch((err: unknown) => deps.log.error("[api] failed to write response", err));
  });

  server.listen(port, () => {
    deps.log.info(`[api] listening on http://localhost:${port}`);
  });

  return server;
}
