import type {
  ErrorRequestHandler,
  Request,
  RequestHandler,
  Response,
} from "express";
import { ZodError } from "zod";
import type { Logger } from "pino";
import type { AuthCore } from "../types.js";
import type { Principal } from "../principal/principal.js";
import type { Decision } from "../auth/policy.js";
import { GatewayError, err, fail } from "../errors/error.js";

declare global {
  namespace Express {
    interface Request {
      principal?: Principal;
      bearerToken?: string;
    }
  }
}

export type Policy = (principal: Principal) => Decision;

const BEARER = /^Bearer\s+(\S+)\s*$/i;

export function bearerToken(header: string | undefined): string | null {
  const match = header ? BEARER.exec(header) : null;
  return match?.[1] ?? null;
}

/** Forwards a rejected handler promise to the error middleware. */
export const route =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

export function enforce(decision: Decision): void {
  if (!decision.ok) throw new GatewayError(decision.error);
}

/**
 * Resolves the bearer token to a principal, applies `policies` in order and
 * leaves the principal on `req.principal`.
 */
export function authenticate(
  auth: AuthCore,
  ...policies: Policy[]
): RequestHandler {
  return (req, _res, next) => {
    const token = bearerToken(req.headers.authorization);
    if (!token) {
      next(new GatewayError(err("AUTH_UNAUTHORIZED", "Not authenticated")));
      return;
    }
    auth
      .doResolvePrincipal(token)
      .then((resolved) => {
        if (!resolved.ok) throw new GatewayError(resolved.error);
        for (const policy of policies) enforce(policy(resolved.principal));
        req.principal = resolved.principal;
        req.bearerToken = token;
        next();
      })
      .catch(next);
  };
}

export function principalOf(req: Request): Principal {
  return req.principal ?? fail("AUTH_UNAUTHORIZED", "Not authenticated");
}

export function cors(origins: string[]): RequestHandler {
  const anyOrigin = origins.includes("*");
  return (req, res, next) => {
    const origin = req.headers.origin;
    if (origin && (anyOrigin || origins.includes(origin))) {
      res.setHeader("Access-Control-Allow-Origin", anyOrigin ? "*" : origin);
      res.setHeader("Vary", "Origin");
      if (!anyOrigin) res.setHeader("Access-Control-Allow-Credentials", "true");
      res.setHeader(
        "Access-Control-Allow-Methods",
        "GET,POST,PUT,DELETE,OPTIONS",
      );
      res.setHeader(
        "Access-Control-Allow-Headers",
        "Authorization,Content-Type",
      );
      res.setHeader("Access-Control-Max-Age", "600");
    }
    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }
    next();
  };
}

function isBodyParserError(e: unknown): boolean {
  return (
    typeof e === "object" &&
    e !== null &&
    "type" in e &&
    typeof e.type === "string" &&
    e.type.startsWith("entity.")
  );
}

function toGatewayError(e: unknown): GatewayError {
  if (e instanceof GatewayError) return e;
  if (e instanceof ZodError) {
    return new GatewayError(
      err(
        "VALIDATION_ERROR",
        "Invalid request",
        e.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
      ),
    );
  }
  if (isBodyParserError(e)) {
    return new GatewayError(err("VALIDATION_ERROR", "Malformed request body"));
  }
  return new GatewayError(err("INTERNAL_ERROR", "Internal server error"));
}

export const notFound: RequestHandler = (_req, _res, next) => {
  next(new GatewayError(err("NOT_FOUND", "Route not found")));
};

export function errorHandler(logger: Logger): ErrorRequestHandler {
  const log = logger.child({ component: "http" });
  return (e: unknown, req, res, next) => {
    if (res.headersSent) {
      next(e);
      return;
    }
    const error = toGatewayError(e);
    if (error.code === "INTERNAL_ERROR") {
      log.error({ err: e, method: req.method, path: req.path }, "unhandled error");
    } else {
      log.debug(
        { code: error.code, method: req.method, path: req.path },
        "request rejected",
      );
    }
    if (error.status === 401) res.setHeader("WWW-Authenticate", "Bearer");
    res.status(error.status).json({ error: error.toJSON() });
  };
}
