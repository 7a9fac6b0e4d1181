import { createHash, randomUUID } from "node:crypto";
import type { Logger } from "pino";
import type { CacheStore } from "../cache/types.js";
import { err } from "../errors/error.js";
import type { Result } from "../errors/error.js";
import type {
  TokenClaims,
  TokenKind,
  TokenPair,
  TokenProvider,
} from "./types.js";

export type TokenServiceConfig = {
  issuer: string;
  audience?: string | string[];
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  clockSkewSeconds?: number;
};

export type TokenServiceDeps = {
  provider: TokenProvider;
  cache: CacheStore;
  logger: Logger;
  now?: () => number; // epoch ms
};

export type VerifyResult = Result<{ claims: TokenClaims }>;
export type RevokeResult = Result<{ revoked: boolean; ttlSeconds: number }>;

export interface TokenService {
  issue(principalId: string, kind: TokenKind): Promise<string>;
  issuePair(principalId: string): Promise<TokenPair>;
  verify(token: string): Promise<VerifyResult>;
  isRevoked(token: string): Promise<boolean>;
  revoke(token: string): Promise<RevokeResult>;
}

const REVOKED_PREFIX = "revoked:";

/** Cache key for a revocation marker. The raw token never becomes a key. */
export function revocationKey(token: string): string {
  return REVOKED_PREFIX + createHash("sha256").update(token).digest("hex");
}

function isExpiredError(e: unknown): boolean {
  return (
    typeof e === "object" &&
    e !== null &&
    "code" in e &&
    e.code === "ERR_JWT_EXPIRED"
  );
}

export function createTokenService(
  config: TokenServiceConfig,
  deps: TokenServiceDeps,
): TokenService {
  if (!config?.issuer) throw new Error("TokenServiceConfig.issuer is required");
  for (const k of ["accessTokenTtlSeconds", "refreshTokenTtlSeconds"] as const) {
    if (!(config[k] > 0)) throw new Error(`TokenServiceConfig.${k} must be > 0`);
  }

  const now = deps.now ?? Date.now;
  const clockSkewSeconds = config.clockSkewSeconds ?? 0;
  const log = deps.logger.child({ component: "token-service" });

  const ttlFor = (kind: TokenKind) =>
    kind === "access"
      ? config.accessTokenTtlSeconds
      : config.refreshTokenTtlSeconds;

  async function issue(principalId: string, kind: TokenKind): Promise<string> {
    const issuedAt = Math.floor(now() / 1000);
    return deps.provider.issueToken(
      { sub: principalId, knd: kind, jti: randomUUID() },
      {
        issuer: config.issuer,
        audience: config.audience,
        issuedAt,
        expiresAt: issuedAt + ttlFor(kind),
      },
    );
  }

  async function issuePair(principalId: string): Promise<TokenPair> {
    const [accessToken, refreshToken] = await Promise.all([
      issue(principalId, "access"),
      issue(principalId, "refresh"),
    ]);
    return { accessToken, refreshToken, tokenType: "bearer" };
  }

  async function verifyRaw(token: string): Promise<TokenClaims> {
    const payload = await deps.provider.verifyToken(token, {
      issuer: config.issuer,
      audience: config.audience,
      clockSkewSeconds,
      currentDate: new Date(now()),
    });
    if (typeof payload.exp !== "number" || typeof payload.iat !== "number") {
      throw new Error("token is missing iat/exp");
    }
    return {
      subjectId: payload.sub,
      kind: payload.knd,
      tokenId: payload.jti,
      issuedAt: payload.iat,
      expiresAt: payload.exp,
    };
  }

  async function verify(token: string): Promise<VerifyResult> {
    try {
      return { ok: true, claims: await verifyRaw(token) };
    } catch (e) {
      log.debug({ reason: e instanceof Error ? e.message : String(e) }, "token rejected");
      return { ok: false, error: err("AUTH_TOKEN_INVALID", "Token invalid") };
    }
  }

  /**
   * Fail-open: when the cache cannot be reached the token is treated as not
   * revoked, so a cache outage does not lock every user out. Revoked tokens
   * are accepted again for the duration of the outage.
   */
  async function isRevoked(token: string): Promise<boolean> {
    try {
      return (await deps.cache.get(revocationKey(token))) !== null;
    } catch (e) {
      log.warn(
        { err: e },
        "revocation lookup failed; treating token as not revoked",
      );
      return false;
    }
  }

  async function revoke(token: string): Promise<RevokeResult> {
    let claims: TokenClaims;
    try {
      claims = await verifyRaw(token);
    } catch (e) {
      if (isExpiredError(e)) return { ok: true, revoked: false, ttlSeconds: 0 };
      return { ok: false, error: err("AUTH_TOKEN_INVALID", "Token invalid") };
    }

    // The marker lives exactly as long as the token would still verify.
    const ttlSeconds = Math.max(
      claims.expiresAt + clockSkewSeconds - Math.floor(now() / 1000),
      0,
    );
    if (ttlSeconds === 0) return { ok: true, revoked: false, ttlSeconds };

    try {
      await deps.cache.setWithExpiry(revocationKey(token), "1", ttlSeconds);
    } catch (e) {
      log.error({ err: e, tokenId: claims.tokenId }, "failed to record revocation");
      return {
        ok: false,
        error: err("SERVICE_UNAVAILABLE", "Token store unavailable"),
      };
    }
    log.info(
      { tokenId: claims.tokenId, sub: claims.subjectId, ttlSeconds },
      "token revoked",
    );
    return { ok: true, revoked: true, ttlSeconds };
  }

  return { issue, issuePair, verify, isRevoked, revoke };
}
