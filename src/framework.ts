import type {
  AuthCore,
  AuthCoreAdapters,
  AuthCoreConfig,
  AuthenticateInput,
  AuthenticateResult,
  LogoutResult,
  ResolveResult,
} from "./types.js";
import type { AuthError } from "./errors/error.js";
import { UpstreamUnavailableError, err } from "./errors/error.js";
import type { CredentialFailureReason } from "./adapters/types.js";
import type { TokenClaims, TokenKind } from "./token/types.js";
import type { Principal } from "./principal/principal.js";

function mapCredentialFailure(reason?: CredentialFailureReason) {
  switch (reason) {
    case "USER_DISABLED":
      return err("AUTH_INACTIVE_ACCOUNT", "User is inactive");
    case "UPSTREAM_UNAVAILABLE":
      return err("SERVICE_UNAVAILABLE", "Identity provider unavailable");
    default:
      // USER_NOT_FOUND collapses here so callers cannot tell which accounts exist
      return err("AUTH_INVALID_CREDENTIALS", "Incorrect email or password");
  }
}

function mapUnexpected(e: unknown): AuthError {
  if (e instanceof UpstreamUnavailableError) {
    return err("SERVICE_UNAVAILABLE", "Identity provider unavailable");
  }
  return err("INTERNAL_ERROR", "Internal error");
}

export function createAuthCore(
  config: AuthCoreConfig,
  adapters: AuthCoreAdapters,
): AuthCore {
  if (config?.mode !== "local" && config?.mode !== "federated") {
    throw new Error("AuthCoreConfig.mode must be local or federated");
  }

  const { tokenService, principalResolver, credentialChecker } = adapters;
  const log = adapters.logger.child({ component: "auth-core", mode: config.mode });

  /**
   * verify -> kind -> revocation -> current principal.
   * Revocation is fail-open (see TokenService.isRevoked).
   */
  async function checkToken(
    token: string,
    expected: TokenKind,
  ): Promise<
    | { ok: true; claims: TokenClaims; principal: Principal }
    | { ok: false; error: AuthError }
  > {
    const verified = await tokenService.verify(token);
    if (!verified.ok) return verified;

    const { claims } = verified;
    if (claims.kind !== expected) {
      return {
        ok: false,
        error: err("AUTH_TOKEN_INVALID", `Wrong token kind, expected ${expected}`),
      };
    }

    if (await tokenService.isRevoked(token)) {
      return {
        ok: false,
        error: err("AUTH_TOKEN_REVOKED", "Token has been revoked"),
      };
    }

    const principal = await principalResolver.resolve(claims.subjectId);
    if (!principal) {
      return {
        ok: false,
        error: err("AUTH_UNAUTHORIZED", "principal no longer exists"),
      };
    }
    return { ok: true, claims, principal };
  }

  async function doAuthenticate(
    input: AuthenticateInput,
  ): Promise<AuthenticateResult> {
    try {
      const login = String(input.login ?? "").trim();
      const password = String(input.password ?? "");

      if (!login || !password) {
        return {
          ok: false,
          error: err("AUTH_INVALID_CREDENTIALS", "Incorrect email or password"),
        };
      }

      const cred = await credentialChecker.checkUserNamePassword(
        login,
        password,
      );
      if (!cred.ok) {
        log.info({ reason: cred.reason ?? "INVALID_CREDENTIALS" }, "login rejected");
        return { ok: false, error: mapCredentialFailure(cred.reason) };
      }

      const pair = await tokenService.issuePair(cred.userId);
      log.info({ sub: cred.userId }, "login succeeded");
      return {
        ok: true,
        ...pair,
        principalId: cred.userId,
        ...(cred.externalId !== undefined ? { externalId: cred.externalId } : {}),
      };
    } catch (e) {
      log.error({ err: e }, "login failed");
      return { ok: false, error: mapUnexpected(e) };
    }
  }

  async function doResolvePrincipal(token: string): Promise<ResolveResult> {
    try {
      const checked = await checkToken(token, "access");
      if (!checked.ok) return checked;
      return {
        ok: true,
        principal: checked.principal,
        tokenId: checked.claims.tokenId,
        expiresAt: checked.claims.expiresAt,
      };
    } catch (e) {
      log.error({ err: e }, "principal resolution failed");
      return { ok: false, error: mapUnexpected(e) };
    }
  }

  async function doRefresh(refreshToken: string): Promise<AuthenticateResult> {
    try {
      const checked = await checkToken(refreshToken, "refresh");
      if (!checked.ok) return checked;

      const { principal, claims } = checked;
      if (!principal.isActive()) {
        return {
          ok: false,
          error: err("AUTH_INACTIVE_ACCOUNT", "User is inactive"),
        };
      }

      const pair = await tokenService.issuePair(principal.id());

      if (config.rotateRefreshTokens) {
        const revoked = await tokenService.revoke(refreshToken);
        if (!revoked.ok) {
          log.warn(
            { tokenId: claims.tokenId, code: revoked.error.code },
            "could not revoke rotated refresh token",
          );
        }
      }

      log.info({ sub: principal.id() }, "tokens refreshed");
      return { ok: true, ...pair, principalId: principal.id() };
    } catch (e) {
      log.error({ err: e }, "refresh failed");
      return { ok: false, error: mapUnexpected(e) };
    }
  }

  async function doLogout(token: string): Promise<LogoutResult> {
    try {
      const result = await tokenService.revoke(token);
      if (!result.ok) return result;
      return { ok: true, revoked: result.revoked };
    } catch (e) {
      log.error({ err: e }, "logout failed");
      return { ok: false, error: mapUnexpected(e) };
    }
  }

  return {
    mode: config.mode,
    doAuthenticate,
    doResolvePrincipal,
    doRefresh,
    doLogout,
  };
}
