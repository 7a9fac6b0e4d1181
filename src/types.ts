import type { AuthError } from "./errors/error.js";
import type {
  CredentialChecker,
  PrincipalResolver,
} from "./adapters/types.js";
import type { TokenService } from "./token/tokenService.js";
import type { Principal } from "./principal/principal.js";
import type { Logger } from "pino";

export type AuthMode = "local" | "federated";

export type AuthCoreConfig = {
  mode: AuthMode;
  /** Revoke the presented refresh token once a new pair has been issued. */
  rotateRefreshTokens: boolean;
};

export type AuthCoreAdapters = {
  credentialChecker: CredentialChecker;
  principalResolver: PrincipalResolver;
  tokenService: TokenService;
  logger: Logger;
};

export type AuthenticateInput = {
  login: string;
  password: string;
};

export type AuthenticateResult =
  | {
      ok: true;
      accessToken: string;
      refreshToken: string;
      tokenType: "bearer";
      principalId: string;
      externalId?: number;
    }
  | {
      ok: false;
      error: AuthError;
    };

export type ResolveResult =
  | {
      ok: true;
      principal: Principal;
      tokenId: string;
      expiresAt: number;
    }
  | {
      ok: false;
      error: AuthError;
    };

export type LogoutResult =
  | { ok: true; revoked: boolean }
  | { ok: false; error: AuthError };

export interface AuthCore {
  readonly mode: AuthMode;
  doAuthenticate(input: AuthenticateInput): Promise<AuthenticateResult>;
  doResolvePrincipal(token: string): Promise<ResolveResult>;
  doRefresh(refreshToken: string): Promise<AuthenticateResult>;
  doLogout(token: string): Promise<LogoutResult>;
}
