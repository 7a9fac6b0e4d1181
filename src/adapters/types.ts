import type { Principal } from "../principal/principal.js";

export type CredentialFailureReason =
  | "INVALID_CREDENTIALS"
  | "USER_NOT_FOUND"
  | "USER_DISABLED"
  | "UPSTREAM_UNAVAILABLE";

export interface CredentialChecker {
  checkUserNamePassword(
    login: string,
    password: string,
  ): Promise<
    | { ok: true; userId: string; externalId?: number }
    | { ok: false; reason?: CredentialFailureReason }
  >;
}

/**
 * Loads the current state of a principal by id. Returns null when the
 * principal no longer exists; rejects when its backing source is unreachable.
 */
export interface PrincipalResolver {
  resolve(principalId: string): Promise<Principal | null>;
}

export type ExternalUserInfo = {
  id: number;
  name?: string;
  email?: string;
  login?: string;
  partnerId?: number;
  role?: string;
  active?: boolean;
};

/** Remote identity source. Both calls reject when the remote is unreachable. */
export interface IdentityProvider {
  authenticate(login: string, password: string): Promise<number | null>;
  getUserInfo(id: number): Promise<ExternalUserInfo | null>;
}

export interface PasswordHasher {
  hash(password: string): Promise<string>;
  verify(password: string, hash: string): Promise<boolean>;
}

export interface PasswordResetNotifier {
  notify(input: {
    email: string;
    token: string;
    expiresInSeconds: number;
  }): Promise<void>;
}
