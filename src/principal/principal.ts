import type { AdminSignals } from "../config.js";
import type { ExternalUserInfo } from "../adapters/types.js";
import type { UserRecord } from "../store/types.js";

export type PrincipalProfile = {
  id: string;
  source: "local" | "external";
  email?: string;
  name?: string;
  login?: string;
  role?: string;
  isActive: boolean;
  isElevated: boolean;
};

/**
 * The authenticated actor. Built once per request by the authenticator;
 * everything downstream uses only this surface.
 */
export interface Principal {
  id(): string;
  isActive(): boolean;
  isElevated(): boolean;
  toProfile(): PrincipalProfile;
}

export class LocalPrincipal implements Principal {
  constructor(private readonly user: UserRecord) {}

  id() {
    return String(this.user.id);
  }

  isActive() {
    return this.user.isActive;
  }

  isElevated() {
    return this.user.isSuperuser;
  }

  toProfile(): PrincipalProfile {
    return {
      id: this.id(),
      source: "local",
      email: this.user.email,
      name: this.user.name,
      isActive: this.isActive(),
      isElevated: this.isElevated(),
    };
  }
}

export class ExternalPrincipal implements Principal {
  private readonly elevated: boolean;

  constructor(
    private readonly info: ExternalUserInfo,
    signals: AdminSignals,
  ) {
    this.elevated = isElevatedExternal(info, signals);
  }

  id() {
    return String(this.info.id);
  }

  isActive() {
    return this.info.active !== false;
  }

  isElevated() {
    return this.elevated;
  }

  toProfile(): PrincipalProfile {
    return {
      id: this.id(),
      source: "external",
      ...(this.info.email ? { email: this.info.email } : {}),
      ...(this.info.name ? { name: this.info.name } : {}),
      ...(this.info.login ? { login: this.info.login } : {}),
      ...(this.info.role ? { role: this.info.role } : {}),
      isActive: this.isActive(),
      isElevated: this.isElevated(),
    };
  }
}

const norm = (s: string) => s.trim().toLowerCase();

function matches(value: string | undefined, candidates: string[]): boolean {
  if (!value) return false;
  const v = norm(value);
  return candidates.some((c) => norm(c) === v);
}

/**
 * Any one of the admin login, admin display name or admin role label marks
 * an ERP user as elevated.
 */
export function isElevatedExternal(
  info: ExternalUserInfo,
  signals: AdminSignals,
): boolean {
  return (
    matches(info.login, signals.logins) ||
    matches(info.name, signals.names) ||
    matches(info.role, signals.roles)
  );
}
