import { err } from "../errors/error.js";
import type { AuthError } from "../errors/error.js";
import type { Principal } from "../principal/principal.js";

export type Decision = { ok: true } | { ok: false; error: AuthError };

const ALLOW: Decision = { ok: true };

export function requireActive(principal: Principal): Decision {
  if (!principal.isActive()) {
    return { ok: false, error: err("AUTH_INACTIVE_ACCOUNT", "Inactive user") };
  }
  return ALLOW;
}

export function requireElevated(principal: Principal): Decision {
  if (!principal.isElevated()) {
    return {
      ok: false,
      error: err("AUTH_FORBIDDEN", "Not enough permissions"),
    };
  }
  return ALLOW;
}

export function requireSelfOrElevated(
  principal: Principal,
  targetId: string | number,
): Decision {
  if (principal.id() === String(targetId) || principal.isElevated()) {
    return ALLOW;
  }
  return { ok: false, error: err("AUTH_FORBIDDEN", "Not enough permissions") };
}
