import { createHash, randomBytes } from "node:crypto";
import type { Logger } from "pino";
import type { CacheStore } from "../cache/types.js";
import type { PasswordHasher, PasswordResetNotifier } from "../adapters/types.js";
import type { UserRepository } from "../store/types.js";
import { err } from "../errors/error.js";
import type { Result } from "../errors/error.js";

export const RESET_TTL_SECONDS = 1800;

/** Only a digest of the reset token is ever used as a key. */
export function resetKey(token: string): string {
  return "password_reset:" + createHash("sha256").update(token).digest("hex");
}

/** Stand-in for mail delivery: records that a reset was issued. */
export class LoggingPasswordResetNotifier implements PasswordResetNotifier {
  private log: Logger;

  constructor(logger: Logger) {
    this.log = logger.child({ component: "password-reset-notifier" });
  }

  async notify(input: { email: string; expiresInSeconds: number }) {
    this.log.info(
      { email: input.email, expiresInSeconds: input.expiresInSeconds },
      "password reset issued",
    );
  }
}

export type PasswordResetDeps = {
  users: UserRepository;
  cache: CacheStore;
  hasher: PasswordHasher;
  notifier: PasswordResetNotifier;
  logger: Logger;
  ttlSeconds?: number;
};

export interface PasswordResetService {
  /** Resolves the same way whether or not `email` belongs to an account. */
  request(email: string): Promise<void>;
  confirm(token: string, newPassword: string): Promise<Result>;
}

export function createPasswordResetService(
  deps: PasswordResetDeps,
): PasswordResetService {
  const ttlSeconds = deps.ttlSeconds ?? RESET_TTL_SECONDS;
  const log = deps.logger.child({ component: "password-reset" });

  async function request(email: string): Promise<void> {
    const user = await deps.users.findByEmail(email);
    if (!user || !user.isActive) {
      log.debug("password reset requested for unknown or inactive account");
      return;
    }
    const token = randomBytes(32).toString("base64url");
    try {
      await deps.cache.setWithExpiry(resetKey(token), String(user.id), ttlSeconds);
      await deps.notifier.notify({
        email: user.email,
        token,
        expiresInSeconds: ttlSeconds,
      });
    } catch (e) {
      // the caller's response must not differ, so the failure stops here
      log.error({ err: e, userId: user.id }, "password reset could not be issued");
    }
  }

  async function confirm(token: string, newPassword: string): Promise<Result> {
    let userId: string | null;
    try {
      // claimed before the write: a second confirm with the same token finds nothing
      userId = await deps.cache.take(resetKey(token));
    } catch (e) {
      log.warn({ err: e }, "reset store unavailable");
      return {
        ok: false,
        error: err("SERVICE_UNAVAILABLE", "Reset store unavailable"),
      };
    }

    const invalid = {
      ok: false as const,
      error: err("VALIDATION_ERROR", "Invalid or expired token"),
    };
    const id = Number(userId);
    if (userId === null || !Number.isSafeInteger(id)) return invalid;

    const updated = await deps.users.update(id, {
      hashedPassword: await deps.hasher.hash(newPassword),
    });
    if (!updated) return invalid;

    log.info({ userId: id }, "password reset completed");
    return { ok: true };
  }

  return { request, confirm };
}
