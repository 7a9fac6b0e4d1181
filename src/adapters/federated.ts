import type { Logger } from "pino";
import type {
  CredentialChecker,
  ExternalUserInfo,
  IdentityProvider,
  PrincipalResolver,
} from "./types.js";
import type { AdminSignals } from "../config.js";
import { UpstreamUnavailableError } from "../errors/error.js";
import { ExternalPrincipal } from "../principal/principal.js";

export class ErpCredentialChecker implements CredentialChecker {
  private log: Logger;

  constructor(
    private readonly identity: IdentityProvider,
    logger: Logger,
  ) {
    this.log = logger.child({ component: "erp-credentials" });
  }

  async checkUserNamePassword(login: string, password: string) {
    let uid: number | null;
    try {
      uid = await this.identity.authenticate(login, password);
    } catch (e) {
      this.log.warn({ err: e }, "identity provider unreachable during login");
      return { ok: false as const, reason: "UPSTREAM_UNAVAILABLE" as const };
    }
    if (uid === null) {
      return { ok: false as const, reason: "INVALID_CREDENTIALS" as const };
    }
    return { ok: true as const, userId: String(uid), externalId: uid };
  }
}

export class ErpPrincipalResolver implements PrincipalResolver {
  constructor(
    private readonly identity: IdentityProvider,
    private readonly signals: AdminSignals,
  ) {}

  async resolve(principalId: string) {
    const id = Number(principalId);
    if (!Number.isSafeInteger(id)) return null;
    let info: ExternalUserInfo | null;
    try {
      info = await this.identity.getUserInfo(id);
    } catch (e) {
      throw new UpstreamUnavailableError("identity provider unreachable", {
        cause: e,
      });
    }
    return info ? new ExternalPrincipal(info, this.signals) : null;
  }
}
