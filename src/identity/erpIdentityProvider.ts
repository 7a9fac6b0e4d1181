import { z } from "zod";
import type { Logger } from "pino";
import type { ErpConfig } from "../config.js";
import type { ExternalUserInfo, IdentityProvider } from "../adapters/types.js";

// error first: `result: unknown` would also accept an error body
const RpcResponse = z.union([
  z.object({
    error: z.object({
      code: z.number().optional(),
      message: z.string(),
      data: z.object({ name: z.string().optional() }).passthrough().optional(),
    }),
  }),
  z.object({ result: z.unknown() }),
]);

const UserRecord = z
  .object({
    id: z.number().int(),
    name: z.union([z.string(), z.literal(false)]).optional(),
    email: z.union([z.string(), z.literal(false)]).optional(),
    login: z.union([z.string(), z.literal(false)]).optional(),
    active: z.boolean().optional(),
    // many2one fields come back as [id, display_name] or false
    partner_id: z
      .union([z.tuple([z.number(), z.string()]), z.literal(false)])
      .optional(),
  })
  .passthrough();

export class ErpRpcError extends Error {
  constructor(
    message: string,
    readonly remoteName?: string,
  ) {
    super(message);
    this.name = "ErpRpcError";
  }
}

export type ErpIdentityProviderOptions = ErpConfig & {
  logger: Logger;
  fetch?: typeof fetch;
};

const USER_FIELDS = ["name", "email", "login", "partner_id", "active"];

const str = (v: string | false | undefined) =>
  typeof v === "string" && v.length > 0 ? v : undefined;

/**
 * ERP identity source over its JSON-RPC endpoint. Lookups run as the
 * configured service account; `authenticate` checks the end user's own
 * credentials.
 */
export class ErpIdentityProvider implements IdentityProvider {
  private serviceUid?: Promise<number>;
  private fetchImpl: typeof fetch;
  private log: Logger;
  private seq = 0;

  constructor(private readonly opts: ErpIdentityProviderOptions) {
    this.fetchImpl = opts.fetch ?? fetch;
    this.log = opts.logger.child({ component: "erp-identity" });
  }

  private async call(
    service: "common" | "object",
    method: string,
    args: unknown[],
  ): Promise<unknown> {
    const res = await this.fetchImpl(
      new URL("/jsonrpc", this.opts.url).toString(),
      {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          jsonrpc: "2.0",
          method: "call",
          params: { service, method, args },
          id: ++this.seq,
        }),
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      },
    );
    if (!res.ok) {
      throw new ErpRpcError(`ERP responded with HTTP ${res.status}`);
    }
    const body = RpcResponse.parse(await res.json());
    if ("error" in body) {
      throw new ErpRpcError(body.error.message, body.error.data?.name);
    }
    return body.result;
  }

  private async loginServiceAccount(): Promise<number> {
    const uid = await this.call("common", "authenticate", [
      this.opts.db,
      this.opts.username,
      this.opts.password,
      {},
    ]);
    if (typeof uid !== "number" || uid <= 0) {
      throw new ErpRpcError("ERP service account was rejected");
    }
    return uid;
  }

  private async serviceAccountUid(): Promise<number> {
    if (this.serviceUid) return this.serviceUid;
    const pending = this.loginServiceAccount();
    this.serviceUid = pending;
    try {
      return await pending;
    } catch (e) {
      // retried on the next lookup
      this.serviceUid = undefined;
      throw e;
    }
  }

  async authenticate(login: string, password: string): Promise<number | null> {
    const uid = await this.call("common", "authenticate", [
      this.opts.db,
      login,
      password,
      {},
    ]);
    return typeof uid === "number" && uid > 0 ? uid : null;
  }

  async getUserInfo(id: number): Promise<ExternalUserInfo | null> {
    const uid = await this.serviceAccountUid();
    const fields = this.opts.roleField
      ? [...USER_FIELDS, this.opts.roleField]
      : USER_FIELDS;
    const result = await this.call("object", "execute_kw", [
      this.opts.db,
      uid,
      this.opts.password,
      "res.users",
      "search_read",
      [[["id", "=", id]]],
      { fields, limit: 1, context: { active_test: false } },
    ]);
    const rows = z.array(UserRecord).parse(result);
    const row = rows[0];
    if (!row) {
      this.log.debug({ id }, "ERP user not found");
      return null;
    }

    const role = this.opts.roleField ? row[this.opts.roleField] : undefined;
    return {
      id: row.id,
      name: str(row.name),
      email: str(row.email),
      login: str(row.login),
      partnerId: row.partner_id ? row.partner_id[0] : undefined,
      role: typeof role === "string" && role.length > 0 ? role : undefined,
      active: row.active,
    };
  }
}
