import type { RequestHandler } from "express";
import type { Logger } from "pino";
import type { AuthCore } from "../types.js";
import type { CacheStore } from "../cache/types.js";
import type { Store } from "../store/types.js";
import type { PasswordHasher } from "../adapters/types.js";
import type { PasswordResetService } from "../auth/passwordReset.js";

export type AppDeps = {
  apiPrefix: string;
  corsOrigins: string[];
  auth: AuthCore;
  store: Store;
  cache: CacheStore;
  hasher: PasswordHasher;
  passwordReset: PasswordResetService;
  logger: Logger;
};

export type RouteContext = AppDeps & {
  guards: {
    /** Any valid access token. */
    user: RequestHandler;
    /** Valid access token of an active principal. */
    active: RequestHandler;
    /** Active and elevated. */
    admin: RequestHandler;
  };
};
