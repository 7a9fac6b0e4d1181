import type { Express } from "express";
import type { Logger } from "pino";
import type { GatewayConfig } from "./config.js";
import type { AuthCore } from "./types.js";
import type { CacheStore } from "./cache/types.js";
import type { Store } from "./store/types.js";
import type {
  CredentialChecker,
  IdentityProvider,
  PasswordHasher,
  PasswordResetNotifier,
  PrincipalResolver,
} from "./adapters/types.js";
import { createAuthCore } from "./framework.js";
import { JwtTokenProvider } from "./token/jwtTokenProvider.js";
import { createTokenService } from "./token/tokenService.js";
import { MemoryCacheStore } from "./cache/memoryCacheStore.js";
import { RedisCacheStore } from "./cache/redisCacheStore.js";
import { SqliteStore } from "./store/sqliteStore.js";
import { StoreCredentialChecker, StorePrincipalResolver } from "./adapters/local.js";
import { ErpCredentialChecker, ErpPrincipalResolver } from "./adapters/federated.js";
import { ErpIdentityProvider } from "./identity/erpIdentityProvider.js";
import { BcryptPasswordHasher } from "./auth/password.js";
import {
  LoggingPasswordResetNotifier,
  createPasswordResetService,
} from "./auth/passwordReset.js";
import { createApp } from "./http/app.js";

/** Collaborators supplied by the caller instead of being built from config. */
export type GatewayOverrides = {
  store?: Store;
  cache?: CacheStore;
  identity?: IdentityProvider;
  hasher?: PasswordHasher;
  notifier?: PasswordResetNotifier;
  /** Epoch milliseconds. */
  now?: () => number;
};

export type Gateway = {
  app: Express;
  auth: AuthCore;
  store: Store;
  cache: CacheStore;
  hasher: PasswordHasher;
  /** Releases what the gateway opened itself; overrides are left to the caller. */
  close(): Promise<void>;
};

function buildIdentity(
  config: GatewayConfig,
  logger: Logger,
  override?: IdentityProvider,
): IdentityProvider {
  if (override) return override;
  if (!config.erp) {
    throw new Error("federated mode requires ERP connection settings");
  }
  return new ErpIdentityProvider({ ...config.erp, logger });
}

export function createGateway(
  config: GatewayConfig,
  logger: Logger,
  overrides: GatewayOverrides = {},
): Gateway {
  const owned: Array<() => Promise<void> | void> = [];

  let store = overrides.store;
  if (!store) {
    const sqlite = new SqliteStore({ path: config.databasePath });
    owned.push(() => sqlite.close());
    store = sqlite;
  }

  let cache = overrides.cache;
  if (!cache) {
    if (config.redisUrl) {
      const redis = RedisCacheStore.connect({
        url: config.redisUrl,
        commandTimeoutMs: config.cacheTimeoutMs,
        logger,
      });
      owned.push(() => redis.close());
      cache = redis;
    } else {
      logger.warn("REDIS_URL not set; using the in-process cache");
      cache = new MemoryCacheStore();
    }
  }

  const hasher = overrides.hasher ?? new BcryptPasswordHasher(config.bcryptRounds);

  const tokenService = createTokenService(
    {
      issuer: config.issuer,
      audience: config.audience,
      accessTokenTtlSeconds: config.accessTokenTtlSeconds,
      refreshTokenTtlSeconds: config.refreshTokenTtlSeconds,
      clockSkewSeconds: config.clockSkewSeconds,
    },
    {
      provider: new JwtTokenProvider(config.signing),
      cache,
      logger,
      now: overrides.now,
    },
  );

  let credentialChecker: CredentialChecker;
  let principalResolver: PrincipalResolver;
  if (config.authMode === "federated") {
    const identity = buildIdentity(config, logger, overrides.identity);
    credentialChecker = new ErpCredentialChecker(identity, logger);
    principalResolver = new ErpPrincipalResolver(identity, config.adminSignals);
  } else {
    credentialChecker = new StoreCredentialChecker(store.users, hasher);
    principalResolver = new StorePrincipalResolver(store.users);
  }

  const auth = createAuthCore(
    { mode: config.authMode, rotateRefreshTokens: config.rotateRefreshTokens },
    { credentialChecker, principalResolver, tokenService, logger },
  );

  const passwordReset = createPasswordResetService({
    users: store.users,
    cache,
    hasher,
    notifier: overrides.notifier ?? new LoggingPasswordResetNotifier(logger),
    logger,
  });

  const app = createApp({
    apiPrefix: config.apiPrefix,
    corsOrigins: config.corsOrigins,
    auth,
    store,
    cache,
    hasher,
    passwordReset,
    logger,
  });

  return {
    app,
    auth,
    store,
    cache,
    hasher,
    async close() {
      for (const release of owned.reverse()) await release();
    },
  };
}

/** Creates the configured superuser unless a user with that email exists. */
export async function ensureBootstrapAdmin(
  config: GatewayConfig,
  gateway: Pick<Gateway, "store" | "hasher">,
  logger: Logger,
): Promise<void> {
  const admin = config.bootstrapAdmin;
  if (!admin) return;
  if (await gateway.store.users.findByEmail(admin.email)) return;
  const user = await gateway.store.users.create({
    email: admin.email,
    name: "Administrator",
    hashedPassword: await gateway.hasher.hash(admin.password),
    phone: null,
    isActive: true,
    isSuperuser: true,
    isCompany: false,
  });
  logger.info({ userId: user.id }, "bootstrap superuser created");
}
