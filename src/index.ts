export { createAuthCore } from "./framework.js";
export { createGateway, ensureBootstrapAdmin } from "./gateway.js";
export type { Gateway, GatewayOverrides } from "./gateway.js";
export { createApp } from "./http/app.js";
export type { AppDeps } from "./http/context.js";

export * from "./types.js";
export * from "./config.js";
export * from "./logger.js";
export * from "./errors/codes.js";
export * from "./errors/error.js";

export * from "./adapters/types.js";
export * from "./adapters/local.js";
export * from "./adapters/federated.js";
export * from "./identity/erpIdentityProvider.js";
export * from "./principal/principal.js";
export * from "./auth/policy.js";
export * from "./auth/password.js";
export * from "./auth/passwordReset.js";

export * from "./token/types.js";
export * from "./token/jwtTokenProvider.js";
export * from "./token/tokenService.js";

export * from "./cache/types.js";
export * from "./cache/cacheAside.js";
export * from "./cache/memoryCacheStore.js";
export * from "./cache/redisCacheStore.js";
export * from "./catalog/cacheKeys.js";

export * from "./store/types.js";
export { SqliteStore } from "./store/sqliteStore.js";
export type { SqliteStoreOptions } from "./store/sqliteStore.js";
