import { z } from "zod";

const csv = z
  .string()
  .optional()
  .transform((v) =>
    (v ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  );

const bool = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((v) => (v === undefined ? undefined : v === "true" || v === "1"));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8000),
  API_PREFIX: z.string().startsWith("/").default("/api/v1"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  CORS_ORIGINS: csv,

  AUTH_MODE: z.enum(["local", "federated"]).default("local"),
  JWT_ALG: z.enum(["HS256", "RS256", "EdDSA"]).default("HS256"),
  JWT_SECRET: z.string().min(1).optional(),
  JWT_PRIVATE_KEY_PEM: z.string().min(1).optional(),
  JWT_PUBLIC_KEY_PEM: z.string().min(1).optional(),
  JWT_KID: z.string().min(1).optional(),
  JWT_ISSUER: z.string().min(1).default("storefront-gateway"),
  JWT_AUDIENCE: csv,
  ACCESS_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(1800),
  REFRESH_TOKEN_TTL_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(7 * 24 * 3600),
  CLOCK_SKEW_SECONDS: z.coerce.number().int().min(0).default(0),
  ROTATE_REFRESH_TOKENS: bool,

  REDIS_URL: z.string().url().optional(),
  CACHE_TIMEOUT_MS: z.coerce.number().int().positive().default(250),

  DATABASE_PATH: z.string().min(1).default("storefront.db"),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  BOOTSTRAP_ADMIN_EMAIL: z.string().email().optional(),
  BOOTSTRAP_ADMIN_PASSWORD: z.string().min(8).optional(),

  ERP_URL: z.string().url().optional(),
  ERP_DB: z.string().min(1).optional(),
  ERP_USERNAME: z.string().min(1).optional(),
  ERP_PASSWORD: z.string().min(1).optional(),
  ERP_TIMEOUT_MS: z.coerce.number().int().positive().default(5000),
  ERP_ROLE_FIELD: z.string().min(1).optional(),
  ADMIN_LOGINS: csv,
  ADMIN_NAMES: csv,
  ADMIN_ROLES: csv,
});

export type Env = z.input<typeof EnvSchema>;

export type SigningConfig =
  | { alg: "HS256"; secret: string; kid?: string }
  | {
      alg: "RS256" | "EdDSA";
      publicKeyPem: string;
      privateKeyPem?: string;
      kid?: string;
    };

export type ErpConfig = {
  url: string;
  db: string;
  username: string;
  password: string;
  timeoutMs: number;
  /** res.users field holding a role label, matched against ADMIN_ROLES. */
  roleField?: string;
};

export type AdminSignals = {
  logins: string[];
  names: string[];
  roles: string[];
};

export type GatewayConfig = {
  port: number;
  apiPrefix: string;
  logLevel: string;
  corsOrigins: string[];
  authMode: "local" | "federated";
  signing: SigningConfig;
  issuer: string;
  audience?: string[];
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
  clockSkewSeconds: number;
  rotateRefreshTokens: boolean;
  redisUrl?: string;
  cacheTimeoutMs: number;
  databasePath: string;
  bcryptRounds: number;
  /** Local superuser created at startup when no user has this email. */
  bootstrapAdmin?: { email: string; password: string };
  erp?: ErpConfig;
  adminSignals: AdminSignals;
};

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): GatewayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    );
  }
  const e = parsed.data;
  const issues: string[] = [];

  let signing: SigningConfig | undefined;
  if (e.JWT_ALG === "HS256") {
    if (!e.JWT_SECRET) issues.push("JWT_SECRET: required for HS256");
    else signing = { alg: "HS256", secret: e.JWT_SECRET, kid: e.JWT_KID };
  } else if (!e.JWT_PUBLIC_KEY_PEM) {
    issues.push(`JWT_PUBLIC_KEY_PEM: required for ${e.JWT_ALG}`);
  } else {
    signing = {
      alg: e.JWT_ALG,
      publicKeyPem: e.JWT_PUBLIC_KEY_PEM,
      privateKeyPem: e.JWT_PRIVATE_KEY_PEM,
      kid: e.JWT_KID,
    };
  }

  let erp: ErpConfig | undefined;
  if (e.ERP_URL && e.ERP_DB && e.ERP_USERNAME && e.ERP_PASSWORD) {
    erp = {
      url: e.ERP_URL,
      db: e.ERP_DB,
      username: e.ERP_USERNAME,
      password: e.ERP_PASSWORD,
      timeoutMs: e.ERP_TIMEOUT_MS,
      ...(e.ERP_ROLE_FIELD ? { roleField: e.ERP_ROLE_FIELD } : {}),
    };
  } else if (e.AUTH_MODE === "federated") {
    issues.push(
      "ERP_URL, ERP_DB, ERP_USERNAME, ERP_PASSWORD: required in federated mode",
    );
  }

  if (Boolean(e.BOOTSTRAP_ADMIN_EMAIL) !== Boolean(e.BOOTSTRAP_ADMIN_PASSWORD)) {
    issues.push(
      "BOOTSTRAP_ADMIN_EMAIL, BOOTSTRAP_ADMIN_PASSWORD: set both or neither",
    );
  }

  if (issues.length > 0 || !signing) throw new ConfigError(issues);

  return {
    port: e.PORT,
    apiPrefix: e.API_PREFIX,
    logLevel: e.LOG_LEVEL,
    corsOrigins: e.CORS_ORIGINS,
    authMode: e.AUTH_MODE,
    signing,
    issuer: e.JWT_ISSUER,
    ...(e.JWT_AUDIENCE.length > 0 ? { audience: e.JWT_AUDIENCE } : {}),
    accessTokenTtlSeconds: e.ACCESS_TOKEN_TTL_SECONDS,
    refreshTokenTtlSeconds: e.REFRESH_TOKEN_TTL_SECONDS,
    clockSkewSeconds: e.CLOCK_SKEW_SECONDS,
    rotateRefreshTokens: e.ROTATE_REFRESH_TOKENS ?? true,
    ...(e.REDIS_URL ? { redisUrl: e.REDIS_URL } : {}),
    cacheTimeoutMs: e.CACHE_TIMEOUT_MS,
    databasePath: e.DATABASE_PATH,
    bcryptRounds: e.BCRYPT_ROUNDS,
    ...(e.BOOTSTRAP_ADMIN_EMAIL && e.BOOTSTRAP_ADMIN_PASSWORD
      ? {
          bootstrapAdmin: {
            email: e.BOOTSTRAP_ADMIN_EMAIL.toLowerCase(),
            password: e.BOOTSTRAP_ADMIN_PASSWORD,
          },
        }
      : {}),
    ...(erp ? { erp } : {}),
    adminSignals: {
      logins: e.ADMIN_LOGINS,
      names: e.ADMIN_NAMES,
      roles: e.ADMIN_ROLES,
    },
  };
}
