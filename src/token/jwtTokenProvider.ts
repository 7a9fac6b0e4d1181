import { SignJWT, jwtVerify, importPKCS8, importSPKI } from "jose";
import type { KeyLike } from "jose";
import type {
  TokenKind,
  TokenPayload,
  TokenProvider,
  IssueTokenOptions,
  VerifyTokenOptions,
} from "./types.js";

export type JwtAlg = "HS256" | "RS256" | "EdDSA";

/**
 * One signing key per provider. HS256 signs and verifies with the shared
 * secret; RS256/EdDSA verify with the public key and can only issue when the
 * private key is present.
 */
export type JwtTokenProviderConfig =
  | { alg: "HS256"; secret: string | Uint8Array; kid?: string }
  | {
      alg: "RS256" | "EdDSA";
      publicKeyPem: string;
      privateKeyPem?: string;
      kid?: string;
    };

type Key = KeyLike | Uint8Array;

/** Runs `load` on first use and hands every caller the same promise. */
function lazy(load: () => Promise<Key>): () => Promise<Key> {
  let pending: Promise<Key> | undefined;
  return () => {
    if (!pending) pending = load();
    return pending;
  };
}

const isKind = (x: unknown): x is TokenKind => x === "access" || x === "refresh";

const present = (x: unknown): x is string =>
  typeof x === "string" && x.trim().length > 0;

function requireClaims(claims: { sub?: unknown; knd?: unknown; jti?: unknown }) {
  const { sub, knd, jti } = claims;
  if (!present(sub)) throw new Error("TokenPayload.sub is required");
  if (!isKind(knd)) throw new Error("TokenPayload.knd must be access or refresh");
  if (!present(jti)) throw new Error("TokenPayload.jti is required");
  return { sub, knd, jti };
}

const audiences = (aud?: string | string[]) =>
  typeof aud === "string" ? [aud] : aud;

export class JwtTokenProvider implements TokenProvider {
  private readonly signingKey: () => Promise<Key>;
  private readonly verifyKey: () => Promise<Key>;

  constructor(private readonly cfg: JwtTokenProviderConfig) {
    if (cfg.alg === "HS256") {
      const secret =
        typeof cfg.secret === "string"
          ? new TextEncoder().encode(cfg.secret)
          : cfg.secret;
      this.signingKey = this.verifyKey = async () => secret;
      return;
    }
    const { alg, publicKeyPem, privateKeyPem } = cfg;
    this.verifyKey = lazy(() => importSPKI(publicKeyPem, alg));
    this.signingKey = lazy(async () => {
      if (!privateKeyPem) {
        throw new Error(`${alg} privateKeyPem is required to issue tokens`);
      }
      return importPKCS8(privateKeyPem, alg);
    });
  }

  async issueToken(
    payload: TokenPayload,
    options: IssueTokenOptions,
  ): Promise<string> {
    requireClaims(payload);
    const { alg, kid } = this.cfg;
    const jwt = new SignJWT(payload)
      .setProtectedHeader(kid ? { alg, kid } : { alg })
      .setIssuer(options.issuer)
      .setIssuedAt(options.issuedAt)
      .setExpirationTime(options.expiresAt);
    const aud = audiences(options.audience);
    if (aud && aud.length > 0) jwt.setAudience(aud);
    return jwt.sign(await this.signingKey());
  }

  async verifyToken(
    token: string,
    options: VerifyTokenOptions,
  ): Promise<TokenPayload> {
    const { payload } = await jwtVerify(token, await this.verifyKey(), {
      // pinned so an HS256 token can never be checked against a public key
      algorithms: [this.cfg.alg],
      issuer: options.issuer,
      audience: audiences(options.audience),
      clockTolerance: options.clockSkewSeconds ?? 0,
      currentDate: options.currentDate,
      requiredClaims: ["sub", "exp", "iat", "jti"],
    });
    return { ...payload, ...requireClaims(payload) };
  }
}
