export type TokenKind = "access" | "refresh";

export type TokenPayload = {
  sub: string; // principal id
  knd: TokenKind;
  jti: string;
  iat?: number;
  exp?: number;
  [key: string]: unknown;
};

export type IssueTokenOptions = {
  issuer: string;
  audience?: string | string[];
  issuedAt: number; // epoch seconds
  expiresAt: number; // epoch seconds
};

export type VerifyTokenOptions = {
  issuer: string;
  audience?: string | string[];
  clockSkewSeconds?: number;
  currentDate?: Date;
};

export interface TokenProvider {
  issueToken(
    payload: TokenPayload,
    options: IssueTokenOptions,
  ): Promise<string>;
  verifyToken(
    token: string,
    options: VerifyTokenOptions,
  ): Promise<TokenPayload>;
}

export type TokenClaims = {
  subjectId: string;
  kind: TokenKind;
  tokenId: string;
  issuedAt: number;
  expiresAt: number;
};

export type TokenPair = {
  accessToken: string;
  refreshToken: string;
  tokenType: "bearer";
};
