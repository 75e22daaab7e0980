export type JwtAlg = "RS256" | "ES256" | "EdDSA";

export const SUPPORTED_ALGS: readonly JwtAlg[] = ["RS256", "ES256", "EdDSA"];

export function isSupportedAlg(x: unknown): x is JwtAlg {
  return typeof x === "string" && SUPPORTED_ALGS.some((a) => a === x);
}

export type TokenHeader = {
  alg: string;
  kid?: string;
  typ?: string;
  [key: string]: unknown;
};

export type ClaimSet = {
  iss?: string;
  aud?: string | string[];
  sub?: string;
  iat?: number;
  exp?: number;
  auth_time?: number;
  nbf?: number;
  jti?: string;
  [key: string]: unknown;
};

/**
 * A parsed compact token. `raw` is the exact string the token was parsed
 * from and is what gets re-emitted; header and claims are frozen views of it.
 */
export type Token = Readonly<{
  raw: string;
  header: Readonly<TokenHeader>;
  claims: Readonly<ClaimSet>;
  signature: string;
}>;

/** A serialized token or one that was already parsed. */
export type TokenInput = string | Token;

export type ValidityPolicy = Readonly<{
  issuer: string;
  audience: string;
  clockSkewSeconds: number;
  allowIssuedInFuture: boolean;
}>;

export type ClaimFailureReason =
  | "EXPIRED"
  | "MISSING_ISSUED_AT"
  | "ISSUED_IN_FUTURE"
  | "INVALID_ISSUER"
  | "INVALID_AUDIENCE"
  | "INVALID_SUBJECT";

export type ClaimCheck =
  | { ok: true }
  | { ok: false; reason: ClaimFailureReason; claim: string; message: string };
