import { decodeJwt, decodeProtectedHeader } from "jose";
import type { ClaimSet, Token, TokenHeader, TokenInput } from "./types.js";
import { describeError } from "../errors/error.js";

export class TokenParseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TokenParseError";
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

function readHeader(raw: string): TokenHeader {
  const header = decodeProtectedHeader(raw);
  if (typeof header.alg !== "string" || !header.alg) {
    throw new TokenParseError('token header has no "alg"');
  }
  if (header.kid !== undefined && typeof header.kid !== "string") {
    throw new TokenParseError('token header "kid" must be a string');
  }
  return { ...header, alg: header.alg };
}

/**
 * Parses a compact three-segment token without verifying it.
 * Throws {@link TokenParseError} when any segment does not decode.
 */
export function parseToken(raw: string): Token {
  if (typeof raw !== "string" || raw.trim() === "") {
    throw new TokenParseError("token must be a non-empty string");
  }

  const segments = raw.split(".");
  if (segments.length !== 3) {
    throw new TokenParseError(
      `expected 3 dot-separated segments, got ${segments.length}`,
    );
  }

  let header: TokenHeader;
  let claims: ClaimSet;
  try {
    header = readHeader(raw);
    claims = decodeJwt(raw);
  } catch (e) {
    if (e instanceof TokenParseError) throw e;
    throw new TokenParseError(describeError(e), { cause: e });
  }

  return deepFreeze({ raw, header, claims, signature: segments[2] });
}

/**
 * Normalizes either input form. Pre-parsed tokens are re-parsed from their
 * `raw` string so header and claims always match the signed bytes.
 */
export function toToken(input: TokenInput): Token {
  return parseToken(typeof input === "string" ? input : input.raw);
}

/** Identifying fields for logs and error details; never the token itself. */
export function describeToken(token: Token): Record<string, unknown> {
  return {
    ...(token.header.kid ? { kid: token.header.kid } : {}),
    ...(typeof token.claims.sub === "string" ? { sub: token.claims.sub } : {}),
    ...(typeof token.claims.jti === "string" ? { jti: token.claims.jti } : {}),
  };
}
