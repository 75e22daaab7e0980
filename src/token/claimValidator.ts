import type { ClaimCheck, ClaimSet, ValidityPolicy } from "./types.js";

function isNonEmptyString(x: unknown): x is string {
  return typeof x === "string" && x.trim().length > 0;
}

function audienceMatches(aud: unknown, expected: string) {
  if (typeof aud === "string") return aud === expected;
  return Array.isArray(aud) && aud.some((a) => a === expected);
}

/**
 * Validates temporal and identity claims in a fixed order: exp, iat, iss,
 * aud, sub. Callers branch on ISSUED_IN_FUTURE, so it must never be masked
 * by a later check.
 */
export function validateClaims(
  claims: ClaimSet,
  policy: ValidityPolicy,
  now: number,
): ClaimCheck {
  const skew = policy.clockSkewSeconds;

  if (typeof claims.exp !== "number") {
    return {
      ok: false,
      reason: "EXPIRED",
      claim: "exp",
      message: 'Token has no numeric "exp" claim',
    };
  }
  if (now > claims.exp + skew) {
    return {
      ok: false,
      reason: "EXPIRED",
      claim: "exp",
      message: `Token expired at ${claims.exp}`,
    };
  }

  if (typeof claims.iat !== "number") {
    return {
      ok: false,
      reason: "MISSING_ISSUED_AT",
      claim: "iat",
      message: 'Token has no numeric "iat" claim',
    };
  }
  if (claims.iat > now + skew && !policy.allowIssuedInFuture) {
    return {
      ok: false,
      reason: "ISSUED_IN_FUTURE",
      claim: "iat",
      message: `Token was issued in the future (iat ${claims.iat})`,
    };
  }

  if (claims.iss !== policy.issuer) {
    return {
      ok: false,
      reason: "INVALID_ISSUER",
      claim: "iss",
      message: `Unexpected issuer, expected "${policy.issuer}"`,
    };
  }

  if (!audienceMatches(claims.aud, policy.audience)) {
    return {
      ok: false,
      reason: "INVALID_AUDIENCE",
      claim: "aud",
      message: `Unexpected audience, expected "${policy.audience}"`,
    };
  }

  if (!isNonEmptyString(claims.sub)) {
    return {
      ok: false,
      reason: "INVALID_SUBJECT",
      claim: "sub",
      message: 'Token has no "sub" claim',
    };
  }

  return { ok: true };
}
