import { SignJWT } from "jose";
import type { JWTPayload } from "jose";
import type { Clock } from "../clock.js";
import { systemClock } from "../clock.js";
import { InvalidArgumentError } from "../errors/error.js";
import type { SigningKeyProvider } from "../keys/types.js";
import { parseToken } from "./parse.js";
import type { Token } from "./types.js";

export const RESERVED_CLAIMS: readonly string[] = [
  "iss",
  "aud",
  "sub",
  "iat",
  "exp",
  "nbf",
  "jti",
  "auth_time",
];

export const MAX_UID_LENGTH = 128;

export type CustomClaims = Record<string, unknown>;

export type CustomTokenMinterConfig = {
  issuer: string;
  audience: string;
  ttlSeconds: number;
  signingKey: SigningKeyProvider;
  clock?: Clock;
};

function isJsonValue(x: unknown): boolean {
  if (x === null) return true;
  switch (typeof x) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(x);
    case "object":
      if (Array.isArray(x)) return x.every(isJsonValue);
      if (Object.getPrototypeOf(x) !== Object.prototype) return false;
      return Object.values(x).every(isJsonValue);
    default:
      return false;
  }
}

function ensureValidUid(uid: unknown): asserts uid is string {
  if (typeof uid !== "string" || uid.trim().length === 0) {
    throw new InvalidArgumentError("uid must be a non-empty string");
  }
  if (uid.length > MAX_UID_LENGTH) {
    throw new InvalidArgumentError(
      `uid must be at most ${MAX_UID_LENGTH} characters`,
    );
  }
}

function ensureValidClaims(claims: CustomClaims) {
  for (const [name, value] of Object.entries(claims)) {
    if (name === "__proto__") {
      throw new InvalidArgumentError(`"${name}" is not a valid claim name`);
    }
    if (RESERVED_CLAIMS.includes(name)) {
      throw new InvalidArgumentError(`"${name}" is a reserved claim name`);
    }
    if (!isJsonValue(value)) {
      throw new InvalidArgumentError(`claim "${name}" is not a JSON value`);
    }
  }
}

/**
 * Signs short-lived tokens asserting a user id plus custom claims, for a
 * client to exchange when signing in with its own identifiers.
 */
export class CustomTokenMinter {
  private cfg: CustomTokenMinterConfig;
  private clock: Clock;

  constructor(cfg: CustomTokenMinterConfig) {
    if (!cfg.ttlSeconds || cfg.ttlSeconds <= 0) {
      throw new Error("CustomTokenMinterConfig.ttlSeconds must be > 0");
    }
    this.cfg = cfg;
    this.clock = cfg.clock ?? systemClock;
  }

  async mint(uid: string, claims: CustomClaims = {}): Promise<Token> {
    ensureValidUid(uid);
    ensureValidClaims(claims);

    const { kid, alg, key } = await this.cfg.signingKey.getSigningKey();
    const now = this.clock();

    const payload: JWTPayload = {};
    for (const [name, value] of Object.entries(claims)) payload[name] = value;

    const raw = await new SignJWT(payload)
      .setProtectedHeader({ alg, kid, typ: "JWT" })
      .setIssuer(this.cfg.issuer)
      .setAudience(this.cfg.audience)
      .setSubject(uid)
      .setIssuedAt(now)
      .setExpirationTime(now + this.cfg.ttlSeconds)
      .sign(key);

    return parseToken(raw);
  }
}
