import { generateKeyPairSync } from "node:crypto";
import { SignJWT } from "jose";
import type { JWTPayload } from "jose";
import pino from "pino";
import { PemSigningKey } from "../src/keys/pemSigningKey.js";
import { parseToken } from "../src/token/parse.js";
import type { JwtAlg, Token } from "../src/token/types.js";

export const NOW = 1_700_000_000;

export const ID_ISSUER = "https://tokens.example.test/tenant-a";
export const SESSION_ISSUER = "https://sessions.example.test/tenant-a";
export const AUDIENCE = "tenant-a";
export const CUSTOM_ISSUER = "minter@tenant-a.example.test";
export const CUSTOM_AUDIENCE = "https://tokens.example.test/custom";

export const silentLogger = pino({ level: "silent" });

export type TestKey = {
  kid: string;
  alg: JwtAlg;
  privateKeyPem: string;
  publicKeyPem: string;
  signer: PemSigningKey;
};

export function makeKey(kid: string, alg: JwtAlg = "RS256"): TestKey {
  const { privateKey, publicKey } =
    alg === "RS256"
      ? generateKeyPairSync("rsa", { modulusLength: 2048 })
      : alg === "ES256"
        ? generateKeyPairSync("ec", { namedCurve: "P-256" })
        : generateKeyPairSync("ed25519");

  const privateKeyPem = privateKey
    .export({ type: "pkcs8", format: "pem" })
    .toString();
  const publicKeyPem = publicKey
    .export({ type: "spki", format: "pem" })
    .toString();

  return {
    kid,
    alg,
    privateKeyPem,
    publicKeyPem,
    signer: new PemSigningKey({ kid, alg, privateKeyPem }),
  };
}

/** Signs `claims` with `key`; `kid` overrides the header key id. */
export async function signToken(
  key: TestKey,
  claims: JWTPayload,
  header: { kid?: string | null } = {},
): Promise<string> {
  const { key: privateKey } = await key.signer.getSigningKey();
  const kid = header.kid === undefined ? key.kid : header.kid;
  return new SignJWT(claims)
    .setProtectedHeader({ alg: key.alg, ...(kid ? { kid } : {}) })
    .sign(privateKey);
}

function b64url(value: unknown) {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

/** A well-formed but unsigned compact token. */
export function rawUnsigned(
  claims: Record<string, unknown>,
  header: Record<string, unknown> = { alg: "RS256", kid: "k1" },
): string {
  return `${b64url(header)}.${b64url(claims)}.c2lnbmF0dXJl`;
}

export function unsignedToken(claims: Record<string, unknown>): Token {
  return parseToken(rawUnsigned(claims));
}

export function idTokenClaims(overrides: JWTPayload = {}): JWTPayload {
  return {
    iss: ID_ISSUER,
    aud: AUDIENCE,
    sub: "alice",
    iat: NOW - 60,
    exp: NOW + 3540,
    auth_time: NOW - 120,
    ...overrides,
  };
}

export function sessionTokenClaims(overrides: JWTPayload = {}): JWTPayload {
  return idTokenClaims({ iss: SESSION_ISSUER, ...overrides });
}

/** Promise whose settlement the test controls. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Never settles on its own; rejects once `signal` aborts. */
export function hangUntilAborted<T>(
  signal: AbortSignal | undefined,
): Promise<T> {
  return new Promise<T>((_resolve, reject) => {
    signal?.addEventListener("abort", () => reject(new Error("aborted")));
  });
}
