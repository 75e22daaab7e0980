import { compactVerify, errors } from "jose";
import type { Logger } from "pino";
import { UpstreamError, describeError } from "../errors/error.js";
import type { PublicKeySource, VerificationKey } from "../keys/types.js";
import { isSupportedAlg } from "../token/types.js";
import type { Token } from "../token/types.js";
import type { VerificationFailure } from "./types.js";

export type SignatureCheck =
  | { ok: true; key: VerificationKey }
  | { ok: false; failure: VerificationFailure };

function fail(
  reason: VerificationFailure["reason"],
  message: string,
): SignatureCheck {
  return { ok: false, failure: { reason, message, stage: "PARSED" } };
}

async function resolveKey(
  kid: string,
  keys: PublicKeySource,
  signal: AbortSignal | undefined,
  logger?: Logger,
): Promise<VerificationKey | undefined> {
  const cached = await keys.getPublicKey(kid);
  if (cached || !keys.refresh) return cached;

  logger?.debug({ kid }, "unknown key id, refreshing key source");
  await keys.refresh(signal);
  return keys.getPublicKey(kid);
}

/**
 * Resolves the token's key by kid (refreshing the source once on a miss) and
 * checks the signature over header and payload. Claims are not looked at.
 */
export async function verifySignature(
  token: Token,
  keys: PublicKeySource,
  signal?: AbortSignal,
  logger?: Logger,
): Promise<SignatureCheck> {
  const { alg, kid } = token.header;

  if (!isSupportedAlg(alg)) {
    return fail(
      "UNSUPPORTED_ALGORITHM",
      `Unsupported token algorithm "${alg}"`,
    );
  }
  if (!kid) {
    return fail("UNKNOWN_KEY", 'Token header has no "kid"');
  }

  let key: VerificationKey | undefined;
  try {
    key = await resolveKey(kid, keys, signal, logger);
  } catch (e) {
    if (e instanceof UpstreamError) {
      return fail("UPSTREAM_UNAVAILABLE", e.message);
    }
    throw e;
  }

  if (!key) return fail("UNKNOWN_KEY", `No public key for kid "${kid}"`);
  if (key.alg !== alg) {
    return fail(
      "ALGORITHM_MISMATCH",
      `Key "${kid}" is ${key.alg}, token declares ${alg}`,
    );
  }

  try {
    await compactVerify(token.raw, key.key, { algorithms: [key.alg] });
  } catch (e) {
    if (e instanceof errors.JOSEError) {
      return fail("INVALID_SIGNATURE", describeError(e));
    }
    throw e;
  }

  return { ok: true, key };
}
