import type { Logger } from "pino";
import type { Clock } from "../clock.js";
import { systemClock } from "../clock.js";
import type { PublicKeySource } from "../keys/types.js";
import { validateClaims } from "../token/claimValidator.js";
import type { Token, ValidityPolicy } from "../token/types.js";
import type { TokenVerifierConfig } from "./currentVerifier.js";
import { verifySignature } from "./signature.js";
import type {
  TokenVerifier,
  VerificationFailure,
  VerificationOutcome,
  VerifyOptions,
} from "./types.js";

/** Base of everything {@link LegacyTokenVerifier.assertValid} throws. */
export class TokenVerificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TokenVerificationError";
  }
}

export class InvalidTokenError extends TokenVerificationError {
  readonly failure: VerificationFailure;

  constructor(failure: VerificationFailure) {
    super(failure.message);
    this.name = "InvalidTokenError";
    this.failure = failure;
  }
}

/** Signature and claims are fine apart from an `iat` in the future. */
export class IssuedInTheFutureError extends TokenVerificationError {
  readonly issuedAt: number;

  constructor(issuedAt: number, message: string) {
    super(message);
    this.name = "IssuedInTheFutureError";
    this.issuedAt = issuedAt;
  }
}

/**
 * Older exception-based verifier, kept for callers that still construct it.
 * `assertValid` throws; `verify` adapts the thrown types onto the shared
 * outcome variants.
 *
 * @deprecated use {@link CurrentTokenVerifier}
 */
export class LegacyTokenVerifier implements TokenVerifier {
  readonly generation = "legacy";
  readonly deprecated = true;

  private keys: PublicKeySource;
  private clock: Clock;
  private logger?: Logger;

  constructor(cfg: TokenVerifierConfig) {
    this.keys = cfg.keys;
    this.clock = cfg.clock ?? systemClock;
    this.logger = cfg.logger;
  }

  async assertValid(
    token: Token,
    policy: ValidityPolicy,
    options: VerifyOptions = {},
  ): Promise<void> {
    const sig = await verifySignature(
      token,
      this.keys,
      options.signal,
      this.logger,
    );
    if (!sig.ok) throw new InvalidTokenError(sig.failure);

    const check = validateClaims(token.claims, policy, this.clock());
    if (check.ok) return;

    if (check.reason === "ISSUED_IN_FUTURE") {
      throw new IssuedInTheFutureError(token.claims.iat ?? 0, check.message);
    }
    throw new InvalidTokenError({
      reason: check.reason,
      message: check.message,
      claim: check.claim,
      stage: "SIGNATURE_CHECKED",
    });
  }

  async verify(
    token: Token,
    policy: ValidityPolicy,
    options: VerifyOptions = {},
  ): Promise<VerificationOutcome> {
    try {
      await this.assertValid(token, policy, options);
      return { status: "verified", claims: token.claims };
    } catch (e) {
      if (e instanceof IssuedInTheFutureError) {
        return { status: "issued_in_future", claims: token.claims };
      }
      if (e instanceof InvalidTokenError) {
        return { status: "rejected", failure: e.failure };
      }
      throw e;
    }
  }
}
