import type { Logger } from "pino";
import type { Clock } from "../clock.js";
import { systemClock } from "../clock.js";
import type { PublicKeySource } from "../keys/types.js";
import { validateClaims } from "../token/claimValidator.js";
import type { Token, ValidityPolicy } from "../token/types.js";
import { verifySignature } from "./signature.js";
import type {
  TokenVerifier,
  VerificationOutcome,
  VerifyOptions,
} from "./types.js";

export type TokenVerifierConfig = {
  keys: PublicKeySource;
  clock?: Clock;
  logger?: Logger;
};

export class CurrentTokenVerifier implements TokenVerifier {
  readonly generation = "current";
  readonly deprecated = false;

  private keys: PublicKeySource;
  private clock: Clock;
  private logger?: Logger;

  constructor(cfg: TokenVerifierConfig) {
    this.keys = cfg.keys;
    this.clock = cfg.clock ?? systemClock;
    this.logger = cfg.logger;
  }

  async verify(
    token: Token,
    policy: ValidityPolicy,
    options: VerifyOptions = {},
  ): Promise<VerificationOutcome> {
    const sig = await verifySignature(
      token,
      this.keys,
      options.signal,
      this.logger,
    );
    if (!sig.ok) return { status: "rejected", failure: sig.failure };

    const check = validateClaims(token.claims, policy, this.clock());
    if (check.ok) return { status: "verified", claims: token.claims };

    if (check.reason === "ISSUED_IN_FUTURE") {
      return { status: "issued_in_future", claims: token.claims };
    }
    return {
      status: "rejected",
      failure: {
        reason: check.reason,
        message: check.message,
        claim: check.claim,
        stage: "SIGNATURE_CHECKED",
      },
    };
  }
}
