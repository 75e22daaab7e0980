import type {
  ClaimFailureReason,
  ClaimSet,
  Token,
  ValidityPolicy,
} from "../token/types.js";

export type SignatureFailureReason =
  | "UNSUPPORTED_ALGORITHM"
  | "UNKNOWN_KEY"
  | "UPSTREAM_UNAVAILABLE"
  | "ALGORITHM_MISMATCH"
  | "INVALID_SIGNATURE";

export type VerificationFailureReason =
  | SignatureFailureReason
  | Exclude<ClaimFailureReason, "ISSUED_IN_FUTURE">;

export type VerificationFailure = {
  reason: VerificationFailureReason;
  message: string;
  claim?: string;
  stage: "PARSED" | "SIGNATURE_CHECKED";
};

export type VerificationOutcome =
  | { status: "verified"; claims: Readonly<ClaimSet> }
  | { status: "issued_in_future"; claims: Readonly<ClaimSet> }
  | { status: "rejected"; failure: VerificationFailure };

export type VerifierGeneration = "current" | "legacy";

export type VerifyOptions = {
  signal?: AbortSignal;
};

/**
 * Checks a token's signature and claims against a policy. Implementations
 * differ internally but report through the same outcome variants.
 */
export interface TokenVerifier {
  readonly generation: VerifierGeneration;
  readonly deprecated: boolean;
  verify(
    token: Token,
    policy: ValidityPolicy,
    options?: VerifyOptions,
  ): Promise<VerificationOutcome>;
}
