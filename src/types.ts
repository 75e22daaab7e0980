import type { Logger } from "pino";
import type { SessionExchange, UserLookup } from "./adapters/types.js";
import type { Clock } from "./clock.js";
import type { Result } from "./errors/error.js";
import type { PublicKeySource, SigningKeyProvider } from "./keys/types.js";
import type { SessionLifetimeInput } from "./session/lifetime.js";
import type { CustomClaims } from "./token/customTokenMinter.js";
import type { Token, TokenInput } from "./token/types.js";
import type { TokenVerifier } from "./verify/types.js";

export type AuthCoreAdapters = {
  signingKey: SigningKeyProvider;
  /** Keys for ID tokens; also used for session tokens unless overridden. */
  idTokenKeys: PublicKeySource;
  sessionTokenKeys?: PublicKeySource;
  users: UserLookup;
  sessionExchange: SessionExchange;
  /** Defaults to a CurrentTokenVerifier over `idTokenKeys`. */
  idTokenVerifier?: TokenVerifier;
  clock?: Clock;
  logger?: Logger;
};

/** Last stage a rejected token got through; carried in `details.stage`. */
export type VerificationStage =
  | "UNPARSED"
  | "PARSED"
  | "SIGNATURE_CHECKED"
  | "CLAIMS_CHECKED";

export type VerifyIdTokenOptions = {
  checkRevoked?: boolean;
  allowFutureTokens?: boolean;
  signal?: AbortSignal;
};

export type VerifySessionTokenOptions = {
  checkRevoked?: boolean;
  /** Clock skew in seconds; the configured default when omitted. */
  leeway?: number;
  signal?: AbortSignal;
};

export type AuthAdvisory = {
  code: "LEGACY_ID_TOKEN_VERIFIER";
  message: string;
};

export type TokenResult = Result<{ token: Token }>;
export type RevokedResult = Result<{ revoked: boolean }>;

export interface AuthCore {
  /** Non-fatal notices about how this core was put together. */
  readonly advisories: readonly AuthAdvisory[];

  mintCustomToken(uid: string, claims?: CustomClaims): Promise<TokenResult>;
  verifyIdToken(
    token: TokenInput,
    options?: VerifyIdTokenOptions,
  ): Promise<TokenResult>;
  verifySessionToken(
    token: TokenInput,
    options?: VerifySessionTokenOptions,
  ): Promise<TokenResult>;
  mintSessionToken(
    idToken: TokenInput,
    lifetime?: SessionLifetimeInput,
    signal?: AbortSignal,
  ): Promise<TokenResult>;
  isRevoked(
    token: TokenInput,
    options?: { signal?: AbortSignal },
  ): Promise<RevokedResult>;
}
