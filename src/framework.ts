import type {
  AuthAdvisory,
  AuthCore,
  AuthCoreAdapters,
  RevokedResult,
  TokenResult,
  VerificationStage,
  VerifyIdTokenOptions,
  VerifySessionTokenOptions,
} from "./types.js";
import type { AuthCoreConfig } from "./config.js";
import { parseAuthCoreConfig } from "./config.js";
import { systemClock } from "./clock.js";
import { InvalidArgumentError, describeError, err } from "./errors/error.js";
import type { AuthError } from "./errors/error.js";
import { createLogger } from "./logger.js";
import { RevocationChecker } from "./revocation/revocationChecker.js";
import { SessionCookieMinter } from "./session/sessionCookieMinter.js";
import type { SessionLifetimeInput } from "./session/lifetime.js";
import { CustomTokenMinter } from "./token/customTokenMinter.js";
import type { CustomClaims } from "./token/customTokenMinter.js";
import { describeToken, toToken } from "./token/parse.js";
import type { Token, TokenInput, ValidityPolicy } from "./token/types.js";
import { CurrentTokenVerifier } from "./verify/currentVerifier.js";
import type { VerificationFailure } from "./verify/types.js";

type Rejected = { ok: false; error: AuthError };

function reject(error: AuthError): Rejected {
  return { ok: false, error };
}

function withStage(error: AuthError, stage: VerificationStage): AuthError {
  return { ...error, details: { ...error.details, stage } };
}

function parseInput(input: TokenInput): { ok: true; token: Token } | Rejected {
  try {
    return { ok: true, token: toToken(input) };
  } catch (e) {
    return reject(
      err(
        "AUTH_INVALID_ARGUMENT",
        `The given value could not be parsed as a token: ${describeError(e)}`,
        { stage: "UNPARSED" },
      ),
    );
  }
}

function mapVerificationFailure(
  failure: VerificationFailure,
  token: Token,
): AuthError {
  const details = {
    ...describeToken(token),
    reason: failure.reason,
    ...(failure.claim ? { claim: failure.claim } : {}),
    stage: failure.stage,
  };

  switch (failure.reason) {
    case "UNKNOWN_KEY":
      return err("AUTH_UNKNOWN_KEY", failure.message, details);
    case "UPSTREAM_UNAVAILABLE":
      return err("AUTH_UPSTREAM_UNAVAILABLE", failure.message, details);
    default:
      return err("AUTH_INVALID_TOKEN", failure.message, details);
  }
}

function isRejected(result: { ok: boolean }): result is Rejected {
  return !result.ok && "error" in result;
}

function internalError(e: unknown): Rejected {
  return reject(
    err("AUTH_INTERNAL_ERROR", "Internal error", { cause: describeError(e) }),
  );
}

export function createAuthCore(
  config: AuthCoreConfig,
  adapters: AuthCoreAdapters,
): AuthCore {
  const cfg = parseAuthCoreConfig(config);
  const clock = adapters.clock ?? systemClock;
  const logger = adapters.logger ?? createLogger();

  const idTokenVerifier =
    adapters.idTokenVerifier ??
    new CurrentTokenVerifier({
      keys: adapters.idTokenKeys,
      clock,
      logger: logger.child({ component: "id-token-verifier" }),
    });

  const sessionTokenVerifier = new CurrentTokenVerifier({
    keys: adapters.sessionTokenKeys ?? adapters.idTokenKeys,
    clock,
    logger: logger.child({ component: "session-token-verifier" }),
  });

  const customTokenMinter = new CustomTokenMinter({
    ...cfg.customToken,
    signingKey: adapters.signingKey,
    clock,
  });

  const revocationChecker = new RevocationChecker({
    users: adapters.users,
    timeoutMs: cfg.upstreamTimeoutMs,
    logger: logger.child({ component: "revocation" }),
  });

  const sessionCookieMinter = new SessionCookieMinter({
    exchange: adapters.sessionExchange,
    timeoutMs: cfg.upstreamTimeoutMs,
    logger: logger.child({ component: "session-cookie" }),
  });

  const advisories: AuthAdvisory[] = [];
  if (idTokenVerifier.deprecated) {
    advisories.push({
      code: "LEGACY_ID_TOKEN_VERIFIER",
      message:
        `The ${idTokenVerifier.generation} ID token verifier is deprecated; ` +
        "use CurrentTokenVerifier instead",
    });
  }

  function logRejection<R extends { ok: boolean }>(op: string, result: R): R {
    if (isRejected(result)) {
      logger.warn(
        { op, code: result.error.code, ...result.error.details },
        result.error.message,
      );
    }
    return result;
  }

  async function checkRevocation(
    token: Token,
    revokedError: AuthError,
    signal?: AbortSignal,
  ): Promise<Rejected | undefined> {
    const revocation = await revocationChecker.check(token, signal);
    if (!revocation.ok) {
      return reject(withStage(revocation.error, "CLAIMS_CHECKED"));
    }
    if (revocation.revoked) {
      return reject(withStage(revokedError, "CLAIMS_CHECKED"));
    }
    return undefined;
  }

  async function mintCustomToken(
    uid: string,
    claims?: CustomClaims,
  ): Promise<TokenResult> {
    try {
      const token = await customTokenMinter.mint(uid, claims);
      return { ok: true, token };
    } catch (e) {
      if (e instanceof InvalidArgumentError) {
        return logRejection(
          "mintCustomToken",
          reject(err("AUTH_INVALID_ARGUMENT", e.message)),
        );
      }
      logger.error({ err: e }, "custom token minting failed");
      return internalError(e);
    }
  }

  async function doVerifyIdToken(
    input: TokenInput,
    options: VerifyIdTokenOptions,
  ): Promise<TokenResult> {
    const checkRevoked = options.checkRevoked ?? false;
    const allowFutureTokens = options.allowFutureTokens ?? false;

    const parsed = parseInput(input);
    if (!parsed.ok) return parsed;
    const { token } = parsed;

    const policy: ValidityPolicy = {
      issuer: cfg.idToken.issuer,
      audience: cfg.idToken.audience,
      clockSkewSeconds: cfg.clockSkewSeconds,
      allowIssuedInFuture: allowFutureTokens,
    };

    const outcome = await idTokenVerifier.verify(token, policy, {
      signal: options.signal,
    });

    if (outcome.status === "issued_in_future") {
      return reject(
        err(
          "AUTH_ISSUED_IN_THE_FUTURE",
          "The token has been issued in the future",
          {
            ...describeToken(token),
            claim: "iat",
            iat: token.claims.iat,
            stage: "SIGNATURE_CHECKED",
          },
        ),
      );
    }
    if (outcome.status === "rejected") {
      return reject(mapVerificationFailure(outcome.failure, token));
    }

    if (checkRevoked) {
      const revoked = await checkRevocation(
        token,
        err(
          "AUTH_REVOKED_ID_TOKEN",
          "The ID token has been revoked",
          describeToken(token),
        ),
        options.signal,
      );
      if (revoked) return revoked;
    }

    return { ok: true, token };
  }

  async function doVerifySessionToken(
    input: TokenInput,
    options: VerifySessionTokenOptions,
  ): Promise<TokenResult> {
    const checkRevoked = options.checkRevoked ?? false;
    const leeway = options.leeway ?? cfg.clockSkewSeconds;

    if (!Number.isFinite(leeway) || leeway < 0) {
      return reject(
        err(
          "AUTH_INVALID_ARGUMENT",
          "leeway must be a non-negative number of seconds",
          { stage: "UNPARSED" },
        ),
      );
    }

    const parsed = parseInput(input);
    if (!parsed.ok) return parsed;
    const { token } = parsed;

    const policy: ValidityPolicy = {
      issuer: cfg.sessionToken.issuer,
      audience: cfg.sessionToken.audience,
      clockSkewSeconds: leeway,
      allowIssuedInFuture: false,
    };

    const outcome = await sessionTokenVerifier.verify(token, policy, {
      signal: options.signal,
    });

    if (outcome.status === "issued_in_future") {
      return reject(
        err(
          "AUTH_INVALID_TOKEN",
          "The session token has been issued in the future",
          {
            ...describeToken(token),
            reason: "ISSUED_IN_FUTURE",
            claim: "iat",
            stage: "SIGNATURE_CHECKED",
          },
        ),
      );
    }
    if (outcome.status === "rejected") {
      return reject(mapVerificationFailure(outcome.failure, token));
    }

    if (checkRevoked) {
      const revoked = await checkRevocation(
        token,
        err(
          "AUTH_REVOKED_SESSION_TOKEN",
          "The session has been revoked",
          describeToken(token),
        ),
        options.signal,
      );
      if (revoked) return revoked;
    }

    return { ok: true, token };
  }

  async function verifyIdToken(
    input: TokenInput,
    options: VerifyIdTokenOptions = {},
  ): Promise<TokenResult> {
    try {
      return logRejection(
        "verifyIdToken",
        await doVerifyIdToken(input, options),
      );
    } catch (e) {
      logger.error({ err: e }, "ID token verification failed unexpectedly");
      return internalError(e);
    }
  }

  async function verifySessionToken(
    input: TokenInput,
    options: VerifySessionTokenOptions = {},
  ): Promise<TokenResult> {
    try {
      return logRejection(
        "verifySessionToken",
        await doVerifySessionToken(input, options),
      );
    } catch (e) {
      logger.error(
        { err: e },
        "session token verification failed unexpectedly",
      );
      return internalError(e);
    }
  }

  async function mintSessionToken(
    idToken: TokenInput,
    lifetime?: SessionLifetimeInput,
    signal?: AbortSignal,
  ): Promise<TokenResult> {
    try {
      return logRejection(
        "mintSessionToken",
        await sessionCookieMinter.mint(idToken, lifetime, signal),
      );
    } catch (e) {
      logger.error({ err: e }, "session cookie minting failed unexpectedly");
      return internalError(e);
    }
  }

  async function isRevoked(
    input: TokenInput,
    options: { signal?: AbortSignal } = {},
  ): Promise<RevokedResult> {
    try {
      const parsed = parseInput(input);
      if (!parsed.ok) return logRejection("isRevoked", parsed);

      return logRejection(
        "isRevoked",
        await revocationChecker.check(parsed.token, options.signal),
      );
    } catch (e) {
      logger.error({ err: e }, "revocation check failed unexpectedly");
      return internalError(e);
    }
  }

  return {
    advisories,
    mintCustomToken,
    verifyIdToken,
    verifySessionToken,
    mintSessionToken,
    isRevoked,
  };
}
