import type { Logger } from "pino";
import type { UserLookup } from "../adapters/types.js";
import { UpstreamError, err, fromUpstream } from "../errors/error.js";
import type { AuthError } from "../errors/error.js";
import { describeToken } from "../token/parse.js";
import type { Token } from "../token/types.js";
import { assertTimeoutMs, withTimeout } from "../util/timeout.js";

export type RevocationResult =
  | { ok: true; revoked: boolean }
  | { ok: false; error: AuthError };

export type RevocationCheckerConfig = {
  users: UserLookup;
  timeoutMs: number;
  logger?: Logger;
};

/**
 * Compares a token's `auth_time` with the user's last global sign-out.
 * Looks the user up on every call; revocation has to take effect at once.
 */
export class RevocationChecker {
  private cfg: RevocationCheckerConfig;

  constructor(cfg: RevocationCheckerConfig) {
    assertTimeoutMs("timeoutMs", cfg.timeoutMs);
    this.cfg = cfg;
  }

  async check(token: Token, signal?: AbortSignal): Promise<RevocationResult> {
    const { sub: uid, auth_time: authTime } = token.claims;
    const ids = describeToken(token);

    if (typeof uid !== "string" || !uid) {
      return {
        ok: false,
        error: err("AUTH_INVALID_TOKEN", 'Token has no "sub" claim', {
          ...ids,
          claim: "sub",
        }),
      };
    }
    if (typeof authTime !== "number") {
      return {
        ok: false,
        error: err(
          "AUTH_INVALID_TOKEN",
          'Token has no numeric "auth_time" claim',
          { ...ids, claim: "auth_time" },
        ),
      };
    }

    let lookup: Awaited<ReturnType<UserLookup["getUser"]>>;
    try {
      lookup = await withTimeout(
        "user lookup",
        this.cfg.timeoutMs,
        (s) => this.cfg.users.getUser(uid, s),
        signal,
      );
    } catch (e) {
      if (e instanceof UpstreamError) {
        return { ok: false, error: fromUpstream(e, ids) };
      }
      throw e;
    }

    if (!lookup.ok) {
      return {
        ok: false,
        error: err(
          "AUTH_USER_NOT_FOUND",
          `No user with uid "${uid}" found`,
          ids,
        ),
      };
    }

    const validSince = lookup.user.tokensValidAfterTime;
    const revoked = validSince !== undefined && authTime < validSince;

    this.cfg.logger?.debug(
      { ...ids, authTime, validSince, revoked },
      "revocation checked",
    );
    return { ok: true, revoked };
  }
}
