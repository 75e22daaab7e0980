import { z } from "zod";
import type { Logger } from "pino";
import type { SessionExchange } from "../adapters/types.js";
import {
  InvalidArgumentError,
  UpstreamError,
  describeError,
  err,
  fromUpstream,
} from "../errors/error.js";
import type { Result } from "../errors/error.js";
import {
  TokenParseError,
  describeToken,
  parseToken,
  toToken,
} from "../token/parse.js";
import type { Token, TokenInput } from "../token/types.js";
import { assertTimeoutMs, withTimeout } from "../util/timeout.js";
import { SessionLifetime } from "./lifetime.js";
import type { SessionLifetimeInput } from "./lifetime.js";

const SessionCookieResponseSchema = z.object({
  sessionCookie: z.string().min(1),
});

export type SessionCookieMinterConfig = {
  exchange: SessionExchange;
  timeoutMs: number;
  logger?: Logger;
};

export type SessionCookieResult = Result<{ token: Token }>;

/**
 * Exchanges an ID token for a session cookie. Argument problems are reported
 * before the backend is called; the backend's cookie string is returned
 * as-is and not verified here.
 */
export class SessionCookieMinter {
  private cfg: SessionCookieMinterConfig;

  constructor(cfg: SessionCookieMinterConfig) {
    assertTimeoutMs("timeoutMs", cfg.timeoutMs);
    this.cfg = cfg;
  }

  async mint(
    idToken: TokenInput,
    lifetime?: SessionLifetimeInput,
    signal?: AbortSignal,
  ): Promise<SessionCookieResult> {
    let token: Token;
    let life: SessionLifetime;
    try {
      token = toToken(idToken);
      life = SessionLifetime.from(lifetime);
    } catch (e) {
      if (e instanceof TokenParseError || e instanceof InvalidArgumentError) {
        return {
          ok: false,
          error: err("AUTH_INVALID_ARGUMENT", describeError(e)),
        };
      }
      throw e;
    }

    const ids = describeToken(token);

    let body: unknown;
    try {
      body = await withTimeout(
        "session cookie exchange",
        this.cfg.timeoutMs,
        (s) =>
          this.cfg.exchange.createSessionCookie(token.raw, life.seconds, s),
        signal,
      );
    } catch (e) {
      if (e instanceof UpstreamError) {
        return { ok: false, error: fromUpstream(e, ids) };
      }
      throw e;
    }

    const parsed = SessionCookieResponseSchema.safeParse(body);
    if (!parsed.success) {
      return {
        ok: false,
        error: err(
          "AUTH_SERVICE_ERROR",
          "The backend response does not include a 'sessionCookie' field",
          { ...ids, response: body },
        ),
      };
    }

    const cookie = parsed.data.sessionCookie;
    try {
      const session = parseToken(cookie);
      this.cfg.logger?.debug(
        { ...ids, lifetimeSeconds: life.seconds },
        "session cookie minted",
      );
      return { ok: true, token: session };
    } catch (e) {
      if (e instanceof TokenParseError) {
        return {
          ok: false,
          error: err(
            "AUTH_TOKEN_PARSE_ERROR",
            `Unable to parse the session cookie into a token: ${e.message}`,
            ids,
          ),
        };
      }
      throw e;
    }
  }
}
