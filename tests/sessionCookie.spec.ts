import { describe, it, expect, vi } from "vitest";
import { SessionLifetime } from "../src/session/lifetime.js";
import { SessionCookieMinter } from "../src/session/sessionCookieMinter.js";
import { InvalidArgumentError } from "../src/errors/error.js";
import type { SessionExchange } from "../src/adapters/types.js";
import {
  hangUntilAborted,
  idTokenClaims,
  rawUnsigned,
  sessionTokenClaims,
  silentLogger,
} from "./helpers.js";

describe("SessionLifetime", () => {
  it("defaults to five minutes", () => {
    expect(SessionLifetime.from(undefined).seconds).toBe(300);
  });

  it("accepts seconds and duration strings", () => {
    expect(SessionLifetime.from(3600).seconds).toBe(3600);
    expect(SessionLifetime.from("3600").seconds).toBe(3600);
    expect(SessionLifetime.from("5 minutes").seconds).toBe(300);
    expect(SessionLifetime.from("1 hour").seconds).toBe(3600);
    expect(SessionLifetime.from("2 weeks").seconds).toBe(1_209_600);
  });

  it("returns an existing lifetime unchanged", () => {
    const lifetime = SessionLifetime.from("1 day");
    expect(SessionLifetime.from(lifetime)).toBe(lifetime);
  });

  it("enforces the inclusive [5 minutes, 2 weeks] range", () => {
    expect(() => SessionLifetime.from(299)).toThrow(
      "A session cookie's lifetime must be between 5 minutes and 2 weeks.",
    );
    expect(() => SessionLifetime.from(1_209_601)).toThrow(InvalidArgumentError);
    expect(() => SessionLifetime.from("4 minutes")).toThrow(
      InvalidArgumentError,
    );
    expect(() => SessionLifetime.from("15 days")).toThrow(InvalidArgumentError);
  });

  it("rejects values that are not durations", () => {
    expect(() => SessionLifetime.from("forever")).toThrow(
      '"forever" is not a valid duration',
    );
    expect(() => SessionLifetime.from(300.5)).toThrow(
      "A session cookie's lifetime must be a whole number of seconds.",
    );
  });
});

const idToken = rawUnsigned(idTokenClaims());
const cookie = rawUnsigned(sessionTokenClaims(), { alg: "RS256", kid: "s1" });

function makeMinter(
  response: unknown = { sessionCookie: cookie },
  timeoutMs = 1000,
) {
  const exchange = {
    createSessionCookie: vi.fn<SessionExchange["createSessionCookie"]>(
      async () => response,
    ),
  };
  const minter = new SessionCookieMinter({
    exchange,
    timeoutMs,
    logger: silentLogger,
  });
  return { minter, exchange };
}

describe("SessionCookieMinter", () => {
  it("returns the backend's cookie string unchanged", async () => {
    const { minter, exchange } = makeMinter();

    const res = await minter.mint(idToken, 300);

    expect(res.ok).toBe(true);
    if (res.ok) {
      expect(res.token.raw).toBe(cookie);
      expect(res.token.header.kid).toBe("s1");
    }
    expect(exchange.createSessionCookie).toHaveBeenCalledWith(
      idToken,
      300,
      expect.any(AbortSignal),
    );
  });

  it("accepts the two-week upper bound", async () => {
    const { minter, exchange } = makeMinter();

    const res = await minter.mint(idToken, "2 weeks");

    expect(res.ok).toBe(true);
    expect(exchange.createSessionCookie.mock.calls[0][1]).toBe(1_209_600);
  });

  it("rejects a short lifetime before calling the backend", async () => {
    const { minter, exchange } = makeMinter();

    const res = await minter.mint(idToken, 4 * 60 + 59);

    expect(res).toMatchObject({
      ok: false,
      error: { code: "AUTH_INVALID_ARGUMENT" },
    });
    expect(exchange.createSessionCookie).not.toHaveBeenCalled();
  });

  it("rejects an unparsable ID token before calling the backend", async () => {
    const { minter, exchange } = makeMinter();

    const res = await minter.mint("not-a-token");

    expect(res).toMatchObject({
      ok: false,
      error: { code: "AUTH_INVALID_ARGUMENT" },
    });
    expect(exchange.createSessionCookie).not.toHaveBeenCalled();
  });

  it("fails when the response has no sessionCookie", async () => {
    const { minter } = makeMinter({ kind: "something-else" });

    expect(await minter.mint(idToken)).toEqual({
      ok: false,
      error: {
        code: "AUTH_SERVICE_ERROR",
        message:
          "The backend response does not include a 'sessionCookie' field",
        details: {
          sub: "alice",
          kid: "k1",
          response: { kind: "something-else" },
        },
      },
    });
  });

  it("fails when the response is not an object", async () => {
    const { minter } = makeMinter("<html>bad gateway</html>");

    expect(await minter.mint(idToken)).toMatchObject({
      ok: false,
      error: { code: "AUTH_SERVICE_ERROR" },
    });
  });

  it("fails when the cookie is not a token", async () => {
    const { minter } = makeMinter({ sessionCookie: "opaque" });

    expect(await minter.mint(idToken)).toMatchObject({
      ok: false,
      error: {
        code: "AUTH_TOKEN_PARSE_ERROR",
        message:
          "Unable to parse the session cookie into a token: " +
          "expected 3 dot-separated segments, got 1",
      },
    });
  });

  it("reports the HTTP status of a failed exchange", async () => {
    const { minter, exchange } = makeMinter();
    exchange.createSessionCookie.mockRejectedValueOnce(
      Object.assign(new Error("Request failed"), { status: 400 }),
    );

    expect(await minter.mint(idToken)).toMatchObject({
      ok: false,
      error: {
        code: "AUTH_SERVICE_ERROR",
        message: "session cookie exchange: Request failed",
        details: { status: 400, operation: "session cookie exchange" },
      },
    });
  });

  it("times out a slow exchange", async () => {
    const { minter, exchange } = makeMinter(undefined, 20);
    exchange.createSessionCookie.mockImplementationOnce((_t, _s, signal) =>
      hangUntilAborted(signal),
    );

    expect(await minter.mint(idToken)).toMatchObject({
      ok: false,
      error: {
        code: "AUTH_UPSTREAM_UNAVAILABLE",
        details: { kind: "timeout" },
      },
    });
  });
});
