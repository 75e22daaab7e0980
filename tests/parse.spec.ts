import { describe, it, expect } from "vitest";
import {
  TokenParseError,
  describeToken,
  parseToken,
  toToken,
} from "../src/token/parse.js";
import { idTokenClaims, makeKey, rawUnsigned, signToken } from "./helpers.js";

const key = makeKey("k1", "ES256");

describe("parseToken", () => {
  it("splits a signed token into header, claims and signature", async () => {
    const raw = await signToken(key, idTokenClaims({ role: "admin" }));
    const token = parseToken(raw);

    expect(token.raw).toBe(raw);
    expect(token.header).toEqual({ alg: "ES256", kid: "k1" });
    expect(token.claims).toEqual(idTokenClaims({ role: "admin" }));
    expect(token.signature).toBe(raw.split(".")[2]);
  });

  it("freezes the parsed token", async () => {
    const token = parseToken(await signToken(key, idTokenClaims()));

    expect(Object.isFrozen(token)).toBe(true);
    expect(Object.isFrozen(token.header)).toBe(true);
    expect(Object.isFrozen(token.claims)).toBe(true);
  });

  it("rejects strings that are not compact tokens", () => {
    expect(() => parseToken("some id token string")).toThrow(TokenParseError);
    expect(() => parseToken("a.b")).toThrow(
      "expected 3 dot-separated segments, got 2",
    );
    expect(() => parseToken("")).toThrow("token must be a non-empty string");
  });

  it("rejects undecodable segments", () => {
    expect(() => parseToken("###.###.###")).toThrow(TokenParseError);
  });

  it("requires an algorithm in the header", () => {
    expect(() => parseToken(rawUnsigned({ sub: "x" }, { typ: "JWT" }))).toThrow(
      'token header has no "alg"',
    );
  });
});

describe("toToken", () => {
  it("re-parses pre-parsed tokens from their raw form", async () => {
    const token = parseToken(await signToken(key, idTokenClaims()));
    const forged = { ...token, claims: { ...token.claims, sub: "mallory" } };

    const normalized = toToken(forged);
    expect(normalized.claims.sub).toBe("alice");
    expect(normalized.raw).toBe(token.raw);
  });

  it("accepts the serialized form", async () => {
    const raw = await signToken(key, idTokenClaims());
    expect(toToken(raw).claims.sub).toBe("alice");
  });
});

describe("describeToken", () => {
  it("returns identifying fields only", async () => {
    const token = parseToken(
      await signToken(key, idTokenClaims({ jti: "t-1" })),
    );
    expect(describeToken(token)).toEqual({
      kid: "k1",
      sub: "alice",
      jti: "t-1",
    });
  });
});
