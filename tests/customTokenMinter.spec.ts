import { describe, it, expect } from "vitest";
import { compactVerify, importSPKI } from "jose";
import { CustomTokenMinter } from "../src/token/customTokenMinter.js";
import { InvalidArgumentError } from "../src/errors/error.js";
import { CUSTOM_AUDIENCE, CUSTOM_ISSUER, NOW, makeKey } from "./helpers.js";

const key = makeKey("k1", "RS256");

const minter = new CustomTokenMinter({
  issuer: CUSTOM_ISSUER,
  audience: CUSTOM_AUDIENCE,
  ttlSeconds: 3600,
  signingKey: key.signer,
  clock: () => NOW,
});

describe("CustomTokenMinter", () => {
  it("mints a signed token for the uid with custom claims", async () => {
    const token = await minter.mint("alice", { role: "admin" });

    expect(token.header).toEqual({ alg: "RS256", kid: "k1", typ: "JWT" });
    expect(token.claims).toEqual({
      role: "admin",
      iss: CUSTOM_ISSUER,
      aud: CUSTOM_AUDIENCE,
      sub: "alice",
      iat: NOW,
      exp: NOW + 3600,
    });

    const publicKey = await importSPKI(key.publicKeyPem, "RS256");
    await expect(compactVerify(token.raw, publicKey)).resolves.toBeTruthy();
  });

  it("mints without custom claims", async () => {
    const token = await minter.mint("bob");
    expect(token.claims.sub).toBe("bob");
    expect(Object.keys(token.claims).sort()).toEqual(
      ["aud", "exp", "iat", "iss", "sub"],
    );
  });

  it("accepts nested JSON claim values", async () => {
    const token = await minter.mint("alice", {
      tenant: { id: "t-1", flags: [true, null, 3] },
    });
    expect(token.claims.tenant).toEqual({ id: "t-1", flags: [true, null, 3] });
  });

  it("rejects an empty uid", async () => {
    await expect(minter.mint("")).rejects.toThrow(InvalidArgumentError);
    await expect(minter.mint("  ")).rejects.toThrow(
      "uid must be a non-empty string",
    );
  });

  it("rejects an overlong uid", async () => {
    await expect(minter.mint("u".repeat(129))).rejects.toThrow(
      "uid must be at most 128 characters",
    );
  });

  it("rejects reserved claim names", async () => {
    for (const name of ["iss", "aud", "sub", "iat", "exp"]) {
      await expect(minter.mint("alice", { [name]: "x" })).rejects.toThrow(
        `"${name}" is a reserved claim name`,
      );
    }
  });

  it("rejects a claim that would replace the payload prototype", async () => {
    const claims: Record<string, unknown> = JSON.parse(
      '{"__proto__":{"role":"admin"}}',
    );

    await expect(minter.mint("alice", claims)).rejects.toThrow(
      '"__proto__" is not a valid claim name',
    );
  });

  it("rejects values that are not JSON", async () => {
    await expect(minter.mint("alice", { when: new Date(0) })).rejects.toThrow(
      'claim "when" is not a JSON value',
    );
    await expect(minter.mint("alice", { n: Number.NaN })).rejects.toThrow(
      'claim "n" is not a JSON value',
    );
  });

  it("requires a positive ttl", () => {
    expect(
      () =>
        new CustomTokenMinter({
          issuer: CUSTOM_ISSUER,
          audience: CUSTOM_AUDIENCE,
          ttlSeconds: 0,
          signingKey: key.signer,
        }),
    ).toThrow("CustomTokenMinterConfig.ttlSeconds must be > 0");
  });
});
