import { generateKeyPairSync } from "node:crypto";
import { createAuthCore } from "../../src/framework.js";
import { PemSigningKey } from "../../src/keys/pemSigningKey.js";
import { CachedPublicKeySource } from "../../src/keys/cachedKeySource.js";
import type {
  SessionExchange,
  UserLookup,
  UserRevocationState,
} from "../../src/adapters/types.js";
import type { PublicKeyFetcher } from "../../src/keys/types.js";

// -----------------------------
// Example "backend" (in-memory)
// -----------------------------
const USERS: Record<string, UserRevocationState> = {
  alice: { uid: "alice" },
  bob: { uid: "bob", tokensValidAfterTime: Math.floor(Date.now() / 1000) },
};

const users: UserLookup = {
  async getUser(uid) {
    const user = USERS[uid];
    return user ? { ok: true, user } : { ok: false, reason: "USER_NOT_FOUND" };
  },
};

// Real deployments call the backend over HTTP; here the "session cookie" is
// just the ID token handed back.
const sessionExchange: SessionExchange = {
  async createSessionCookie(idToken) {
    return { sessionCookie: idToken };
  },
};

// -----------------------------
// Keys
// A key endpoint would normally serve the public half; the fetcher is the
// seam where that HTTP call goes.
// -----------------------------
const { privateKey, publicKey } = generateKeyPairSync("rsa", {
  modulusLength: 2048,
});

const signingKey = new PemSigningKey({
  kid: "rsa-k1",
  alg: "RS256",
  privateKeyPem: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
});

const fetcher: PublicKeyFetcher = {
  async fetchPublicKeys() {
    return {
      keys: [
        {
          kid: "rsa-k1",
          alg: "RS256",
          pem: publicKey.export({ type: "spki", format: "pem" }).toString(),
        },
      ],
      expiresAt: Math.floor(Date.now() / 1000) + 3600,
    };
  },
};

const auth = createAuthCore(
  {
    idToken: {
      issuer: "https://tokens.example.test/tenant-a",
      audience: "tenant-a",
    },
    sessionToken: {
      issuer: "https://sessions.example.test/tenant-a",
      audience: "tenant-a",
    },
    customToken: {
      issuer: "https://tokens.example.test/tenant-a",
      audience: "tenant-a",
    },
  },
  {
    signingKey,
    idTokenKeys: new CachedPublicKeySource({ fetcher }),
    users,
    sessionExchange,
  },
);

async function main() {
  // Issuer/audience above match on purpose so the custom token also verifies
  // as an ID token; in production the two are never interchangeable.
  const minted = await auth.mintCustomToken("alice", { role: "admin" });
  if (!minted.ok) {
    console.error("Mint failed:", minted.error);
    process.exit(1);
  }
  console.log("custom token:", minted.token.raw);

  const verified = await auth.verifyIdToken(minted.token.raw);
  console.log(
    "verify without revocation check:",
    verified.ok ? "ok" : verified.error,
  );

  const revoked = await auth.verifyIdToken(minted.token, {
    checkRevoked: true,
  });
  console.log(
    "verify with revocation check:",
    revoked.ok ? "ok" : revoked.error.code,
  );

  const session = await auth.mintSessionToken(minted.token, "1 hour");
  console.log(
    "session cookie:",
    session.ok ? session.token.raw : session.error,
  );
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
