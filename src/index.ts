export { createAuthCore } from "./framework.js";

export * from "./types.js";
export * from "./config.js";
export * from "./clock.js";
export * from "./logger.js";
export * from "./errors/codes.js";
export * from "./errors/error.js";

export * from "./adapters/types.js";
export * from "./token/types.js";
export * from "./keys/types.js";
export * from "./verify/types.js";

export * from "./token/parse.js";
export * from "./token/claimValidator.js";
export * from "./token/customTokenMinter.js";
export * from "./keys/pemSigningKey.js";
export * from "./keys/staticKeySource.js";
export * from "./keys/cachedKeySource.js";
export * from "./verify/currentVerifier.js";
export * from "./verify/legacyVerifier.js";
export * from "./revocation/revocationChecker.js";
export * from "./session/lifetime.js";
export * from "./session/sessionCookieMinter.js";
