import type { CryptoKey, JWK } from "jose";
import type { JwtAlg } from "../token/types.js";

export type SigningKey = {
  kid: string;
  alg: JwtAlg;
  key: CryptoKey;
};

export type VerificationKey = {
  kid: string;
  alg: JwtAlg;
  key: CryptoKey;
};

/** A public key as delivered by a key endpoint: SPKI / X.509 PEM, or a JWK. */
export type PublicKeyDescriptor =
  | { kid: string; alg: JwtAlg; pem: string }
  | { kid: string; alg: JwtAlg; jwk: JWK };

export type PublicKeySet = {
  keys: PublicKeyDescriptor[];
  /** Epoch seconds after which the whole set must be re-fetched. */
  expiresAt?: number;
};

export interface SigningKeyProvider {
  getSigningKey(): Promise<SigningKey>;
}

export interface PublicKeySource {
  getPublicKey(kid: string): Promise<VerificationKey | undefined>;
  /** Best-effort reload; optional for sources that never change. */
  refresh?(signal?: AbortSignal): Promise<void>;
}

export interface PublicKeyFetcher {
  fetchPublicKeys(signal: AbortSignal): Promise<PublicKeySet>;
}
