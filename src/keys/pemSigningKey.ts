import type { JwtAlg } from "../token/types.js";
import type { SigningKey, SigningKeyProvider } from "./types.js";
import { importPrivateKey } from "./importKey.js";

export type PemSigningKeyConfig = {
  kid: string;
  alg: JwtAlg;
  privateKeyPem: string;
};

/**
 * Private signing key loaded from PKCS#8 PEM. Imported on first use and kept
 * for the lifetime of the process.
 */
export class PemSigningKey implements SigningKeyProvider {
  private cfg: PemSigningKeyConfig;
  private signingKeyPromise?: Promise<SigningKey>;

  constructor(cfg: PemSigningKeyConfig) {
    if (!cfg.kid) throw new Error("PemSigningKey.kid is required");
    if (!cfg.privateKeyPem) {
      throw new Error(`${cfg.alg} privateKeyPem is required to sign tokens`);
    }
    this.cfg = cfg;
  }

  getSigningKey(): Promise<SigningKey> {
    if (!this.signingKeyPromise) {
      const { kid, alg, privateKeyPem } = this.cfg;
      this.signingKeyPromise = importPrivateKey(privateKeyPem, alg).then(
        (key) => ({ kid, alg, key }),
      );
    }
    return this.signingKeyPromise;
  }
}
