import { importJWK, importPKCS8, importSPKI, importX509 } from "jose";
import type { CryptoKey } from "jose";
import type { JwtAlg } from "../token/types.js";
import type { PublicKeyDescriptor, VerificationKey } from "./types.js";

const CERT_MARKER = "-----BEGIN CERTIFICATE-----";

export async function importPublicKey(
  descriptor: PublicKeyDescriptor,
): Promise<VerificationKey> {
  const { kid, alg } = descriptor;

  if ("jwk" in descriptor) {
    const key = await importJWK(descriptor.jwk, alg);
    if (key instanceof Uint8Array) {
      throw new Error(`key "${kid}" is symmetric; ${alg} needs a public key`);
    }
    return { kid, alg, key };
  }

  const key = descriptor.pem.includes(CERT_MARKER)
    ? await importX509(descriptor.pem, alg)
    : await importSPKI(descriptor.pem, alg);
  return { kid, alg, key };
}

export function importPrivateKey(pem: string, alg: JwtAlg): Promise<CryptoKey> {
  return importPKCS8(pem, alg);
}
