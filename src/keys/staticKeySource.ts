import type {
  PublicKeyDescriptor,
  PublicKeySource,
  VerificationKey,
} from "./types.js";
import { importPublicKey } from "./importKey.js";

/** Fixed set of verification keys, imported on first lookup. Has no refresh. */
export class StaticPublicKeySource implements PublicKeySource {
  private descriptors: Map<string, PublicKeyDescriptor>;
  private imported = new Map<string, Promise<VerificationKey>>();

  constructor(descriptors: PublicKeyDescriptor[]) {
    this.descriptors = new Map(descriptors.map((d) => [d.kid, d]));
  }

  async getPublicKey(kid: string): Promise<VerificationKey | undefined> {
    const descriptor = this.descriptors.get(kid);
    if (!descriptor) return undefined;

    let key = this.imported.get(kid);
    if (!key) {
      key = importPublicKey(descriptor);
      this.imported.set(kid, key);
    }
    return key;
  }
}
