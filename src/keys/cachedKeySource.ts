import { z } from "zod";
import type { Logger } from "pino";
import type { Clock } from "../clock.js";
import { systemClock } from "../clock.js";
import { UpstreamError, describeError } from "../errors/error.js";
import { abandonable, assertTimeoutMs, withTimeout } from "../util/timeout.js";
import { importPublicKey } from "./importKey.js";
import type {
  PublicKeyFetcher,
  PublicKeySource,
  VerificationKey,
} from "./types.js";

const AlgSchema = z.enum(["RS256", "ES256", "EdDSA"]);

const JwkSchema = z.object({
  kty: z.string().min(1),
  alg: z.string().optional(),
  use: z.string().optional(),
  kid: z.string().optional(),
  n: z.string().optional(),
  e: z.string().optional(),
  crv: z.string().optional(),
  x: z.string().optional(),
  y: z.string().optional(),
  x5c: z.array(z.string()).optional(),
});

const PublicKeyDescriptorSchema = z.union([
  z.object({ kid: z.string().min(1), alg: AlgSchema, pem: z.string().min(1) }),
  z.object({ kid: z.string().min(1), alg: AlgSchema, jwk: JwkSchema }),
]);

export const PublicKeySetSchema = z.object({
  keys: z.array(PublicKeyDescriptorSchema),
  expiresAt: z.number().int().positive().optional(),
});

export type CachedPublicKeySourceOptions = {
  fetcher: PublicKeyFetcher;
  clock?: Clock;
  /** Minimum gap between fetches while the cached set is still fresh. */
  minRefreshIntervalSeconds?: number;
  fetchTimeoutMs?: number;
  logger?: Logger;
};

type KeyCache = {
  keys: ReadonlyMap<string, VerificationKey>;
  expiresAt?: number;
};

/**
 * Public verification keys fetched from a key endpoint and cached by kid.
 *
 * - Concurrent refreshes share one in-flight fetch.
 * - A new key map is built completely before it replaces the old one, so a
 *   failed or abandoned refresh leaves the previous keys in place.
 * - An expired set resolves nothing until it is re-fetched.
 */
export class CachedPublicKeySource implements PublicKeySource {
  private fetcher: PublicKeyFetcher;
  private clock: Clock;
  private minRefreshIntervalSeconds: number;
  private fetchTimeoutMs: number;
  private logger?: Logger;

  private cache?: KeyCache;
  private inFlight?: Promise<void>;
  private lastAttemptAt?: number;

  constructor(opts: CachedPublicKeySourceOptions) {
    this.fetcher = opts.fetcher;
    this.clock = opts.clock ?? systemClock;
    this.minRefreshIntervalSeconds = opts.minRefreshIntervalSeconds ?? 30;
    this.fetchTimeoutMs = opts.fetchTimeoutMs ?? 5000;
    assertTimeoutMs("fetchTimeoutMs", this.fetchTimeoutMs);
    this.logger = opts.logger;
  }

  private isStale(now: number) {
    if (!this.cache) return true;
    const { expiresAt } = this.cache;
    return expiresAt !== undefined && now >= expiresAt;
  }

  async getPublicKey(kid: string): Promise<VerificationKey | undefined> {
    if (this.isStale(this.clock())) return undefined;
    return this.cache?.keys.get(kid);
  }

  refresh(signal?: AbortSignal): Promise<void> {
    if (!this.inFlight) {
      const now = this.clock();
      const recentlyAttempted =
        this.lastAttemptAt !== undefined &&
        now - this.lastAttemptAt < this.minRefreshIntervalSeconds;

      if (recentlyAttempted && !this.isStale(now)) {
        this.logger?.debug(
          { lastAttemptAt: this.lastAttemptAt },
          "public key refresh skipped (rate limited)",
        );
        return Promise.resolve();
      }

      this.lastAttemptAt = now;
      this.inFlight = this.load().finally(() => {
        this.inFlight = undefined;
      });
    }
    return abandonable("public key refresh", this.inFlight, signal);
  }

  private async load(): Promise<void> {
    this.logger?.debug("fetching public keys");

    const body = await withTimeout(
      "public key fetch",
      this.fetchTimeoutMs,
      (signal) => this.fetcher.fetchPublicKeys(signal),
    );

    const parsed = PublicKeySetSchema.safeParse(body);
    if (!parsed.success) {
      throw new UpstreamError(
        "failure",
        "public key fetch",
        `public key fetch: malformed key set (${parsed.error.issues
          .map((i) => `${i.path.join(".")}: ${i.message}`)
          .join("; ")})`,
      );
    }

    let keys: VerificationKey[];
    try {
      keys = await Promise.all(parsed.data.keys.map(importPublicKey));
    } catch (e) {
      throw new UpstreamError(
        "failure",
        "public key fetch",
        `public key fetch: unusable key (${describeError(e)})`,
        { cause: e },
      );
    }

    this.cache = {
      keys: new Map(keys.map((k) => [k.kid, k])),
      expiresAt: parsed.data.expiresAt,
    };

    this.logger?.info(
      { kids: keys.map((k) => k.kid), expiresAt: parsed.data.expiresAt },
      "public keys refreshed",
    );
  }
}
