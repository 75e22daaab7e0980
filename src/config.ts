import { z } from "zod";
import { MAX_TIMEOUT_MS } from "./util/timeout.js";

const IssuerAudienceSchema = z.object({
  issuer: z.string().trim().min(1),
  audience: z.string().trim().min(1),
});

export const AuthCoreConfigSchema = z.object({
  idToken: IssuerAudienceSchema,
  sessionToken: IssuerAudienceSchema,
  customToken: IssuerAudienceSchema.extend({
    ttlSeconds: z.number().int().positive().default(3600),
  }),
  clockSkewSeconds: z.number().int().nonnegative().default(60),
  upstreamTimeoutMs: z
    .number()
    .int()
    .positive()
    .max(MAX_TIMEOUT_MS)
    .default(5000),
});

/** What callers pass in; defaults filled in by {@link parseAuthCoreConfig}. */
export type AuthCoreConfig = z.input<typeof AuthCoreConfigSchema>;
export type ResolvedAuthCoreConfig = z.output<typeof AuthCoreConfigSchema>;

export function parseAuthCoreConfig(input: unknown): ResolvedAuthCoreConfig {
  const parsed = AuthCoreConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "config"}: ${i.message}`)
      .join("; ");
    throw new Error(`Invalid AuthCoreConfig: ${issues}`);
  }
  return parsed.data;
}

type Env = Record<string, string | undefined>;

function requireEnv(env: Env, name: string): string {
  const v = env[name];
  if (!v || v.trim() === "") {
    throw new Error(`Missing required env var: ${name}`);
  }
  return v.trim();
}

function optionalNumber(env: Env, name: string): number | undefined {
  const v = env[name]?.trim();
  if (!v) return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) {
    throw new Error(`Env var ${name} must be a number, got "${v}"`);
  }
  return n;
}

/**
 * Reads the config from AUTH_* environment variables. Issuers and audiences
 * are required; the numeric settings fall back to the schema defaults.
 */
export function authCoreConfigFromEnv(
  env: Env = process.env,
): ResolvedAuthCoreConfig {
  return parseAuthCoreConfig({
    idToken: {
      issuer: requireEnv(env, "AUTH_ID_TOKEN_ISSUER"),
      audience: requireEnv(env, "AUTH_ID_TOKEN_AUDIENCE"),
    },
    sessionToken: {
      issuer: requireEnv(env, "AUTH_SESSION_ISSUER"),
      audience: requireEnv(env, "AUTH_SESSION_AUDIENCE"),
    },
    customToken: {
      issuer: requireEnv(env, "AUTH_CUSTOM_TOKEN_ISSUER"),
      audience: requireEnv(env, "AUTH_CUSTOM_TOKEN_AUDIENCE"),
      ttlSeconds: optionalNumber(env, "AUTH_CUSTOM_TOKEN_TTL_SECONDS"),
    },
    clockSkewSeconds: optionalNumber(env, "AUTH_CLOCK_SKEW_SECONDS"),
    upstreamTimeoutMs: optionalNumber(env, "AUTH_UPSTREAM_TIMEOUT_MS"),
  });
}
