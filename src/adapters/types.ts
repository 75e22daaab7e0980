export type UserLookupFailureReason = "USER_NOT_FOUND";

export type UserRevocationState = {
  uid: string;
  /** Epoch seconds; tokens authenticated before this are revoked. */
  tokensValidAfterTime?: number;
};

/** Reads the user record kept by the user-management backend. */
export interface UserLookup {
  getUser(
    uid: string,
    signal?: AbortSignal,
  ): Promise<
    | { ok: true; user: UserRevocationState }
    | { ok: false; reason: UserLookupFailureReason }
  >;
}

/**
 * Exchanges an ID token for a session cookie at the backend. Resolves with
 * the decoded response body; rejects on a non-2xx response (an error
 * carrying `status` or `response.status` is reported with that status).
 */
export interface SessionExchange {
  createSessionCookie(
    idToken: string,
    lifetimeSeconds: number,
    signal?: AbortSignal,
  ): Promise<unknown>;
}
