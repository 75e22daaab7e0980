import { InvalidArgumentError } from "../errors/error.js";

export const MIN_SESSION_LIFETIME_SECONDS = 5 * 60;
export const MAX_SESSION_LIFETIME_SECONDS = 14 * 24 * 60 * 60;
export const DEFAULT_SESSION_LIFETIME_SECONDS = MIN_SESSION_LIFETIME_SECONDS;

const UNIT_SECONDS: Record<string, number> = {
  second: 1,
  minute: 60,
  hour: 60 * 60,
  day: 24 * 60 * 60,
  week: 7 * 24 * 60 * 60,
};

const DURATION_PATTERN = /^(\d+)\s*(second|minute|hour|day|week)s?$/;

/** Seconds, a duration such as "30 minutes" or "2 weeks", or a lifetime. */
export type SessionLifetimeInput = number | string | SessionLifetime;

function toSeconds(value: number | string): number {
  if (typeof value === "number") return value;

  const text = value.trim().toLowerCase();
  if (/^\d+$/.test(text)) return Number(text);

  const m = DURATION_PATTERN.exec(text);
  if (!m) {
    throw new InvalidArgumentError(`"${value}" is not a valid duration`);
  }
  return Number(m[1]) * UNIT_SECONDS[m[2]];
}

/** Session cookie lifetime, always within [5 minutes, 2 weeks]. */
export class SessionLifetime {
  readonly seconds: number;

  private constructor(seconds: number) {
    this.seconds = seconds;
  }

  static from(input: SessionLifetimeInput | undefined): SessionLifetime {
    if (input instanceof SessionLifetime) return input;
    if (input === undefined || input === "") {
      return new SessionLifetime(DEFAULT_SESSION_LIFETIME_SECONDS);
    }

    const seconds = toSeconds(input);
    if (!Number.isInteger(seconds)) {
      throw new InvalidArgumentError(
        "A session cookie's lifetime must be a whole number of seconds.",
      );
    }
    if (
      seconds < MIN_SESSION_LIFETIME_SECONDS ||
      seconds > MAX_SESSION_LIFETIME_SECONDS
    ) {
      throw new InvalidArgumentError(
        "A session cookie's lifetime must be between 5 minutes and 2 weeks.",
      );
    }
    return new SessionLifetime(seconds);
  }
}
