export const UNKNOWN_CLIENT_KEY = "unknown";

export const RATE_LIMIT_BUCKETS = {
  assess: "chat_assess",
  analyze: "chat_analyze",
} as const;

export type RateLimitDecision = { admitted: true } | { admitted: false };

export type RateLimiter = {
  admit: (
    bucket: string,
    clientKey: string,
    maxRequests: number,
    windowSeconds: number,
  ) => RateLimitDecision;
  isAdmitted: (
    bucket: string,
    clientKey: string,
    maxRequests: number,
    windowSeconds: number,
  ) => boolean;
  size: () => number;
};

export type RequestHeaders = Record<string, string | string[] | undefined>;

export type ClientIdentityParams = {
  headers?: RequestHeaders | null;
  remoteAddress?: string | null;
};

function toTrimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}

function readHeader(headers: RequestHeaders | null | undefined, name: string): string {
  if (!headers) {
    return "";
  }
  const target = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== target) {
      continue;
    }
    return Array.isArray(value) ? value.join(",") : toTrimmedString(value);
  }
  return "";
}

export function deriveClientKey(params: ClientIdentityParams): string {
  const forwardedFor = readHeader(params.headers, "x-forwarded-for");
  if (forwardedFor) {
    const first = toTrimmedString(forwardedFor.split(",")[0]);
    if (first) {
      return first;
    }
  }
  return toTrimmedString(params.remoteAddress) || UNKNOWN_CLIENT_KEY;
}

/**
 * Sliding-window limiter keyed by bucket and client. Each admission runs prune,
 * decide and record in one synchronous pass, so concurrent requests on the
 * event loop cannot interleave between the count and the append.
 *
 * Keys are never evicted; `size()` exposes how many are tracked.
 */
export function createRateLimiter(options: { now?: () => number } = {}): RateLimiter {
  const now = options.now ?? Date.now;
  const timestampsByKey = new Map<string, number[]>();

  const admit: RateLimiter["admit"] = (bucket, clientKey, maxRequests, windowSeconds) => {
    if (maxRequests <= 0) {
      return { admitted: true };
    }

    const key = `${bucket}:${toTrimmedString(clientKey) || UNKNOWN_CLIENT_KEY}`;
    const nowMs = now();
    const windowStartMs = nowMs - Math.max(0, windowSeconds) * 1000;

    let entries = timestampsByKey.get(key);
    if (!entries) {
      entries = [];
      timestampsByKey.set(key, entries);
    }

    // a clock that stepped backwards pulls every recorded entry back to now
    if (entries.length > 0 && entries[entries.length - 1] > nowMs) {
      for (let index = 0; index < entries.length; index += 1) {
        entries[index] = Math.min(entries[index], nowMs);
      }
    }

    let expired = 0;
    while (expired < entries.length && entries[expired] < windowStartMs) {
      expired += 1;
    }
    if (expired > 0) {
      entries.splice(0, expired);
    }

    if (entries.length >= maxRequests) {
      return { admitted: false };
    }

    entries.push(nowMs);
    return { admitted: true };
  };

  return {
    admit,
    isAdmitted(bucket, clientKey, maxRequests, windowSeconds) {
      return admit(bucket, clientKey, maxRequests, windowSeconds).admitted;
    },
    size() {
      return timestampsByKey.size;
    },
  };
}
