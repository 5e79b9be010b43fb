interface ClientRateState {
  timestamps: number[];
}

export interface RateLimitDecision {
  allowed: boolean;
  retryAfterSeconds: number;
}

export interface RateLimiterOptions {
  windowMs: number;
  maxRequests: number;
  now?: () => number;
}

export interface RateLimiter {
  checkAndConsume(clientKey: string): RateLimitDecision;
}

export function createRateLimiter(options: RateLimiterOptions): RateLimiter {
  const now = options.now ?? Date.now;
  const clients = new Map<string, ClientRateState>();

  return {
    checkAndConsume(clientKey: string): RateLimitDecision {
      const current = now();
      const state = clients.get(clientKey) ?? { timestamps: [] };
      const filtered = state.timestamps.filter(
        (timestamp) => current - timestamp < options.windowMs,
      );

      if (filtered.length >= options.maxRequests) {
        const oldestInWindow = filtered[0] ?? current;
        const retryMs = Math.max(1_000, options.windowMs - (current - oldestInWindow));
        clients.set(clientKey, { timestamps: filtered });
        return {
          allowed: false,
          retryAfterSeconds: Math.ceil(retryMs / 1_000),
        };
      }

      filtered.push(current);
      clients.set(clientKey, { timestamps: filtered });
      return {
        allowed: true,
        retryAfterSeconds: 0,
      };
    },
  };
}
