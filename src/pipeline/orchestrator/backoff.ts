import type { BackoffPolicy } from "../types.js";

/**
 * Exponential backoff with jitter for the `failures`-th failed attempt
 * (1-based): min(cap, base * 2^(failures-1)), scaled into [50%, 100%] of
 * that value by `random`.
 */
export function computeBackoff(policy: BackoffPolicy, failures: number, random: () => number = Math.random): number {
  const exponent = Math.max(0, failures - 1);
  const raw = policy.baseMs * Math.pow(2, exponent);
  const capped = Math.min(raw, policy.capMs);
  const r = Math.min(1, Math.max(0, random()));
  return Math.round(capped * (0.5 + r / 2));
}
