export interface BackoffPolicy {
    readonly initialBackoffMs: number;
    readonly backoffMultiplier: number;
    readonly maxBackoffMs: number;
}

/** Delay before retry number `retry` (1-based). */
export function computeBackoffDelay(
    policy: BackoffPolicy,
    retry: number,
): number {
    const delay =
        policy.initialBackoffMs * policy.backoffMultiplier ** (retry - 1);
    return Math.min(Math.round(delay), policy.maxBackoffMs);
}
