import type { CanonicalEvent, OperationCategory, Summary } from "./types";

export const DEFAULT_TOP_N = 10;

function topN(counts: Map<string, number>, n: number): Array<[string, number]> {
    return [...counts.entries()]
        .sort(([ka, ca], [kb, cb]) => cb - ca || (ka < kb ? -1 : ka > kb ? 1 : 0))
        .slice(0, n);
}

function bump(counts: Map<string, number>, key: string) {
    counts.set(key, (counts.get(key) ?? 0) + 1);
}

/**
 * Rollup statistics for a set of events. Pure: the same set always yields the
 * same summary, whatever order the events arrive in.
 */
export function aggregate(events: Iterable<CanonicalEvent>, n = DEFAULT_TOP_N): Summary {
    const operationCounts: Record<OperationCategory, number> = { READ: 0, WRITE: 0, DELETE: 0, OTHER: 0 };
    const operations = new Map<string, number>();
    const users = new Map<string, number>();
    const ips = new Map<string, number>();
    let total = 0;
    let errors = 0;

    for (const ev of events) {
        total++;
        operationCounts[ev.operationCategory]++;
        bump(operations, ev.operationCategory);
        bump(users, ev.actor.name || "Unknown");
        bump(ips, ev.actor.sourceIp || "Unknown");
        if (ev.errorCode) errors++;
    }

    return {
        totalEvents: total,
        errorCount: errors,
        operationCounts,
        topOperations: topN(operations, n),
        topUsers: topN(users, n),
        topSourceIps: topN(ips, n),
        uniqueUsers: users.size,
        uniqueIps: ips.size,
    };
}
