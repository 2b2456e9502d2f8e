import {
    ArchiveError,
    MergeConflictError,
    StoreError,
    StoreUnavailableError,
    errorMessage,
} from "./errors";
import type { ArchiveStore } from "./store";
import { DEFAULT_TOP_N, aggregate } from "./summary";
import type { CanonicalEvent, Summary, WeekArchive, WeekKey } from "./types";

export interface MergeOptions {
    /** Re-fetch/re-merge rounds after a version mismatch before giving up. */
    maxConflictRetries?: number;
    /** Attempts per store call when the store reports a retryable failure. */
    maxStoreAttempts?: number;
    baseDelayMs?: number;
    maxDelayMs?: number;
    topN?: number;
    sleep?: (ms: number) => Promise<void>;
    random?: () => number;
}

export interface MergeResult {
    week: WeekKey;
    appliedCount: number;
    totalCount: number;
    summary: Summary;
    /** Version of the revision the result describes; absent when nothing is stored. */
    version?: string;
}

type RetrySettings = Required<Omit<MergeOptions, "maxConflictRetries" | "topN">>;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** Full-jitter exponential backoff: uniform in [0, min(max, base * 2^(attempt-1))). */
export function backoffDelay(attempt: number, baseMs: number, maxMs: number, random: () => number = Math.random): number {
    const cap = Math.min(maxMs, baseMs * 2 ** (attempt - 1));
    return Math.floor(random() * cap);
}

async function withStoreRetry<T>(op: string, key: string, fn: () => Promise<T>, r: RetrySettings): Promise<T> {
    for (let attempt = 1; ; attempt++) {
        try {
            return await fn();
        } catch (err) {
            if (err instanceof ArchiveError) throw err;
            const retryable = err instanceof StoreError && err.retryable;
            if (!retryable || attempt >= r.maxStoreAttempts) {
                throw new StoreUnavailableError(
                    `Archive store ${op} for ${key} failed after ${attempt} attempt(s): ${errorMessage(err)}`,
                    { key, op, attempts: attempt },
                    { cause: err },
                );
            }
            const delay = backoffDelay(attempt, r.baseDelayMs, r.maxDelayMs, r.random);
            console.warn("store-retry", op, key, attempt, delay, errorMessage(err));
            await r.sleep(delay);
        }
    }
}

/**
 * Merges `newEvents` into the archive of `week` with a conditional
 * read-modify-write. Events whose request id is already archived are
 * skipped; a version mismatch restarts from a fresh fetch.
 */
export async function merge(
    store: ArchiveStore,
    week: WeekKey,
    newEvents: Iterable<CanonicalEvent>,
    options: MergeOptions = {},
): Promise<MergeResult> {
    const key = store.keyFor(week);
    const topN = options.topN ?? DEFAULT_TOP_N;
    const maxConflictRetries = options.maxConflictRetries ?? 5;
    const retry: RetrySettings = {
        maxStoreAttempts: options.maxStoreAttempts ?? 4,
        baseDelayMs: options.baseDelayMs ?? 100,
        maxDelayMs: options.maxDelayMs ?? 2000,
        sleep: options.sleep ?? defaultSleep,
        random: options.random ?? Math.random,
    };

    // first delivery of a request id within the batch wins
    const incoming = new Map<string, CanonicalEvent>();
    for (const ev of newEvents) {
        if (!incoming.has(ev.requestId)) incoming.set(ev.requestId, ev);
    }

    for (let conflicts = 0; ; conflicts++) {
        const current = await withStoreRetry("get", key, () => store.get(week), retry);
        const existing: ReadonlyMap<string, CanonicalEvent> = current?.archive.events ?? new Map();

        const toAdd = [...incoming.values()].filter(ev => !existing.has(ev.requestId));
        if (toAdd.length === 0) {
            return {
                week,
                appliedCount: 0,
                totalCount: existing.size,
                summary: aggregate(existing.values(), topN),
                version: current?.version,
            };
        }

        const events = new Map(existing);
        for (const ev of toAdd) events.set(ev.requestId, ev);
        const archive: WeekArchive = { week, events, summary: aggregate(events.values(), topN) };

        const res = await withStoreRetry("put", key, () => store.putIfVersion(archive, current?.version), retry);
        if (res.ok) {
            return { week, appliedCount: toAdd.length, totalCount: events.size, summary: archive.summary, version: res.version };
        }

        if (conflicts >= maxConflictRetries) {
            throw new MergeConflictError(
                `Gave up merging ${key} after ${conflicts + 1} conflicting write(s)`,
                { key, attempts: conflicts + 1 },
            );
        }
        console.warn("merge-conflict-retry", key, conflicts + 1);
    }
}
