import { isForeignSource, isRelevant } from "../adapters/cloudtrail/relevance";
import { normalize } from "../adapters/cloudtrail/normalize";
import { parseRecord } from "../adapters/cloudtrail/log-file";
import type { CloudTrailRecordV1 } from "../contracts/src/types/cloudtrail.record.v1";
import { ArchiveError, errorMessage, type FailureKind } from "./errors";
import { merge, type MergeOptions } from "./merge";
import type { ArchiveStore } from "./store";
import type { CanonicalEvent, WeekKey } from "./types";
import { compareWeekKeys, formatWeekKey, parseTimestamp, weekKey } from "./week";

export type TimestampFallback = "current-week" | "reject";

export interface PrepareOptions {
    monitoredBucket: string;
    /** What to do with records whose eventTime is missing or unparsable. */
    timestampFallback?: TimestampFallback;
    now?: () => Date;
}

export interface WeekGroup {
    week: WeekKey;
    events: CanonicalEvent[];
}

export interface PreparedBatch {
    received: number;
    malformed: number;
    filtered: number;
    events: CanonicalEvent[];
    groups: WeekGroup[]; // ascending by week
}

export interface WeekOutcome {
    week: string;
    key: string;
    applied: number;
    total: number;
}

export interface WeekFailure {
    week: string;
    kind: FailureKind;
    message: string;
}

export interface BatchReport {
    received: number;
    malformed: number;
    filtered: number;
    relevant: number;
    merged: number;
    duplicates: number;
    weeks: WeekOutcome[];
    failures: WeekFailure[];
    /** Weeks not started because the deadline passed; safe to redeliver. */
    notAttempted: string[];
}

export interface MergeBatchOptions extends MergeOptions {
    store: ArchiveStore;
    /** Epoch millis after which no further week is started. */
    deadline?: number;
    clock?: () => number;
}

function parseOrSkip(raw: unknown, index: number): CloudTrailRecordV1 | undefined {
    try {
        return parseRecord(raw);
    } catch (err) {
        console.warn("malformed-record", index, errorMessage(err));
        return undefined;
    }
}

/**
 * Validate, filter, normalize and group raw records by week. Records that do
 * not meet the minimal contract are counted and skipped.
 */
export function prepareBatch(records: readonly unknown[], opts: PrepareOptions): PreparedBatch {
    const processedAt = (opts.now ?? (() => new Date()))();
    const fallback = opts.timestampFallback ?? "current-week";
    const byWeek = new Map<string, WeekGroup>();
    const events: CanonicalEvent[] = [];
    let malformed = 0;
    let filtered = 0;

    records.forEach((raw, i) => {
        if (isForeignSource(raw)) {
            filtered++;
            return;
        }

        const rec = parseOrSkip(raw, i);
        if (!rec) {
            malformed++;
            return;
        }

        if (!isRelevant(rec, opts.monitoredBucket)) {
            filtered++;
            return;
        }

        const ev = normalize(rec);
        if (fallback === "reject" && !parseTimestamp(ev.timestamp)) {
            malformed++;
            console.warn("malformed-record", i, `unparsable eventTime ${JSON.stringify(ev.timestamp)}`);
            return;
        }

        const week = weekKey(ev.timestamp, () => processedAt);
        const text = formatWeekKey(week);
        const group: WeekGroup = byWeek.get(text) ?? { week, events: [] };
        group.events.push(ev);
        byWeek.set(text, group);
        events.push(ev);
    });

    return {
        received: records.length,
        malformed,
        filtered,
        events,
        groups: [...byWeek.values()].sort((a, b) => compareWeekKeys(a.week, b.week)),
    };
}

/**
 * Merge each week group independently, oldest week first. A failed week is
 * reported and never stops the others.
 */
export async function mergeBatch(prepared: PreparedBatch, opts: MergeBatchOptions): Promise<BatchReport> {
    const clock = opts.clock ?? Date.now;
    const report: BatchReport = {
        received: prepared.received,
        malformed: prepared.malformed,
        filtered: prepared.filtered,
        relevant: prepared.events.length,
        merged: 0,
        duplicates: 0,
        weeks: [],
        failures: [],
        notAttempted: [],
    };

    for (const group of prepared.groups) {
        const week = formatWeekKey(group.week);
        if (opts.deadline !== undefined && clock() >= opts.deadline) {
            report.notAttempted.push(week);
            continue;
        }

        try {
            const res = await merge(opts.store, group.week, group.events, opts);
            report.weeks.push({ week, key: opts.store.keyFor(group.week), applied: res.appliedCount, total: res.totalCount });
            report.merged += res.appliedCount;
            report.duplicates += group.events.length - res.appliedCount;
        } catch (err) {
            const kind: FailureKind = err instanceof ArchiveError ? err.kind : "StoreUnavailable";
            console.error("week-merge-failed", week, kind, errorMessage(err));
            report.failures.push({ week, kind, message: errorMessage(err) });
        }
    }

    return report;
}

export async function processBatch(
    records: readonly unknown[],
    opts: PrepareOptions & MergeBatchOptions,
): Promise<BatchReport> {
    return mergeBatch(prepareBatch(records, opts), opts);
}
