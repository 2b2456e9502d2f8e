import { validate } from "../contracts/src/validate";
import type { ArchivedEventV1, WeeklyArchiveV1, WeeklySummaryV1 } from "../contracts/src/types/weekly.archive.v1";
import { CorruptArchiveError, errorMessage } from "./errors";
import { aggregate } from "./summary";
import type { CanonicalEvent, Summary, WeekArchive } from "./types";
import { formatWeekKey, parseWeekKey } from "./week";

export function summaryToDocument(s: Summary): WeeklySummaryV1 {
    return {
        total_events: s.totalEvents,
        error_count: s.errorCount,
        operation_counts: { ...s.operationCounts },
        top_operations: Object.fromEntries(s.topOperations),
        top_users: Object.fromEntries(s.topUsers),
        top_source_ips: Object.fromEntries(s.topSourceIps),
        unique_users: s.uniqueUsers,
        unique_ips: s.uniqueIps,
    };
}

export function eventToDocument(ev: CanonicalEvent): ArchivedEventV1 {
    return {
        timestamp: ev.timestamp,
        operation: ev.operationCategory,
        event_name: ev.rawEventName,
        who: { user_type: ev.actor.type, user_name: ev.actor.name, source_ip: ev.actor.sourceIp },
        what: { resources: [...ev.target.referencedArns], bucket: ev.target.resourceName, key: ev.target.objectKey },
        how: { user_agent: ev.actor.userAgent, request_id: ev.requestId, aws_region: ev.region },
        response: { error_code: ev.errorCode ?? "", error_message: ev.errorMessage ?? "" },
    };
}

export function eventFromDocument(doc: ArchivedEventV1): CanonicalEvent {
    return Object.freeze({
        requestId: doc.how.request_id,
        timestamp: doc.timestamp,
        operationCategory: doc.operation,
        rawEventName: doc.event_name,
        actor: Object.freeze({
            type: doc.who.user_type,
            name: doc.who.user_name,
            sourceIp: doc.who.source_ip,
            userAgent: doc.how.user_agent,
        }),
        target: Object.freeze({
            resourceName: doc.what.bucket,
            objectKey: doc.what.key,
            referencedArns: Object.freeze([...doc.what.resources]),
        }),
        region: doc.how.aws_region,
        ...(doc.response.error_code ? { errorCode: doc.response.error_code } : {}),
        ...(doc.response.error_message ? { errorMessage: doc.response.error_message } : {}),
    });
}

function byTimeThenId(a: CanonicalEvent, b: CanonicalEvent): number {
    if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? -1 : 1;
    return a.requestId < b.requestId ? -1 : a.requestId > b.requestId ? 1 : 0;
}

/** Serializable form of an archive; events are written in (timestamp, requestId) order. */
export function toDocument(archive: WeekArchive, generatedAt: Date = new Date()): WeeklyArchiveV1 {
    const events = [...archive.events.values()].sort(byTimeThenId);
    return {
        schema: "weekly.archive.v1",
        week: formatWeekKey(archive.week),
        generated_at: generatedAt.toISOString(),
        total_events: events.length,
        summary: summaryToDocument(archive.summary),
        events: events.map(eventToDocument),
    };
}

/** Serializes an archive, refusing documents that would not decode again. */
export function encodeArchive(archive: WeekArchive, generatedAt?: Date): string {
    const doc = toDocument(archive, generatedAt);
    try {
        validate<WeeklyArchiveV1>("weekly.archive.v1", doc);
    } catch (err) {
        throw new CorruptArchiveError(`Refusing to write invalid weekly archive: ${errorMessage(err)}`, { week: doc.week }, { cause: err });
    }
    return JSON.stringify(doc, null, 2);
}

function parseDocument(body: string): WeeklyArchiveV1 {
    try {
        const doc: unknown = JSON.parse(body);
        validate<WeeklyArchiveV1>("weekly.archive.v1", doc);
        return doc;
    } catch (err) {
        throw new CorruptArchiveError(`Unreadable weekly archive: ${errorMessage(err)}`, undefined, { cause: err });
    }
}

/**
 * Parses and validates a stored archive body. The summary is recomputed from
 * the events rather than trusted, so a hand-edited document cannot drift.
 */
export function decodeArchive(body: string, topN?: number): WeekArchive {
    const doc = parseDocument(body);
    const week = parseWeekKey(doc.week);
    if (!week) throw new CorruptArchiveError(`Invalid week key in archive: ${doc.week}`);

    const events = new Map<string, CanonicalEvent>();
    for (const e of doc.events) {
        const ev = eventFromDocument(e);
        events.set(ev.requestId, ev);
    }
    return { week, events, summary: aggregate(events.values(), topN) };
}
