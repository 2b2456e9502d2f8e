import { decodeArchive, encodeArchive, toDocument } from "./document";
import { CorruptArchiveError } from "./errors";
import { aggregate } from "./summary";
import type { CanonicalEvent, WeekArchive } from "./types";
import { normalize } from "../adapters/cloudtrail/normalize";
import { s3Record } from "./testing/records";

const generatedAt = new Date("2024-06-14T00:00:00Z");

function archiveOf(events: CanonicalEvent[]): WeekArchive {
    const map = new Map(events.map(e => [e.requestId, e] as const));
    return { week: { year: 2024, week: 24 }, events: map, summary: aggregate(map.values()) };
}

test("persisted layout groups each event into who/what/how/response", () => {
    const ev = normalize(s3Record("r1", { errorCode: "AccessDenied", errorMessage: "Access Denied" }));
    const doc = toDocument(archiveOf([ev]), generatedAt);

    expect(doc.schema).toBe("weekly.archive.v1");
    expect(doc.week).toBe("2024-W24");
    expect(doc.generated_at).toBe("2024-06-14T00:00:00.000Z");
    expect(doc.total_events).toBe(1);
    expect(doc.events[0]).toEqual({
        timestamp: "2024-06-12T10:00:00Z",
        operation: "READ",
        event_name: "GetObject",
        who: { user_type: "IAMUser", user_name: "alice", source_ip: "10.0.0.1" },
        what: { resources: ["arn:aws:s3:::orders/data/r1.json"], bucket: "orders", key: "data/r1.json" },
        how: { user_agent: "aws-sdk-js/3", request_id: "r1", aws_region: "eu-west-1" },
        response: { error_code: "AccessDenied", error_message: "Access Denied" },
    });
    expect(doc.summary).toEqual({
        total_events: 1,
        error_count: 1,
        operation_counts: { READ: 1, WRITE: 0, DELETE: 0, OTHER: 0 },
        top_operations: { READ: 1 },
        top_users: { alice: 1 },
        top_source_ips: { "10.0.0.1": 1 },
        unique_users: 1,
        unique_ips: 1,
    });
});

test("events are written in timestamp then request id order", () => {
    const late = normalize(s3Record("a", { eventTime: "2024-06-13T00:00:00Z" }));
    const early2 = normalize(s3Record("c"));
    const early1 = normalize(s3Record("b"));
    const doc = toDocument(archiveOf([late, early2, early1]), generatedAt);
    expect(doc.events.map(e => e.how.request_id)).toEqual(["b", "c", "a"]);
});

test("decoding restores events and recomputes the summary", () => {
    const events = [normalize(s3Record("r1")), normalize(s3Record("r2", { eventName: "DeleteObject" }))];
    const decoded = decodeArchive(encodeArchive(archiveOf(events), generatedAt));
    expect(decoded.week).toEqual({ year: 2024, week: 24 });
    expect([...decoded.events.keys()]).toEqual(["r1", "r2"]);
    expect(decoded.events.get("r2")).toEqual(events[1]);
    expect(decoded.summary).toEqual(aggregate(events));
});

test("a stale stored summary is not trusted", () => {
    const doc = toDocument(archiveOf([normalize(s3Record("r1"))]), generatedAt);
    doc.summary.total_events = 99;
    expect(decodeArchive(JSON.stringify(doc)).summary.totalEvents).toBe(1);
});

test("invalid documents are corrupt archives", () => {
    expect(() => decodeArchive("{not json")).toThrow(CorruptArchiveError);
    expect(() => decodeArchive(JSON.stringify({ schema: "weekly.archive.v1", week: "2024-W24" }))).toThrow(CorruptArchiveError);

    const doc = toDocument(archiveOf([]), generatedAt);
    expect(() => decodeArchive(JSON.stringify({ ...doc, week: "2021-W53" }))).toThrow("Invalid week key in archive: 2021-W53");
});

test("documents that would not decode are never encoded", () => {
    const archive = { ...archiveOf([normalize(s3Record("r1"))]), week: { year: 10000, week: 1 } };
    expect(() => encodeArchive(archive, generatedAt)).toThrow(CorruptArchiveError);
    expect(() => encodeArchive(archive, generatedAt)).toThrow("Refusing to write invalid weekly archive");
});
