import { createQueryHandler } from "./handler";
import { normalize } from "../../../libs/adapters/cloudtrail/normalize";
import { aggregate } from "../../../libs/archive/summary";
import { InMemoryArchiveStore } from "../../../libs/archive/testing/in-memory-store";
import { s3Record } from "../../../libs/archive/testing/records";
import type { WeekKey } from "../../../libs/archive/types";

const clock = { now: new Date("2024-06-14T00:00:00Z") };

async function seed(store: InMemoryArchiveStore, week: WeekKey, ...ids: string[]) {
    const events = ids.map(id => normalize(s3Record(id)));
    const res = await store.putIfVersion({
        week,
        events: new Map(events.map(ev => [ev.requestId, ev])),
        summary: aggregate(events),
    }, undefined);
    expect(res.ok).toBe(true);
}

async function setup() {
    const store = new InMemoryArchiveStore(() => clock.now);
    clock.now = new Date("2024-06-21T00:00:00Z");
    await seed(store, { year: 2024, week: 25 }, "r3");
    clock.now = new Date("2024-06-14T00:00:00Z");
    await seed(store, { year: 2024, week: 24 }, "r1", "r2");
    return createQueryHandler(store);
}

function call(query: ReturnType<typeof createQueryHandler>, qs: Record<string, string> | null) {
    return query({ queryStringParameters: qs }).then(res => ({ status: res.statusCode, body: JSON.parse(res.body) }));
}

test("list returns archives in week order", async () => {
    const query = await setup();
    const { status, body } = await call(query, null);
    expect(status).toBe(200);
    expect(body.count).toBe(2);
    expect(body.items.map((i: { week: string }) => i.week)).toEqual(["2024-W24", "2024-W25"]);
    expect(body.items[0]).toMatchObject({ key: "weekly-logs/2024-W24.json", lastModified: "2024-06-14T00:00:00.000Z" });
});

test("week returns the summary and ordered events", async () => {
    const query = await setup();
    const { status, body } = await call(query, { op: "week", week: "2024-W24" });
    expect(status).toBe(200);
    expect(body.week).toBe("2024-W24");
    expect(body.total_events).toBe(2);
    expect(body.events.map((e: { how: { request_id: string } }) => e.how.request_id)).toEqual(["r1", "r2"]);
    expect(body.summary.top_users).toEqual({ alice: 2 });
});

test("summary returns only the rollup", async () => {
    const query = await setup();
    const { status, body } = await call(query, { op: "summary", week: "2024-W25" });
    expect(status).toBe(200);
    expect(body).toEqual({
        ok: true,
        week: "2024-W25",
        summary: {
            total_events: 1,
            error_count: 0,
            operation_counts: { READ: 1, WRITE: 0, DELETE: 0, OTHER: 0 },
            top_operations: { READ: 1 },
            top_users: { alice: 1 },
            top_source_ips: { "10.0.0.1": 1 },
            unique_users: 1,
            unique_ips: 1,
        },
    });
});

test("recent returns the most recently modified archive", async () => {
    const query = await setup();
    const { status, body } = await call(query, { op: "recent" });
    expect(status).toBe(200);
    expect(body.week).toBe("2024-W25");
});

test("unknown weeks are 404 and malformed ones 400", async () => {
    const query = await setup();
    expect((await call(query, { op: "week", week: "2023-W10" })).status).toBe(404);
    expect((await call(query, { op: "summary", week: "2024-W60" })).status).toBe(400);
    expect((await call(query, { op: "week" })).status).toBe(400);
    expect((await call(query, { op: "delete" })).status).toBe(400);
});

test("recent on an empty store is 404", async () => {
    const query = createQueryHandler(new InMemoryArchiveStore());
    expect((await call(query, { op: "recent" })).status).toBe(404);
});

test("a corrupt archive is a 500", async () => {
    const store = new InMemoryArchiveStore();
    store.putRaw({ year: 2024, week: 24 }, "{ not json");
    const { status, body } = await call(createQueryHandler(store), { op: "week", week: "2024-W24" });
    expect(status).toBe(500);
    expect(body.ok).toBe(false);
});
