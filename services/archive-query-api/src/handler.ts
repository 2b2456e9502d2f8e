import { S3Client } from "@aws-sdk/client-s3";
import type { APIGatewayProxyEvent, APIGatewayProxyResult } from "aws-lambda";

import { summaryToDocument, toDocument } from "../../../libs/archive/document";
import { errorMessage } from "../../../libs/archive/errors";
import { getMostRecentWeek, getWeek, getWeekSummary, listWeeks } from "../../../libs/archive/query";
import { S3ArchiveStore } from "../../../libs/archive/s3-store";
import type { ArchiveStore } from "../../../libs/archive/store";
import type { WeekArchive } from "../../../libs/archive/types";
import { formatWeekKey, parseWeekKey } from "../../../libs/archive/week";
import { parseQueryConfig } from "../../../libs/config/config";

const OPS = ["list", "week", "summary", "recent"] as const;
type QueryOp = (typeof OPS)[number];

function isQueryOp(v: string): v is QueryOp {
    return OPS.some(op => op === v);
}

function json(statusCode: number, body: Record<string, unknown>): APIGatewayProxyResult {
    return { statusCode, headers: { "content-type": "application/json" }, body: JSON.stringify(body) };
}

function archiveBody(archive: WeekArchive) {
    const doc = toDocument(archive);
    return { week: doc.week, total_events: doc.total_events, summary: doc.summary, events: doc.events };
}

export function createQueryHandler(store: ArchiveStore) {
    return async (event: Pick<APIGatewayProxyEvent, "queryStringParameters">): Promise<APIGatewayProxyResult> => {
        const qs = event.queryStringParameters ?? {};
        const op = qs.op ?? "list";
        if (!isQueryOp(op)) {
            return json(400, { ok: false, error: `Unknown op "${op}"; expected one of ${OPS.join(", ")}` });
        }

        try {
            if (op === "list") {
                const items = await listWeeks(store);
                return json(200, {
                    ok: true,
                    count: items.length,
                    items: items.map(i => ({
                        week: formatWeekKey(i.week),
                        key: i.key,
                        size: i.size,
                        lastModified: i.lastModified?.toISOString(),
                    })),
                });
            }

            if (op === "recent") {
                const archive = await getMostRecentWeek(store);
                if (!archive) return json(404, { ok: false, error: "No archives yet" });
                return json(200, { ok: true, ...archiveBody(archive) });
            }

            const week = parseWeekKey(qs.week ?? "");
            if (!week) return json(400, { ok: false, error: "Missing or invalid week (YYYY-Www)" });

            if (op === "summary") {
                const summary = await getWeekSummary(store, week);
                if (!summary) return json(404, { ok: false, error: `No archive for ${formatWeekKey(week)}` });
                return json(200, { ok: true, week: formatWeekKey(week), summary: summaryToDocument(summary) });
            }

            const archive = await getWeek(store, week);
            if (!archive) return json(404, { ok: false, error: `No archive for ${formatWeekKey(week)}` });
            return json(200, { ok: true, ...archiveBody(archive) });
        } catch (err) {
            console.error("archive-query-failed", op, errorMessage(err));
            return json(500, { ok: false, error: errorMessage(err) });
        }
    };
}

let query: ReturnType<typeof createQueryHandler> | undefined;

export const handler = async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    try {
        if (!query) {
            const config = parseQueryConfig(process.env);
            query = createQueryHandler(new S3ArchiveStore(new S3Client({}), {
                bucket: config.ARCHIVE_BUCKET,
                prefix: config.ARCHIVE_PREFIX,
                topN: config.TOP_N,
            }));
        }
        return await query(event);
    } catch (err) {
        return json(500, { ok: false, error: errorMessage(err) });
    }
};
