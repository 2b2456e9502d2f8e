import { GetObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { Context, S3Event } from "aws-lambda";

import { parseCloudTrailLogFile } from "../../libs/adapters/cloudtrail/log-file";
import { mergeBatch, prepareBatch, type BatchReport } from "../../libs/archive/batch";
import { errorMessage } from "../../libs/archive/errors";
import { S3ArchiveStore } from "../../libs/archive/s3-store";
import type { ArchiveStore } from "../../libs/archive/store";
import { getConfig, type Config } from "../../libs/config/config";
import { shipAccessLogs } from "../../libs/obs/access-log";
import { metricCount, metricCounts, metricMs } from "../../libs/obs/metrics";

/** The part of an S3 notification this handler reads. */
export interface LogFileNotification {
    Records: Array<{ s3: { bucket: { name: string }; object: { key: string } } }>;
}

export interface ArchiverDeps {
    config: Config;
    s3: S3Client;
    store?: ArchiveStore;
    ship?: typeof shipAccessLogs;
}

export interface ArchiveRunResult {
    logFiles: string[];
    unreadable: string[];
    report: BatchReport;
}

/** Thrown so the platform redelivers the notification; re-merging is idempotent. */
export class BatchIncompleteError extends Error {
    constructor(readonly result: ArchiveRunResult) {
        const { report, unreadable } = result;
        super(
            `Archive run incomplete: ${report.failures.length} failed week(s), ` +
            `${report.notAttempted.length} not attempted, ${unreadable.length} unreadable log file(s)`,
        );
        this.name = "BatchIncompleteError";
    }
}

// keys arrive URL-encoded, with '+' for spaces
export function decodeS3Key(key: string): string {
    return decodeURIComponent(key.replace(/\+/g, " "));
}

async function getS3Body(s3: S3Client, bucket: string, key: string): Promise<Buffer> {
    const out = await s3.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
    const bytes = await out.Body?.transformToByteArray();
    if (!bytes) throw new Error(`Empty body for s3://${bucket}/${key}`);
    return Buffer.from(bytes);
}

export function createArchiver(deps: ArchiverDeps) {
    const { config, s3 } = deps;
    const store = deps.store ?? new S3ArchiveStore(s3, {
        bucket: config.ARCHIVE_BUCKET,
        prefix: config.ARCHIVE_PREFIX,
        topN: config.TOP_N,
    });
    const ship = deps.ship ?? shipAccessLogs;

    return async (event: LogFileNotification, context: Pick<Context, "getRemainingTimeInMillis">): Promise<ArchiveRunResult> => {
        const t0 = Date.now();
        const records: unknown[] = [];
        const logFiles: string[] = [];
        const unreadable: string[] = [];

        await Promise.all(event.Records.map(async (rec) => {
            const bucket = rec.s3.bucket.name;
            const key = decodeS3Key(rec.s3.object.key);
            const uri = `s3://${bucket}/${key}`;
            try {
                const found = parseCloudTrailLogFile(await getS3Body(s3, bucket, key));
                console.log("processing-log-file", uri, found.length);
                for (const r of found) records.push(r);
                logFiles.push(uri);
            } catch (err) {
                console.error("log-file-unreadable", uri, errorMessage(err));
                unreadable.push(uri);
            }
        }));

        const prepared = prepareBatch(records, {
            monitoredBucket: config.MONITORED_BUCKET,
            timestampFallback: config.TIMESTAMP_FALLBACK,
        });
        const deadline = t0 + context.getRemainingTimeInMillis() - config.DEADLINE_MARGIN_MS;

        const [report] = await Promise.all([
            mergeBatch(prepared, {
                store,
                deadline,
                topN: config.TOP_N,
                maxConflictRetries: config.MAX_CONFLICT_RETRIES,
                maxStoreAttempts: config.MAX_STORE_ATTEMPTS,
                baseDelayMs: config.BACKOFF_BASE_MS,
                maxDelayMs: config.BACKOFF_MAX_MS,
            }),
            ship(prepared.events, { logGroupName: config.LOG_GROUP_NAME }),
        ]);

        console.log("archive-report", JSON.stringify(report));
        await metricCounts({
            records_received_count: report.received,
            records_malformed_count: report.malformed,
            records_filtered_count: report.filtered,
            events_merged_count: report.merged,
            events_duplicate_count: report.duplicates,
            week_failure_count: report.failures.length + report.notAttempted.length,
        }, { service: "archiver" });
        await metricMs("archive_batch_time_ms", Date.now() - t0, { service: "archiver" });

        const result = { logFiles, unreadable, report };
        if (unreadable.length > 0 || report.failures.length > 0 || report.notAttempted.length > 0) {
            throw new BatchIncompleteError(result);
        }
        return result;
    };
}

let archiver: ReturnType<typeof createArchiver> | undefined;

export async function main(event: S3Event, context: Context) {
    try {
        if (!archiver) archiver = createArchiver({ config: getConfig(), s3: new S3Client({}) });
        return await archiver(event, context);
    } catch (err) {
        await metricCount("archiver_error_count", 1, { service: "archiver" });
        console.error("Archiver error", err);
        throw err;
    }
}
