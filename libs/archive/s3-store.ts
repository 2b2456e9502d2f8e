import {
    GetObjectCommand,
    ListObjectsV2Command,
    NoSuchKey,
    PutObjectCommand,
    S3ServiceException,
    type ListObjectsV2CommandOutput,
    type S3Client,
} from "@aws-sdk/client-s3";

import { decodeArchive, encodeArchive } from "./document";
import { StoreError, errorMessage } from "./errors";
import type { ArchiveObjectInfo, ArchiveStore, PutResult, StoredArchive } from "./store";
import type { WeekArchive, WeekKey } from "./types";
import { formatWeekKey, parseWeekKey } from "./week";

const THROTTLING_CODES = new Set(["SlowDown", "Throttling", "ThrottlingException", "RequestTimeout", "RequestLimitExceeded"]);

function isVersionMismatch(err: unknown): boolean {
    if (!(err instanceof S3ServiceException)) return false;
    const status = err.$metadata.httpStatusCode;
    // 412 PreconditionFailed, 409 ConditionalRequestConflict (concurrent conditional write)
    return status === 412 || status === 409 || err.name === "PreconditionFailed";
}

export function isRetryable(err: unknown): boolean {
    if (err instanceof S3ServiceException) {
        const status = err.$metadata.httpStatusCode ?? 0;
        return err.$fault === "server" || status >= 500 || status === 429 || THROTTLING_CODES.has(err.name) || !!err.$retryable;
    }
    // no service response at all: socket resets, timeouts, DNS
    return true;
}

function toStoreError(op: string, key: string, err: unknown): StoreError {
    return new StoreError(`S3 ${op} ${key} failed: ${errorMessage(err)}`, isRetryable(err), { cause: err });
}

export interface S3ArchiveStoreOptions {
    bucket: string;
    prefix: string;
    topN?: number;
    now?: () => Date;
}

/**
 * Weekly archives as JSON objects under `<prefix><YYYY-Www>.json`, versioned
 * by ETag: updates carry `If-Match`, first writes `If-None-Match: *`.
 */
export class S3ArchiveStore implements ArchiveStore {
    constructor(private readonly s3: S3Client, private readonly opts: S3ArchiveStoreOptions) {}

    keyFor(week: WeekKey): string {
        return `${this.opts.prefix}${formatWeekKey(week)}.json`;
    }

    async get(week: WeekKey): Promise<StoredArchive | undefined> {
        const Key = this.keyFor(week);
        let body: string | undefined;
        let etag: string | undefined;
        try {
            const out = await this.s3.send(new GetObjectCommand({ Bucket: this.opts.bucket, Key }));
            body = await out.Body?.transformToString("utf-8");
            etag = out.ETag;
        } catch (err) {
            if (err instanceof NoSuchKey) return undefined;
            throw toStoreError("get", Key, err);
        }
        if (body === undefined || !etag) {
            throw new StoreError(`S3 get ${Key} returned no body or ETag`, true);
        }
        return { archive: decodeArchive(body, this.opts.topN), version: etag };
    }

    async putIfVersion(archive: WeekArchive, expectedVersion: string | undefined): Promise<PutResult> {
        const Key = this.keyFor(archive.week);
        const now = this.opts.now?.() ?? new Date();
        try {
            const out = await this.s3.send(new PutObjectCommand({
                Bucket: this.opts.bucket,
                Key,
                Body: encodeArchive(archive, now),
                ContentType: "application/json",
                Metadata: {
                    week: formatWeekKey(archive.week),
                    total_events: String(archive.events.size),
                    last_updated: now.toISOString(),
                },
                ...(expectedVersion ? { IfMatch: expectedVersion } : { IfNoneMatch: "*" }),
            }));
            return { ok: true, version: out.ETag ?? "" };
        } catch (err) {
            if (isVersionMismatch(err)) return { ok: false, reason: "conflict" };
            throw toStoreError("put", Key, err);
        }
    }

    async list(): Promise<ArchiveObjectInfo[]> {
        const items: ArchiveObjectInfo[] = [];
        let ContinuationToken: string | undefined = undefined;
        do {
            let out: ListObjectsV2CommandOutput;
            try {
                out = await this.s3.send(new ListObjectsV2Command({
                    Bucket: this.opts.bucket,
                    Prefix: this.opts.prefix,
                    ContinuationToken,
                }));
            } catch (err) {
                throw toStoreError("list", this.opts.prefix, err);
            }
            for (const o of out.Contents ?? []) {
                if (!o.Key?.endsWith(".json")) continue;
                const week = parseWeekKey(o.Key.slice(this.opts.prefix.length, -".json".length));
                if (!week) continue;
                items.push({ key: o.Key, week, size: o.Size ?? 0, lastModified: o.LastModified });
            }
            ContinuationToken = out.IsTruncated ? out.NextContinuationToken : undefined;
        } while (ContinuationToken);
        return items;
    }
}
