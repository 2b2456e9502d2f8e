import { gunzipSync } from "zlib";

import { validate } from "../../contracts/src/validate";
import type { CloudTrailRecordV1 } from "../../contracts/src/types/cloudtrail.record.v1";
import { MalformedRecordError, errorMessage } from "../../archive/errors";

function isGzip(buf: Buffer): boolean {
    return buf.length >= 2 && buf[0] === 0x1f && buf[1] === 0x8b;
}

/**
 * CloudTrail delivers `{"Records": [...]}` files, gzipped on S3. Returns the
 * raw records untouched; each one is checked separately by `parseRecord`.
 */
export function parseCloudTrailLogFile(buf: Buffer): unknown[] {
    const text = (isGzip(buf) ? gunzipSync(buf) : buf).toString("utf8");
    const doc: unknown = JSON.parse(text);
    if (typeof doc !== "object" || doc === null || !("Records" in doc) || !Array.isArray(doc.Records)) {
        throw new Error("CloudTrail log file has no Records array");
    }
    return doc.Records;
}

export function parseRecord(raw: unknown): CloudTrailRecordV1 {
    try {
        validate<CloudTrailRecordV1>("cloudtrail.record.v1", raw);
        return raw;
    } catch (err) {
        throw new MalformedRecordError(errorMessage(err), undefined, { cause: err });
    }
}
