import type { CloudTrailRecordV1 } from "../../contracts/src/types/cloudtrail.record.v1";

export const S3_EVENT_SOURCE = "s3.amazonaws.com";
const S3_ARN_PREFIX = "arn:aws:s3:::";

/**
 * True when `identifier` names `bucket` itself or an object inside it.
 * Accepts both ARNs (`arn:aws:s3:::orders/a.json`) and bare paths (`orders/a.json`).
 */
export function identifierInBucket(identifier: string, bucket: string): boolean {
    const path = identifier.startsWith(S3_ARN_PREFIX) ? identifier.slice(S3_ARN_PREFIX.length) : identifier;
    return path === bucket || path.startsWith(`${bucket}/`);
}

/**
 * Check on a record that has not been validated yet: true when it names an
 * event source other than S3. Such records are dropped as out of scope, never
 * counted as malformed.
 */
export function isForeignSource(raw: unknown): boolean {
    return typeof raw === "object" && raw !== null && "eventSource" in raw
        && typeof raw.eventSource === "string" && raw.eventSource !== S3_EVENT_SOURCE;
}

/**
 * Does this CloudTrail record describe an operation on the monitored bucket?
 * Records from other services are rejected before any field is inspected.
 */
export function isRelevant(record: CloudTrailRecordV1, bucket: string): boolean {
    if (record.eventSource !== S3_EVENT_SOURCE) return false;

    if (record.requestParameters?.bucketName === bucket) return true;

    for (const res of record.resources ?? []) {
        const id = res.ARN ?? res.arn;
        if (id && identifierInBucket(id, bucket)) return true;
    }

    // some bucket-level calls only echo the bucket back in the response
    return record.responseElements?.bucketName === bucket;
}
