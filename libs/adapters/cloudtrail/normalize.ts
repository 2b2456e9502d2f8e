import type { CloudTrailRecordV1 } from "../../contracts/src/types/cloudtrail.record.v1";
import type { CanonicalEvent, OperationCategory } from "../../archive/types";
import operations from "./operations.json";

const CATEGORY_BY_EVENT = new Map<string, OperationCategory>();
for (const category of ["READ", "WRITE", "DELETE"] as const) {
    for (const name of operations[category]) CATEGORY_BY_EVENT.set(name, category);
}

export function classify(eventName: string): OperationCategory {
    return CATEGORY_BY_EVENT.get(eventName) ?? "OTHER";
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
    return values.find((v): v is string => typeof v === "string" && v.length > 0);
}

/**
 * CloudTrail record -> CanonicalEvent. Total over contract-valid records:
 * missing fields map to "Unknown" (actor) or "" and empty error fields mean success.
 */
export function normalize(record: CloudTrailRecordV1): CanonicalEvent {
    const who: NonNullable<CloudTrailRecordV1["userIdentity"]> = record.userIdentity ?? {};
    const arns = (record.resources ?? [])
        .map(r => r.ARN ?? r.arn)
        .filter((a): a is string => !!a);

    const errorCode = firstNonEmpty(record.errorCode);
    const errorMessage = firstNonEmpty(record.errorMessage);

    return Object.freeze({
        requestId: record.requestID,
        timestamp: record.eventTime ?? "",
        operationCategory: classify(record.eventName),
        rawEventName: record.eventName,
        actor: Object.freeze({
            type: firstNonEmpty(who.type) ?? "Unknown",
            name: firstNonEmpty(who.userName, who.principalId, who.arn) ?? "Unknown",
            sourceIp: record.sourceIPAddress ?? "",
            userAgent: record.userAgent ?? "",
        }),
        target: Object.freeze({
            resourceName: firstNonEmpty(record.requestParameters?.bucketName, record.responseElements?.bucketName) ?? "",
            objectKey: record.requestParameters?.key ?? "",
            referencedArns: Object.freeze([...new Set(arns)].sort()),
        }),
        region: record.awsRegion ?? "",
        ...(errorCode ? { errorCode } : {}),
        ...(errorMessage ? { errorMessage } : {}),
    });
}
