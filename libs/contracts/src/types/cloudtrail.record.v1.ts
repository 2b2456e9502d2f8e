/** A CloudTrail record that passed the `cloudtrail.record.v1` contract. */
export interface CloudTrailRecordV1 {
    eventVersion?: string;
    eventSource?: string;
    eventName: string;
    eventTime?: string;
    awsRegion?: string;
    sourceIPAddress?: string;
    userAgent?: string;
    requestID: string;
    eventID?: string;
    errorCode?: string;
    errorMessage?: string;
    userIdentity?: {
        type?: string;
        userName?: string;
        principalId?: string;
        arn?: string;
        accountId?: string;
    };
    requestParameters?: { bucketName?: string; key?: string; [k: string]: unknown } | null;
    responseElements?: { bucketName?: string; [k: string]: unknown } | null;
    resources?: Array<{ ARN?: string; arn?: string; type?: string; accountId?: string }>;
}
