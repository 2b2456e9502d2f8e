import {
    CloudWatchLogsClient,
    CreateLogStreamCommand,
    PutLogEventsCommand,
    ResourceAlreadyExistsException,
} from "@aws-sdk/client-cloudwatch-logs";

import { eventToDocument } from "../archive/document";
import { errorMessage } from "../archive/errors";
import type { CanonicalEvent } from "../archive/types";

const defaultClient = new CloudWatchLogsClient({});

// PutLogEvents takes at most 10,000 events / 1 MB per call
const CHUNK = 500;

export function accessLogStreamName(at: Date): string {
    return `${at.toISOString().slice(0, 10).replace(/-/g, "/")}/s3-access`; // YYYY/MM/DD/s3-access
}

export function formatAccessLogLine(ev: CanonicalEvent): string {
    return JSON.stringify(eventToDocument(ev));
}

export interface ShipOptions {
    logGroupName?: string;
    client?: CloudWatchLogsClient;
    now?: Date;
}

/**
 * Best effort: writes one compact JSON line per event to the day's stream.
 * Failures are logged and never fail the archive run.
 */
export async function shipAccessLogs(events: readonly CanonicalEvent[], opts: ShipOptions): Promise<number> {
    const { logGroupName } = opts;
    if (!logGroupName || events.length === 0) return 0;

    const client = opts.client ?? defaultClient;
    const now = opts.now ?? new Date();
    const logStreamName = accessLogStreamName(now);

    try {
        try {
            await client.send(new CreateLogStreamCommand({ logGroupName, logStreamName }));
        } catch (e) {
            if (!(e instanceof ResourceAlreadyExistsException)) throw e;
        }

        let shipped = 0;
        for (let i = 0; i < events.length; i += CHUNK) {
            const chunk = events.slice(i, i + CHUNK);
            await client.send(new PutLogEventsCommand({
                logGroupName,
                logStreamName,
                logEvents: chunk.map(ev => ({ timestamp: now.getTime(), message: formatAccessLogLine(ev) })),
            }));
            shipped += chunk.length;
        }
        return shipped;
    } catch (e) {
        console.warn("access-log-failed", logGroupName, errorMessage(e));
        return 0;
    }
}
