export type OperationCategory = "READ" | "WRITE" | "DELETE" | "OTHER";

export interface CanonicalEvent {
    readonly requestId: string;
    readonly timestamp: string;
    readonly operationCategory: OperationCategory;
    readonly rawEventName: string;
    readonly actor: {
        readonly type: string;
        readonly name: string;
        readonly sourceIp: string;
        readonly userAgent: string;
    };
    readonly target: {
        readonly resourceName: string;
        readonly objectKey: string;
        readonly referencedArns: readonly string[];
    };
    readonly region: string;
    readonly errorCode?: string;
    readonly errorMessage?: string;
}

export interface WeekKey {
    readonly year: number;
    readonly week: number;
}

export interface Summary {
    totalEvents: number;
    errorCount: number;
    operationCounts: Record<OperationCategory, number>;
    /** Top-N entries, highest count first; ties in ascending key order. */
    topOperations: Array<[string, number]>;
    topUsers: Array<[string, number]>;
    topSourceIps: Array<[string, number]>;
    uniqueUsers: number;
    uniqueIps: number;
}

export interface WeekArchive {
    week: WeekKey;
    events: ReadonlyMap<string, CanonicalEvent>;
    summary: Summary;
}
