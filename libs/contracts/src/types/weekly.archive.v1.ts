export type OperationName = "READ" | "WRITE" | "DELETE" | "OTHER";

export interface ArchivedEventV1 {
    timestamp: string;
    operation: OperationName;
    event_name: string;
    who: { user_type: string; user_name: string; source_ip: string };
    what: { resources: string[]; bucket: string; key: string };
    how: { user_agent: string; request_id: string; aws_region: string };
    response: { error_code: string; error_message: string };
}

export interface WeeklySummaryV1 {
    total_events: number;
    error_count: number;
    operation_counts: Record<string, number>;
    top_operations: Record<string, number>;
    top_users: Record<string, number>;
    top_source_ips: Record<string, number>;
    unique_users: number;
    unique_ips: number;
}

export interface WeeklyArchiveV1 {
    schema: "weekly.archive.v1";
    week: string; // YYYY-Www
    generated_at: string;
    total_events: number;
    summary: WeeklySummaryV1;
    events: ArchivedEventV1[];
}
