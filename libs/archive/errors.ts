export type FailureKind =
    | "MalformedRecord"
    | "MergeConflict"
    | "StoreUnavailable"
    | "CorruptArchive"
    | "ConfigurationError";

export abstract class ArchiveError extends Error {
    abstract readonly kind: FailureKind;

    constructor(message: string, readonly details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/** A raw record that cannot be minimally parsed. Skipped, never fatal for the batch. */
export class MalformedRecordError extends ArchiveError {
    readonly kind = "MalformedRecord" as const;
}

/** Conditional-write retries for one week were exhausted. */
export class MergeConflictError extends ArchiveError {
    readonly kind = "MergeConflict" as const;
}

/** The archive store kept failing after the retry budget, or failed permanently. */
export class StoreUnavailableError extends ArchiveError {
    readonly kind = "StoreUnavailable" as const;
}

/** A stored archive document that does not decode. It is left untouched. */
export class CorruptArchiveError extends ArchiveError {
    readonly kind = "CorruptArchive" as const;
}

export class ConfigurationError extends ArchiveError {
    readonly kind = "ConfigurationError" as const;
}

/**
 * Thrown by store adapters. `retryable` marks throttling, timeouts and 5xx
 * responses; everything else is surfaced without retry.
 */
export class StoreError extends Error {
    constructor(message: string, readonly retryable: boolean, options?: { cause?: unknown }) {
        super(message, options);
        this.name = "StoreError";
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
