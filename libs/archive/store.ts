import type { WeekArchive, WeekKey } from "./types";

export interface StoredArchive {
    archive: WeekArchive;
    /** Opaque concurrency token (an S3 ETag) of the fetched revision. */
    version: string;
}

export type PutResult =
    | { ok: true; version: string }
    | { ok: false; reason: "conflict" };

export interface ArchiveObjectInfo {
    key: string;
    week: WeekKey;
    size: number;
    lastModified?: Date;
}

/**
 * One archive object per week. Failures other than a version mismatch are
 * thrown as `StoreError`.
 */
export interface ArchiveStore {
    keyFor(week: WeekKey): string;
    get(week: WeekKey): Promise<StoredArchive | undefined>;
    /**
     * Writes only if the stored revision still matches `expectedVersion`;
     * with no expected version the write only succeeds if nothing is stored yet.
     */
    putIfVersion(archive: WeekArchive, expectedVersion: string | undefined): Promise<PutResult>;
    list(): Promise<ArchiveObjectInfo[]>;
}
