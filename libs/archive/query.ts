import type { ArchiveObjectInfo, ArchiveStore } from "./store";
import type { Summary, WeekArchive, WeekKey } from "./types";
import { compareWeekKeys } from "./week";

export async function listWeeks(store: ArchiveStore): Promise<ArchiveObjectInfo[]> {
    const items = await store.list();
    return items.sort((a, b) => compareWeekKeys(a.week, b.week));
}

export async function getWeek(store: ArchiveStore, week: WeekKey): Promise<WeekArchive | undefined> {
    return (await store.get(week))?.archive;
}

export async function getWeekSummary(store: ArchiveStore, week: WeekKey): Promise<Summary | undefined> {
    return (await getWeek(store, week))?.summary;
}

/** Most recently modified archive; equal timestamps resolve to the later week. */
export async function getMostRecentWeek(store: ArchiveStore): Promise<WeekArchive | undefined> {
    const items = await store.list();
    if (items.length === 0) return undefined;
    const latest = items.reduce((best, cur) => {
        const diff = (cur.lastModified?.getTime() ?? 0) - (best.lastModified?.getTime() ?? 0);
        return diff > 0 || (diff === 0 && compareWeekKeys(cur.week, best.week) > 0) ? cur : best;
    });
    return getWeek(store, latest.week);
}
