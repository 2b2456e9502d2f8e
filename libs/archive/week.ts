import type { WeekKey } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;
const WEEK_KEY_RE = /^(\d{4})-W(\d{2})$/;
const MIN_YEAR = 1;
const MAX_YEAR = 9999;

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not.
function utcDay(year: number, month: number, day: number): Date {
    const d = new Date(0);
    d.setUTCFullYear(year, month, day);
    return d;
}

/**
 * ISO 8601 week of an instant. Weeks start Monday 00:00 UTC and week 1 is the
 * week holding the year's first Thursday, so early-January days can belong to
 * the previous ISO year and late-December days to the next one.
 */
export function isoWeekOf(instant: Date): WeekKey {
    const d = utcDay(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate());
    const dayNr = (d.getUTCDay() + 6) % 7; // Monday = 0
    d.setUTCDate(d.getUTCDate() - dayNr + 3); // Thursday of the same week
    const year = d.getUTCFullYear();
    const jan4 = utcDay(year, 0, 4);
    const jan4DayNr = (jan4.getUTCDay() + 6) % 7;
    const week = 1 + Math.round(((d.getTime() - jan4.getTime()) / DAY_MS - 3 + jan4DayNr) / 7);
    return { year, week };
}

/** Instants outside years 1-9999 have no four-digit week key and count as unparsable. */
export function parseTimestamp(timestamp: string | undefined): Date | undefined {
    if (!timestamp) return undefined;
    const ms = Date.parse(timestamp);
    if (Number.isNaN(ms)) return undefined;
    const instant = new Date(ms);
    const year = instant.getUTCFullYear();
    return year < MIN_YEAR || year > MAX_YEAR ? undefined : instant;
}

/**
 * Week partition for an event timestamp. Absent or unparsable timestamps fall
 * back to the week of `now()`.
 */
export function weekKey(timestamp: string | undefined, now: () => Date = () => new Date()): WeekKey {
    return isoWeekOf(parseTimestamp(timestamp) ?? now());
}

export function formatWeekKey(key: WeekKey): string {
    return `${String(key.year).padStart(4, "0")}-W${String(key.week).padStart(2, "0")}`;
}

export function parseWeekKey(text: string): WeekKey | undefined {
    const m = WEEK_KEY_RE.exec(text);
    if (!m) return undefined;
    const key = { year: Number(m[1]), week: Number(m[2]) };
    if (key.year < MIN_YEAR || key.week < 1 || key.week > weeksInIsoYear(key.year)) return undefined;
    return key;
}

export function compareWeekKeys(a: WeekKey, b: WeekKey): number {
    return a.year - b.year || a.week - b.week;
}

// Dec 28 always falls in the last ISO week of its year.
function weeksInIsoYear(year: number): number {
    return isoWeekOf(utcDay(year, 11, 28)).week;
}
