import { parseConfig, parseQueryConfig } from "./config";
import { ConfigurationError } from "../archive/errors";

test("applies defaults around the two required buckets", () => {
    const cfg = parseConfig({ MONITORED_BUCKET: "orders", ARCHIVE_BUCKET: "orders-weekly" });
    expect(cfg.ARCHIVE_PREFIX).toBe("weekly-logs/");
    expect(cfg.WEEK_NUMBERING).toBe("iso");
    expect(cfg.TIMESTAMP_FALLBACK).toBe("current-week");
    expect(cfg.TOP_N).toBe(10);
    expect(cfg.MAX_CONFLICT_RETRIES).toBe(5);
    expect(cfg.LOG_GROUP_NAME).toBeUndefined();
});

test("coerces numeric settings from strings", () => {
    const cfg = parseConfig({ MONITORED_BUCKET: "orders", ARCHIVE_BUCKET: "a", TOP_N: "3", MAX_STORE_ATTEMPTS: "2" });
    expect(cfg.TOP_N).toBe(3);
    expect(cfg.MAX_STORE_ATTEMPTS).toBe(2);
});

test("missing monitored bucket is a configuration error", () => {
    expect(() => parseConfig({ ARCHIVE_BUCKET: "a" })).toThrow(ConfigurationError);
});

test("only ISO week numbering is accepted", () => {
    expect(() => parseConfig({ MONITORED_BUCKET: "orders", ARCHIVE_BUCKET: "a", WEEK_NUMBERING: "us" }))
        .toThrow(/WEEK_NUMBERING/);
});

test("query config needs only the archive bucket", () => {
    expect(parseQueryConfig({ ARCHIVE_BUCKET: "orders-weekly" })).toEqual({
        ARCHIVE_BUCKET: "orders-weekly",
        ARCHIVE_PREFIX: "weekly-logs/",
        TOP_N: 10,
    });
    expect(() => parseQueryConfig({})).toThrow(ConfigurationError);
});
