import { z } from "zod";
import { ConfigurationError } from "../archive/errors";

const configSchema = z.object({
    MONITORED_BUCKET: z.string().min(1),
    ARCHIVE_BUCKET: z.string().min(1),
    ARCHIVE_PREFIX: z.string().default("weekly-logs/"),
    LOG_GROUP_NAME: z.string().min(1).optional(),
    // startup check only: ISO weeks are the one numbering implemented
    WEEK_NUMBERING: z.literal("iso").default("iso"),
    TIMESTAMP_FALLBACK: z.enum(["current-week", "reject"]).default("current-week"),
    TOP_N: z.coerce.number().int().min(1).default(10),
    MAX_CONFLICT_RETRIES: z.coerce.number().int().min(0).default(5),
    MAX_STORE_ATTEMPTS: z.coerce.number().int().min(1).default(4),
    BACKOFF_BASE_MS: z.coerce.number().int().min(0).default(100),
    BACKOFF_MAX_MS: z.coerce.number().int().min(0).default(2000),
    DEADLINE_MARGIN_MS: z.coerce.number().int().min(0).default(5000),
});

const queryConfigSchema = configSchema.pick({ ARCHIVE_BUCKET: true, ARCHIVE_PREFIX: true, TOP_N: true });

export type Config = z.infer<typeof configSchema>;
export type QueryConfig = z.infer<typeof queryConfigSchema>;

function parseWith<T extends z.ZodTypeAny>(schema: T, env: Record<string, string | undefined>): z.infer<T> {
    const parsed = schema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new ConfigurationError(`Invalid configuration: ${issues}`, { issues: parsed.error.issues });
    }
    return parsed.data;
}

export function parseConfig(env: Record<string, string | undefined>): Config {
    return parseWith(configSchema, env);
}

/** The read-only query API only needs to know where the archives live. */
export function parseQueryConfig(env: Record<string, string | undefined>): QueryConfig {
    return parseWith(queryConfigSchema, env);
}

let config: Config | null = null;

export function getConfig(): Config {
    if (!config) {
        config = parseConfig(process.env);
    }
    return config;
}
