import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0', ''])
    .optional()
    .transform((value) => value === 'true' || value === '1');

// Zod schema for validating environment configuration
const envSchema = z.object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8000),
    HOST: z.string().min(1).default('0.0.0.0'),
    STATS_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(60),
    BULK_CREATE_LIMIT: z.coerce.number().int().min(1).default(100),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1).default(15 * 60 * 1000),
    RATE_LIMIT_MAX: z.coerce.number().int().min(0).default(0),
    DEBUG: booleanFlag
});

/**
 * Configuration options for the task tracker service
 */
export interface TaskTrackerConfig {
    port: number;
    host: string;
    /**
     * How long a computed summary is served before recomputation
     */
    statsCacheTtlSeconds: number;
    bulkCreateLimit: number;
    rateLimitWindowMs: number;
    /**
     * Requests per window per client; 0 disables rate limiting
     */
    rateLimitMax: number;
    debug: boolean;
}

export type LoadConfigResult =
    | { success: true; config: TaskTrackerConfig }
    | { success: false; error: string };

/**
 * Loads and validates configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadConfigResult {
    const validationResult = envSchema.safeParse(env);

    if (!validationResult.success) {
        const problems = validationResult.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        return {
            success: false,
            error: `Invalid configuration: ${problems}`
        };
    }

    const parsed = validationResult.data;
    return {
        success: true,
        config: {
            port: parsed.PORT,
            host: parsed.HOST,
            statsCacheTtlSeconds: parsed.STATS_CACHE_TTL_SECONDS,
            bulkCreateLimit: parsed.BULK_CREATE_LIMIT,
            rateLimitWindowMs: parsed.RATE_LIMIT_WINDOW_MS,
            rateLimitMax: parsed.RATE_LIMIT_MAX,
            debug: parsed.DEBUG
        }
    };
}
