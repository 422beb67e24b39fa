import 'dotenv/config';
import { z } from 'zod';

// This module is responsible for loading and validating environment variables.
// It will throw an error and prevent the app from starting if a value is malformed.

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    CLICK_RATE_PER_SECOND: z.coerce.number().positive().default(10),
    LEADERBOARD_SIZE: z.coerce.number().int().positive().default(10),
    CORS_ORIGIN: z.string().min(1).default('*'),
    LOG_FORMAT: z.enum(['combined', 'dev', 'tiny', 'none']).default('combined'),
    ADMIN_KEY: z.string().min(1).optional(),
});

export type LogFormat = z.infer<typeof envSchema>['LOG_FORMAT'];

export interface AppConfig {
    readonly port: number;
    /** Clicks a player may submit per second elapsed since their last reconciliation. */
    readonly clickRatePerSecond: number;
    readonly leaderboardSize: number;
    readonly corsOrigin: string;
    readonly logFormat: LogFormat;
    readonly adminKey?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid environment configuration: ${issues}`);
    }
    const values = parsed.data;
    return {
        port: values.PORT,
        clickRatePerSecond: values.CLICK_RATE_PER_SECOND,
        leaderboardSize: values.LEADERBOARD_SIZE,
        corsOrigin: values.CORS_ORIGIN,
        logFormat: values.LOG_FORMAT,
        adminKey: values.ADMIN_KEY,
    };
}
