import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors.js';

dotenv.config();

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

const envSchema = z.object({
    NEO4J_URL: z.string().min(1).default('bolt://localhost:7687'),
    NEO4J_USER: z.string().min(1).default('neo4j'),
    NEO4J_PASSWORD: z.string().default(''),
    NEO4J_DATABASE: z.string().min(1).default('neo4j'),
    NEO4J_MAX_POOL_SIZE: z.coerce.number().int().positive().default(50),
    NEO4J_ACQUISITION_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    QUERY_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
    // Tuned for the demo movie catalogue.
    RECOMMEND_GENRE_WEIGHT: z.coerce.number().finite().nonnegative().default(2),
    RECOMMEND_ACTOR_WEIGHT: z.coerce.number().finite().nonnegative().default(3),
    RECOMMEND_DEFAULT_LIMIT: z.coerce.number().int().positive().default(5),
    PORT: z.coerce.number().int().min(1).max(65535).default(3001),
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
    neo4jUrl: string;
    neo4jUser: string;
    neo4jPassword: string;
    neo4jDatabase: string;
    neo4jMaxPoolSize: number;
    neo4jAcquisitionTimeoutMs: number;
    queryTimeoutMs: number;
    recommendation: {
        genreWeight: number;
        actorWeight: number;
        defaultLimit: number;
    };
    port: number;
    logLevel: LogLevel;
}

/**
 * Builds the application config from an environment map.
 * Empty strings count as unset so a blank line in `.env` falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
    );
    const parsed = envSchema.safeParse(present);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid environment configuration: ${problems}`);
    }

    const values = parsed.data;
    return {
        neo4jUrl: values.NEO4J_URL,
        neo4jUser: values.NEO4J_USER,
        neo4jPassword: values.NEO4J_PASSWORD,
        neo4jDatabase: values.NEO4J_DATABASE,
        neo4jMaxPoolSize: values.NEO4J_MAX_POOL_SIZE,
        neo4jAcquisitionTimeoutMs: values.NEO4J_ACQUISITION_TIMEOUT_MS,
        queryTimeoutMs: values.QUERY_TIMEOUT_MS,
        recommendation: {
            genreWeight: values.RECOMMEND_GENRE_WEIGHT,
            actorWeight: values.RECOMMEND_ACTOR_WEIGHT,
            defaultLimit: values.RECOMMEND_DEFAULT_LIMIT,
        },
        port: values.PORT,
        logLevel: values.LOG_LEVEL,
    };
}

const config = loadConfig();

export default config;
