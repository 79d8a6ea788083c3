import { auth, driver as createDriver } from 'neo4j-driver';
import type { Driver, ManagedTransaction } from 'neo4j-driver';
import config from '../config/index.js';
import { createContextLogger } from '../utils/logger.js';
import {
    Neo4jError,
    QueryTimeoutError,
    RecommenderError,
    StoreUnavailableError,
    errorMessage,
} from '../utils/errors.js';

const logger = createContextLogger('Neo4jClient');

export type AccessMode = 'READ' | 'WRITE';

/** One result row: variable name to node property or scalar. */
export type GraphRow = Record<string, unknown>;

export interface Neo4jClientOptions {
    uri?: string;
    username?: string;
    password?: string;
    database?: string;
}

export interface TransactionOptions {
    timeoutMs?: number;
}

const UNAVAILABLE_CODES = new Set([
    'ServiceUnavailable',
    'SessionExpired',
    'Neo.ClientError.Security.Unauthorized',
    'Neo.ClientError.Security.AuthenticationRateLimit',
    'Neo.ClientError.Database.DatabaseNotFound',
    'Neo.TransientError.General.DatabaseUnavailable',
]);

const TIMEOUT_CODES = new Set([
    'Neo.ClientError.Transaction.TransactionTimedOut',
    'Neo.ClientError.Transaction.TransactionTimedOutClientConfiguration',
]);

function errorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Translates a driver failure into the recommender's error kinds.
 */
export function mapNeo4jError(error: unknown, context: string): RecommenderError {
    if (error instanceof RecommenderError) {
        return error;
    }
    const code = errorCode(error);
    const message = `[${context}] ${errorMessage(error)}`;
    const options = { originalError: error, context: { code } };

    if (code !== undefined && UNAVAILABLE_CODES.has(code)) {
        return new StoreUnavailableError(message, options);
    }
    if (code !== undefined && TIMEOUT_CODES.has(code)) {
        return new QueryTimeoutError(message, options);
    }
    return new Neo4jError(message, options);
}

/**
 * Rejects with a QueryTimeoutError when `work` has not settled within `timeoutMs`.
 */
export function withDeadline<T>(work: Promise<T>, timeoutMs: number | undefined, context: string): Promise<T> {
    if (timeoutMs === undefined) {
        return work;
    }
    return new Promise<T>((resolve, reject) => {
        const timer = setTimeout(() => {
            reject(new QueryTimeoutError(`[${context}] Neo4j did not respond within ${timeoutMs}ms`, {
                context: { timeoutMs },
            }));
        }, timeoutMs);
        work.then(
            value => {
                clearTimeout(timer);
                resolve(value);
            },
            (error: unknown) => {
                clearTimeout(timer);
                reject(error);
            },
        );
    });
}

/**
 * Owns the neo4j-driver instance and its connection pool.
 *
 * Each call to `runTransaction` borrows one session from the pool and returns it
 * before settling. A timed-out session is released without waiting on the server.
 */
export class Neo4jClient {
    private driver: Driver | null = null;
    private connecting: Promise<void> | null = null;
    private readonly uri: string;
    private readonly username: string;
    private readonly password: string;
    public readonly database: string;

    constructor(options: Neo4jClientOptions = {}) {
        this.uri = options.uri ?? config.neo4jUrl;
        this.username = options.username ?? config.neo4jUser;
        this.password = options.password ?? config.neo4jPassword;
        this.database = options.database ?? config.neo4jDatabase;
    }

    get url(): string {
        return this.uri;
    }

    /**
     * Creates the driver and verifies connectivity. Safe to call more than once,
     * including concurrently; callers share a connection attempt in flight.
     * A failed attempt leaves the client unconnected so the next call retries.
     * @param context - Caller label used in log lines
     */
    async initializeDriver(context: string): Promise<void> {
        if (this.driver) {
            return;
        }
        if (!this.connecting) {
            this.connecting = this.connect(context).finally(() => {
                this.connecting = null;
            });
        }
        await this.connecting;
    }

    private async connect(context: string): Promise<void> {
        logger.info(`[${context}] Connecting to Neo4j at ${this.uri} (database: ${this.database})...`);

        const driver = createDriver(this.uri, auth.basic(this.username, this.password), {
            maxConnectionPoolSize: config.neo4jMaxPoolSize,
            connectionAcquisitionTimeout: config.neo4jAcquisitionTimeoutMs,
            maxConnectionLifetime: 60 * 60 * 1000,
            // Retrying is left to callers.
            maxTransactionRetryTime: 0,
        });

        try {
            await driver.verifyConnectivity({ database: this.database });
        } catch (error: unknown) {
            await driver.close();
            const mapped = mapNeo4jError(error, context);
            logger.error(`[${context}] Neo4j connection failed: ${mapped.message}`);
            // Any failure at this point means the store cannot be used.
            throw mapped instanceof StoreUnavailableError
                ? mapped
                : new StoreUnavailableError(mapped.message, { originalError: error });
        }

        this.driver = driver;
        logger.info(`[${context}] Neo4j connection verified.`);
    }

    async closeDriver(context: string): Promise<void> {
        if (!this.driver) {
            return;
        }
        const driver = this.driver;
        this.driver = null;
        await driver.close();
        logger.info(`[${context}] Neo4j driver closed.`);
    }

    /**
     * Runs one query in a managed transaction and returns its rows as plain objects.
     *
     * @param mode - READ routes to followers in a cluster; the recommender only reads
     * @param context - Caller label used in log lines and error messages
     */
    async runTransaction(
        query: string,
        params: Record<string, unknown> = {},
        mode: AccessMode = 'READ',
        context: string = 'Neo4jClient',
        options: TransactionOptions = {},
    ): Promise<GraphRow[]> {
        if (!this.driver) {
            throw new StoreUnavailableError(`[${context}] Neo4j driver is not initialized. Call initializeDriver() first.`);
        }

        const session = this.driver.session({ database: this.database, defaultAccessMode: mode });
        const txConfig = options.timeoutMs !== undefined ? { timeout: options.timeoutMs } : undefined;
        const work = async (tx: ManagedTransaction): Promise<GraphRow[]> => {
            const result = await tx.run(query, params);
            return result.records.map(record => record.toObject());
        };
        const startTime = Date.now();
        let timedOut = false;

        try {
            const pending = mode === 'READ'
                ? session.executeRead(work, txConfig)
                : session.executeWrite(work, txConfig);
            const rows = await withDeadline(pending, options.timeoutMs, context);
            logger.debug(`[${context}] Query returned ${rows.length} rows in ${Date.now() - startTime}ms`);
            return rows;
        } catch (error: unknown) {
            const mapped = mapNeo4jError(error, context);
            timedOut = mapped instanceof QueryTimeoutError;
            logger.error(`[${context}] Query failed: ${mapped.message}`, { kind: mapped.kind });
            throw mapped;
        } finally {
            if (timedOut) {
                // An unresponsive server can hold close() open; the timeout must not wait for it
                void session.close().catch((error: unknown) => {
                    logger.warn(`[${context}] Closing a timed-out session failed: ${errorMessage(error)}`);
                });
            } else {
                await session.close();
            }
        }
    }
}
