import { Command } from 'commander';
import winston from 'winston';
import { createContextLogger } from '../utils/logger.js';
import { Neo4jClient } from '../database/neo4j-client.js';
import { Neo4jGraphStore } from '../graph/neo4j-graph-store.js';
import { InMemoryGraphStore } from '../graph/in-memory-graph-store.js';
import { GraphStore } from '../graph/types.js';
import { RecommendationService } from '../recommendation/recommendation-service.js';
import { InvalidArgumentError, errorMessage, isRecommenderError } from '../utils/errors.js';
import config from '../config/index.js';

const logger = createContextLogger('StoreOptions');

export interface StoreOptions {
    neo4jUrl?: string;
    neo4jUser?: string;
    neo4jPassword?: string;
    neo4jDatabase?: string;
    graphFile?: string;
    timeout?: string;
}

export interface OpenedService {
    service: RecommendationService;
    close: () => Promise<void>;
}

export function addStoreOptions(command: Command): Command {
    return command
        .option('--neo4j-url <url>', 'Neo4j connection URL')
        .option('--neo4j-user <user>', 'Neo4j username')
        .option('--neo4j-password <password>', 'Neo4j password')
        .option('--neo4j-database <database>', 'Neo4j database name')
        .option('--graph-file <path>', 'Read the graph from a JSON snapshot instead of Neo4j')
        .option('--timeout <ms>', `Per-query timeout in milliseconds (default: ${config.queryTimeoutMs})`);
}

export function parsePositiveInt(value: string | undefined, name: string): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError(`${name} must be a positive integer, got "${value}"`);
    }
    return parsed;
}

/**
 * Selects the graph store from the options and wraps it in a service.
 * The caller owns `close()`.
 */
export async function openService(options: StoreOptions, context: string, serviceLogger: winston.Logger): Promise<OpenedService> {
    const timeoutMs = parsePositiveInt(options.timeout, '--timeout') ?? config.queryTimeoutMs;
    const settings = {
        policy: {
            genreWeight: config.recommendation.genreWeight,
            actorWeight: config.recommendation.actorWeight,
        },
        defaultLimit: config.recommendation.defaultLimit,
        timeoutMs,
    };

    if (options.graphFile) {
        logger.info(`[${context}] Loading graph snapshot from ${options.graphFile}`);
        const store: GraphStore = await InMemoryGraphStore.fromFile(options.graphFile);
        return {
            service: new RecommendationService(store, serviceLogger, settings),
            close: async () => {},
        };
    }

    // CLI overrides win; the client falls back to config for anything left undefined
    const neo4jClient = new Neo4jClient({
        uri: options.neo4jUrl,
        username: options.neo4jUser,
        password: options.neo4jPassword,
        database: options.neo4jDatabase,
    });
    // Connects on the first query, so `health` and `serve` can report an unreachable store
    return {
        service: new RecommendationService(new Neo4jGraphStore(neo4jClient), serviceLogger, settings),
        close: () => neo4jClient.closeDriver(context),
    };
}

/**
 * Runs one command against a freshly opened service and always releases it.
 * Failures are logged and turned into a non-zero exit code.
 */
export async function runWithService(
    options: StoreOptions,
    context: string,
    work: (service: RecommendationService) => Promise<void>,
): Promise<void> {
    const commandLogger = createContextLogger(context);
    let opened: OpenedService | undefined;
    try {
        opened = await openService(options, context, commandLogger);
        await work(opened.service);
    } catch (error: unknown) {
        const kind = isRecommenderError(error) ? error.kind : 'Internal';
        commandLogger.error(`${context} failed: ${errorMessage(error)}`, { kind });
        process.exitCode = 1;
    } finally {
        if (opened) {
            await opened.close();
        }
    }
}
