/**
 * Error types shared across the recommender.
 *
 * Every error raised on purpose carries a `kind` so the CLI and HTTP layers can
 * tell "fix your input" from "the graph store is down" from "try again later".
 */

export type ErrorKind =
    | 'NotFound'
    | 'InvalidArgument'
    | 'StoreUnavailable'
    | 'Timeout'
    | 'QueryFailed'
    | 'Configuration';

export interface ErrorOptions {
    originalError?: unknown;
    context?: Record<string, unknown>;
}

export class RecommenderError extends Error {
    public readonly kind: ErrorKind;
    public readonly originalError?: unknown;
    public readonly context?: Record<string, unknown>;

    constructor(kind: ErrorKind, message: string, options: ErrorOptions = {}) {
        super(message);
        this.name = new.target.name;
        this.kind = kind;
        this.originalError = options.originalError;
        this.context = options.context;
    }
}

export class NotFoundError extends RecommenderError {
    constructor(message: string, options?: ErrorOptions) {
        super('NotFound', message, options);
    }
}

export class InvalidArgumentError extends RecommenderError {
    constructor(message: string, options?: ErrorOptions) {
        super('InvalidArgument', message, options);
    }
}

/** Connectivity, authentication or database selection failed. */
export class StoreUnavailableError extends RecommenderError {
    constructor(message: string, options?: ErrorOptions) {
        super('StoreUnavailable', message, options);
    }
}

export class QueryTimeoutError extends RecommenderError {
    constructor(message: string, options?: ErrorOptions) {
        super('Timeout', message, options);
    }
}

/** A query reached Neo4j and failed for a reason other than availability or time. */
export class Neo4jError extends RecommenderError {
    constructor(message: string, options?: ErrorOptions) {
        super('QueryFailed', message, options);
    }
}

export class ConfigurationError extends RecommenderError {
    constructor(message: string, options?: ErrorOptions) {
        super('Configuration', message, options);
    }
}

export function isRecommenderError(error: unknown): error is RecommenderError {
    return error instanceof RecommenderError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
