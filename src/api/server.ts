import express, { Request, Response, NextFunction, RequestHandler } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { z } from 'zod';
import { createContextLogger } from '../utils/logger.js';
import { ErrorKind, InvalidArgumentError, NotFoundError, errorMessage, isRecommenderError } from '../utils/errors.js';
import { RecommendationService } from '../recommendation/recommendation-service.js';
import { STRATEGIES, Strategy, toRecommendationView } from '../recommendation/types.js';
import { PersonRole } from '../graph/types.js';

const logger = createContextLogger('MovieGraphAPI');

const recommendationQuerySchema = z.object({
    strategy: z.enum(STRATEGIES).default('combined'),
    limit: z.coerce.number().int().positive().optional(),
});

const filmographyQuerySchema = z.object({
    role: z.enum(['actor', 'director']).default('actor'),
});

function describeIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

export interface RecommendationQuery {
    strategy: Strategy;
    limit?: number;
}

export function parseRecommendationQuery(query: unknown): RecommendationQuery {
    const parsed = recommendationQuerySchema.safeParse(query);
    if (!parsed.success) {
        throw new InvalidArgumentError(`Invalid query parameters: ${describeIssues(parsed.error)}`);
    }
    return parsed.data;
}

export function parseRoleQuery(query: unknown): PersonRole {
    const parsed = filmographyQuerySchema.safeParse(query);
    if (!parsed.success) {
        throw new InvalidArgumentError(`Invalid query parameters: ${describeIssues(parsed.error)}`);
    }
    return parsed.data.role;
}

export function statusForError(kind: ErrorKind): number {
    switch (kind) {
        case 'InvalidArgument':
            return 400;
        case 'NotFound':
            return 404;
        case 'StoreUnavailable':
            return 503;
        case 'Timeout':
            return 504;
        case 'QueryFailed':
        case 'Configuration':
            return 500;
    }
}

type RouteParams = Record<string, string>;
type AsyncRoute<P extends RouteParams> = (req: Request<P>, res: Response) => Promise<void>;

/** Forwards a rejected handler to the error middleware. */
function asyncHandler<P extends RouteParams = RouteParams>(route: AsyncRoute<P>): RequestHandler<P> {
    return (req, res, next) => {
        route(req, res).catch(next);
    };
}

export function createApp(service: RecommendationService): express.Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json());

    // Request logging middleware
    app.use((req: Request, _res: Response, next: NextFunction) => {
        logger.info(`${req.method} ${req.path}`, { query: req.query });
        next();
    });

    app.get('/health', asyncHandler(async (_req, res) => {
        const health = await service.checkHealth();
        res.status(health.status === 'healthy' ? 200 : 503).json(health);
    }));

    app.get('/movies', asyncHandler(async (_req, res) => {
        const movies = await service.listMovies();
        res.json({ count: movies.length, movies });
    }));

    app.get('/movies/:title', asyncHandler<{ title: string }>(async (req, res) => {
        const details = await service.getMovieDetails(req.params.title);
        if (!details) {
            throw new NotFoundError(`Movie "${req.params.title}" not found`);
        }
        res.json(details);
    }));

    app.get('/movies/:title/recommendations', asyncHandler<{ title: string }>(async (req, res) => {
        const { strategy, limit } = parseRecommendationQuery(req.query);
        const recommendations = await service.recommend(req.params.title, strategy, limit ?? service.defaultLimit);
        res.json({
            title: req.params.title,
            strategy,
            count: recommendations.length,
            recommendations: recommendations.map(toRecommendationView),
        });
    }));

    app.get('/movies/:title/graph', asyncHandler<{ title: string }>(async (req, res) => {
        const neighbourhood = await service.getNeighbourhood(req.params.title);
        if (!neighbourhood) {
            throw new NotFoundError(`Movie "${req.params.title}" not found`);
        }
        res.json(neighbourhood);
    }));

    app.get('/people/:name/movies', asyncHandler<{ name: string }>(async (req, res) => {
        const role = parseRoleQuery(req.query);
        const movies = await service.getFilmography(req.params.name, role);
        res.json({ name: req.params.name, role, count: movies.length, movies });
    }));

    app.get('/stats', asyncHandler(async (_req, res) => {
        res.json(await service.getStatistics());
    }));

    // Error handling middleware
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (isRecommenderError(err)) {
            const status = statusForError(err.kind);
            if (status >= 500) {
                logger.error(`${req.method} ${req.path} failed: ${err.message}`, { kind: err.kind });
            }
            res.status(status).json({ error: err.message, kind: err.kind });
            return;
        }
        logger.error('Unhandled error', { error: errorMessage(err) });
        res.status(500).json({ error: 'Internal server error', kind: 'Internal' });
    });

    return app;
}

/**
 * Listens on `port` and closes the server (then runs `onShutdown`) on SIGTERM or SIGINT.
 */
export async function startServer(
    port: number,
    service: RecommendationService,
    onShutdown: () => Promise<void> = async () => {},
): Promise<Server> {
    const app = createApp(service);

    const health = await service.checkHealth();
    if (health.status === 'unhealthy') {
        // Every request retries the connection and answers 503 until it succeeds.
        logger.warn(`Graph store ${health.store} is not reachable on startup: ${health.error ?? 'unknown error'}`);
    } else {
        logger.info(`Graph store ${health.store} is reachable`);
    }

    const server = await new Promise<Server>((resolve, reject) => {
        const listening = app.listen(port, '0.0.0.0', () => resolve(listening));
        listening.once('error', reject);
    });
    logger.info(`Movie graph API server running on http://0.0.0.0:${port}`);

    // Graceful shutdown
    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down...`);
        server.close();
        onShutdown()
            .catch((error: unknown) => {
                logger.error(`Shutdown failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            })
            .finally(() => process.exit());
    };
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    process.once('SIGINT', () => shutdown('SIGINT'));

    return server;
}
