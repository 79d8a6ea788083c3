// src/recommendation/recommendation-service.ts
/**
 * Recommendation Service
 * Entry point for the CLI and the HTTP API: recommendations plus the catalogue
 * reads around them (movie details, filmographies, neighbourhood graph, stats).
 */

import winston from 'winston';
import { RelationshipType } from '../database/schema.js';
import {
    FilmographyEntry,
    GraphStats,
    GraphStore,
    Movie,
    MovieDetails,
    PersonRole,
    QueryOptions,
} from '../graph/types.js';
import { InvalidArgumentError, errorMessage, isRecommenderError } from '../utils/errors.js';
import { DEFAULT_RANKING_POLICY, rankCandidates, validateRankingPolicy } from './ranking.js';
import { SimilarityQueries } from './similarity-queries.js';
import { CandidateOverlap, isStrategy, RankingPolicy, ScoredCandidate, STRATEGIES, Strategy } from './types.js';

export interface RecommendationSettings {
    policy: RankingPolicy;
    defaultLimit: number;
    /** Per-query deadline applied when the caller gives none. */
    timeoutMs?: number;
}

export interface NeighbourhoodNode {
    id: string;
    label: string;
    kind: 'movie' | 'director' | 'actor' | 'genre';
}

export interface NeighbourhoodEdge {
    source: string;
    target: string;
    relationship: RelationshipType;
}

export interface Neighbourhood {
    nodes: NeighbourhoodNode[];
    edges: NeighbourhoodEdge[];
}

export interface HealthStatus {
    status: 'healthy' | 'unhealthy';
    store: string;
    error?: string;
}

const PERSON_ROLES: readonly PersonRole[] = ['actor', 'director'];

export function isPersonRole(value: unknown): value is PersonRole {
    return PERSON_ROLES.some(role => role === value);
}

function requireName(value: unknown, field: string): string {
    if (typeof value !== 'string' || value.trim() === '') {
        throw new InvalidArgumentError(`${field} must be a non-empty string`);
    }
    return value;
}

export class RecommendationService {
    private store: GraphStore;
    private logger: winston.Logger;
    private queries: SimilarityQueries;
    private settings: RecommendationSettings;

    constructor(store: GraphStore, logger: winston.Logger, settings: Partial<RecommendationSettings> = {}) {
        this.store = store;
        this.logger = logger;
        this.queries = new SimilarityQueries(store);
        this.settings = {
            policy: validateRankingPolicy({ ...DEFAULT_RANKING_POLICY, ...settings.policy }),
            defaultLimit: settings.defaultLimit ?? 5,
            timeoutMs: settings.timeoutMs,
        };
        if (!Number.isInteger(this.settings.defaultLimit) || this.settings.defaultLimit <= 0) {
            throw new InvalidArgumentError(`defaultLimit must be a positive integer, got ${this.settings.defaultLimit}`);
        }
    }

    get defaultLimit(): number {
        return this.settings.defaultLimit;
    }

    private queryOptions(options: QueryOptions): QueryOptions {
        const timeoutMs = options.timeoutMs ?? this.settings.timeoutMs;
        return timeoutMs === undefined ? {} : { timeoutMs };
    }

    /**
     * Movies similar to `title`, best first.
     *
     * An unknown title yields an empty list. Store faults propagate as
     * StoreUnavailableError / QueryTimeoutError and are never reported as "no results".
     *
     * @throws InvalidArgumentError for an empty title, unknown strategy or non-positive limit
     */
    async recommend(
        title: string,
        strategy: Strategy,
        limit: number = this.settings.defaultLimit,
        options: QueryOptions = {},
    ): Promise<ScoredCandidate[]> {
        requireName(title, 'title');
        if (!isStrategy(strategy)) {
            throw new InvalidArgumentError(`Unknown strategy "${String(strategy)}"; expected one of ${STRATEGIES.join(', ')}`);
        }
        if (!Number.isInteger(limit) || limit <= 0) {
            throw new InvalidArgumentError(`limit must be a positive integer, got ${limit}`);
        }

        const startTime = Date.now();
        const candidates = await this.findCandidates(title, strategy, this.queryOptions(options));
        const ranked = rankCandidates(candidates, strategy, limit, this.settings.policy);
        this.logger.info(
            `Recommended ${ranked.length}/${candidates.length} movies for "${title}" (${strategy}) in ${Date.now() - startTime}ms`
        );
        return ranked;
    }

    private findCandidates(title: string, strategy: Strategy, options: QueryOptions): Promise<CandidateOverlap[]> {
        switch (strategy) {
            case 'genre':
                return this.queries.findByGenreOverlap(title, options);
            case 'cast':
                return this.queries.findByCastOverlap(title, options);
            case 'combined':
                return this.queries.findCombined(title, options);
        }
    }

    async listMovies(options: QueryOptions = {}): Promise<Movie[]> {
        return this.store.listMovies(this.queryOptions(options));
    }

    async getMovieDetails(title: string, options: QueryOptions = {}): Promise<MovieDetails | null> {
        requireName(title, 'title');
        const details = await this.store.getMovieDetails(title, this.queryOptions(options));
        if (!details) {
            this.logger.warn(`Movie "${title}" not found`);
        }
        return details;
    }

    async getFilmography(name: string, role: PersonRole = 'actor', options: QueryOptions = {}): Promise<FilmographyEntry[]> {
        requireName(name, 'name');
        if (!isPersonRole(role)) {
            throw new InvalidArgumentError(`Unknown role "${String(role)}"; expected one of ${PERSON_ROLES.join(', ')}`);
        }
        return this.store.getFilmography(name, role, this.queryOptions(options));
    }

    /**
     * The movie with its directors, actors and genres as a node/edge list.
     * Returns null for an unknown title.
     */
    async getNeighbourhood(title: string, options: QueryOptions = {}): Promise<Neighbourhood | null> {
        const details = await this.getMovieDetails(title, options);
        if (!details) {
            return null;
        }

        const movieId = `movie:${details.title}`;
        const nodes: NeighbourhoodNode[] = [{ id: movieId, label: details.title, kind: 'movie' }];
        const edges: NeighbourhoodEdge[] = [];

        for (const director of details.directors) {
            const id = `director:${director}`;
            nodes.push({ id, label: director, kind: 'director' });
            edges.push({ source: id, target: movieId, relationship: 'DIRECTED' });
        }
        for (const actor of details.cast) {
            const id = `actor:${actor}`;
            nodes.push({ id, label: actor, kind: 'actor' });
            edges.push({ source: id, target: movieId, relationship: 'ACTED_IN' });
        }
        for (const genre of details.genres) {
            const id = `genre:${genre}`;
            nodes.push({ id, label: genre, kind: 'genre' });
            edges.push({ source: movieId, target: id, relationship: 'IN_GENRE' });
        }
        return { nodes, edges };
    }

    async getStatistics(options: QueryOptions = {}): Promise<GraphStats> {
        return this.store.getStatistics(this.queryOptions(options));
    }

    /** Never throws; a failing store is reported as unhealthy. */
    async checkHealth(options: QueryOptions = {}): Promise<HealthStatus> {
        try {
            await this.store.ping(this.queryOptions(options));
            return { status: 'healthy', store: this.store.name };
        } catch (error: unknown) {
            const message = errorMessage(error);
            this.logger.warn(`Health check failed: ${message}`, {
                kind: isRecommenderError(error) ? error.kind : undefined,
            });
            return { status: 'unhealthy', store: this.store.name, error: message };
        }
    }
}
