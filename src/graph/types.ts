// src/graph/types.ts
/**
 * Graph store contract consumed by the recommendation core.
 *
 * The core never writes. Every read is keyed by a node identity (movie title or
 * person name) and returns plain values; how a store answers is its own concern.
 */

import { NodeLabel, RelationshipType } from '../database/schema.js';

export interface Movie {
    title: string;
    year: number | null;
    rating: number | null;
    tagline: string | null;
}

export interface MovieDetails extends Movie {
    description: string | null;
    directors: string[];
    cast: string[];
    genres: string[];
}

export interface FilmographyEntry extends Movie {
    genres: string[];
}

export type PersonRole = 'actor' | 'director';

/** Which way a relationship points when seen from a Movie node. */
export type MovieEdgeDirection = 'OUTGOING' | 'INCOMING';

/**
 * Two-hop overlap: reference movie -> shared node <- candidate movie, walking
 * the same relationship type on both hops.
 */
export interface OverlapPattern {
    relationship: RelationshipType;
    direction: MovieEdgeDirection;
    sharedLabel: NodeLabel;
}

export interface OverlapRow {
    movie: Movie;
    /** Distinct shared nodes, not edges. */
    sharedCount: number;
    /** Identities of the shared nodes, ascending. */
    sharedNames: string[];
}

export interface GraphStats {
    totalMovies: number;
    totalPeople: number;
    totalGenres: number;
    totalRelationships: number;
}

export interface QueryOptions {
    /** Deadline for a single store round trip. */
    timeoutMs?: number;
}

export interface GraphStore {
    /** Human readable store name for logs and health output. */
    readonly name: string;

    /**
     * Movies reachable from `title` through `pattern`, each with its distinct
     * shared-node count. Never includes the reference movie; an unknown title
     * yields an empty array.
     */
    findOverlap(title: string, pattern: OverlapPattern, options?: QueryOptions): Promise<OverlapRow[]>;

    /** All movies ordered by title. */
    listMovies(options?: QueryOptions): Promise<Movie[]>;

    getMovieDetails(title: string, options?: QueryOptions): Promise<MovieDetails | null>;

    /** Ordered by year descending (missing years last), then title. */
    getFilmography(name: string, role: PersonRole, options?: QueryOptions): Promise<FilmographyEntry[]>;

    getStatistics(options?: QueryOptions): Promise<GraphStats>;

    /** Resolves when the store answers a trivial read. */
    ping(options?: QueryOptions): Promise<void>;
}
