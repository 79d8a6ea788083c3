import { Neo4jClient, GraphRow } from '../database/neo4j-client.js';
import { compareText } from '../utils/text.js';
import { buildFilmographyQuery, buildOverlapQuery, QUERIES } from './cypher.js';
import {
    FilmographyEntry,
    GraphStats,
    GraphStore,
    Movie,
    MovieDetails,
    OverlapPattern,
    OverlapRow,
    PersonRole,
    QueryOptions,
} from './types.js';

// =============================================================================
// Row readers
// =============================================================================

/** Accepts plain numbers and neo4j Integer values. */
export function readNumber(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'bigint') {
        return Number(value);
    }
    if (typeof value === 'object' && value !== null && 'toNumber' in value && typeof value.toNumber === 'function') {
        const converted: unknown = value.toNumber();
        return typeof converted === 'number' ? converted : null;
    }
    return null;
}

export function readString(value: unknown): string | null {
    return typeof value === 'string' ? value : null;
}

/** Drops nulls (collect() over OPTIONAL MATCH) and sorts ascending. */
export function readStringList(value: unknown): string[] {
    if (!Array.isArray(value)) {
        return [];
    }
    const names = value.filter((item): item is string => typeof item === 'string');
    return [...new Set(names)].sort(compareText);
}

function readMovie(row: GraphRow): Movie | null {
    const title = readString(row.title);
    if (title === null) {
        return null;
    }
    return {
        title,
        year: readNumber(row.year),
        rating: readNumber(row.rating),
        tagline: readString(row.tagline),
    };
}

/**
 * GraphStore backed by Neo4j. Read-only; every method is a single Cypher round trip.
 *
 * The driver connects on first use, and again after a failed attempt, so a store
 * opened while Neo4j is down starts answering once it comes back.
 */
export class Neo4jGraphStore implements GraphStore {
    public readonly name = 'neo4j';
    private neo4jClient: Neo4jClient;

    constructor(neo4jClient: Neo4jClient) {
        this.neo4jClient = neo4jClient;
    }

    private async read(query: string, params: Record<string, unknown>, context: string, options: QueryOptions): Promise<GraphRow[]> {
        await this.neo4jClient.initializeDriver(context);
        return this.neo4jClient.runTransaction(query, params, 'READ', context, options);
    }

    async findOverlap(title: string, pattern: OverlapPattern, options: QueryOptions = {}): Promise<OverlapRow[]> {
        const rows = await this.read(
            buildOverlapQuery(pattern),
            { title },
            `GraphStore-Overlap-${pattern.relationship}`,
            options,
        );

        const overlaps: OverlapRow[] = [];
        for (const row of rows) {
            const movie = readMovie(row);
            const sharedCount = readNumber(row.sharedCount) ?? 0;
            if (movie === null || movie.title === title || sharedCount <= 0) {
                continue;
            }
            overlaps.push({ movie, sharedCount, sharedNames: readStringList(row.sharedNames) });
        }
        return overlaps;
    }

    async listMovies(options: QueryOptions = {}): Promise<Movie[]> {
        const rows = await this.read(QUERIES.LIST_MOVIES, {}, 'GraphStore-ListMovies', options);
        return rows.map(readMovie).filter((movie): movie is Movie => movie !== null);
    }

    async getMovieDetails(title: string, options: QueryOptions = {}): Promise<MovieDetails | null> {
        const rows = await this.read(QUERIES.MOVIE_DETAILS, { title }, 'GraphStore-MovieDetails', options);
        const row = rows[0];
        const movie = row ? readMovie(row) : null;
        if (!row || movie === null) {
            return null;
        }
        return {
            ...movie,
            description: readString(row.description),
            directors: readStringList(row.directors),
            cast: readStringList(row.cast),
            genres: readStringList(row.genres),
        };
    }

    async getFilmography(name: string, role: PersonRole, options: QueryOptions = {}): Promise<FilmographyEntry[]> {
        const rows = await this.read(
            buildFilmographyQuery(role),
            { name },
            `GraphStore-Filmography-${role}`,
            options,
        );
        const entries: FilmographyEntry[] = [];
        for (const row of rows) {
            const movie = readMovie(row);
            if (movie !== null) {
                entries.push({ ...movie, genres: readStringList(row.genres) });
            }
        }
        return entries;
    }

    async getStatistics(options: QueryOptions = {}): Promise<GraphStats> {
        const rows = await this.read(QUERIES.STATISTICS, {}, 'GraphStore-Statistics', options);
        const row = rows[0] ?? {};
        return {
            totalMovies: readNumber(row.totalMovies) ?? 0,
            totalPeople: readNumber(row.totalPeople) ?? 0,
            totalGenres: readNumber(row.totalGenres) ?? 0,
            totalRelationships: readNumber(row.totalRelationships) ?? 0,
        };
    }

    async ping(options: QueryOptions = {}): Promise<void> {
        await this.read(QUERIES.PING, {}, 'GraphStore-Ping', options);
    }
}
