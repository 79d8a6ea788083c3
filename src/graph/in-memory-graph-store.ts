// src/graph/in-memory-graph-store.ts
/**
 * GraphStore over an in-memory adjacency index.
 *
 * Answers the same traversal contract as the Neo4j store from a JSON snapshot,
 * so the recommender runs offline (`--graph-file`) and in tests without a database.
 * Relationships are deduplicated the way MERGE would store them.
 */

import { NodeLabel, RelationshipType } from '../database/schema.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { compareText } from '../utils/text.js';
import { GraphSnapshot, GraphSnapshotInput, loadGraphSnapshot, parseGraphSnapshot } from './snapshot.js';
import {
    FilmographyEntry,
    GraphStats,
    GraphStore,
    Movie,
    MovieDetails,
    MovieEdgeDirection,
    OverlapPattern,
    OverlapRow,
    PersonRole,
} from './types.js';

interface GraphNode {
    label: NodeLabel;
    identity: string;
}

interface Edge {
    type: RelationshipType;
    from: string;
    to: string;
}

type SnapshotMovie = GraphSnapshot['movies'][number];

function nodeKey(label: NodeLabel, identity: string): string {
    return `${label}:${identity}`;
}

function toMovie(source: SnapshotMovie): Movie {
    return {
        title: source.title,
        year: source.year,
        rating: source.rating,
        tagline: source.tagline,
    };
}

/** Year descending with missing years last, then title. */
function compareByYearDesc(a: Movie, b: Movie): number {
    const yearA = a.year ?? Number.NEGATIVE_INFINITY;
    const yearB = b.year ?? Number.NEGATIVE_INFINITY;
    if (yearA !== yearB) {
        return yearA > yearB ? -1 : 1;
    }
    return compareText(a.title, b.title);
}

export class InMemoryGraphStore implements GraphStore {
    public readonly name = 'in-memory';
    private readonly movies = new Map<string, SnapshotMovie>();
    private readonly nodes = new Map<string, GraphNode>();
    private readonly outgoing = new Map<string, Edge[]>();
    private readonly incoming = new Map<string, Edge[]>();
    private readonly edgeKeys = new Set<string>();

    constructor(snapshot: GraphSnapshot) {
        for (const movie of snapshot.movies) {
            this.movies.set(movie.title, movie);
            const movieKey = this.addNode('Movie', movie.title);
            for (const genre of movie.genres) {
                this.addEdge('IN_GENRE', movieKey, this.addNode('Genre', genre));
            }
            for (const actor of movie.cast) {
                this.addEdge('ACTED_IN', this.addNode('Person', actor), movieKey);
            }
            for (const director of movie.directors) {
                this.addEdge('DIRECTED', this.addNode('Person', director), movieKey);
            }
        }
    }

    /** Validates a snapshot object and indexes it. */
    static fromSnapshot(input: GraphSnapshotInput): InMemoryGraphStore {
        return new InMemoryGraphStore(parseGraphSnapshot(input));
    }

    static async fromFile(filePath: string): Promise<InMemoryGraphStore> {
        return new InMemoryGraphStore(await loadGraphSnapshot(filePath));
    }

    private addNode(label: NodeLabel, identity: string): string {
        const key = nodeKey(label, identity);
        if (!this.nodes.has(key)) {
            this.nodes.set(key, { label, identity });
        }
        return key;
    }

    private addEdge(type: RelationshipType, from: string, to: string): void {
        const key = `${from}|${type}|${to}`;
        if (this.edgeKeys.has(key)) {
            return;
        }
        this.edgeKeys.add(key);
        const edge: Edge = { type, from, to };
        this.outgoing.set(from, [...(this.outgoing.get(from) ?? []), edge]);
        this.incoming.set(to, [...(this.incoming.get(to) ?? []), edge]);
    }

    /** Keys of nodes with `label` one `type` hop away from `key` in `direction`. */
    private neighbours(key: string, type: RelationshipType, direction: MovieEdgeDirection, label: NodeLabel): string[] {
        const edges = direction === 'OUTGOING' ? this.outgoing.get(key) : this.incoming.get(key);
        const result: string[] = [];
        for (const edge of edges ?? []) {
            const other = direction === 'OUTGOING' ? edge.to : edge.from;
            if (edge.type === type && this.nodes.get(other)?.label === label) {
                result.push(other);
            }
        }
        return result;
    }

    private identities(keys: string[]): string[] {
        return keys
            .map(key => this.nodes.get(key)?.identity)
            .filter((identity): identity is string => identity !== undefined)
            .sort(compareText);
    }

    async findOverlap(title: string, pattern: OverlapPattern): Promise<OverlapRow[]> {
        if (pattern.sharedLabel === 'Movie') {
            throw new InvalidArgumentError(`Invalid shared node label: ${pattern.sharedLabel}`);
        }
        if (!this.movies.has(title)) {
            return [];
        }

        const selected = nodeKey('Movie', title);
        const back: MovieEdgeDirection = pattern.direction === 'OUTGOING' ? 'INCOMING' : 'OUTGOING';
        const sharedByCandidate = new Map<string, Set<string>>();

        for (const shared of this.neighbours(selected, pattern.relationship, pattern.direction, pattern.sharedLabel)) {
            for (const other of this.neighbours(shared, pattern.relationship, back, 'Movie')) {
                if (other === selected) {
                    continue;
                }
                const set = sharedByCandidate.get(other) ?? new Set<string>();
                set.add(shared);
                sharedByCandidate.set(other, set);
            }
        }

        const rows: OverlapRow[] = [];
        for (const [candidateKey, shared] of sharedByCandidate) {
            const source = this.movies.get(this.nodes.get(candidateKey)?.identity ?? '');
            if (source) {
                rows.push({
                    movie: toMovie(source),
                    sharedCount: shared.size,
                    sharedNames: this.identities([...shared]),
                });
            }
        }
        return rows.sort((a, b) => b.sharedCount - a.sharedCount || compareText(a.movie.title, b.movie.title));
    }

    async listMovies(): Promise<Movie[]> {
        return [...this.movies.values()]
            .map(toMovie)
            .sort((a, b) => compareText(a.title, b.title));
    }

    async getMovieDetails(title: string): Promise<MovieDetails | null> {
        const source = this.movies.get(title);
        if (!source) {
            return null;
        }
        const key = nodeKey('Movie', title);
        return {
            ...toMovie(source),
            description: source.description,
            directors: this.identities(this.neighbours(key, 'DIRECTED', 'INCOMING', 'Person')),
            cast: this.identities(this.neighbours(key, 'ACTED_IN', 'INCOMING', 'Person')),
            genres: this.identities(this.neighbours(key, 'IN_GENRE', 'OUTGOING', 'Genre')),
        };
    }

    async getFilmography(name: string, role: PersonRole): Promise<FilmographyEntry[]> {
        const type: RelationshipType = role === 'director' ? 'DIRECTED' : 'ACTED_IN';
        const entries: FilmographyEntry[] = [];
        for (const key of this.neighbours(nodeKey('Person', name), type, 'OUTGOING', 'Movie')) {
            const source = this.movies.get(this.nodes.get(key)?.identity ?? '');
            if (source) {
                entries.push({
                    ...toMovie(source),
                    genres: this.identities(this.neighbours(key, 'IN_GENRE', 'OUTGOING', 'Genre')),
                });
            }
        }
        return entries.sort(compareByYearDesc);
    }

    async getStatistics(): Promise<GraphStats> {
        let totalPeople = 0;
        let totalGenres = 0;
        for (const node of this.nodes.values()) {
            if (node.label === 'Person') totalPeople++;
            if (node.label === 'Genre') totalGenres++;
        }
        return {
            totalMovies: this.movies.size,
            totalPeople,
            totalGenres,
            totalRelationships: this.edgeKeys.size,
        };
    }

    async ping(): Promise<void> {
        // Always reachable.
    }
}
