import { GraphStore, QueryOptions } from '../graph/types.js';
import { compareText } from '../utils/text.js';
import { CastSignal, GenreSignal, SignalExtractor } from './signals.js';
import { CandidateOverlap } from './types.js';

/**
 * Turns a reference movie into candidate movies with their overlap counts.
 *
 * Each finder runs its signals' traversals concurrently and merges the rows by
 * title, so a candidate reached by only one signal carries zero for the others.
 */
export class SimilarityQueries {
    private store: GraphStore;
    private genreSignal: SignalExtractor;
    private castSignal: SignalExtractor;

    constructor(store: GraphStore, genreSignal: SignalExtractor = new GenreSignal(), castSignal: SignalExtractor = new CastSignal()) {
        this.store = store;
        this.genreSignal = genreSignal;
        this.castSignal = castSignal;
    }

    async findByGenreOverlap(title: string, options: QueryOptions = {}): Promise<CandidateOverlap[]> {
        return this.collect(title, [this.genreSignal], options);
    }

    async findByCastOverlap(title: string, options: QueryOptions = {}): Promise<CandidateOverlap[]> {
        return this.collect(title, [this.castSignal], options);
    }

    async findCombined(title: string, options: QueryOptions = {}): Promise<CandidateOverlap[]> {
        return this.collect(title, [this.genreSignal, this.castSignal], options);
    }

    private async collect(title: string, signals: SignalExtractor[], options: QueryOptions): Promise<CandidateOverlap[]> {
        const results = await Promise.all(
            signals.map(async signal => ({ signal, rows: await signal.extract(this.store, title, options) }))
        );

        const candidates = new Map<string, CandidateOverlap>();
        for (const { signal, rows } of results) {
            for (const row of rows) {
                let candidate = candidates.get(row.movie.title);
                if (!candidate) {
                    candidate = {
                        movie: row.movie,
                        sharedGenreCount: 0,
                        sharedActorCount: 0,
                        sharedGenres: [],
                        sharedActors: [],
                    };
                    candidates.set(row.movie.title, candidate);
                }
                signal.assign(candidate, row);
            }
        }

        return [...candidates.values()].sort((a, b) => compareText(a.movie.title, b.movie.title));
    }
}
