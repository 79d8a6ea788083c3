/**
 * Similarity signals.
 *
 * A signal is one kind of structural overlap between two movies, read from the
 * graph as a two-hop pattern through a shared node. Strategies compose signals;
 * the ranking engine only sees the counts they fill in.
 */

import { GraphStore, OverlapPattern, OverlapRow, QueryOptions } from '../graph/types.js';
import { CandidateOverlap } from './types.js';

export type SignalName = 'genre' | 'cast';

export interface SignalExtractor {
    readonly name: SignalName;
    readonly pattern: OverlapPattern;

    /** Overlap rows for `title`, never including the reference movie itself. */
    extract(store: GraphStore, title: string, options?: QueryOptions): Promise<OverlapRow[]>;

    /** Writes this signal's count and shared names onto a candidate. */
    assign(candidate: CandidateOverlap, row: OverlapRow): void;
}

abstract class OverlapSignal implements SignalExtractor {
    abstract readonly name: SignalName;
    abstract readonly pattern: OverlapPattern;

    async extract(store: GraphStore, title: string, options: QueryOptions = {}): Promise<OverlapRow[]> {
        const rows = await store.findOverlap(title, this.pattern, options);
        return rows.filter(row => row.movie.title !== title && row.sharedCount > 0);
    }

    abstract assign(candidate: CandidateOverlap, row: OverlapRow): void;
}

/** Movie -[:IN_GENRE]-> Genre <-[:IN_GENRE]- Movie */
export class GenreSignal extends OverlapSignal {
    readonly name = 'genre';
    readonly pattern: OverlapPattern = { relationship: 'IN_GENRE', direction: 'OUTGOING', sharedLabel: 'Genre' };

    assign(candidate: CandidateOverlap, row: OverlapRow): void {
        candidate.sharedGenreCount = row.sharedCount;
        candidate.sharedGenres = row.sharedNames;
    }
}

/** Movie <-[:ACTED_IN]- Person -[:ACTED_IN]-> Movie */
export class CastSignal extends OverlapSignal {
    readonly name = 'cast';
    readonly pattern: OverlapPattern = { relationship: 'ACTED_IN', direction: 'INCOMING', sharedLabel: 'Person' };

    assign(candidate: CandidateOverlap, row: OverlapRow): void {
        candidate.sharedActorCount = row.sharedCount;
        candidate.sharedActors = row.sharedNames;
    }
}
