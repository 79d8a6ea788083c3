import { Movie } from '../graph/types.js';

export const STRATEGIES = ['genre', 'cast', 'combined'] as const;

export type Strategy = (typeof STRATEGIES)[number];

/** Overlap signals of one candidate movie against the reference movie. */
export interface CandidateOverlap {
    movie: Movie;
    sharedGenreCount: number;
    sharedActorCount: number;
    sharedGenres: string[];
    sharedActors: string[];
}

export interface ScoredCandidate extends CandidateOverlap {
    /** Strategy score; the weighted sum for `combined`. */
    compositeScore: number;
}

export interface RankingPolicy {
    genreWeight: number;
    actorWeight: number;
}

/** Flat shape emitted by the CLI and the HTTP API. */
export interface RecommendationView {
    title: string;
    year: number | null;
    rating: number | null;
    sharedGenreCount: number;
    sharedActorCount: number;
    compositeScore: number;
    sharedGenres: string[];
    sharedActors: string[];
}

export function isStrategy(value: unknown): value is Strategy {
    return STRATEGIES.some(strategy => strategy === value);
}

export function toRecommendationView(candidate: ScoredCandidate): RecommendationView {
    return {
        title: candidate.movie.title,
        year: candidate.movie.year,
        rating: candidate.movie.rating,
        sharedGenreCount: candidate.sharedGenreCount,
        sharedActorCount: candidate.sharedActorCount,
        compositeScore: candidate.compositeScore,
        sharedGenres: candidate.sharedGenres,
        sharedActors: candidate.sharedActors,
    };
}
