/**
 * Scoring and ranking of overlap candidates.
 *
 * genre:    score = sharedGenreCount;  score desc, title asc
 * cast:     score = sharedActorCount;  score desc, title asc
 * combined: score = genres * genreWeight + actors * actorWeight;
 *           score desc, sharedActorCount desc, title asc
 */

import { InvalidArgumentError } from '../utils/errors.js';
import { compareText } from '../utils/text.js';
import { CandidateOverlap, RankingPolicy, ScoredCandidate, Strategy } from './types.js';

export const DEFAULT_RANKING_POLICY: Readonly<RankingPolicy> = {
    genreWeight: 2,
    actorWeight: 3,
};

/** Negative weights would break monotonicity of the combined score. */
export function validateRankingPolicy(policy: RankingPolicy): RankingPolicy {
    const weights: Array<[string, number]> = [
        ['genreWeight', policy.genreWeight],
        ['actorWeight', policy.actorWeight],
    ];
    for (const [key, weight] of weights) {
        if (!Number.isFinite(weight) || weight < 0) {
            throw new InvalidArgumentError(`Ranking weight ${key} must be a non-negative number, got ${weight}`);
        }
    }
    return policy;
}

export function scoreCandidate(candidate: CandidateOverlap, strategy: Strategy, policy: RankingPolicy = DEFAULT_RANKING_POLICY): number {
    switch (strategy) {
        case 'genre':
            return candidate.sharedGenreCount;
        case 'cast':
            return candidate.sharedActorCount;
        case 'combined':
            return candidate.sharedGenreCount * policy.genreWeight + candidate.sharedActorCount * policy.actorWeight;
    }
}

export function compareScored(strategy: Strategy): (a: ScoredCandidate, b: ScoredCandidate) => number {
    return (a, b) => {
        if (a.compositeScore !== b.compositeScore) {
            return b.compositeScore - a.compositeScore;
        }
        if (strategy === 'combined' && a.sharedActorCount !== b.sharedActorCount) {
            return b.sharedActorCount - a.sharedActorCount;
        }
        return compareText(a.movie.title, b.movie.title);
    };
}

/**
 * Scores, orders and truncates candidates. Returns every candidate when there
 * are fewer than `limit`, which the caller has already checked.
 */
export function rankCandidates(
    candidates: CandidateOverlap[],
    strategy: Strategy,
    limit: number,
    policy: RankingPolicy = DEFAULT_RANKING_POLICY,
): ScoredCandidate[] {
    return candidates
        .map(candidate => ({ ...candidate, compositeScore: scoreCandidate(candidate, strategy, policy) }))
        .sort(compareScored(strategy))
        .slice(0, limit);
}
