import { describe, it, expect } from 'vitest';
import {
    formatFilmography,
    formatHealth,
    formatMovieDetails,
    formatNeighbourhood,
    formatRecommendations,
    formatStatistics,
    render,
} from './format.js';
import { RecommendationView } from '../recommendation/types.js';

const titanic: RecommendationView = {
    title: 'Titanic',
    year: 1997,
    rating: 7.9,
    sharedGenreCount: 0,
    sharedActorCount: 1,
    compositeScore: 3,
    sharedGenres: [],
    sharedActors: ['Leonardo DiCaprio'],
};

describe('formatRecommendations', () => {
    it('should number recommendations and list shared names', () => {
        expect(formatRecommendations('Inception', 'combined', [titanic])).toBe([
            'Recommendations for "Inception" (combined):',
            '1. Titanic (1997) score=3 genres=0 actors=1',
            '   shared actors: Leonardo DiCaprio',
        ].join('\n'));
    });

    it('should say so when there is nothing to recommend', () => {
        expect(formatRecommendations('NoSuchMovie', 'genre', [])).toBe('No recommendations for "NoSuchMovie" (genre).');
    });
});

describe('formatMovieDetails', () => {
    it('should print a dash for empty lists and skip missing fields', () => {
        expect(formatMovieDetails({
            title: 'Orphan Reel',
            year: null,
            rating: null,
            tagline: null,
            description: null,
            directors: [],
            cast: [],
            genres: ['Drama'],
        })).toBe([
            'Orphan Reel',
            '  Directors: -',
            '  Cast:      -',
            '  Genres:    Drama',
        ].join('\n'));
    });
});

describe('other renderings', () => {
    it('should render a filmography with genres', () => {
        expect(formatFilmography('Christopher Nolan', 'director', [
            { title: 'Interstellar', year: 2014, rating: 8.7, tagline: null, genres: ['Drama', 'Sci-Fi'] },
        ])).toBe('Christopher Nolan (director):\n  Interstellar (2014) - Drama, Sci-Fi');
    });

    it('should render neighbourhood edges one per line', () => {
        expect(formatNeighbourhood({
            nodes: [],
            edges: [{ source: 'movie:Titanic', target: 'genre:Drama', relationship: 'IN_GENRE' }],
        })).toBe('movie:Titanic -[:IN_GENRE]-> genre:Drama');
    });

    it('should render statistics and health', () => {
        expect(formatStatistics({ totalMovies: 4, totalPeople: 7, totalGenres: 4, totalRelationships: 15 }).split('\n'))
            .toEqual(['Movies:        4', 'People:        7', 'Genres:        4', 'Relationships: 15']);
        expect(formatHealth({ status: 'unhealthy', store: 'neo4j', error: 'connection refused' }))
            .toBe('neo4j: unhealthy (connection refused)');
    });

    it('render should switch to pretty JSON on request', () => {
        expect(render({ a: 1 }, true, () => 'text')).toBe('{\n  "a": 1\n}');
        expect(render({ a: 1 }, false, () => 'text')).toBe('text');
    });
});
