// src/recommendation/recommendation-service.spec.ts
import { describe, it, expect, beforeAll, beforeEach, vi } from 'vitest';
import { fileURLToPath } from 'url';
import winston from 'winston';
import { RecommendationService } from './recommendation-service.js';
import { InMemoryGraphStore } from '../graph/in-memory-graph-store.js';
import { GraphStore } from '../graph/types.js';
import { InvalidArgumentError, QueryTimeoutError, StoreUnavailableError } from '../utils/errors.js';

const FIXTURE = fileURLToPath(new URL('../graph/__fixtures__/inception-graph.json', import.meta.url));

function failingStore(error: Error): GraphStore {
    return {
        name: 'failing',
        findOverlap: vi.fn().mockRejectedValue(error),
        listMovies: vi.fn().mockRejectedValue(error),
        getMovieDetails: vi.fn().mockRejectedValue(error),
        getFilmography: vi.fn().mockRejectedValue(error),
        getStatistics: vi.fn().mockRejectedValue(error),
        ping: vi.fn().mockRejectedValue(error),
    };
}

describe('RecommendationService', () => {
    let store: InMemoryGraphStore;
    let service: RecommendationService;
    let mockLogger: winston.Logger;

    beforeAll(async () => {
        store = await InMemoryGraphStore.fromFile(FIXTURE);
    });

    beforeEach(() => {
        mockLogger = {
            info: vi.fn(),
            debug: vi.fn(),
            warn: vi.fn(),
            error: vi.fn(),
        } as unknown as winston.Logger;

        service = new RecommendationService(store, mockLogger);
    });

    describe('recommend', () => {
        it('should rank by shared genres', async () => {
            const ranked = await service.recommend('Inception', 'genre', 5);

            expect(ranked.map(r => [r.movie.title, r.compositeScore])).toEqual([['Interstellar', 1]]);
            expect(ranked[0].sharedActorCount).toBe(0);
        });

        it('should rank by shared cast', async () => {
            const ranked = await service.recommend('Inception', 'cast', 5);

            expect(ranked.map(r => [r.movie.title, r.compositeScore])).toEqual([['Titanic', 1]]);
        });

        it('should weight actors above genres in the combined strategy', async () => {
            const ranked = await service.recommend('Inception', 'combined', 5);

            expect(ranked.map(r => [r.movie.title, r.compositeScore])).toEqual([
                ['Titanic', 3],
                ['Interstellar', 2],
            ]);
            expect(ranked[0].sharedActors).toEqual(['Leonardo DiCaprio']);
            expect(ranked[1].sharedGenres).toEqual(['Sci-Fi']);
        });

        it('should honour configured weights', async () => {
            const genreHeavy = new RecommendationService(store, mockLogger, { policy: { genreWeight: 5, actorWeight: 1 } });

            const ranked = await genreHeavy.recommend('Inception', 'combined', 5);

            expect(ranked.map(r => [r.movie.title, r.compositeScore])).toEqual([
                ['Interstellar', 5],
                ['Titanic', 1],
            ]);
        });

        it('should return at most limit results', async () => {
            const ranked = await service.recommend('Inception', 'combined', 1);

            expect(ranked.map(r => r.movie.title)).toEqual(['Titanic']);
        });

        it('should fall back to the default limit', async () => {
            const single = new RecommendationService(store, mockLogger, { defaultLimit: 1 });

            expect(await single.recommend('Inception', 'combined')).toHaveLength(1);
        });

        it('should return an empty list for an unknown movie', async () => {
            expect(await service.recommend('NoSuchMovie', 'genre', 5)).toEqual([]);
        });

        it('should return an empty list for a movie without relationships', async () => {
            expect(await service.recommend('Orphan Reel', 'combined', 5)).toEqual([]);
        });

        it('should return the same order on repeated calls', async () => {
            const first = await service.recommend('Interstellar', 'combined', 5);
            const second = await service.recommend('Interstellar', 'combined', 5);

            expect(second).toEqual(first);
            expect(first.map(r => r.movie.title)).toEqual(['Inception', 'Titanic']);
        });

        it.each([0, -3, 2.5, Number.NaN])('should reject limit %s', async limit => {
            await expect(service.recommend('Inception', 'genre', limit)).rejects.toBeInstanceOf(InvalidArgumentError);
        });

        it('should reject an empty title', async () => {
            await expect(service.recommend('  ', 'genre', 5)).rejects.toBeInstanceOf(InvalidArgumentError);
        });

        it('should propagate store faults instead of returning no results', async () => {
            const unavailable = new RecommendationService(failingStore(new StoreUnavailableError('down')), mockLogger);
            const slow = new RecommendationService(failingStore(new QueryTimeoutError('slow')), mockLogger);

            await expect(unavailable.recommend('Inception', 'combined', 5)).rejects.toBeInstanceOf(StoreUnavailableError);
            await expect(slow.recommend('Inception', 'genre', 5)).rejects.toBeInstanceOf(QueryTimeoutError);
        });

        it('should pass the configured timeout to the store', async () => {
            const findOverlap = vi.fn().mockResolvedValue([]);
            const timed = new RecommendationService({ ...failingStore(new Error('unused')), findOverlap }, mockLogger, { timeoutMs: 750 });

            await timed.recommend('Inception', 'genre', 5);

            expect(findOverlap).toHaveBeenCalledWith('Inception', expect.objectContaining({ relationship: 'IN_GENRE' }), { timeoutMs: 750 });
        });

        it('should log a summary of each recommendation', async () => {
            await service.recommend('Inception', 'combined', 5);

            expect(mockLogger.info).toHaveBeenCalledWith(expect.stringContaining('Recommended 2/2 movies for "Inception" (combined)'));
        });
    });

    it('should refuse an invalid default limit or policy', () => {
        expect(() => new RecommendationService(store, mockLogger, { defaultLimit: 0 })).toThrow(InvalidArgumentError);
        expect(() => new RecommendationService(store, mockLogger, { policy: { genreWeight: -2, actorWeight: 3 } }))
            .toThrow(InvalidArgumentError);
    });

    describe('catalogue', () => {
        it('should build the neighbourhood graph of a movie', async () => {
            const neighbourhood = await service.getNeighbourhood('Titanic');

            expect(neighbourhood).toEqual({
                nodes: [
                    { id: 'movie:Titanic', label: 'Titanic', kind: 'movie' },
                    { id: 'director:James Cameron', label: 'James Cameron', kind: 'director' },
                    { id: 'actor:Kate Winslet', label: 'Kate Winslet', kind: 'actor' },
                    { id: 'actor:Leonardo DiCaprio', label: 'Leonardo DiCaprio', kind: 'actor' },
                    { id: 'genre:Drama', label: 'Drama', kind: 'genre' },
                    { id: 'genre:Romance', label: 'Romance', kind: 'genre' },
                ],
                edges: [
                    { source: 'director:James Cameron', target: 'movie:Titanic', relationship: 'DIRECTED' },
                    { source: 'actor:Kate Winslet', target: 'movie:Titanic', relationship: 'ACTED_IN' },
                    { source: 'actor:Leonardo DiCaprio', target: 'movie:Titanic', relationship: 'ACTED_IN' },
                    { source: 'movie:Titanic', target: 'genre:Drama', relationship: 'IN_GENRE' },
                    { source: 'movie:Titanic', target: 'genre:Romance', relationship: 'IN_GENRE' },
                ],
            });
        });

        it('should return null for the neighbourhood of an unknown movie', async () => {
            expect(await service.getNeighbourhood('NoSuchMovie')).toBeNull();
            expect(mockLogger.warn).toHaveBeenCalledWith('Movie "NoSuchMovie" not found');
        });

        it('should list a director filmography', async () => {
            const entries = await service.getFilmography('Christopher Nolan', 'director');

            expect(entries.map(entry => entry.title)).toEqual(['Interstellar', 'Inception']);
        });

        it('should default filmography to the actor role', async () => {
            const entries = await service.getFilmography('Leonardo DiCaprio');

            expect(entries.map(entry => entry.title)).toEqual(['Inception', 'Titanic']);
        });

        it('should reject an empty person name', async () => {
            await expect(service.getFilmography('', 'actor')).rejects.toBeInstanceOf(InvalidArgumentError);
        });

        it('should report statistics and list movies', async () => {
            expect((await service.getStatistics()).totalMovies).toBe(4);
            expect(await service.listMovies()).toHaveLength(4);
        });
    });

    describe('checkHealth', () => {
        it('should report a reachable store as healthy', async () => {
            expect(await service.checkHealth()).toEqual({ status: 'healthy', store: 'in-memory' });
        });

        it('should report a failing store as unhealthy without throwing', async () => {
            const down = new RecommendationService(failingStore(new StoreUnavailableError('connection refused')), mockLogger);

            expect(await down.checkHealth()).toEqual({ status: 'unhealthy', store: 'failing', error: 'connection refused' });
            expect(mockLogger.warn).toHaveBeenCalledWith('Health check failed: connection refused', { kind: 'StoreUnavailable' });
        });
    });
});
