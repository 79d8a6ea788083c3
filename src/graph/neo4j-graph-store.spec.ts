// src/graph/neo4j-graph-store.spec.ts
import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Neo4jGraphStore, readNumber, readStringList } from './neo4j-graph-store.js';
import { Neo4jClient } from '../database/neo4j-client.js';
import { StoreUnavailableError } from '../utils/errors.js';

describe('Neo4jGraphStore', () => {
    let initializeDriver: ReturnType<typeof vi.fn>;
    let runTransaction: ReturnType<typeof vi.fn>;
    let store: Neo4jGraphStore;

    beforeEach(() => {
        initializeDriver = vi.fn().mockResolvedValue(undefined);
        runTransaction = vi.fn();
        const mockClient = { initializeDriver, runTransaction } as unknown as Neo4jClient;
        store = new Neo4jGraphStore(mockClient);
    });

    describe('connection', () => {
        it('should connect with the query context before reading', async () => {
            runTransaction.mockResolvedValue([{ ok: 1 }]);

            await store.ping({ timeoutMs: 100 });

            expect(initializeDriver).toHaveBeenCalledWith('GraphStore-Ping');
            expect(runTransaction).toHaveBeenCalledWith(expect.any(String), {}, 'READ', 'GraphStore-Ping', { timeoutMs: 100 });
        });

        it('should report an unreachable server without running the query', async () => {
            initializeDriver.mockRejectedValue(new StoreUnavailableError('[GraphStore-Ping] connection refused'));

            await expect(store.ping()).rejects.toBeInstanceOf(StoreUnavailableError);
            expect(runTransaction).not.toHaveBeenCalled();
        });

        it('should try to connect again on the next call', async () => {
            initializeDriver.mockRejectedValueOnce(new StoreUnavailableError('down'));
            runTransaction.mockResolvedValue([]);

            await expect(store.listMovies()).rejects.toBeInstanceOf(StoreUnavailableError);
            await expect(store.listMovies()).resolves.toEqual([]);
            expect(initializeDriver).toHaveBeenCalledTimes(2);
        });
    });

    describe('findOverlap', () => {
        it('should pass the title as a parameter and read overlap rows', async () => {
            runTransaction.mockResolvedValue([
                { title: 'Interstellar', year: 2014, rating: 8.7, tagline: null, sharedCount: 1, sharedNames: ['Sci-Fi'] },
            ]);

            const rows = await store.findOverlap(
                'Inception',
                { relationship: 'IN_GENRE', direction: 'OUTGOING', sharedLabel: 'Genre' },
                { timeoutMs: 250 },
            );

            expect(rows).toEqual([
                {
                    movie: { title: 'Interstellar', year: 2014, rating: 8.7, tagline: null },
                    sharedCount: 1,
                    sharedNames: ['Sci-Fi'],
                },
            ]);
            expect(runTransaction).toHaveBeenCalledWith(
                expect.stringContaining('(shared:Genre)'),
                { title: 'Inception' },
                'READ',
                'GraphStore-Overlap-IN_GENRE',
                { timeoutMs: 250 },
            );
        });

        it('should drop the reference movie and zero counts', async () => {
            runTransaction.mockResolvedValue([
                { title: 'Inception', sharedCount: 2, sharedNames: ['Sci-Fi'] },
                { title: 'Titanic', sharedCount: 0, sharedNames: [] },
                { title: 'Memento', sharedCount: 1, sharedNames: ['Thriller'] },
            ]);

            const rows = await store.findOverlap(
                'Inception',
                { relationship: 'IN_GENRE', direction: 'OUTGOING', sharedLabel: 'Genre' },
            );

            expect(rows.map(row => row.movie.title)).toEqual(['Memento']);
        });

        it('should convert neo4j Integer values to numbers', async () => {
            runTransaction.mockResolvedValue([
                { title: 'Titanic', year: { toNumber: () => 1997 }, sharedCount: { toNumber: () => 1 }, sharedNames: ['Leonardo DiCaprio'] },
            ]);

            const rows = await store.findOverlap(
                'Inception',
                { relationship: 'ACTED_IN', direction: 'INCOMING', sharedLabel: 'Person' },
            );

            expect(rows[0].movie.year).toBe(1997);
            expect(rows[0].sharedCount).toBe(1);
        });

        it('should propagate store failures instead of returning no rows', async () => {
            runTransaction.mockRejectedValue(new StoreUnavailableError('down'));

            await expect(store.findOverlap(
                'Inception',
                { relationship: 'IN_GENRE', direction: 'OUTGOING', sharedLabel: 'Genre' },
            )).rejects.toBeInstanceOf(StoreUnavailableError);
        });
    });

    describe('getMovieDetails', () => {
        it('should return null when the movie does not exist', async () => {
            runTransaction.mockResolvedValue([]);

            expect(await store.getMovieDetails('NoSuchMovie')).toBeNull();
        });

        it('should drop null names collected from optional matches', async () => {
            runTransaction.mockResolvedValue([
                {
                    title: 'Orphan Reel',
                    year: null,
                    rating: null,
                    tagline: null,
                    description: null,
                    directors: [],
                    cast: [null],
                    genres: ['Drama', null],
                },
            ]);

            expect(await store.getMovieDetails('Orphan Reel')).toEqual({
                title: 'Orphan Reel',
                year: null,
                rating: null,
                tagline: null,
                description: null,
                directors: [],
                cast: [],
                genres: ['Drama'],
            });
        });
    });

    describe('getFilmography', () => {
        it('should query by name with the role in the log context', async () => {
            runTransaction.mockResolvedValue([
                { title: 'Interstellar', year: 2014, rating: 8.7, tagline: null, genres: ['Sci-Fi', 'Drama'] },
            ]);

            const entries = await store.getFilmography('Christopher Nolan', 'director');

            expect(entries).toEqual([
                { title: 'Interstellar', year: 2014, rating: 8.7, tagline: null, genres: ['Drama', 'Sci-Fi'] },
            ]);
            expect(runTransaction).toHaveBeenCalledWith(
                expect.stringContaining('[:DIRECTED]'),
                { name: 'Christopher Nolan' },
                'READ',
                'GraphStore-Filmography-director',
                {},
            );
        });
    });

    describe('getStatistics', () => {
        it('should default missing counts to zero', async () => {
            runTransaction.mockResolvedValue([{ totalMovies: 3, totalPeople: { toNumber: () => 5 } }]);

            expect(await store.getStatistics()).toEqual({
                totalMovies: 3,
                totalPeople: 5,
                totalGenres: 0,
                totalRelationships: 0,
            });
        });
    });
});

describe('row readers', () => {
    it('readNumber should accept numbers, bigints and Integer-like values', () => {
        expect(readNumber(4)).toBe(4);
        expect(readNumber(BigInt(7))).toBe(7);
        expect(readNumber({ toNumber: () => 9 })).toBe(9);
        expect(readNumber('9')).toBeNull();
        expect(readNumber(Number.NaN)).toBeNull();
    });

    it('readStringList should dedupe and sort by code unit', () => {
        expect(readStringList(['b', 'B', 'a', 'b', 3])).toEqual(['B', 'a', 'b']);
        expect(readStringList(null)).toEqual([]);
    });
});
