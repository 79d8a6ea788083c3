import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors.js';

const snapshotMovieSchema = z.object({
    title: z.string().min(1),
    year: z.number().int().nullable().default(null),
    rating: z.number().nullable().default(null),
    tagline: z.string().nullable().default(null),
    description: z.string().nullable().default(null),
    genres: z.array(z.string().min(1)).default([]),
    cast: z.array(z.string().min(1)).default([]),
    directors: z.array(z.string().min(1)).default([]),
});

export const graphSnapshotSchema = z.object({
    movies: z.array(snapshotMovieSchema),
}).superRefine((snapshot, ctx) => {
    const seen = new Set<string>();
    snapshot.movies.forEach((movie, index) => {
        if (seen.has(movie.title)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['movies', index, 'title'],
                message: `Duplicate movie title: ${movie.title}`,
            });
        }
        seen.add(movie.title);
    });
});

/** Snapshot as written in JSON; optional fields may be left out. */
export type GraphSnapshotInput = z.input<typeof graphSnapshotSchema>;
export type GraphSnapshot = z.output<typeof graphSnapshotSchema>;

export function parseGraphSnapshot(data: unknown, source: string = 'snapshot'): GraphSnapshot {
    const parsed = graphSnapshotSchema.safeParse(data);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid graph snapshot in ${source}: ${problems}`);
    }
    return parsed.data;
}

export async function loadGraphSnapshot(filePath: string): Promise<GraphSnapshot> {
    let raw: string;
    try {
        raw = await readFile(filePath, 'utf-8');
    } catch (error: unknown) {
        throw new ConfigurationError(`Cannot read graph snapshot ${filePath}: ${errorMessage(error)}`, { originalError: error });
    }

    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error: unknown) {
        throw new ConfigurationError(`Graph snapshot ${filePath} is not valid JSON: ${errorMessage(error)}`, { originalError: error });
    }
    return parseGraphSnapshot(data, filePath);
}
