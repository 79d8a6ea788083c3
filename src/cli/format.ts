// Plain-text renderings for the CLI. JSON output bypasses these.

import { FilmographyEntry, GraphStats, Movie, MovieDetails } from '../graph/types.js';
import { HealthStatus, Neighbourhood } from '../recommendation/recommendation-service.js';
import { RecommendationView, Strategy } from '../recommendation/types.js';

function yearSuffix(year: number | null): string {
    return year === null ? '' : ` (${year})`;
}

function listOrDash(values: string[]): string {
    return values.length > 0 ? values.join(', ') : '-';
}

export function formatRecommendations(title: string, strategy: Strategy, views: RecommendationView[]): string {
    if (views.length === 0) {
        return `No recommendations for "${title}" (${strategy}).`;
    }
    const lines = [`Recommendations for "${title}" (${strategy}):`];
    views.forEach((view, index) => {
        lines.push(
            `${index + 1}. ${view.title}${yearSuffix(view.year)} score=${view.compositeScore} ` +
            `genres=${view.sharedGenreCount} actors=${view.sharedActorCount}`
        );
        if (view.sharedGenres.length > 0) {
            lines.push(`   shared genres: ${view.sharedGenres.join(', ')}`);
        }
        if (view.sharedActors.length > 0) {
            lines.push(`   shared actors: ${view.sharedActors.join(', ')}`);
        }
    });
    return lines.join('\n');
}

export function formatMovieList(movies: Movie[]): string {
    if (movies.length === 0) {
        return 'No movies in the graph.';
    }
    return movies
        .map(movie => `${movie.title}${yearSuffix(movie.year)}${movie.rating === null ? '' : ` [${movie.rating}]`}`)
        .join('\n');
}

export function formatMovieDetails(details: MovieDetails): string {
    const lines = [`${details.title}${yearSuffix(details.year)}`];
    if (details.tagline) {
        lines.push(`  "${details.tagline}"`);
    }
    if (details.rating !== null) {
        lines.push(`  Rating:    ${details.rating}`);
    }
    lines.push(`  Directors: ${listOrDash(details.directors)}`);
    lines.push(`  Cast:      ${listOrDash(details.cast)}`);
    lines.push(`  Genres:    ${listOrDash(details.genres)}`);
    if (details.description) {
        lines.push('', details.description);
    }
    return lines.join('\n');
}

export function formatFilmography(name: string, role: string, entries: FilmographyEntry[]): string {
    if (entries.length === 0) {
        return `No movies found for ${name} as ${role}.`;
    }
    const lines = [`${name} (${role}):`];
    for (const entry of entries) {
        lines.push(`  ${entry.title}${yearSuffix(entry.year)} - ${listOrDash(entry.genres)}`);
    }
    return lines.join('\n');
}

export function formatNeighbourhood(neighbourhood: Neighbourhood): string {
    return neighbourhood.edges
        .map(edge => `${edge.source} -[:${edge.relationship}]-> ${edge.target}`)
        .join('\n');
}

export function formatStatistics(stats: GraphStats): string {
    return [
        `Movies:        ${stats.totalMovies}`,
        `People:        ${stats.totalPeople}`,
        `Genres:        ${stats.totalGenres}`,
        `Relationships: ${stats.totalRelationships}`,
    ].join('\n');
}

export function formatHealth(health: HealthStatus): string {
    const line = `${health.store}: ${health.status}`;
    return health.error ? `${line} (${health.error})` : line;
}

/** JSON (pretty-printed) when requested, otherwise the text rendering. */
export function render<T>(value: T, json: boolean | undefined, toText: (value: T) => string): string {
    return json ? JSON.stringify(value, null, 2) : toText(value);
}
