// src/graph/cypher.ts
/**
 * Cypher for the read paths of the Neo4j graph store.
 */

import { IDENTITY_KEYS, isNodeLabel, isRelationshipType, RelationshipType } from '../database/schema.js';
import { InvalidArgumentError } from '../utils/errors.js';
import { OverlapPattern, PersonRole } from './types.js';

// =============================================================================
// Query Templates
// =============================================================================

export const QUERIES = {
    LIST_MOVIES: `
        MATCH (m:Movie)
        RETURN m.title as title,
               m.year as year,
               m.rating as rating,
               m.tagline as tagline
        ORDER BY m.title
    `,

    // OPTIONAL MATCH keeps movies without directors, cast or genres
    MOVIE_DETAILS: `
        MATCH (m:Movie {title: $title})
        OPTIONAL MATCH (director:Person)-[:DIRECTED]->(m)
        OPTIONAL MATCH (actor:Person)-[:ACTED_IN]->(m)
        OPTIONAL MATCH (m)-[:IN_GENRE]->(genre:Genre)
        RETURN m.title as title,
               m.year as year,
               m.rating as rating,
               m.tagline as tagline,
               m.description as description,
               collect(DISTINCT director.name) as directors,
               collect(DISTINCT actor.name) as cast,
               collect(DISTINCT genre.name) as genres
    `,

    STATISTICS: `
        CALL { MATCH (m:Movie) RETURN count(m) as totalMovies }
        CALL { MATCH (p:Person) RETURN count(p) as totalPeople }
        CALL { MATCH (g:Genre) RETURN count(g) as totalGenres }
        CALL { MATCH ()-[r]->() RETURN count(r) as totalRelationships }
        RETURN totalMovies, totalPeople, totalGenres, totalRelationships
    `,

    PING: `RETURN 1 as ok`,
} as const;

const ROLE_RELATIONSHIPS: Readonly<Record<PersonRole, RelationshipType>> = {
    actor: 'ACTED_IN',
    director: 'DIRECTED',
};

/**
 * Labels and relationship types cannot be query parameters, so anything
 * interpolated into Cypher is checked against the schema first.
 */
function assertPattern(pattern: OverlapPattern): void {
    if (!isRelationshipType(pattern.relationship)) {
        throw new InvalidArgumentError(`Unknown relationship type: ${pattern.relationship}`);
    }
    if (!isNodeLabel(pattern.sharedLabel) || pattern.sharedLabel === 'Movie') {
        throw new InvalidArgumentError(`Invalid shared node label: ${pattern.sharedLabel}`);
    }
}

/**
 * Builds the two-hop overlap query for a pattern.
 *
 * OUTGOING: (selected)-[:REL]->(shared)<-[:REL]-(other)
 * INCOMING: (selected)<-[:REL]-(shared)-[:REL]->(other)
 */
export function buildOverlapQuery(pattern: OverlapPattern): string {
    assertPattern(pattern);
    const rel = pattern.relationship;
    const label = pattern.sharedLabel;
    const key = IDENTITY_KEYS[label];
    const path = pattern.direction === 'OUTGOING'
        ? `(selected)-[:${rel}]->(shared:${label})<-[:${rel}]-(other:Movie)`
        : `(selected)<-[:${rel}]-(shared:${label})-[:${rel}]->(other:Movie)`;

    return `
        MATCH (selected:Movie {title: $title})
        MATCH ${path}
        WHERE other <> selected
        WITH other, count(DISTINCT shared) as sharedCount, collect(DISTINCT shared.${key}) as sharedNames
        RETURN other.title as title,
               other.year as year,
               other.rating as rating,
               other.tagline as tagline,
               sharedCount,
               sharedNames
        ORDER BY sharedCount DESC, title
    `;
}

export function buildFilmographyQuery(role: PersonRole): string {
    const rel = ROLE_RELATIONSHIPS[role];
    if (rel === undefined) {
        throw new InvalidArgumentError(`Unknown person role: ${String(role)}`);
    }
    return `
        MATCH (person:Person {name: $name})-[:${rel}]->(movie:Movie)
        OPTIONAL MATCH (movie)-[:IN_GENRE]->(genre:Genre)
        RETURN movie.title as title,
               movie.year as year,
               movie.rating as rating,
               movie.tagline as tagline,
               collect(DISTINCT genre.name) as genres
        ORDER BY coalesce(movie.year, -1) DESC, title
    `;
}
