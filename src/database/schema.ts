// Node labels of the movie knowledge graph
export const NODE_LABELS = [
    'Movie',  // identity: title
    'Person', // identity: name
    'Genre',  // identity: name
] as const;

// Relationship types of the movie knowledge graph
export const RELATIONSHIP_TYPES = [
    'ACTED_IN', // Person -> Movie
    'DIRECTED', // Person -> Movie
    'IN_GENRE', // Movie -> Genre
] as const;

export type NodeLabel = (typeof NODE_LABELS)[number];
export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

/** Property holding each label's unique identity. */
export const IDENTITY_KEYS: Readonly<Record<NodeLabel, 'title' | 'name'>> = {
    Movie: 'title',
    Person: 'name',
    Genre: 'name',
};

export function isNodeLabel(value: string): value is NodeLabel {
    return NODE_LABELS.some(label => label === value);
}

export function isRelationshipType(value: string): value is RelationshipType {
    return RELATIONSHIP_TYPES.some(type => type === value);
}
