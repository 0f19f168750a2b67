export enum FactCategory {
    CHARACTER = 'character',
    WORLD = 'world',
    ITEM = 'item',
    PLOT = 'plot',
    RULE = 'rule'
}

export enum FactSource {
    STORY_BIBLE = 'story_bible',
    CONTINUITY_NOTE = 'continuity_note',
    SCENE_SUMMARY = 'scene_summary'
}

export interface ContinuityFact {
    id?: string;
    text: string;
    category: FactCategory;
    book: string;
    source: FactSource;
    sourceLabel?: string;   // File or section the fact came from
    chapter?: number;
    scene?: number;
    createdAt?: Date;
    score?: number;         // Similarity to the query, set on query results
}

/**
 * Vector-backed fact storage. Facts are append-only; there is no update or
 * delete.
 */
export interface ContinuityIndex {
    readonly description: string;
    index(fact: ContinuityFact): Promise<string>;
    query(context: string, book: string, k: number): Promise<ContinuityFact[]>;
    count(book?: string): Promise<number>;
}

export interface ContinuityStats {
    totalEntries: number;
    backend: string;
}
