export function similarity(vec1: number[], vec2: number[]): number {
    if (vec1.length !== vec2.length) {
        throw new Error('Vectors must be of same length');
    }

    const dotProduct = vec1.reduce((acc, val, i) => acc + val * vec2[i], 0);
    const mag1 = Math.sqrt(vec1.reduce((acc, val) => acc + val * val, 0));
    const mag2 = Math.sqrt(vec2.reduce((acc, val) => acc + val * val, 0));

    if (mag1 === 0 || mag2 === 0) return 0;
    return dotProduct / (mag1 * mag2);
}

/**
 * Top-k items by descending cosine similarity to the query. Equal scores keep
 * their input order.
 */
export function rankBySimilarity<T>(
    queryEmbedding: number[],
    items: Array<{ item: T; embedding: number[] }>,
    k: number
): Array<{ item: T; score: number }> {
    if (k <= 0) return [];

    return items
        .map(({ item, embedding }, index) => ({
            item,
            index,
            score: similarity(queryEmbedding, embedding)
        }))
        .sort((a, b) => b.score - a.score || a.index - b.index)
        .slice(0, k)
        .map(({ item, score }) => ({ item, score }));
}
