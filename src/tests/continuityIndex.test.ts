import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import mongoose from 'mongoose';
import { MongoContinuityIndex, StoredFact, rankStoredFacts, toContinuityFact } from '../services/continuityIndex.js';
import { ContinuityFact, FactCategory, FactSource } from '../types/continuity.js';
import { InputError, StorageError } from '../utils/errorHandler.js';

// Nothing listens on port 1
const UNREACHABLE_URI = 'mongodb://127.0.0.1:1/scenewright-test';

class FixedEmbeddings implements EmbeddingsInterface {
    calls = 0;
    failWith: Error | null = null;

    async embedDocuments(documents: string[]): Promise<number[][]> {
        this.calls++;
        if (this.failWith) throw this.failWith;
        return documents.map(() => [1, 0]);
    }

    async embedQuery(): Promise<number[]> {
        this.calls++;
        if (this.failWith) throw this.failWith;
        return [1, 0];
    }
}

const fact: ContinuityFact = {
    text: 'Mara carries the brass key.',
    category: FactCategory.ITEM,
    book: 'Novel',
    source: FactSource.CONTINUITY_NOTE
};

function storedFact(id: string, embedding: number[], overrides: Partial<StoredFact> = {}): StoredFact {
    return {
        _id: id,
        text: `Fact ${id}`,
        category: FactCategory.WORLD,
        book: 'Novel',
        source: FactSource.STORY_BIBLE,
        embedding,
        embeddingModel: 'test-embed',
        createdAt: new Date(0),
        ...overrides
    };
}

afterAll(async () => {
    await mongoose.disconnect();
});

describe('MongoContinuityIndex', () => {
    let embeddings: FixedEmbeddings;
    let index: MongoContinuityIndex;

    beforeEach(() => {
        embeddings = new FixedEmbeddings();
        index = new MongoContinuityIndex(UNREACHABLE_URI, embeddings, 'test-embed', { connectTimeoutMs: 200 });
    });

    it('rejects an invalid fact before embedding or connecting', async () => {
        await expect(index.index({ ...fact, text: '   ' })).rejects.toThrow(InputError);
        await expect(index.index({ ...fact, scene: 2 })).rejects.toThrow('scene provenance requires a chapter');
        expect(embeddings.calls).toBe(0);
    });

    it('raises StorageError when the embedding backend is down', async () => {
        embeddings.failWith = new Error('connect ECONNREFUSED 127.0.0.1:11434');

        const error = await index.index(fact).catch((e: unknown) => e);
        expect(error).toBeInstanceOf(StorageError);
        expect(error).toHaveProperty(
            'message',
            'Embedding backend unreachable (test-embed): connect ECONNREFUSED 127.0.0.1:11434'
        );
    });

    it('raises StorageError when the store is unreachable', async () => {
        await expect(index.index(fact)).rejects.toThrow(StorageError);
        await expect(index.query('Mara at the gate', 'Novel', 3)).rejects.toThrow(StorageError);
        await expect(index.count('Novel')).rejects.toThrow(`Cannot reach the continuity store at ${UNREACHABLE_URI}`);
    });

    it('answers an empty query for k = 0 without connecting', async () => {
        await expect(index.query('Mara at the gate', 'Novel', 0)).resolves.toEqual([]);
        expect(embeddings.calls).toBe(0);
    });

    it('describes its backend', () => {
        expect(index.description).toBe('mongodb (test-embed embeddings)');
    });
});

describe('rankStoredFacts', () => {
    it('ranks by similarity and skips vectors of another dimension', () => {
        const docs = [
            storedFact('far', [0, 1]),
            storedFact('old-model', [1, 0, 0]),
            storedFact('near', [1, 0])
        ];

        const { facts, skipped } = rankStoredFacts([1, 0], docs, 5);

        expect(skipped).toBe(1);
        expect(facts.map(f => [f.id, f.score])).toEqual([['near', 1], ['far', 0]]);
    });

    it('keeps only the top k', () => {
        const docs = [storedFact('a', [1, 0]), storedFact('b', [1, 1]), storedFact('c', [0, 1])];
        expect(rankStoredFacts([1, 0], docs, 1).facts.map(f => f.id)).toEqual(['a']);
    });
});

describe('toContinuityFact', () => {
    it('maps provenance fields', () => {
        const doc = storedFact('f1', [1, 0], {
            category: FactCategory.PLOT,
            source: FactSource.SCENE_SUMMARY,
            sourceLabel: 'ch01_sc02_summary_v1.md',
            chapter: 1,
            scene: 2
        });

        expect(toContinuityFact(doc)).toEqual({
            id: 'f1',
            text: 'Fact f1',
            category: FactCategory.PLOT,
            book: 'Novel',
            source: FactSource.SCENE_SUMMARY,
            sourceLabel: 'ch01_sc02_summary_v1.md',
            chapter: 1,
            scene: 2,
            createdAt: new Date(0)
        });
    });

    it('falls back for categories and sources it does not know', () => {
        const doc = storedFact('f2', [1, 0], { category: 'weather', source: 'rumour', sourceLabel: null, chapter: null });

        expect(toContinuityFact(doc)).toMatchObject({
            category: FactCategory.WORLD,
            source: FactSource.CONTINUITY_NOTE,
            sourceLabel: undefined,
            chapter: undefined
        });
    });
});
