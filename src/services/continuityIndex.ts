import type { EmbeddingsInterface } from '@langchain/core/embeddings';
import { connectDB } from '../config/database.js';
import ContinuityFactModel from '../models/continuityFactModel.js';
import { ContinuityFactSchema, FactCategorySchema, FactSourceSchema } from '../schemas/continuityFactSchema.js';
import { ContinuityFact, ContinuityIndex, FactCategory, FactSource } from '../types/continuity.js';
import { AppError, InputError, StorageError, errorMessage } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { rankBySimilarity } from '../utils/vectorUtils.js';

/** A fact document as read back with `lean()`; older rows may carry values the enums no longer list. */
export interface StoredFact {
    _id: string;
    text: string;
    category: string;
    book: string;
    source: string;
    sourceLabel?: string | null;
    chapter?: number | null;
    scene?: number | null;
    embedding: number[];
    embeddingModel: string;
    createdAt?: Date | null;
}

export function toContinuityFact(doc: StoredFact): ContinuityFact {
    return {
        id: doc._id,
        text: doc.text,
        category: FactCategorySchema.catch(FactCategory.WORLD).parse(doc.category),
        book: doc.book,
        source: FactSourceSchema.catch(FactSource.CONTINUITY_NOTE).parse(doc.source),
        sourceLabel: doc.sourceLabel ?? undefined,
        chapter: doc.chapter ?? undefined,
        scene: doc.scene ?? undefined,
        createdAt: doc.createdAt ?? undefined
    };
}

/**
 * Top-k stored facts by similarity to the query embedding. Facts whose vectors
 * have another dimension (a different embedding model) cannot be compared and
 * are counted as skipped.
 */
export function rankStoredFacts(
    queryEmbedding: number[],
    docs: StoredFact[],
    k: number
): { facts: ContinuityFact[]; skipped: number } {
    const candidates = docs
        .filter(doc => doc.embedding.length === queryEmbedding.length)
        .map(doc => ({ item: doc, embedding: doc.embedding }));

    const facts = rankBySimilarity(queryEmbedding, candidates, k)
        .map(({ item, score }) => ({ ...toContinuityFact(item), score }));
    return { facts, skipped: docs.length - candidates.length };
}

export interface MongoIndexOptions {
    connectTimeoutMs?: number;
}

/**
 * Continuity facts in MongoDB with their embedding vectors. Ranking is cosine
 * similarity over the book's facts, computed in process.
 */
export class MongoContinuityIndex implements ContinuityIndex {
    constructor(
        private uri: string,
        private embeddings: EmbeddingsInterface,
        private embeddingModel: string,
        private options: MongoIndexOptions = {}
    ) {}

    get description(): string {
        return `mongodb (${this.embeddingModel} embeddings)`;
    }

    async index(fact: ContinuityFact): Promise<string> {
        const parsed = ContinuityFactSchema.safeParse(fact);
        if (!parsed.success) {
            throw new InputError(`Invalid continuity fact: ${parsed.error.issues.map(i => i.message).join('; ')}`);
        }
        const validated = parsed.data;

        const [embedding] = await this.embed(() => this.embeddings.embedDocuments([validated.text]));
        await this.connect();

        try {
            const doc = await ContinuityFactModel.create({
                ...validated,
                embedding,
                embeddingModel: this.embeddingModel
            });
            logger.debug('[MEMORY] Indexed fact', { id: doc._id, category: validated.category, book: validated.book });
            return doc._id;
        } catch (error) {
            throw new StorageError(`Failed to index continuity fact: ${errorMessage(error)}`);
        }
    }

    async query(context: string, book: string, k: number): Promise<ContinuityFact[]> {
        if (k <= 0) return [];
        await this.connect();

        let docs: StoredFact[];
        try {
            docs = await ContinuityFactModel.find({ book }).sort({ createdAt: 1 }).lean<StoredFact[]>();
        } catch (error) {
            throw new StorageError(`Continuity query failed: ${errorMessage(error)}`);
        }
        if (docs.length === 0) return [];

        const queryEmbedding = await this.embed(() => this.embeddings.embedQuery(context));
        const { facts, skipped } = rankStoredFacts(queryEmbedding, docs, k);
        if (skipped > 0) {
            logger.warn('[MEMORY] Skipped facts embedded with a different model', { skipped });
        }
        return facts;
    }

    async count(book?: string): Promise<number> {
        await this.connect();
        try {
            return await ContinuityFactModel.countDocuments(book ? { book } : {});
        } catch (error) {
            throw new StorageError(`Failed to count continuity facts: ${errorMessage(error)}`);
        }
    }

    private connect(): Promise<void> {
        return connectDB(this.uri, this.options.connectTimeoutMs);
    }

    private async embed<T>(call: () => Promise<T>): Promise<T> {
        try {
            return await call();
        } catch (error) {
            if (error instanceof AppError) throw error;
            throw new StorageError(`Embedding backend unreachable (${this.embeddingModel}): ${errorMessage(error)}`);
        }
    }
}
