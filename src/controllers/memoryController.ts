import { ServiceContainer } from '../services/index.js';
import { FactCategorySchema } from '../schemas/continuityFactSchema.js';
import { FactCategory } from '../types/continuity.js';
import { InputError } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

export class MemoryController {
    constructor(private services: ServiceContainer) {}

    /** Load a book's story bible into the continuity store. */
    memoryInit = async (book: string): Promise<number> => {
        const { layout, continuity } = this.services;
        const bibleDir = layout.storyBibleDir(book);

        logger.info(`[MEMORY] Initializing memory for "${book}"`, { bibleDir });
        const added = await continuity.ingestStoryBible(book, bibleDir);
        const stats = await continuity.stats();

        console.log(`Memory initialized: ${added} facts added for "${book}"`);
        console.log(`Total entries: ${stats.totalEntries}`);
        return added;
    };

    note = async (book: string, category: string, text: string): Promise<string> => {
        const parsed = FactCategorySchema.safeParse(category.trim().toLowerCase());
        if (!parsed.success) {
            throw new InputError(
                `Unknown category "${category}" (expected one of ${Object.values(FactCategory).join(', ')})`
            );
        }
        if (!text.trim()) {
            throw new InputError('Continuity note text is empty');
        }

        const id = await this.services.continuity.addContinuityNote(text.trim(), parsed.data, book);
        console.log(`Continuity note added (${parsed.data}): ${id}`);
        return id;
    };
}
