import { ServiceContainer } from '../services/index.js';
import { AssembledChapter } from '../types/scene.js';

export class ChapterController {
    constructor(private services: ServiceContainer) {}

    assemble = async (book: string, chapter: number, smooth: boolean): Promise<AssembledChapter> => {
        const assembled = await this.services.assembler.assemble(book, chapter, { smooth });

        console.log(`Chapter ${chapter} assembled from scenes ${assembled.scenes.join(', ')}`);
        console.log(`Words: ${assembled.wordCount}${assembled.smoothed ? ' (smoothed)' : ''}`);
        console.log(`Saved: ${assembled.path}`);
        return assembled;
    };
}
