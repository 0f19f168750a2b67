import { ServiceContainer } from '../services/index.js';
import { ExportRequest } from '../services/exportService.js';
import { ExportOutcome } from '../types/export.js';

export class ExportController {
    constructor(private services: ServiceContainer) {}

    exportBook = async (book: string, request: ExportRequest): Promise<ExportOutcome[]> => {
        const outcomes = await this.services.exporter.exportBook(book, request);
        for (const outcome of outcomes) {
            console.log(`${outcome.format.toUpperCase()}: ${outcome.path}`);
        }
        return outcomes;
    };
}
