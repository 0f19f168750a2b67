import * as fs from 'fs/promises';
import * as path from 'path';
import { ExportFormat, ExportFormatSchema, Settings } from '../config/settings.js';
import { DocumentConverter, ExportMetadata, ExportOutcome } from '../types/export.js';
import { ExportError, InputError, errorMessage } from '../utils/errorHandler.js';
import { listFiles, nextVersionPath, pathExists } from '../utils/fileStore.js';
import { logger } from '../utils/logger.js';
import { ProjectLayout, parseChapterFilename } from '../utils/projectPaths.js';
import { sanitizeFilename } from '../utils/slugUtils.js';
import { formatDuration } from '../utils/timeUtils.js';
import { buildPandocArgs } from './pandocConverter.js';

export interface ExportRequest {
    title?: string;
    author?: string;
    formats?: readonly string[];
}

/** Latest version of every assembled chapter, in chapter order. */
export async function findChapterFiles(chaptersDir: string): Promise<string[]> {
    const latest = new Map<number, { version: number; name: string }>();
    for (const name of await listFiles(chaptersDir)) {
        const info = parseChapterFilename(name);
        if (!info) continue;
        const current = latest.get(info.chapter);
        if (!current || info.version > current.version) {
            latest.set(info.chapter, { version: info.version, name });
        }
    }
    return [...latest.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, { name }]) => path.join(chaptersDir, name));
}

/**
 * Resolve requested format names. `all` (or nothing) means the configured
 * formats; order follows first mention, duplicates collapse.
 */
export function resolveFormats(requested: readonly string[], configured: readonly ExportFormat[]): ExportFormat[] {
    const names = requested.map(name => name.trim().toLowerCase()).filter(Boolean);
    const expanded = names.length === 0 ? [...configured] : names.flatMap(name => name === 'all' ? [...configured] : [name]);

    const formats: ExportFormat[] = [];
    for (const name of expanded) {
        const parsed = ExportFormatSchema.safeParse(name);
        if (!parsed.success) {
            throw new InputError(`Unsupported export format: ${name} (expected epub, pdf, docx, html or all)`);
        }
        if (!formats.includes(parsed.data)) formats.push(parsed.data);
    }
    return formats;
}

export class ExportService {
    constructor(
        private settings: Settings,
        private layout: ProjectLayout,
        private converter: DocumentConverter
    ) {}

    async exportBook(book: string, request: ExportRequest = {}): Promise<ExportOutcome[]> {
        const formats = resolveFormats(request.formats ?? [], this.settings.export.formats);
        const chapters = await findChapterFiles(this.layout.chaptersDir(book));
        if (chapters.length === 0) {
            throw new ExportError(`No assembled chapters found for "${book}"; run assemble first`);
        }

        const metadata: ExportMetadata = {
            title: request.title ?? book,
            author: request.author ?? this.settings.project.author
        };
        const exportsDir = this.layout.exportsDir(book);
        const cover = path.join(exportsDir, 'cover.jpg');
        const coverImage = (await pathExists(cover)) ? cover : undefined;

        logger.info(`[EXPORT] Exporting ${chapters.length} chapters of "${metadata.title}"`, { formats });

        const outcomes: ExportOutcome[] = [];
        for (const format of formats) {
            outcomes.push(await this.exportFormat(book, chapters, format, metadata, coverImage));
        }
        return outcomes;
    }

    private async exportFormat(
        book: string,
        chapters: string[],
        format: ExportFormat,
        metadata: ExportMetadata,
        coverImage: string | undefined
    ): Promise<ExportOutcome> {
        const exportsDir = this.layout.exportsDir(book);
        await fs.mkdir(exportsDir, { recursive: true });

        const ext = `.${format}`;
        const target = await nextVersionPath(exportsDir, sanitizeFilename(book), ext);
        // Keep the extension; pandoc picks the writer from it
        const tmpPath = path.join(exportsDir, `.${path.basename(target, ext)}.tmp-${process.pid}${ext}`);

        const args = buildPandocArgs(chapters, tmpPath, format, {
            metadata,
            toc: this.settings.export.toc,
            coverImage,
            pdf: this.settings.export.pdf
        });

        const started = Date.now();
        try {
            const result = await this.converter.convert({ inputs: chapters, output: tmpPath, format, args });
            if (result.exitCode !== 0) {
                throw new ExportError(
                    `pandoc exited with status ${result.exitCode} for ${format}${result.stderr ? `: ${result.stderr}` : ''}`,
                    { format, exitCode: result.exitCode }
                );
            }
            await fs.rename(tmpPath, target);
        } catch (error) {
            await fs.rm(tmpPath, { force: true });
            if (error instanceof ExportError) throw error;
            throw new ExportError(`Export to ${format} failed: ${errorMessage(error)}`, { format });
        }

        logger.info(`[EXPORT] ${format.toUpperCase()} saved: ${target}`, { elapsed: formatDuration(Date.now() - started) });
        return { format, path: target };
    }
}
