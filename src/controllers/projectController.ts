import * as fs from 'fs/promises';
import * as path from 'path';
import { MODEL_ROLES, ModelRole } from '../config/settings.js';
import { ServiceContainer } from '../services/index.js';
import { BUILTIN_PROMPTS_DIR } from '../services/promptTemplateService.js';
import { SceneStage } from '../types/scene.js';
import { errorMessage } from '../utils/errorHandler.js';
import { listFiles, pathExists, writeFileAtomic } from '../utils/fileStore.js';
import { logger } from '../utils/logger.js';
import { parseChapterFilename, parseSceneFilename } from '../utils/projectPaths.js';

const BIBLE_SKELETON: Record<string, string> = {
    'story_bible_master.md': [
        '# Story Bible',
        '',
        '## Premise',
        '',
        '## Characters',
        '',
        '## World',
        '',
        '## Timeline',
        '',
        '## Rules and Magic',
        ''
    ].join('\n'),
    'world_summary.md': '# World Summary\n',
    'magic_tech_systems.md': '# Magic and Technology\n'
};

export interface ModelCheck {
    role: ModelRole;
    model: string;
    fallback: boolean;
    available: boolean;
}

/** Ollama lists untagged models as `name:latest`. */
export function isModelAvailable(model: string, available: readonly string[]): boolean {
    return available.includes(model) || (!model.includes(':') && available.includes(`${model}:latest`));
}

export interface BookStatus {
    book: string;
    rawScenes: number;
    refinedScenes: number;
    finalScenes: number;
    chapters: number;
}

export class ProjectController {
    constructor(private services: ServiceContainer) {}

    /**
     * Create a book's directories and story bible skeleton and copy the
     * built-in prompts into the project. Existing files are left alone.
     */
    init = async (book: string): Promise<string[]> => {
        const { layout } = this.services;
        const created: string[] = [];

        for (const dir of [layout.promptsDir(), ...layout.bookDirectories(book)]) {
            await fs.mkdir(dir, { recursive: true });
        }

        for (const [fileName, content] of Object.entries(BIBLE_SKELETON)) {
            const target = path.join(layout.storyBibleDir(book), fileName);
            if (await pathExists(target)) continue;
            await writeFileAtomic(target, content);
            created.push(target);
        }

        for (const fileName of (await listFiles(BUILTIN_PROMPTS_DIR)).sort()) {
            const target = path.join(layout.promptsDir(), fileName);
            if (await pathExists(target)) continue;
            await fs.copyFile(path.join(BUILTIN_PROMPTS_DIR, fileName), target);
            created.push(target);
        }

        logger.info(`[PROJECT] Initialized "${book}"`, { bookDir: layout.bookDir(book), created: created.length });
        console.log(`Project "${book}" initialized at ${layout.bookDir(book)}`);
        console.log('\nNext steps:');
        console.log(`  1. Fill out ${path.join(layout.storyBibleDir(book), 'story_bible_master.md')}`);
        console.log(`  2. Add character bios under ${path.join(layout.storyBibleDir(book), 'characters')}`);
        console.log(`  3. Run: scenewright memory-init "${book}"`);
        console.log(`  4. Write scene outlines in ${layout.outlinesDir(book)}`);
        return created;
    };

    checkModels = async (): Promise<ModelCheck[]> => {
        const { settings, resolveBackend } = this.services;
        const listed = new Map<string, string[]>();
        const checks: ModelCheck[] = [];

        for (const role of MODEL_ROLES) {
            const baseUrl = settings.models[role].baseUrl ?? settings.server.baseUrl;
            let available = listed.get(baseUrl);
            if (!available) {
                available = await resolveBackend(role).listModels();
                listed.set(baseUrl, available);
            }

            const { model, fallbacks } = settings.models[role];
            checks.push({ role, model, fallback: false, available: isModelAvailable(model, available) });
            for (const fallback of fallbacks) {
                checks.push({ role, model: fallback, fallback: true, available: isModelAvailable(fallback, available) });
            }
        }

        for (const check of checks) {
            const label = check.fallback ? `${check.role} (fallback)` : check.role;
            console.log(`${label.padEnd(24)} ${check.model.padEnd(28)} ${check.available ? 'available' : 'NOT FOUND'}`);
        }

        const missing = [...new Set(checks.filter(check => !check.available).map(check => check.model))];
        if (missing.length > 0) {
            console.log('\nMissing models can be pulled with:');
            for (const model of missing) console.log(`  ollama pull ${model}`);
        }
        return checks;
    };

    status = async (): Promise<BookStatus[]> => {
        const { settings, layout, continuity, converter } = this.services;

        console.log(`Project:   ${settings.project.name}`);
        console.log(`Author:    ${settings.project.author}`);
        console.log(`Base path: ${settings.project.basePath}`);

        console.log('\nModels');
        for (const role of MODEL_ROLES) {
            const { model, fallbacks } = settings.models[role];
            console.log(`  ${role.padEnd(14)} ${model}${fallbacks.length ? ` (fallbacks: ${fallbacks.join(', ')})` : ''}`);
        }

        console.log('\nMemory');
        try {
            const stats = await continuity.stats();
            console.log(`  Backend: ${stats.backend}`);
            console.log(`  Entries: ${stats.totalEntries}`);
        } catch (error) {
            logger.debug('[MEMORY] Stats unavailable', errorMessage(error));
            console.log('  Entries: unavailable');
        }

        console.log('\nExport');
        console.log(`  Pandoc: ${(await converter.isAvailable()) ? 'installed' : 'not found'}`);

        const books: BookStatus[] = [];
        for (const book of await layout.listBooks()) {
            books.push(await this.bookStatus(book));
        }
        if (books.length > 0) {
            console.log('\nBooks');
            for (const b of books) {
                console.log(
                    `  ${b.book}: ${b.rawScenes} raw, ${b.refinedScenes} refined, ${b.finalScenes} final scenes; ${b.chapters} chapters`
                );
            }
        }
        return books;
    };

    info = async (): Promise<void> => {
        const { settings, layout } = this.services;
        console.log('scenewright: outline-first novel pipeline for local LLMs\n');
        console.log(`Inference server: ${settings.server.baseUrl} (${settings.server.api} API)`);
        console.log(`Memory store:     ${settings.memory.uri}`);
        console.log(`Project prompts:  ${layout.promptsDir()}`);
        console.log(`Built-in prompts: ${BUILTIN_PROMPTS_DIR}\n`);
        console.log('Workflow:');
        console.log('  1. scenewright init <book>');
        console.log('  2. Edit the story bible and outlines, then: scenewright memory-init <book>');
        console.log('  3. scenewright generate <book> <chapter> <scene> <outline>');
        console.log('  4. scenewright refine <book> <chapter> <scene> -i <scene file>');
        console.log('  5. scenewright assemble <book> <chapter>');
        console.log('  6. scenewright export <book>');
    };

    /** Distinct scenes per stage and distinct chapters, ignoring extra versions. */
    async bookStatus(book: string): Promise<BookStatus> {
        const { layout } = this.services;
        const countScenes = async (stage: SceneStage): Promise<number> => {
            const keys = new Set<string>();
            for (const name of await listFiles(layout.scenesDir(book, stage))) {
                const info = parseSceneFilename(name);
                if (info) keys.add(`${info.chapter}:${info.scene}`);
            }
            return keys.size;
        };

        const chapters = new Set<number>();
        for (const name of await listFiles(layout.chaptersDir(book))) {
            const info = parseChapterFilename(name);
            if (info) chapters.add(info.chapter);
        }

        return {
            book,
            rawScenes: await countScenes(SceneStage.RAW),
            refinedScenes: await countScenes(SceneStage.REFINED),
            finalScenes: await countScenes(SceneStage.FINAL),
            chapters: chapters.size
        };
    }
}
