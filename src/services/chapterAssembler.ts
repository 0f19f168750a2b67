import * as fs from 'fs/promises';
import * as path from 'path';
import { Settings } from '../config/settings.js';
import { AssembledChapter, SceneStage } from '../types/scene.js';
import { MissingSceneError, errorMessage } from '../utils/errorHandler.js';
import { listFiles, writeVersioned } from '../utils/fileStore.js';
import { logger } from '../utils/logger.js';
import { ProjectLayout, chapterStem, parseSceneFilename } from '../utils/projectPaths.js';
import { countWords, stripFrontMatter } from '../utils/wordCount.js';
import { GenerationClient } from './generationClient.js';
import { PromptTemplateService } from './promptTemplateService.js';

export const SCENE_SEPARATOR = '\n\n---\n\n';

/** Latest final version of each scene in a chapter, keyed by scene number. */
export async function findFinalScenes(finalDir: string, chapter: number): Promise<Map<number, string>> {
    const latest = new Map<number, { version: number; name: string }>();
    for (const name of await listFiles(finalDir)) {
        const info = parseSceneFilename(name);
        if (!info || info.chapter !== chapter || info.label !== SceneStage.FINAL) continue;
        const current = latest.get(info.scene);
        if (!current || info.version > current.version) {
            latest.set(info.scene, { version: info.version, name });
        }
    }

    const paths = new Map<number, string>();
    for (const [scene, { name }] of latest) {
        paths.set(scene, path.join(finalDir, name));
    }
    return paths;
}

/**
 * Join scene bodies under a chapter heading. Output depends only on the
 * inputs, so re-running on unchanged scenes gives identical bytes.
 */
export function concatenateScenes(chapter: number, sceneBodies: readonly string[]): string {
    const bodies = sceneBodies.map(body => stripFrontMatter(body).trim());
    return `# Chapter ${chapter}\n\n${bodies.join(SCENE_SEPARATOR)}\n`;
}

export interface AssembleOptions {
    smooth?: boolean;
}

export class ChapterAssembler {
    constructor(
        private settings: Settings,
        private layout: ProjectLayout,
        private templates: PromptTemplateService,
        private client: GenerationClient
    ) {}

    async assemble(book: string, chapter: number, options: AssembleOptions = {}): Promise<AssembledChapter> {
        const finalDir = this.layout.scenesDir(book, SceneStage.FINAL);
        const scenePaths = await findFinalScenes(finalDir, chapter);

        if (scenePaths.size === 0) {
            throw new MissingSceneError(`No final scenes found for chapter ${chapter} in ${finalDir}`);
        }

        const highest = Math.max(...scenePaths.keys());
        const missing: number[] = [];
        for (let scene = 1; scene <= highest; scene++) {
            if (!scenePaths.has(scene)) missing.push(scene);
        }
        if (missing.length > 0) {
            throw new MissingSceneError(
                `Chapter ${chapter} is missing final scene(s): ${missing.join(', ')}`,
                missing
            );
        }

        const scenes = [...scenePaths.keys()].sort((a, b) => a - b);
        const bodies: string[] = [];
        for (const scene of scenes) {
            const scenePath = scenePaths.get(scene);
            if (scenePath) bodies.push(await fs.readFile(scenePath, 'utf-8'));
        }
        logger.info(`[ASSEMBLE] Assembling chapter ${chapter} from ${scenes.length} scenes`, { book });

        const combined = concatenateScenes(chapter, bodies);
        const smooth = (options.smooth ?? true) && this.settings.chapter.smoothingEnabled;
        const chaptersDir = this.layout.chaptersDir(book);

        let text = combined;
        let smoothed = false;
        if (smooth) {
            const rawPath = await writeVersioned(chaptersDir, chapterStem(chapter, true), '.md', combined);
            logger.info(`[ASSEMBLE] Unsmoothed chapter kept: ${rawPath}`);

            const result = await this.smoothChapter(book, chapter, combined);
            if (result !== null) {
                text = result;
                smoothed = true;
            }
        }

        const chapterPath = await writeVersioned(chaptersDir, chapterStem(chapter), '.md', text);
        const wordCount = countWords(text);
        logger.info(`[ASSEMBLE] Chapter saved: ${chapterPath}`, { words: wordCount, smoothed });

        return { book, chapter, scenes, text, wordCount, smoothed, path: chapterPath };
    }

    /** Smoothed chapter text, or null when smoothing failed. */
    private async smoothChapter(book: string, chapter: number, combined: string): Promise<string | null> {
        try {
            const prompt = await this.templates.render('chapter_smoothing', {
                chapter_number: chapter,
                story_title: book,
                chapter_content: combined
            });
            const maxTokens = Math.max(this.settings.chapter.smoothingMaxTokens, countWords(combined) + 500);
            const output = (await this.client.complete(prompt, 'review', { maxTokens })).trim();
            if (!output) {
                logger.warn('[ASSEMBLE] Smoothing returned no text; using unsmoothed chapter');
                return null;
            }
            return `${output}\n`;
        } catch (error) {
            logger.warn(`[ASSEMBLE] Smoothing failed; using unsmoothed chapter: ${errorMessage(error)}`);
            return null;
        }
    }
}
