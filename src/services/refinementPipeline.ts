import * as fs from 'fs/promises';
import { Settings } from '../config/settings.js';
import { GeneratedScene, PASS_ORDER, RefinementPass, SceneStage } from '../types/scene.js';
import { InputError, errorMessage } from '../utils/errorHandler.js';
import { isMissingFileError, writeVersioned } from '../utils/fileStore.js';
import { logger } from '../utils/logger.js';
import { ProjectLayout, sceneStem } from '../utils/projectPaths.js';
import { formatDuration } from '../utils/timeUtils.js';
import { stripFrontMatter } from '../utils/wordCount.js';
import { GenerationClient } from './generationClient.js';
import { PromptTemplateService } from './promptTemplateService.js';

function isRefinementPass(name: string): name is RefinementPass {
    return PASS_ORDER.some(pass => pass === name);
}

/**
 * Validate requested pass names and put them in canonical order. Duplicates
 * collapse; an empty request selects every pass.
 */
export function normalizePasses(requested: readonly string[]): RefinementPass[] {
    const names = requested.map(name => name.trim().toLowerCase()).filter(Boolean);
    if (names.length === 0) return [...PASS_ORDER];

    const unknown = names.filter(name => !isRefinementPass(name));
    if (unknown.length > 0) {
        throw new InputError(
            `Unknown refinement pass: ${unknown.join(', ')} (expected one of ${PASS_ORDER.join(', ')})`
        );
    }
    return PASS_ORDER.filter(pass => names.includes(pass));
}

export interface RefinementResult {
    passes: GeneratedScene[];
    final: GeneratedScene;
}

export class RefinementPipeline {
    constructor(
        private settings: Settings,
        private layout: ProjectLayout,
        private templates: PromptTemplateService,
        private client: GenerationClient
    ) {}

    async refine(
        book: string,
        chapter: number,
        scene: number,
        inputPath: string,
        requestedPasses: readonly string[] = []
    ): Promise<RefinementResult> {
        const passes = normalizePasses(requestedPasses);

        let text: string;
        try {
            text = stripFrontMatter(await fs.readFile(inputPath, 'utf-8')).trim();
        } catch (error) {
            if (isMissingFileError(error)) throw new InputError(`Input scene not found: ${inputPath}`);
            throw new InputError(`Could not read ${inputPath}: ${errorMessage(error)}`);
        }
        if (!text) {
            throw new InputError(`Input scene is empty: ${inputPath}`);
        }

        const styleGuide = await this.templates.loadAsset('style_guide.md');
        const bounds = {
            minWords: this.settings.scene.minWords,
            maxWords: this.settings.scene.maxWords,
            targetWords: this.settings.scene.targetWords
        };
        const outputs: GeneratedScene[] = [];

        for (const pass of passes) {
            const started = Date.now();
            logger.info(`[REFINE] Running ${pass} pass on Ch${chapter}:Sc${scene}`);

            const prompt = await this.templates.render(`refinement_${pass}`, {
                scene_content: text,
                style_guide_content: styleGuide,
                story_title: book,
                chapter_number: chapter,
                scene_number: scene
            });
            const result = await this.client.generateWithinBounds(prompt, 'refinement', bounds);
            if (!result.withinBounds) {
                logger.warn(`[REFINE] ${pass} output is ${result.wordCount} words; continuing with it`);
            }
            text = result.text;

            const passPath = await writeVersioned(
                this.layout.scenesDir(book, SceneStage.REFINED),
                sceneStem(chapter, scene, pass),
                '.md',
                `${text}\n`
            );
            logger.info(`[REFINE] ${pass} pass saved: ${passPath}`, {
                words: result.wordCount,
                elapsed: formatDuration(Date.now() - started)
            });
            outputs.push({
                book,
                chapter,
                scene,
                stage: SceneStage.REFINED,
                pass,
                text,
                wordCount: result.wordCount,
                path: passPath
            });
        }

        const last = outputs[outputs.length - 1];
        const finalPath = await writeVersioned(
            this.layout.scenesDir(book, SceneStage.FINAL),
            sceneStem(chapter, scene, SceneStage.FINAL),
            '.md',
            `${last.text}\n`
        );
        logger.info(`[REFINE] Final scene saved: ${finalPath}`);

        return {
            passes: outputs,
            final: { ...last, stage: SceneStage.FINAL, pass: undefined, path: finalPath }
        };
    }
}
