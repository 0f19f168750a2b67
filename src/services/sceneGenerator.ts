import * as fs from 'fs/promises';
import * as path from 'path';
import { Settings } from '../config/settings.js';
import { WordBounds } from '../types/generation.js';
import { GeneratedScene, SceneOutline, SceneStage } from '../types/scene.js';
import { InputError, StorageError, errorMessage } from '../utils/errorHandler.js';
import { isMissingFileError, latestVersionPath, listFiles, readTextIfExists, writeVersioned } from '../utils/fileStore.js';
import { logger } from '../utils/logger.js';
import { parseSceneOutline } from '../utils/outlineParser.js';
import {
    ProjectLayout,
    SceneFileInfo,
    parseSummaryFilename,
    sceneStem,
    summaryStem
} from '../utils/projectPaths.js';
import { generateSlug } from '../utils/slugUtils.js';
import { formatDuration } from '../utils/timeUtils.js';
import { countWords, firstWords, withFrontMatter } from '../utils/wordCount.js';
import { ContinuityStore } from './continuityStore.js';
import { GenerationClient } from './generationClient.js';
import { PromptTemplateService } from './promptTemplateService.js';

export const OPENING_SCENE_SUMMARY = 'This is the opening scene of the story.';
export const NO_PREVIOUS_SUMMARY = 'No summary is available for the previous scene.';

export interface SceneGenerationResult {
    scene: GeneratedScene;
    attempts: number;
    withinBounds: boolean;
    summaryPath?: string;
}

export class SceneGenerator {
    constructor(
        private settings: Settings,
        private layout: ProjectLayout,
        private templates: PromptTemplateService,
        private client: GenerationClient,
        private continuity: ContinuityStore
    ) {}

    async generate(book: string, chapter: number, scene: number, outlinePath: string): Promise<SceneGenerationResult> {
        const started = Date.now();
        const outline = await this.readOutline(outlinePath, chapter, scene);
        logger.info(`[GEN] Generating Ch${chapter}:Sc${scene} "${outline.title}"`, { book, pov: outline.povCharacter });

        const bounds = this.boundsFor(outline);
        const prompt = await this.templates.render('prose_generation', {
            genre: this.settings.project.genre,
            story_title: book,
            story_bible_summary: await this.storyBibleExcerpt(book),
            character_bios: await this.characterBio(book, outline.povCharacter),
            retrieved_continuity: await this.continuityContext(book, chapter, scene, outline.text),
            previous_scene_summary: await this.previousSceneSummary(book, chapter, scene),
            chapter_number: chapter,
            scene_number: scene,
            scene_title: outline.title,
            pov_character: outline.povCharacter,
            location: outline.location,
            detailed_scene_outline: outline.text.trim(),
            scene_beats: outline.beats.length > 0
                ? outline.beats.map((beat, i) => `${i + 1}. ${beat}`).join('\n')
                : 'Follow the outline above.',
            style_guide_content: await this.templates.loadAsset('style_guide.md'),
            pov_style: this.settings.project.povStyle,
            tense: this.settings.project.tense,
            tone_descriptors: this.settings.project.tone,
            target_word_count: bounds.targetWords,
            min_words: bounds.minWords,
            max_words: bounds.maxWords
        });

        const result = await this.client.generateWithinBounds(prompt, 'prose', bounds);
        const scenePath = await writeVersioned(
            this.layout.scenesDir(book, SceneStage.RAW),
            sceneStem(chapter, scene, SceneStage.RAW),
            '.md',
            withFrontMatter({
                book,
                chapter,
                scene,
                stage: SceneStage.RAW,
                words: result.wordCount,
                attempts: result.attempts,
                within_bounds: result.withinBounds
            }, `${result.text}\n`)
        );
        logger.info(`[GEN] Scene saved: ${scenePath}`, {
            words: result.wordCount,
            attempts: result.attempts,
            elapsed: formatDuration(Date.now() - started)
        });

        const summaryPath = this.settings.memory.autoSummarizeScenes
            ? await this.summarize(book, chapter, scene, result.text)
            : undefined;

        return {
            scene: {
                book,
                chapter,
                scene,
                stage: SceneStage.RAW,
                text: result.text,
                wordCount: result.wordCount,
                path: scenePath
            },
            attempts: result.attempts,
            withinBounds: result.withinBounds,
            summaryPath
        };
    }

    /**
     * Latest summary of the scene before this one. For the first scene of a
     * chapter that is the last summarised scene of the previous chapter.
     */
    async previousSceneSummary(book: string, chapter: number, scene: number): Promise<string> {
        if (chapter === 1 && scene === 1) {
            return OPENING_SCENE_SUMMARY;
        }

        const dir = this.layout.summariesDir(book);
        let target: { chapter: number; scene: number } | null = null;

        if (scene > 1) {
            target = { chapter, scene: scene - 1 };
        } else {
            const previous = (await listFiles(dir))
                .map(parseSummaryFilename)
                .filter((info): info is SceneFileInfo => info !== null && info.chapter === chapter - 1);
            if (previous.length > 0) {
                target = { chapter: chapter - 1, scene: Math.max(...previous.map(info => info.scene)) };
            }
        }

        if (target) {
            const summaryPath = await latestVersionPath(dir, summaryStem(target.chapter, target.scene), '.txt');
            const summary = summaryPath ? (await fs.readFile(summaryPath, 'utf-8')).trim() : '';
            if (summary) return summary;
        }
        return NO_PREVIOUS_SUMMARY;
    }

    async storyBibleExcerpt(book: string): Promise<string> {
        const master = await readTextIfExists(path.join(this.layout.storyBibleDir(book), 'story_bible_master.md'));
        if (!master || !master.trim()) {
            return 'No story bible available.';
        }
        return firstWords(master, this.settings.memory.storyBibleWords);
    }

    async characterBio(book: string, povCharacter: string): Promise<string> {
        const slug = generateSlug(povCharacter);
        if (slug) {
            const bio = await readTextIfExists(path.join(this.layout.storyBibleDir(book), 'characters', `${slug}.md`));
            if (bio && bio.trim()) return bio.trim();
        }
        return `No character profile available for ${povCharacter}.`;
    }

    private async readOutline(outlinePath: string, chapter: number, scene: number): Promise<SceneOutline> {
        let text: string;
        try {
            text = await fs.readFile(outlinePath, 'utf-8');
        } catch (error) {
            if (isMissingFileError(error)) {
                throw new InputError(`Outline not found: ${outlinePath}`);
            }
            throw new InputError(`Could not read outline ${outlinePath}: ${errorMessage(error)}`);
        }
        if (!text.trim()) {
            throw new InputError(`Outline is empty: ${outlinePath}`);
        }
        return parseSceneOutline(text, chapter, scene, this.settings.scene.targetWords);
    }

    private boundsFor(outline: SceneOutline): WordBounds {
        const { minWords, maxWords, targetWords } = this.settings.scene;
        const fromOutline = outline.targetWords >= minWords && outline.targetWords <= maxWords;
        return { minWords, maxWords, targetWords: fromOutline ? outline.targetWords : targetWords };
    }

    private async continuityContext(book: string, chapter: number, scene: number, outlineText: string): Promise<string> {
        try {
            const context = await this.continuity.getContextForScene(book, chapter, scene, outlineText);
            return context || 'No continuity facts recorded yet.';
        } catch (error) {
            if (!(error instanceof StorageError) || this.settings.memory.requireContinuity) {
                throw error;
            }
            logger.warn(`[MEMORY] Continuity store unavailable, generating without context: ${error.message}`);
            return 'No continuity facts available.';
        }
    }

    private async summarize(book: string, chapter: number, scene: number, text: string): Promise<string | undefined> {
        try {
            const prompt = await this.templates.render('scene_summary', {
                max_words: this.settings.memory.summaryLength,
                scene_content: text
            });
            const summary = await this.client.complete(prompt, 'summarization');
            const summaryPath = await writeVersioned(
                this.layout.summariesDir(book),
                summaryStem(chapter, scene),
                '.txt',
                `${summary}\n`
            );
            await this.continuity.addSceneSummary(summary, book, chapter, scene);
            logger.info(`[MEMORY] Scene summary saved (${countWords(summary)} words): ${summaryPath}`);
            return summaryPath;
        } catch (error) {
            logger.warn(`[MEMORY] Scene summary failed for Ch${chapter}:Sc${scene}: ${errorMessage(error)}`);
            return undefined;
        }
    }
}
