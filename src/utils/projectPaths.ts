import * as path from 'path';
import { SceneStage } from '../types/scene.js';
import { listFiles } from './fileStore.js';
import { sanitizeFilename } from './slugUtils.js';

const pad2 = (n: number): string => String(n).padStart(2, '0');

const SCENE_FILE = /^chapter_(\d+)_scene_(\d+)_([a-z]+)_v(\d+)\.md$/;
const CHAPTER_FILE = /^chapter_(\d+)_v(\d+)\.md$/;
const SUMMARY_FILE = /^chapter_(\d+)_scene_(\d+)_summary_v(\d+)\.txt$/;

export interface SceneFileInfo {
    chapter: number;
    scene: number;
    label: string;
    version: number;
    name: string;
}

export interface ChapterFileInfo {
    chapter: number;
    version: number;
    name: string;
}

export function sceneStem(chapter: number, scene: number, label: string): string {
    return `chapter_${pad2(chapter)}_scene_${pad2(scene)}_${label}`;
}

export function summaryStem(chapter: number, scene: number): string {
    return `chapter_${pad2(chapter)}_scene_${pad2(scene)}_summary`;
}

export function chapterStem(chapter: number, raw: boolean = false): string {
    return raw ? `chapter_${pad2(chapter)}_raw` : `chapter_${pad2(chapter)}`;
}

export function parseSceneFilename(name: string): SceneFileInfo | null {
    const match = SCENE_FILE.exec(name);
    if (!match) return null;
    return {
        chapter: parseInt(match[1], 10),
        scene: parseInt(match[2], 10),
        label: match[3],
        version: parseInt(match[4], 10),
        name
    };
}

export function parseChapterFilename(name: string): ChapterFileInfo | null {
    const match = CHAPTER_FILE.exec(name);
    if (!match) return null;
    return {
        chapter: parseInt(match[1], 10),
        version: parseInt(match[2], 10),
        name
    };
}

export function parseSummaryFilename(name: string): SceneFileInfo | null {
    const match = SUMMARY_FILE.exec(name);
    if (!match) return null;
    return {
        chapter: parseInt(match[1], 10),
        scene: parseInt(match[2], 10),
        label: 'summary',
        version: parseInt(match[3], 10),
        name
    };
}

/**
 * Directory layout of a project. Everything lives under the configured base
 * path, one directory per book.
 */
export class ProjectLayout {
    constructor(readonly basePath: string) {}

    promptsDir(): string {
        return path.join(this.basePath, 'prompts');
    }

    booksDir(): string {
        return path.join(this.basePath, 'books');
    }

    bookDir(book: string): string {
        return path.join(this.booksDir(), sanitizeFilename(book));
    }

    outlinesDir(book: string): string {
        return path.join(this.bookDir(book), 'outlines');
    }

    storyBibleDir(book: string): string {
        return path.join(this.bookDir(book), 'story_bible');
    }

    scenesDir(book: string, stage: SceneStage): string {
        return path.join(this.bookDir(book), 'scenes', stage);
    }

    summariesDir(book: string): string {
        return path.join(this.bookDir(book), 'summaries');
    }

    chaptersDir(book: string): string {
        return path.join(this.bookDir(book), 'chapters');
    }

    exportsDir(book: string): string {
        return path.join(this.bookDir(book), 'exports');
    }

    bookDirectories(book: string): string[] {
        return [
            this.outlinesDir(book),
            path.join(this.storyBibleDir(book), 'characters'),
            this.scenesDir(book, SceneStage.RAW),
            this.scenesDir(book, SceneStage.REFINED),
            this.scenesDir(book, SceneStage.FINAL),
            this.summariesDir(book),
            this.chaptersDir(book),
            this.exportsDir(book)
        ];
    }

    async listBooks(): Promise<string[]> {
        return (await listFiles(this.booksDir())).sort();
    }
}
