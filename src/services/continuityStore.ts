import * as fs from 'fs/promises';
import * as path from 'path';
import {
    ContinuityFact,
    ContinuityIndex,
    ContinuityStats,
    FactCategory,
    FactSource
} from '../types/continuity.js';
import { listFiles, readTextIfExists } from '../utils/fileStore.js';
import { logger } from '../utils/logger.js';

export interface ContinuityStoreOptions {
    topK: number;
    contextCharLimit: number;
}

interface BibleSection {
    heading: string;
    body: string;
}

const CATEGORY_KEYWORDS: Array<[FactCategory, RegExp]> = [
    [FactCategory.CHARACTER, /\b(characters?|cast|protagonists?|antagonists?|people)\b/i],
    [FactCategory.ITEM, /\b(items?|artifacts?|artefacts?|objects?|weapons?|relics?)\b/i],
    [FactCategory.PLOT, /\b(plot|timeline|history|events?|backstory|arcs?)\b/i],
    [FactCategory.RULE, /\b(rules?|magic|systems?|laws?|technology|tech)\b/i]
];

export function categoryForHeading(heading: string): FactCategory {
    for (const [category, pattern] of CATEGORY_KEYWORDS) {
        if (pattern.test(heading)) return category;
    }
    return FactCategory.WORLD;
}

/** Split markdown on `##` headings; text before the first heading is its own section. */
export function splitSections(markdown: string): BibleSection[] {
    const sections: BibleSection[] = [];
    let current: BibleSection = { heading: '', body: '' };

    for (const line of markdown.split(/\r?\n/)) {
        const heading = /^##\s+(.*)$/.exec(line);
        if (heading) {
            sections.push(current);
            current = { heading: heading[1].trim(), body: '' };
        } else {
            current.body += `${line}\n`;
        }
    }
    sections.push(current);

    return sections
        .map(section => ({ heading: section.heading, body: section.body.trim() }))
        .filter(section => section.body.length > 0);
}

/**
 * Story memory for one project. Every write is a new fact; corrections are
 * added alongside the facts they supersede.
 */
export class ContinuityStore {
    constructor(
        private index: ContinuityIndex,
        private options: ContinuityStoreOptions
    ) {}

    async addContinuityNote(text: string, category: FactCategory, bookName: string): Promise<string> {
        const id = await this.index.index({
            text,
            category,
            book: bookName,
            source: FactSource.CONTINUITY_NOTE
        });
        logger.info('[MEMORY] Added continuity note', { id, category, book: bookName });
        return id;
    }

    async addSceneSummary(summary: string, book: string, chapter: number, scene: number): Promise<string> {
        return this.index.index({
            text: summary,
            category: FactCategory.PLOT,
            book,
            source: FactSource.SCENE_SUMMARY,
            sourceLabel: `chapter ${chapter} scene ${scene}`,
            chapter,
            scene
        });
    }

    /**
     * Index a book's story bible: each `##` section of the master file, the
     * world summary, the magic/technology notes and every character file.
     */
    async ingestStoryBible(book: string, bibleDir: string): Promise<number> {
        const facts: ContinuityFact[] = [];

        const master = await readTextIfExists(path.join(bibleDir, 'story_bible_master.md'));
        if (master !== null) {
            for (const section of splitSections(master)) {
                facts.push({
                    text: section.heading ? `${section.heading}\n${section.body}` : section.body,
                    category: categoryForHeading(section.heading),
                    book,
                    source: FactSource.STORY_BIBLE,
                    sourceLabel: section.heading ? `story_bible_master.md#${section.heading}` : 'story_bible_master.md'
                });
            }
        }

        const singles: Array<[string, FactCategory]> = [
            ['world_summary.md', FactCategory.WORLD],
            ['magic_tech_systems.md', FactCategory.RULE]
        ];
        for (const [fileName, category] of singles) {
            const content = (await readTextIfExists(path.join(bibleDir, fileName)))?.trim();
            if (content) {
                facts.push({ text: content, category, book, source: FactSource.STORY_BIBLE, sourceLabel: fileName });
            }
        }

        const charactersDir = path.join(bibleDir, 'characters');
        for (const fileName of (await listFiles(charactersDir)).filter(name => name.endsWith('.md')).sort()) {
            const content = (await fs.readFile(path.join(charactersDir, fileName), 'utf-8')).trim();
            if (content) {
                facts.push({
                    text: content,
                    category: FactCategory.CHARACTER,
                    book,
                    source: FactSource.STORY_BIBLE,
                    sourceLabel: `characters/${fileName}`
                });
            }
        }

        if (facts.length === 0) {
            logger.warn('[MEMORY] No story bible content found', { bibleDir });
            return 0;
        }

        for (const fact of facts) {
            await this.index.index(fact);
        }
        logger.info('[MEMORY] Story bible added to memory', { book, facts: facts.length });
        return facts.length;
    }

    async query(context: string, book: string, k: number = this.options.topK): Promise<ContinuityFact[]> {
        return this.index.query(context, book, k);
    }

    /**
     * Continuity block for a scene prompt, one `[CATEGORY]` entry per
     * retrieved fact.
     */
    async getContextForScene(book: string, chapter: number, scene: number, outlineText: string): Promise<string> {
        const query = `Chapter ${chapter} Scene ${scene}: ${outlineText.slice(0, 500)}`;
        const facts = await this.index.query(query, book, this.options.topK);

        logger.info(`[MEMORY] Retrieved ${facts.length} context entries for Ch${chapter}:Sc${scene}`);

        return facts
            .map(fact => `[${fact.category.toUpperCase()}]\n${fact.text.slice(0, this.options.contextCharLimit)}\n`)
            .join('\n---\n');
    }

    async stats(book?: string): Promise<ContinuityStats> {
        return {
            totalEntries: await this.index.count(book),
            backend: this.index.description
        };
    }
}
