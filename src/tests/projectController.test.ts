import * as fs from 'fs/promises';
import * as path from 'path';
import { MemoryController } from '../controllers/memoryController.js';
import { ProjectController, isModelAvailable } from '../controllers/projectController.js';
import { ServiceContainer } from '../services/index.js';
import { BUILTIN_PROMPTS_DIR } from '../services/promptTemplateService.js';
import { FactCategory, FactSource } from '../types/continuity.js';
import { SceneStage } from '../types/scene.js';
import { InputError } from '../utils/errorHandler.js';
import { FakeConverter } from './helpers/fakeConverter.js';
import { InMemoryContinuityIndex, unreachableStore } from './helpers/inMemoryContinuityIndex.js';
import { ScriptedBackend } from './helpers/stubBackend.js';
import { makeTempDir, removeDir, testServices, testSettings, writeFile } from './helpers/testProject.js';

describe('isModelAvailable', () => {
    it('matches exact names and untagged names against :latest', () => {
        expect(isModelAvailable('llama3.1:8b', ['llama3.1:8b'])).toBe(true);
        expect(isModelAvailable('nomic-embed-text', ['nomic-embed-text:latest'])).toBe(true);
        expect(isModelAvailable('mistral:7b', ['mistral:latest'])).toBe(false);
    });
});

describe('ProjectController', () => {
    let dir: string;
    let index: InMemoryContinuityIndex;
    let converter: FakeConverter;
    let services: ServiceContainer;
    let controller: ProjectController;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        dir = await makeTempDir();
        index = new InMemoryContinuityIndex();
        converter = new FakeConverter();
        services = testServices(testSettings(dir), {
            backend: new ScriptedBackend([], ['llama3.1:8b', 'mistral:7b']),
            index,
            converter
        });
        controller = new ProjectController(services);
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await removeDir(dir);
    });

    it('creates the book layout, bible skeleton and project prompts', async () => {
        const created = await controller.init('Novel');

        const bibleDir = services.layout.storyBibleDir('Novel');
        expect(await fs.readdir(path.join(bibleDir, 'characters'))).toEqual([]);
        expect(await fs.readFile(path.join(bibleDir, 'story_bible_master.md'), 'utf-8')).toContain('## Characters');
        expect((await fs.readdir(services.layout.promptsDir())).sort()).toEqual((await fs.readdir(BUILTIN_PROMPTS_DIR)).sort());
        for (const stage of [SceneStage.RAW, SceneStage.REFINED, SceneStage.FINAL]) {
            expect(await fs.readdir(services.layout.scenesDir('Novel', stage))).toEqual([]);
        }
        expect(created).toContain(path.join(bibleDir, 'world_summary.md'));
    });

    it('leaves existing files alone on a second init', async () => {
        await controller.init('Novel');
        const guide = path.join(services.layout.promptsDir(), 'style_guide.md');
        await fs.writeFile(guide, 'House style.');

        expect(await controller.init('Novel')).toEqual([]);
        expect(await fs.readFile(guide, 'utf-8')).toBe('House style.');
    });

    it('reports which configured models the server has', async () => {
        const checks = await controller.checkModels();

        expect(checks.map(check => [check.role, check.available])).toEqual([
            ['prose', true],
            ['outline', true],
            ['refinement', true],
            ['review', true],
            ['summarization', false]
        ]);
    });

    it('counts distinct scenes and chapters per book', async () => {
        const rawDir = services.layout.scenesDir('Novel', SceneStage.RAW);
        await writeFile(path.join(rawDir, 'chapter_01_scene_01_raw_v1.md'), 'a');
        await writeFile(path.join(rawDir, 'chapter_01_scene_01_raw_v2.md'), 'b');
        await writeFile(path.join(rawDir, 'chapter_01_scene_02_raw_v1.md'), 'c');
        await writeFile(path.join(services.layout.scenesDir('Novel', SceneStage.FINAL), 'chapter_01_scene_01_final_v1.md'), 'd');
        await writeFile(path.join(services.layout.chaptersDir('Novel'), 'chapter_01_v1.md'), 'e');
        await writeFile(path.join(services.layout.chaptersDir('Novel'), 'chapter_01_raw_v1.md'), 'f');

        expect(await controller.status()).toEqual([
            { book: 'Novel', rawScenes: 2, refinedScenes: 0, finalScenes: 1, chapters: 1 }
        ]);
    });

    it('still reports status when the memory store is down', async () => {
        index.failWith = unreachableStore();
        converter.available = false;
        await expect(controller.status()).resolves.toEqual([]);
        expect(console.log).toHaveBeenCalledWith('  Entries: unavailable');
        expect(console.log).toHaveBeenCalledWith('  Pandoc: not found');
    });
});

describe('MemoryController', () => {
    let dir: string;
    let index: InMemoryContinuityIndex;
    let services: ServiceContainer;

    beforeEach(async () => {
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        dir = await makeTempDir();
        index = new InMemoryContinuityIndex();
        services = testServices(testSettings(dir), { backend: new ScriptedBackend(), index });
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        await removeDir(dir);
    });

    it('adds a continuity note with a validated category', async () => {
        const id = await new MemoryController(services).note('Novel', 'Character', '  Tomas is left-handed ');
        expect(id).toBe('fact-1');
        expect(index.facts[0]).toMatchObject({
            text: 'Tomas is left-handed',
            category: FactCategory.CHARACTER,
            source: FactSource.CONTINUITY_NOTE
        });
    });

    it('rejects an unknown category', async () => {
        await expect(new MemoryController(services).note('Novel', 'weather', 'Rain')).rejects.toThrow(InputError);
    });

    it('loads the story bible', async () => {
        await writeFile(path.join(services.layout.storyBibleDir('Novel'), 'world_summary.md'), 'Dry country.');
        expect(await new MemoryController(services).memoryInit('Novel')).toBe(1);
    });
});
