import * as fs from 'fs/promises';
import * as path from 'path';
import { createSettings, loadSettings, openAICompatUrl, serverRootUrl } from '../config/settings.js';
import { ConfigError } from '../utils/errorHandler.js';
import { makeTempDir, removeDir } from './helpers/testProject.js';

describe('createSettings', () => {
    it('fills every section with defaults', () => {
        const settings = createSettings({}, {}, '/work');
        expect(settings.scene).toEqual({ targetWords: 1500, minWords: 1200, maxWords: 1800, maxRetries: 3 });
        expect(settings.models.prose.model).toBe('llama3.1:8b');
        expect(settings.models.prose.fallbacks).toEqual([]);
        expect(settings.export.formats).toEqual(['epub', 'pdf']);
        expect(settings.memory.requireContinuity).toBe(false);
        expect(settings.advanced).toEqual({ maxRetries: 3, retryDelayMs: 2000, backoff: 'fixed' });
        expect(settings.server).toMatchObject({ api: 'ollama', baseUrl: 'http://localhost:11434' });
        expect(settings.memory.connectTimeoutMs).toBe(5000);
        expect(settings.project.basePath).toBe(path.resolve('/work', '.'));
    });

    it('applies environment overrides before validation', () => {
        const settings = createSettings(
            { server: { baseUrl: 'http://localhost:11434/v1' } },
            { LLM_BASE_URL: 'http://gpu-box:8080/v1', MONGO_URI: 'mongodb://db:27017/test', LOG_LEVEL: 'DEBUG' }
        );
        expect(settings.server.baseUrl).toBe('http://gpu-box:8080/v1');
        expect(settings.memory.uri).toBe('mongodb://db:27017/test');
        expect(settings.logging.level).toBe('debug');
    });

    it('takes the server API from LLM_API', () => {
        expect(createSettings({}, { LLM_API: 'OpenAI' }).server.api).toBe('openai');
        expect(() => createSettings({}, { LLM_API: 'grpc' })).toThrow(/server\.api/);
    });

    it('returns a frozen value', () => {
        const settings = createSettings({});
        expect(Object.isFrozen(settings)).toBe(true);
        expect(Object.isFrozen(settings.scene)).toBe(true);
        expect(Object.isFrozen(settings.models.prose.fallbacks)).toBe(true);
    });

    it('rejects inconsistent word bounds', () => {
        expect(() => createSettings({ scene: { minWords: 2000, maxWords: 1000, targetWords: 1500 } }))
            .toThrow(ConfigError);
    });

    it('lists the offending paths', () => {
        expect(() => createSettings({ scene: { targetWords: 'long' } }))
            .toThrow(/scene\.targetWords/);
    });

    it('rejects a non-object document', () => {
        expect(() => createSettings([1, 2])).toThrow('Configuration must be a JSON object');
    });
});

describe('loadSettings', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(dir);
    });

    it('reads a JSON file', async () => {
        const configPath = path.join(dir, 'config.json');
        await fs.writeFile(configPath, JSON.stringify({ project: { name: 'Salt' }, scene: { maxRetries: 1 } }));
        const settings = loadSettings(configPath, {});
        expect(settings.project.name).toBe('Salt');
        expect(settings.scene.maxRetries).toBe(1);
    });

    it('raises ConfigError for a missing file', () => {
        expect(() => loadSettings(path.join(dir, 'nope.json'), {})).toThrow(ConfigError);
    });

    it('raises ConfigError for malformed JSON', async () => {
        const configPath = path.join(dir, 'bad.json');
        await fs.writeFile(configPath, '{ "project": ');
        expect(() => loadSettings(configPath, {})).toThrow('Config file is not valid JSON');
    });

    it('gives configuration errors exit code 2', () => {
        try {
            loadSettings(path.join(dir, 'nope.json'), {});
            throw new Error('expected a ConfigError');
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            expect(error instanceof ConfigError && error.exitCode).toBe(2);
        }
    });
});

describe('server URLs', () => {
    it('derives the native root and the OpenAI-compatible path for Ollama', () => {
        expect(serverRootUrl('http://localhost:11434/v1/')).toBe('http://localhost:11434');
        expect(openAICompatUrl('http://localhost:11434', 'ollama')).toBe('http://localhost:11434/v1');
        expect(openAICompatUrl('http://localhost:11434/v1', 'ollama')).toBe('http://localhost:11434/v1');
    });

    it('uses an OpenAI-compatible base URL as given', () => {
        expect(openAICompatUrl('http://lmstudio:1234/v1/', 'openai')).toBe('http://lmstudio:1234/v1');
    });
});
