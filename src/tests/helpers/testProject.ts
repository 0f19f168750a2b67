import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Settings, SettingsInput, createSettings } from '../../config/settings.js';
import { ServiceContainer, createServices } from '../../services/index.js';
import { ContinuityIndex } from '../../types/continuity.js';
import { DocumentConverter } from '../../types/export.js';
import { InferenceBackend } from '../../types/generation.js';
import { FakeConverter } from './fakeConverter.js';
import { InMemoryContinuityIndex } from './inMemoryContinuityIndex.js';

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'scenewright-'));
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, { recursive: true, force: true });
}

/** Settings rooted at `basePath` with no retry delay. */
export function testSettings(basePath: string, overrides: SettingsInput = {}): Settings {
    return createSettings({
        ...overrides,
        project: { name: 'Test Novel', author: 'Test Author', ...overrides.project, basePath },
        advanced: { retryDelayMs: 0, ...overrides.advanced }
    });
}

export async function writeFile(filePath: string, content: string): Promise<string> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
    return filePath;
}

export interface TestServiceOptions {
    backend: InferenceBackend;
    index?: ContinuityIndex;
    converter?: DocumentConverter;
}

export function testServices(settings: Settings, options: TestServiceOptions): ServiceContainer {
    return createServices(settings, {
        resolveBackend: () => options.backend,
        continuityIndex: options.index ?? new InMemoryContinuityIndex(),
        converter: options.converter ?? new FakeConverter(),
        clientOptions: { sleep: async () => undefined }
    });
}
