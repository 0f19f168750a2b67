import { OpenAIEmbeddings } from '@langchain/openai';
import { ModelRole, Settings, openAICompatUrl } from '../config/settings.js';
import { ContinuityIndex } from '../types/continuity.js';
import { DocumentConverter } from '../types/export.js';
import { InferenceBackend } from '../types/generation.js';
import { ProjectLayout } from '../utils/projectPaths.js';
import { ChapterAssembler } from './chapterAssembler.js';
import { MongoContinuityIndex } from './continuityIndex.js';
import { ContinuityStore } from './continuityStore.js';
import { ExportService } from './exportService.js';
import { BackendResolver, GenerationClient, GenerationClientOptions } from './generationClient.js';
import { OllamaBackend, OpenAICompatBackend } from './inferenceBackend.js';
import { PandocConverter } from './pandocConverter.js';
import { BUILTIN_PROMPTS_DIR, PromptTemplateService } from './promptTemplateService.js';
import { RefinementPipeline } from './refinementPipeline.js';
import { SceneGenerator } from './sceneGenerator.js';

export interface ServiceContainer {
    settings: Settings;
    layout: ProjectLayout;
    templates: PromptTemplateService;
    resolveBackend: BackendResolver;
    client: GenerationClient;
    continuity: ContinuityStore;
    sceneGenerator: SceneGenerator;
    refinement: RefinementPipeline;
    assembler: ChapterAssembler;
    converter: DocumentConverter;
    exporter: ExportService;
}

/** Replacements for the external collaborators, used by tests. */
export interface ServiceOverrides {
    resolveBackend?: BackendResolver;
    continuityIndex?: ContinuityIndex;
    converter?: DocumentConverter;
    clientOptions?: GenerationClientOptions;
}

export function createBackendResolver(settings: Settings): BackendResolver {
    // One client per distinct base URL
    const backends = new Map<string, InferenceBackend>();
    return (role: ModelRole) => {
        const baseUrl = settings.models[role].baseUrl ?? settings.server.baseUrl;
        let backend = backends.get(baseUrl);
        if (!backend) {
            const options = { baseUrl, apiKey: settings.server.apiKey, timeoutMs: settings.server.timeoutMs };
            backend = settings.server.api === 'ollama'
                ? new OllamaBackend(options)
                : new OpenAICompatBackend(options);
            backends.set(baseUrl, backend);
        }
        return backend;
    };
}

export function createContinuityIndex(settings: Settings): ContinuityIndex {
    const embeddings = new OpenAIEmbeddings({
        model: settings.embeddings.model,
        apiKey: settings.server.apiKey,
        configuration: {
            baseURL: settings.embeddings.baseUrl ?? openAICompatUrl(settings.server.baseUrl, settings.server.api)
        }
    });
    return new MongoContinuityIndex(settings.memory.uri, embeddings, settings.embeddings.model, {
        connectTimeoutMs: settings.memory.connectTimeoutMs
    });
}

// Services are wired in dependency order; nothing connects until first use
export function createServices(settings: Settings, overrides: ServiceOverrides = {}): ServiceContainer {
    const layout = new ProjectLayout(settings.project.basePath);
    const templates = new PromptTemplateService([layout.promptsDir(), BUILTIN_PROMPTS_DIR]);
    const resolveBackend = overrides.resolveBackend ?? createBackendResolver(settings);
    const client = new GenerationClient(settings, resolveBackend, templates, overrides.clientOptions);
    const continuity = new ContinuityStore(overrides.continuityIndex ?? createContinuityIndex(settings), {
        topK: settings.memory.topK,
        contextCharLimit: settings.memory.contextCharLimit
    });
    const converter = overrides.converter ?? new PandocConverter(settings.export.pandocPath);

    return {
        settings,
        layout,
        templates,
        resolveBackend,
        client,
        continuity,
        sceneGenerator: new SceneGenerator(settings, layout, templates, client, continuity),
        refinement: new RefinementPipeline(settings, layout, templates, client),
        assembler: new ChapterAssembler(settings, layout, templates, client),
        converter,
        exporter: new ExportService(settings, layout, converter)
    };
}
