import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../utils/errorHandler.js';

export const DEFAULT_CONFIG_PATH = 'config/config.json';

const samplingSchema = (defaults: {
    temperature: number;
    topP: number;
    repeatPenalty: number;
    maxTokens: number;
}) => z.object({
    temperature: z.number().min(0).max(2).default(defaults.temperature),
    topP: z.number().gt(0).max(1).default(defaults.topP),
    repeatPenalty: z.number().min(0).default(defaults.repeatPenalty),
    maxTokens: z.number().int().positive().default(defaults.maxTokens),
    contextWindow: z.number().int().positive().default(8192)
}).default({});

const modelRoleSchema = (model: string) => z.object({
    model: z.string().min(1).default(model),
    fallbacks: z.array(z.string().min(1)).default([]),
    // Per-role server, e.g. a remote box for the large prose model
    baseUrl: z.string().url().optional()
}).default({});

export const ExportFormatSchema = z.enum(['epub', 'pdf', 'docx', 'html']);

export const SettingsSchema = z.object({
    project: z.object({
        name: z.string().min(1).default('Untitled'),
        author: z.string().min(1).default('Unknown'),
        basePath: z.string().min(1).default('.'),
        genre: z.string().default('Fantasy'),
        povStyle: z.string().default('third-person limited'),
        tense: z.string().default('past'),
        tone: z.string().default('dark, cinematic')
    }).default({}),

    server: z.object({
        // ollama: native /api/chat, which takes num_ctx and repeat_penalty
        api: z.enum(['ollama', 'openai']).default('ollama'),
        baseUrl: z.string().url().default('http://localhost:11434'),
        apiKey: z.string().default('ollama'),
        timeoutMs: z.number().int().positive().default(600_000)
    }).default({}),

    models: z.object({
        prose: modelRoleSchema('llama3.1:8b'),
        outline: modelRoleSchema('llama3.1:8b'),
        refinement: modelRoleSchema('llama3.1:8b'),
        review: modelRoleSchema('llama3.1:8b'),
        summarization: modelRoleSchema('llama3.2:3b')
    }).default({}),

    embeddings: z.object({
        model: z.string().min(1).default('nomic-embed-text'),
        baseUrl: z.string().url().optional()
    }).default({}),

    generation: z.object({
        prose: samplingSchema({ temperature: 0.85, topP: 0.9, repeatPenalty: 1.1, maxTokens: 3000 }),
        outline: samplingSchema({ temperature: 0.7, topP: 0.9, repeatPenalty: 1.05, maxTokens: 2000 }),
        refinement: samplingSchema({ temperature: 0.6, topP: 0.9, repeatPenalty: 1.1, maxTokens: 3000 }),
        review: samplingSchema({ temperature: 0.7, topP: 0.9, repeatPenalty: 1.1, maxTokens: 12000 }),
        summarization: samplingSchema({ temperature: 0.5, topP: 0.9, repeatPenalty: 1.0, maxTokens: 300 })
    }).default({}),

    scene: z.object({
        targetWords: z.number().int().positive().default(1500),
        minWords: z.number().int().positive().default(1200),
        maxWords: z.number().int().positive().default(1800),
        maxRetries: z.number().int().min(0).default(3)
    }).default({}).superRefine((scene, ctx) => {
        if (scene.minWords > scene.maxWords) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'minWords must not exceed maxWords' });
        }
        if (scene.targetWords < scene.minWords || scene.targetWords > scene.maxWords) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'targetWords must lie between minWords and maxWords' });
        }
    }),

    chapter: z.object({
        smoothingEnabled: z.boolean().default(true),
        smoothingMaxTokens: z.number().int().positive().default(12000)
    }).default({}),

    memory: z.object({
        uri: z.string().min(1).default('mongodb://localhost:27017/scenewright'),
        topK: z.number().int().min(0).default(5),
        autoSummarizeScenes: z.boolean().default(true),
        summaryLength: z.number().int().positive().default(150),
        contextCharLimit: z.number().int().positive().default(500),
        storyBibleWords: z.number().int().positive().default(2000),
        connectTimeoutMs: z.number().int().positive().default(5000),
        // Abort generation instead of writing without continuity context
        requireContinuity: z.boolean().default(false)
    }).default({}),

    advanced: z.object({
        maxRetries: z.number().int().min(1).default(3),
        retryDelayMs: z.number().int().min(0).default(2000),
        backoff: z.enum(['fixed', 'exponential']).default('fixed')
    }).default({}),

    export: z.object({
        formats: z.array(ExportFormatSchema).min(1).default(['epub', 'pdf']),
        pandocPath: z.string().min(1).default('pandoc'),
        toc: z.boolean().default(true),
        pdf: z.object({
            engine: z.string().min(1).default('xelatex'),
            fontSize: z.number().int().positive().default(12),
            margin: z.string().min(1).default('1in')
        }).default({})
    }).default({}),

    logging: z.object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info')
    }).default({})
});

export type DeepReadonly<T> =
    T extends (infer E)[] ? ReadonlyArray<DeepReadonly<E>> :
    T extends object ? { readonly [K in keyof T]: DeepReadonly<T[K]> } :
    T;

export type Settings = DeepReadonly<z.infer<typeof SettingsSchema>>;
export type SettingsInput = z.input<typeof SettingsSchema>;
export type ModelRole = keyof z.infer<typeof SettingsSchema>['models'];
export type ExportFormat = z.infer<typeof ExportFormatSchema>;

export const MODEL_ROLES: readonly ModelRole[] = ['prose', 'outline', 'refinement', 'review', 'summarization'];

export type ServerApi = z.infer<typeof SettingsSchema>['server']['api'];

/** Server root without a trailing `/v1`, as Ollama's native API expects. */
export function serverRootUrl(baseUrl: string): string {
    return baseUrl.replace(/\/+$/, '').replace(/\/v1$/, '');
}

/** OpenAI-compatible endpoint for a server; Ollama serves it under `/v1`. */
export function openAICompatUrl(baseUrl: string, api: ServerApi): string {
    return api === 'ollama' ? `${serverRootUrl(baseUrl)}/v1` : baseUrl.replace(/\/+$/, '');
}

type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function withOverride(target: Record<string, unknown>, keys: string[], value: string | undefined): void {
    if (value === undefined || value === '') return;
    let node = target;
    for (const key of keys.slice(0, -1)) {
        const child = node[key];
        if (isRecord(child)) {
            node = child;
        } else {
            const created: Record<string, unknown> = {};
            node[key] = created;
            node = created;
        }
    }
    node[keys[keys.length - 1]] = value;
}

function deepFreeze<T>(value: T): T {
    if (typeof value === 'object' && value !== null) {
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
        Object.freeze(value);
    }
    return value;
}

/**
 * Build settings from an already-parsed document. Environment overrides are
 * applied before validation, and the result is deep-frozen.
 */
export function createSettings(raw: unknown, env: Env = {}, cwd: string = process.cwd()): Settings {
    if (!isRecord(raw)) {
        throw new ConfigError('Configuration must be a JSON object');
    }

    const document: Record<string, unknown> = structuredClone(raw);
    withOverride(document, ['server', 'api'], env.LLM_API?.toLowerCase());
    withOverride(document, ['server', 'baseUrl'], env.LLM_BASE_URL);
    withOverride(document, ['server', 'apiKey'], env.LLM_API_KEY);
    withOverride(document, ['memory', 'uri'], env.MONGO_URI);
    withOverride(document, ['logging', 'level'], env.LOG_LEVEL?.toLowerCase());

    const result = SettingsSchema.safeParse(document);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, result.error.issues);
    }

    const settings = result.data;
    settings.project.basePath = path.resolve(cwd, settings.project.basePath);
    const frozen: Settings = deepFreeze(settings);
    return frozen;
}

export function loadSettings(configPath: string = DEFAULT_CONFIG_PATH, env: Env = process.env): Settings {
    const resolved = path.resolve(configPath);
    if (!fs.existsSync(resolved)) {
        throw new ConfigError(`Config file not found: ${resolved}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(resolved, 'utf-8'));
    } catch (error) {
        throw new ConfigError(`Config file is not valid JSON: ${errorMessage(error)}`);
    }

    return createSettings(raw, env);
}
