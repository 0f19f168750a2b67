import axios, { AxiosInstance } from 'axios';
import { OpenAI, APIConnectionTimeoutError, APIError } from 'openai';
import type { ChatCompletionCreateParamsNonStreaming, ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { z } from 'zod';
import { serverRootUrl } from '../config/settings.js';
import { GenerationRequest, InferenceBackend } from '../types/generation.js';
import { InferenceError, TimeoutError, errorMessage } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';

// Sampling knobs outside the OpenAI schema; llama.cpp and LM Studio honour them.
// Ollama's /v1 endpoint drops them, so Ollama goes through OllamaBackend.
type LocalCompletionParams = ChatCompletionCreateParamsNonStreaming & {
    repeat_penalty?: number;
    num_ctx?: number;
};

export interface BackendOptions {
    baseUrl: string;
    apiKey: string;
    timeoutMs: number;
    systemPrompt?: string;
}

function chatMessages(prompt: string, systemPrompt?: string): ChatCompletionMessageParam[] {
    return systemPrompt
        ? [{ role: 'system', content: systemPrompt }, { role: 'user', content: prompt }]
        : [{ role: 'user', content: prompt }];
}

/**
 * Inference server reached through its OpenAI-compatible API: llama.cpp
 * server, LM Studio, vLLM.
 */
export class OpenAICompatBackend implements InferenceBackend {
    private openai: OpenAI;

    constructor(private options: BackendOptions) {
        this.openai = new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseUrl.replace(/\/+$/, ''),
            timeout: options.timeoutMs,
            // Retries are owned by GenerationClient
            maxRetries: 0
        });
    }

    get baseUrl(): string {
        return this.options.baseUrl;
    }

    async complete(prompt: string, request: GenerationRequest): Promise<string> {
        const messages = chatMessages(prompt, this.options.systemPrompt);
        const body: LocalCompletionParams = {
            model: request.model,
            messages,
            temperature: request.params.temperature,
            top_p: request.params.topP,
            max_tokens: request.params.maxTokens,
            repeat_penalty: request.params.repeatPenalty,
            num_ctx: request.params.contextWindow
        };

        logger.debug('[LLM] Sending completion request', {
            model: request.model,
            role: request.role,
            promptChars: prompt.length
        });

        let content: string | null | undefined;
        try {
            const completion = await this.openai.chat.completions.create(body);
            content = completion.choices[0]?.message?.content;
        } catch (error) {
            throw this.mapError(error, request.model);
        }

        if (!content || !content.trim()) {
            throw new InferenceError(`Empty response from model ${request.model}`);
        }
        return content.trim();
    }

    async listModels(): Promise<string[]> {
        const ids: string[] = [];
        try {
            for await (const model of this.openai.models.list()) {
                ids.push(model.id);
            }
        } catch (error) {
            throw this.mapError(error, 'model list');
        }
        return ids;
    }

    private mapError(error: unknown, target: string): Error {
        if (error instanceof APIConnectionTimeoutError) {
            return new TimeoutError(
                `No response from ${this.options.baseUrl} for ${target} within ${this.options.timeoutMs}ms`
            );
        }
        if (error instanceof APIError) {
            return new InferenceError(
                `Inference request for ${target} failed${error.status ? ` (${error.status})` : ''}: ${error.message}`,
                { status: error.status, baseUrl: this.options.baseUrl }
            );
        }
        return new InferenceError(`Inference request for ${target} failed: ${errorMessage(error)}`);
    }
}

const OllamaChatResponseSchema = z.object({
    message: z.object({ content: z.string() })
});

const OllamaTagsResponseSchema = z.object({
    models: z.array(z.object({ name: z.string() }))
});

/** Ollama's native chat API; sampling and context size go in `options`. */
export class OllamaBackend implements InferenceBackend {
    private http: AxiosInstance;

    constructor(private options: BackendOptions) {
        this.http = axios.create({
            baseURL: serverRootUrl(options.baseUrl),
            timeout: options.timeoutMs,
            headers: { 'Content-Type': 'application/json' }
        });
    }

    get baseUrl(): string {
        return this.options.baseUrl;
    }

    async complete(prompt: string, request: GenerationRequest): Promise<string> {
        const body = {
            model: request.model,
            messages: chatMessages(prompt, this.options.systemPrompt),
            stream: false,
            options: {
                temperature: request.params.temperature,
                top_p: request.params.topP,
                repeat_penalty: request.params.repeatPenalty,
                num_predict: request.params.maxTokens,
                num_ctx: request.params.contextWindow
            }
        };

        logger.debug('[LLM] Sending chat request', {
            model: request.model,
            role: request.role,
            promptChars: prompt.length,
            numCtx: request.params.contextWindow
        });

        let data: unknown;
        try {
            data = (await this.http.post('/api/chat', body)).data;
        } catch (error) {
            throw this.mapError(error, request.model);
        }

        const parsed = OllamaChatResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new InferenceError(`Malformed response from model ${request.model}`);
        }
        const content = parsed.data.message.content.trim();
        if (!content) {
            throw new InferenceError(`Empty response from model ${request.model}`);
        }
        return content;
    }

    async listModels(): Promise<string[]> {
        let data: unknown;
        try {
            data = (await this.http.get('/api/tags')).data;
        } catch (error) {
            throw this.mapError(error, 'model list');
        }

        const parsed = OllamaTagsResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new InferenceError('Malformed model list from the inference server');
        }
        return parsed.data.models.map(model => model.name);
    }

    private mapError(error: unknown, target: string): Error {
        if (axios.isAxiosError(error)) {
            if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
                return new TimeoutError(
                    `No response from ${this.options.baseUrl} for ${target} within ${this.options.timeoutMs}ms`
                );
            }
            const status = error.response?.status;
            return new InferenceError(
                `Inference request for ${target} failed${status ? ` (${status})` : ''}: ${error.message}`,
                { status, baseUrl: this.options.baseUrl }
            );
        }
        return new InferenceError(`Inference request for ${target} failed: ${errorMessage(error)}`);
    }
}
