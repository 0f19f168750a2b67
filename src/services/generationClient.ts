import { ModelRole, Settings } from '../config/settings.js';
import {
    GenerationAttempt,
    GenerationRequest,
    GenerationResult,
    InferenceBackend,
    SamplingParams,
    WordBounds
} from '../types/generation.js';
import { AppError, InferenceError, TimeoutError, errorMessage } from '../utils/errorHandler.js';
import { logger } from '../utils/logger.js';
import { RetryPolicy, exponentialBackoffPolicy, fixedRetryPolicy } from '../utils/retryPolicy.js';
import { formatDuration, sleep } from '../utils/timeUtils.js';
import { countWords } from '../utils/wordCount.js';
import { PromptTemplateService } from './promptTemplateService.js';

export type BackendResolver = (role: ModelRole) => InferenceBackend;

export interface GenerationClientOptions {
    retryPolicy?: RetryPolicy;
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Pick the attempt whose word count is closest to the target. Ties go to the
 * most recent attempt.
 */
export function closestAttempt(attempts: GenerationAttempt[], targetWords: number): GenerationAttempt {
    if (attempts.length === 0) {
        throw new Error('No attempts to choose from');
    }
    return attempts.reduce((best, attempt) =>
        Math.abs(attempt.wordCount - targetWords) <= Math.abs(best.wordCount - targetWords) ? attempt : best
    );
}

export class GenerationClient {
    private retryPolicy: RetryPolicy;
    private sleep: (ms: number) => Promise<void>;

    constructor(
        private settings: Settings,
        private resolveBackend: BackendResolver,
        private templates: PromptTemplateService,
        options: GenerationClientOptions = {}
    ) {
        const { maxRetries, retryDelayMs, backoff } = settings.advanced;
        this.retryPolicy = options.retryPolicy
            ?? (backoff === 'exponential'
                ? exponentialBackoffPolicy(maxRetries, retryDelayMs)
                : fixedRetryPolicy(maxRetries, retryDelayMs));
        this.sleep = options.sleep ?? sleep;
    }

    samplingFor(role: ModelRole, overrides: Partial<SamplingParams> = {}): SamplingParams {
        const configured = this.settings.generation[role];
        return { ...configured, ...overrides };
    }

    /**
     * One logical completion. Each model in the role's chain (primary, then
     * fallbacks) gets `retryPolicy.maxAttempts` tries before the next one is
     * used; the last failure is rethrown.
     */
    async complete(prompt: string, role: ModelRole, overrides: Partial<SamplingParams> = {}): Promise<string> {
        const roleConfig = this.settings.models[role];
        const backend = this.resolveBackend(role);
        const params = this.samplingFor(role, overrides);
        const models = [roleConfig.model, ...roleConfig.fallbacks];

        let lastError: AppError = new InferenceError(`No model configured for role ${role}`);

        for (const [modelIndex, model] of models.entries()) {
            if (modelIndex > 0) {
                logger.warn(`[GEN] Trying fallback model: ${model}`);
            }

            const request: GenerationRequest = { role, model, params };
            for (let attempt = 0; attempt < this.retryPolicy.maxAttempts; attempt++) {
                const started = Date.now();
                try {
                    const text = await backend.complete(prompt, request);
                    logger.info(`[GEN] ${model} responded in ${formatDuration(Date.now() - started)}`);
                    return text;
                } catch (error) {
                    lastError = this.asInferenceFailure(error);
                    logger.warn(
                        `[GEN] ${model} failed (attempt ${attempt + 1}/${this.retryPolicy.maxAttempts}): ${lastError.message}`
                    );
                    if (attempt < this.retryPolicy.maxAttempts - 1) {
                        await this.sleep(this.retryPolicy.delayMs(attempt));
                    }
                }
            }
            logger.error(`[GEN] Max retries reached for model: ${model}`);
        }

        throw lastError;
    }

    /**
     * Generate text whose word count falls inside `bounds`. Out-of-range
     * output is re-requested with a length correction appended to the
     * previous prompt, up to `maxRetries` times. When every attempt misses,
     * the one closest to the target is returned with `withinBounds: false`.
     */
    async generateWithinBounds(
        prompt: string,
        role: ModelRole,
        bounds: WordBounds,
        maxRetries: number = this.settings.scene.maxRetries
    ): Promise<GenerationResult> {
        const attempts: GenerationAttempt[] = [];
        let currentPrompt = prompt;

        for (let attempt = 0; attempt <= maxRetries; attempt++) {
            logger.info(`[GEN] Generation attempt ${attempt + 1}/${maxRetries + 1}`, { role });

            const text = await this.complete(currentPrompt, role);
            const wordCount = countWords(text);
            attempts.push({ text, wordCount, prompt: currentPrompt });

            if (wordCount >= bounds.minWords && wordCount <= bounds.maxWords) {
                logger.info(`[GEN] Valid: ${wordCount} words (target ${bounds.targetWords})`);
                return { text, wordCount, attempts: attempts.length, withinBounds: true };
            }

            const tooShort = wordCount < bounds.minWords;
            logger.warn(
                tooShort
                    ? `[GEN] Too short: ${wordCount} words (min: ${bounds.minWords})`
                    : `[GEN] Too long: ${wordCount} words (max: ${bounds.maxWords})`
            );

            if (attempt < maxRetries) {
                currentPrompt += await this.templates.render(tooShort ? 'length_extend' : 'length_tighten', {
                    word_count: wordCount,
                    min_words: bounds.minWords,
                    max_words: bounds.maxWords,
                    target_words: bounds.targetWords,
                    previous_output: text
                });
            }
        }

        const best = closestAttempt(attempts, bounds.targetWords);
        logger.warn(
            `[GEN] Word count still out of bounds after ${attempts.length} attempts; keeping closest (${best.wordCount} words)`
        );
        return { text: best.text, wordCount: best.wordCount, attempts: attempts.length, withinBounds: false };
    }

    private asInferenceFailure(error: unknown): AppError {
        if (error instanceof InferenceError || error instanceof TimeoutError) {
            return error;
        }
        return new InferenceError(errorMessage(error));
    }
}
