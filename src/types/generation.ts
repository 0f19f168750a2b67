import { ModelRole } from '../config/settings.js';

export interface SamplingParams {
    temperature: number;
    topP: number;
    repeatPenalty: number;
    maxTokens: number;
    contextWindow: number;
}

export interface WordBounds {
    minWords: number;
    maxWords: number;
    targetWords: number;
}

/** One call's worth of everything the backend needs besides the prompt. */
export interface GenerationRequest {
    role: ModelRole;
    model: string;
    params: SamplingParams;
}

export interface InferenceBackend {
    complete(prompt: string, request: GenerationRequest): Promise<string>;
    listModels(): Promise<string[]>;
}

export interface GenerationAttempt {
    text: string;
    wordCount: number;
    prompt: string;
}

export interface GenerationResult {
    text: string;
    wordCount: number;
    attempts: number;
    withinBounds: boolean;
}
