import { GenerationRequest, InferenceBackend } from '../../types/generation.js';

export interface RecordedCall {
    prompt: string;
    request: GenerationRequest;
}

/** Backend that replays scripted replies; an Error entry is thrown instead. */
export class ScriptedBackend implements InferenceBackend {
    calls: RecordedCall[] = [];

    constructor(
        private replies: Array<string | Error> = [],
        private models: string[] = []
    ) {}

    queue(...replies: Array<string | Error>): this {
        this.replies.push(...replies);
        return this;
    }

    async complete(prompt: string, request: GenerationRequest): Promise<string> {
        this.calls.push({ prompt, request });
        const reply = this.replies.shift();
        if (reply === undefined) {
            throw new Error(`No scripted reply for call ${this.calls.length}`);
        }
        if (reply instanceof Error) throw reply;
        return reply;
    }

    async listModels(): Promise<string[]> {
        return this.models;
    }
}

export const words = (count: number, word: string = 'word'): string =>
    Array.from({ length: count }, () => word).join(' ');
