import { ExportFormat } from '../config/settings.js';

export interface ExportMetadata {
    title: string;
    author: string;
}

export interface ConversionJob {
    inputs: string[];
    output: string;
    format: ExportFormat;
    args: string[];
}

export interface ConversionResult {
    exitCode: number;
    stderr: string;
}

/** External document converter; resolves with the exit status, never throws on a nonzero one. */
export interface DocumentConverter {
    convert(job: ConversionJob): Promise<ConversionResult>;
    isAvailable(): Promise<boolean>;
}

export interface ExportOutcome {
    format: ExportFormat;
    path: string;
}
