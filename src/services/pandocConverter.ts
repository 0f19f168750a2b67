import { spawn } from 'child_process';
import { ExportFormat, Settings } from '../config/settings.js';
import { ConversionJob, ConversionResult, DocumentConverter, ExportMetadata } from '../types/export.js';
import { logger } from '../utils/logger.js';

export interface PandocArgOptions {
    metadata: ExportMetadata;
    toc: boolean;
    coverImage?: string;
    pdf: Settings['export']['pdf'];
}

/**
 * Arguments for one pandoc run, inputs first and output last. The output
 * format follows the output file's extension.
 */
export function buildPandocArgs(
    inputs: readonly string[],
    output: string,
    format: ExportFormat,
    options: PandocArgOptions
): string[] {
    const args = [
        ...inputs,
        '--from', 'markdown',
        '--metadata', `title=${options.metadata.title}`,
        '--metadata', `author=${options.metadata.author}`
    ];

    if (options.toc) {
        args.push('--toc', '--toc-depth=2');
    }
    if (format === 'epub' && options.coverImage) {
        args.push(`--epub-cover-image=${options.coverImage}`);
    }
    if (format === 'pdf') {
        args.push(
            `--pdf-engine=${options.pdf.engine}`,
            '-V', `fontsize=${options.pdf.fontSize}pt`,
            '-V', `geometry:margin=${options.pdf.margin}`
        );
    }

    args.push('-o', output);
    return args;
}

export class PandocConverter implements DocumentConverter {
    constructor(private pandocPath: string = 'pandoc') {}

    convert(job: ConversionJob): Promise<ConversionResult> {
        logger.debug(`[EXPORT] $ ${[this.pandocPath, ...job.args].join(' ')}`);
        return this.run(job.args);
    }

    async isAvailable(): Promise<boolean> {
        try {
            const result = await this.run(['--version']);
            return result.exitCode === 0;
        } catch (error) {
            logger.debug('[EXPORT] pandoc not found', error);
            return false;
        }
    }

    private run(args: string[]): Promise<ConversionResult> {
        const child = spawn(this.pandocPath, args, { env: process.env, stdio: ['ignore', 'ignore', 'pipe'] });

        let stderr = '';
        child.stderr?.on('data', (d) => {
            stderr += String(d);
        });

        return new Promise((resolve, reject) => {
            child.on('error', reject);
            child.on('close', (code) => {
                resolve({ exitCode: code ?? 1, stderr: stderr.trim() });
            });
        });
    }
}
