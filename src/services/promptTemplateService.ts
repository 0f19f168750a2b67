import * as fs from 'fs/promises';
import * as path from 'path';
import { PromptTemplate } from '@langchain/core/prompts';
import { TemplateError, errorMessage } from '../utils/errorHandler.js';
import { isMissingFileError } from '../utils/fileStore.js';
import { logger } from '../utils/logger.js';

// Shipped with the package, next to src/ and dist/
export const BUILTIN_PROMPTS_DIR = path.resolve(__dirname, '../../prompts');

export type TemplateVariables = Record<string, string | number>;

export class PromptTemplateService {
    private cache = new Map<string, string>();

    /**
     * @param searchDirs directories tried in order; the project's own prompts
     * directory goes first so it can override the built-in templates
     */
    constructor(private searchDirs: string[] = [BUILTIN_PROMPTS_DIR]) {}

    /**
     * Fill a `{placeholder}` template. Every placeholder must be present in
     * `variables`; extra variables are ignored.
     */
    async render(templateName: string, variables: TemplateVariables): Promise<string> {
        const source = await this.loadTemplate(templateName);

        let prompt: PromptTemplate;
        try {
            prompt = PromptTemplate.fromTemplate(source);
        } catch (error) {
            throw new TemplateError(`Template "${templateName}" could not be parsed: ${errorMessage(error)}`);
        }

        const missing = prompt.inputVariables.filter(name => !(name in variables));
        if (missing.length > 0) {
            throw new TemplateError(
                `Template "${templateName}" references undefined variables: ${missing.join(', ')}`,
                { template: templateName, missing }
            );
        }

        const values: Record<string, string> = {};
        for (const name of prompt.inputVariables) {
            values[name] = String(variables[name]);
        }
        return prompt.format(values);
    }

    async loadTemplate(templateName: string): Promise<string> {
        const source = await this.find(`${templateName}.txt`);
        if (source === null) {
            throw new TemplateError(`Template not found: ${templateName}.txt`, { searched: this.searchDirs });
        }
        return source;
    }

    /** Non-template asset such as the style guide; empty when absent. */
    async loadAsset(fileName: string): Promise<string> {
        const content = await this.find(fileName);
        if (content === null) {
            logger.warn(`[TEMPLATE] Asset not found: ${fileName}`);
            return '';
        }
        return content;
    }

    private async find(fileName: string): Promise<string | null> {
        const cached = this.cache.get(fileName);
        if (cached !== undefined) return cached;

        for (const dir of this.searchDirs) {
            try {
                const content = await fs.readFile(path.join(dir, fileName), 'utf-8');
                this.cache.set(fileName, content);
                return content;
            } catch (error) {
                if (!isMissingFileError(error)) throw error;
            }
        }
        return null;
    }
}
