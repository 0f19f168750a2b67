import { ServiceContainer } from '../services/index.js';
import { SceneGenerationResult } from '../services/sceneGenerator.js';
import { RefinementResult } from '../services/refinementPipeline.js';

export class SceneController {
    constructor(private services: ServiceContainer) {}

    generate = async (book: string, chapter: number, scene: number, outlinePath: string): Promise<SceneGenerationResult> => {
        const result = await this.services.sceneGenerator.generate(book, chapter, scene, outlinePath);

        console.log(`Scene written: ${result.scene.path}`);
        console.log(`Words: ${result.scene.wordCount} (${result.attempts} attempt${result.attempts === 1 ? '' : 's'})`);
        if (!result.withinBounds) {
            console.log('Warning: word count is outside the configured bounds');
        }
        if (result.summaryPath) {
            console.log(`Summary: ${result.summaryPath}`);
        }
        return result;
    };

    refine = async (
        book: string,
        chapter: number,
        scene: number,
        inputPath: string,
        passes: string[]
    ): Promise<RefinementResult> => {
        const result = await this.services.refinement.refine(book, chapter, scene, inputPath, passes);

        for (const output of result.passes) {
            console.log(`${output.pass}: ${output.path} (${output.wordCount} words)`);
        }
        console.log(`Final scene: ${result.final.path}`);
        return result;
    };
}
