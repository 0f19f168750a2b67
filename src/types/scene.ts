export enum SceneStage {
    RAW = 'raw',
    REFINED = 'refined',
    FINAL = 'final'
}

export enum RefinementPass {
    COHESION = 'cohesion',
    STYLE = 'style',
    POLISH = 'polish'
}

export const PASS_ORDER: readonly RefinementPass[] = [
    RefinementPass.COHESION,
    RefinementPass.STYLE,
    RefinementPass.POLISH
];

export interface SceneOutline {
    chapter: number;
    scene: number;
    title: string;
    povCharacter: string;
    location: string;
    targetWords: number;
    beats: string[];
    text: string;
}

export interface GeneratedScene {
    book: string;
    chapter: number;
    scene: number;
    stage: SceneStage;
    pass?: RefinementPass;
    text: string;
    wordCount: number;
    path: string;
}

export interface AssembledChapter {
    book: string;
    chapter: number;
    scenes: number[];
    text: string;
    wordCount: number;
    smoothed: boolean;
    path: string;
}
