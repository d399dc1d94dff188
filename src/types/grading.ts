export type EncodedImage = string; // Base64 PNG

export interface PageRecord {
    readonly pageNumber: number;
    readonly text: string;
    readonly images: readonly EncodedImage[];
}

export interface RawImage {
    width: number;
    height: number;
    channels: number;
    data: Uint8Array;
}

export type ContentPart =
    | { type: 'text'; text: string }
    | { type: 'image_url'; image_url: { url: string } };

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant';
    content: string | ContentPart[];
}

export type ModelCallKind = 'chat' | 'vision';

export type ModelResult =
    | { ok: true; text: string }
    | { ok: false; kind: ModelCallKind; message: string };

export interface ScoreEntry {
    category: string;
    score: number;
}

export interface CategoryTally {
    categoryName: string;
    scoreSum: number;
    observationCount: number;
}

export interface CategoryAverage {
    categoryName: string;
    average: number;
    observationCount: number;
}

export interface ScoreSummary {
    categories: CategoryAverage[];
    finalScore: number;
    maxTotal: number;
}

export interface ImageEvaluation {
    pageNumber: number;
    imageNumber: number;
    result: ModelResult;
}

export interface EvaluationReport {
    evaluations: ImageEvaluation[];
    summary: ScoreSummary;
    closingRemark: ModelResult;
}
