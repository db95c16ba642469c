/**
 * Pipeline Types
 *
 * Shared type definitions for the generation pipeline.
 */

/**
 * A topic to write about
 */
export interface TopicRecord {
    readonly topic: string;
    readonly description: string;
    readonly sourceUrl: string;
}

/**
 * A link that may be referenced from a generated article
 */
export interface LinkRecord {
    readonly name: string;
    readonly url: string;
}

export interface KeywordCategory {
    readonly name: string;
    readonly keywords: readonly string[];
}

/**
 * Keywords grouped by category, in workbook column order
 */
export interface KeywordCollection {
    readonly categories: readonly KeywordCategory[];
}

/**
 * Picks up to `count` links without replacement
 */
export type LinkSampler = (links: readonly LinkRecord[], count: number) => LinkRecord[];

export type GenerationStatus = 'success' | 'failed';

/**
 * Why a generation attempt failed
 */
export type GenerationErrorKind =
    | 'authentication'
    | 'rate_limited'
    | 'empty_response'
    | 'transport'
    | 'candidates_exhausted';

/**
 * Outcome of one topic generation
 */
export interface GenerationResult {
    topic: string;
    content: string;
    status: GenerationStatus;
    error?: string;
    errorKind?: GenerationErrorKind;
    modelUsed: string;
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
    /**
     * USD, full precision
     */
    cost: number;
    wordCount: number;
    seoKeywordsUsed: string[];
    llmKeywordsUsed: string[];
    linksUsed: string[];
}

export interface SinkOutcome {
    sink: string;
    ok: boolean;
    error?: string;
}

/**
 * A result as recorded by the batch pipeline
 */
export interface StampedResult extends GenerationResult {
    /**
     * 1-based position within the run
     */
    sequence: number;
    generatedAt: Date;
    sinkOutcomes: SinkOutcome[];
}

/**
 * Token and cost accumulator
 */
export interface RunningTotals {
    totalInputTokens: number;
    totalOutputTokens: number;
    totalCost: number;
}

/**
 * Aggregate statistics for one pipeline
 */
export interface RunSummary {
    runId: string;
    startedAt: Date;
    completedAt: Date;
    attempted: number;
    succeeded: number;
    failed: number;
    totalInputTokens: number;
    totalOutputTokens: number;
    totalTokens: number;
    totalCost: number;
    averageCostPerBlog: number;
    costPer1kTokens: number;
    modelsUsed: string[];
}

/**
 * Pricing and output cap for one model
 */
export interface ModelSpec {
    inputPer1k: number;
    outputPer1k: number;
    maxOutputTokens: number;
}

export type ModelCatalog = Readonly<Record<string, ModelSpec>>;

/**
 * A model the engine may try, in fallback order
 */
export interface CandidateModel {
    model: string;
    maxOutputTokens: number;
}
