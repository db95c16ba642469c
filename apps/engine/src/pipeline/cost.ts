/**
 * Token and Cost Accounting
 *
 * Model pricing, token estimation and cost calculation.
 */

import { CandidateModel, ModelCatalog, ModelSpec } from './types';

/**
 * USD per 1,000 tokens, and the output cap requested from each model
 */
export const MODEL_CATALOG: ModelCatalog = {
    'gpt-4o': { inputPer1k: 0.005, outputPer1k: 0.015, maxOutputTokens: 4000 },
    'gpt-4o-mini': { inputPer1k: 0.00015, outputPer1k: 0.0006, maxOutputTokens: 4000 },
    'gpt-4-turbo': { inputPer1k: 0.01, outputPer1k: 0.03, maxOutputTokens: 4000 },
    'gpt-3.5-turbo': { inputPer1k: 0.0005, outputPer1k: 0.0015, maxOutputTokens: 3000 },
    'gemini-1.5-pro': { inputPer1k: 0.0035, outputPer1k: 0.0105, maxOutputTokens: 8192 },
    'gemini-1.5-flash': { inputPer1k: 0.00035, outputPer1k: 0.00105, maxOutputTokens: 8192 },
};

const CHARS_PER_TOKEN = 4;

const ZERO_RATES: ModelSpec = { inputPer1k: 0, outputPer1k: 0, maxOutputTokens: 0 };

/**
 * Approximate token count of a text (4 characters ≈ 1 token)
 */
export function estimateTokens(text: string): number {
    return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Number of whitespace-delimited words
 */
export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}

/**
 * Rates for a model; unknown models are billed at the primary model's rates
 */
export function resolveRates(model: string, catalog: ModelCatalog, primaryModel: string): ModelSpec {
    return catalog[model] ?? catalog[primaryModel] ?? ZERO_RATES;
}

/**
 * Cost in USD at full precision
 */
export function calculateCost(
    inputTokens: number,
    outputTokens: number,
    rates: Pick<ModelSpec, 'inputPer1k' | 'outputPer1k'>
): number {
    return (inputTokens / 1000) * rates.inputPer1k + (outputTokens / 1000) * rates.outputPer1k;
}

/**
 * Turn configured model names into candidates with their output caps
 */
export function buildCandidates(
    modelNames: readonly string[],
    catalog: ModelCatalog,
    defaultMaxOutputTokens: number
): CandidateModel[] {
    return modelNames.map(model => ({
        model,
        maxOutputTokens: catalog[model]?.maxOutputTokens ?? defaultMaxOutputTokens,
    }));
}

/**
 * Divide, returning 0 when the divisor is 0
 */
export function safeDivide(numerator: number, denominator: number): number {
    return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * "$0.0123"
 */
export function formatCost(cost: number): string {
    return `$${cost.toFixed(4)}`;
}

/**
 * "12,345"
 */
export function formatTokens(tokens: number): string {
    return tokens.toLocaleString('en-US');
}

export default {
    MODEL_CATALOG,
    estimateTokens,
    countWords,
    resolveRates,
    calculateCost,
    buildCandidates,
    safeDivide,
    formatCost,
    formatTokens,
};
