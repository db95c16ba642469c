/**
 * Generation Engine
 *
 * Generates one blog per call: composes the prompt, walks the candidate
 * models in order until one answers, and accounts tokens and cost.
 * Failures are returned as `failed` results, never thrown.
 */

import config from '../config';
import { createLogger, errorMessage } from '../logger';
import {
    CompletionProvider,
    CompletionResponse,
    CompletionUsage,
    toCompletionError,
    getCompletionProvider,
    getCandidateModelNames,
} from '../providers/ai';
import { CONNECTION_TEST_PROMPT, SYSTEM_PROMPT } from '../providers/ai/prompts';
import { compose, PromptInputs, randomLinkSampler } from './compose';
import {
    MODEL_CATALOG,
    buildCandidates,
    calculateCost,
    countWords,
    estimateTokens,
    formatCost,
    resolveRates,
} from './cost';
import {
    CandidateModel,
    GenerationErrorKind,
    GenerationResult,
    KeywordCollection,
    LinkRecord,
    LinkSampler,
    ModelCatalog,
    RunningTotals,
    TopicRecord,
} from './types';

const logger = createLogger('generation-engine');

export interface GenerationEngineOptions {
    provider: CompletionProvider;
    /**
     * Tried in order, primary first
     */
    candidates: CandidateModel[];
    catalog?: ModelCatalog;
    sampler?: LinkSampler;
    systemPrompt?: string;
    temperature?: number;
}

interface CandidateFailure {
    model: string;
    kind: GenerationErrorKind;
    message: string;
}

type AttemptOutcome =
    | { ok: true; model: string; response: CompletionResponse }
    | { ok: false; failure: CandidateFailure };

const ERROR_LABELS: Record<GenerationErrorKind, string> = {
    authentication: 'Authentication failed',
    rate_limited: 'Rate limit or quota exceeded',
    empty_response: 'Empty or malformed response',
    transport: 'Request failed',
    candidates_exhausted: 'All candidate models failed',
};

/**
 * Render a failure for the result's `error` field
 */
export function renderGenerationError(kind: GenerationErrorKind, message: string, model?: string): string {
    const where = model ? ` [${model}]` : '';
    return `${ERROR_LABELS[kind]}${where}: ${message}`;
}

export class GenerationEngine {
    private provider: CompletionProvider;
    private candidates: CandidateModel[];
    private catalog: ModelCatalog;
    private sampler: LinkSampler;
    private systemPrompt: string;
    private temperature: number;
    private totals: RunningTotals = {
        totalInputTokens: 0,
        totalOutputTokens: 0,
        totalCost: 0,
    };

    constructor(options: GenerationEngineOptions) {
        this.provider = options.provider;
        this.candidates = [...options.candidates];
        this.catalog = options.catalog ?? MODEL_CATALOG;
        this.sampler = options.sampler ?? randomLinkSampler;
        this.systemPrompt = options.systemPrompt ?? SYSTEM_PROMPT;
        this.temperature = options.temperature ?? 0.7;
    }

    /**
     * Primary candidate model name, or '' when none are configured
     */
    get primaryModel(): string {
        return this.candidates[0]?.model ?? '';
    }

    /**
     * Lifetime counters over every successful generate() call
     */
    getTotals(): RunningTotals {
        return { ...this.totals };
    }

    async generate(
        topic: TopicRecord,
        seoKeywords: KeywordCollection,
        llmKeywords: KeywordCollection,
        links: readonly LinkRecord[]
    ): Promise<GenerationResult> {
        logger.info('Generating blog', { topic: topic.topic });

        let inputs: PromptInputs = { seoKeywords: [], llmKeywords: [], links: [] };
        try {
            const composed = compose(topic, seoKeywords, llmKeywords, links, this.sampler);
            inputs = composed.inputs;

            let lastFailure: CandidateFailure | null = null;
            for (const candidate of this.candidates) {
                const outcome = await this.attempt(candidate, composed.prompt);
                if (outcome.ok) {
                    return this.succeed(topic, inputs, composed.prompt, outcome.model, outcome.response);
                }

                lastFailure = outcome.failure;
                logger.warn('Candidate model failed', {
                    topic: topic.topic,
                    model: candidate.model,
                    kind: outcome.failure.kind,
                    error: outcome.failure.message,
                });
            }

            if (!lastFailure) {
                return this.fail(topic, inputs, '', 'candidates_exhausted', renderGenerationError(
                    'candidates_exhausted',
                    'no candidate models configured'
                ));
            }

            return this.fail(topic, inputs, lastFailure.model, lastFailure.kind, renderGenerationError(
                lastFailure.kind,
                lastFailure.message,
                lastFailure.model
            ));
        } catch (error) {
            return this.fail(topic, inputs, '', 'transport', renderGenerationError('transport', errorMessage(error)));
        }
    }

    /**
     * Verify the primary model answers; not counted in the totals
     */
    async testConnection(): Promise<boolean> {
        const candidate = this.candidates[0];
        if (!candidate) {
            logger.error('No candidate models configured');
            return false;
        }

        try {
            await this.provider.complete({
                model: candidate.model,
                systemPrompt: this.systemPrompt,
                prompt: CONNECTION_TEST_PROMPT,
                maxOutputTokens: 10,
                temperature: 0,
            });
            logger.info('Completion provider connection verified', {
                provider: this.provider.name,
                model: candidate.model,
            });
            return true;
        } catch (error) {
            logger.error('Completion provider connection failed', {
                provider: this.provider.name,
                model: candidate.model,
                error: errorMessage(error),
            });
            return false;
        }
    }

    private async attempt(candidate: CandidateModel, prompt: string): Promise<AttemptOutcome> {
        try {
            const response = await this.provider.complete({
                model: candidate.model,
                systemPrompt: this.systemPrompt,
                prompt,
                maxOutputTokens: candidate.maxOutputTokens,
                temperature: this.temperature,
            });

            if (!response.content.trim()) {
                return {
                    ok: false,
                    failure: { model: candidate.model, kind: 'empty_response', message: 'completion was empty' },
                };
            }

            return { ok: true, model: candidate.model, response };
        } catch (error) {
            const normalized = toCompletionError(error);
            return {
                ok: false,
                failure: {
                    model: candidate.model,
                    kind: normalized.kind,
                    message: normalized.message,
                },
            };
        }
    }

    private succeed(
        topic: TopicRecord,
        inputs: PromptInputs,
        prompt: string,
        model: string,
        response: CompletionResponse
    ): GenerationResult {
        // Each side the backend leaves out is estimated on its own
        const reported: CompletionUsage = response.usage ?? {};
        const inputTokens = reported.inputTokens ?? estimateTokens(this.systemPrompt + prompt);
        const outputTokens = reported.outputTokens ?? estimateTokens(response.content);
        if (reported.inputTokens === undefined || reported.outputTokens === undefined) {
            logger.debug('Usage not fully reported, estimating', { model, inputTokens, outputTokens });
        }

        const cost = calculateCost(inputTokens, outputTokens, resolveRates(model, this.catalog, this.primaryModel));

        this.totals.totalInputTokens += inputTokens;
        this.totals.totalOutputTokens += outputTokens;
        this.totals.totalCost += cost;

        const result: GenerationResult = {
            topic: topic.topic,
            content: response.content,
            status: 'success',
            modelUsed: model,
            inputTokens,
            outputTokens,
            totalTokens: inputTokens + outputTokens,
            cost,
            wordCount: countWords(response.content),
            seoKeywordsUsed: inputs.seoKeywords,
            llmKeywordsUsed: inputs.llmKeywords,
            linksUsed: inputs.links.map(link => link.name),
        };

        logger.info('Blog generated', {
            topic: result.topic,
            model,
            tokens: result.totalTokens,
            cost: formatCost(cost),
            wordCount: result.wordCount,
        });

        return result;
    }

    private fail(
        topic: TopicRecord,
        inputs: PromptInputs,
        model: string,
        kind: GenerationErrorKind,
        error: string
    ): GenerationResult {
        logger.error('Blog generation failed', { topic: topic.topic, kind, error });

        return {
            topic: topic.topic,
            content: '',
            status: 'failed',
            error,
            errorKind: kind,
            modelUsed: model,
            inputTokens: 0,
            outputTokens: 0,
            totalTokens: 0,
            cost: 0,
            wordCount: 0,
            seoKeywordsUsed: inputs.seoKeywords,
            llmKeywordsUsed: inputs.llmKeywords,
            linksUsed: inputs.links.map(link => link.name),
        };
    }
}

/**
 * Engine wired to the configured provider and candidate models
 */
export function createGenerationEngine(overrides: Partial<GenerationEngineOptions> = {}): GenerationEngine {
    const catalog = overrides.catalog ?? MODEL_CATALOG;
    return new GenerationEngine({
        provider: overrides.provider ?? getCompletionProvider(),
        candidates: overrides.candidates
            ?? buildCandidates(getCandidateModelNames(), catalog, config.generation.maxOutputTokens),
        catalog,
        sampler: overrides.sampler,
        systemPrompt: overrides.systemPrompt,
        temperature: overrides.temperature ?? config.generation.temperature,
    });
}

export default { GenerationEngine, createGenerationEngine, renderGenerationError };
