/**
 * Batch Pipeline
 *
 * Runs the generation engine over the corpus topics in order, keeps
 * the run's totals and forwards successful results to the sinks.
 */

import { v4 as uuid } from 'uuid';
import { createLogger, errorMessage } from '../logger';
import { ResultSink } from '../providers/sinks/ResultSink';
import { TopicCorpus } from './corpus';
import { formatCost, safeDivide } from './cost';
import {
    GenerationResult,
    KeywordCollection,
    LinkRecord,
    RunSummary,
    RunningTotals,
    SinkOutcome,
    StampedResult,
    TopicRecord,
} from './types';

const logger = createLogger('batch-pipeline');

/**
 * Anything that turns a topic into a GenerationResult without throwing
 */
export interface TopicGenerator {
    generate(
        topic: TopicRecord,
        seoKeywords: KeywordCollection,
        llmKeywords: KeywordCollection,
        links: readonly LinkRecord[]
    ): Promise<GenerationResult>;
}

export interface BatchPipelineOptions {
    corpus: TopicCorpus;
    engine: TopicGenerator;
    sinks?: ResultSink[];
    /**
     * Checked between topics; an in-flight generation always completes
     */
    signal?: AbortSignal;
    clock?: () => Date;
    runId?: string;
}

/**
 * Number of topics a run will process
 */
export function clampCount(count: number | undefined, corpusSize: number): number {
    if (count === undefined) {
        return corpusSize;
    }
    if (!Number.isFinite(count)) {
        return 0;
    }
    return Math.max(0, Math.min(Math.floor(count), corpusSize));
}

export class BatchPipeline {
    readonly runId: string;
    private corpus: TopicCorpus;
    private engine: TopicGenerator;
    private sinks: ResultSink[];
    private signal?: AbortSignal;
    private clock: () => Date;
    private startedAt: Date;
    private results: StampedResult[] = [];
    private totals: RunningTotals = {
        totalInputTokens: 0,
        totalOutputTokens: 0,
        totalCost: 0,
    };

    constructor(options: BatchPipelineOptions) {
        this.corpus = options.corpus;
        this.engine = options.engine;
        // Stable sort keeps the configured order within each kind
        this.sinks = [...(options.sinks ?? [])].sort((a, b) => sinkRank(a) - sinkRank(b));
        this.signal = options.signal;
        this.clock = options.clock ?? (() => new Date());
        this.runId = options.runId ?? uuid();
        this.startedAt = this.clock();
    }

    /**
     * Generate blogs for the first `count` topics, or all when omitted
     */
    async run(count?: number): Promise<StampedResult[]> {
        const total = clampCount(count, this.corpus.size);
        const produced: StampedResult[] = [];

        logger.info('Starting batch', {
            runId: this.runId,
            requested: count ?? 'all',
            topics: total,
            sinks: this.sinks.map(sink => sink.name),
        });

        for (let index = 0; index < total; index++) {
            if (this.signal?.aborted) {
                logger.warn('Batch cancelled', { runId: this.runId, processed: index, remaining: total - index });
                break;
            }

            const topic = this.corpus.topicAt(index);
            logger.info(`Blog ${index + 1}/${total}: ${topic.topic}`);

            produced.push(await this.process(topic, index + 1));
        }

        logger.info('Batch finished', {
            runId: this.runId,
            attempted: produced.length,
            succeeded: produced.filter(result => result.status === 'success').length,
            totalCost: formatCost(this.totals.totalCost),
        });

        return produced;
    }

    /**
     * Generate a single blog for a topic outside the corpus
     */
    async runCustom(topic: TopicRecord): Promise<StampedResult> {
        logger.info('Generating custom topic', { runId: this.runId, topic: topic.topic });
        return this.process(topic, 1);
    }

    getResults(): StampedResult[] {
        return [...this.results];
    }

    getTotals(): RunningTotals {
        return { ...this.totals };
    }

    /**
     * Statistics over every result this pipeline has produced
     */
    summarize(): RunSummary {
        const succeeded = this.results.filter(result => result.status === 'success');
        const totalTokens = this.totals.totalInputTokens + this.totals.totalOutputTokens;
        const modelsUsed = [...new Set(succeeded.map(result => result.modelUsed))];

        return {
            runId: this.runId,
            startedAt: this.startedAt,
            completedAt: this.clock(),
            attempted: this.results.length,
            succeeded: succeeded.length,
            failed: this.results.length - succeeded.length,
            totalInputTokens: this.totals.totalInputTokens,
            totalOutputTokens: this.totals.totalOutputTokens,
            totalTokens,
            totalCost: this.totals.totalCost,
            averageCostPerBlog: safeDivide(this.totals.totalCost, succeeded.length),
            costPer1kTokens: safeDivide(this.totals.totalCost * 1000, totalTokens),
            modelsUsed,
        };
    }

    private async process(topic: TopicRecord, sequence: number): Promise<StampedResult> {
        const generated = await this.engine.generate(
            topic,
            this.corpus.seoKeywords,
            this.corpus.llmKeywords,
            this.corpus.links
        );

        const result: StampedResult = {
            ...generated,
            sequence,
            generatedAt: this.clock(),
            sinkOutcomes: [],
        };
        this.results.push(result);

        if (result.status !== 'success') {
            logger.error('Blog failed', { sequence, topic: result.topic, error: result.error });
            return result;
        }

        this.totals.totalInputTokens += result.inputTokens;
        this.totals.totalOutputTokens += result.outputTokens;
        this.totals.totalCost += result.cost;

        logger.info('Blog succeeded', {
            sequence,
            topic: result.topic,
            words: result.wordCount,
            cost: formatCost(result.cost),
            runningCost: formatCost(this.totals.totalCost),
        });

        for (const sink of this.sinks) {
            result.sinkOutcomes.push(await this.store(sink, result));
        }

        return result;
    }

    private async store(sink: ResultSink, result: StampedResult): Promise<SinkOutcome> {
        try {
            await sink.store(result);
            return { sink: sink.name, ok: true };
        } catch (error) {
            const message = errorMessage(error);
            logger.error('Sink write failed', { sink: sink.name, topic: result.topic, error: message });
            return { sink: sink.name, ok: false, error: message };
        }
    }
}

function sinkRank(sink: ResultSink): number {
    return sink.kind === 'local' ? 0 : 1;
}

export default { BatchPipeline, clampCount };
