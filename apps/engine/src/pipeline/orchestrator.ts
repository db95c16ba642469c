/**
 * Pipeline Orchestrator
 *
 * Coordinates one generation run: load the corpus, check the completion
 * backend, run the batch and write the run summary.
 */

import { createLogger, errorMessage } from '../logger';
import { CorpusSource } from '../providers/data';
import { ResultSink } from '../providers/sinks/ResultSink';
import { BatchPipeline, TopicGenerator } from './batch';
import { buildCorpus, TopicCorpus } from './corpus';
import { formatCost } from './cost';
import { SummaryFiles, writeRunSummary } from './summary';
import { RunSummary, StampedResult, TopicRecord } from './types';

const logger = createLogger('orchestrator');

export interface CheckedGenerator extends TopicGenerator {
    testConnection(): Promise<boolean>;
}

export interface GenerationRunOptions {
    source: CorpusSource;
    engine: CheckedGenerator;
    sinks: ResultSink[];
    outputDir: string;
    /**
     * Topics to process; omitted means every topic
     */
    count?: number;
    /**
     * Generate this topic instead of iterating the corpus
     */
    customTopic?: TopicRecord;
    checkConnection?: boolean;
    signal?: AbortSignal;
    clock?: () => Date;
}

export type GenerationRunOutcome =
    | { ok: false; reason: string }
    | {
        ok: true;
        runId: string;
        results: StampedResult[];
        summary: RunSummary;
        summaryFiles: SummaryFiles | null;
    };

async function loadCorpus(source: CorpusSource): Promise<TopicCorpus> {
    const sheets = await source.load();
    const corpus = buildCorpus(sheets);
    logger.info('Corpus loaded', {
        source: source.name,
        topics: corpus.size,
        links: corpus.links.length,
        seoCategories: corpus.seoKeywords.categories.length,
        llmCategories: corpus.llmKeywords.categories.length,
    });
    return corpus;
}

/**
 * Run the pipeline end to end. Data and connectivity problems abort
 * before any generation and come back as `{ ok: false }`.
 */
export async function runBlogGeneration(options: GenerationRunOptions): Promise<GenerationRunOutcome> {
    let corpus: TopicCorpus;
    try {
        corpus = await loadCorpus(options.source);
    } catch (error) {
        const reason = `Failed to load corpus: ${errorMessage(error)}`;
        logger.error(reason);
        return { ok: false, reason };
    }

    if (!options.customTopic && corpus.isEmpty()) {
        const reason = 'No topics found in corpus';
        logger.error(reason);
        return { ok: false, reason };
    }

    if (options.checkConnection && !(await options.engine.testConnection())) {
        const reason = 'Completion provider connection failed';
        logger.error(reason);
        return { ok: false, reason };
    }

    const pipeline = new BatchPipeline({
        corpus,
        engine: options.engine,
        sinks: options.sinks,
        signal: options.signal,
        clock: options.clock,
    });

    const results = options.customTopic
        ? [await pipeline.runCustom(options.customTopic)]
        : await pipeline.run(options.count);

    const summary = pipeline.summarize();

    let summaryFiles: SummaryFiles | null = null;
    try {
        summaryFiles = await writeRunSummary(options.outputDir, summary, results);
    } catch (error) {
        logger.error('Failed to write run summary', { error: errorMessage(error) });
    }

    logger.info('Generation complete', {
        runId: pipeline.runId,
        succeeded: `${summary.succeeded}/${summary.attempted}`,
        totalCost: formatCost(summary.totalCost),
        averageCost: formatCost(summary.averageCostPerBlog),
    });

    return {
        ok: true,
        runId: pipeline.runId,
        results,
        summary,
        summaryFiles,
    };
}

export default { runBlogGeneration };
