/**
 * Generate CLI
 *
 * Run one batch: load the workbook, generate blogs, save reports.
 *
 * Usage: npm run generate -- --count 3
 *        npm run generate -- --all --no-remote
 *        npm run generate -- --topic "Edge AI in retail"
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config, { validateConfig } from '../config';
import { createLogger, errorMessage } from '../logger';
import { WorkbookCorpusSource } from '../providers/data';
import { createDefaultSinks } from '../providers/sinks';
import { buildCorpus, customTopic } from '../pipeline/corpus';
import { createGenerationEngine } from '../pipeline/engine';
import { runBlogGeneration } from '../pipeline/orchestrator';
import { formatCost, formatTokens } from '../pipeline/cost';

const logger = createLogger('generate');

async function listTopics(filePath: string): Promise<void> {
    const corpus = buildCorpus(await new WorkbookCorpusSource(filePath).load());
    corpus.topics.forEach((topic, index) => {
        logger.info(`${index}: ${topic.topic}`, { description: topic.description, source: topic.sourceUrl });
    });

    const categories = corpus.keywordCategories();
    logger.info('SEO keyword categories', { categories: Object.keys(categories.seo) });
    logger.info('LLM keyword categories', { categories: Object.keys(categories.llm) });
}

async function main(): Promise<number> {
    const argv = await yargs(hideBin(process.argv))
        .option('count', {
            alias: 'n',
            type: 'number',
            description: 'Number of topics to generate',
            default: config.batch.defaultCount,
        })
        .option('all', {
            type: 'boolean',
            description: 'Generate every topic in the workbook',
            default: false,
        })
        .option('topic', {
            alias: 't',
            type: 'string',
            description: 'Generate a single custom topic instead of the workbook topics',
        })
        .option('file', {
            alias: 'f',
            type: 'string',
            description: 'Path to the workbook',
            default: config.corpus.filePath,
        })
        .option('out', {
            alias: 'o',
            type: 'string',
            description: 'Output directory for reports',
            default: config.batch.outputDir,
        })
        .option('remote', {
            type: 'boolean',
            description: 'Append results to the configured remote sinks (use --no-remote to skip)',
            default: true,
        })
        .option('list', {
            type: 'boolean',
            description: 'List workbook topics and keyword categories, then exit',
            default: false,
        })
        .help()
        .parse();

    if (argv.list) {
        await listTopics(argv.file);
        return 0;
    }

    validateConfig();

    const controller = new AbortController();
    process.once('SIGINT', () => {
        logger.warn('Interrupt received, stopping after the current topic');
        controller.abort();
    });

    const outcome = await runBlogGeneration({
        source: new WorkbookCorpusSource(argv.file),
        engine: createGenerationEngine(),
        sinks: createDefaultSinks({ outputDir: argv.out, includeRemote: argv.remote }),
        outputDir: argv.out,
        count: argv.all ? undefined : argv.count,
        customTopic: argv.topic ? customTopic(argv.topic) : undefined,
        checkConnection: true,
        signal: controller.signal,
    });

    if (!outcome.ok) {
        logger.error('Generation aborted', { reason: outcome.reason });
        return 1;
    }

    const { summary } = outcome;
    logger.info('Run summary', {
        succeeded: `${summary.succeeded}/${summary.attempted}`,
        totalTokens: formatTokens(summary.totalTokens),
        totalCost: formatCost(summary.totalCost),
        averageCostPerBlog: formatCost(summary.averageCostPerBlog),
        summaryFile: outcome.summaryFiles?.textPath,
    });

    return 0;
}

main()
    .then(code => process.exit(code))
    .catch(error => {
        logger.error('Generation failed', { error: errorMessage(error) });
        process.exit(1);
    });
