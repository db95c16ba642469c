/**
 * Run Summary Output
 *
 * Writes the end-of-run summary as JSON and as a readable text mirror.
 */

import fs from 'fs';
import path from 'path';
import { createLogger } from '../logger';
import { fileTimestamp, formatTimestamp } from '../utils/dates';
import { formatCost, formatTokens } from './cost';
import { RunSummary, StampedResult } from './types';

const logger = createLogger('summary');

const RULE = '='.repeat(50);
const SUB_RULE = '-'.repeat(30);

export interface SummaryDocument {
    summary: Omit<RunSummary, 'startedAt' | 'completedAt'> & {
        startedAt: string;
        completedAt: string;
    };
    blogs: Array<{
        index: number;
        topic: string;
        status: StampedResult['status'];
        error?: string;
        modelUsed: string;
        inputTokens: number;
        outputTokens: number;
        totalTokens: number;
        cost: number;
        wordCount: number;
        seoKeywordsUsed: string[];
        llmKeywordsUsed: string[];
        linksUsed: string[];
        generatedAt: string;
        sinks: StampedResult['sinkOutcomes'];
    }>;
}

const RUN_ID_PREFIX_LENGTH = 8;

/**
 * "SUMMARY_20261019_083005_1b9d6bcd"
 */
export function summaryFileBase(summary: Pick<RunSummary, 'runId' | 'completedAt'>): string {
    return `SUMMARY_${fileTimestamp(summary.completedAt)}_${summary.runId.slice(0, RUN_ID_PREFIX_LENGTH)}`;
}

export interface SummaryFiles {
    jsonPath: string;
    textPath: string;
}

export function buildSummaryDocument(summary: RunSummary, results: StampedResult[]): SummaryDocument {
    return {
        summary: {
            ...summary,
            startedAt: summary.startedAt.toISOString(),
            completedAt: summary.completedAt.toISOString(),
        },
        blogs: results.map(result => ({
            index: result.sequence,
            topic: result.topic,
            status: result.status,
            error: result.error,
            modelUsed: result.modelUsed,
            inputTokens: result.inputTokens,
            outputTokens: result.outputTokens,
            totalTokens: result.totalTokens,
            cost: result.cost,
            wordCount: result.wordCount,
            seoKeywordsUsed: result.seoKeywordsUsed,
            llmKeywordsUsed: result.llmKeywordsUsed,
            linksUsed: result.linksUsed,
            generatedAt: result.generatedAt.toISOString(),
            sinks: result.sinkOutcomes,
        })),
    };
}

export function renderSummaryText(summary: RunSummary, results: StampedResult[]): string {
    const lines = [
        'BLOG GENERATION SUMMARY',
        RULE,
        `Run ID: ${summary.runId}`,
        `Generation Date: ${formatTimestamp(summary.completedAt)}`,
        `Total Blogs Attempted: ${summary.attempted}`,
        `Successfully Generated: ${summary.succeeded}`,
        `Failed: ${summary.failed}`,
        `Models Used: ${summary.modelsUsed.join(', ') || 'none'}`,
        `Total Input Tokens: ${formatTokens(summary.totalInputTokens)}`,
        `Total Output Tokens: ${formatTokens(summary.totalOutputTokens)}`,
        `Total Tokens: ${formatTokens(summary.totalTokens)}`,
        `Total Cost: ${formatCost(summary.totalCost)}`,
        `Average Cost per Blog: ${formatCost(summary.averageCostPerBlog)}`,
        `Cost per 1,000 tokens: ${formatCost(summary.costPer1kTokens)}`,
        '',
        'BLOG DETAILS:',
        SUB_RULE,
    ];

    for (const result of results) {
        lines.push('', `Blog ${result.sequence}: ${result.topic}`, `Status: ${result.status}`);
        if (result.status === 'success') {
            lines.push(
                `Model: ${result.modelUsed}`,
                `Tokens: ${formatTokens(result.totalTokens)}`,
                `Cost: ${formatCost(result.cost)}`,
                `Word Count: ${result.wordCount}`,
                `SEO Keywords: ${result.seoKeywordsUsed.join(', ')}`,
                `LLM Keywords: ${result.llmKeywordsUsed.join(', ')}`
            );
            const failedSinks = result.sinkOutcomes.filter(outcome => !outcome.ok);
            if (failedSinks.length > 0) {
                lines.push(`Sink Errors: ${failedSinks.map(outcome => `${outcome.sink} (${outcome.error})`).join('; ')}`);
            }
        } else {
            lines.push(`Error: ${result.error ?? 'Unknown'}`);
        }
        lines.push('-'.repeat(20));
    }

    return `${lines.join('\n')}\n`;
}

/**
 * Write SUMMARY_<timestamp>_<run>.json and .txt into the output directory;
 * the run id prefix keeps runs finishing in the same second apart
 */
export async function writeRunSummary(
    outputDir: string,
    summary: RunSummary,
    results: StampedResult[]
): Promise<SummaryFiles> {
    await fs.promises.mkdir(outputDir, { recursive: true });

    const base = path.join(outputDir, summaryFileBase(summary));
    const files: SummaryFiles = {
        jsonPath: `${base}.json`,
        textPath: `${base}.txt`,
    };

    await fs.promises.writeFile(
        files.jsonPath,
        JSON.stringify(buildSummaryDocument(summary, results), null, 2),
        'utf-8'
    );
    await fs.promises.writeFile(files.textPath, renderSummaryText(summary, results), 'utf-8');

    logger.info('Summary saved', files);
    return files;
}

export default { buildSummaryDocument, renderSummaryText, summaryFileBase, writeRunSummary };
