/**
 * Cost Report
 *
 * Rebuilds token and cost totals from the per-blog report files in the
 * output directory.
 */

import fs from 'fs';
import path from 'path';
import { formatTimestamp } from '../utils/dates';
import {
    MODEL_CATALOG,
    calculateCost,
    formatCost,
    formatTokens,
    resolveRates,
    safeDivide,
} from './cost';
import { ModelCatalog } from './types';

export interface ParsedBlogReport {
    topic: string;
    model: string;
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
    cost: number;
    wordCount: number;
}

export interface ModelCostBreakdown {
    model: string;
    blogs: number;
    inputTokens: number;
    outputTokens: number;
    inputCost: number;
    outputCost: number;
}

export interface CostReport {
    blogs: ParsedBlogReport[];
    /**
     * Report files without token or cost lines
     */
    untracked: string[];
    totalInputTokens: number;
    totalOutputTokens: number;
    totalTokens: number;
    totalCost: number;
    averageCostPerBlog: number;
    costPer1kTokens: number;
    averageTokensPerBlog: number;
    byModel: ModelCostBreakdown[];
}

const REPORT_FILE_PATTERN = /^blog_.*\.txt$/;

const parseCount = (value: string): number => parseInt(value.replace(/,/g, ''), 10);

/**
 * Parse the header of a blog report; null when token or cost data is missing
 */
export function parseBlogReport(text: string): ParsedBlogReport | null {
    const topic = /^Topic: (.+)$/m.exec(text);
    const inputTokens = /^Input Tokens: ([\d,]+)$/m.exec(text);
    const outputTokens = /^Output Tokens: ([\d,]+)$/m.exec(text);
    const cost = /^Cost: \$([\d.]+)$/m.exec(text);
    const wordCount = /^Word Count: (\d+)$/m.exec(text);
    const model = /^Model Used: (.+)$/m.exec(text);

    if (!topic || !inputTokens || !outputTokens || !cost) {
        return null;
    }

    const input = parseCount(inputTokens[1]);
    const output = parseCount(outputTokens[1]);

    return {
        topic: topic[1].trim(),
        model: model ? model[1].trim() : 'Unknown',
        inputTokens: input,
        outputTokens: output,
        totalTokens: input + output,
        cost: parseFloat(cost[1]),
        wordCount: wordCount ? parseInt(wordCount[1], 10) : 0,
    };
}

/**
 * Models missing from the catalog are priced at `primaryModel`'s rates,
 * matching how the engine billed them
 */
export function buildCostReport(
    blogs: ParsedBlogReport[],
    untracked: string[] = [],
    catalog: ModelCatalog = MODEL_CATALOG,
    primaryModel = ''
): CostReport {
    const totalInputTokens = blogs.reduce((sum, blog) => sum + blog.inputTokens, 0);
    const totalOutputTokens = blogs.reduce((sum, blog) => sum + blog.outputTokens, 0);
    const totalCost = blogs.reduce((sum, blog) => sum + blog.cost, 0);
    const totalTokens = totalInputTokens + totalOutputTokens;

    const byModel = new Map<string, ModelCostBreakdown>();
    for (const blog of blogs) {
        const entry = byModel.get(blog.model) ?? {
            model: blog.model,
            blogs: 0,
            inputTokens: 0,
            outputTokens: 0,
            inputCost: 0,
            outputCost: 0,
        };
        const rates = resolveRates(blog.model, catalog, primaryModel);
        entry.blogs += 1;
        entry.inputTokens += blog.inputTokens;
        entry.outputTokens += blog.outputTokens;
        entry.inputCost += calculateCost(blog.inputTokens, 0, rates);
        entry.outputCost += calculateCost(0, blog.outputTokens, rates);
        byModel.set(blog.model, entry);
    }

    return {
        blogs,
        untracked,
        totalInputTokens,
        totalOutputTokens,
        totalTokens,
        totalCost,
        averageCostPerBlog: safeDivide(totalCost, blogs.length),
        costPer1kTokens: safeDivide(totalCost * 1000, totalTokens),
        averageTokensPerBlog: safeDivide(totalTokens, blogs.length),
        byModel: [...byModel.values()],
    };
}

/**
 * Parse every blog_*.txt report in a directory, in file name order
 */
export async function scanReportDirectory(
    outputDir: string,
    catalog: ModelCatalog = MODEL_CATALOG,
    primaryModel = ''
): Promise<CostReport> {
    const files = (await fs.promises.readdir(outputDir))
        .filter(file => REPORT_FILE_PATTERN.test(file))
        .sort();

    const blogs: ParsedBlogReport[] = [];
    const untracked: string[] = [];
    for (const file of files) {
        const text = await fs.promises.readFile(path.join(outputDir, file), 'utf-8');
        const parsed = parseBlogReport(text);
        if (parsed) {
            blogs.push(parsed);
        } else {
            untracked.push(file);
        }
    }

    return buildCostReport(blogs, untracked, catalog, primaryModel);
}

export function renderCostReport(report: CostReport, generatedAt: Date): string {
    const lines = [
        'BLOG GENERATION - TOKEN USAGE AND COST REPORT',
        '='.repeat(60),
        '',
        `Report Generated: ${formatTimestamp(generatedAt)}`,
        '',
        'SUMMARY:',
        '-'.repeat(30),
        `Total Blogs: ${report.blogs.length}`,
        `Total Input Tokens: ${formatTokens(report.totalInputTokens)}`,
        `Total Output Tokens: ${formatTokens(report.totalOutputTokens)}`,
        `Total Tokens: ${formatTokens(report.totalTokens)}`,
        `Total Cost: ${formatCost(report.totalCost)}`,
        `Average Cost per Blog: ${formatCost(report.averageCostPerBlog)}`,
        `Cost per 1,000 tokens: ${formatCost(report.costPer1kTokens)}`,
        `Average Tokens per Blog: ${formatTokens(Math.round(report.averageTokensPerBlog))}`,
    ];

    if (report.untracked.length > 0) {
        lines.push(`Reports without token data: ${report.untracked.length}`);
    }

    lines.push('', 'PRICING BREAKDOWN:', '-'.repeat(30));
    for (const entry of report.byModel) {
        lines.push(
            `${entry.model} (${entry.blogs} blogs)`,
            `  Input Token Cost: ${formatCost(entry.inputCost)}`,
            `  Output Token Cost: ${formatCost(entry.outputCost)}`
        );
    }

    lines.push('', 'INDIVIDUAL BLOG DETAILS:', '-'.repeat(30));
    report.blogs.forEach((blog, index) => {
        lines.push(
            '',
            `Blog ${index + 1}: ${blog.topic}`,
            `  Input Tokens: ${formatTokens(blog.inputTokens)}`,
            `  Output Tokens: ${formatTokens(blog.outputTokens)}`,
            `  Total Tokens: ${formatTokens(blog.totalTokens)}`,
            `  Word Count: ${blog.wordCount}`,
            `  Cost: ${formatCost(blog.cost)}`
        );
    });

    return `${lines.join('\n')}\n`;
}

export default { parseBlogReport, buildCostReport, scanReportDirectory, renderCostReport };
