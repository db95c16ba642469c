import fs from 'fs';
import path from 'path';
import slugify from 'slugify';
import config from '../../config';
import { createLogger, errorMessage } from '../../logger';
import { formatCost, formatTokens } from '../../pipeline/cost';
import { StampedResult } from '../../pipeline/types';
import { formatTimestamp } from '../../utils/dates';
import { ResultSink } from './ResultSink';

const logger = createLogger('file-report-sink');

export const REPORT_RULE = '='.repeat(50);

const MAX_SLUG_LENGTH = 30;

/**
 * File name for a result: blog_NN_<topic>.txt
 */
export function reportFileName(result: Pick<StampedResult, 'sequence' | 'topic'>): string {
    const slug = slugify(result.topic, {
        replacement: '_',
        strict: true,
        trim: true,
    }).slice(0, MAX_SLUG_LENGTH) || 'topic';

    return `blog_${String(result.sequence).padStart(2, '0')}_${slug}.txt`;
}

/**
 * Header block followed by the raw generated content
 */
export function renderBlogReport(result: StampedResult): string {
    const header = [
        'BLOG GENERATION REPORT',
        REPORT_RULE,
        `Topic: ${result.topic}`,
        `Model Used: ${result.modelUsed}`,
        `Input Tokens: ${formatTokens(result.inputTokens)}`,
        `Output Tokens: ${formatTokens(result.outputTokens)}`,
        `Total Tokens: ${formatTokens(result.totalTokens)}`,
        `Cost: ${formatCost(result.cost)}`,
        `Word Count: ${result.wordCount}`,
        `Generated: ${formatTimestamp(result.generatedAt)}`,
        `SEO Keywords: ${result.seoKeywordsUsed.join(', ')}`,
        `LLM Keywords: ${result.llmKeywordsUsed.join(', ')}`,
        `Links Used: ${result.linksUsed.join(', ')}`,
    ];

    return `${header.join('\n')}\n\n${REPORT_RULE}\n\n${result.content}`;
}

/**
 * Writes one plain-text report per successful blog
 */
export class FileReportSink implements ResultSink {
    readonly name = 'file-report';
    readonly kind = 'local';
    readonly outputDir: string;

    constructor(outputDir: string = config.batch.outputDir) {
        this.outputDir = outputDir;
    }

    isConfigured(): boolean {
        return this.outputDir.length > 0;
    }

    async testConnection(): Promise<boolean> {
        try {
            await fs.promises.mkdir(this.outputDir, { recursive: true });
            await fs.promises.access(this.outputDir, fs.constants.W_OK);
            return true;
        } catch (error) {
            logger.error('Output directory not writable', {
                outputDir: this.outputDir,
                error: errorMessage(error),
            });
            return false;
        }
    }

    reportPath(result: Pick<StampedResult, 'sequence' | 'topic'>): string {
        return path.join(this.outputDir, reportFileName(result));
    }

    async store(result: StampedResult): Promise<void> {
        const filePath = this.reportPath(result);

        await fs.promises.mkdir(this.outputDir, { recursive: true });
        await fs.promises.writeFile(filePath, renderBlogReport(result), 'utf-8');

        logger.info('Blog report saved', { topic: result.topic, filePath });
    }
}
