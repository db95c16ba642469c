/**
 * Cost Report CLI
 *
 * Summarize token usage and cost across the saved blog reports.
 *
 * Usage: npm run cost-report -- --dir ./generated_blogs
 */

import fs from 'fs';
import path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import config from '../config';
import { createLogger, errorMessage } from '../logger';
import { getCandidateModelNames } from '../providers/ai';
import { renderCostReport, scanReportDirectory } from '../pipeline/costReport';
import { MODEL_CATALOG, formatCost, formatTokens } from '../pipeline/cost';

const logger = createLogger('cost-report');

async function main(): Promise<number> {
    const argv = await yargs(hideBin(process.argv))
        .option('dir', {
            alias: 'd',
            type: 'string',
            description: 'Directory holding blog_*.txt reports',
            default: config.batch.outputDir,
        })
        .option('out', {
            alias: 'o',
            type: 'string',
            description: 'Where to write the report',
            default: 'COST_REPORT.txt',
        })
        .help()
        .parse();

    const dir = path.resolve(argv.dir);
    if (!fs.existsSync(dir)) {
        logger.error('Report directory not found, generate blogs first', { dir });
        return 1;
    }

    const report = await scanReportDirectory(dir, MODEL_CATALOG, getCandidateModelNames()[0] ?? '');
    if (report.blogs.length === 0) {
        logger.error('No blog reports with token data found', { dir, untracked: report.untracked.length });
        return 1;
    }

    if (report.untracked.length > 0) {
        logger.warn('Some reports have no token or cost data', { files: report.untracked });
    }

    await fs.promises.writeFile(argv.out, renderCostReport(report, new Date()), 'utf-8');

    logger.info('Cost report saved', {
        file: argv.out,
        blogs: report.blogs.length,
        totalTokens: formatTokens(report.totalTokens),
        totalCost: formatCost(report.totalCost),
        averageCostPerBlog: formatCost(report.averageCostPerBlog),
    });

    return 0;
}

main()
    .then(code => process.exit(code))
    .catch(error => {
        logger.error('Cost report failed', { error: errorMessage(error) });
        process.exit(1);
    });
