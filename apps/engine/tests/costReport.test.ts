/**
 * Tests for pipeline/costReport.ts
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileReportSink, renderBlogReport } from '../src/providers/sinks';
import { MODEL_CATALOG } from '../src/pipeline/cost';
import {
    ParsedBlogReport,
    buildCostReport,
    parseBlogReport,
    renderCostReport,
    scanReportDirectory,
} from '../src/pipeline/costReport';
import { FIXED_DATE, stamped } from './helpers';

const blog = (overrides: Partial<ParsedBlogReport>): ParsedBlogReport => ({
    topic: 'Edge AI',
    model: 'gpt-4o',
    inputTokens: 1000,
    outputTokens: 2000,
    totalTokens: 3000,
    cost: 0.035,
    wordCount: 1500,
    ...overrides,
});

describe('parseBlogReport', () => {
    it('reads the header of a saved report', () => {
        const text = renderBlogReport(stamped({
            inputTokens: 1234,
            outputTokens: 2000,
            totalTokens: 3234,
            cost: 0.01234,
        }));

        expect(parseBlogReport(text)).toEqual({
            topic: 'Edge AI',
            model: 'gpt-4o',
            inputTokens: 1234,
            outputTokens: 2000,
            totalTokens: 3234,
            cost: 0.0123,
            wordCount: 2,
        });
    });

    it('defaults the model and word count', () => {
        const text = 'Topic: Legacy\nInput Tokens: 10\nOutput Tokens: 20\nCost: $0.0100\n';
        expect(parseBlogReport(text)).toEqual({
            topic: 'Legacy',
            model: 'Unknown',
            inputTokens: 10,
            outputTokens: 20,
            totalTokens: 30,
            cost: 0.01,
            wordCount: 0,
        });
    });

    it('returns null without token data', () => {
        expect(parseBlogReport('Topic: Old report\nWord Count: 900\n')).toBeNull();
    });
});

describe('buildCostReport', () => {
    it('totals blogs and breaks cost down by model', () => {
        const report = buildCostReport([
            blog({}),
            blog({ topic: 'Other', model: 'gpt-4o-mini', inputTokens: 2000, outputTokens: 1000, totalTokens: 3000, cost: 0.0009 }),
            blog({ topic: 'Third', cost: 0.035 }),
        ]);

        expect(report.totalInputTokens).toBe(4000);
        expect(report.totalOutputTokens).toBe(5000);
        expect(report.totalTokens).toBe(9000);
        expect(report.totalCost).toBeCloseTo(0.0709, 12);
        expect(report.averageCostPerBlog).toBeCloseTo(0.0709 / 3, 12);
        expect(report.averageTokensPerBlog).toBe(3000);
        expect(report.byModel.map(entry => [entry.model, entry.blogs])).toEqual([
            ['gpt-4o', 2],
            ['gpt-4o-mini', 1],
        ]);
        expect(report.byModel[0].inputCost).toBeCloseTo(0.01, 12);
        expect(report.byModel[0].outputCost).toBeCloseTo(0.06, 12);
        expect(report.byModel[1].inputCost).toBeCloseTo(0.0003, 12);
        expect(report.byModel[1].outputCost).toBeCloseTo(0.0006, 12);
    });

    it('prices models missing from the catalog at the primary model rates', () => {
        const report = buildCostReport(
            [blog({ model: 'backup-model', inputTokens: 1000, outputTokens: 1000, totalTokens: 2000, cost: 0.02 })],
            [],
            MODEL_CATALOG,
            'gpt-4o'
        );

        expect(report.byModel).toHaveLength(1);
        expect(report.byModel[0].model).toBe('backup-model');
        expect(report.byModel[0].inputCost).toBeCloseTo(0.005, 12);
        expect(report.byModel[0].outputCost).toBeCloseTo(0.015, 12);
        expect(report.byModel[0].inputCost + report.byModel[0].outputCost).toBeCloseTo(report.totalCost, 12);
    });

    it('guards averages for an empty directory', () => {
        const report = buildCostReport([]);
        expect(report.averageCostPerBlog).toBe(0);
        expect(report.costPer1kTokens).toBe(0);
        expect(report.averageTokensPerBlog).toBe(0);
    });
});

describe('renderCostReport', () => {
    it('renders summary and per-blog lines', () => {
        const lines = renderCostReport(buildCostReport([blog({})], ['blog_09_old.txt']), FIXED_DATE).split('\n');

        expect(lines).toContain('Report Generated: 2026-10-19 08:30:05');
        expect(lines).toContain('Total Blogs: 1');
        expect(lines).toContain('Total Tokens: 3,000');
        expect(lines).toContain('Total Cost: $0.0350');
        expect(lines).toContain('Reports without token data: 1');
        expect(lines).toContain('gpt-4o (1 blogs)');
        expect(lines).toContain('  Input Token Cost: $0.0050');
        expect(lines).toContain('  Output Token Cost: $0.0300');
        expect(lines).toContain('Blog 1: Edge AI');
        expect(lines).toContain('  Word Count: 1500');
    });
});

describe('scanReportDirectory', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cost-report-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('parses saved reports and lists the untracked ones', async () => {
        const sink = new FileReportSink(dir);
        await sink.store(stamped({ sequence: 2, topic: 'Second', inputTokens: 100, outputTokens: 200, cost: 0.0035 }));
        await sink.store(stamped({ sequence: 1, topic: 'First', inputTokens: 1000, outputTokens: 2000, cost: 0.035 }));
        fs.writeFileSync(path.join(dir, 'blog_03_old.txt'), 'Topic: Old\nno numbers here\n');
        fs.writeFileSync(path.join(dir, 'SUMMARY_20261019_083005.txt'), 'ignored');

        const report = await scanReportDirectory(dir);

        expect(report.blogs.map(parsed => parsed.topic)).toEqual(['First', 'Second']);
        expect(report.untracked).toEqual(['blog_03_old.txt']);
        expect(report.totalInputTokens).toBe(1100);
        expect(report.totalCost).toBeCloseTo(0.0385, 12);
    });
});
