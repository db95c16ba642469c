/**
 * Tests for pipeline/orchestrator.ts
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { CorpusLoadError, CorpusSheets, CorpusSource, emptySheet } from '../src/providers/data';
import { CheckedGenerator, runBlogGeneration } from '../src/pipeline/orchestrator';
import { GenerationResult, TopicRecord } from '../src/pipeline/types';
import { RecordingSink, fixedClock, successResult } from './helpers';

class StaticSource implements CorpusSource {
    readonly name = 'static';
    private topics: string[];

    constructor(topics: string[]) {
        this.topics = topics;
    }

    async load(): Promise<CorpusSheets> {
        return {
            'SEO - Keywords': { headers: ['Core'], rows: [{ 'Core': 'k1' }] },
            'LLM - Keywords': emptySheet(),
            'Website': emptySheet(),
            'key topics': {
                headers: ['Topic'],
                rows: this.topics.map(topic => ({ 'Topic': topic })),
            },
        };
    }
}

class BrokenSource implements CorpusSource {
    readonly name = 'broken';

    async load(): Promise<CorpusSheets> {
        throw new CorpusLoadError('Workbook not found at /nowhere.xlsx');
    }
}

class FakeEngine implements CheckedGenerator {
    readonly generated: string[] = [];
    private connected: boolean;

    constructor(connected = true) {
        this.connected = connected;
    }

    async testConnection(): Promise<boolean> {
        return this.connected;
    }

    async generate(topic: TopicRecord): Promise<GenerationResult> {
        this.generated.push(topic.topic);
        return successResult({ topic: topic.topic });
    }
}

describe('runBlogGeneration', () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'run-'));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('aborts when the corpus cannot be loaded', async () => {
        const outcome = await runBlogGeneration({
            source: new BrokenSource(),
            engine: new FakeEngine(),
            sinks: [],
            outputDir: dir,
        });

        expect(outcome).toEqual({
            ok: false,
            reason: 'Failed to load corpus: Workbook not found at /nowhere.xlsx',
        });
    });

    it('aborts when the corpus has no topics', async () => {
        const outcome = await runBlogGeneration({
            source: new StaticSource([]),
            engine: new FakeEngine(),
            sinks: [],
            outputDir: dir,
        });

        expect(outcome).toEqual({ ok: false, reason: 'No topics found in corpus' });
    });

    it('aborts before generating when the connection check fails', async () => {
        const engine = new FakeEngine(false);
        const outcome = await runBlogGeneration({
            source: new StaticSource(['A']),
            engine,
            sinks: [],
            outputDir: dir,
            checkConnection: true,
        });

        expect(outcome).toEqual({ ok: false, reason: 'Completion provider connection failed' });
        expect(engine.generated).toEqual([]);
    });

    it('runs the batch and writes the summary', async () => {
        const log: string[] = [];
        const engine = new FakeEngine();
        const outcome = await runBlogGeneration({
            source: new StaticSource(['A', 'B', 'C']),
            engine,
            sinks: [new RecordingSink('file', 'local', log)],
            outputDir: dir,
            count: 2,
            checkConnection: true,
            clock: fixedClock,
        });

        if (!outcome.ok) {
            throw new Error(`unexpected abort: ${outcome.reason}`);
        }
        expect(engine.generated).toEqual(['A', 'B']);
        expect(log).toEqual(['file:A', 'file:B']);
        expect(outcome.summary.succeeded).toBe(2);
        const base = `SUMMARY_20261019_083005_${outcome.runId.slice(0, 8)}`;
        expect(outcome.summaryFiles).toEqual({
            jsonPath: path.join(dir, `${base}.json`),
            textPath: path.join(dir, `${base}.txt`),
        });
        expect(fs.existsSync(path.join(dir, `${base}.json`))).toBe(true);
    });

    it('generates a custom topic even with an empty corpus', async () => {
        const engine = new FakeEngine();
        const outcome = await runBlogGeneration({
            source: new StaticSource([]),
            engine,
            sinks: [],
            outputDir: dir,
            customTopic: { topic: 'Custom', description: 'd', sourceUrl: 'User input' },
        });

        expect(outcome.ok).toBe(true);
        expect(engine.generated).toEqual(['Custom']);
    });

    it('still succeeds when the summary cannot be written', async () => {
        const blocked = path.join(dir, 'not-a-dir');
        fs.writeFileSync(blocked, '');

        const outcome = await runBlogGeneration({
            source: new StaticSource(['A']),
            engine: new FakeEngine(),
            sinks: [],
            outputDir: blocked,
        });

        expect(outcome.ok).toBe(true);
        if (outcome.ok) {
            expect(outcome.summaryFiles).toBeNull();
            expect(outcome.results).toHaveLength(1);
        }
    });
});
