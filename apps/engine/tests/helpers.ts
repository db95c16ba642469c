/**
 * In-process fakes shared by the tests
 */

import {
    CompletionProvider,
    CompletionRequest,
    CompletionResponse,
} from '../src/providers/ai';
import { ResultSink } from '../src/providers/sinks/ResultSink';
import { TopicCorpus } from '../src/pipeline/corpus';
import {
    GenerationResult,
    KeywordCollection,
    LinkRecord,
    StampedResult,
    TopicRecord,
} from '../src/pipeline/types';

export const FIXED_DATE = new Date(2026, 9, 19, 8, 30, 5);

export const fixedClock = (): Date => new Date(FIXED_DATE.getTime());

export class StubProvider implements CompletionProvider {
    readonly name = 'stub';
    readonly calls: CompletionRequest[] = [];
    private handler: (request: CompletionRequest) => CompletionResponse | Promise<CompletionResponse>;

    constructor(handler: (request: CompletionRequest) => CompletionResponse | Promise<CompletionResponse>) {
        this.handler = handler;
    }

    async complete(request: CompletionRequest): Promise<CompletionResponse> {
        this.calls.push(request);
        return this.handler(request);
    }

    isConfigured(): boolean {
        return true;
    }
}

export function keywords(name: string, values: string[]): KeywordCollection {
    return { categories: [{ name, keywords: values }] };
}

export function topics(...names: string[]): TopicRecord[] {
    return names.map(name => ({ topic: name, description: `${name} description`, sourceUrl: `https://example.test/${name}` }));
}

export function makeCorpus(topicRecords: TopicRecord[], links: LinkRecord[] = [{ name: 'Docs', url: 'https://x' }]): TopicCorpus {
    return new TopicCorpus({
        seoKeywords: keywords('SEO', ['k1', 'k2', 'k3', 'k4', 'k5', 'k6']),
        llmKeywords: keywords('LLM', ['j1', 'j2', 'j3', 'j4', 'j5', 'j6']),
        links,
        topics: topicRecords,
    });
}

export function successResult(overrides: Partial<GenerationResult> = {}): GenerationResult {
    return {
        topic: 'Edge AI',
        content: 'hello world',
        status: 'success',
        modelUsed: 'gpt-4o',
        inputTokens: 50,
        outputTokens: 2,
        totalTokens: 52,
        cost: 0.00028,
        wordCount: 2,
        seoKeywordsUsed: ['k1', 'k2'],
        llmKeywordsUsed: ['j1'],
        linksUsed: ['Docs'],
        ...overrides,
    };
}

export function stamped(overrides: Partial<StampedResult> = {}): StampedResult {
    return {
        ...successResult(),
        sequence: 1,
        generatedAt: new Date(FIXED_DATE.getTime()),
        sinkOutcomes: [],
        ...overrides,
    };
}

/**
 * Records every store() call into a shared log
 */
export class RecordingSink implements ResultSink {
    readonly name: string;
    readonly kind: 'local' | 'remote';
    readonly stored: StampedResult[] = [];
    private log: string[];
    private failWith?: string;

    constructor(name: string, kind: 'local' | 'remote', log: string[], failWith?: string) {
        this.name = name;
        this.kind = kind;
        this.log = log;
        this.failWith = failWith;
    }

    async store(result: StampedResult): Promise<void> {
        this.log.push(`${this.name}:${result.topic}`);
        if (this.failWith) {
            throw new Error(this.failWith);
        }
        this.stored.push(result);
    }

    isConfigured(): boolean {
        return true;
    }

    async testConnection(): Promise<boolean> {
        return true;
    }
}
