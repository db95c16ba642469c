/**
 * Tests for pipeline/corpus.ts
 */

import { CorpusSheets, emptySheet } from '../src/providers/data';
import { TopicCorpus, buildCorpus, customTopic } from '../src/pipeline/corpus';

function sheets(overrides: Partial<CorpusSheets> = {}): CorpusSheets {
    return {
        'SEO - Keywords': emptySheet(),
        'LLM - Keywords': emptySheet(),
        'Website': emptySheet(),
        'key topics': emptySheet(),
        ...overrides,
    };
}

describe('buildCorpus', () => {
    it('groups keywords by column and skips blank cells', () => {
        const corpus = buildCorpus(sheets({
            'SEO - Keywords': {
                headers: ['Core', 'Long tail'],
                rows: [
                    { 'Core': 'k1', 'Long tail': 'lt1' },
                    { 'Core': 'k2', 'Long tail': '' },
                ],
            },
        }));

        expect(corpus.seoKeywords.categories).toEqual([
            { name: 'Core', keywords: ['k1', 'k2'] },
            { name: 'Long tail', keywords: ['lt1'] },
        ]);
        expect(corpus.llmKeywords.categories).toEqual([]);
    });

    it('fills missing link and topic fields with defaults', () => {
        const corpus = buildCorpus(sheets({
            'Website': {
                headers: ['Name', 'URL'],
                rows: [{ 'Name': '', 'URL': 'https://x' }, { 'Name': 'Docs', 'URL': '' }],
            },
            'key topics': {
                headers: ['Topic', 'Description', 'Source & URL'],
                rows: [
                    { 'Topic': 'Edge AI', 'Description': 'Inference at the edge', 'Source & URL': 'https://src' },
                    { 'Topic': '', 'Description': 'orphan', 'Source & URL': '' },
                ],
            },
        }));

        expect(corpus.links).toEqual([
            { name: 'Link', url: 'https://x' },
            { name: 'Docs', url: '' },
        ]);
        expect(corpus.topics).toEqual([
            { topic: 'Edge AI', description: 'Inference at the edge', sourceUrl: 'https://src' },
            { topic: 'Topic 2', description: 'orphan', sourceUrl: '' },
        ]);
    });

    it('tolerates sheets without the expected columns', () => {
        const corpus = buildCorpus(sheets({
            'key topics': { headers: ['Other'], rows: [{ 'Other': 'x' }] },
        }));

        expect(corpus.topicAt(0)).toEqual({ topic: 'Topic 1', description: '', sourceUrl: '' });
    });
});

describe('TopicCorpus', () => {
    const corpus = new TopicCorpus({
        seoKeywords: { categories: [{ name: 'Core', keywords: ['k1'] }] },
        llmKeywords: { categories: [] },
        links: [],
        topics: [{ topic: 'A', description: '', sourceUrl: '' }],
    });

    it('reports its size', () => {
        expect(corpus.size).toBe(1);
        expect(corpus.isEmpty()).toBe(false);
    });

    it('rejects an out of range index', () => {
        expect(() => corpus.topicAt(1)).toThrow(RangeError);
    });

    it('is frozen', () => {
        expect(Object.isFrozen(corpus.topics)).toBe(true);
        expect(Object.isFrozen(corpus.topics[0])).toBe(true);
        expect(Object.isFrozen(corpus.seoKeywords.categories[0].keywords)).toBe(true);
    });

    it('lists keywords by category name', () => {
        expect(corpus.keywordCategories()).toEqual({ seo: { Core: ['k1'] }, llm: {} });
    });
});

describe('customTopic', () => {
    it('fills the user-input defaults', () => {
        expect(customTopic('Quantum sensing')).toEqual({
            topic: 'Quantum sensing',
            description: 'Custom topic provided by user',
            sourceUrl: 'User input',
        });
    });
});
