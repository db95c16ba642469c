/**
 * Topic Corpus
 *
 * Immutable, typed view over the loaded topics, keywords and links.
 */

import { CorpusSheets, SheetTable } from '../providers/data';
import { KeywordCategory, KeywordCollection, LinkRecord, TopicRecord } from './types';

// Workbook column names
export const TOPIC_COLUMNS = {
    topic: 'Topic',
    description: 'Description',
    source: 'Source & URL',
} as const;

export const LINK_COLUMNS = {
    name: 'Name',
    url: 'URL',
} as const;

export const DEFAULT_LINK_NAME = 'Link';

export interface TopicCorpusParts {
    seoKeywords: KeywordCollection;
    llmKeywords: KeywordCollection;
    links: readonly LinkRecord[];
    topics: readonly TopicRecord[];
}

export class TopicCorpus {
    readonly seoKeywords: KeywordCollection;
    readonly llmKeywords: KeywordCollection;
    readonly links: readonly LinkRecord[];
    readonly topics: readonly TopicRecord[];

    constructor(parts: TopicCorpusParts) {
        this.seoKeywords = freezeCollection(parts.seoKeywords);
        this.llmKeywords = freezeCollection(parts.llmKeywords);
        this.links = Object.freeze(parts.links.map(link => Object.freeze({ ...link })));
        this.topics = Object.freeze(parts.topics.map(topic => Object.freeze({ ...topic })));
    }

    get size(): number {
        return this.topics.length;
    }

    isEmpty(): boolean {
        return this.topics.length === 0;
    }

    topicAt(index: number): TopicRecord {
        const topic = this.topics[index];
        if (!topic) {
            throw new RangeError(`Topic index ${index} out of range (corpus has ${this.topics.length})`);
        }
        return topic;
    }

    /**
     * Keywords keyed by category name, for listing
     */
    keywordCategories(): { seo: Record<string, string[]>; llm: Record<string, string[]> } {
        return {
            seo: categoriesToRecord(this.seoKeywords),
            llm: categoriesToRecord(this.llmKeywords),
        };
    }
}

function freezeCollection(collection: KeywordCollection): KeywordCollection {
    return Object.freeze({
        categories: Object.freeze(collection.categories.map(category => Object.freeze({
            name: category.name,
            keywords: Object.freeze([...category.keywords]),
        }))),
    });
}

function categoriesToRecord(collection: KeywordCollection): Record<string, string[]> {
    const record: Record<string, string[]> = {};
    for (const category of collection.categories) {
        record[category.name] = [...category.keywords];
    }
    return record;
}

/**
 * One category per column, blank cells skipped
 */
export function toKeywordCollection(sheet: SheetTable): KeywordCollection {
    const categories: KeywordCategory[] = sheet.headers.map(header => ({
        name: header,
        keywords: sheet.rows
            .map(row => row[header] ?? '')
            .filter(keyword => keyword.length > 0),
    }));
    return { categories };
}

/**
 * Missing name → "Link", missing URL → ""
 */
export function toLinkRecords(sheet: SheetTable): LinkRecord[] {
    return sheet.rows.map(row => ({
        name: row[LINK_COLUMNS.name] || DEFAULT_LINK_NAME,
        url: row[LINK_COLUMNS.url] || '',
    }));
}

/**
 * Missing topic → "Topic N" (1-based), missing description or source → ""
 */
export function toTopicRecords(sheet: SheetTable): TopicRecord[] {
    return sheet.rows.map((row, index) => ({
        topic: row[TOPIC_COLUMNS.topic] || `Topic ${index + 1}`,
        description: row[TOPIC_COLUMNS.description] || '',
        sourceUrl: row[TOPIC_COLUMNS.source] || '',
    }));
}

/**
 * Build a typed corpus from loaded sheets
 */
export function buildCorpus(sheets: CorpusSheets): TopicCorpus {
    return new TopicCorpus({
        seoKeywords: toKeywordCollection(sheets['SEO - Keywords']),
        llmKeywords: toKeywordCollection(sheets['LLM - Keywords']),
        links: toLinkRecords(sheets['Website']),
        topics: toTopicRecords(sheets['key topics']),
    });
}

/**
 * A caller-supplied topic outside the corpus
 */
export function customTopic(topic: string, description?: string, sourceUrl?: string): TopicRecord {
    return {
        topic,
        description: description ?? 'Custom topic provided by user',
        sourceUrl: sourceUrl ?? 'User input',
    };
}
