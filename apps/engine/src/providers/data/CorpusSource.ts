/**
 * Corpus Source Interface
 *
 * Defines the contract for loading the topic/keyword/link tables.
 */

/**
 * Category (sheet) names a source is expected to provide
 */
export const CORPUS_CATEGORIES = [
    'SEO - Keywords',
    'LLM - Keywords',
    'Website',
    'key topics',
] as const;

export type CorpusCategory = typeof CORPUS_CATEGORIES[number];

/**
 * One sheet as header names plus rows keyed by header
 */
export interface SheetTable {
    headers: string[];
    rows: Array<Record<string, string>>;
}

export type CorpusSheets = Record<CorpusCategory, SheetTable>;

/**
 * Raised when the source itself cannot be read
 */
export class CorpusLoadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CorpusLoadError';
    }
}

export interface CorpusSource {
    /**
     * Source description for logging
     */
    readonly name: string;

    /**
     * Load every category; missing categories come back empty
     */
    load(): Promise<CorpusSheets>;
}

/**
 * An empty table for a category the source does not have
 */
export function emptySheet(): SheetTable {
    return { headers: [], rows: [] };
}
