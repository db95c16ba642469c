import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import config from '../../config';
import { createLogger, errorMessage } from '../../logger';
import { formatCost, formatTokens } from '../../pipeline/cost';
import { extractMeta } from '../../pipeline/meta';
import { StampedResult } from '../../pipeline/types';
import { formatTimestamp } from '../../utils/dates';
import { ResultSink } from './ResultSink';

const logger = createLogger('airtable-sink');

/**
 * `full` writes every column; `minimal` only Name and Notes
 */
export type AirtableSchema = 'full' | 'minimal';

// Long text fields are truncated to this many characters
export const AIRTABLE_CONTENT_LIMIT = 50000;

export type AirtableFields = Record<string, string | number>;

interface AirtableCreateResponse {
    records: Array<{ id: string }>;
}

interface AirtableErrorBody {
    error?: { type?: string; message?: string } | string;
}

export interface AirtableSinkOptions {
    apiKey?: string;
    baseId?: string;
    tableName?: string;
    schema?: AirtableSchema;
    /**
     * Replaces the HTTP transport
     */
    adapter?: AxiosAdapter;
}

/**
 * One-line summary stored in the Notes column
 */
export function airtableNotes(result: StampedResult): string {
    return `Generated: ${formatTimestamp(result.generatedAt)} | `
        + `Model: ${result.modelUsed} | `
        + `Tokens: ${formatTokens(result.totalTokens)} | `
        + `Cost: ${formatCost(result.cost)}`;
}

/**
 * Map a result onto Airtable columns
 */
export function buildAirtableFields(result: StampedResult, schema: AirtableSchema): AirtableFields {
    const fields: AirtableFields = {
        'Name': result.topic,
        'Notes': airtableNotes(result),
    };

    if (schema === 'minimal') {
        return fields;
    }

    const meta = extractMeta(result.content);
    return {
        ...fields,
        'Meta Title': meta.metaTitle,
        'Meta Description': meta.metaDescription,
        'Blog Content': result.content.slice(0, AIRTABLE_CONTENT_LIMIT),
        'Word Count': result.wordCount,
        'Model Used': result.modelUsed,
        'Input Tokens': result.inputTokens,
        'Output Tokens': result.outputTokens,
        'Cost': result.cost,
        'Generation Status': result.status === 'success' ? 'Success' : 'Failed',
        'SEO Keywords': result.seoKeywordsUsed.join(', '),
        'LLM Keywords': result.llmKeywordsUsed.join(', '),
        'Links Used': result.linksUsed.join(', '),
    };
}

function describeAxiosError(error: unknown): string {
    if (axios.isAxiosError<AirtableErrorBody>(error)) {
        const body = error.response?.data?.error;
        const detail = typeof body === 'string' ? body : body?.message;
        const status = error.response?.status;
        return status ? `${status} - ${detail || error.message}` : error.message;
    }
    return errorMessage(error);
}

/**
 * Appends results to an Airtable table via the REST API
 */
export class AirtableSink implements ResultSink {
    readonly name = 'airtable';
    readonly kind = 'remote';
    readonly schema: AirtableSchema;

    private apiKey: string;
    private baseId: string;
    private client: AxiosInstance;

    constructor(options: AirtableSinkOptions = {}) {
        this.apiKey = options.apiKey ?? config.airtable.apiKey;
        this.baseId = options.baseId ?? config.airtable.baseId;
        this.schema = options.schema ?? config.airtable.schema;
        const tableName = options.tableName ?? config.airtable.tableName;

        this.client = axios.create({
            baseURL: `https://api.airtable.com/v0/${this.baseId}/${encodeURIComponent(tableName)}`,
            timeout: 30000,
            headers: {
                'Authorization': `Bearer ${this.apiKey}`,
                'Content-Type': 'application/json',
            },
            adapter: options.adapter,
        });
    }

    isConfigured(): boolean {
        return !!(this.apiKey && this.baseId);
    }

    async testConnection(): Promise<boolean> {
        try {
            const response = await this.client.get<{ records?: unknown[] }>('', {
                params: { maxRecords: 1 },
            });
            logger.info('Airtable connection verified', {
                records: response.data.records?.length ?? 0,
            });
            return true;
        } catch (error) {
            logger.error('Airtable connection failed', { error: describeAxiosError(error) });
            return false;
        }
    }

    async store(result: StampedResult): Promise<void> {
        try {
            const response = await this.client.post<AirtableCreateResponse>('', {
                records: [
                    { fields: buildAirtableFields(result, this.schema) },
                ],
            });

            logger.info('Blog saved to Airtable', {
                topic: result.topic,
                recordId: response.data.records[0]?.id,
            });
        } catch (error) {
            throw new Error(`Airtable API error: ${describeAxiosError(error)}`);
        }
    }
}
