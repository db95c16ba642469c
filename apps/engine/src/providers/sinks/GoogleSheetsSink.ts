import fs from 'fs';
import { google } from 'googleapis';
import config from '../../config';
import { createLogger, errorMessage } from '../../logger';
import { extractMeta } from '../../pipeline/meta';
import { StampedResult } from '../../pipeline/types';
import { formatTimestamp } from '../../utils/dates';
import { ResultSink } from './ResultSink';

const logger = createLogger('google-sheets-sink');

export const SHEET_HEADERS = [
    'Timestamp',
    'Topic',
    'Meta Title',
    'Meta Description',
    'Blog Content',
    'Word Count',
    'SEO Keywords Used',
    'LLM Keywords Used',
    'Website Links Used',
    'Generation Status',
    'Notes',
] as const;

export type SheetRow = Array<string | number>;

/**
 * The spreadsheet operations the sink needs
 */
export interface SheetsClient {
    appendRows(range: string, rows: SheetRow[]): Promise<void>;
    updateRows(range: string, rows: SheetRow[]): Promise<void>;
    clear(range: string): Promise<void>;
    getTitle(): Promise<string>;
}

/**
 * SheetsClient backed by the Google Sheets v4 API with service-account auth
 */
export function createGoogleSheetsClient(
    spreadsheetId: string = config.sheets.spreadsheetId,
    credentialsFile: string = config.sheets.credentialsFile
): SheetsClient {
    const auth = new google.auth.GoogleAuth({
        keyFile: credentialsFile,
        scopes: ['https://www.googleapis.com/auth/spreadsheets'],
    });
    const sheets = google.sheets({ version: 'v4', auth });

    return {
        async appendRows(range, rows) {
            await sheets.spreadsheets.values.append({
                spreadsheetId,
                range,
                valueInputOption: 'RAW',
                insertDataOption: 'INSERT_ROWS',
                requestBody: { values: rows },
            });
        },
        async updateRows(range, rows) {
            await sheets.spreadsheets.values.update({
                spreadsheetId,
                range,
                valueInputOption: 'RAW',
                requestBody: { values: rows },
            });
        },
        async clear(range) {
            await sheets.spreadsheets.values.clear({ spreadsheetId, range });
        },
        async getTitle() {
            const response = await sheets.spreadsheets.get({ spreadsheetId });
            return response.data.properties?.title || 'Unknown';
        },
    };
}

/**
 * Row in SHEET_HEADERS order
 */
export function buildSheetRow(result: StampedResult): SheetRow {
    const meta = extractMeta(result.content);
    return [
        formatTimestamp(result.generatedAt),
        result.topic,
        meta.metaTitle,
        meta.metaDescription,
        result.content,
        result.wordCount,
        result.seoKeywordsUsed.join(', '),
        result.llmKeywordsUsed.join(', '),
        result.linksUsed.join(', '),
        result.status,
        result.error ?? '',
    ];
}

export interface GoogleSheetsSinkOptions {
    spreadsheetId?: string;
    credentialsFile?: string;
    client?: SheetsClient;
}

/**
 * Appends one row per result to a Google spreadsheet
 */
export class GoogleSheetsSink implements ResultSink {
    readonly name = 'google-sheets';
    readonly kind = 'remote';

    private spreadsheetId: string;
    private credentialsFile: string;
    private client: SheetsClient | null;

    constructor(options: GoogleSheetsSinkOptions = {}) {
        this.spreadsheetId = options.spreadsheetId ?? config.sheets.spreadsheetId;
        this.credentialsFile = options.credentialsFile ?? config.sheets.credentialsFile;
        this.client = options.client ?? null;
    }

    isConfigured(): boolean {
        if (!this.spreadsheetId) return false;
        return this.client !== null || fs.existsSync(this.credentialsFile);
    }

    private getClient(): SheetsClient {
        if (!this.client) {
            this.client = createGoogleSheetsClient(this.spreadsheetId, this.credentialsFile);
        }
        return this.client;
    }

    async testConnection(): Promise<boolean> {
        try {
            const title = await this.getClient().getTitle();
            logger.info('Google Sheets connection verified', { sheet: title });
            return true;
        } catch (error) {
            logger.error('Google Sheets connection failed', { error: errorMessage(error) });
            return false;
        }
    }

    /**
     * Clear the sheet and write the header row
     */
    async setupHeaders(): Promise<void> {
        const client = this.getClient();
        await client.clear('A1:Z1000');
        await client.updateRows('A1', [[...SHEET_HEADERS]]);
        logger.info('Sheet headers created');
    }

    async store(result: StampedResult): Promise<void> {
        try {
            await this.getClient().appendRows('A2', [buildSheetRow(result)]);
            logger.info('Blog saved to Google Sheets', { topic: result.topic });
        } catch (error) {
            throw new Error(`Google Sheets error: ${errorMessage(error)}`);
        }
    }
}
