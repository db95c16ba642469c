import fs from 'fs';
import path from 'path';
import { Workbook, Worksheet } from 'exceljs';
import config from '../../config';
import { createLogger, errorMessage } from '../../logger';
import {
    CorpusCategory,
    CorpusLoadError,
    CorpusSheets,
    CorpusSource,
    SheetTable,
    emptySheet,
} from './CorpusSource';

const logger = createLogger('workbook-source');

/**
 * Convert a worksheet into header names and string rows.
 * Row 1 holds the headers; rows with only blank cells are dropped.
 */
export function sheetToTable(worksheet: Worksheet): SheetTable {
    const columnCount = worksheet.columnCount;
    const headerRow = worksheet.getRow(1);
    const headers: string[] = [];

    for (let col = 1; col <= columnCount; col++) {
        const text = headerRow.getCell(col).text.trim();
        headers.push(text || `Column ${col}`);
    }

    const rows: Array<Record<string, string>> = [];
    for (let rowNumber = 2; rowNumber <= worksheet.rowCount; rowNumber++) {
        const row = worksheet.getRow(rowNumber);
        const record: Record<string, string> = {};
        let hasValue = false;

        headers.forEach((header, index) => {
            const text = row.getCell(index + 1).text.trim();
            record[header] = text;
            if (text) hasValue = true;
        });

        if (hasValue) {
            rows.push(record);
        }
    }

    return { headers, rows };
}

function readSheet(workbook: Workbook, category: CorpusCategory): SheetTable {
    const worksheet = workbook.getWorksheet(category);
    if (!worksheet) {
        logger.warn('Sheet not found', { sheet: category });
        return emptySheet();
    }

    const table = sheetToTable(worksheet);
    logger.info('Read sheet', { sheet: category, rows: table.rows.length });
    return table;
}

/**
 * Reads the four corpus categories from an .xlsx workbook
 */
export class WorkbookCorpusSource implements CorpusSource {
    readonly name: string;
    private filePath: string;

    constructor(filePath: string = config.corpus.filePath) {
        this.filePath = path.resolve(filePath);
        this.name = `workbook:${path.basename(this.filePath)}`;
    }

    async load(): Promise<CorpusSheets> {
        logger.info('Reading workbook', { filePath: this.filePath });

        if (!fs.existsSync(this.filePath)) {
            throw new CorpusLoadError(`Workbook not found at ${this.filePath}`);
        }

        const workbook = new Workbook();
        try {
            await workbook.xlsx.readFile(this.filePath);
        } catch (error) {
            throw new CorpusLoadError(`Failed to read workbook: ${errorMessage(error)}`);
        }

        logger.debug('Available sheets', {
            sheets: workbook.worksheets.map(sheet => sheet.name),
        });

        return {
            'SEO - Keywords': readSheet(workbook, 'SEO - Keywords'),
            'LLM - Keywords': readSheet(workbook, 'LLM - Keywords'),
            'Website': readSheet(workbook, 'Website'),
            'key topics': readSheet(workbook, 'key topics'),
        };
    }
}
