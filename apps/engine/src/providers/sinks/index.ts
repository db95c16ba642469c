export { ResultSink } from './ResultSink';
export { FileReportSink, REPORT_RULE, renderBlogReport, reportFileName } from './FileReportSink';
export {
    AirtableSink,
    AirtableSinkOptions,
    AirtableSchema,
    AirtableFields,
    AIRTABLE_CONTENT_LIMIT,
    airtableNotes,
    buildAirtableFields,
} from './AirtableSink';
export {
    GoogleSheetsSink,
    GoogleSheetsSinkOptions,
    SheetsClient,
    SheetRow,
    SHEET_HEADERS,
    buildSheetRow,
    createGoogleSheetsClient,
} from './GoogleSheetsSink';
export { createDefaultSinks, SinkSelection } from './factory';
