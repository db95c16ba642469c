export {
    CORPUS_CATEGORIES,
    CorpusCategory,
    CorpusLoadError,
    CorpusSheets,
    CorpusSource,
    SheetTable,
    emptySheet,
} from './CorpusSource';
export { WorkbookCorpusSource, sheetToTable } from './WorkbookCorpusSource';
