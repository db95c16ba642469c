/**
 * Result Sink Factory
 *
 * Builds the configured sinks: the file report always, remote grids
 * when their credentials are present.
 */

import { createLogger } from '../../logger';
import { AirtableSink } from './AirtableSink';
import { FileReportSink } from './FileReportSink';
import { GoogleSheetsSink } from './GoogleSheetsSink';
import { ResultSink } from './ResultSink';

const logger = createLogger('sinks');

export interface SinkSelection {
    outputDir?: string;
    includeRemote?: boolean;
    /**
     * Remote candidates; defaults to Airtable and Google Sheets from config
     */
    remotes?: ResultSink[];
}

export function createDefaultSinks(selection: SinkSelection = {}): ResultSink[] {
    const sinks: ResultSink[] = [new FileReportSink(selection.outputDir)];

    if (selection.includeRemote === false) {
        logger.info('Remote sinks disabled');
        return sinks;
    }

    const remotes = selection.remotes ?? [new AirtableSink(), new GoogleSheetsSink()];
    for (const sink of remotes) {
        if (sink.isConfigured()) {
            sinks.push(sink);
        } else {
            logger.info('Remote sink not configured, skipping', { sink: sink.name });
        }
    }

    logger.info('Sinks ready', { sinks: sinks.map(sink => sink.name) });
    return sinks;
}

export default { createDefaultSinks };
