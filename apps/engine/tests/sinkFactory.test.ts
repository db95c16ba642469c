/**
 * Tests for providers/sinks/factory.ts
 */

import { AirtableSink, FileReportSink, GoogleSheetsSink, createDefaultSinks } from '../src/providers/sinks';

describe('createDefaultSinks', () => {
    const configured = new AirtableSink({ apiKey: 'test-secret', baseId: 'appTest', tableName: 'T' });
    const unconfigured = new GoogleSheetsSink({ spreadsheetId: '' });

    it('returns only the file report sink when remote sinks are disabled', () => {
        const sinks = createDefaultSinks({ outputDir: 'out', includeRemote: false, remotes: [configured] });

        expect(sinks).toHaveLength(1);
        expect(sinks[0]).toBeInstanceOf(FileReportSink);
        expect(sinks[0].kind).toBe('local');
    });

    it('adds configured remote sinks after the file report sink', () => {
        const sinks = createDefaultSinks({ outputDir: 'out', remotes: [configured] });

        expect(sinks.map(sink => sink.name)).toEqual(['file-report', 'airtable']);
        expect(sinks[1]).toBe(configured);
    });

    it('skips remote sinks that are not configured', () => {
        const sinks = createDefaultSinks({ outputDir: 'out', remotes: [unconfigured, configured] });

        expect(sinks.map(sink => sink.name)).toEqual(['file-report', 'airtable']);
        expect(sinks).not.toContain(unconfigured);
    });
});
