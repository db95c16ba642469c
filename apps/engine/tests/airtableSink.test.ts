/**
 * Tests for providers/sinks/AirtableSink.ts
 */

import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig } from 'axios';
import { AirtableSink, airtableNotes, buildAirtableFields } from '../src/providers/sinks';
import { stamped } from './helpers';

const CONTENT = 'META_TITLE: Edge AI Guide\nMETA_DESCRIPTION: Run models near the data\n\n# Edge AI';

function recordingAdapter(requests: InternalAxiosRequestConfig[]): AxiosAdapter {
    return async config => {
        requests.push(config);
        return {
            data: { records: [{ id: 'rec123' }] },
            status: 200,
            statusText: 'OK',
            headers: {},
            config,
        };
    };
}

describe('buildAirtableFields', () => {
    const result = stamped({ content: CONTENT, wordCount: 12 });

    it('writes only Name and Notes for the minimal schema', () => {
        expect(buildAirtableFields(result, 'minimal')).toEqual({
            'Name': 'Edge AI',
            'Notes': 'Generated: 2026-10-19 08:30:05 | Model: gpt-4o | Tokens: 52 | Cost: $0.0003',
        });
    });

    it('writes every column for the full schema', () => {
        expect(buildAirtableFields(result, 'full')).toEqual({
            'Name': 'Edge AI',
            'Notes': airtableNotes(result),
            'Meta Title': 'Edge AI Guide',
            'Meta Description': 'Run models near the data',
            'Blog Content': CONTENT,
            'Word Count': 12,
            'Model Used': 'gpt-4o',
            'Input Tokens': 50,
            'Output Tokens': 2,
            'Cost': 0.00028,
            'Generation Status': 'Success',
            'SEO Keywords': 'k1, k2',
            'LLM Keywords': 'j1',
            'Links Used': 'Docs',
        });
    });

    it('truncates long content', () => {
        const fields = buildAirtableFields(stamped({ content: 'x'.repeat(60000) }), 'full');
        expect(fields['Blog Content']).toHaveLength(50000);
    });
});

describe('AirtableSink', () => {
    it('posts one record with bearer auth', async () => {
        const requests: InternalAxiosRequestConfig[] = [];
        const sink = new AirtableSink({
            apiKey: 'test-secret',
            baseId: 'appTest',
            tableName: 'Blog Posts',
            schema: 'minimal',
            adapter: recordingAdapter(requests),
        });

        await sink.store(stamped());

        expect(requests).toHaveLength(1);
        expect(requests[0].method).toBe('post');
        expect(requests[0].baseURL).toBe('https://api.airtable.com/v0/appTest/Blog%20Posts');
        expect(requests[0].headers['Authorization']).toBe('Bearer test-secret');
        expect(JSON.parse(requests[0].data)).toEqual({
            records: [{ fields: buildAirtableFields(stamped(), 'minimal') }],
        });
    });

    it('wraps API errors with status and detail', async () => {
        const adapter: AxiosAdapter = async config => {
            throw new AxiosError('Request failed with status code 422', 'ERR_BAD_REQUEST', config, null, {
                data: { error: { type: 'UNKNOWN_FIELD_NAME', message: 'Unknown field name: "Meta Title"' } },
                status: 422,
                statusText: 'Unprocessable Entity',
                headers: {},
                config,
            });
        };
        const sink = new AirtableSink({ apiKey: 'test-secret', baseId: 'appTest', tableName: 'T', adapter });

        await expect(sink.store(stamped())).rejects.toThrow(
            'Airtable API error: 422 - Unknown field name: "Meta Title"'
        );
    });

    it('wraps transport errors', async () => {
        const adapter: AxiosAdapter = async () => {
            throw new Error('socket hang up');
        };
        const sink = new AirtableSink({ apiKey: 'test-secret', baseId: 'appTest', tableName: 'T', adapter });

        await expect(sink.store(stamped())).rejects.toThrow('Airtable API error: socket hang up');
    });

    it('is configured only with a key and base', () => {
        expect(new AirtableSink({ apiKey: 'test-secret', baseId: 'appTest' }).isConfigured()).toBe(true);
        expect(new AirtableSink({ apiKey: '', baseId: 'appTest' }).isConfigured()).toBe(false);
    });

    it('tests the connection with a one-record read', async () => {
        const requests: InternalAxiosRequestConfig[] = [];
        const sink = new AirtableSink({
            apiKey: 'test-secret',
            baseId: 'appTest',
            tableName: 'T',
            adapter: recordingAdapter(requests),
        });

        await expect(sink.testConnection()).resolves.toBe(true);
        expect(requests[0].method).toBe('get');
        expect(requests[0].params).toEqual({ maxRecords: 1 });
    });
});
