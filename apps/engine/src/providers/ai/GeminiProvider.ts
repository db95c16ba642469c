import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import config from '../../config';
import { createLogger } from '../../logger';
import {
    CompletionProvider,
    CompletionRequest,
    CompletionResponse,
} from './CompletionProvider';
import { CompletionError, kindFromStatus, toCompletionError } from './errors';

const logger = createLogger('gemini-provider');

interface GeminiResponse {
    candidates?: Array<{
        content?: {
            parts?: Array<{ text?: string }>;
        };
    }>;
    usageMetadata?: {
        promptTokenCount?: number;
        candidatesTokenCount?: number;
    };
}

interface GeminiErrorBody {
    error?: { message?: string };
}

export interface GeminiProviderOptions {
    apiKey?: string;
    baseUrl?: string;
    timeoutMs?: number;
    /**
     * Replaces the HTTP transport
     */
    adapter?: AxiosAdapter;
}

/**
 * Google Gemini completion provider (REST)
 */
export class GeminiProvider implements CompletionProvider {
    readonly name = 'Gemini';
    private apiKey: string;
    private client: AxiosInstance;

    constructor(options: GeminiProviderOptions = {}) {
        this.apiKey = options.apiKey ?? config.gemini.apiKey;
        this.client = axios.create({
            baseURL: options.baseUrl ?? 'https://generativelanguage.googleapis.com/v1',
            timeout: options.timeoutMs ?? 60000,
            headers: {
                'Content-Type': 'application/json',
            },
            adapter: options.adapter,
        });
    }

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    async complete(request: CompletionRequest): Promise<CompletionResponse> {
        logger.debug('Generating completion with Gemini', {
            model: request.model,
            promptLength: request.prompt.length,
        });

        try {
            const fullPrompt = `${request.systemPrompt}\n\n${request.prompt}`;

            const response = await this.client.post<GeminiResponse>(
                `/models/${request.model}:generateContent`,
                {
                    contents: [
                        {
                            parts: [{ text: fullPrompt }]
                        }
                    ],
                    generationConfig: {
                        temperature: request.temperature ?? 0.7,
                        maxOutputTokens: request.maxOutputTokens,
                    }
                },
                {
                    params: { key: this.apiKey },
                }
            );

            const content = response.data.candidates?.[0]?.content?.parts?.[0]?.text || '';
            const usage = response.data.usageMetadata;
            logger.debug('Gemini completion generated', {
                model: request.model,
                responseLength: content.length,
            });

            return {
                content,
                usage: usage && (usage.promptTokenCount !== undefined || usage.candidatesTokenCount !== undefined)
                    ? {
                        inputTokens: usage.promptTokenCount,
                        outputTokens: usage.candidatesTokenCount,
                    }
                    : undefined,
            };
        } catch (error) {
            if (axios.isAxiosError<GeminiErrorBody>(error)) {
                const status = error.response?.status;
                const message = error.response?.data?.error?.message || error.message;
                logger.error('Gemini API error', { model: request.model, status, error: message });
                throw new CompletionError(kindFromStatus(status), `Gemini API error: ${message}`, status);
            }

            const normalized = toCompletionError(error);
            logger.error('Gemini request failed', { model: request.model, error: normalized.message });
            throw normalized;
        }
    }
}
