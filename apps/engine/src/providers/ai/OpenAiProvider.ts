import OpenAI from 'openai';
import config from '../../config';
import { createLogger } from '../../logger';
import {
    CompletionProvider,
    CompletionRequest,
    CompletionResponse,
} from './CompletionProvider';
import { CompletionError, kindFromStatus, toCompletionError } from './errors';

const logger = createLogger('openai-provider');

/**
 * OpenAI-based completion provider
 */
export class OpenAiProvider implements CompletionProvider {
    readonly name = 'OpenAI';
    private client: OpenAI | null = null;
    private apiKey: string;

    constructor(apiKey: string = config.openai.apiKey) {
        this.apiKey = apiKey;
    }

    private getClient(): OpenAI {
        if (!this.client) {
            this.client = new OpenAI({ apiKey: this.apiKey });
        }
        return this.client;
    }

    isConfigured(): boolean {
        return !!this.apiKey;
    }

    async complete(request: CompletionRequest): Promise<CompletionResponse> {
        logger.debug('Generating completion', {
            model: request.model,
            promptLength: request.prompt.length,
        });

        try {
            const response = await this.getClient().chat.completions.create({
                model: request.model,
                messages: [
                    { role: 'system', content: request.systemPrompt },
                    { role: 'user', content: request.prompt },
                ],
                temperature: request.temperature ?? 0.7,
                max_tokens: request.maxOutputTokens,
            });

            const content = response.choices[0]?.message?.content || '';
            logger.debug('Completion generated', {
                model: request.model,
                tokens: response.usage?.total_tokens,
            });

            return {
                content,
                usage: response.usage
                    ? {
                        inputTokens: response.usage.prompt_tokens,
                        outputTokens: response.usage.completion_tokens,
                    }
                    : undefined,
            };
        } catch (error) {
            if (error instanceof OpenAI.APIError) {
                logger.error('OpenAI API error', {
                    model: request.model,
                    status: error.status,
                    error: error.message,
                });
                throw new CompletionError(kindFromStatus(error.status), error.message, error.status);
            }

            const normalized = toCompletionError(error);
            logger.error('OpenAI request failed', {
                model: request.model,
                error: normalized.message,
            });
            throw normalized;
        }
    }
}
