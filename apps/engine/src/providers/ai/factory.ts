/**
 * Completion Provider Factory
 *
 * Returns the configured completion provider and its candidate models.
 */

import config from '../../config';
import { createLogger } from '../../logger';
import { CompletionProvider } from './CompletionProvider';
import { OpenAiProvider } from './OpenAiProvider';
import { GeminiProvider } from './GeminiProvider';

const logger = createLogger('ai-provider');

let currentProvider: CompletionProvider | null = null;

/**
 * Get the configured completion provider
 */
export function getCompletionProvider(): CompletionProvider {
    if (currentProvider) {
        return currentProvider;
    }

    switch (config.ai.provider) {
        case 'gemini': {
            const provider = new GeminiProvider();
            if (!provider.isConfigured()) {
                throw new Error('Gemini provider not configured - missing GEMINI_API_KEY');
            }
            currentProvider = provider;
            logger.info('Using Gemini provider', { models: config.gemini.models });
            break;
        }

        case 'openai':
        default: {
            const provider = new OpenAiProvider();
            if (!provider.isConfigured()) {
                throw new Error('OpenAI provider not configured - missing OPENAI_API_KEY');
            }
            currentProvider = provider;
            logger.info('Using OpenAI provider', { models: config.openai.models });
            break;
        }
    }

    return currentProvider;
}

/**
 * Candidate model names for the configured provider, primary first
 */
export function getCandidateModelNames(): readonly string[] {
    return config.ai.provider === 'gemini' ? config.gemini.models : config.openai.models;
}

/**
 * Reset the provider (for testing)
 */
export function resetProvider(): void {
    currentProvider = null;
}

export default { getCompletionProvider, getCandidateModelNames, resetProvider };
