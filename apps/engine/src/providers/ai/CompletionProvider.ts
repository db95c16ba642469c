/**
 * Completion Provider Interface
 *
 * Defines the contract for text completion backends.
 * Implementations wrap OpenAI, Gemini, or other hosted models.
 */

export interface CompletionRequest {
    /**
     * Model name the request is addressed to
     */
    model: string;
    systemPrompt: string;
    prompt: string;
    maxOutputTokens: number;
    temperature?: number;
}

/**
 * Token counts as reported by the backend; either side may be missing
 */
export interface CompletionUsage {
    inputTokens?: number;
    outputTokens?: number;
}

export interface CompletionResponse {
    content: string;
    /**
     * Absent when the backend does not report usage
     */
    usage?: CompletionUsage;
}

export interface CompletionProvider {
    /**
     * Provider name for logging
     */
    readonly name: string;

    /**
     * Generate a completion; rejects with a CompletionError
     */
    complete(request: CompletionRequest): Promise<CompletionResponse>;

    /**
     * Check if the provider is properly configured
     */
    isConfigured(): boolean;
}
