export {
    CompletionProvider,
    CompletionRequest,
    CompletionResponse,
    CompletionUsage,
} from './CompletionProvider';
export { CompletionError, CompletionErrorKind, kindFromStatus, toCompletionError } from './errors';
export { OpenAiProvider } from './OpenAiProvider';
export { GeminiProvider, GeminiProviderOptions } from './GeminiProvider';
export { getCompletionProvider, getCandidateModelNames, resetProvider } from './factory';
export * from './prompts';
