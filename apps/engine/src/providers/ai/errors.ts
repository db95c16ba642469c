/**
 * Completion Errors
 *
 * Normalizes backend failures into a closed set of kinds so the engine
 * can report them uniformly.
 */

export type CompletionErrorKind =
    | 'authentication'
    | 'rate_limited'
    | 'empty_response'
    | 'transport';

export class CompletionError extends Error {
    readonly kind: CompletionErrorKind;
    readonly status?: number;

    constructor(kind: CompletionErrorKind, message: string, status?: number) {
        super(message);
        this.name = 'CompletionError';
        this.kind = kind;
        this.status = status;
    }
}

/**
 * Map an HTTP status code to an error kind
 */
export function kindFromStatus(status: number | undefined): CompletionErrorKind {
    if (status === 401 || status === 403) {
        return 'authentication';
    }
    if (status === 429) {
        return 'rate_limited';
    }
    return 'transport';
}

/**
 * Coerce any thrown value into a CompletionError
 */
export function toCompletionError(error: unknown): CompletionError {
    if (error instanceof CompletionError) {
        return error;
    }
    if (error instanceof Error) {
        const status = readStatus(error);
        return new CompletionError(kindFromStatus(status), error.message, status);
    }
    return new CompletionError('transport', 'Unknown error');
}

function readStatus(error: Error): number | undefined {
    if ('status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}
