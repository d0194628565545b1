/**
 * Dictionary load errors
 * Every error is fatal to the load that raised it; the registry being written is left partial.
 */

export type DictionaryErrorCode =
    | 'SYNTAX_ERROR'
    | 'UNRESOLVED_REFERENCE'
    | 'INCLUDE_NOT_FOUND'
    | 'INCLUDE_CYCLE';

export class DictionaryError extends Error {
    constructor(
        public code: DictionaryErrorCode,
        message: string,
        public line?: number
    ) {
        super(message);
        this.name = 'DictionaryError';
    }
}

export class DictionarySyntaxError extends DictionaryError {
    constructor(message: string, line: number) {
        super('SYNTAX_ERROR', `${message}, line ${line}`, line);
        this.name = 'DictionarySyntaxError';
    }
}

export class UnresolvedReferenceError extends DictionaryError {
    constructor(public attributeName: string, line: number) {
        super('UNRESOLVED_REFERENCE', `unknown attribute type: ${attributeName}, line ${line}`, line);
        this.name = 'UnresolvedReferenceError';
    }
}

export class IncludeNotFoundError extends DictionaryError {
    constructor(public path: string, line: number, options?: { cause?: unknown }) {
        super('INCLUDE_NOT_FOUND', `included file '${path}' not found, line ${line}`, line);
        this.name = 'IncludeNotFoundError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

export class IncludeCycleError extends DictionaryError {
    constructor(public path: string, line: number, reason: string) {
        super('INCLUDE_CYCLE', `${reason}: '${path}', line ${line}`, line);
        this.name = 'IncludeCycleError';
    }
}

export function isDictionaryError(err: unknown): err is DictionaryError {
    return err instanceof DictionaryError;
}
