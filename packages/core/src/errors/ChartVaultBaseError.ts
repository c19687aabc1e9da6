import { ErrorType } from './types.js';

const HTTP_STATUS_BY_TYPE: Record<ErrorType, number> = {
    [ErrorType.USER]: 400,
    [ErrorType.FORBIDDEN]: 403,
    [ErrorType.NOT_FOUND]: 404,
    [ErrorType.CONFLICT]: 409,
    [ErrorType.SYSTEM]: 500,
};

/**
 * Base class for every error raised by chartvault packages.
 * Subclasses decide how the error type is derived (single failure vs. issue list).
 */
export abstract class ChartVaultBaseError extends Error {
    abstract readonly type: ErrorType;

    protected constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }

    /**
     * Status code the calling protocol layer should answer with
     */
    getHttpStatus(): number {
        return HTTP_STATUS_BY_TYPE[this.type];
    }

    abstract toJSON(): Record<string, unknown>;
}
