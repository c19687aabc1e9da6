import { ChartVaultBaseError } from './ChartVaultBaseError.js';
import type { ChartVaultErrorCode, ErrorScope, ErrorType } from './types.js';

/**
 * Runtime error for a single failed operation.
 * Created through the scope-specific factories (e.g. `StorageError`), not directly.
 */
export class ChartVaultRuntimeError<C = Record<string, unknown>> extends ChartVaultBaseError {
    constructor(
        public readonly code: ChartVaultErrorCode | string,
        public readonly scope: ErrorScope | string,
        public readonly type: ErrorType,
        message: string,
        public readonly context?: C,
        public readonly recovery?: string | string[]
    ) {
        super(message);
    }

    toJSON(): Record<string, unknown> {
        return {
            code: this.code,
            message: this.message,
            scope: this.scope,
            type: this.type,
            context: this.context,
            recovery: this.recovery,
        };
    }
}
