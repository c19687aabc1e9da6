import { ChartVaultBaseError } from './ChartVaultBaseError.js';
import { ErrorType } from './types.js';
import type { Issue } from './types.js';

/**
 * Validation error carrying one or more issues.
 * The first error-severity issue determines the message and type.
 */
export class ChartVaultValidationError extends ChartVaultBaseError {
    readonly type: ErrorType;

    constructor(public readonly issues: Issue[]) {
        const primary = issues.find((i) => i.severity === 'error') ?? issues[0];
        super(primary?.message ?? 'Validation failed');
        this.type = primary?.type ?? ErrorType.USER;
    }

    get errors(): Issue[] {
        return this.issues.filter((i) => i.severity === 'error');
    }

    get warnings(): Issue[] {
        return this.issues.filter((i) => i.severity === 'warning');
    }

    get code(): string | undefined {
        return this.errors[0]?.code;
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            type: this.type,
            issues: this.issues,
        };
    }
}
