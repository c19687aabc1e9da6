/**
 * errno of a Node.js filesystem error (`ENOENT`, `EACCES`, `ENOSPC`, ...), if any
 */
export function errnoOf(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

export function isNotFoundError(error: unknown): boolean {
    return errnoOf(error) === 'ENOENT';
}
