/**
 * Helpers for values caught from node:fs and third-party code.
 */

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * The errno code of a Node system error ('ENOENT', 'EXDEV', ...), if any.
 */
export function errorCode(err: unknown): string | undefined {
    if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
        return err.code;
    }
    return undefined;
}
