/**
 * Application errors
 */

export class AppError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class GameCacheError extends AppError {}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function isFileNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
